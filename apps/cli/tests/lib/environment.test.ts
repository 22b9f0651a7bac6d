import { describe, it, expect } from 'vitest';
import {
  ASCII_SYMBOLS,
  UNICODE_SYMBOLS,
  detectEnvironment,
  getSymbols,
} from '../../src/lib/environment.js';

describe('environment', () => {
  describe('colors', () => {
    it('honours NO_COLOR even on a TTY', () => {
      expect(detectEnvironment({ NO_COLOR: '' }, true).colors).toBe(false);
    });

    it('honours LEAKGATE_NO_COLOR', () => {
      expect(detectEnvironment({ LEAKGATE_NO_COLOR: 'true' }, true).colors).toBe(false);
    });

    it('lets FORCE_COLOR override a missing TTY', () => {
      expect(detectEnvironment({ FORCE_COLOR: '1' }, false).colors).toBe(true);
      expect(detectEnvironment({ FORCE_COLOR: '0' }, true).colors).toBe(false);
    });

    it('uses colors on an interactive terminal', () => {
      expect(detectEnvironment({ TERM: 'xterm-256color' }, true).colors).toBe(true);
    });

    it('skips colors on a dumb terminal', () => {
      expect(detectEnvironment({ TERM: 'dumb' }, true).colors).toBe(false);
    });
  });

  describe('getSymbols', () => {
    it('returns unicode symbols when supported', () => {
      const symbols = getSymbols({ unicode: true });
      expect(symbols.tick).toBe('✓');
      expect(symbols.cross).toBe('✖');
    });

    it('falls back to ASCII when LEAKGATE_NO_UNICODE is set', () => {
      const environment = detectEnvironment({ LEAKGATE_NO_UNICODE: '1' }, true);
      expect(environment.unicode).toBe(false);
      expect(getSymbols(environment)).toBe(ASCII_SYMBOLS);
    });

    it('keeps the two sets distinct', () => {
      expect(UNICODE_SYMBOLS).not.toEqual(ASCII_SYMBOLS);
    });
  });

  it('reports the TTY flag it was given', () => {
    expect(detectEnvironment({}, false).isTTY).toBe(false);
    expect(detectEnvironment({}, true).isTTY).toBe(true);
  });
});
