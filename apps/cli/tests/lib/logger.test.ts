import { describe, it, expect } from 'vitest';
import { createLogger } from '../../src/lib/logger.js';
import { ASCII_SYMBOLS } from '../../src/lib/environment.js';

function capture(options: Parameters<typeof createLogger>[0] = {}) {
  const lines: string[] = [];
  const logger = createLogger({ symbols: ASCII_SYMBOLS, ...options, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('createLogger', () => {
  it('prefixes messages with level symbols', () => {
    const { logger, lines } = capture();

    logger.success('done');
    logger.error('failed');
    logger.warn('careful');
    logger.info('note');

    expect(lines).toEqual(['+ done', 'x failed', '! careful', 'i note']);
  });

  it('filters below the configured level', () => {
    const { logger, lines } = capture({ level: 'warn' });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(lines).toEqual(['! shown']);
  });

  it('writes JSON lines', () => {
    const { logger, lines } = capture({ json: true });

    logger.info('note');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'info', message: 'note' });
  });

  it('forwards core log entries', () => {
    const { logger, lines } = capture({ level: 'debug' });

    logger.fromCore({
      timestamp: '2026-06-01T00:00:00.000Z',
      level: 'warn',
      component: 'leakgate.validators',
      message: 'Validator failed',
      context: { validator: 'github_pat_live' },
    });

    expect(lines).toEqual(['! [leakgate.validators] Validator failed {"validator":"github_pat_live"}']);
  });
});
