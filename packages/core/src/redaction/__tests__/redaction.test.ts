/**
 * Redaction Tests
 */

import { describe, it, expect } from 'vitest';
import type { Finding, ValidationResult } from '@repo/shared-types';
import {
  redactSecret,
  redactEvidence,
  redactFinding,
  redactFindings,
  scrubSecrets,
  scrubText,
} from '../index.js';

const RAW = 'ghp_testplaceholdervalue0001';

function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    path: 'src/app.ts',
    rule: 'github_pat',
    line: 3,
    match: RAW,
    severity: 'high',
    ...overrides,
  };
}

describe('redactSecret', () => {
  it('masks values of 10 characters or fewer entirely', () => {
    expect(redactSecret('')).toBe('****');
    expect(redactSecret('short')).toBe('****');
    expect(redactSecret('0123456789')).toBe('****');
  });

  it('keeps the first 6 and last 4 characters of longer values', () => {
    expect(redactSecret('abcdefghijk')).toBe('abcdef****hijk');
    expect(redactSecret(RAW)).toBe('ghp_te****0001');
  });

  it('is idempotent', () => {
    const once = redactSecret(RAW);
    expect(redactSecret(once)).toBe(once);
    expect(redactSecret(redactSecret('tiny'))).toBe('****');
  });
});

describe('redactEvidence', () => {
  it('masks secret-shaped tokens and leaves other text alone', () => {
    expect(redactEvidence('token=abcdefghijklmnopqrstuvwx end')).toBe('token=abcdef****uvwx end');
    expect(redactEvidence('nothing to see here')).toBe('nothing to see here');
  });

  it('works line by line', () => {
    const text = 'first abcdefghijklmnopqrstuvwx\nsecond line';
    expect(redactEvidence(text)).toBe('first abcdef****uvwx\nsecond line');
  });

  it('is idempotent', () => {
    const once = redactEvidence(`key ${RAW} and abcdefghijklmnopqrstuvwx`);
    expect(redactEvidence(once)).toBe(once);
  });
});

describe('scrubSecrets', () => {
  it('masks known raw values anywhere in a structure', () => {
    expect(scrubSecrets({ a: ['x short1 y'], b: 3 }, ['short1'])).toEqual({ a: ['x **** y'], b: 3 });
  });

  it('masks the longest secret first', () => {
    expect(scrubText(`v=${RAW}`, ['ghp_test', RAW])).toBe('v=ghp_te****0001');
  });

  it('returns the value untouched when there is nothing to scrub', () => {
    const value = { a: 1 };
    expect(scrubSecrets(value, [])).toBe(value);
  });
});

describe('redactFinding', () => {
  it('masks match, hint and validator text and drops raw meta keys', () => {
    const validators: ValidationResult[] = [
      { state: 'valid', validatorName: 'github_pat_live', evidence: `Valid token ${RAW}` },
    ];
    const finding = {
      ...makeFinding({
        matchHint: `const token = "${RAW}";`,
        meta: { fullToken: RAW, detector: 'regex' },
      }),
      validators,
    };

    const redacted = redactFinding(finding);

    expect(redacted.match).toBe('ghp_te****0001');
    expect(redacted.matchHint).toBe('const token = "ghp_te****0001";');
    expect(redacted.meta).toEqual({ detector: 'regex' });
    expect(redacted.validators).toEqual([
      { state: 'valid', validatorName: 'github_pat_live', evidence: 'Valid token ghp_te****0001', reason: undefined },
    ]);
    expect(JSON.stringify(redacted)).not.toContain(RAW);
  });

  it('does not mutate its input', () => {
    const finding = makeFinding();
    redactFinding(finding);
    expect(finding.match).toBe(RAW);
  });

  it('is idempotent', () => {
    const once = redactFinding(makeFinding({ matchHint: `x ${RAW}` }));
    expect(redactFinding(once)).toEqual(once);
  });

  it('redacts a list', () => {
    const [first] = redactFindings([makeFinding()]);
    expect(first?.match).toBe('ghp_te****0001');
  });
});
