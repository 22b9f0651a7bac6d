import { vi } from 'vitest';
import type { Finding, PolicyConfig } from '@repo/shared-types';
import type { FetchFn, Validator, ValidatorContext, ValidatorVerdict } from '../types.js';

export const FIXED_NOW = new Date('2026-06-01T00:00:00Z');

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    path: 'src/config.ts',
    rule: 'generic_secret',
    line: 1,
    match: 'placeholder-secret-value-0001',
    severity: 'high',
    ...overrides,
  };
}

export function makePolicy(validators: Partial<PolicyConfig['validators']> = {}): Pick<PolicyConfig, 'validators'> {
  return { validators: { allow_network: false, global_qps: 100, ...validators } };
}

export function makeContext(fetchFn: FetchFn = vi.fn<FetchFn>()): ValidatorContext {
  return {
    signal: new AbortController().signal,
    timeoutMs: 1000,
    fetch: fetchFn,
    now: () => FIXED_NOW,
  };
}

interface StubOptions {
  requiresNetwork?: boolean;
  rateLimitQps?: number;
  applies?: (finding: Finding) => boolean;
  verdict?: ValidatorVerdict;
  impl?: (finding: Finding, context: ValidatorContext) => Promise<ValidatorVerdict>;
}

/**
 * Validator stub that counts calls and answers with a fixed verdict
 */
export class StubValidator implements Validator {
  readonly rateLimitQps: number;
  readonly requiresNetwork: boolean;
  calls = 0;

  constructor(readonly name: string, private readonly options: StubOptions = {}) {
    this.rateLimitQps = options.rateLimitQps ?? 100;
    this.requiresNetwork = options.requiresNetwork ?? false;
  }

  appliesTo(finding: Finding): boolean {
    return this.options.applies ? this.options.applies(finding) : true;
  }

  async validate(finding: Finding, context: ValidatorContext): Promise<ValidatorVerdict> {
    this.calls += 1;
    if (this.options.impl) {
      return this.options.impl(finding, context);
    }
    return this.options.verdict ?? { state: 'valid', evidence: 'ok' };
  }
}

export function stubValidator(name: string, options: StubOptions = {}): StubValidator {
  return new StubValidator(name, options);
}
