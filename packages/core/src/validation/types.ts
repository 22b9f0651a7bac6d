/**
 * Validator Contract
 *
 * A validator decides whether a finding's apparent secret is live. Local
 * validators only inspect the value; network validators may call out to
 * the issuing service, and only when policy allows it.
 */

import type { Finding, ValidationResult } from '@repo/shared-types';

export type FetchFn = typeof fetch;

/**
 * Per-call environment handed to `validate()`
 */
export interface ValidatorContext {
  /** Fires on timeout or caller cancellation; pass it to every request */
  signal: AbortSignal;
  /** Budget for the whole call, in milliseconds */
  timeoutMs: number;
  fetch: FetchFn;
  now: () => Date;
}

/** A validator's answer before the runner stamps its name on it */
export type ValidatorVerdict = Omit<ValidationResult, 'validatorName'>;

export interface Validator {
  /** Globally unique; also the key of the validator's rate bucket */
  readonly name: string;
  readonly rateLimitQps: number;
  readonly requiresNetwork: boolean;
  /**
   * Whether the finding is the kind of credential this validator checks.
   * Omitted means every finding.
   */
  appliesTo?(finding: Finding): boolean;
  validate(finding: Finding, context: ValidatorContext): Promise<ValidatorVerdict>;
}
