/**
 * Validator Orchestration
 *
 * Runs every registered validator against one finding, in registry order,
 * and always returns one result per validator. Validators that do not apply
 * to the finding, skips, rate limits, errors, timeouts and cancellations all
 * come back as `indeterminate`.
 */

import type { Finding, PolicyConfig, ValidationResult, Result } from '@repo/shared-types';
import { ok, err } from '@repo/shared-types';
import { formatError } from '@repo/shared-utils';
import { CancelledError, TimeoutError, ValidatorError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { withTimeout, DEFAULT_VALIDATOR_TIMEOUT_MS } from '../utils/timeout.js';
import { rawSecretsOf, redactValidationResult } from '../redaction/findings.js';
import type { ValidatorRegistry } from './registry.js';
import type { FetchFn, Validator, ValidatorVerdict } from './types.js';

export const REASON_NOT_APPLICABLE = 'not applicable';
export const REASON_NETWORK_DISABLED = 'network disabled - validator skipped';
export const REASON_RATE_LIMITED = 'rate limit exceeded';
export const REASON_CANCELLED = 'validation cancelled';

export interface RunValidatorsOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  fetch?: FetchFn;
  /** Environment kill switch; wins over `allow_network` */
  disableNetwork?: boolean;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Results from validators that actually looked at the finding
 */
export function applicableResults(results: readonly ValidationResult[]): ValidationResult[] {
  return results.filter((result) => result.reason !== REASON_NOT_APPLICABLE);
}

type ValidatorsPolicySection = Pick<PolicyConfig, 'validators'>;

/**
 * Validate one finding with every registered validator
 */
export async function runValidators(
  finding: Finding,
  policy: ValidatorsPolicySection,
  registry: ValidatorRegistry,
  options: RunValidatorsOptions = {}
): Promise<ValidationResult[]> {
  const secrets = rawSecretsOf(finding);
  const logger = (options.logger ?? getLogger('validators')).withSecrets(secrets);
  const networkAllowed = policy.validators.allow_network && !options.disableNetwork;
  const results: ValidationResult[] = [];

  for (const validator of registry.list()) {
    const skipped = (reason: string): ValidationResult => ({
      state: 'indeterminate',
      reason,
      validatorName: validator.name,
    });

    if (validator.appliesTo && !validator.appliesTo(finding)) {
      results.push(skipped(REASON_NOT_APPLICABLE));
      continue;
    }

    if (validator.requiresNetwork && !networkAllowed) {
      results.push(skipped(REASON_NETWORK_DISABLED));
      continue;
    }

    const globalBucket = registry.globalBucketFor(policy.validators.global_qps);
    if (!globalBucket?.tryAcquire() || !registry.bucketFor(validator.name).tryAcquire()) {
      logger.debug('Validator rate limited', { validator: validator.name, path: finding.path });
      results.push(skipped(REASON_RATE_LIMITED));
      continue;
    }

    const outcome = await invokeValidator(validator, finding, options);
    if (outcome.ok) {
      results.push(redactValidationResult({ ...outcome.value, validatorName: validator.name }, secrets));
    } else {
      logger.warn('Validator failed', {
        validator: validator.name,
        path: finding.path,
        code: outcome.error.code,
        reason: outcome.error.message,
      });
      results.push(redactValidationResult(skipped(outcome.error.message), secrets));
    }
  }

  return results;
}

async function invokeValidator(
  validator: Validator,
  finding: Finding,
  options: RunValidatorsOptions
): Promise<Result<ValidatorVerdict, ValidatorError>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_VALIDATOR_TIMEOUT_MS;
  const fetchFn = options.fetch ?? globalThis.fetch;
  const now = options.now ?? (() => new Date());

  try {
    const verdict = await withTimeout(
      (signal) => validator.validate(finding, { signal, timeoutMs, fetch: fetchFn, now }),
      timeoutMs,
      'validation',
      options.signal
    );
    return ok(verdict);
  } catch (error) {
    return err(toValidatorError(validator.name, error));
  }
}

function toValidatorError(validatorName: string, error: unknown): ValidatorError {
  if (error instanceof TimeoutError) {
    return new ValidatorError(error.message, { validatorName, code: 'TIMEOUT', cause: error });
  }
  if (error instanceof CancelledError) {
    return new ValidatorError(REASON_CANCELLED, { validatorName, code: 'OPERATION_CANCELLED', cause: error });
  }
  return new ValidatorError(`validation error: ${formatError(error)}`, {
    validatorName,
    cause: error instanceof Error ? error : undefined,
  });
}
