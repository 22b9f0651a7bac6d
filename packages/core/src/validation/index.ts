/**
 * Validator Core
 *
 * Validator contract, registry, rate limiting and orchestration.
 */

export type { Validator, ValidatorContext, ValidatorVerdict, FetchFn } from './types.js';
export { TokenBucket, systemClock, type Clock } from './token-bucket.js';
export { ValidatorRegistry } from './registry.js';
export {
  runValidators,
  applicableResults,
  REASON_NOT_APPLICABLE,
  REASON_NETWORK_DISABLED,
  REASON_RATE_LIMITED,
  REASON_CANCELLED,
  type RunValidatorsOptions,
} from './run-validators.js';
export { createDefaultRegistry, type DefaultRegistryOptions } from './default-registry.js';
export * from './validators/index.js';
