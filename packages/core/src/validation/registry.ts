/**
 * Validator Registry
 *
 * Name-keyed, insertion-ordered set of validators plus the rate buckets that
 * outlive a single finding: one per validator and one shared global bucket.
 */

import { RegistryError } from '../utils/errors.js';
import { TokenBucket, systemClock, type Clock } from './token-bucket.js';
import type { Validator } from './types.js';

export class ValidatorRegistry {
  private readonly validators = new Map<string, Validator>();
  private readonly buckets = new Map<string, TokenBucket>();
  private globalBucket: TokenBucket | null = null;
  private readonly clock: Clock;

  constructor(options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Add a validator. Names must be unique.
   */
  register(validator: Validator): this {
    if (this.validators.has(validator.name)) {
      throw new RegistryError(`Validator "${validator.name}" is already registered`, {
        operation: 'register',
        validatorName: validator.name,
      });
    }
    if (!Number.isFinite(validator.rateLimitQps) || validator.rateLimitQps <= 0) {
      throw new RegistryError(
        `Validator "${validator.name}" has invalid rate limit ${validator.rateLimitQps}`,
        { operation: 'register', validatorName: validator.name }
      );
    }

    this.validators.set(validator.name, validator);
    this.buckets.set(validator.name, new TokenBucket(validator.rateLimitQps, undefined, this.clock));
    return this;
  }

  get(name: string): Validator | undefined {
    return this.validators.get(name);
  }

  has(name: string): boolean {
    return this.validators.has(name);
  }

  /**
   * Validators in registration order
   */
  list(): Validator[] {
    return [...this.validators.values()];
  }

  get size(): number {
    return this.validators.size;
  }

  /**
   * Rate bucket owned by a registered validator
   */
  bucketFor(name: string): TokenBucket {
    const bucket = this.buckets.get(name);
    if (!bucket) {
      throw new RegistryError(`Validator "${name}" is not registered`, {
        operation: 'bucketFor',
        validatorName: name,
      });
    }
    return bucket;
  }

  /**
   * Global bucket for the given rate, shared across findings.
   * Replaced only when the configured rate changes. A rate that admits no
   * calls at all (zero, negative, NaN) has no bucket.
   */
  globalBucketFor(qps: number): TokenBucket | null {
    if (!Number.isFinite(qps) || qps <= 0) {
      return null;
    }
    if (!this.globalBucket || this.globalBucket.qps !== qps) {
      this.globalBucket = new TokenBucket(qps, undefined, this.clock);
    }
    return this.globalBucket;
  }
}
