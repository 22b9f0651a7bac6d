/**
 * Token Bucket
 *
 * Non-blocking rate limiter: tokens refill continuously at `qps` per second
 * up to `capacity`, and an acquire either succeeds now or fails now.
 */

/** Monotonic milliseconds */
export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

export class TokenBucket {
  readonly qps: number;
  readonly capacity: number;
  private tokens: number;
  private lastRefill: number;
  private readonly clock: Clock;

  constructor(qps: number, capacity?: number, clock: Clock = systemClock) {
    if (!Number.isFinite(qps) || qps <= 0) {
      throw new RangeError(`Token bucket rate must be a positive number, got ${qps}`);
    }
    this.qps = qps;
    // A bucket that cannot hold one whole token would never grant one
    this.capacity = Math.max(1, capacity ?? qps);
    this.tokens = this.capacity;
    this.clock = clock;
    this.lastRefill = clock();
  }

  /**
   * Take `count` tokens if they are available right now
   */
  tryAcquire(count = 1): boolean {
    this.refill();
    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }
    return false;
  }

  /**
   * Tokens available at this instant
   */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.qps);
    this.lastRefill = now;
  }
}
