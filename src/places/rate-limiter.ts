/**
 * Rate Limiter
 *
 * Enforces a minimum spacing between calls to a shared external resource.
 * Callers are released in the order they called `acquire()`.
 *
 * @module places/rate-limiter
 */

import { ConfigurationError } from '../errors/index.js';

export interface RateLimiterOptions {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
  /** Sleep implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * @example
 * ```typescript
 * const limiter = new RateLimiter(10); // 10 calls per second
 * await limiter.acquire();
 * await provider.nearbySearch(request);
 * ```
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastReleasedAt: number | undefined;
  private tail: Promise<void> = Promise.resolve();

  /**
   * @param rate - Calls per second
   */
  constructor(rate: number, options: RateLimiterOptions = {}) {
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new ConfigurationError(`Rate must be a positive number, got ${rate}`);
    }
    this.intervalMs = 1000 / rate;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolve once at least 1/rate seconds have passed since the previous
   * acquire() resolved.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForTurn());
    this.tail = turn;
    return turn;
  }

  /**
   * Minimum spacing between calls in milliseconds
   */
  getIntervalMs(): number {
    return this.intervalMs;
  }

  private async waitForTurn(): Promise<void> {
    if (this.lastReleasedAt !== undefined) {
      const waitMs = this.lastReleasedAt + this.intervalMs - this.now();
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
    }
    this.lastReleasedAt = this.now();
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
