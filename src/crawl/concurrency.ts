/**
 * Concurrency control for query iterations inside one zone.
 *
 * @module crawl/concurrency
 */

import { ConfigurationError } from '../errors/index.js';

export interface ConcurrencyStats {
  /** Number of currently running operations */
  running: number;
  /** Number of operations waiting in queue */
  queued: number;
  /** Maximum concurrent operations allowed */
  limit: number;
}

/**
 * ConcurrencyLimiter caps how many async operations run at once.
 *
 * Semaphore with a FIFO queue of waiting callers. With a limit of 1 the
 * crawl engine processes queries strictly in catalog order.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(4);
 * const counts = await limiter.map(queries, (query) => runQuery(zone, query));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running = 0;
  private queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent operations
   * @throws ConfigurationError if limit is not a positive integer
   */
  constructor(limit: number = 1) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /**
   * Wait for a free slot (FIFO).
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Hand the slot to the next waiter, or free it.
   *
   * @throws Error when called without a matching acquire()
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the waiter; running count is unchanged
      next();
      return;
    }
    this.running--;
  }

  /**
   * Run fn inside a slot, releasing it even if fn throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Run fn over every item within the limit. Results keep item order.
   * Rejects with the first failure once every started item has settled.
   */
  async map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const settled = await Promise.allSettled(
      items.map((item, index) => this.run(() => fn(item, index)))
    );

    const results: R[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }
    return results;
  }

  getStats(): ConcurrencyStats {
    return {
      running: this.running,
      queued: this.queue.length,
      limit: this.limit,
    };
  }
}
