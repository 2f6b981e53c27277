import { describe, it, expect } from '@jest/globals';
import { isConfigurationError } from '../errors/index.js';
import { ConcurrencyLimiter } from './concurrency.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConcurrencyLimiter', () => {
  it('rejects a non-positive or fractional limit', () => {
    for (const limit of [0, -1, 1.5]) {
      let caught: unknown;
      try {
        new ConcurrencyLimiter(limit);
      } catch (error) {
        caught = error;
      }
      expect(isConfigurationError(caught)).toBe(true);
    }
  });

  it('never runs more than the limit at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let active = 0;
    let peak = 0;

    await limiter.map([1, 2, 3, 4, 5], async () => {
      active++;
      peak = Math.max(peak, active);
      await Promise.resolve();
      await Promise.resolve();
      active--;
    });

    expect(peak).toBe(2);
    expect(limiter.getStats()).toEqual({ running: 0, queued: 0, limit: 2 });
  });

  it('runs strictly in order with a limit of 1', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const log: string[] = [];

    await limiter.map(['a', 'b', 'c'], async (item) => {
      log.push(`start ${item}`);
      await Promise.resolve();
      log.push(`end ${item}`);
    });

    expect(log).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('keeps result order regardless of completion order', async () => {
    const limiter = new ConcurrencyLimiter(3);
    const gates = [deferred(), deferred(), deferred()];

    const results = limiter.map([0, 1, 2], async (index) => {
      await gates[index].promise;
      return index * 10;
    });
    gates[2].resolve();
    gates[0].resolve();
    gates[1].resolve();

    expect(await results).toEqual([0, 10, 20]);
  });

  it('rejects with the first failure after every item settles', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const finished: number[] = [];

    await expect(
      limiter.map([1, 2, 3], async (item) => {
        if (item === 2) {
          throw new Error('boom');
        }
        finished.push(item);
      })
    ).rejects.toThrow('boom');

    expect(finished).toEqual([1, 3]);
    expect(limiter.getStats().running).toBe(0);
  });

  it('passes a released slot to the next waiter', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await limiter.acquire();

    const waiting = limiter.acquire();
    expect(limiter.getStats()).toEqual({ running: 1, queued: 1, limit: 1 });

    limiter.release();
    await waiting;
    expect(limiter.getStats()).toEqual({ running: 1, queued: 0, limit: 1 });

    limiter.release();
    expect(limiter.getStats().running).toBe(0);
  });

  it('throws on release without acquire', () => {
    expect(() => new ConcurrencyLimiter().release()).toThrow('without matching acquire');
  });
});
