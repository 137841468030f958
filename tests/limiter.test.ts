import { describe, expect, it } from 'vitest';

import { ConcurrencyLimiter } from '../src/core/task/limiter.js';

describe('ConcurrencyLimiter', () => {
  it('grants up to max slots and queues the rest in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];

    const first = await limiter.acquire();
    const second = limiter.acquire().then((release) => {
      order.push('second');
      return release;
    });
    const third = limiter.acquire().then((release) => {
      order.push('third');
      return release;
    });
    expect(limiter.running).toBe(1);
    expect(limiter.queued).toBe(2);

    first?.();
    (await second)?.();
    (await third)?.();

    expect(order).toEqual(['second', 'third']);
    expect(limiter.running).toBe(0);
  });

  it('ignores a second release of the same slot', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const release = await limiter.acquire();
    release?.();
    release?.();
    expect(limiter.running).toBe(0);
  });

  it('resolves null for a waiter that is aborted', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const held = await limiter.acquire();
    const controller = new AbortController();

    const waiting = limiter.acquire(controller.signal);
    controller.abort();

    expect(await waiting).toBeNull();
    expect(limiter.queued).toBe(0);
    held?.();
    expect(limiter.running).toBe(0);
  });

  it('rejects a non-positive max', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });
});
