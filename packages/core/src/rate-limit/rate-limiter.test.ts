import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RateLimiter } from './rate-limiter.js';
import { RateLimitTimeoutError } from '../errors.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('grants tokens immediately while the bucket has them', async () => {
    const limiter = new RateLimiter({ capacity: 3, refillPerSecond: 1 });

    const permit = await limiter.acquire();

    expect(permit.cost).toBe(1);
    expect(permit.waitedMs).toBe(0);
    expect(limiter.snapshot().tokens).toBe(2);
  });

  it('waits for the refill once the burst is spent', async () => {
    const limiter = new RateLimiter({ capacity: 2, refillPerSecond: 1 });
    await limiter.acquire();
    await limiter.acquire();

    let granted = false;
    const pending = limiter.acquire().then((permit) => {
      granted = true;
      return permit;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(granted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const permit = await pending;

    expect(granted).toBe(true);
    expect(permit.waitedMs).toBe(1000);
    expect(limiter.snapshot().tokens).toBe(0);
  });

  it('serves waiters in arrival order', async () => {
    const limiter = new RateLimiter({ capacity: 1, refillPerSecond: 2 });
    await limiter.acquire();

    const order: string[] = [];
    const first = limiter.acquire().then(() => order.push('first'));
    const second = limiter.acquire().then(() => order.push('second'));
    const third = limiter.acquire().then(() => order.push('third'));

    await vi.advanceTimersByTimeAsync(3000);
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('does not let a later arrival take tokens ahead of a queued waiter', async () => {
    const limiter = new RateLimiter({ capacity: 2, refillPerSecond: 1 });
    await limiter.acquire(2);

    const queued = limiter.acquire(2);
    await vi.advanceTimersByTimeAsync(1000);

    expect(limiter.snapshot().tokens).toBeCloseTo(1);
    expect(limiter.tryAcquire(1)).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    await expect(queued).resolves.toMatchObject({ cost: 2, waitedMs: 2000 });
  });

  it('fails with RateLimitTimeoutError on abort without consuming tokens', async () => {
    const limiter = new RateLimiter({ capacity: 1, refillPerSecond: 1 });
    await limiter.acquire();

    const controller = new AbortController();
    const pending = limiter.acquire(1, { signal: controller.signal });

    await vi.advanceTimersByTimeAsync(400);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RateLimitTimeoutError);
    expect(limiter.snapshot().waiting).toBe(0);

    await vi.advanceTimersByTimeAsync(600);
    expect(limiter.snapshot().tokens).toBeCloseTo(1);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const limiter = new RateLimiter({ capacity: 1, refillPerSecond: 1 });
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(1, { signal: controller.signal })).rejects.toBeInstanceOf(
      RateLimitTimeoutError,
    );
    expect(limiter.snapshot().tokens).toBe(1);
  });

  it('fails after timeoutMs when no token arrives in time', async () => {
    const limiter = new RateLimiter({ capacity: 1, refillPerSecond: 0.5 });
    await limiter.acquire();

    const pending = limiter.acquire(1, { timeoutMs: 300 });
    const assertion = expect(pending).rejects.toThrow(
      'Timed out after 300ms waiting for a rate-limit token',
    );

    await vi.advanceTimersByTimeAsync(300);
    await assertion;
  });

  it('lets a smaller waiter through when the head is abandoned', async () => {
    const limiter = new RateLimiter({ capacity: 3, refillPerSecond: 1 });
    await limiter.acquire(3);
    await vi.advanceTimersByTimeAsync(1000);

    const controller = new AbortController();
    const big = limiter.acquire(3, { signal: controller.signal });
    const small = limiter.acquire(1);

    controller.abort();

    await expect(big).rejects.toBeInstanceOf(RateLimitTimeoutError);
    await expect(small).resolves.toMatchObject({ cost: 1, waitedMs: 0 });
  });

  it('rejects costs outside 1..capacity', () => {
    const limiter = new RateLimiter({ capacity: 2, refillPerSecond: 1 });

    expect(() => limiter.acquire(3)).toThrow(RangeError);
    expect(() => limiter.acquire(0)).toThrow(RangeError);
    expect(() => limiter.tryAcquire(1.5)).toThrow(RangeError);
  });

  it('rejects invalid configuration', () => {
    expect(() => new RateLimiter({ capacity: 0, refillPerSecond: 1 })).toThrow(RangeError);
    expect(() => new RateLimiter({ capacity: 1, refillPerSecond: 0 })).toThrow(RangeError);
  });

  it('reset refills the bucket but keeps the window of recent grants', async () => {
    const limiter = new RateLimiter({ capacity: 1, refillPerSecond: 0.1 });
    await limiter.acquire();

    let granted = false;
    const pending = limiter.acquire().then((permit) => {
      granted = true;
      return permit;
    });
    limiter.reset();
    expect(limiter.snapshot().tokens).toBe(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(granted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toMatchObject({ cost: 1, waitedMs: 1000 });
    expect(limiter.tryAcquire()).toBe(false);
  });

  it('holds back refilled tokens until the burst leaves the 1-second window', async () => {
    const limiter = new RateLimiter({ capacity: 2, refillPerSecond: 4 });
    await limiter.acquire();
    await limiter.acquire();

    await vi.advanceTimersByTimeAsync(500);
    expect(limiter.snapshot().tokens).toBe(2);
    expect(limiter.tryAcquire()).toBe(false);

    await vi.advanceTimersByTimeAsync(500);
    expect(limiter.tryAcquire(2)).toBe(true);
  });

  it('refund returns tokens and frees the window for the next waiter', async () => {
    const limiter = new RateLimiter({ capacity: 1, refillPerSecond: 0.1 });
    const permit = await limiter.acquire();
    const next = limiter.acquire();

    limiter.refund(permit);

    await expect(next).resolves.toMatchObject({ cost: 1, waitedMs: 0 });
    expect(limiter.snapshot().tokens).toBe(0);
  });

  it('refunds a permit only once', async () => {
    const limiter = new RateLimiter({ capacity: 2, refillPerSecond: 0.1 });
    const first = await limiter.acquire();
    await limiter.acquire();

    limiter.refund(first);
    limiter.refund(first);

    expect(limiter.snapshot().tokens).toBe(1);
  });

  it('clear rejects every waiter', async () => {
    const limiter = new RateLimiter({ capacity: 1, refillPerSecond: 1 });
    await limiter.acquire();

    const first = limiter.acquire();
    const second = limiter.acquire();
    limiter.clear();

    await expect(first).rejects.toThrow('Rate limiter was cleared');
    await expect(second).rejects.toThrow('Rate limiter was cleared');
    expect(limiter.snapshot().waiting).toBe(0);
  });

  it('never overshoots the bucket under concurrent load', async () => {
    const capacity = 5;
    const refillPerSecond = 5;
    const limiter = new RateLimiter({ capacity, refillPerSecond });
    const start = Date.now();
    const grants: number[] = [];
    const levels: number[] = [];

    const acquirers = Array.from({ length: 40 }, () =>
      limiter.acquire().then((permit) => {
        grants.push(permit.grantedAt - start);
        levels.push(limiter.snapshot().tokens);
      }),
    );

    await vi.advanceTimersByTimeAsync(10_000);
    await Promise.all(acquirers);

    expect(grants).toHaveLength(40);

    for (const level of levels) {
      expect(level).toBeGreaterThanOrEqual(0);
      expect(level).toBeLessThanOrEqual(capacity);
    }

    for (const windowStart of grants) {
      const inWindow = grants.filter(
        (grantedAt) => grantedAt >= windowStart && grantedAt < windowStart + 1000,
      ).length;
      expect(inWindow).toBeLessThanOrEqual(capacity);
    }

    expect(grants.filter((grantedAt) => grantedAt < 1000)).toHaveLength(capacity);
    // Bursts of 5 at 0, 1000, ... 7000
    expect(grants[grants.length - 1]).toBe(7000);
  });
});
