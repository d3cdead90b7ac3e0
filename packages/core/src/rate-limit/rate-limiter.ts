import { RateLimitTimeoutError } from '../errors.js';
import type {
  AcquireOptions,
  RateLimiterConfig,
  RateLimiterSnapshot,
  RatePermit,
} from './types.js';

const WINDOW_MS = 1000;

type Grant = {
  at: number;
  cost: number;
};

type Waiter = {
  cost: number;
  enqueuedAt: number;
  resolve: (permit: RatePermit) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
};

/**
 * Token bucket with a first-come-first-served wait queue.
 *
 * Tokens are refilled lazily from the time elapsed since the last inspection.
 * Grants of the last second are also kept, so no 1-second window ever hands
 * out more than `capacity` tokens, refill included. The only timer is a single
 * wake-up for the head of the queue, armed while someone is waiting.
 */
export class RateLimiter {
  private readonly capacity: number;
  private readonly refillPerSecond: number;
  private tokens: number;
  private lastRefillTime: number;
  private readonly recent: Grant[];
  private readonly refunded: WeakSet<RatePermit>;
  private readonly waiters: Waiter[];
  private wakeTimer: ReturnType<typeof setTimeout> | undefined;

  constructor(config: RateLimiterConfig) {
    if (!Number.isInteger(config.capacity) || config.capacity < 1) {
      throw new RangeError(`Rate limiter capacity must be a positive integer, got ${config.capacity}`);
    }

    if (!(config.refillPerSecond > 0)) {
      throw new RangeError(`Rate limiter refill rate must be positive, got ${config.refillPerSecond}`);
    }

    this.capacity = config.capacity;
    this.refillPerSecond = config.refillPerSecond;
    this.tokens = config.capacity;
    this.lastRefillTime = Date.now();
    this.recent = [];
    this.refunded = new WeakSet();
    this.waiters = [];
    this.wakeTimer = undefined;
  }

  acquire(cost = 1, options: AcquireOptions = {}): Promise<RatePermit> {
    this.assertCost(cost);
    const { signal, timeoutMs } = options;

    if (signal?.aborted) {
      return Promise.reject(
        new RateLimitTimeoutError('Cancelled before a rate-limit token was available', {
          cause: signal.reason,
        }),
      );
    }

    this.refill();

    if (this.waiters.length === 0 && this.waitFor(cost) === 0) {
      return Promise.resolve(this.grant(cost, Date.now()));
    }

    return new Promise<RatePermit>((resolve, reject) => {
      let timeout: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        this.abandon(
          waiter,
          new RateLimitTimeoutError('Cancelled before a rate-limit token was available', {
            cause: signal?.reason,
          }),
        );
      };

      const waiter: Waiter = {
        cost,
        enqueuedAt: Date.now(),
        resolve,
        reject,
        cleanup: () => {
          if (timeout !== undefined) {
            clearTimeout(timeout);
          }
          signal?.removeEventListener('abort', onAbort);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs !== undefined) {
        timeout = setTimeout(() => {
          this.abandon(
            waiter,
            new RateLimitTimeoutError(`Timed out after ${timeoutMs}ms waiting for a rate-limit token`),
          );
        }, timeoutMs);
      }

      this.waiters.push(waiter);
      this.schedule();
    });
  }

  tryAcquire(cost = 1): boolean {
    this.assertCost(cost);
    this.refill();

    if (this.waiters.length === 0 && this.waitFor(cost) === 0) {
      this.grant(cost, Date.now());
      return true;
    }

    return false;
  }

  /**
   * Gives back the tokens of a permit whose request never reached the remote.
   * A permit is refunded at most once.
   */
  refund(permit: RatePermit): void {
    if (this.refunded.has(permit)) {
      return;
    }
    this.refunded.add(permit);

    const index = this.recent.findIndex((grant) => grant.at === permit.grantedAt && grant.cost === permit.cost);
    if (index !== -1) {
      this.recent.splice(index, 1);
    }

    this.refill();
    this.tokens = Math.min(this.capacity, this.tokens + permit.cost);
    this.schedule();
  }

  /** Refills the bucket. Grants of the last second still count against the window. */
  reset(): void {
    this.tokens = this.capacity;
    this.lastRefillTime = Date.now();
    this.schedule();
  }

  snapshot(): RateLimiterSnapshot {
    this.refill();

    return {
      tokens: this.tokens,
      capacity: this.capacity,
      refillPerSecond: this.refillPerSecond,
      waiting: this.waiters.length,
    };
  }

  /** Rejects every queued caller; tokens already granted are unaffected. */
  clear(): void {
    this.clearWakeTimer();

    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.reject(new RateLimitTimeoutError('Rate limiter was cleared'));
    }
  }

  private schedule(): void {
    this.refill();

    let head = this.waiters[0];
    let waitMs = head ? this.waitFor(head.cost) : 0;
    while (head && waitMs === 0) {
      this.waiters.shift();
      head.cleanup();
      head.resolve(this.grant(head.cost, head.enqueuedAt));
      head = this.waiters[0];
      waitMs = head ? this.waitFor(head.cost) : 0;
    }

    this.clearWakeTimer();

    if (head) {
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = undefined;
        this.schedule();
      }, waitMs);
    }
  }

  private abandon(waiter: Waiter, error: Error): void {
    const index = this.waiters.indexOf(waiter);
    if (index === -1) {
      return;
    }

    this.waiters.splice(index, 1);
    waiter.cleanup();
    waiter.reject(error);

    // A smaller request behind the abandoned head may fit now
    if (index === 0) {
      this.schedule();
    }
  }

  /**
   * Milliseconds until `cost` tokens are both in the bucket and within the
   * window allowance; 0 when they can be granted now.
   */
  private waitFor(cost: number): number {
    const now = Date.now();
    this.refill();
    this.pruneWindow(now);

    const deficit = cost - this.tokens;
    let waitMs = deficit > 0 ? Math.ceil((deficit * 1000) / this.refillPerSecond) : 0;

    let inWindow = this.recent.reduce((sum, grant) => sum + grant.cost, 0);
    for (const grant of this.recent) {
      if (inWindow + cost <= this.capacity) {
        break;
      }
      inWindow -= grant.cost;
      waitMs = Math.max(waitMs, grant.at + WINDOW_MS - now);
    }

    return waitMs;
  }

  private pruneWindow(now: number): void {
    while (this.recent.length > 0 && this.recent[0].at <= now - WINDOW_MS) {
      this.recent.shift();
    }
  }

  private grant(cost: number, enqueuedAt: number): RatePermit {
    const now = Date.now();
    this.tokens -= cost;
    this.recent.push({ at: now, cost });

    return { cost, grantedAt: now, waitedMs: now - enqueuedAt };
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefillTime;

    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.refillPerSecond) / 1000);
      this.lastRefillTime = now;
    }
  }

  private clearWakeTimer(): void {
    if (this.wakeTimer !== undefined) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = undefined;
    }
  }

  private assertCost(cost: number): void {
    if (!Number.isInteger(cost) || cost < 1 || cost > this.capacity) {
      throw new RangeError(`Rate limiter cost must be an integer between 1 and ${this.capacity}, got ${cost}`);
    }
  }
}
