import type { TransientFailure } from '../types.js';
import type { RetryContext, RetryDecision, RetryPolicyConfig } from './types.js';

const DEFAULT_CONFIG: RetryPolicyConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  retryNonIdempotentOnResponse: true,
  retryNonIdempotentOnAmbiguous: false,
};

/**
 * Decides whether a failed attempt is retried and after how long.
 *
 * Only transient failures are retried. Backoff is exponential with jitter:
 * `min(base * 2^(attempt - 1), maxDelay) * random(0.5, 1.5)`.
 *
 * Retrying a request that is not idempotent is a policy choice, not a
 * guarantee: `not-sent` failures are always retried, answered failures
 * (5xx, 429) only with `retryNonIdempotentOnResponse`, and mid-flight
 * timeouts or resets only with `retryNonIdempotentOnAmbiguous`.
 */
export class RetryPolicy {
  private readonly config: RetryPolicyConfig;
  private readonly random: () => number;

  constructor(config?: Partial<RetryPolicyConfig>, random: () => number = Math.random) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.random = random;

    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  shouldRetry(context: RetryContext): RetryDecision {
    const { classification } = context;

    if (classification.kind === 'fatal') {
      return { action: 'stop', reason: 'fatal' };
    }

    if (context.attempt >= this.config.maxAttempts) {
      return { action: 'stop', reason: 'exhausted' };
    }

    if (!context.idempotent && !this.allowsNonIdempotent(classification)) {
      return { action: 'stop', reason: 'non-idempotent' };
    }

    const delayMs = this.delayFor(context.attempt, classification.retryAfterMs);

    if (context.elapsedMs + delayMs >= context.deadlineMs) {
      return { action: 'stop', reason: 'deadline' };
    }

    return { action: 'retry', delayMs };
  }

  delayFor(attempt: number, retryAfterMs?: number): number {
    const exponential = this.config.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    const capped = Math.min(exponential, this.config.maxDelayMs);
    const jittered = Math.round(capped * (0.5 + this.random()));

    if (retryAfterMs === undefined) {
      return jittered;
    }

    return Math.max(jittered, Math.min(retryAfterMs, this.config.maxDelayMs));
  }

  private allowsNonIdempotent(failure: TransientFailure): boolean {
    switch (failure.safety) {
      case 'not-sent':
        return true;
      case 'response-received':
        return this.config.retryNonIdempotentOnResponse;
      case 'ambiguous':
        return this.config.retryNonIdempotentOnAmbiguous;
    }
  }
}
