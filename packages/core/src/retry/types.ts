import type { FailureClassification } from '../types.js';

type RetryPolicyConfig = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Retry non-idempotent requests after the server answered 5xx or 429. */
  retryNonIdempotentOnResponse: boolean;
  /** Retry non-idempotent requests after a timeout or reset mid-flight. */
  retryNonIdempotentOnAmbiguous: boolean;
};

type RetryContext = {
  /** Attempts already made, so 1 after the first attempt failed. */
  attempt: number;
  classification: FailureClassification;
  elapsedMs: number;
  deadlineMs: number;
  idempotent: boolean;
};

type StopReason = 'fatal' | 'exhausted' | 'deadline' | 'non-idempotent';

type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'stop'; reason: StopReason };

export type { RetryPolicyConfig, RetryContext, StopReason, RetryDecision };
