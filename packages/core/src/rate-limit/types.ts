type RateLimiterConfig = {
  /** Bucket size; also the largest burst a caller can take at once. */
  capacity: number;
  refillPerSecond: number;
};

type AcquireOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

type RatePermit = {
  cost: number;
  grantedAt: number;
  waitedMs: number;
};

type RateLimiterSnapshot = {
  tokens: number;
  capacity: number;
  refillPerSecond: number;
  waiting: number;
};

export type { RateLimiterConfig, AcquireOptions, RatePermit, RateLimiterSnapshot };
