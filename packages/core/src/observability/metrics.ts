import type { EngineLogger, FailureClassification } from '../types.js';

type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  attemptDurations: DurationSummary;
};

type CounterName =
  | 'requests.total'
  | 'requests.succeeded'
  | 'requests.failed'
  | 'attempts.total'
  | 'retries.total'
  | `failures.${string}`;

/**
 * In-memory counters for one executor. Attempt durations keep a running
 * summary only, so long-lived executors stay bounded.
 */
export class ExecutorMetrics {
  private readonly counters: Map<string, number>;
  private readonly gauges: Map<string, number>;
  private durationCount: number;
  private durationTotal: number;
  private durationMin: number;
  private durationMax: number;

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.durationCount = 0;
    this.durationTotal = 0;
    this.durationMin = Number.POSITIVE_INFINITY;
    this.durationMax = 0;
  }

  increment(counter: CounterName, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordAttempt(durationMs: number): void {
    this.increment('attempts.total');
    this.durationCount += 1;
    this.durationTotal += durationMs;
    this.durationMin = Math.min(this.durationMin, durationMs);
    this.durationMax = Math.max(this.durationMax, durationMs);
  }

  /** Counts a failed attempt under `failures.<reason>`. */
  recordFailure(classification: FailureClassification): void {
    this.increment(`failures.${classification.reason}`);
  }

  snapshot(): MetricSnapshot {
    const count = this.durationCount;

    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      attemptDurations: {
        count,
        min: count > 0 ? this.durationMin : 0,
        max: this.durationMax,
        avg: count > 0 ? this.durationTotal / count : 0,
        total: this.durationTotal,
      },
    };
  }

  log(logger: Pick<EngineLogger, 'info'>): void {
    logger.info('[Metrics]', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.durationCount = 0;
    this.durationTotal = 0;
    this.durationMin = Number.POSITIVE_INFINITY;
    this.durationMax = 0;
  }
}

export type { MetricSnapshot, DurationSummary, CounterName };
