import { readFileSync } from 'node:fs';
import { createLogger } from '@rest-engine/logger';
import { z } from 'zod';
import { loadExecutorConfig, type ExecutorConfig } from '../config/executor-config.js';
import {
  axiosConnectionFactory,
  proxyFromUrl,
  type AxiosConnectionOptions,
} from '../connection/axios-connection.js';
import { hostKeyFor } from '../connection/connection.js';
import { ConnectionPool, type ConnectionHandle } from '../connection/connection-pool.js';
import type { RawResponse } from '../connection/types.js';
import {
  ConfigError,
  DecodeError,
  DeadlineExceededError,
  HttpStatusError,
  InvalidRequestError,
  NetworkFatalError,
  NetworkTransientError,
  PoolExhaustedError,
  RetriesExhaustedError,
  toError,
  type ErrorDetails,
  type ExecutorError,
} from '../errors.js';
import { ResponseNormalizer } from '../normalize/response-normalizer.js';
import { ExecutorMetrics, type MetricSnapshot } from '../observability/metrics.js';
import { describeExchange } from '../observability/request-debug.js';
import { RateLimiter } from '../rate-limit/rate-limiter.js';
import type { RatePermit } from '../rate-limit/types.js';
import { classifyNetworkError, classifyStatus } from '../retry/failure-classifier.js';
import { RetryPolicy } from '../retry/retry-policy.js';
import type { StopReason } from '../retry/types.js';
import { HTTP_METHODS, type EngineLogger, type FailureClassification, type Request, type Response } from '../types.js';
import { Deadline, MAX_TIMER_MS, abortable, sleep } from './deadline.js';
import type {
  AttemptFailure,
  AttemptResult,
  ExecutorState,
  RequestExecutorOptions,
  StateChangeListener,
} from './types.js';

const requestSchema = z.object({
  method: z.enum(HTTP_METHODS),
  url: z
    .string()
    .url('url must be an absolute URL')
    .refine((value) => URL.canParse(value) && /^https?:$/.test(new URL(value).protocol), 'url must use http or https'),
  headers: z.record(z.string().regex(/^[^\r\n]*$/, 'header values must not contain line breaks')).optional(),
  idempotent: z.boolean(),
  timeoutMs: z.number().int().positive().optional(),
  attemptTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
});

/** What the request has seen so far, carried into terminal errors. */
type Progress = {
  /** Passes through limiting and dispatch; bounded by `maxAttempts`. */
  rounds: number;
  /** Attempts that reached the remote over a pooled connection. */
  attempts: number;
  classification?: FailureClassification;
  response?: Response;
};

/** Transport settings for the default axios connections. */
function connectionOptionsFor(config: ExecutorConfig): AxiosConnectionOptions {
  let ca: Buffer | undefined;

  if (config.caFile !== undefined) {
    try {
      ca = readFileSync(config.caFile);
    } catch (error) {
      throw new ConfigError([`caFile: cannot read ${config.caFile}: ${toError(error).message}`]);
    }
  }

  return {
    idleTimeoutMs: config.connectionIdleTimeoutMs,
    ...(config.proxyUrl === undefined
      ? {}
      : {
          proxy: proxyFromUrl(config.proxyUrl, {
            username: config.proxyUsername,
            password: config.proxyPassword,
          }),
        }),
    tls: {
      rejectUnauthorized: config.verifyTls,
      ...(ca === undefined ? {} : { ca }),
    },
  };
}

function attemptTimeoutError(timeoutMs: number): Error {
  return Object.assign(new Error(`Attempt timed out after ${timeoutMs}ms`), { code: 'ETIMEDOUT' });
}

function describeFailure(failure: AttemptFailure): string {
  switch (failure.source) {
    case 'network':
      return toError(failure.error).message;
    case 'http':
      return `HTTP ${failure.response.status}`;
    case 'decode':
      return failure.error.message;
  }
}

/**
 * Runs logical requests to completion: rate limiting, pooled dispatch,
 * classification, bounded retry with backoff and response normalization,
 * all under one deadline per request.
 *
 * States: pending, limiting, dispatching, decoding, then succeeded, failed,
 * or retrying (which loops back to limiting). Every attempt that reaches
 * the remote costs one rate-limit token.
 */
export class RequestExecutor {
  readonly config: ExecutorConfig;
  private readonly limiter: RateLimiter;
  private readonly pool: ConnectionPool;
  private readonly policy: RetryPolicy;
  private readonly normalizer: ResponseNormalizer;
  private readonly counters: ExecutorMetrics;
  private readonly logger: EngineLogger;
  private readonly onStateChange: StateChangeListener | undefined;

  constructor(options: RequestExecutorOptions = {}) {
    this.config = loadExecutorConfig(options.config, options.env);
    this.logger = options.logger ?? createLogger('RequestExecutor');
    this.onStateChange = options.onStateChange;

    this.limiter = new RateLimiter({
      capacity: this.config.rateCapacity,
      refillPerSecond: this.config.rateRefillPerSecond,
    });

    this.pool = new ConnectionPool(
      options.connectionFactory ?? axiosConnectionFactory(connectionOptionsFor(this.config)),
      {
        maxConnectionsPerHost: this.config.maxConnectionsPerHost,
        acquireTimeoutMs: this.config.poolAcquireTimeoutMs,
      },
    );

    this.policy = new RetryPolicy(
      {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.baseDelayMs,
        maxDelayMs: this.config.maxDelayMs,
        retryNonIdempotentOnResponse: this.config.retryNonIdempotentOnResponse,
        retryNonIdempotentOnAmbiguous: this.config.retryNonIdempotentOnAmbiguous,
      },
      options.random,
    );

    this.normalizer = new ResponseNormalizer();
    this.counters = new ExecutorMetrics();
  }

  /**
   * Resolves with the normalized 2xx response or rejects with one of the
   * `ExecutorError` classes, carrying the attempt count, the last
   * classification and the last response.
   */
  async execute(request: Request): Promise<Response> {
    const progress: Progress = { rounds: 0, attempts: 0 };
    this.counters.increment('requests.total');
    this.transition('pending', 0, request);

    let submitted: Request;
    try {
      submitted = this.validate(request);
    } catch (error) {
      return this.fail(request, progress, toError(error));
    }

    const deadline = new Deadline(submitted.timeoutMs ?? this.config.defaultTimeoutMs, submitted.signal);

    try {
      for (;;) {
        this.transition('limiting', progress.attempts + 1, submitted);
        const permit = await this.guard(this.limiter.acquire(1, { signal: deadline.signal }), deadline, progress);

        progress.rounds += 1;
        const result = await this.guard(this.attempt(submitted, deadline, progress, permit), deadline, progress);

        if (result.outcome === 'success') {
          this.counters.increment('requests.succeeded');
          this.transition('succeeded', progress.attempts, submitted);
          this.dump(submitted, result.response);
          return result.response;
        }

        const { failure } = result;
        progress.classification = failure.classification;
        if (failure.source !== 'network') {
          progress.response = failure.response;
        }
        this.counters.recordFailure(failure.classification);

        const decision = this.policy.shouldRetry({
          attempt: progress.rounds,
          classification: failure.classification,
          elapsedMs: deadline.elapsed(),
          deadlineMs: deadline.budgetMs,
          idempotent: submitted.idempotent,
        });

        if (decision.action === 'stop') {
          throw this.terminalError(decision.reason, failure, progress, deadline);
        }

        this.counters.increment('retries.total');
        this.logger.warn(
          `Retrying ${submitted.method} ${submitted.url} after attempt ${progress.rounds} (${failure.classification.reason}: ${describeFailure(failure)}) in ${decision.delayMs}ms`,
        );
        this.transition('retrying', progress.attempts, submitted);
        await this.guard(sleep(decision.delayMs, deadline.signal), deadline, progress);
      }
    } catch (error) {
      return this.fail(submitted, progress, toError(error));
    } finally {
      deadline.dispose();
    }
  }

  /** Runs every request and settles each independently. */
  executeAll(requests: readonly Request[]): Promise<PromiseSettledResult<Response>[]> {
    return Promise.allSettled(requests.map((request) => this.execute(request)));
  }

  get metrics(): MetricSnapshot {
    const limiter = this.limiter.snapshot();
    const pool = this.pool.stats();

    this.counters.gauge('limiter.tokens', limiter.tokens);
    this.counters.gauge('limiter.waiting', limiter.waiting);
    this.counters.gauge('pool.active', pool.active);
    this.counters.gauge('pool.idle', pool.idle);
    this.counters.gauge('pool.waiting', pool.waiting);

    return this.counters.snapshot();
  }

  logMetrics(): void {
    this.counters.log(this.logger);
  }

  /** Closes pooled connections and rejects requests still waiting for a token. */
  close(): void {
    this.pool.close();
    this.limiter.clear();
  }

  /** Returns a frozen copy, so later changes by the caller do not reach retries. */
  private validate(request: Request): Request {
    const parsed = requestSchema.safeParse(request);

    if (!parsed.success) {
      throw new InvalidRequestError(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`),
      );
    }

    return Object.freeze({ ...request, headers: Object.freeze({ ...request.headers }) });
  }

  /**
   * One dispatch. The permit is refunded when no connection is obtained,
   * since the remote was never contacted.
   */
  private async attempt(
    request: Request,
    deadline: Deadline,
    progress: Progress,
    permit: RatePermit,
  ): Promise<AttemptResult> {
    const host = hostKeyFor(request.url);
    let handle: ConnectionHandle;

    this.transition('dispatching', progress.attempts + 1, request);

    try {
      handle = await this.pool.acquire(host, { signal: deadline.signal });
    } catch (error) {
      this.limiter.refund(permit);

      if (error instanceof PoolExhaustedError && !deadline.expired && !this.pool.isClosed) {
        return {
          outcome: 'failure',
          failure: {
            source: 'network',
            classification: { kind: 'transient', reason: 'pool-exhausted', safety: 'not-sent' },
            error,
          },
        };
      }
      throw error;
    }

    progress.attempts += 1;
    const attempt = progress.attempts;
    const startedAt = Date.now();
    let raw: RawResponse;

    try {
      raw = await this.send(handle, request, deadline);
    } catch (error) {
      handle.markBroken();

      if (deadline.expired) {
        throw error;
      }

      this.logger.debug(`${request.method} ${request.url} attempt ${attempt} failed: ${toError(error).message}`);
      return {
        outcome: 'failure',
        failure: { source: 'network', classification: classifyNetworkError(error), error },
      };
    } finally {
      this.pool.release(handle);
      this.counters.recordAttempt(Date.now() - startedAt);
    }

    this.logger.debug(`${request.method} ${request.url} attempt ${attempt} -> ${raw.status}`);
    this.transition('decoding', attempt, request);

    const result = this.normalizer.normalize(raw.status, raw.headers, raw.body, raw.headers['content-type']);
    const base = { status: raw.status, headers: raw.headers, attempts: attempt, elapsedMs: deadline.elapsed() };

    switch (result.outcome) {
      case 'success':
        return { outcome: 'success', response: { ...base, body: result.body } };
      case 'http-error': {
        const response: Response = { ...base, body: result.body };
        const classification = classifyStatus(raw.status, raw.headers) ?? {
          kind: 'fatal',
          reason: 'client-error',
          status: raw.status,
        };
        return { outcome: 'failure', failure: { source: 'http', classification, response } };
      }
      case 'decode-error': {
        const response: Response = {
          ...base,
          body: {
            kind: 'raw',
            bytes: raw.body,
            ...(raw.headers['content-type'] === undefined ? {} : { contentType: raw.headers['content-type'] }),
          },
        };
        return {
          outcome: 'failure',
          failure: {
            source: 'decode',
            classification: { kind: 'fatal', reason: 'decode-error', status: raw.status },
            response,
            error: result.error,
          },
        };
      }
    }
  }

  /** Sends on the handle, bounded by the attempt timeout and the deadline. */
  private async send(handle: ConnectionHandle, request: Request, deadline: Deadline): Promise<RawResponse> {
    const attemptLimit = request.attemptTimeoutMs ?? this.config.attemptTimeoutMs;
    // Without a limit tighter than the deadline, the deadline signal alone bounds the send
    const timeoutMs = attemptLimit !== undefined && attemptLimit < deadline.remaining() ? attemptLimit : undefined;
    const controller = new AbortController();
    const onDeadline = (): void => {
      controller.abort(deadline.signal.reason);
    };
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            controller.abort(attemptTimeoutError(timeoutMs));
          }, timeoutMs);

    deadline.signal.addEventListener('abort', onDeadline, { once: true });

    try {
      return await abortable(
        handle.connection.send({
          method: request.method,
          url: request.url,
          headers: {
            ...(request.body ? { 'content-type': request.body.contentType } : {}),
            ...request.headers,
          },
          body: request.body?.bytes,
          ...(timeoutMs === undefined ? {} : { timeoutMs }),
          signal: controller.signal,
        }),
        controller.signal,
      );
    } finally {
      clearTimeout(timer);
      deadline.signal.removeEventListener('abort', onDeadline);
    }
  }

  /** Maps any rejection at a suspension point to `DeadlineExceededError` once the deadline has fired. */
  private async guard<T>(work: Promise<T>, deadline: Deadline, progress: Progress): Promise<T> {
    try {
      return await work;
    } catch (error) {
      if (deadline.expired) {
        const reason = toError(deadline.signal.reason);
        throw new DeadlineExceededError(reason.message, this.details(progress, error));
      }
      throw error;
    }
  }

  private terminalError(
    reason: StopReason,
    failure: AttemptFailure,
    progress: Progress,
    deadline: Deadline,
  ): ExecutorError {
    const cause = failure.source === 'http' ? undefined : failure.error;
    const details = this.details(progress, cause);
    const summary = describeFailure(failure);

    switch (reason) {
      case 'fatal':
      case 'non-idempotent':
        return this.failureError(failure, summary, details);
      case 'exhausted':
        return new RetriesExhaustedError(`Gave up after ${progress.attempts} attempts: ${summary}`, details);
      case 'deadline':
        return new DeadlineExceededError(
          `Request deadline of ${deadline.budgetMs}ms leaves no room for another attempt: ${summary}`,
          details,
        );
    }
  }

  private failureError(failure: AttemptFailure, summary: string, details: ErrorDetails): ExecutorError {
    switch (failure.source) {
      case 'http':
        return new HttpStatusError(failure.response.status, summary, details);
      case 'decode':
        return new DecodeError(failure.error.kind, summary, details);
      case 'network':
        return failure.classification.kind === 'fatal'
          ? new NetworkFatalError(summary, details)
          : new NetworkTransientError(summary, details);
    }
  }

  private details(progress: Progress, cause: unknown): ErrorDetails {
    return {
      attempts: progress.attempts,
      classification: progress.classification,
      response: progress.response,
      cause,
    };
  }

  private fail(request: Request, progress: Progress, error: Error): never {
    this.counters.increment('requests.failed');
    this.transition('failed', progress.attempts, request);
    this.logger.error(`${request.method} ${request.url} failed after ${progress.attempts} attempts:`, error);

    if (progress.response) {
      this.dump(request, progress.response);
    }

    throw error;
  }

  private dump(request: Request, response: Response): void {
    if (this.config.debug) {
      this.logger.debug(describeExchange(request, response));
    }
  }

  private transition(state: ExecutorState, attempt: number, request: Request): void {
    this.onStateChange?.(state, attempt, request);
  }
}
