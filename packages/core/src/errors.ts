import type { FailureClassification, Response } from './types.js';

type ErrorDetails = {
  attempts?: number;
  classification?: FailureClassification;
  /** Last normalized response from the remote service, when one arrived. */
  response?: Response;
  cause?: unknown;
};

type DecodeErrorKind = 'malformed-json' | 'malformed-xml';

abstract class RestEngineError extends Error {
  abstract readonly code: string;
  readonly attempts: number;
  readonly classification: FailureClassification | undefined;
  readonly response: Response | undefined;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.attempts = details.attempts ?? 0;
    this.classification = details.classification;
    this.response = details.response;
  }
}

class RateLimitTimeoutError extends RestEngineError {
  readonly code = 'rate-limit-timeout' as const;

  constructor(message = 'Timed out waiting for a rate-limit token', details?: ErrorDetails) {
    super(message, details);
    this.name = 'RateLimitTimeoutError';
  }
}

class PoolExhaustedError extends RestEngineError {
  readonly code = 'pool-exhausted' as const;
  readonly host: string;

  constructor(host: string, message?: string, details?: ErrorDetails) {
    super(message ?? `No connection to ${host} became available`, details);
    this.name = 'PoolExhaustedError';
    this.host = host;
  }
}

class NetworkTransientError extends RestEngineError {
  readonly code = 'network-transient' as const;

  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'NetworkTransientError';
  }
}

class NetworkFatalError extends RestEngineError {
  readonly code = 'network-fatal' as const;

  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'NetworkFatalError';
  }
}

class DecodeError extends RestEngineError {
  readonly code = 'decode-error' as const;
  readonly kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

class DeadlineExceededError extends RestEngineError {
  readonly code = 'deadline-exceeded' as const;

  constructor(message = 'Request deadline exceeded', details?: ErrorDetails) {
    super(message, details);
    this.name = 'DeadlineExceededError';
  }
}

class RetriesExhaustedError extends RestEngineError {
  readonly code = 'retries-exhausted' as const;

  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'RetriesExhaustedError';
  }
}

class HttpStatusError extends RestEngineError {
  readonly code = 'http-status' as const;
  readonly status: number;

  constructor(status: number, message?: string, details?: ErrorDetails) {
    super(message ?? `HTTP ${status}`, details);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

class InvalidRequestError extends RestEngineError {
  readonly code = 'invalid-request' as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid request: ${issues.join('; ')}`, {
      classification: { kind: 'fatal', reason: 'malformed-request' },
    });
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}

class ConfigError extends RestEngineError {
  readonly code = 'config' as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid executor configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

type ExecutorError =
  | RateLimitTimeoutError
  | PoolExhaustedError
  | NetworkTransientError
  | NetworkFatalError
  | DecodeError
  | DeadlineExceededError
  | RetriesExhaustedError
  | HttpStatusError
  | InvalidRequestError;

function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

function isRestEngineError(value: unknown): value is RestEngineError {
  return value instanceof RestEngineError;
}

export type { ErrorDetails, DecodeErrorKind, ExecutorError };

export {
  RestEngineError,
  RateLimitTimeoutError,
  PoolExhaustedError,
  NetworkTransientError,
  NetworkFatalError,
  DecodeError,
  DeadlineExceededError,
  RetriesExhaustedError,
  HttpStatusError,
  InvalidRequestError,
  ConfigError,
  toError,
  isRestEngineError,
};
