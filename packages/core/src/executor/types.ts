import type { ExecutorConfig } from '../config/executor-config.js';
import type { ConnectionFactory } from '../connection/connection.js';
import type { DecodeError } from '../errors.js';
import type { EngineLogger, FailureClassification, Request, Response } from '../types.js';

type ExecutorState =
  | 'pending'
  | 'limiting'
  | 'dispatching'
  | 'decoding'
  | 'retrying'
  | 'succeeded'
  | 'failed';

/**
 * `attempt` is the attempt the state belongs to: 0 while pending, and the
 * upcoming attempt number while limiting.
 */
type StateChangeListener = (state: ExecutorState, attempt: number, request: Request) => void;

type RequestExecutorOptions = {
  config?: Partial<ExecutorConfig>;
  /** Source of `REST_*` variables; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  connectionFactory?: ConnectionFactory;
  logger?: EngineLogger;
  /** Jitter source for backoff, in [0, 1). */
  random?: () => number;
  onStateChange?: StateChangeListener;
};

type AttemptFailure =
  | { source: 'network'; classification: FailureClassification; error: unknown }
  | { source: 'http'; classification: FailureClassification; response: Response }
  | { source: 'decode'; classification: FailureClassification; response: Response; error: DecodeError };

type AttemptResult =
  | { outcome: 'success'; response: Response }
  | { outcome: 'failure'; failure: AttemptFailure };

export type {
  ExecutorState,
  StateChangeListener,
  RequestExecutorOptions,
  AttemptFailure,
  AttemptResult,
};
