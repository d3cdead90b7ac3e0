const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

type HttpMethod = (typeof HTTP_METHODS)[number];

type RequestBody = {
  bytes: Uint8Array | string;
  contentType: string;
};

type Request = {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: Readonly<RequestBody>;
  readonly idempotent: boolean;
  /** Deadline for the whole logical request, across every attempt. */
  readonly timeoutMs?: number;
  readonly attemptTimeoutMs?: number;
  readonly signal?: AbortSignal;
};

type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

type XmlNode = {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  text: string;
};

type FormEntry = [key: string, value: string];

type CanonicalBody =
  | { kind: 'json'; value: JsonValue }
  | { kind: 'xml'; root: XmlNode }
  | { kind: 'form'; entries: FormEntry[] }
  | { kind: 'text'; text: string; mediaType: string }
  | { kind: 'raw'; bytes: Uint8Array; contentType?: string };

type Response = {
  status: number;
  headers: Record<string, string>;
  body: CanonicalBody;
  attempts: number;
  elapsedMs: number;
};

type TransientReason =
  | 'timeout'
  | 'connection-reset'
  | 'connection-refused'
  | 'server-error'
  | 'rate-limited'
  | 'pool-exhausted';

/**
 * How much the server may have seen of a failed attempt.
 * `ambiguous` means the request could have been processed even though no
 * response arrived.
 */
type SendSafety = 'not-sent' | 'response-received' | 'ambiguous';

type FatalReason =
  | 'client-error'
  | 'protocol-error'
  | 'malformed-request'
  | 'decode-error';

type TransientFailure = {
  kind: 'transient';
  reason: TransientReason;
  safety: SendSafety;
  status?: number;
  retryAfterMs?: number;
};

type FatalFailure = {
  kind: 'fatal';
  reason: FatalReason;
  status?: number;
};

type FailureClassification = TransientFailure | FatalFailure;

type EngineLogMethod = (message: unknown, ...args: unknown[]) => void;

/** The slice of `@rest-engine/logger` the engine writes to. */
type EngineLogger = {
  debug: EngineLogMethod;
  info: EngineLogMethod;
  warn: EngineLogMethod;
  error: EngineLogMethod;
};

function jsonBody(value: unknown): RequestBody {
  return {
    bytes: JSON.stringify(value),
    contentType: 'application/json; charset=utf-8',
  };
}

export type {
  HttpMethod,
  RequestBody,
  Request,
  JsonValue,
  XmlNode,
  FormEntry,
  CanonicalBody,
  Response,
  TransientReason,
  SendSafety,
  FatalReason,
  TransientFailure,
  FatalFailure,
  FailureClassification,
  EngineLogger,
};

export { HTTP_METHODS, jsonBody };
