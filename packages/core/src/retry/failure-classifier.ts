import axios from 'axios';
import type { FailureClassification } from '../types.js';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);

const RESET_CODES = new Set(['ECONNRESET', 'EPIPE', 'ERR_STREAM_PREMATURE_CLOSE', 'UND_ERR_SOCKET']);

// Failures raised before a single byte of the request reached the server
const NOT_SENT_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EADDRNOTAVAIL',
]);

const MALFORMED_REQUEST_CODES = new Set([
  'ERR_INVALID_URL',
  'ERR_BAD_OPTION',
  'ERR_BAD_OPTION_VALUE',
  'ERR_INVALID_ARG_TYPE',
  'ERR_INVALID_CHAR',
  'ERR_INVALID_HTTP_TOKEN',
  'ERR_UNESCAPED_CHARACTERS',
]);

const PROTOCOL_CODES = new Set(['ERR_FR_TOO_MANY_REDIRECTS', 'ERR_BAD_RESPONSE', 'ERR_HTTP2_PROTOCOL_ERROR']);

function errorCode(error: unknown): string | undefined {
  if (axios.isAxiosError(error)) {
    return error.code ?? errorCode(error.cause);
  }

  if (error instanceof Error) {
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }

    return error.cause === undefined ? undefined : errorCode(error.cause);
  }

  return undefined;
}

function classifyByMessage(message: string): FailureClassification {
  const lower = message.toLowerCase();

  if (lower.includes('timeout') || lower.includes('timed out')) {
    return { kind: 'transient', reason: 'timeout', safety: 'ambiguous' };
  }

  if (lower.includes('econnreset') || lower.includes('socket hang up')) {
    return { kind: 'transient', reason: 'connection-reset', safety: 'ambiguous' };
  }

  if (lower.includes('econnrefused') || lower.includes('enotfound')) {
    return { kind: 'transient', reason: 'connection-refused', safety: 'not-sent' };
  }

  return { kind: 'fatal', reason: 'protocol-error' };
}

/**
 * Maps a send/receive failure onto the network-error taxonomy.
 * Timeouts and resets may have reached the server, refusals and DNS
 * failures did not, parser and redirect errors are fatal.
 */
export function classifyNetworkError(error: unknown): FailureClassification {
  const code = errorCode(error);

  if (code !== undefined) {
    if (TIMEOUT_CODES.has(code)) {
      return { kind: 'transient', reason: 'timeout', safety: 'ambiguous' };
    }

    if (RESET_CODES.has(code)) {
      return { kind: 'transient', reason: 'connection-reset', safety: 'ambiguous' };
    }

    if (NOT_SENT_CODES.has(code)) {
      return { kind: 'transient', reason: 'connection-refused', safety: 'not-sent' };
    }

    if (MALFORMED_REQUEST_CODES.has(code)) {
      return { kind: 'fatal', reason: 'malformed-request' };
    }

    if (PROTOCOL_CODES.has(code) || code.startsWith('HPE_')) {
      return { kind: 'fatal', reason: 'protocol-error' };
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return classifyByMessage(message);
}

/**
 * Accepts either delay-seconds or an HTTP date; returns milliseconds from `now`.
 */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }

  return Math.max(0, date - now);
}

/**
 * 2xx is not a failure. 429 and 5xx are transient, everything else fatal.
 */
export function classifyStatus(
  status: number,
  headers: Record<string, string> = {},
  now = Date.now(),
): FailureClassification | undefined {
  if (status >= 200 && status < 300) {
    return undefined;
  }

  if (status === 429 || (status >= 500 && status < 600)) {
    const retryAfterMs = parseRetryAfter(headers['retry-after'], now);

    return {
      kind: 'transient',
      reason: status === 429 ? 'rate-limited' : 'server-error',
      safety: 'response-received',
      status,
      ...(retryAfterMs === undefined ? {} : { retryAfterMs }),
    };
  }

  return { kind: 'fatal', reason: 'client-error', status };
}

export { errorCode };
