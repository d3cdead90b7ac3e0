import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import {
  classifyNetworkError,
  classifyStatus,
  errorCode,
  parseRetryAfter,
} from './failure-classifier.js';

function systemError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyNetworkError', () => {
  it('classifies axios timeouts as ambiguous transient', () => {
    const error = new AxiosError('timeout of 500ms exceeded', 'ETIMEDOUT');

    expect(classifyNetworkError(error)).toEqual({
      kind: 'transient',
      reason: 'timeout',
      safety: 'ambiguous',
    });
  });

  it('classifies ECONNRESET as ambiguous transient', () => {
    expect(classifyNetworkError(systemError('ECONNRESET'))).toEqual({
      kind: 'transient',
      reason: 'connection-reset',
      safety: 'ambiguous',
    });
  });

  it('classifies ECONNREFUSED as not sent', () => {
    expect(classifyNetworkError(systemError('ECONNREFUSED'))).toEqual({
      kind: 'transient',
      reason: 'connection-refused',
      safety: 'not-sent',
    });
  });

  it('classifies DNS failures as not sent', () => {
    expect(classifyNetworkError(systemError('ENOTFOUND')).kind).toBe('transient');
    expect(classifyNetworkError(systemError('EAI_AGAIN'))).toMatchObject({ safety: 'not-sent' });
  });

  it('classifies HTTP parser errors as fatal protocol errors', () => {
    expect(classifyNetworkError(systemError('HPE_INVALID_CONSTANT'))).toEqual({
      kind: 'fatal',
      reason: 'protocol-error',
    });
  });

  it('classifies invalid URLs as fatal malformed requests', () => {
    expect(classifyNetworkError(systemError('ERR_INVALID_URL'))).toEqual({
      kind: 'fatal',
      reason: 'malformed-request',
    });
  });

  it('reads the code from the cause when axios gives none', () => {
    const error = new AxiosError('request failed');
    error.cause = systemError('ECONNRESET');

    expect(errorCode(error)).toBe('ECONNRESET');
    expect(classifyNetworkError(error).kind).toBe('transient');
  });

  it('falls back to the message', () => {
    expect(classifyNetworkError(new Error('socket hang up'))).toMatchObject({
      reason: 'connection-reset',
    });
    expect(classifyNetworkError(new Error('Request timed out'))).toMatchObject({
      reason: 'timeout',
    });
  });

  it('treats unknown failures as fatal', () => {
    expect(classifyNetworkError(new Error('Unknown system failure'))).toEqual({
      kind: 'fatal',
      reason: 'protocol-error',
    });
    expect(classifyNetworkError('boom')).toEqual({ kind: 'fatal', reason: 'protocol-error' });
  });
});

describe('classifyStatus', () => {
  it('returns undefined for 2xx', () => {
    expect(classifyStatus(200)).toBeUndefined();
    expect(classifyStatus(204)).toBeUndefined();
  });

  it('classifies 429 as rate-limited with Retry-After', () => {
    expect(classifyStatus(429, { 'retry-after': '3' })).toEqual({
      kind: 'transient',
      reason: 'rate-limited',
      safety: 'response-received',
      status: 429,
      retryAfterMs: 3000,
    });
  });

  it('classifies 5xx as server errors', () => {
    expect(classifyStatus(503)).toEqual({
      kind: 'transient',
      reason: 'server-error',
      safety: 'response-received',
      status: 503,
    });
  });

  it('classifies other statuses as fatal client errors', () => {
    expect(classifyStatus(404)).toEqual({ kind: 'fatal', reason: 'client-error', status: 404 });
    expect(classifyStatus(400)).toEqual({ kind: 'fatal', reason: 'client-error', status: 400 });
    expect(classifyStatus(304)).toEqual({ kind: 'fatal', reason: 'client-error', status: 304 });
  });
});

describe('parseRetryAfter', () => {
  it('parses delay-seconds', () => {
    expect(parseRetryAfter('120')).toBe(120_000);
  });

  it('parses an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');

    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:05 GMT', now)).toBe(5000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
  });

  it('ignores missing or garbage values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
