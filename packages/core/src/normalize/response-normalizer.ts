import { DecodeError } from '../errors.js';
import type { CanonicalBody, JsonValue } from '../types.js';
import { bodyFormatFor, parseContentType } from './content-type.js';
import { decodeForm } from './form.js';
import { parseXml } from './xml.js';

type NormalizeResult =
  | { outcome: 'success'; status: number; headers: Record<string, string>; body: CanonicalBody }
  | { outcome: 'http-error'; status: number; headers: Record<string, string>; body: CanonicalBody }
  | {
      outcome: 'decode-error';
      status: number;
      headers: Record<string, string>;
      error: DecodeError;
    };

function decodeText(bytes: Uint8Array, charset: string | undefined): string {
  try {
    return new TextDecoder(charset ?? 'utf-8').decode(bytes);
  } catch (error) {
    if (error instanceof RangeError) {
      // Unknown charset label
      return new TextDecoder('utf-8').decode(bytes);
    }
    throw error;
  }
}

function parseJson(text: string): JsonValue {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DecodeError('malformed-json', `Malformed JSON: ${message}`, { cause: error });
  }
}

/**
 * Turns a raw response body into a canonical body, dispatching on the
 * declared content type. Unknown or absent types pass through as raw bytes.
 */
export class ResponseNormalizer {
  decode(rawBody: Uint8Array, declaredContentType: string | undefined): CanonicalBody {
    const contentType = parseContentType(declaredContentType);
    const raw: CanonicalBody = {
      kind: 'raw',
      bytes: rawBody,
      ...(declaredContentType === undefined ? {} : { contentType: declaredContentType }),
    };

    if (rawBody.byteLength === 0) {
      return raw;
    }

    const format = bodyFormatFor(contentType?.mediaType);

    switch (format) {
      case 'json':
        return { kind: 'json', value: parseJson(decodeText(rawBody, contentType?.charset)) };
      case 'xml':
        return { kind: 'xml', root: parseXml(decodeText(rawBody, contentType?.charset)) };
      case 'form':
        return { kind: 'form', entries: decodeForm(decodeText(rawBody, contentType?.charset)) };
      case 'text':
        return {
          kind: 'text',
          text: decodeText(rawBody, contentType?.charset),
          mediaType: contentType?.mediaType ?? 'text/plain',
        };
      case 'raw':
        return raw;
    }
  }

  /**
   * Non-2xx statuses always yield `http-error` with the normalized body, so
   * API-specific error payloads stay inspectable. An error body that fails
   * to decode is kept raw.
   */
  normalize(
    status: number,
    headers: Record<string, string>,
    rawBody: Uint8Array,
    declaredContentType: string | undefined,
  ): NormalizeResult {
    const isSuccess = status >= 200 && status < 300;

    try {
      const body = this.decode(rawBody, declaredContentType);
      return { outcome: isSuccess ? 'success' : 'http-error', status, headers, body };
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }

      if (isSuccess) {
        return { outcome: 'decode-error', status, headers, error };
      }

      return {
        outcome: 'http-error',
        status,
        headers,
        body: {
          kind: 'raw',
          bytes: rawBody,
          ...(declaredContentType === undefined ? {} : { contentType: declaredContentType }),
        },
      };
    }
  }
}

export type { NormalizeResult };
