import { isRestEngineError } from '../errors.js';
import { canonicalToJson } from '../normalize/canonical.js';
import type { HttpMethod, JsonValue, Response } from '../types.js';
import { cleanupRecord, isJsonObject, sortRecords, type SortOrder } from '../utils/json.js';

/** A record that did not produce a 2xx response, in plain JSON-friendly form. */
type FailedRecord = {
  method: HttpMethod;
  endpoint: string;
  code: string;
  message: string;
  attempts: number;
  status: number | null;
  body: JsonValue | null;
};

type Results = {
  success: JsonValue[];
  failure: FailedRecord[];
};

type ResultOptions = {
  /** Drop null fields and sort the keys of each success record. */
  cleanup?: boolean;
  sortField?: string;
  sortOrder?: SortOrder | Uppercase<SortOrder>;
};

/**
 * Pulls the records out of a successful response: the `responseKey` entry
 * when present, and array payloads spread into individual records.
 */
export function extractRecords(response: Response, responseKey?: string): JsonValue[] {
  const body = canonicalToJson(response.body);
  const data = responseKey !== undefined && isJsonObject(body) && responseKey in body ? body[responseKey] : body;

  return Array.isArray(data) ? data : [data];
}

export function toFailedRecord(method: HttpMethod, endpoint: string, error: unknown): FailedRecord {
  if (isRestEngineError(error)) {
    return {
      method,
      endpoint,
      code: error.code,
      message: error.message,
      attempts: error.attempts,
      status: error.response?.status ?? null,
      body: error.response ? canonicalToJson(error.response.body) : null,
    };
  }

  return {
    method,
    endpoint,
    code: 'unknown',
    message: error instanceof Error ? error.message : String(error),
    attempts: 0,
    status: null,
    body: null,
  };
}

export function finalizeResults(results: Results, options: ResultOptions = {}): Results {
  const order: SortOrder = options.sortOrder?.toLowerCase() === 'desc' ? 'desc' : 'asc';
  let success = options.cleanup ? results.success.map(cleanupRecord) : results.success;

  if (options.sortField !== undefined) {
    success = sortRecords(success, options.sortField, order);
  } else if (options.sortOrder !== undefined) {
    success = sortRecords(success, undefined, order);
  }

  return { success, failure: results.failure };
}

export type { FailedRecord, Results, ResultOptions };
