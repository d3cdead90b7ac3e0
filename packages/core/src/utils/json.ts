import type { JsonValue } from '../types.js';

type JsonObject = { [key: string]: JsonValue };

type SortOrder = 'asc' | 'desc';

export function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Drops null fields and orders keys alphabetically; non-objects pass through. */
export function cleanupRecord(value: JsonValue): JsonValue {
  if (!isJsonObject(value)) {
    return value;
  }

  return Object.fromEntries(
    Object.entries(value)
      .filter(([, field]) => field !== null)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0)),
  );
}

/**
 * Orders JSON values: numbers numerically, strings by code unit, anything
 * else by its serialized form. `undefined` sorts last.
 */
export function compareJson(left: JsonValue | undefined, right: JsonValue | undefined): number {
  if (left === undefined || right === undefined) {
    return left === right ? 0 : left === undefined ? 1 : -1;
  }

  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }

  const a = typeof left === 'string' ? left : JSON.stringify(left);
  const b = typeof right === 'string' ? right : JSON.stringify(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Sorts by `field` of each object when given, otherwise by the values themselves. */
export function sortRecords(records: JsonValue[], field?: string, order: SortOrder = 'asc'): JsonValue[] {
  const direction = order === 'desc' ? -1 : 1;
  const pick = (record: JsonValue): JsonValue | undefined =>
    field === undefined ? record : isJsonObject(record) ? record[field] : undefined;

  return [...records].sort((left, right) => {
    const a = pick(left);
    const b = pick(right);

    // Records without the field stay at the end in either order
    if (a === undefined || b === undefined) {
      return compareJson(a, b);
    }

    return direction * compareJson(a, b);
  });
}

export type { JsonObject, SortOrder };
