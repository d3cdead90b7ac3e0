import type { FormEntry, RequestBody } from '../types.js';

type FormInput = FormEntry[] | Record<string, string | string[]>;

function toEntries(input: FormInput): FormEntry[] {
  if (Array.isArray(input)) {
    return input;
  }

  const entries: FormEntry[] = [];
  for (const [key, value] of Object.entries(input)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      entries.push([key, item]);
    }
  }

  return entries;
}

export function encodeForm(input: FormInput): string {
  return new URLSearchParams(toEntries(input)).toString();
}

/** Keys may repeat; order is preserved. */
export function decodeForm(text: string): FormEntry[] {
  return Array.from(new URLSearchParams(text));
}

export function formBody(input: FormInput): RequestBody {
  return {
    bytes: encodeForm(input),
    contentType: 'application/x-www-form-urlencoded',
  };
}

export type { FormInput };
