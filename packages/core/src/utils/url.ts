type QueryValue = string | number | boolean | null | undefined;

type QueryParams = Record<string, QueryValue | readonly QueryValue[]>;

function isQueryList(value: QueryValue | readonly QueryValue[]): value is readonly QueryValue[] {
  return Array.isArray(value);
}

export const isValidUrl = (url: string): boolean => {
  return URL.canParse(url);
};

/**
 * Joins a base URL and an endpoint path with exactly one slash and appends
 * the query. Array values repeat the key; null and undefined are skipped.
 * An absolute endpoint URL replaces the base.
 */
export function joinUrl(baseUrl: string, endpoint: string, query: QueryParams = {}): string {
  const joined = isValidUrl(endpoint)
    ? endpoint
    : endpoint.length === 0
      ? baseUrl
      : `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;

  const url = new URL(joined);

  for (const [key, raw] of Object.entries(query)) {
    const values = isQueryList(raw) ? raw : [raw];

    for (const value of values) {
      if (value !== null && value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    }
  }

  return url.toString();
}

export type { QueryParams, QueryValue };
