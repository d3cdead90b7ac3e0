import { canonicalToJson } from '../normalize/canonical.js';
import type { Request, Response } from '../types.js';
import { formatJson } from '../utils/json.js';

function decodeUrl(url: string): string {
  try {
    return decodeURIComponent(url.replace(/\+/g, ' '));
  } catch {
    // Malformed escapes: show it as sent
    return url;
  }
}

function renderBody(response: Response): string {
  const { body } = response;

  if (body.kind === 'text') {
    return body.text;
  }

  return formatJson(canonicalToJson(body), true);
}

/**
 * Multi-line dump of one request/response exchange for debug logging.
 *
 * @example
 * ```
 * HTTP GET 200 (2 attempts, 134ms)
 *   Request-URL:
 *     https://api.example.test/users?name=Ada Lovelace
 *   Header:
 *     content-type: application/json
 *   Body:
 * {"id": 1}
 * ```
 */
export function describeExchange(request: Request, response: Response): string {
  const headerLines = Object.entries(response.headers).map(([name, value]) => `    ${name}: ${value}`);

  return [
    `HTTP ${request.method} ${response.status} (${response.attempts} attempts, ${response.elapsedMs}ms)`,
    '  Request-URL:',
    `    ${decodeUrl(request.url)}`,
    '  Header:',
    ...(headerLines.length > 0 ? headerLines : ['    (none)']),
    '  Body:',
    renderBody(response),
  ].join('\n');
}
