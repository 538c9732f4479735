/**
 * Utility Functions
 *
 * URL and query helpers for the gateway transport.
 */

import type { JsonObject, JsonValue } from './types.js';

function queryValue(value: JsonValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value.toString();
  }
  return JSON.stringify(value);
}

/**
 * Serialize a query object, keeping key insertion order.
 *
 * Arrays repeat their key, nested objects are sent as JSON and `null`
 * values are left out.
 *
 * @example
 * ```typescript
 * buildQueryString({ status: 'pending', tags: ['a', 'b'], user_id: 'u1' });
 * // 'status=pending&tags=a&tags=b&user_id=u1'
 * ```
 */
export function buildQueryString(query: JsonObject): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        if (item !== null) {
          params.append(key, queryValue(item));
        }
      }
      continue;
    }
    params.append(key, queryValue(value));
  }
  return params.toString();
}

/**
 * Append a query string to a path when there is one
 */
export function withQuery(path: string, query: JsonObject): string {
  const queryString = buildQueryString(query);
  return queryString ? `${path}?${queryString}` : path;
}

/**
 * Strip the `/api/v1` suffix and trailing slashes some deployments put on
 * the task service URL; the service is mounted at the root.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '').replace(/\/api\/v1$/, '');
}
