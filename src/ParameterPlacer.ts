/**
 * Parameter Placer
 *
 * Decides whether caller fields travel in the query string or in the JSON
 * body once the upstream method is known, and injects `user_id`.
 *
 * - GET/DELETE: everything in the query, `user_id` in the query
 * - POST/PUT/PATCH: `user_id` in the body, and in the query as well when the
 *   route asks for it
 */

import type { HttpMethod, JsonObject } from './types.js';

export const USER_ID_FIELD = 'user_id';

export interface PlacementInput {
  /** Method the route handler used */
  logicalMethod: HttpMethod;
  /** Method after rewriting */
  upstreamMethod: HttpMethod;
  /** Validated user identifier */
  userId: string;
  body?: JsonObject;
  query?: JsonObject;
  /** Route flag: duplicate `user_id` into the query for body-carrying methods */
  userIdInQuery?: boolean;
}

export interface Placement {
  body: JsonObject;
  query: JsonObject;
}

/**
 * Methods whose request never carries a body upstream
 */
export function isQueryOnlyMethod(method: HttpMethod): boolean {
  return method === 'GET' || method === 'DELETE';
}

/**
 * Split caller fields between body and query for the upstream method.
 * Inputs are left untouched.
 */
export function placeParameters(input: PlacementInput): Placement {
  let body: JsonObject = { ...input.body };
  const query: JsonObject = { ...input.query };

  const convertedToQuery =
    !isQueryOnlyMethod(input.logicalMethod) && isQueryOnlyMethod(input.upstreamMethod);
  if (convertedToQuery) {
    for (const [key, value] of Object.entries(body)) {
      if (!(key in query)) {
        query[key] = value;
      }
    }
    body = {};
  }

  if (isQueryOnlyMethod(input.upstreamMethod)) {
    // The validated id always wins over whatever the caller put there
    delete query[USER_ID_FIELD];
    query[USER_ID_FIELD] = input.userId;
    return { body: {}, query };
  }

  body[USER_ID_FIELD] = input.userId;
  if (input.userIdInQuery) {
    delete query[USER_ID_FIELD];
    query[USER_ID_FIELD] = input.userId;
  }
  return { body, query };
}
