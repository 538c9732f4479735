/**
 * Task Service Route Table
 *
 * Maps each logical route of the client-facing contract to the route the
 * task service actually serves. The upstream answers paths without a
 * trailing slash with a 307 redirect, so every target carries its slash
 * explicitly.
 *
 * @packageDocumentation
 */

import type { HttpMethod } from './types.js';

/** `"<METHOD> <logical path template>"` */
export type RouteKey = `${HttpMethod} ${string}`;

/**
 * `'task'` payloads are reshaped by the response adapter, `'raw'` ones are
 * returned as the upstream sent them.
 */
export type PayloadKind = 'task' | 'raw';

export interface RouteTarget<TPath extends string = string> {
  method: HttpMethod;
  path: TPath;
  /** Duplicate `user_id` into the query string for body-carrying methods */
  userIdInQuery?: boolean;
  /** @default 'task' */
  payload?: PayloadKind;
}

/** Placeholder names of a path template, e.g. `'task_id' | 'date'` */
export type PathParamNames<T extends string> = T extends `${string}{${infer Name}}${infer Rest}`
  ? Name | PathParamNames<Rest>
  : never;

type LogicalPathOf<K> = K extends `${string} ${infer Path}` ? Path : never;

/**
 * Rejects, at compile time, any target referencing a placeholder its
 * logical route does not declare.
 */
export type CheckedRouteTable<T> = {
  [K in keyof T]: T[K] extends RouteTarget<infer P>
    ? [PathParamNames<P>] extends [PathParamNames<LogicalPathOf<K>>]
      ? T[K]
      : never
    : never;
};

export type RouteTable = Readonly<Record<RouteKey, Readonly<RouteTarget>>>;

export function defineRoutes<const T extends Record<RouteKey, RouteTarget>>(
  routes: T & CheckedRouteTable<T>
): Readonly<T> {
  return Object.freeze(routes);
}

export const TASK_SERVICE_ROUTES = defineRoutes({
  // Task CRUD
  'POST tasks': { method: 'POST', path: 'tasks/' },
  'POST tasks/': { method: 'POST', path: 'tasks/' },
  'GET tasks': { method: 'GET', path: 'tasks/' },
  'POST tasks/query': { method: 'GET', path: 'tasks/' },
  'GET tasks/tags': { method: 'GET', path: 'tasks/tags/', payload: 'raw' },
  'POST tasks/search': { method: 'POST', path: 'tasks/search/' },
  'GET tasks/{task_id}': { method: 'GET', path: 'tasks/{task_id}/' },
  'PUT tasks/{task_id}': { method: 'PUT', path: 'tasks/{task_id}/', userIdInQuery: true },
  'DELETE tasks/{task_id}': { method: 'DELETE', path: 'tasks/{task_id}/', payload: 'raw' },
  // The task service has no completion endpoint, completion is a status update
  'POST tasks/{task_id}/complete': {
    method: 'PUT',
    path: 'tasks/{task_id}/',
    userIdInQuery: true,
  },
  'GET tasks/{task_id}/tree': { method: 'GET', path: 'tasks/{task_id}/tree/' },

  // Top 3
  'POST tasks/top3/query': { method: 'GET', path: 'tasks/top3/', payload: 'raw' },
  'POST tasks/special/top3': { method: 'POST', path: 'tasks/top3/', payload: 'raw' },
  'GET tasks/special/top3/{date}': { method: 'GET', path: 'tasks/top3/{date}/', payload: 'raw' },

  // Focus and pomodoro
  'POST tasks/focus-status': {
    method: 'POST',
    path: 'focus/sessions/',
    userIdInQuery: true,
    payload: 'raw',
  },
  'GET tasks/pomodoro-count': { method: 'GET', path: 'pomodoros/count/', payload: 'raw' },
});
