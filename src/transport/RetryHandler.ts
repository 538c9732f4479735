/**
 * Retry Handler
 *
 * Retry policy for the task service transport:
 * - Backoff taken from a configured schedule, indexed by attempt
 * - No jitter, the task service is a single fixed instance
 * - Only transport-level failures (no HTTP response) are retried
 *
 * @example
 * ```typescript
 * import { backoffDelay, isRetryableTransportError, sleep } from './RetryHandler.js';
 *
 * if (isRetryableTransportError(error)) {
 *   await sleep(backoffDelay(attempt, [1000, 2000, 4000]));
 *   // retry...
 * }
 * ```
 *
 * @packageDocumentation
 */

import { isAxiosError } from 'axios';

/**
 * Error codes meaning the connection could not be made or was lost before a
 * response arrived
 */
export const CONNECTION_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENETDOWN',
  'EPIPE',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
]);

/**
 * Error codes meaning a timeout fired before a response arrived.
 *
 * `ECONNABORTED` is what axios reports when its own timeout fires and
 * `ERR_CANCELED` is the per-attempt abort signal.
 */
export const TIMEOUT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ERR_CANCELED',
]);

/**
 * Low-level error code of a failed request, looking through axios wrappers
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isAxiosError(error)) {
    if (error.code) {
      return error.code;
    }
    return getErrorCode(error.cause);
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Whether a response was received before the request failed
 */
export function hasResponse(error: unknown): boolean {
  return isAxiosError(error) && error.response !== undefined;
}

/**
 * Check if the error indicates a connection problem
 */
export function isConnectionError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && CONNECTION_ERROR_CODES.has(code);
}

/**
 * Check if the error is a timeout
 */
export function isTimeoutError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && TIMEOUT_ERROR_CODES.has(code);
}

/**
 * Retry only failures where no HTTP response was obtained and the cause is
 * a known transient condition.
 */
export function isRetryableTransportError(error: unknown): boolean {
  if (hasResponse(error)) {
    return false;
  }
  return isConnectionError(error) || isTimeoutError(error);
}

/**
 * Delay before the retry following `attempt` (0-indexed).
 *
 * The last entry of the schedule is reused once attempts run past it.
 *
 * @example
 * ```typescript
 * backoffDelay(0, [1000, 2000, 4000]); // 1000
 * backoffDelay(5, [1000, 2000, 4000]); // 4000
 * ```
 */
export function backoffDelay(attempt: number, schedule: readonly number[]): number {
  if (schedule.length === 0) {
    return 0;
  }
  const index = Math.min(Math.max(attempt, 0), schedule.length - 1);
  return schedule[index] ?? 0;
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Human-readable error description for logging
 */
export function getErrorDescription(error: unknown): string {
  const code = getErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return code ? `${message} (code: ${code})` : message;
}
