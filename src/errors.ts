/**
 * Gateway Errors
 *
 * Expected failures are values of the closed {@link GatewayError} union and
 * travel inside a {@link Result}. Exceptions are kept for precondition and
 * programming errors: a malformed identifier, a broken route table, an
 * invalid configuration.
 *
 * @packageDocumentation
 */

import type { CallResponse, JsonValue } from './types.js';

export type TimeoutPhase = 'attempt' | 'pool' | 'deadline';

export interface ConnectionFailedError {
  kind: 'ConnectionFailed';
  retryable: true;
  message: string;
  /** Low-level error code (ECONNREFUSED, ENOTFOUND, ...) */
  cause?: string;
  attempts: number;
}

export interface TimeoutError {
  kind: 'Timeout';
  retryable: true;
  message: string;
  phase: TimeoutPhase;
  attempts: number;
}

export interface UpstreamHttpError {
  kind: 'UpstreamHttpError';
  retryable: false;
  message: string;
  statusCode: number;
  /** Business code carried in the upstream body, if any */
  businessCode?: number;
  data: JsonValue | null;
}

export interface MalformedResponseError {
  kind: 'MalformedResponse';
  retryable: false;
  message: string;
  statusCode?: number;
  /** Upstream body, truncated */
  body: string;
}

export interface InvalidIdentifier {
  kind: 'InvalidIdentifier';
  retryable: false;
  message: string;
  field: string;
  value: string;
}

export type GatewayError =
  | ConnectionFailedError
  | TimeoutError
  | UpstreamHttpError
  | MalformedResponseError
  | InvalidIdentifier;

export type GatewayErrorKind = GatewayError['kind'];

export type Result<T, E = GatewayError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Maximum number of upstream body characters kept for diagnostics */
export const MAX_DIAGNOSTIC_BODY_LENGTH = 200;

export function truncateBody(body: string, max = MAX_DIAGNOSTIC_BODY_LENGTH): string {
  return body.length > max ? `${body.slice(0, max)}...` : body;
}

/**
 * Base class for errors thrown across the gateway boundary
 */
export class GatewayClientError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown before any I/O when an identifier is not a canonical UUID
 */
export class InvalidIdentifierError extends GatewayClientError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(`Invalid UUID format for ${field}: ${value}`, 'INVALID_IDENTIFIER');
    this.field = field;
    this.value = value;
  }

  toGatewayError(): InvalidIdentifier {
    return {
      kind: 'InvalidIdentifier',
      retryable: false,
      message: this.message,
      field: this.field,
      value: this.value,
    };
  }
}

/**
 * The route table or a caller's path parameters do not fit together
 */
export class RouteConfigurationError extends GatewayClientError {
  constructor(message: string) {
    super(message, 'ROUTE_CONFIGURATION');
  }
}

export class GatewayConfigError extends GatewayClientError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid gateway configuration: ${issues.join('; ')}`, 'INVALID_CONFIG');
    this.issues = issues;
  }
}

const HTTP_STATUS_TO_CODE: Readonly<Record<number, number>> = {
  400: 400,
  401: 401,
  403: 403,
  404: 404,
  409: 409,
  422: 422,
};

/**
 * Map an upstream HTTP status to the caller-visible code.
 * A business code from the upstream body wins unless it claims success
 * for a failed round trip.
 */
export function mapHttpStatus(statusCode: number, businessCode?: number): number {
  if (businessCode !== undefined && !isSuccessCode(businessCode)) {
    return businessCode;
  }
  return HTTP_STATUS_TO_CODE[statusCode] ?? statusCode;
}

export function isSuccessCode(code: number): boolean {
  return code >= 200 && code <= 299;
}

/**
 * Caller-visible code for a gateway error
 */
export function errorCode(error: GatewayError): number {
  switch (error.kind) {
    case 'InvalidIdentifier':
      return 400;
    case 'ConnectionFailed':
      return 503;
    case 'Timeout':
      return 504;
    case 'UpstreamHttpError':
      return mapHttpStatus(error.statusCode, error.businessCode);
    case 'MalformedResponse':
      return 500;
  }
}

/**
 * Convert a gateway error to the envelope route handlers see
 */
export function toCallResponse(error: GatewayError): CallResponse {
  const code = errorCode(error);
  return {
    code,
    success: isSuccessCode(code),
    message: error.message,
    data: error.kind === 'UpstreamHttpError' ? error.data : null,
  };
}
