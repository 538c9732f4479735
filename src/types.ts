/**
 * Gateway Client Types
 *
 * Type definitions shared by the rewriter, the transport, the response
 * adapter and the gateway façade.
 *
 * @packageDocumentation
 */

import type { AxiosAdapter } from 'axios';

/**
 * HTTP methods accepted on both sides of the gateway
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/** JSON primitive */
export type JsonPrimitive = string | number | boolean | null;

/** Any JSON value */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/** JSON object */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalized envelope returned to every caller of the gateway.
 *
 * `success` is always `true` exactly when `code` is in 200..299.
 */
export interface CallResponse<TData extends JsonValue = JsonValue> {
  code: number;
  success: boolean;
  message: string;
  data: TData | null;
}

/**
 * One logical call as a route handler expresses it
 */
export interface CallRequest {
  method: HttpMethod;
  logicalPath: string;
  userId: string;
  pathParams?: Record<string, string>;
  body?: JsonObject;
  query?: JsonObject;
}

/**
 * Derived pagination block attached to every task list
 */
export interface PaginationInfo {
  currentPage: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

/**
 * Logger interface for gateway clients (pino compatible)
 */
export interface GatewayLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
}

/**
 * Configuration for the gateway client
 */
export interface GatewayClientConfig {
  /** Service name for logging and metrics @default 'TaskService' */
  serviceName?: string;
  /** Base URL of the upstream task service */
  baseUrl: string;
  /** Retries after the first attempt for transport failures @default 3 */
  maxRetries?: number;
  /** Backoff before retry n, last value reused @default [1000, 2000, 4000] */
  retryDelaysMs?: number[];
  /** @default 5000 */
  connectTimeoutMs?: number;
  /** @default 30000 */
  readTimeoutMs?: number;
  /** @default 10000 */
  writeTimeoutMs?: number;
  /** Maximum wait for a free connection slot @default 60000 */
  poolTimeoutMs?: number;
  /** Budget for a whole call including backoff @default 60000 */
  callDeadlineMs?: number;
  /** Maximum concurrent upstream connections @default 100 */
  maxConnections?: number;
  /** Maximum idle keep-alive connections @default 20 */
  maxKeepAlive?: number;
  /** @default 'TaskGatewayClient/1.0.0' */
  userAgent?: string;
  /** @default '/health' */
  healthCheckPath?: string;
  /** How long a healthy probe result is trusted @default 60000 */
  healthCheckTtlMs?: number;
  /** Logger, a silent one is used when absent */
  logger?: GatewayLogger;
  /** Custom axios adapter, for in-process stand-ins of the upstream */
  adapter?: AxiosAdapter;
}

/**
 * Configuration after defaults and validation
 */
export type ResolvedGatewayConfig = Required<Omit<GatewayClientConfig, 'logger' | 'adapter'>> &
  Pick<GatewayClientConfig, 'adapter'>;

/**
 * Default configuration values
 */
export const GATEWAY_DEFAULT_CONFIG = {
  serviceName: 'TaskService',
  maxRetries: 3,
  retryDelaysMs: [1000, 2000, 4000],
  connectTimeoutMs: 5000,
  readTimeoutMs: 30000,
  writeTimeoutMs: 10000,
  poolTimeoutMs: 60000,
  callDeadlineMs: 60000,
  maxConnections: 100,
  maxKeepAlive: 20,
  userAgent: 'TaskGatewayClient/1.0.0',
  healthCheckPath: '/health',
  healthCheckTtlMs: 60000,
} as const;

/**
 * Running latency figures in milliseconds
 */
export interface LatencySummary {
  count: number;
  avgMs: number;
  maxMs: number;
  /** `Infinity` until the first sample */
  minMs: number;
}

/**
 * Call and attempt metrics for the gateway client.
 *
 * A call is one `execute` as the caller sees it, retries and backoff
 * included. An attempt is one HTTP round trip.
 */
export interface GatewayClientMetrics {
  totalCalls: number;
  /** Calls that ended with a completed HTTP round trip, any status */
  successfulCalls: number;
  /** Calls that ended with a transport failure after retries */
  failedCalls: number;
  /** Failed calls whose last error was a connection failure */
  connectionFailures: number;
  /** Failed calls whose last error was a timeout */
  timeouts: number;
  totalRetries: number;
  totalAttempts: number;
  failedAttempts: number;
  /** Percentage of calls that succeeded, 100 before the first call */
  successRate: number;
  /** Percentage of calls that failed, 0 before the first call */
  failureRate: number;
  /** Successful calls, end to end */
  callLatency: LatencySummary;
  /** Every attempt that reached the network, failed ones included */
  attemptLatency: LatencySummary;
  lastResetAt: Date;
}

export const EMPTY_LATENCY_SUMMARY: LatencySummary = {
  count: 0,
  avgMs: 0,
  maxMs: 0,
  minMs: Infinity,
};

export const GATEWAY_DEFAULT_METRICS: GatewayClientMetrics = {
  totalCalls: 0,
  successfulCalls: 0,
  failedCalls: 0,
  connectionFailures: 0,
  timeouts: 0,
  totalRetries: 0,
  totalAttempts: 0,
  failedAttempts: 0,
  successRate: 100,
  failureRate: 0,
  callLatency: EMPTY_LATENCY_SUMMARY,
  attemptLatency: EMPTY_LATENCY_SUMMARY,
  lastResetAt: new Date(),
};

/**
 * Upstream health as last observed
 */
export enum HealthStatus {
  UNKNOWN = 'UNKNOWN',
  HEALTHY = 'HEALTHY',
  UNHEALTHY = 'UNHEALTHY',
}

export interface GatewayServiceHealth {
  status: HealthStatus;
  healthy: boolean;
  /** Timestamp of the last probe, null before the first one */
  lastCheck: Date | null;
  /** Latency of the last probe in milliseconds */
  latencyMs: number;
  error?: string;
  metrics: GatewayClientMetrics;
}
