/**
 * Task Gateway Client
 *
 * HTTP client that route handlers use to reach the task microservice:
 * - Canonical UUID validation before any I/O
 * - Logical-to-upstream route rewriting from a typed, frozen table
 * - Query/body placement and `user_id` injection
 * - Bounded retries over a pooled keep-alive connection
 * - Response reshaping into one `{ code, success, message, data }` envelope
 *
 * @example
 * ```typescript
 * import { GatewayClient, TaskServiceApi, createGatewayLogger, loadGatewayConfigFromEnv } from 'task-gateway-client';
 *
 * const gateway = new GatewayClient({
 *   ...loadGatewayConfigFromEnv(),
 *   logger: createGatewayLogger({ name: 'api' }),
 * });
 * const tasks = new TaskServiceApi(gateway);
 *
 * const response = await tasks.queryTasks(userId, { status: 'pending' });
 * ```
 */

// Main client
export { GatewayClient, normalizeEnvelope } from './GatewayClient.js';
export { TaskServiceApi, type TaskFields, type TaskListQuery } from './TaskServiceApi.js';

// Pipeline stages
export {
  validateIdentifier,
  validatePathIdentifiers,
  isIdentifierParam,
  EMPTY_IDENTIFIER,
} from './IdentifierValidator.js';
export {
  PathRewriter,
  fillTemplate,
  placeholdersOf,
  validateRouteTable,
  type RewriteResult,
} from './PathRewriter.js';
export {
  TASK_SERVICE_ROUTES,
  defineRoutes,
  type CheckedRouteTable,
  type PathParamNames,
  type PayloadKind,
  type RouteKey,
  type RouteTable,
  type RouteTarget,
} from './routes.js';
export {
  placeParameters,
  isQueryOnlyMethod,
  USER_ID_FIELD,
  type Placement,
  type PlacementInput,
} from './ParameterPlacer.js';
export {
  adaptEnvelope,
  adaptPayload,
  adaptTask,
  computePagination,
  normalizePriority,
  normalizeStatus,
  TASK_FIELD_DEFAULTS,
  type AdapterOptions,
  type TaskPriority,
  type TaskStatus,
} from './ResponseShapeAdapter.js';

// Transport
export {
  RetryingTransport,
  type TransportConfig,
  type TransportError,
  type TransportRequest,
  type TransportResponse,
} from './transport/RetryingTransport.js';
export {
  ConnectionPool,
  type ConnectionPoolOptions,
  type ConnectionPoolStats,
} from './transport/ConnectionPool.js';
export {
  backoffDelay,
  isConnectionError,
  isRetryableTransportError,
  isTimeoutError,
  sleep,
} from './transport/RetryHandler.js';

// Supporting modules
export { MetricsTracker } from './MetricsTracker.js';
export { HealthMonitor, type HealthMonitorOptions, type HealthSnapshot } from './HealthMonitor.js';
export {
  GatewayConfigSchema,
  loadGatewayConfigFromEnv,
  resolveGatewayConfig,
} from './config.js';
export { createGatewayLogger, createSilentLogger, type GatewayLoggerOptions } from './logger.js';

// Utilities
export { buildQueryString, normalizeBaseUrl, withQuery } from './utils.js';

// Errors
export {
  GatewayClientError,
  GatewayConfigError,
  InvalidIdentifierError,
  RouteConfigurationError,
  MAX_DIAGNOSTIC_BODY_LENGTH,
  err,
  errorCode,
  isSuccessCode,
  mapHttpStatus,
  ok,
  toCallResponse,
  truncateBody,
  type ConnectionFailedError,
  type GatewayError,
  type GatewayErrorKind,
  type InvalidIdentifier,
  type MalformedResponseError,
  type Result,
  type TimeoutError,
  type TimeoutPhase,
  type UpstreamHttpError,
} from './errors.js';

// Types
export {
  GATEWAY_DEFAULT_CONFIG,
  GATEWAY_DEFAULT_METRICS,
  HTTP_METHODS,
  HealthStatus,
  isHttpMethod,
  isJsonObject,
  type CallRequest,
  type CallResponse,
  type GatewayClientConfig,
  type GatewayClientMetrics,
  type GatewayLogger,
  type GatewayServiceHealth,
  type HttpMethod,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
  type LatencySummary,
  type PaginationInfo,
  type ResolvedGatewayConfig,
} from './types.js';
