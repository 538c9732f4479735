/**
 * Gateway Client
 *
 * The one entry point route handlers use to reach the task service. A call
 * runs a fixed pipeline:
 *
 * 1. validate `userId` and identifier path parameters
 * 2. rewrite the logical method/path to the upstream one
 * 3. place fields in the query or body and inject `user_id`
 * 4. execute over the retrying transport
 * 5. reshape the response into the `{ code, success, message, data }` envelope
 *
 * Failures come back as envelopes with `success: false`. The only exception
 * that crosses the boundary is {@link InvalidIdentifierError}, raised before
 * any network I/O.
 *
 * @example
 * ```typescript
 * import { GatewayClient, createGatewayLogger } from 'task-gateway-client';
 *
 * const gateway = new GatewayClient({
 *   baseUrl: 'http://task-service.internal:20253',
 *   logger: createGatewayLogger(),
 * });
 *
 * const response = await gateway.call('POST', 'tasks/query', userId, { status: 'pending' });
 * if (response.success) {
 *   console.log(response.data);
 * }
 *
 * // on shutdown
 * gateway.close();
 * ```
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { resolveGatewayConfig } from './config.js';
import {
  err,
  isSuccessCode,
  ok,
  RouteConfigurationError,
  toCallResponse,
  truncateBody,
  type GatewayError,
  type MalformedResponseError,
  type Result,
  type UpstreamHttpError,
} from './errors.js';
import { HealthMonitor } from './HealthMonitor.js';
import { validateIdentifier, validatePathIdentifiers } from './IdentifierValidator.js';
import { createSilentLogger } from './logger.js';
import { MetricsTracker } from './MetricsTracker.js';
import { placeParameters } from './ParameterPlacer.js';
import { PathRewriter } from './PathRewriter.js';
import { adaptEnvelope } from './ResponseShapeAdapter.js';
import { TASK_SERVICE_ROUTES, type PayloadKind, type RouteTable } from './routes.js';
import type { ConnectionPoolStats } from './transport/ConnectionPool.js';
import { RetryingTransport, type TransportResponse } from './transport/RetryingTransport.js';
import {
  HealthStatus,
  isJsonObject,
  type CallRequest,
  type CallResponse,
  type GatewayClientConfig,
  type GatewayClientMetrics,
  type GatewayLogger,
  type GatewayServiceHealth,
  type HttpMethod,
  type JsonObject,
  type JsonValue,
  type ResolvedGatewayConfig,
} from './types.js';

const ENVELOPE_KEYS = ['code', 'success', 'message', 'data'] as const;

function parseJson(text: string): Result<JsonValue | undefined, SyntaxError> {
  if (text.trim() === '') {
    return ok(undefined);
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return ok(value);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return err(error);
    }
    throw error;
  }
}

function integerOrUndefined(value: JsonValue | undefined): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

/**
 * Turn a successful upstream body into the caller envelope.
 *
 * Objects carrying any envelope key are treated as envelopes; anything else
 * is the payload itself.
 */
export function normalizeEnvelope(value: JsonValue | undefined, httpStatus: number): CallResponse {
  if (isJsonObject(value) && ENVELOPE_KEYS.some((key) => key in value)) {
    const upstreamCode = integerOrUndefined(value['code']);
    const flag = typeof value['success'] === 'boolean' ? value['success'] : undefined;
    const succeeded = flag ?? (upstreamCode === undefined || isSuccessCode(upstreamCode));

    // An explicit success flag wins over a code that contradicts it
    let code: number;
    if (upstreamCode !== undefined && isSuccessCode(upstreamCode) === succeeded) {
      code = upstreamCode;
    } else {
      code = succeeded ? httpStatus : 400;
    }

    const message = value['message'];
    return {
      code,
      success: isSuccessCode(code),
      message: typeof message === 'string' ? message : succeeded ? 'success' : 'error',
      data: value['data'] ?? null,
    };
  }

  const success = isSuccessCode(httpStatus);
  return {
    code: httpStatus,
    success,
    message: success ? 'success' : `Upstream returned HTTP ${httpStatus}`,
    data: value ?? null,
  };
}

export class GatewayClient extends EventEmitter {
  protected readonly config: ResolvedGatewayConfig;
  protected readonly logger: GatewayLogger;
  private readonly rewriter: PathRewriter;
  private readonly transport: RetryingTransport;
  private readonly metricsTracker: MetricsTracker;
  private readonly health: HealthMonitor;
  private isClosed = false;

  constructor(clientConfig: GatewayClientConfig, routes: RouteTable = TASK_SERVICE_ROUTES) {
    super();
    this.config = resolveGatewayConfig(clientConfig);
    this.logger = clientConfig.logger ?? createSilentLogger();
    this.rewriter = new PathRewriter(routes);
    this.metricsTracker = new MetricsTracker();
    this.transport = new RetryingTransport(this.config, this.logger, this.metricsTracker);
    this.health = new HealthMonitor(
      this.transport,
      {
        serviceName: this.config.serviceName,
        healthCheckPath: this.config.healthCheckPath,
        ttlMs: this.config.healthCheckTtlMs,
      },
      this.logger,
      (status) => this.emit(status === HealthStatus.HEALTHY ? 'healthy' : 'unhealthy')
    );

    this.logger.info(
      {
        service: this.config.serviceName,
        baseUrl: this.config.baseUrl,
        maxRetries: this.config.maxRetries,
        maxConnections: this.config.maxConnections,
      },
      'Task service gateway client initialized'
    );
  }

  /**
   * Make one logical call and return the normalized envelope.
   *
   * @throws InvalidIdentifierError when `userId` or an identifier path
   * parameter is not a canonical UUID; nothing is sent in that case
   */
  call(request: CallRequest): Promise<CallResponse>;
  call(
    method: HttpMethod,
    logicalPath: string,
    userId: string,
    body?: JsonObject,
    query?: JsonObject,
    pathParams?: Record<string, string>
  ): Promise<CallResponse>;
  async call(
    methodOrRequest: HttpMethod | CallRequest,
    logicalPath?: string,
    userId?: string,
    body?: JsonObject,
    query?: JsonObject,
    pathParams?: Record<string, string>
  ): Promise<CallResponse> {
    const request: CallRequest =
      typeof methodOrRequest === 'string'
        ? {
            method: methodOrRequest,
            logicalPath: logicalPath ?? '',
            userId: userId ?? '',
            body,
            query,
            pathParams,
          }
        : methodOrRequest;

    try {
      const result = await this.callRaw(request);
      return result.ok ? result.value : toCallResponse(result.error);
    } catch (error) {
      if (error instanceof RouteConfigurationError) {
        this.logger.error(
          {
            service: this.config.serviceName,
            method: request.method,
            path: request.logicalPath,
            error: error.message,
          },
          'Task service route is misconfigured'
        );
        return { code: 500, success: false, message: error.message, data: null };
      }
      throw error;
    }
  }

  /**
   * Same pipeline as {@link call}, returning the typed error instead of an
   * error envelope.
   *
   * @throws InvalidIdentifierError before any I/O on a malformed identifier
   * @throws RouteConfigurationError when the route needs a path parameter
   * the request does not carry
   */
  async callRaw(request: CallRequest): Promise<Result<CallResponse, GatewayError>> {
    const userId = validateIdentifier(request.userId, 'user_id');
    const pathParams = request.pathParams ?? {};
    validatePathIdentifiers(pathParams);

    const route = this.rewriter.rewrite(request.method, request.logicalPath, pathParams);
    // Values captured from a concrete path are checked too
    validatePathIdentifiers(route.params);

    const placement = placeParameters({
      logicalMethod: request.method,
      upstreamMethod: route.method,
      userId,
      body: request.body,
      query: request.query,
      userIdInQuery: route.target?.userIdInQuery,
    });

    this.logger.debug(
      {
        service: this.config.serviceName,
        method: request.method,
        path: request.logicalPath,
        upstreamMethod: route.method,
        upstreamPath: route.path,
      },
      'Rewrote task service call'
    );

    const response = await this.transport.execute({
      method: route.method,
      path: route.path,
      query: placement.query,
      body: placement.body,
    });

    if (!response.ok) {
      this.logger.error(
        {
          service: this.config.serviceName,
          method: route.method,
          path: route.path,
          attempts: response.error.attempts,
          error: response.error.message,
        },
        'Task service call failed after retries'
      );
      return err(response.error);
    }

    const result = this.interpret(response.value, route.payload);
    if (!result.ok) {
      this.logger.warn(
        {
          service: this.config.serviceName,
          method: route.method,
          path: route.path,
          kind: result.error.kind,
          error: result.error.message,
        },
        'Task service returned an error'
      );
    }
    return result;
  }

  /**
   * Probe the task service; a healthy answer is cached for `healthCheckTtlMs`
   */
  checkHealth(): Promise<boolean> {
    return this.health.check();
  }

  getHealth(): GatewayServiceHealth {
    const snapshot = this.health.getSnapshot();
    return {
      ...snapshot,
      healthy: snapshot.status === HealthStatus.HEALTHY,
      metrics: this.metricsTracker.getMetrics(),
    };
  }

  getMetrics(): GatewayClientMetrics {
    return this.metricsTracker.getMetrics();
  }

  resetMetrics(): void {
    this.metricsTracker.reset();
  }

  getPoolStats(): ConnectionPoolStats {
    return this.transport.getPoolStats();
  }

  /**
   * Release pooled connections. Call this during graceful shutdown.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.transport.close();
    this.emit('closed');
    this.logger.info({ service: this.config.serviceName }, 'Task service gateway client closed');
  }

  private interpret(
    response: TransportResponse,
    payload: PayloadKind
  ): Result<CallResponse, GatewayError> {
    const parsed = parseJson(response.body);

    if (response.status >= 400) {
      return err(this.upstreamError(response, parsed.ok ? parsed.value : undefined));
    }

    if (!parsed.ok) {
      return err(this.malformed(response, `Task service returned invalid JSON: ${parsed.error.message}`));
    }

    const envelope = normalizeEnvelope(parsed.value, response.status);
    if (payload === 'raw' || !envelope.success) {
      return ok(envelope);
    }

    const adapted = adaptEnvelope(envelope, { logger: this.logger });
    if (!adapted.ok) {
      return err({ ...adapted.error, statusCode: response.status });
    }
    return ok(adapted.value);
  }

  private upstreamError(response: TransportResponse, body: JsonValue | undefined): UpstreamHttpError {
    const envelope = isJsonObject(body) ? body : undefined;
    const businessCode = integerOrUndefined(envelope?.['code']);
    const message = envelope?.['message'];
    return {
      kind: 'UpstreamHttpError',
      retryable: false,
      statusCode: response.status,
      ...(businessCode !== undefined ? { businessCode } : {}),
      message: typeof message === 'string' ? message : `Upstream returned HTTP ${response.status}`,
      data: envelope?.['data'] ?? null,
    };
  }

  private malformed(response: TransportResponse, message: string): MalformedResponseError {
    const body = truncateBody(response.body);
    return {
      kind: 'MalformedResponse',
      retryable: false,
      statusCode: response.status,
      message: `${message} (body: ${body})`,
      body,
    };
  }
}
