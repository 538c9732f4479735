/**
 * Retrying Transport
 *
 * Executes one upstream HTTP call over a pooled axios client:
 * - Bounded retries with a fixed backoff schedule
 * - Only transport failures are retried; any HTTP response, 5xx included,
 *   is returned as is, since repeating a write could apply it twice
 * - Per-attempt timeouts plus a whole-call deadline
 * - Connection slots bounded by `maxConnections`
 *
 * The transport knows nothing about route rewriting: it is handed a final
 * method, path, query and body.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { err, ok, type ConnectionFailedError, type Result, type TimeoutError } from '../errors.js';
import { MetricsTracker } from '../MetricsTracker.js';
import { isQueryOnlyMethod } from '../ParameterPlacer.js';
import type { GatewayLogger, HttpMethod, JsonObject } from '../types.js';
import { withQuery } from '../utils.js';
import { ConnectionPool, type ConnectionPoolStats } from './ConnectionPool.js';
import {
  backoffDelay,
  getErrorCode,
  getErrorDescription,
  isConnectionError,
  isRetryableTransportError,
  isTimeoutError,
  sleep,
} from './RetryHandler.js';

export interface TransportConfig {
  serviceName: string;
  baseUrl: string;
  maxRetries: number;
  retryDelaysMs: readonly number[];
  connectTimeoutMs: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  poolTimeoutMs: number;
  callDeadlineMs: number;
  maxConnections: number;
  maxKeepAlive: number;
  userAgent: string;
  adapter?: AxiosAdapter;
}

export interface TransportRequest {
  method: HttpMethod;
  /** Path relative to the base URL */
  path: string;
  query?: JsonObject;
  /** Dropped for GET and DELETE */
  body?: JsonObject;
  /** Single attempt only */
  skipRetry?: boolean;
  /** Leave the call out of the metrics, used by health probes @default true */
  recordMetrics?: boolean;
}

export interface TransportResponse {
  status: number;
  /** Raw response text */
  body: string;
  /** Attempts made, 1 when the first one succeeded */
  attempts: number;
  latencyMs: number;
}

export type TransportError = ConnectionFailedError | TimeoutError;

type AttemptOutcome =
  | { ok: true; response: TransportResponse }
  | {
      ok: false;
      error: TransportError;
      retryable: boolean;
      /** Round-trip time, null when the attempt never reached the network */
      latencyMs: number | null;
    };

export class RetryingTransport {
  private readonly http: AxiosInstance;
  private readonly pool: ConnectionPool;

  constructor(
    private readonly config: TransportConfig,
    private readonly logger: GatewayLogger,
    private readonly metrics: MetricsTracker = new MetricsTracker()
  ) {
    this.pool = new ConnectionPool({
      maxConnections: config.maxConnections,
      maxKeepAlive: config.maxKeepAlive,
      connectTimeoutMs: config.connectTimeoutMs,
      writeTimeoutMs: config.writeTimeoutMs,
    });

    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.readTimeoutMs,
      httpAgent: this.pool.httpAgent,
      httpsAgent: this.pool.httpsAgent,
      // Socket-phase timers; trailing slashes are explicit, so no redirects
      transport: this.pool.transport,
      maxRedirects: 0,
      responseType: 'text',
      // Keep the raw text, JSON parsing is the caller's business
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': config.userAgent,
      },
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  /**
   * Execute a call, retrying transport failures.
   *
   * Never throws: a failure after the last attempt comes back as a
   * `ConnectionFailed` or `Timeout` error with its attempt count.
   */
  async execute(request: TransportRequest): Promise<Result<TransportResponse, TransportError>> {
    const recordMetrics = request.recordMetrics ?? true;
    const maxAttempts = request.skipRetry ? 1 : this.config.maxRetries + 1;
    const callStart = Date.now();
    const deadline = callStart + this.config.callDeadlineMs;
    let lastError: TransportError | null = null;
    let attempts = 0;

    if (recordMetrics) {
      this.metrics.recordCallStart();
    }

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (attempt > 0 && recordMetrics) {
        this.metrics.recordRetry();
      }
      attempts = attempt + 1;

      const outcome = await this.attempt(request, attempts, deadline);
      const attemptLatency = outcome.ok ? outcome.response.latencyMs : outcome.latencyMs;
      if (recordMetrics && attemptLatency !== null) {
        this.metrics.recordAttempt(attemptLatency, outcome.ok);
      }
      if (outcome.ok) {
        if (recordMetrics) {
          this.metrics.recordSuccess(Date.now() - callStart);
        }
        return ok(outcome.response);
      }

      lastError = outcome.error;
      if (!outcome.retryable || attempt >= maxAttempts - 1) {
        break;
      }

      const delay = backoffDelay(attempt, this.config.retryDelaysMs);
      if (Date.now() + delay >= deadline) {
        lastError = this.timeout('deadline', attempts, request);
        this.logger.warn(
          {
            service: this.config.serviceName,
            method: request.method,
            path: request.path,
            attempt: attempts,
            deadlineMs: this.config.callDeadlineMs,
          },
          'Task service call deadline reached, abandoning retries'
        );
        break;
      }

      this.logger.warn(
        {
          service: this.config.serviceName,
          method: request.method,
          path: request.path,
          attempt: attempts,
          maxAttempts,
          delayMs: delay,
          error: lastError.message,
        },
        'Task service call failed, retrying...'
      );
      await sleep(delay);
    }

    const failure = lastError ?? this.connectionFailed('Task service call failed', attempts);
    if (recordMetrics) {
      this.metrics.recordFailure(failure.kind);
    }
    return err(failure);
  }

  getPoolStats(): ConnectionPoolStats {
    return this.pool.getStats();
  }

  getMetrics(): MetricsTracker {
    return this.metrics;
  }

  /**
   * Destroy pooled connections; later calls fail without touching the network
   */
  close(): void {
    this.pool.close();
  }

  private async attempt(
    request: TransportRequest,
    attempts: number,
    deadline: number
  ): Promise<AttemptOutcome> {
    if (this.pool.isClosed()) {
      return {
        ok: false,
        error: this.connectionFailed(`${this.config.serviceName} client is closed`, attempts),
        retryable: false,
        latencyMs: null,
      };
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return {
        ok: false,
        error: this.timeout('deadline', attempts, request),
        retryable: false,
        latencyMs: null,
      };
    }

    const acquired = await this.pool.acquire(Math.min(this.config.poolTimeoutMs, remaining));
    if (!acquired) {
      return {
        ok: false,
        error: this.timeout('pool', attempts, request),
        retryable: true,
        latencyMs: null,
      };
    }

    // Cap on the attempt as a whole; connect and write are also timed on the socket
    const attemptBudget = Math.min(
      this.config.connectTimeoutMs + this.config.writeTimeoutMs + this.config.readTimeoutMs,
      deadline - Date.now()
    );
    const startTime = Date.now();
    this.logger.debug(
      {
        service: this.config.serviceName,
        method: request.method,
        path: request.path,
        attempt: attempts,
      },
      'Calling task service'
    );

    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: withQuery(request.path, request.query ?? {}),
        data: isQueryOnlyMethod(request.method) ? undefined : (request.body ?? {}),
        signal: AbortSignal.timeout(Math.max(attemptBudget, 1)),
      });
      return {
        ok: true,
        response: {
          status: response.status,
          body: responseText(response.data),
          attempts,
          latencyMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      return {
        ok: false,
        error: this.classify(error, attempts),
        retryable: isRetryableTransportError(error),
        latencyMs: Date.now() - startTime,
      };
    } finally {
      this.pool.release();
    }
  }

  private classify(error: unknown, attempts: number): TransportError {
    const description = getErrorDescription(error);
    if (isTimeoutError(error)) {
      return {
        kind: 'Timeout',
        retryable: true,
        message: `${this.config.serviceName} did not respond in time: ${description}`,
        phase: 'attempt',
        attempts,
      };
    }
    const cause = getErrorCode(error);
    return {
      kind: 'ConnectionFailed',
      retryable: true,
      message: isConnectionError(error)
        ? `${this.config.serviceName} is unreachable: ${description}`
        : `${this.config.serviceName} request failed: ${description}`,
      ...(cause ? { cause } : {}),
      attempts,
    };
  }

  private timeout(
    phase: TimeoutError['phase'],
    attempts: number,
    request: TransportRequest
  ): TimeoutError {
    const reason =
      phase === 'pool'
        ? `no free connection within ${this.config.poolTimeoutMs}ms`
        : `call deadline of ${this.config.callDeadlineMs}ms exceeded`;
    return {
      kind: 'Timeout',
      retryable: true,
      message: `${this.config.serviceName} ${request.method} ${request.path}: ${reason}`,
      phase,
      attempts,
    };
  }

  private connectionFailed(message: string, attempts: number): ConnectionFailedError {
    return { kind: 'ConnectionFailed', retryable: true, message, attempts };
  }
}

function responseText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return JSON.stringify(data);
}
