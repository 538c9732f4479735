/**
 * Gateway Configuration
 *
 * Validates client settings and fills in defaults. Settings can also be
 * read from `TASK_SERVICE_*` environment variables, where durations are
 * given in seconds.
 */

import { z } from 'zod';
import { GatewayConfigError } from './errors.js';
import {
  GATEWAY_DEFAULT_CONFIG,
  type GatewayClientConfig,
  type ResolvedGatewayConfig,
} from './types.js';
import { normalizeBaseUrl } from './utils.js';

const positiveInt = z.number().int().positive();
const durationMs = z.number().int().min(0);

export const GatewayConfigSchema = z.object({
  serviceName: z.string().min(1).default(GATEWAY_DEFAULT_CONFIG.serviceName),
  baseUrl: z.string().url(),
  maxRetries: z.number().int().min(0).default(GATEWAY_DEFAULT_CONFIG.maxRetries),
  retryDelaysMs: z
    .array(durationMs)
    .min(1)
    .default(() => [...GATEWAY_DEFAULT_CONFIG.retryDelaysMs]),
  connectTimeoutMs: positiveInt.default(GATEWAY_DEFAULT_CONFIG.connectTimeoutMs),
  readTimeoutMs: positiveInt.default(GATEWAY_DEFAULT_CONFIG.readTimeoutMs),
  writeTimeoutMs: positiveInt.default(GATEWAY_DEFAULT_CONFIG.writeTimeoutMs),
  poolTimeoutMs: positiveInt.default(GATEWAY_DEFAULT_CONFIG.poolTimeoutMs),
  callDeadlineMs: positiveInt.default(GATEWAY_DEFAULT_CONFIG.callDeadlineMs),
  maxConnections: positiveInt.default(GATEWAY_DEFAULT_CONFIG.maxConnections),
  maxKeepAlive: z.number().int().min(0).default(GATEWAY_DEFAULT_CONFIG.maxKeepAlive),
  userAgent: z.string().min(1).default(GATEWAY_DEFAULT_CONFIG.userAgent),
  healthCheckPath: z.string().startsWith('/').default(GATEWAY_DEFAULT_CONFIG.healthCheckPath),
  healthCheckTtlMs: durationMs.default(GATEWAY_DEFAULT_CONFIG.healthCheckTtlMs),
});

/**
 * Apply defaults and validate.
 *
 * @throws GatewayConfigError listing every invalid setting
 */
export function resolveGatewayConfig(config: GatewayClientConfig): ResolvedGatewayConfig {
  const { logger: _logger, adapter, ...settings } = config;
  const result = GatewayConfigSchema.safeParse(settings);
  if (!result.success) {
    throw new GatewayConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return {
    ...result.data,
    baseUrl: normalizeBaseUrl(result.data.baseUrl),
    adapter,
  };
}

function readNumber(env: NodeJS.ProcessEnv, name: string, scale = 1): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // NaN is left for the schema to reject with the setting's name
  return Math.round(Number(raw) * scale);
}

function readDelays(env: NodeJS.ProcessEnv, name: string): number[] | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return raw.split(',').map((delay) => Math.round(Number(delay.trim()) * 1000));
}

/**
 * Build client settings from `TASK_SERVICE_*` variables.
 *
 * | Variable | Setting | Unit |
 * |---|---|---|
 * | `TASK_SERVICE_URL` | `baseUrl` | |
 * | `TASK_SERVICE_MAX_RETRIES` | `maxRetries` | |
 * | `TASK_SERVICE_RETRY_DELAYS` | `retryDelaysMs` | seconds, comma separated |
 * | `TASK_SERVICE_CONNECT_TIMEOUT` | `connectTimeoutMs` | seconds |
 * | `TASK_SERVICE_READ_TIMEOUT` | `readTimeoutMs` | seconds |
 * | `TASK_SERVICE_WRITE_TIMEOUT` | `writeTimeoutMs` | seconds |
 * | `TASK_SERVICE_POOL_TIMEOUT` | `poolTimeoutMs` | seconds |
 * | `TASK_SERVICE_CALL_DEADLINE` | `callDeadlineMs` | seconds |
 * | `TASK_SERVICE_MAX_CONNECTIONS` | `maxConnections` | |
 * | `TASK_SERVICE_MAX_KEEPALIVE_CONNECTIONS` | `maxKeepAlive` | |
 * | `TASK_SERVICE_HEALTH_CHECK_INTERVAL` | `healthCheckTtlMs` | seconds |
 *
 * @throws GatewayConfigError when `TASK_SERVICE_URL` is missing
 */
export function loadGatewayConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): GatewayClientConfig {
  const baseUrl = env['TASK_SERVICE_URL'];
  if (!baseUrl) {
    throw new GatewayConfigError(['TASK_SERVICE_URL is not set']);
  }

  const config: GatewayClientConfig = {
    baseUrl,
    maxRetries: readNumber(env, 'TASK_SERVICE_MAX_RETRIES'),
    retryDelaysMs: readDelays(env, 'TASK_SERVICE_RETRY_DELAYS'),
    connectTimeoutMs: readNumber(env, 'TASK_SERVICE_CONNECT_TIMEOUT', 1000),
    readTimeoutMs: readNumber(env, 'TASK_SERVICE_READ_TIMEOUT', 1000),
    writeTimeoutMs: readNumber(env, 'TASK_SERVICE_WRITE_TIMEOUT', 1000),
    poolTimeoutMs: readNumber(env, 'TASK_SERVICE_POOL_TIMEOUT', 1000),
    callDeadlineMs: readNumber(env, 'TASK_SERVICE_CALL_DEADLINE', 1000),
    maxConnections: readNumber(env, 'TASK_SERVICE_MAX_CONNECTIONS'),
    maxKeepAlive: readNumber(env, 'TASK_SERVICE_MAX_KEEPALIVE_CONNECTIONS'),
    healthCheckTtlMs: readNumber(env, 'TASK_SERVICE_HEALTH_CHECK_INTERVAL', 1000),
  };
  return config;
}
