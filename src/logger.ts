/**
 * Default pino logger for gateway clients.
 *
 * Callers with their own pino (or pino-compatible) logger pass it through
 * `GatewayClientConfig.logger`; this factory is for everyone else.
 */

import pino from 'pino';

export interface GatewayLoggerOptions {
  /** @default 'task-gateway' */
  name?: string;
  /** @default process.env.LOG_LEVEL ?? 'info' */
  level?: string;
  /** Write somewhere other than stdout */
  destination?: pino.DestinationStream;
}

export function createGatewayLogger(options: GatewayLoggerOptions = {}): pino.Logger {
  const loggerOptions: pino.LoggerOptions = {
    name: options.name ?? 'task-gateway',
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
  };
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

/**
 * Logger used when a client is built without one
 */
export function createSilentLogger(): pino.Logger {
  return createGatewayLogger({ level: 'silent' });
}
