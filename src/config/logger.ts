import pino from 'pino';
import { getEnvironmentConfig } from './env';

export interface LogContext {
  symbol?: string;
  orderId?: string;
  brokerOrderId?: string;
  [key: string]: unknown;
}

let logger: pino.Logger | null = null;

export function createLogger(): pino.Logger {
  if (logger) {
    return logger;
  }

  const env = getEnvironmentConfig();

  const loggerConfig: pino.LoggerOptions = {
    level: env.LOG_LEVEL,
    base: {
      pid: process.pid,
      hostname: process.env['HOSTNAME'] || 'unknown',
      service: 'trade-bot',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  // Add pretty printing for development
  if (env.NODE_ENV === 'development') {
    loggerConfig.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  logger = pino(loggerConfig);
  return logger;
}

export function getLogger(): pino.Logger {
  if (!logger) {
    return createLogger();
  }
  return logger;
}

export function logStartup(symbols: readonly string[], pollingIntervalMs: number): void {
  getLogger().info(
    {
      event: 'engine_startup',
      symbols,
      pollingIntervalMs,
      nodeVersion: process.version,
      platform: process.platform,
    },
    'Trade bot starting up'
  );
}

export function logShutdown(reason?: string): void {
  getLogger().info(
    {
      event: 'engine_shutdown',
      reason,
    },
    'Trade bot shutting down'
  );
}

export function logError(error: Error, context?: LogContext): void {
  getLogger().error(
    {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    'Error occurred'
  );
}
