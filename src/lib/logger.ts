/**
 * Structured Logging for the inventory-segments service
 *
 * JSON lines with request correlation, compatible with CloudWatch Insights.
 * Repositories and the analytics service take a Powertools `Logger`; this
 * module covers the Lambda entry points.
 *
 * @module lib/logger
 */

const LOG_LEVELS = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

type LogLevelName = keyof typeof LOG_LEVELS;

function isLogLevelName(value: string): value is LogLevelName {
  return value in LOG_LEVELS;
}

function resolveLogLevel(): number {
  const configured = process.env.LOG_LEVEL?.toUpperCase() ?? 'INFO';
  return isLogLevelName(configured) ? LOG_LEVELS[configured] : LOG_LEVELS.INFO;
}

const persistentAttributes = {
  service: 'inventory-segments',
  environment: process.env.STAGE || 'dev',
  version: process.env.npm_package_version || '1.0.0',
};

export interface SimpleLogger {
  debug: (message: string, extra?: Record<string, unknown>) => void;
  info: (message: string, extra?: Record<string, unknown>) => void;
  warn: (message: string, extra?: Record<string, unknown>) => void;
  error: (message: string, extra?: Record<string, unknown>) => void;
}

function formatLog(level: LogLevelName, message: string, extra?: Record<string, unknown>): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...persistentAttributes,
    ...extra,
  });
}

function createLogger(keys: Record<string, unknown>): SimpleLogger {
  return {
    debug: (message, extra) => {
      if (resolveLogLevel() <= LOG_LEVELS.DEBUG) {
        console.debug(formatLog('DEBUG', message, { ...keys, ...extra }));
      }
    },
    info: (message, extra) => {
      if (resolveLogLevel() <= LOG_LEVELS.INFO) {
        console.info(formatLog('INFO', message, { ...keys, ...extra }));
      }
    },
    warn: (message, extra) => {
      if (resolveLogLevel() <= LOG_LEVELS.WARN) {
        console.warn(formatLog('WARN', message, { ...keys, ...extra }));
      }
    },
    error: (message, extra) => {
      if (resolveLogLevel() <= LOG_LEVELS.ERROR) {
        console.error(formatLog('ERROR', message, { ...keys, ...extra }));
      }
    },
  };
}

const rootLogger = createLogger({});

/**
 * Request context for structured logging
 */
export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Child logger carrying request-specific context.
 * Use this at the start of each Lambda handler.
 */
export function createRequestLogger(context: LogContext): SimpleLogger {
  return createLogger({ ...context });
}

/**
 * Log timing metrics for performance analysis
 */
export function logTiming(
  operation: string,
  durationMs: number,
  attributes?: Record<string, unknown>
): void {
  rootLogger.info(`Timing: ${operation}`, {
    data: {
      operation,
      durationMs,
      ...attributes,
    },
  });
}
