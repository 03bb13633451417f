// src/server/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

// Vitest sets NODE_ENV=test; scans there stay quiet unless LOG_LEVEL asks otherwise
const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';
const LOG_LEVEL = process.env.LOG_LEVEL || (isTest ? 'silent' : isProduction ? 'info' : 'debug');

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  ...(isProduction ? { timestamp: pino.stdTimeFunctions.isoTime } : {}),

  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'localhost',
    service: 'haiku-finder',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

// fd 2, so the CLI can pipe its haiku report from stdout
export const logger = pino(baseConfig, pino.destination({ dest: 2, sync: true }));

/** Child logger tagged with the component name. */
export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const estimatorLogger = createLogger('estimator');
export const scannerLogger = createLogger('scanner');
export const dictionaryLogger = createLogger('dictionary');
export const textLogger = createLogger('text');
export const httpLogger = createLogger('http');
export const startupLogger = createLogger('startup');

/** Info line with the elapsed time since `startTime`, e.g. a dictionary load or a whole scan. */
export const logPerformance = (
  logger: Logger,
  operation: string,
  startTime: number,
  metadata?: Record<string, unknown>
) => {
  const duration = Date.now() - startTime;
  logger.info({
    operation,
    duration,
    ...metadata,
  }, `${operation} completed in ${duration}ms`);
};

/**
 * Error line for a caught failure. `message` overrides the error's own text,
 * which the loaders use to tell a missing file from an unreadable one.
 */
export const logError = (
  logger: Logger,
  error: unknown,
  context?: Record<string, unknown>,
  message?: string
) => {
  if (error instanceof Error) {
    logger.error({
      err: error,
      ...context,
    }, message ?? error.message);
  } else {
    logger.error({
      error: String(error),
      ...context,
    }, message ?? 'Non-error value thrown');
  }
};

export type { Logger };
