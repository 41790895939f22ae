// src/server/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

// Determine environment
const isDevelopment = process.env.NODE_ENV !== 'production';
const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Base logger configuration
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  ...(isDevelopment ? {} : {
    timestamp: pino.stdTimeFunctions.isoTime,
  }),

  // Base context that will be included in all logs
  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'localhost',
    service: 'memdev',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

// Create the base logger
export const logger = pino(baseConfig);

// Create child loggers for different components
export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

// Specific loggers for major components
export const deviceLogger = createLogger('device');
export const poolLogger = createLogger('memory-pool');
export const wsLogger = createLogger('websocket');
export const httpLogger = createLogger('http');
export const startupLogger = createLogger('startup');

// Per-device logger: every line carries the device's minor
export const createDeviceLogger = (minor: number): Logger => deviceLogger.child({ minor });

// Per-socket logger for session traffic
export const createSessionLogger = (session: string): Logger => wsLogger.child({ session });

// Helper to log performance metrics
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

// Helper for structured error logging
export const logError = (
  logger: Logger,
  error: Error | unknown,
  context?: Record<string, unknown>
) => {
  if (error instanceof Error) {
    logger.error({
      err: error,
      ...context,
    }, error.message);
  } else {
    logger.error({
      error: String(error),
      ...context,
    }, 'Unknown error occurred');
  }
};

// Export types
export type { Logger };
