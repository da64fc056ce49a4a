/**
 * Structured Logger
 *
 * - Single-line JSON records with an ISO timestamp
 * - Level from LOG_LEVEL, silent while the test runner is active
 * - Queryable attributes (service, symbol, duration_ms, ...)
 */

import winston from 'winston';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console()
  ],
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false,
});

export interface LogAttributes {
  [key: string]: string | number | boolean | null | undefined | string[];
}

export const log = {
  /**
   * Debug level - cache hits/misses, detailed operation steps
   */
  debug(message: string, attributes?: LogAttributes): void {
    logger.debug(message, attributes);
  },

  info(message: string, attributes?: LogAttributes): void {
    logger.info(message, attributes);
  },

  /**
   * Warn level - provider fallbacks, upstream "no data" answers
   */
  warn(message: string, attributes?: LogAttributes): void {
    logger.warn(message, attributes);
  },

  error(message: string, attributes?: LogAttributes): void {
    logger.error(message, attributes);
  },

  http(method: string, path: string, statusCode: number, duration: number): void {
    logger.info('HTTP request', {
      method,
      path,
      statusCode,
      duration_ms: duration,
    });
  },

  batch(message: string, count: number, attributes?: LogAttributes): void {
    logger.info(message, {
      ...attributes,
      batch_count: count,
    });
  },

  /**
   * Log upstream provider call with timing
   */
  api(service: string, endpoint: string, duration: number, success: boolean, attributes?: LogAttributes): void {
    logger.info('API call', {
      service,
      endpoint,
      duration_ms: duration,
      success,
      ...attributes,
    });
  },

  cache(operation: 'hit' | 'miss' | 'set' | 'expire', key: string, attributes?: LogAttributes): void {
    logger.debug('Cache operation', {
      operation,
      key,
      ...attributes,
    });
  },
};

export default log;
