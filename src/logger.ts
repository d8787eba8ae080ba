/**
 * Logger configuration using Winston
 */

import winston from 'winston';
import type { Logger, LogFormat } from './types.js';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

/**
 * Human-readable line: `2024-01-01 12:00:00 [info]: message {"meta":1}`
 */
const prettyFormat = printf(({ level, message, timestamp, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${metaStr}`;
});

function consoleFormat(format: LogFormat): winston.Logform.Format {
  if (format === 'json') {
    // one object per line for log collectors
    return combine(errors({ stack: true }), timestamp(), json());
  }
  return combine(
    errors({ stack: true }),
    colorize(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    prettyFormat
  );
}

/**
 * Create a Winston logger instance
 */
export function createLogger(level: string = 'info', format: LogFormat = 'pretty'): Logger {
  const logger = winston.createLogger({
    level,
    transports: [
      new winston.transports.Console({
        format: consoleFormat(format),
        // keep stdout free for command output (`caption`, `resolve`)
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });

  return {
    info: (message: string, meta?: Record<string, unknown>) => {
      logger.info(message, meta);
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      logger.warn(message, meta);
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      logger.error(message, meta);
    },
    debug: (message: string, meta?: Record<string, unknown>) => {
      logger.debug(message, meta);
    },
  };
}

/**
 * Logger that drops everything; used by tests and library callers
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return { info: noop, warn: noop, error: noop, debug: noop };
}
