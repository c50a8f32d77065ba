/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal)
 * - ISO timestamps for consistent time formatting
 * - JSON lines on stderr, so stdout stays free for row-count summaries
 */

import pino from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';

export type { Logger } from 'pino';

const LOG_LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Options for creating a logger
 */
export interface CreateLoggerOptions {
  /**
   * Minimum level to emit
   * Defaults to LOG_LEVEL or 'info'
   */
  level?: Level;

  /**
   * Where log lines are written
   * Defaults to a synchronous stderr destination
   */
  destination?: DestinationStream;
}

/**
 * Narrow an arbitrary string to a pino level
 */
export function isLogLevel(value: string): value is Level {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level
 * Priority: explicit level > LOG_LEVEL > 'info'
 */
export function resolveLogLevel(explicit?: string): Level {
  const candidate = (explicit ?? process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(candidate) ? candidate : 'info';
}

/**
 * Create a logger instance
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const destination = options.destination ?? pino.destination({ dest: 2, sync: true });

  return pino(
    {
      level: options.level ?? resolveLogLevel(),
      base: null,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}
