/**
 * Logger Module
 * Structured logging using pino, written to stderr so report output on stdout
 * stays machine-readable.
 */

import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
}

const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Log level from LOG_LEVEL; warn by default, silent under test runs.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'warn';
}

/**
 * Create a logger instance for a specific component.
 *
 * @example
 * ```typescript
 * const logger = createLogger('ingest');
 * logger.info({ endpoints: 12 }, 'Specification indexed');
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;
  return pino({ name: component, level }, pino.destination({ dest: 2, sync: true }));
}

export type Logger = PinoLogger;
