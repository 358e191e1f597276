/**
 * @module logging/logger
 * @description Leveled console logger handed to analyzers through their context
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// ============================================================================
// Implementations
// ============================================================================

/**
 * Logger writing to the console. All output goes to stderr so JSON written
 * to stdout stays parseable.
 *
 * @example
 * const logger = createConsoleLogger('debug');
 * logger.warn(`Analyzer ${name} failed:`, error);
 */
export function createConsoleLogger(level: LogLevel = 'warn', prefix = '[query-doctor]'): Logger {
  const threshold = LEVEL_RANK[level];
  const enabled = (candidate: LogLevel): boolean => LEVEL_RANK[candidate] >= threshold;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.error(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.error(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = createConsoleLogger('silent');

/**
 * Parse a log level name, falling back to the given default
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  if (value === undefined) return fallback;
  const lower = value.toLowerCase();
  return isLogLevel(lower) ? lower : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}
