/**
 * Logging
 *
 * Minimal logger interface for the indexer, ranker and recommender, so they
 * can log without depending on a specific logger. The CLI wires in the
 * console logger; tests and library callers default to the silent one.
 *
 * @module logging
 */

import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Minimal logger interface.
 */
export interface Logger {
  /** Log debug-level message (hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Numeric severity per level; a message prints when its severity is at or
 * above the logger's threshold.
 */
export const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ============================================================================
// Implementations
// ============================================================================

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Minimum level to print (default: info) */
  level?: LogLevel;
  /** Prefix every line, e.g. "[ranker]" */
  scope?: string;
}

/**
 * Create a logger writing to stdout/stderr with chalk-coloured prefixes.
 * Debug and info go to stdout; warn and error go to stderr.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug', scope: 'indexer' });
 * logger.debug('Indexed 12 destinations');
 * // [DEBUG] [indexer] Indexed 12 destinations
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_SEVERITY[options.level ?? 'info'];
  const scope = options.scope ? `[${options.scope}] ` : '';

  const enabled = (level: Exclude<LogLevel, 'silent'>): boolean =>
    LOG_LEVEL_SEVERITY[level] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled('debug')) {
        console.log(chalk.dim(`[DEBUG] ${scope}${message}`), ...args);
      }
    },
    info(message, ...args) {
      if (enabled('info')) {
        console.log(`${scope}${message}`, ...args);
      }
    },
    warn(message, ...args) {
      if (enabled('warn')) {
        console.warn(chalk.yellow(`Warning: ${scope}${message}`), ...args);
      }
    },
    error(message, ...args) {
      if (enabled('error')) {
        console.error(chalk.red(`Error: ${scope}${message}`), ...args);
      }
    },
  };
}
