/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, catalog)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A library logger matching the chosen verbosity
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { config } from '../config/index.js';
import { DataFormatError, DestinationNotFoundError, IndexStateError } from '../errors/index.js';
import { createConsoleLogger, type Logger, type LogLevel } from '../logging/index.js';
import { getCatalogPath } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override the catalog file */
  catalog?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Destination not found */
  NOT_FOUND: 3,
  /** Catalog file missing or malformed */
  DATA_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error thrown by a command handler to an exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof DestinationNotFoundError) return EXIT_CODES.NOT_FOUND;
  if (error instanceof DataFormatError || error instanceof IndexStateError) return EXIT_CODES.DATA_ERROR;
  if (error instanceof TypeError || error instanceof RangeError) return EXIT_CODES.USAGE_ERROR;
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access consistent
 * output, error handling and options.
 *
 * @example
 * ```typescript
 * .action(async (words: string[], options: RecommendCommandOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   try {
 *     await handleRecommend(words.join(' '), options, base);
 *   } catch (error) {
 *     base.fatal(error);
 *   }
 * });
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved catalog file path */
  readonly catalogPath: string;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   */
  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.catalogPath = options.catalog ?? getCatalogPath();

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error && this.options.verbose) {
      console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
    }
    const code = errorOrCode instanceof Error ? exitCodeFor(errorOrCode) : (errorOrCode ?? EXIT_CODES.ERROR);
    process.exit(code);
  }

  /**
   * Report an error thrown by a command handler and exit with the code it
   * maps to.
   */
  fatal(error: unknown): never {
    if (error instanceof Error) {
      return this.error(error.message, error);
    }
    return this.error(String(error));
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print lines as-is. Result tables are the command's output, so quiet mode
   * does not hide them.
   */
  lines(lines: string[]): void {
    for (const line of lines) {
      console.log(line);
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }

  /**
   * Log level for library logging: debug when verbose, warn when quiet,
   * otherwise SPOTFINDER_LOG_LEVEL.
   */
  logLevel(): LogLevel {
    if (this.isVerbose()) return 'debug';
    if (this.isQuiet()) return 'warn';
    return config.logLevel;
  }

  /**
   * Logger for the indexer, ranker and recommender.
   */
  createLogger(scope?: string): Logger {
    return createConsoleLogger({ level: this.logLevel(), scope });
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Read the global options from a command without trusting their types.
 */
export function readGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  return {
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    color: opts.color !== false,
    catalog: typeof opts.catalog === 'string' ? opts.catalog : undefined,
  };
}

/**
 * Get the base command stored on the program by the preAction hook.
 * Falls back to one built from the command's own options (for testing).
 *
 * @param cmd - Commander command instance (any depth)
 */
export function getBaseCommand(cmd: Command): BaseCommand {
  const base: unknown = cmd.optsWithGlobals()['_baseCommand'];
  if (base instanceof BaseCommand) {
    return base;
  }
  return new BaseCommand(readGlobalOptions(cmd));
}
