/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Mapping of error classes to exit codes
 * - Output utilities (log, warn, error)
 * - A Logger for library components
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../crawl/types.js';
import {
  isConfigurationError,
  isIntegrityError,
  isPersistenceError,
  isProviderError,
} from '../errors/index.js';
import { getDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export type GlobalOptions = {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
};

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
  /** Invalid usage, arguments or input files */
  USAGE_ERROR: 2,
  /** Place search provider error */
  API_ERROR: 4,
  /** Checkpoint, dataset or integrity failure */
  PERSISTENCE_ERROR: 5,
  /** Interrupted by the user */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for a thrown value.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isConfigurationError(error)) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (isProviderError(error)) {
    return EXIT_CODES.API_ERROR;
  }
  if (isPersistenceError(error) || isIntegrityError(error)) {
    return EXIT_CODES.PERSISTENCE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * async function estimateHandler(options: EstimateOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *   base.info(formatEstimate(await buildEstimate(options)));
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved data directory path */
  readonly dataDir: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = options.dataDir ?? getDataDir();

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
   * Log an error message.
   */
  error(message: string): void {
    console.error(chalk.red(`Error: ${message}`));
  }

  /**
   * Print a thrown error with its details and return its exit code.
   */
  reportError(error: unknown): ExitCode {
    if (error instanceof Error) {
      this.error(error.message);
      if (isConfigurationError(error)) {
        for (const detail of error.details) {
          console.error(chalk.dim(`  - ${detail}`));
        }
      }
      if (isIntegrityError(error) && error.duplicateIds.length > 0) {
        console.error(chalk.dim(`  duplicate ids: ${error.duplicateIds.slice(0, 10).join(', ')}`));
      }
      if (this.options.verbose && error.stack) {
        console.error(chalk.dim(error.stack));
      }
    } else {
      this.error(String(error));
    }
    return exitCodeFor(error);
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

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Logger for library components. Debug and info lines show in verbose
   * mode only; the spinner reports progress otherwise.
   */
  createLogger(): Logger {
    return {
      debug: (message) => this.debug(message),
      info: (message) => this.debug(message),
      warn: (message) => this.warn(message),
      error: (message) => this.error(message),
    };
  }

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
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance
 * @returns The stored BaseCommand, or a default one (for testing)
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
