/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A pipeline Logger backed by the same output rules
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { config } from '../config/index.js';
import { ConfigurationError } from '../dedupe/errors.js';
import { FileNotFoundError } from '../storage/atomic.js';
import type { Logger } from '../pipeline/types.js';

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
  /** Override default data directory */
  dataDir?: string;
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
  /** Invalid usage, arguments or detection config */
  USAGE_ERROR: 2,
  /** Input file not found */
  NOT_FOUND: 3,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error raised by a command handler.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof FileNotFoundError) {
    return EXIT_CODES.NOT_FOUND;
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
 * async function detectHandler(input: string, options: DetectOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *   base.info(`Reading ${input}`);
 *   const result = detectDuplicates(listings, {}, { logger: base.logger });
 *   base.success(`${result.stats.clusterCount} properties`);
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

  /** Logger handed to the detection pipeline */
  readonly logger: Logger;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = options.dataDir ?? config.dataDir;

    if (!this.useColor) {
      chalk.level = 0;
    }

    // Stage warnings are also in the run result; commands print those once
    this.logger = {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.debug(message, ...args),
      warn: (message, ...args) => this.debug(message, ...args),
      error: (message, ...args) => console.error(chalk.red(message), ...args),
    };
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
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(exitCodeFor(errorOrCode));
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    }
    process.exit(EXIT_CODES.ERROR);
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
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /**
   * Print lines produced by a formatter (hidden in quiet mode).
   */
  lines(lines: readonly string[]): void {
    if (!this.options.quiet) {
      for (const line of lines) {
        console.log(line);
      }
    }
  }

  /**
   * Print data as formatted JSON (always visible).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
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
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    // Create a default one if not available (for testing)
    return new BaseCommand({});
  }
  return base;
}
