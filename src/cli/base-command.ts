/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * A BaseCommand is also the pipeline's Logger for the lifetime of a command.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
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
  /** Successful execution, no terminal failures */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Finished with at least one terminal failure */
  PARTIAL_FAILURE: 3,
  /** Aborted before completion: missing capability, unhealthy tool, corrupt store */
  FATAL: 4,
  /** An interrupted run must be resumed or discarded first */
  RESUME_REQUIRED: 5,
  /** Entity or failure queue entry not found */
  NOT_FOUND: 6,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * .action(async (options: StatusOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   base.info('Loading status...');
 * });
 * ```
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

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
   * Log an error message. Given an exit code, the process exits with it;
   * given an Error, its stack is shown in verbose mode.
   *
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): void {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
    } else if (isExitCode(errorOrCode)) {
      this.exitWith(errorOrCode);
    }
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
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
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
   * Print data as formatted JSON. Printed even in quiet mode.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

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

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

function isExitCode(value: unknown): value is ExitCode {
  return Object.values(EXIT_CODES).some((code) => code === value);
}

/**
 * Structural slice of a commander Command used to find the BaseCommand.
 */
export interface CommandLike {
  opts(): Record<string, unknown>;
  parent?: CommandLike | null;
}

/**
 * Get the base command stored on the program by the preAction hook.
 * Walks up from a subcommand to the root.
 *
 * @returns The stored BaseCommand, or a default one (for testing)
 */
export function getBaseCommand(cmd: CommandLike): BaseCommand {
  for (let current: CommandLike | null | undefined = cmd; current; current = current.parent) {
    const base = current.opts()['_baseCommand'];
    if (base instanceof BaseCommand) {
      return base;
    }
  }
  return new BaseCommand({});
}
