/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir, json)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A Logger adapter for the engine
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { z } from 'zod';
import { ConfigError } from '../config/index.js';
import { LlmApiError } from '../llm/client.js';
import {
  AlreadyCompletedError,
  ExecutionNotFoundError,
  NoActiveExecutionError,
} from '../pipeline/errors.js';
import type { Logger } from '../pipeline/types.js';
import { ServiceError } from '../services/types.js';
import { getDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export const GlobalOptionsSchema = z.object({
  /** Enable verbose output for debugging */
  verbose: z.boolean().optional(),
  /** Suppress all non-essential output */
  quiet: z.boolean().optional(),
  /** Disable colored output; commander inverts --no-color to color: false */
  color: z.boolean().optional(),
  /** Override default data directory */
  dataDir: z.string().min(1).optional(),
  /** Stream pipeline events as JSON lines */
  json: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/**
 * Log levels for output control.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

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
  /** Resource not found (execution, running analysis, etc.) */
  NOT_FOUND: 3,
  /** API or network error */
  API_ERROR: 4,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that reached the command boundary.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof NoActiveExecutionError || error instanceof ExecutionNotFoundError) {
    return EXIT_CODES.NOT_FOUND;
  }
  if (error instanceof AlreadyCompletedError || error instanceof ConfigError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof LlmApiError || error instanceof ServiceError) {
    return EXIT_CODES.API_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access consistent
 * logging, error handling, and options.
 *
 * @example
 * ```typescript
 * .action(async (input: string[], _options, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   base.info(`Analyzing: ${input.join(' ')}`);
 * });
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
   * Log an informational message (hidden in quiet and JSON modes).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.isQuiet()) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible, on stderr).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param errorOrCode - Error object (exit code derived from it) or exit code
   */
  error(message: string, errorOrCode?: unknown): never {
    console.error(chalk.red(`Error: ${message}`));

    if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    }
    if (errorOrCode instanceof Error && this.options.verbose) {
      console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
    }
    process.exit(errorOrCode === undefined ? EXIT_CODES.ERROR : exitCodeFor(errorOrCode));
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.isQuiet()) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.isQuiet()) {
      console.log();
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.isQuiet()) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /**
   * Print data as formatted JSON. Shown even in quiet mode.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.isQuiet()) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  /**
   * Quiet mode; JSON mode implies it so stdout stays machine-readable.
   */
  isQuiet(): boolean {
    return this.options.quiet === true || this.options.json === true;
  }

  isJson(): boolean {
    return this.options.json === true;
  }

  /**
   * Adapt this command's output to the engine's Logger interface.
   * Info lines from the engine are detail, so they show in verbose mode.
   */
  toLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.debug(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => console.error(chalk.red(message), ...args),
    };
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

/**
 * Create a BaseCommand from raw commander option values.
 *
 * @throws ZodError if an option has the wrong type
 */
export function createBaseCommand(options: Record<string, unknown>): BaseCommand {
  return new BaseCommand(GlobalOptionsSchema.parse(options));
}

/**
 * What getBaseCommand needs from a commander Command.
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
  let current: CommandLike | null | undefined = cmd;
  while (current) {
    const base = current.opts()['_baseCommand'];
    if (base instanceof BaseCommand) {
      return base;
    }
    current = current.parent;
  }
  return new BaseCommand({});
}
