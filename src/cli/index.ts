#!/usr/bin/env node
/**
 * leadscout CLI
 *
 * Main entry point for the leadscout CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   leadscout --help
 *   leadscout analyze "Acme Corp, Roles: CEO, VP Sales"
 *   leadscout stop
 *   leadscout history
 *   leadscout resume 1
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { EXIT_CODES, createBaseCommand } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('leadscout')
    .description('Resumable lead research: company, structure, decision-makers, contacts, verdict')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.leadscout)')
    .option('--json', 'Stream pipeline events and print results as JSON');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const baseCommand = createBaseCommand(thisCommand.opts());

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (baseCommand.isVerbose() && baseCommand.options.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Register all subcommands
  registerCommands(program);

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    // Errors from commands are handled by their action wrapper
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.ERROR);
  });
}
