/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - analyze: Run the pipeline for a new input
 * - resume: Continue a paused or failed execution
 * - stop: Pause the running analysis
 * - history: List executions with resume ordinals
 * - enrich: Look up one person's contact details
 * - show: Print an execution's stage results and event history
 * - export: Write completed executions to a lead CSV
 * - forget: Clear an entity's long-term memory
 * - prune: Delete old completed executions
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerAnalyzeCommand } from './analyze.js';
import { registerEnrichCommand } from './enrich.js';
import { registerExportCommand } from './export.js';
import { registerForgetCommand } from './forget.js';
import { registerHistoryCommand } from './history.js';
import { registerPruneCommand } from './prune.js';
import { registerResumeCommand } from './resume.js';
import { registerShowCommand } from './show.js';
import { registerStopCommand } from './stop.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  // Running analyses
  registerAnalyzeCommand(program);
  registerResumeCommand(program);
  registerStopCommand(program);
  registerEnrichCommand(program);

  // Inspecting and housekeeping
  registerHistoryCommand(program);
  registerShowCommand(program);
  registerExportCommand(program);
  registerForgetCommand(program);
  registerPruneCommand(program);
}

export { handleAnalyze } from './analyze.js';
export { handleResume } from './resume.js';
export { handleStop } from './stop.js';
export { handleHistory, type HistoryOptions } from './history.js';
export { handleEnrich } from './enrich.js';
export { handleShow, type ShowOptions } from './show.js';
export { handleExport, defaultExportFileName, type ExportOptions } from './export.js';
export { handleForget } from './forget.js';
export { handlePrune, type PruneOptions } from './prune.js';
export { INTERRUPT_REASON, execute, parsePositiveInt, type CommandDeps } from './shared.js';
