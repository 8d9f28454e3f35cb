/**
 * Show Command
 *
 * Prints one execution with every stage record and its data, followed by
 * its most recent lifecycle events.
 *
 * @module cli/commands/show
 */

import type { Command } from 'commander';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { openExecutionStore } from '../engine.js';
import {
  formatEventHistory,
  formatExecutionSummary,
  formatLeadReport,
  formatStageResults,
} from '../formatters/index.js';
import { execute, parsePositiveInt } from './shared.js';

export interface ShowOptions {
  /** Most recent events to list (default: 20) */
  events?: number;
}

const DEFAULT_EVENTS = 20;

/**
 * Handle `show`.
 *
 * @throws ExecutionNotFoundError for unknown ids and ordinals
 */
export async function handleShow(
  reference: string,
  base: BaseCommand,
  options: ShowOptions = {}
): Promise<ExitCode> {
  const store = openExecutionStore(base);
  const execution = await store.resolve(reference);

  if (base.isJson()) {
    base.json(execution);
    return EXIT_CODES.SUCCESS;
  }

  base.info(formatExecutionSummary(execution));
  base.section('Stages');
  base.info(formatStageResults(execution));

  const report = formatLeadReport(execution);
  if (report) {
    base.section('Lead');
    base.info(report);
  }

  const events = await store.history(execution.id, { limit: options.events ?? DEFAULT_EVENTS });
  base.section('History');
  base.info(formatEventHistory(events));
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the show command.
 */
export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Show the stage results of an execution')
    .argument('<execution>', 'Execution id, or ordinal from `leadscout history`')
    .option('-e, --events <count>', `Most recent events to list (default: ${DEFAULT_EVENTS})`, parsePositiveInt)
    .action(async (reference: string, options: ShowOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleShow(reference, base, options));
    });
}
