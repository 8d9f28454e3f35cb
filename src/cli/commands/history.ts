/**
 * History Command
 *
 * Lists executions. By default only resumable ones are shown; the number
 * in the first column is what `leadscout resume <n>` accepts.
 *
 * @module cli/commands/history
 */

import type { Command } from 'commander';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { openExecutionStore } from '../engine.js';
import { formatHistoryTable } from '../formatters/index.js';
import { execute, parsePositiveInt } from './shared.js';

export interface HistoryOptions {
  /** Include completed executions */
  all?: boolean;
  /** Maximum rows to show */
  limit?: number;
}

const DEFAULT_LIMIT = 20;

export async function handleHistory(options: HistoryOptions, base: BaseCommand): Promise<ExitCode> {
  const store = openExecutionStore(base);
  const resumable = await store.listResumable();
  const summaries = options.all ? await store.list() : resumable;
  const shown = summaries.slice(0, options.limit ?? DEFAULT_LIMIT);
  const resumableIds = resumable.map((summary) => summary.id);

  if (base.isJson()) {
    base.json(
      shown.map((summary) => {
        const position = resumableIds.indexOf(summary.id);
        return position >= 0 ? { ordinal: position + 1, ...summary } : summary;
      })
    );
    return EXIT_CODES.SUCCESS;
  }

  if (shown.length === 0) {
    base.info(options.all ? 'No executions found.' : 'No resumable executions.');
    base.info('Start one with: leadscout analyze "<company>, Roles: <title>"');
    return EXIT_CODES.SUCCESS;
  }

  base.info(formatHistoryTable(shown, resumableIds));
  if (summaries.length > shown.length) {
    base.blank();
    base.info(`Showing ${shown.length} of ${summaries.length}. Use --limit to see more.`);
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the history command.
 */
export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List resumable executions (or all with --all)')
    .option('-a, --all', 'Include completed executions')
    .option('-n, --limit <count>', 'Maximum number of executions to show', parsePositiveInt)
    .action(async (options: HistoryOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleHistory(options, base));
    });
}
