/**
 * Prune Command
 *
 * Deletes completed executions older than the retention period. Paused and
 * failed executions are never pruned.
 *
 * @module cli/commands/prune
 */

import type { Command } from 'commander';
import { loadGlobalConfig } from '../../storage/config.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { openExecutionStore } from '../engine.js';
import { execute, parsePositiveInt } from './shared.js';

export interface PruneOptions {
  /** Age in days; defaults to `retentionDays` from config.json */
  days?: number;
}

export async function handlePrune(options: PruneOptions, base: BaseCommand): Promise<ExitCode> {
  const days = options.days ?? (await loadGlobalConfig(base.dataDir)).retentionDays;
  const removed = await openExecutionStore(base).prune(days);

  if (base.isJson()) {
    base.json({ days, removed });
    return EXIT_CODES.SUCCESS;
  }

  for (const id of removed) {
    base.debug(`Removed ${id}`);
  }
  base.success(
    removed.length === 0
      ? `No completed executions older than ${days} day(s)`
      : `Removed ${removed.length} completed execution(s) older than ${days} day(s)`
  );
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the prune command.
 */
export function registerPruneCommand(program: Command): void {
  program
    .command('prune')
    .description('Delete completed executions older than the retention period')
    .option('-d, --days <count>', 'Age in days (default: retentionDays, 7)', parsePositiveInt)
    .action(async (options: PruneOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handlePrune(options, base));
    });
}
