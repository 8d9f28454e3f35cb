/**
 * Stop Command
 *
 * Asks the process running an analysis to pause at its next checkpoint.
 * The running process picks the request up from the data directory, so
 * this works from another terminal.
 *
 * @module cli/commands/stop
 */

import type { Command } from 'commander';
import { DEFAULT_STOP_REASON } from '../../pipeline/orchestrator.js';
import { requestStop } from '../../storage/run-lock.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { execute } from './shared.js';

/**
 * Handle `stop`.
 *
 * @throws NoActiveExecutionError if no analysis is running
 */
export async function handleStop(
  options: { reason?: string },
  base: BaseCommand
): Promise<ExitCode> {
  const request = await requestStop(options.reason ?? DEFAULT_STOP_REASON, base.dataDir);
  base.success(`Stop requested (pid ${request.pid}); the run pauses at its next checkpoint`);
  if (base.isJson()) {
    base.json(request);
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the stop command.
 */
export function registerStopCommand(program: Command): void {
  program
    .command('stop')
    .description('Pause the running analysis so it can be resumed later')
    .option('-r, --reason <text>', 'Reason recorded on the paused execution')
    .action(async (options: { reason?: string }, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleStop(options, base));
    });
}
