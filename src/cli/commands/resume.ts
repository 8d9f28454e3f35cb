/**
 * Resume Command
 *
 * Continues a paused, failed or interrupted execution. The reference is an
 * execution id or the ordinal `leadscout history` prints.
 *
 * @module cli/commands/resume
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { createEngine } from '../engine.js';
import { createRunSink, execute, reportRun, runLocked, type CommandDeps } from './shared.js';

export async function handleResume(
  reference: string,
  base: BaseCommand,
  deps: CommandDeps = {}
): Promise<ExitCode> {
  const engine = await createEngine(base, { ...deps, sink: createRunSink(base, deps) });
  base.info(`Resuming ${reference}`);

  const result = await runLocked(
    base,
    engine.orchestrator,
    'resume',
    () => engine.orchestrator.resume(reference),
    { pollMs: deps.pollMs }
  );
  return reportRun(base, result, engine.registry.size);
}

/**
 * Register the resume command.
 */
export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Resume a paused or failed execution')
    .argument('<execution>', 'Execution id, or ordinal from `leadscout history`')
    .action(async (reference: string, _options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleResume(reference, base));
    });
}
