/**
 * Analyze Command
 *
 * Runs the lead-research pipeline for a new input:
 *
 *   leadscout analyze "Acme Corp, Roles: CEO, VP Sales"
 *
 * @module cli/commands/analyze
 */

import type { Command } from 'commander';
import { parseLeadInput } from '../../stages/input.js';
import { getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { createEngine } from '../engine.js';
import { createRunSink, execute, reportRun, runLocked, type CommandDeps } from './shared.js';

/**
 * Handle `analyze`.
 *
 * @param words - Input words; joined with spaces so quoting is optional
 */
export async function handleAnalyze(
  words: readonly string[],
  base: BaseCommand,
  deps: CommandDeps = {}
): Promise<ExitCode> {
  const input = parseLeadInput(words.join(' '));
  base.debug(
    `Entity: ${input.entity}${input.roles.length > 0 ? `; roles: ${input.roles.join(', ')}` : ''}`
  );

  const engine = await createEngine(base, { ...deps, sink: createRunSink(base, deps) });
  base.info(`Analyzing ${input.entity}`);

  const result = await runLocked(
    base,
    engine.orchestrator,
    'analyze',
    () => engine.orchestrator.run(input),
    { pollMs: deps.pollMs }
  );
  return reportRun(base, result, engine.registry.size);
}

/**
 * Register the analyze command.
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Research a company and its decision-makers')
    .argument('<input...>', 'Company name, optionally followed by "Roles: <title>, <title>"')
    .action(async (words: string[], _options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleAnalyze(words, base));
    });
}
