/**
 * Forget Command
 *
 * Clears everything long-term memory holds about an entity. Pattern
 * statistics are kept: they are not tied to one entity.
 *
 * @module cli/commands/forget
 */

import type { Command } from 'commander';
import { normalizeEntityKey } from '../../schemas/index.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { openMemory } from '../engine.js';
import { execute } from './shared.js';

export async function handleForget(entity: string, base: BaseCommand): Promise<ExitCode> {
  const entityKey = normalizeEntityKey(entity);
  const removed = await openMemory(base).forget(entityKey);

  if (base.isJson()) {
    base.json({ entityKey, removed });
  } else if (removed) {
    base.success(`Forgot everything remembered about ${entity}`);
  } else {
    base.info(`Nothing remembered about ${entity}`);
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the forget command.
 */
export function registerForgetCommand(program: Command): void {
  program
    .command('forget')
    .description("Clear an entity's long-term memory")
    .argument('<entity...>', 'Entity name as given to analyze')
    .action(async (words: string[], _options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleForget(words.join(' '), base));
    });
}
