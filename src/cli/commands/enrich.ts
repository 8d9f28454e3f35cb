/**
 * Enrich Command
 *
 * Looks up one person's contact details directly, outside any execution:
 *
 *   leadscout enrich Jane Doe at Acme Corp
 *
 * @module cli/commands/enrich
 */

import type { Command } from 'commander';
import { unwrapService } from '../../services/types.js';
import { parseEnrichRequest } from '../../stages/input.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { execute, type CommandDeps } from './shared.js';

/**
 * Handle `enrich`.
 *
 * Exits NOT_FOUND when the provider has no match, and USAGE_ERROR when no
 * contact provider is wired in.
 *
 * @param words - Input words; joined with spaces so quoting is optional
 * @throws ServiceError when the provider call fails
 */
export async function handleEnrich(
  words: readonly string[],
  base: BaseCommand,
  deps: Pick<CommandDeps, 'services'> = {}
): Promise<ExitCode> {
  const { name, company } = parseEnrichRequest(words.join(' '));
  const provider = deps.services?.contactEnrichment;
  if (!provider) {
    base.warn('No contact enrichment provider is configured');
    return EXIT_CODES.USAGE_ERROR;
  }

  base.info(`Enriching ${name} at ${company}`);
  const contact = unwrapService(provider.name, await provider.findContact({ name, company }));

  if (base.isJson()) {
    base.json({ name, company, contact });
    return contact ? EXIT_CODES.SUCCESS : EXIT_CODES.NOT_FOUND;
  }
  if (!contact) {
    base.warn(`No contact found for ${name} at ${company}`);
    return EXIT_CODES.NOT_FOUND;
  }

  base.success('Contact found');
  base.keyValue('Name', contact.name);
  base.keyValue('Company', company);
  if (contact.email) {
    base.keyValue('Email', contact.email);
  }
  if (contact.phone) {
    base.keyValue('Phone', contact.phone);
  }
  base.keyValue('Source', contact.source);
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the enrich command.
 */
export function registerEnrichCommand(program: Command): void {
  program
    .command('enrich')
    .description('Look up contact details for one person')
    .argument('<request...>', '"<name> at <company>"')
    .action(async (words: string[], _options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleEnrich(words, base));
    });
}
