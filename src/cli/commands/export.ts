/**
 * Export Command
 *
 * Writes completed executions as a lead CSV: one row per contact with the
 * company profile and verification verdict.
 *
 * @module cli/commands/export
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import { exportLeadsCsv } from '../../export/leads-csv.js';
import { getExportsDir } from '../../storage/paths.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { openExecutionStore } from '../engine.js';
import { execute } from './shared.js';

export interface ExportOptions {
  /** Target file; defaults to `<dataDir>/exports/leads-<timestamp>.csv` */
  output?: string;
}

/**
 * `leads-2026-01-02T14-35-12.csv`
 */
export function defaultExportFileName(now: Date): string {
  return `leads-${now.toISOString().replace(/[:.]/g, '-').slice(0, 19)}.csv`;
}

export async function handleExport(
  options: ExportOptions,
  base: BaseCommand,
  clock: () => Date = () => new Date()
): Promise<ExitCode> {
  const filePath = path.resolve(
    options.output ?? path.join(getExportsDir(base.dataDir), defaultExportFileName(clock()))
  );
  const executions = await openExecutionStore(base).listCompleted();
  const result = await exportLeadsCsv(executions, filePath);

  if (base.isJson()) {
    base.json(result ?? { filePath: null, executions: 0, rows: 0 });
    return EXIT_CODES.SUCCESS;
  }

  if (!result) {
    base.info('No completed executions to export');
    return EXIT_CODES.SUCCESS;
  }
  base.success(
    `Exported ${result.rows} row(s) from ${result.executions} execution(s) to ${result.filePath}`
  );
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the export command.
 */
export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Write completed executions to a lead CSV')
    .option('-o, --output <file>', 'Target file (default: <data-dir>/exports/leads-<timestamp>.csv)')
    .action(async (options: ExportOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await execute(base, () => handleExport(options, base));
    });
}
