/**
 * Run Summary Formatters
 *
 * CLI output formatters for executions including:
 * - Final execution summary after analyze/resume
 * - Lead report built from the stage outputs
 * - History table with resume ordinals
 * - Per-stage results and event history for `show`
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import {
  RESUMABLE_STATUSES,
  type Execution,
  type ExecutionEvent,
  type ExecutionStatus,
  type ExecutionSummary,
} from '../../schemas/index.js';
import {
  CompanyProfileSchema,
  EnrichmentOutputSchema,
  RolesOutputSchema,
  VerificationOutputSchema,
} from '../../stages/schemas.js';
import { formatDuration, stageLabel } from './progress.js';

// ============================================================================
// Helpers
// ============================================================================

const STATUS_COLORS: Record<ExecutionStatus, (text: string) => string> = {
  pending: chalk.dim,
  running: chalk.cyan,
  paused: chalk.yellow,
  completed: chalk.green,
  failed: chalk.red,
};

function colorStatus(status: ExecutionStatus): string {
  return STATUS_COLORS[status](status.toUpperCase());
}

/**
 * Truncate a string to a maximum length.
 */
function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width, ignoring ANSI codes.
 */
function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}

/**
 * `2026-01-02T14:35:12.000Z` -> `2026-01-02 14:35`
 */
function formatTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

// ============================================================================
// Execution Summary
// ============================================================================

/**
 * Format the summary printed when analyze or resume returns.
 *
 * @example
 * ```
 * === Execution Paused ===
 * Execution: 20260102-143512-acme-corp
 * Entity:    Acme Corp
 * Status:    PAUSED
 * Stages:    3/5 completed
 * Duration:  4.2s
 * Reason:    Stopped by user
 *
 * Resume with: leadscout resume 20260102-143512-acme-corp
 * ```
 */
export function formatExecutionSummary(execution: Execution, totalStages?: number): string {
  const lines: string[] = [];
  const records = Object.values(execution.stageResults);
  const completed = records.filter((record) => record.status === 'completed').length;
  const total = totalStages ?? records.length;
  const title = execution.status.charAt(0).toUpperCase() + execution.status.slice(1);

  lines.push(chalk.bold(`=== Execution ${title} ===`));
  lines.push(`Execution: ${chalk.cyan(execution.id)}`);
  lines.push(`Entity:    ${execution.input.entity}`);
  lines.push(`Status:    ${colorStatus(execution.status)}`);
  lines.push(`Stages:    ${completed}/${total} completed`);

  const end = Date.parse(execution.completedAt ?? execution.updatedAt);
  const start = Date.parse(execution.createdAt);
  if (Number.isFinite(end) && Number.isFinite(start)) {
    lines.push(`Duration:  ${formatDuration(Math.max(0, end - start))}`);
  }
  if (execution.error) {
    lines.push(`Reason:    ${execution.error}`);
  }

  if (RESUMABLE_STATUSES.includes(execution.status)) {
    lines.push('');
    lines.push(`Resume with: leadscout resume ${execution.id}`);
  }

  return lines.join('\n');
}

// ============================================================================
// Lead Report
// ============================================================================

/**
 * Format what the stages found about the lead.
 *
 * Stage outputs that are missing or do not match their shape are left out.
 *
 * @returns The report, or undefined if no stage has usable output
 */
export function formatLeadReport(execution: Execution): string | undefined {
  const lines: string[] = [];
  const data = (stage: string): unknown => execution.stageResults[stage]?.data;

  const company = CompanyProfileSchema.safeParse(data('discovery'));
  if (company.success) {
    const profile = company.data;
    lines.push(`Company:  ${chalk.bold(profile.name)} (${profile.industry}, ${profile.size})`);
    if (profile.website) {
      lines.push(`Website:  ${profile.website}`);
    }
    if (profile.status === 'rejected') {
      lines.push(chalk.red(`Rejected: ${profile.reason}`));
    }
  }

  const roles = RolesOutputSchema.safeParse(data('roles'));
  if (roles.success) {
    const accepted = roles.data.people.filter((person) => person.status === 'accepted');
    lines.push('');
    lines.push(`Decision makers (${accepted.length}):`);
    for (const person of accepted) {
      const who = person.name ? `${person.name}, ${person.title}` : `${person.title} ${chalk.dim('(suggested)')}`;
      lines.push(`  - ${who} ${chalk.dim(`power ${person.decisionPower}`)}`);
    }
  }

  const enrichment = EnrichmentOutputSchema.safeParse(data('enrichment'));
  if (enrichment.success) {
    lines.push('');
    lines.push(`Contacts (${enrichment.data.contacts.length}):`);
    for (const contact of enrichment.data.contacts) {
      const channels = [contact.email, contact.phone].filter(Boolean).join(', ');
      lines.push(`  - ${contact.name}${channels ? ` <${channels}>` : ''}`);
    }
    if (enrichment.data.note) {
      lines.push(chalk.dim(`  ${enrichment.data.note}`));
    }
  }

  const verification = VerificationOutputSchema.safeParse(data('verification'));
  if (verification.success) {
    const verdict = verification.data;
    const label =
      verdict.status === 'verified' ? chalk.green('VERIFIED') : chalk.red('REJECTED');
    lines.push('');
    lines.push(`Verdict:  ${label} (confidence ${verdict.confidenceScore})`);
    lines.push(`  ${verdict.summary}`);
    lines.push(`  Next: ${verdict.recommendedAction}`);
  }

  return lines.length > 0 ? lines.join('\n') : undefined;
}

// ============================================================================
// History Table
// ============================================================================

/**
 * Format executions as a table. Resumable rows get the ordinal that
 * `leadscout resume <n>` accepts.
 *
 * @param summaries - Rows to show, newest first
 * @param resumableIds - Ids in `listResumable()` order; position + 1 is the ordinal
 */
export function formatHistoryTable(
  summaries: readonly ExecutionSummary[],
  resumableIds: readonly string[]
): string {
  const header =
    padRight('#', 4) +
    padRight('EXECUTION ID', 34) +
    padRight('ENTITY', 22) +
    padRight('STATUS', 11) +
    padRight('STAGE', 14) +
    'UPDATED';

  const rows = summaries.map((summary) => {
    const position = resumableIds.indexOf(summary.id);
    const ordinal = position >= 0 ? String(position + 1) : '';
    return (
      padRight(ordinal, 4) +
      padRight(truncate(summary.id, 32), 34) +
      padRight(truncate(summary.entity, 20), 22) +
      padRight(colorStatus(summary.status), 11) +
      padRight(summary.status === 'completed' ? '-' : (summary.currentStage ?? '-'), 14) +
      formatTimestamp(summary.updatedAt)
    );
  });

  return [chalk.bold(header), chalk.dim('-'.repeat(header.length)), ...rows].join('\n');
}

// ============================================================================
// Stage Results
// ============================================================================

const STAGE_ICONS: Record<string, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
  failed: '[X]',
};

/**
 * Format every stage record of an execution, in stage order, with its data
 * as indented JSON.
 *
 * @param maxDataChars - Longest data dump per stage before truncation
 */
export function formatStageResults(execution: Execution, maxDataChars = 2000): string {
  const entries = Object.entries(execution.stageResults);
  if (entries.length === 0) {
    return chalk.dim('No stage has run yet.');
  }

  const lines: string[] = [];
  for (const [stage, record] of entries) {
    const attempts = record.attempts === 1 ? '1 attempt' : `${record.attempts} attempts`;
    lines.push(
      `${STAGE_ICONS[record.status] ?? '[?]'} ${chalk.bold(stageLabel(stage))} ${chalk.dim(`${record.status}, ${attempts}`)}`
    );
    if (record.error) {
      lines.push(chalk.red(`    Error: ${record.error}`));
    }
    if (record.data !== undefined && record.data !== null) {
      const dump = truncate(JSON.stringify(record.data, null, 2), maxDataChars);
      lines.push(...dump.split('\n').map((line) => `    ${line}`));
    }
  }
  return lines.join('\n');
}

// ============================================================================
// Event History
// ============================================================================

/**
 * One line per lifecycle event:
 * `2026-01-02 14:35:13  stage_failed          structure     timeout`
 */
export function formatEventHistory(events: readonly ExecutionEvent[]): string {
  if (events.length === 0) {
    return chalk.dim('No events recorded.');
  }

  return events
    .map((event) => {
      const at = event.at.slice(0, 19).replace('T', ' ');
      const columns = [
        chalk.dim(at),
        padRight(event.type, 20),
        padRight(event.stage ?? '', 12),
        event.detail ?? '',
      ];
      return columns.join('  ').trimEnd();
    })
    .join('\n');
}
