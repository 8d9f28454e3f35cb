/**
 * Lead CSV Export
 *
 * Flattens completed executions into a CSV with one row per contact. An
 * execution whose enrichment found nobody still gets a single row, so its
 * verdict is exported with empty contact columns.
 *
 * @module export/leads-csv
 */

import type { Execution } from '../schemas/index.js';
import {
  CompanyProfileSchema,
  EnrichmentOutputSchema,
  VerificationOutputSchema,
  type Contact,
} from '../stages/schemas.js';
import { atomicWriteText } from '../storage/atomic.js';

// ============================================================================
// Types
// ============================================================================

export const LEAD_CSV_COLUMNS = [
  'execution_id',
  'company_name',
  'company_industry',
  'company_status',
  'contact_name',
  'contact_title',
  'contact_email',
  'contact_phone',
  'contact_source',
  'lead_status',
  'confidence_score',
  'completed_at',
] as const;

export type LeadCsvColumn = (typeof LEAD_CSV_COLUMNS)[number];

export type LeadRow = Record<LeadCsvColumn, string>;

export interface LeadExportResult {
  filePath: string;
  /** Completed executions that contributed rows */
  executions: number;
  rows: number;
}

// ============================================================================
// Rows
// ============================================================================

function contactColumns(contact: Contact | undefined): Pick<
  LeadRow,
  'contact_name' | 'contact_title' | 'contact_email' | 'contact_phone' | 'contact_source'
> {
  return {
    contact_name: contact?.name ?? '',
    contact_title: contact?.title ?? '',
    contact_email: contact?.email ?? '',
    contact_phone: contact?.phone ?? '',
    contact_source: contact?.source ?? '',
  };
}

/**
 * Rows for the completed executions among `executions`, in the order given.
 *
 * Stage outputs that do not match their shape leave their columns empty.
 */
export function buildLeadRows(executions: readonly Execution[]): LeadRow[] {
  const rows: LeadRow[] = [];

  for (const execution of executions) {
    if (execution.status !== 'completed') {
      continue;
    }

    const data = (stage: string): unknown => execution.stageResults[stage]?.data;
    const company = CompanyProfileSchema.safeParse(data('discovery'));
    const enrichment = EnrichmentOutputSchema.safeParse(data('enrichment'));
    const verdict = VerificationOutputSchema.safeParse(data('verification'));

    const shared = {
      execution_id: execution.id,
      company_name: company.success ? company.data.name : execution.input.entity,
      company_industry: company.success ? company.data.industry : '',
      company_status: company.success ? company.data.status : '',
      lead_status: verdict.success ? verdict.data.status : '',
      confidence_score: verdict.success ? String(verdict.data.confidenceScore) : '',
      completed_at: execution.completedAt ?? '',
    };

    const contacts: ReadonlyArray<Contact | undefined> =
      enrichment.success && enrichment.data.contacts.length > 0
        ? enrichment.data.contacts
        : [undefined];
    for (const contact of contacts) {
      rows.push({ ...shared, ...contactColumns(contact) });
    }
  }

  return rows;
}

// ============================================================================
// CSV
// ============================================================================

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render rows as CSV with a header line and CRLF line endings.
 */
export function toCsv(rows: readonly LeadRow[]): string {
  const lines = [
    LEAD_CSV_COLUMNS.join(','),
    ...rows.map((row) => LEAD_CSV_COLUMNS.map((column) => escapeField(row[column])).join(',')),
  ];
  return `${lines.join('\r\n')}\r\n`;
}

/**
 * Write the completed executions among `executions` to `filePath`.
 *
 * @returns undefined, without writing, when none of them is completed
 */
export async function exportLeadsCsv(
  executions: readonly Execution[],
  filePath: string
): Promise<LeadExportResult | undefined> {
  const rows = buildLeadRows(executions);
  if (rows.length === 0) {
    return undefined;
  }

  await atomicWriteText(filePath, toCsv(rows));
  return {
    filePath,
    executions: new Set(rows.map((row) => row.execution_id)).size,
    rows: rows.length,
  };
}
