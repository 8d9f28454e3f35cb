/**
 * Lead Input Parsing
 *
 * Turns the operator's free-text request into an ExecutionInput.
 *
 * Accepted forms:
 * - `Acme`
 * - `Company: Acme`
 * - `Acme, Roles: CEO, VP Sales`
 *
 * and, for direct contact lookups, `Jane Doe at Acme`.
 *
 * @module stages/input
 */

import type { ExecutionInput } from '../schemas/index.js';

const COMPANY_PREFIX = /^\s*company\s*:\s*/i;
const ROLES_MARKER = /[,;]?\s*\broles?\s*:/i;

/**
 * Parse a lead request.
 *
 * @throws Error if no company name remains after parsing
 */
export function parseLeadInput(text: string): ExecutionInput {
  const query = text.trim();
  const withoutPrefix = query.replace(COMPANY_PREFIX, '');

  const marker = ROLES_MARKER.exec(withoutPrefix);
  const entityPart = marker ? withoutPrefix.slice(0, marker.index) : withoutPrefix;
  const rolesPart = marker ? withoutPrefix.slice(marker.index + marker[0].length) : '';

  const entity = entityPart.replace(/[\s,;]+$/, '').trim();
  if (!entity) {
    throw new Error('Input must name a company, e.g. "Acme, Roles: CEO, VP Sales"');
  }

  const roles: string[] = [];
  const seen = new Set<string>();
  for (const part of rolesPart.split(/[,;]/)) {
    const role = part.trim();
    const key = role.toLowerCase();
    if (role && !seen.has(key)) {
      seen.add(key);
      roles.push(role);
    }
  }

  return { query, entity, roles };
}

// ============================================================================
// Direct enrichment
// ============================================================================

const AT_SEPARATOR = /\s+at\s+/i;

export interface EnrichRequest {
  name: string;
  company: string;
}

/**
 * Parse `<name> at <company>`, splitting on the first " at ".
 *
 * @throws Error if either side is empty
 */
export function parseEnrichRequest(text: string): EnrichRequest {
  const query = text.trim();
  const separator = AT_SEPARATOR.exec(query);
  const name = separator ? query.slice(0, separator.index).trim() : '';
  const company = separator ? query.slice(separator.index + separator[0].length).trim() : '';

  if (!name || !company) {
    throw new Error('Input must be "<name> at <company>", e.g. "Jane Doe at Acme Corp"');
  }
  return { name, company };
}
