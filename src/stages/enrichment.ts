/**
 * Enrichment Stage
 *
 * Looks up contact details for the accepted, named people from the roles
 * stage. Lookups run in parallel under a ConcurrencyLimiter. The result is
 * committed as partial data before the stop check, so an interrupted run
 * resumes without repeating the lookups.
 *
 * Runs under the `continue` policy: when enrichment fails the pipeline
 * proceeds to verification with no contacts.
 *
 * @module stages/enrichment
 */

import type { FactInput } from '../memory/long-term.js';
import type { StageDefinition } from '../pipeline/types.js';
import { ConcurrencyLimiter } from '../services/concurrency.js';
import { ServiceError, type ContactRecord, type ServiceResult } from '../services/types.js';
import {
  CompanyProfileSchema,
  RolesOutputSchema,
  type Contact,
  type EnrichmentOutput,
  type Person,
} from './schemas.js';
import type { LeadResearchDeps } from './types.js';
import { requireStageResult } from './upstream.js';

export const ENRICHMENT_STAGE = 'enrichment';

const DEFAULT_CONCURRENCY = 3;

/**
 * Drop repeated contacts: by email when present, otherwise by name.
 * The first occurrence wins.
 */
export function dedupeContacts(contacts: readonly Contact[]): Contact[] {
  const seen = new Set<string>();
  const unique: Contact[] = [];
  for (const contact of contacts) {
    const email = contact.email?.trim().toLowerCase();
    const key = email ? `email:${email}` : `name:${contact.name.trim().toLowerCase()}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(contact);
    }
  }
  return unique;
}

export function contactFacts(output: EnrichmentOutput): FactInput[] {
  if (output.contacts.length === 0) {
    return [];
  }
  return [
    {
      key: 'known_contacts',
      kind: 'collection',
      value: output.contacts.map((contact) =>
        contact.email ? `${contact.name} <${contact.email}>` : contact.name
      ),
      importance: 6,
    },
  ];
}

function toContact(person: Person, record: ContactRecord): Contact {
  return {
    name: record.name || person.name || person.title,
    title: person.title,
    email: record.email || undefined,
    phone: record.phone || undefined,
    source: record.source,
  };
}

export function createEnrichmentStage(deps: LeadResearchDeps): StageDefinition<EnrichmentOutput> {
  return {
    name: ENRICHMENT_STAGE,
    description: 'Look up contact details',
    onFailure: 'continue',
    fallback: (failure) => ({
      contacts: [],
      note: `Enrichment unavailable: ${failure.message}`,
      failedLookups: 0,
    }),

    async run(invocation) {
      const company = requireStageResult(invocation, 'discovery', CompanyProfileSchema);
      const roles = requireStageResult(invocation, 'roles', RolesOutputSchema);

      const provider = deps.services?.contactEnrichment;
      if (!provider) {
        return { contacts: [], note: 'No contact provider configured', failedLookups: 0 };
      }

      const targets = roles.people.filter(
        (person): person is Person & { name: string } =>
          person.status === 'accepted' && person.name !== undefined
      );
      if (targets.length === 0) {
        return { contacts: [], note: 'No named decision-makers to enrich', failedLookups: 0 };
      }

      const limiter = new ConcurrencyLimiter(deps.enrichmentConcurrency ?? DEFAULT_CONCURRENCY);
      const results = await Promise.all(
        targets.map((person) =>
          limiter.run(async (): Promise<ServiceResult<ContactRecord | null>> => {
            invocation.throwIfStopped();
            return provider.findContact(
              {
                name: person.name,
                company: company.name,
                title: person.title,
                website: company.website,
              },
              { signal: invocation.signal }
            );
          }, invocation.signal)
        )
      );

      const contacts: Contact[] = [];
      let failedLookups = 0;
      results.forEach((result, index) => {
        const person = targets[index];
        if (!result.ok) {
          failedLookups++;
          invocation.logger.warn(
            `Enrichment: ${provider.name} lookup failed for ${person.name}: ${result.error}`
          );
        } else if (result.data) {
          contacts.push(toContact(person, result.data));
        }
      });

      if (failedLookups === targets.length) {
        throw new ServiceError(provider.name, `all ${failedLookups} contact lookups failed`, true);
      }

      const output: EnrichmentOutput = {
        contacts: dedupeContacts(contacts),
        failedLookups,
      };
      invocation.logger.info(
        `Enrichment: ${output.contacts.length} contacts for ${targets.length} people`
      );

      await invocation.commitPartial(output);
      invocation.throwIfStopped();
      return output;
    },

    extractFacts: contactFacts,
  };
}
