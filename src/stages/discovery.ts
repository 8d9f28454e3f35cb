/**
 * Discovery Stage
 *
 * Qualifies the target company for B2B outreach. Web search results, when
 * a search provider is configured, are handed to the model as evidence
 * together with whatever memory already knows about the entity.
 *
 * @module stages/discovery
 */

import type { FactInput } from '../memory/long-term.js';
import { renderContext } from '../context/render.js';
import type { StageDefinition, StageInvocation } from '../pipeline/types.js';
import type { SearchHit } from '../services/types.js';
import { CompanyProfileSchema, type CompanyProfile } from './schemas.js';
import type { LeadResearchDeps } from './types.js';

export const DISCOVERY_STAGE = 'discovery';

const SEARCH_RESULT_LIMIT = 5;

const DISCOVERY_PROMPT = `You qualify companies for B2B sales outreach.

Decide whether the company is a real, established business worth targeting.
Judge industry, size (employee count, revenue, offices) and signs of growth
(hiring, funding, expansion, recent news). Use the evidence provided when
there is any; otherwise rely on what you know and be strict.

Reply with a single JSON object:
{
  "name": "official company name",
  "industry": "industry",
  "size": "small | medium | large | enterprise",
  "location": "headquarters, if known",
  "website": "company domain, if known",
  "growthSignals": ["growth indicators"],
  "status": "accepted | rejected",
  "reason": "short explanation citing the evidence"
}`;

function formatEvidence(hits: readonly SearchHit[]): string {
  return hits
    .map((hit, index) => `${index + 1}. ${hit.title} (${hit.url})\n   ${hit.snippet}`)
    .join('\n');
}

async function gatherEvidence(
  deps: LeadResearchDeps,
  invocation: StageInvocation
): Promise<SearchHit[]> {
  const search = deps.services?.webSearch;
  if (!search) {
    return [];
  }

  const result = await search.search(`${invocation.input.entity} company`, {
    signal: invocation.signal,
    limit: SEARCH_RESULT_LIMIT,
  });
  if (!result.ok) {
    invocation.logger.warn(`Discovery: ${search.name} search failed: ${result.error}`);
    return [];
  }
  return result.data.slice(0, SEARCH_RESULT_LIMIT);
}

function buildUserPrompt(invocation: StageInvocation, hits: readonly SearchHit[]): string {
  const parts = [`Company: ${invocation.input.entity}`];
  if (hits.length > 0) {
    parts.push(`Search results:\n${formatEvidence(hits)}`);
  }
  const context = renderContext(invocation.context);
  if (context) {
    parts.push(`What we already know:\n${context}`);
  }
  return parts.join('\n\n');
}

/**
 * Facts worth keeping from a company profile.
 */
export function companyFacts(profile: CompanyProfile, entity: string): FactInput[] {
  const facts: FactInput[] = [
    { key: 'size', value: profile.size, importance: 7 },
    { key: 'industry', value: profile.industry, importance: 6 },
  ];
  if (profile.website) {
    facts.push({ key: 'website', value: profile.website, importance: 5 });
  }
  if (profile.name.toLowerCase() !== entity.trim().toLowerCase()) {
    facts.push({ key: 'aliases', kind: 'collection', value: [profile.name], importance: 3 });
  }
  if (profile.growthSignals.length > 0) {
    facts.push({
      key: 'growth_signals',
      kind: 'collection',
      value: profile.growthSignals,
      importance: 6,
    });
  }
  return facts;
}

export function createDiscoveryStage(deps: LeadResearchDeps): StageDefinition<CompanyProfile> {
  return {
    name: DISCOVERY_STAGE,
    description: 'Qualify the company for outreach',
    onFailure: 'abort',

    async run(invocation) {
      const llm = deps.llm;
      if (!llm) {
        throw new Error('Discovery needs a language model; set OPENAI_API_KEY');
      }

      const hits = await gatherEvidence(deps, invocation);
      invocation.throwIfStopped();

      const raw = await llm.completeJson({
        task: 'discovery',
        system: DISCOVERY_PROMPT,
        user: buildUserPrompt(invocation, hits),
        signal: invocation.signal,
      });

      const parsed = CompanyProfileSchema.safeParse({
        ...raw,
        name: typeof raw.name === 'string' && raw.name.trim() ? raw.name : invocation.input.entity,
        sources: hits.map((hit) => ({ title: hit.title, url: hit.url })),
      });
      if (!parsed.success) {
        throw new Error(
          `Discovery: unusable model reply (${parsed.error.issues[0]?.message ?? 'invalid'})`
        );
      }

      invocation.logger.info(
        `Discovery: ${parsed.data.name} ${parsed.data.status} (${parsed.data.size}, ${parsed.data.industry})`
      );
      return parsed.data;
    },

    extractFacts(output, invocation) {
      return companyFacts(output, invocation.input.entity);
    },
  };
}
