/**
 * Roles Stage
 *
 * Finds the people to approach at the company and scores each by decision
 * power. A professional-network provider supplies real people when one is
 * configured; otherwise, or when it finds nobody, the stage suggests the
 * titles to look for (the operator's roles first, then the recommended
 * targets from the structure stage).
 *
 * @module stages/roles
 */

import type { FactInput } from '../memory/long-term.js';
import type { StageDefinition, StageInvocation } from '../pipeline/types.js';
import type { NetworkProfile } from '../services/types.js';
import { getDecisionPower, isDecisionMaker } from './roles/seniority.js';
import {
  CompanyProfileSchema,
  CompanyStructureSchema,
  type Person,
  type RolesOutput,
} from './schemas.js';
import type { LeadResearchDeps } from './types.js';
import { requireStageResult } from './upstream.js';

export const ROLES_STAGE = 'roles';

export const SUGGESTED_SOURCE = 'suggested';

function scorePerson(
  base: { name?: string; title: string; profileUrl?: string },
  company: string,
  source: string
): Person {
  const decisionPower = getDecisionPower(base.title);
  return {
    ...base,
    company,
    decisionPower,
    status: isDecisionMaker(decisionPower) ? 'accepted' : 'rejected',
    reason: `Decision power: ${decisionPower}/10`,
    source,
  };
}

async function lookupPeople(
  deps: LeadResearchDeps,
  invocation: StageInvocation,
  company: string,
  titles: string[]
): Promise<Person[]> {
  const network = deps.services?.professionalNetwork;
  if (!network) {
    return [];
  }

  const result = await network.findPeople({ company, titles }, { signal: invocation.signal });
  if (!result.ok) {
    invocation.logger.warn(`Roles: ${network.name} lookup failed: ${result.error}`);
    return [];
  }

  return result.data
    .filter((profile: NetworkProfile) => profile.name.trim() && profile.title.trim())
    .map((profile) =>
      scorePerson(
        { name: profile.name.trim(), title: profile.title.trim(), profileUrl: profile.profileUrl },
        company,
        network.name
      )
    );
}

/**
 * `Jane Doe (CEO)`, or the bare title for a suggestion.
 */
export function describePerson(person: Person): string {
  return person.name ? `${person.name} (${person.title})` : person.title;
}

export function decisionMakerFacts(output: RolesOutput): FactInput[] {
  const accepted = output.people.filter((person) => person.status === 'accepted');
  if (accepted.length === 0) {
    return [];
  }
  return [
    {
      key: 'decision_makers',
      kind: 'collection',
      value: accepted.map(describePerson),
      importance: 7,
    },
  ];
}

export function createRolesStage(deps: LeadResearchDeps): StageDefinition<RolesOutput> {
  return {
    name: ROLES_STAGE,
    description: 'Find and score decision makers',
    onFailure: 'abort',

    async run(invocation) {
      const company = requireStageResult(invocation, 'discovery', CompanyProfileSchema);
      const structure = requireStageResult(invocation, 'structure', CompanyStructureSchema);
      const titles =
        invocation.input.roles.length > 0 ? invocation.input.roles : structure.recommendedTargets;

      let people = await lookupPeople(deps, invocation, company.name, titles);
      invocation.throwIfStopped();

      if (people.length === 0) {
        people = titles.map((title) => scorePerson({ title }, company.name, SUGGESTED_SOURCE));
      }

      // Stable sort keeps provider order among equal scores
      people.sort((a, b) => b.decisionPower - a.decisionPower);

      const acceptedCount = people.filter((person) => person.status === 'accepted').length;
      const summary = `Found ${acceptedCount} decision-makers at ${company.name}`;
      invocation.logger.info(`Roles: ${summary}`);

      return {
        company: company.name,
        people,
        acceptedCount,
        rejectedCount: people.length - acceptedCount,
        summary,
      };
    },

    extractFacts: decisionMakerFacts,
  };
}
