/**
 * Verification Stage
 *
 * Final verdict on the lead. The confidence score is computed from the
 * earlier stages' output; the model, when configured, only writes the
 * summary and recommended action, and only for leads that pass.
 *
 * Scoring: base 0.5, then
 * - +0.2 accepted company
 * - +0.2 someone with decision power 7 or more
 * - +0.1 at least one contact with an email
 * - +0.1 more than one decision maker
 *
 * Capped at 1. A score of 0.7 or more verifies the lead.
 *
 * @module stages/verification
 */

import type { FactInput } from '../memory/long-term.js';
import type { StageDefinition, StageInvocation } from '../pipeline/types.js';
import { SENIOR_THRESHOLD } from './roles/seniority.js';
import {
  CompanyProfileSchema,
  EnrichmentOutputSchema,
  RolesOutputSchema,
  VerificationNarrativeSchema,
  type CompanyProfile,
  type Contact,
  type Person,
  type VerificationOutput,
} from './schemas.js';
import type { LeadResearchDeps } from './types.js';
import { optionalStageResult, requireStageResult } from './upstream.js';

export const VERIFICATION_STAGE = 'verification';

export const VERIFIED_THRESHOLD = 0.7;

const BASE_SCORE = 0.5;

const NARRATIVE_PROMPT = `You review B2B sales leads.

Given the company, the decision makers and the contacts found, plus the
computed confidence score, write a one-line summary of the lead and the
concrete next step for the sales team.

Reply with a single JSON object:
{ "summary": "one-line summary", "recommendedAction": "next step" }`;

// ============================================================================
// Scoring
// ============================================================================

export interface LeadScore {
  score: number;
  /** Human-readable contributions, in scoring order */
  factors: string[];
}

/**
 * Score a lead from its accepted people and contacts.
 */
export function scoreLead(
  company: CompanyProfile,
  accepted: readonly Person[],
  contacts: readonly Contact[]
): LeadScore {
  let score = BASE_SCORE;
  const factors = [`base ${BASE_SCORE}`];

  if (company.status === 'accepted') {
    score += 0.2;
    factors.push('accepted company +0.2');
  }
  if (accepted.some((person) => person.decisionPower >= SENIOR_THRESHOLD)) {
    score += 0.2;
    factors.push('senior decision maker +0.2');
  }
  if (contacts.some((contact) => contact.email)) {
    score += 0.1;
    factors.push('contact email +0.1');
  }
  if (accepted.length > 1) {
    score += 0.1;
    factors.push('multiple decision makers +0.1');
  }

  return { score: Math.round(Math.min(score, 1) * 100) / 100, factors };
}

/**
 * Verdict without model input.
 */
export function verifyLead(
  company: CompanyProfile,
  people: readonly Person[],
  contacts: readonly Contact[]
): VerificationOutput {
  if (company.status === 'rejected') {
    return {
      status: 'rejected',
      confidenceScore: 0,
      reason: `Company rejected: ${company.reason || 'not suitable'}`,
      summary: `${company.name} - company not suitable for outreach`,
      recommendedAction: 'Skip this company',
    };
  }

  const accepted = people.filter((person) => person.status === 'accepted');
  if (accepted.length === 0) {
    return {
      status: 'rejected',
      confidenceScore: 0.2,
      reason: 'No decision-making roles identified',
      summary: `${company.name} - no high-value targets`,
      recommendedAction: 'Try with more senior role titles',
    };
  }

  const { score, factors } = scoreLead(company, accepted, contacts);
  const verified = score >= VERIFIED_THRESHOLD;
  return {
    status: verified ? 'verified' : 'rejected',
    confidenceScore: score,
    reason: factors.join(', '),
    summary: `${company.name} - ${accepted.length} decision-makers, ${contacts.length} contacts`,
    recommendedAction: verified ? 'Proceed with outreach' : 'Gather more data',
  };
}

export function verificationFacts(output: VerificationOutput): FactInput[] {
  return [
    { key: 'confidence_score', value: output.confidenceScore, importance: 8 },
    { key: 'verification_status', value: output.status, importance: 8 },
  ];
}

// ============================================================================
// Stage
// ============================================================================

async function writeNarrative(
  deps: LeadResearchDeps,
  invocation: StageInvocation,
  verdict: VerificationOutput,
  facts: { company: CompanyProfile; people: readonly Person[]; contacts: readonly Contact[] }
): Promise<VerificationOutput> {
  const llm = deps.llm;
  if (!llm || verdict.status === 'rejected') {
    return verdict;
  }

  try {
    const raw = await llm.completeJson({
      task: 'verification',
      system: NARRATIVE_PROMPT,
      user: JSON.stringify(
        {
          company: facts.company,
          decisionMakers: facts.people.filter((person) => person.status === 'accepted'),
          contacts: facts.contacts,
          verdict: { status: verdict.status, confidenceScore: verdict.confidenceScore },
        },
        null,
        2
      ),
      signal: invocation.signal,
    });
    const narrative = VerificationNarrativeSchema.safeParse(raw);
    if (!narrative.success) {
      invocation.logger.warn('Verification: model reply had no summary; using the computed one');
      return verdict;
    }
    return { ...verdict, ...narrative.data };
  } catch (error) {
    if (invocation.signal.aborted) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    invocation.logger.warn(`Verification: summary unavailable (${message})`);
    return verdict;
  }
}

export function createVerificationStage(
  deps: LeadResearchDeps
): StageDefinition<VerificationOutput> {
  return {
    name: VERIFICATION_STAGE,
    description: 'Score and summarize the lead',
    onFailure: 'abort',

    async run(invocation) {
      const company = requireStageResult(invocation, 'discovery', CompanyProfileSchema);
      const roles = requireStageResult(invocation, 'roles', RolesOutputSchema);
      const contacts =
        optionalStageResult(invocation, 'enrichment', EnrichmentOutputSchema)?.contacts ?? [];

      const verdict = verifyLead(company, roles.people, contacts);
      invocation.logger.info(
        `Verification: ${verdict.status} (confidence ${verdict.confidenceScore})`
      );

      return writeNarrative(deps, invocation, verdict, {
        company,
        people: roles.people,
        contacts,
      });
    },

    extractFacts: verificationFacts,
  };
}
