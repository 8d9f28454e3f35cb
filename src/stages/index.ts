/**
 * Lead-Research Stages
 *
 * The five stages of the lead-research pipeline, in execution order:
 * discovery, structure, roles, enrichment, verification.
 *
 * @module stages
 */

import { StageRegistry } from '../pipeline/registry.js';
import { createDiscoveryStage } from './discovery.js';
import { createEnrichmentStage } from './enrichment.js';
import { createRolesStage } from './roles.js';
import { structureStage } from './structure.js';
import type { LeadResearchDeps } from './types.js';
import { createVerificationStage } from './verification.js';

/**
 * Registry with every lead-research stage in order.
 */
export function createLeadResearchRegistry(deps: LeadResearchDeps = {}): StageRegistry {
  return new StageRegistry()
    .register(createDiscoveryStage(deps))
    .register(structureStage)
    .register(createRolesStage(deps))
    .register(createEnrichmentStage(deps))
    .register(createVerificationStage(deps));
}

export { parseLeadInput } from './input.js';
export { createDiscoveryStage, companyFacts, DISCOVERY_STAGE } from './discovery.js';
export { structureStage, STRUCTURE_STAGE } from './structure.js';
export {
  createRolesStage,
  decisionMakerFacts,
  describePerson,
  ROLES_STAGE,
  SUGGESTED_SOURCE,
} from './roles.js';
export {
  createEnrichmentStage,
  dedupeContacts,
  contactFacts,
  ENRICHMENT_STAGE,
} from './enrichment.js';
export {
  createVerificationStage,
  scoreLead,
  verifyLead,
  verificationFacts,
  VERIFICATION_STAGE,
  VERIFIED_THRESHOLD,
  type LeadScore,
} from './verification.js';
export {
  getDecisionPower,
  getHierarchyLevel,
  isDecisionMaker,
  ACCEPT_THRESHOLD,
  SENIOR_THRESHOLD,
} from './roles/seniority.js';
export * from './schemas.js';
export type { LeadResearchDeps } from './types.js';
