/**
 * Structure Stage
 *
 * Maps the discovered company onto departments and the titles that make
 * purchase decisions in each, scaled by company size. Deterministic: no
 * service or model calls.
 *
 * @module stages/structure
 */

import type { StageDefinition } from '../pipeline/types.js';
import { getHierarchyLevel } from './roles/seniority.js';
import {
  CompanyProfileSchema,
  type CompanyStructure,
} from './schemas.js';
import { departmentsFor, topTargetsFor } from './structure/decision-makers.js';
import { requireStageResult } from './upstream.js';

export const STRUCTURE_STAGE = 'structure';

export const structureStage: StageDefinition<CompanyStructure> = {
  name: STRUCTURE_STAGE,
  description: 'Map departments to decision-maker titles',
  onFailure: 'abort',

  async run(invocation) {
    const company = requireStageResult(invocation, 'discovery', CompanyProfileSchema);

    const departments = departmentsFor(company.size).map(([name, titles]) => ({
      name,
      decisionMakers: titles,
      hierarchyLevel: getHierarchyLevel(titles[0]),
    }));

    invocation.logger.debug(
      `Structure: ${departments.length} departments for a ${company.size} company`
    );

    return {
      companyName: company.name,
      companySize: company.size,
      departments,
      recommendedTargets: topTargetsFor(company.size),
    };
  },
};
