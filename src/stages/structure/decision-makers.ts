/**
 * Decision-Maker Table
 *
 * Department titles and top targets per company size, loaded from
 * `data/decision-makers.json`.
 *
 * @module stages/structure/decision-makers
 */

import { z } from 'zod';
import decisionMakers from '../data/decision-makers.json';
import type { CompanySize } from '../schemas.js';

const TitlesSchema = z.array(z.string().min(1)).min(1);
const DepartmentTableSchema = z.record(z.string(), TitlesSchema);

const DecisionMakerTableSchema = z.object({
  departmentsBySize: z.object({
    small: DepartmentTableSchema,
    medium: DepartmentTableSchema,
    large: DepartmentTableSchema,
    enterprise: DepartmentTableSchema,
  }),
  topTargetsBySize: z.object({
    small: TitlesSchema,
    medium: TitlesSchema,
    large: TitlesSchema,
    enterprise: TitlesSchema,
  }),
});

const table = DecisionMakerTableSchema.parse(decisionMakers);

/**
 * Department name to decision-maker titles, in table order.
 */
export function departmentsFor(size: CompanySize): Array<[string, string[]]> {
  return Object.entries(table.departmentsBySize[size]);
}

export function topTargetsFor(size: CompanySize): string[] {
  return [...table.topTargetsBySize[size]];
}
