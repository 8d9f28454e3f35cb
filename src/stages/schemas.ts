/**
 * Stage Output Schemas
 *
 * Zod schemas for the output of each lead-research stage. Downstream stages
 * parse upstream results through these before using them, so a checkpoint
 * written by an older build or restored from a partial commit is validated
 * at the point of use.
 *
 * @module stages/schemas
 */

import { z } from 'zod';

// ============================================================================
// Shared
// ============================================================================

export const COMPANY_SIZES = ['small', 'medium', 'large', 'enterprise'] as const;

export const CompanySizeSchema = z.enum(COMPANY_SIZES);

export type CompanySize = z.infer<typeof CompanySizeSchema>;

/**
 * Lenient size parsing for model output: case-insensitive, and anything
 * unrecognized counts as medium.
 */
export const LenientCompanySizeSchema = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    CompanySizeSchema
  )
  .catch('medium');

/** Optional text that treats null, blanks and non-strings as absent */
const optionalText = z
  .string()
  .trim()
  .min(1)
  .optional()
  .catch(undefined);

// ============================================================================
// discovery
// ============================================================================

export const SourceLinkSchema = z.object({
  title: z.string(),
  url: z.string(),
});

export const CompanyProfileSchema = z.object({
  name: z.string().trim().min(1),
  industry: z.string().trim().min(1).catch('Unknown'),
  size: LenientCompanySizeSchema,
  location: optionalText,
  website: optionalText,
  growthSignals: z.array(z.string()).catch([]),
  status: z.enum(['accepted', 'rejected']),
  reason: z.string().catch(''),
  /** Web results the assessment was based on */
  sources: z.array(SourceLinkSchema).default([]),
});

export type CompanyProfile = z.infer<typeof CompanyProfileSchema>;

// ============================================================================
// structure
// ============================================================================

export const DepartmentSchema = z.object({
  name: z.string(),
  decisionMakers: z.array(z.string()),
  hierarchyLevel: z.string(),
});

export type Department = z.infer<typeof DepartmentSchema>;

export const CompanyStructureSchema = z.object({
  companyName: z.string(),
  companySize: CompanySizeSchema,
  departments: z.array(DepartmentSchema),
  recommendedTargets: z.array(z.string()),
});

export type CompanyStructure = z.infer<typeof CompanyStructureSchema>;

// ============================================================================
// roles
// ============================================================================

export const PersonSchema = z.object({
  /** Absent for suggested roles that no provider has matched to a person */
  name: z.string().min(1).optional(),
  title: z.string().min(1),
  company: z.string(),
  profileUrl: z.string().optional(),
  decisionPower: z.number().int().min(1).max(10),
  status: z.enum(['accepted', 'rejected']),
  reason: z.string(),
  /** Provider name, or `suggested` */
  source: z.string(),
});

export type Person = z.infer<typeof PersonSchema>;

export const RolesOutputSchema = z.object({
  company: z.string(),
  people: z.array(PersonSchema),
  acceptedCount: z.number().int().nonnegative(),
  rejectedCount: z.number().int().nonnegative(),
  summary: z.string(),
});

export type RolesOutput = z.infer<typeof RolesOutputSchema>;

// ============================================================================
// enrichment
// ============================================================================

export const ContactSchema = z.object({
  name: z.string(),
  title: z.string().optional(),
  email: z.string().optional(),
  phone: z.string().optional(),
  source: z.string(),
});

export type Contact = z.infer<typeof ContactSchema>;

export const EnrichmentOutputSchema = z.object({
  contacts: z.array(ContactSchema),
  note: z.string().optional(),
  failedLookups: z.number().int().nonnegative().default(0),
});

export type EnrichmentOutput = z.infer<typeof EnrichmentOutputSchema>;

// ============================================================================
// verification
// ============================================================================

export const VerificationOutputSchema = z.object({
  status: z.enum(['verified', 'rejected']),
  confidenceScore: z.number().min(0).max(1),
  reason: z.string(),
  summary: z.string(),
  recommendedAction: z.string(),
});

export type VerificationOutput = z.infer<typeof VerificationOutputSchema>;

/**
 * The part of the verdict the model is allowed to write.
 */
export const VerificationNarrativeSchema = z.object({
  summary: z.string().trim().min(1),
  recommendedAction: z.string().trim().min(1),
});
