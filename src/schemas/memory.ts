/**
 * Memory Schemas
 *
 * Persisted shapes for the long-term and pattern memory tiers. The working
 * tier is never persisted, so its entry type lives here only as an interface.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema, ImportanceSchema } from './common.js';
import { SCHEMA_VERSIONS } from './versions.js';

// ============================================================================
// Working Memory
// ============================================================================

/**
 * One high-detail event recorded during the active run.
 */
export interface WorkingEntry {
  eventType: string;
  payload: Record<string, unknown>;
  importance: number;
  timestamp: string;
}

// ============================================================================
// Long-Term Memory
// ============================================================================

/**
 * `point` facts are superseded by newer records with the same key;
 * `collection` facts accumulate the union of all recorded values.
 */
export const FactKindSchema = z.enum(['point', 'collection']);

export type FactKind = z.infer<typeof FactKindSchema>;

export const FactRecordSchema = z.object({
  key: z.string().min(1),
  kind: FactKindSchema,
  /** A point value, or the list of items to add to a collection */
  value: z.unknown(),
  importance: ImportanceSchema,
  recordedAt: ISO8601TimestampSchema,
  executionId: z.string().optional(),
  stage: z.string().optional(),
});

export type FactRecord = z.infer<typeof FactRecordSchema>;

export const EntityMemorySchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.entityMemory),
  entityKey: z.string().min(1),
  /** Name as the operator last typed it */
  displayName: z.string().min(1),
  /** Append-only history; never rewritten in place */
  records: z.array(FactRecordSchema).default([]),
  updatedAt: ISO8601TimestampSchema,
});

export type EntityMemory = z.infer<typeof EntityMemorySchema>;

// ============================================================================
// Pattern Memory
// ============================================================================

export const PatternStatSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.patternStat),
  stage: z.string().min(1),
  bucket: z.string().min(1),
  successes: z.number().int().nonnegative(),
  failures: z.number().int().nonnegative(),
  totalDurationMs: z.number().nonnegative(),
  lastError: z.string().optional(),
  updatedAt: ISO8601TimestampSchema,
});

export type PatternStat = z.infer<typeof PatternStatSchema>;
