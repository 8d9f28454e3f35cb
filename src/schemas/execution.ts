/**
 * Execution Schemas
 *
 * An Execution is one pipeline run for one input. It is checkpointed after
 * every state transition and is the unit that pause/resume operates on.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema } from './common.js';
import { SCHEMA_VERSIONS } from './versions.js';

// ============================================================================
// Status Enums
// ============================================================================

export const ExecutionStatusSchema = z.enum([
  'pending',
  'running',
  'paused',
  'completed',
  'failed',
]);

export type ExecutionStatus = z.infer<typeof ExecutionStatusSchema>;

export const StageStatusSchema = z.enum(['pending', 'running', 'completed', 'failed']);

export type StageStatus = z.infer<typeof StageStatusSchema>;

/**
 * Statuses that `listResumable` returns. A `running` status found on disk
 * means the owning process exited without pausing.
 */
export const RESUMABLE_STATUSES: readonly ExecutionStatus[] = ['paused', 'failed', 'running'];

// ============================================================================
// Stage Record
// ============================================================================

export const StageRecordSchema = z.object({
  status: StageStatusSchema,
  /** Stage output, or a partial commit while the stage is still running */
  data: z.unknown().optional(),
  error: z.string().optional(),
  /** Number of times the stage function has been started */
  attempts: z.number().int().nonnegative().default(0),
  startedAt: ISO8601TimestampSchema.optional(),
  finishedAt: ISO8601TimestampSchema.optional(),
});

export type StageRecord = z.infer<typeof StageRecordSchema>;

// ============================================================================
// Execution Input
// ============================================================================

export const ExecutionInputSchema = z.object({
  /** Raw request as typed by the operator */
  query: z.string().min(1),
  /** Target entity parsed from the query */
  entity: z.string().min(1),
  /** Roles the operator asked for explicitly (may be empty) */
  roles: z.array(z.string().min(1)).default([]),
});

export type ExecutionInput = z.infer<typeof ExecutionInputSchema>;

// ============================================================================
// Event History
// ============================================================================

export const ExecutionEventTypeSchema = z.enum([
  'execution_created',
  'execution_started',
  'execution_resumed',
  'stage_started',
  'stage_completed',
  'stage_failed',
  'execution_paused',
  'execution_completed',
  'execution_failed',
]);

export type ExecutionEventType = z.infer<typeof ExecutionEventTypeSchema>;

export const ExecutionEventSchema = z.object({
  type: ExecutionEventTypeSchema,
  at: ISO8601TimestampSchema,
  stage: z.string().optional(),
  /** Attempt number, pause reason or error message */
  detail: z.string().optional(),
});

export type ExecutionEvent = z.infer<typeof ExecutionEventSchema>;

/** Events kept per execution; older ones are dropped first. */
export const EXECUTION_HISTORY_LIMIT = 500;

// ============================================================================
// Execution
// ============================================================================

export const ExecutionSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.execution),
  id: z.string().min(1),
  input: ExecutionInputSchema,
  entityKey: z.string().min(1),
  status: ExecutionStatusSchema,
  /** Keyed by stage name; key insertion order follows stage order */
  stageResults: z.record(z.string(), StageRecordSchema),
  createdAt: ISO8601TimestampSchema,
  updatedAt: ISO8601TimestampSchema,
  completedAt: ISO8601TimestampSchema.optional(),
  /** Last interruption or failure reason; cleared on resume */
  error: z.string().optional(),
  /** Lifecycle events, oldest first */
  history: z.array(ExecutionEventSchema).default([]),
});

export type Execution = z.infer<typeof ExecutionSchema>;

/**
 * Compact view of an Execution for listings.
 */
export interface ExecutionSummary {
  id: string;
  entity: string;
  query: string;
  status: ExecutionStatus;
  /** Stages with status `completed` */
  completedStages: number;
  /** First stage whose status is not `completed`, if any has been recorded */
  currentStage?: string;
  error?: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Whether a stage record carries usable data.
 */
export function hasStageData(record: StageRecord | undefined): boolean {
  return record !== undefined && record.data !== undefined && record.data !== null;
}

/**
 * Build a listing summary from a full Execution.
 */
export function summarizeExecution(execution: Execution): ExecutionSummary {
  const records = Object.entries(execution.stageResults);
  const completed = records.filter(([, record]) => record.status === 'completed');
  const current = records.find(([, record]) => record.status !== 'completed');

  return {
    id: execution.id,
    entity: execution.input.entity,
    query: execution.input.query,
    status: execution.status,
    completedStages: completed.length,
    currentStage: current?.[0],
    error: execution.error,
    createdAt: execution.createdAt,
    updatedAt: execution.updatedAt,
  };
}
