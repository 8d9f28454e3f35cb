/**
 * Zod Schemas for All Persisted Data Types
 *
 * Central export point for all schema definitions used by the engine.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, getCurrentVersion, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  ImportanceSchema,
  clampImportance,
  normalizeEntityKey,
  type ISO8601Timestamp,
  type Importance,
} from './common.js';

// ============================================================================
// Execution
// ============================================================================

export {
  ExecutionStatusSchema,
  StageStatusSchema,
  StageRecordSchema,
  ExecutionInputSchema,
  ExecutionSchema,
  ExecutionEventTypeSchema,
  ExecutionEventSchema,
  EXECUTION_HISTORY_LIMIT,
  RESUMABLE_STATUSES,
  hasStageData,
  summarizeExecution,
  type ExecutionStatus,
  type StageStatus,
  type StageRecord,
  type ExecutionInput,
  type Execution,
  type ExecutionEvent,
  type ExecutionEventType,
  type ExecutionSummary,
} from './execution.js';

// ============================================================================
// Memory
// ============================================================================

export {
  FactKindSchema,
  FactRecordSchema,
  EntityMemorySchema,
  PatternStatSchema,
  type FactKind,
  type FactRecord,
  type EntityMemory,
  type PatternStat,
  type WorkingEntry,
} from './memory.js';

// ============================================================================
// Migrations
// ============================================================================

export {
  migrateSchema,
  registerMigration,
  needsMigration,
  hasMigration,
  loadAndMigrate,
  atomicWriteJson,
} from './migrations/index.js';
