/**
 * Schema Version Registry
 *
 * All persisted schemas include a schemaVersion field for migration support.
 * Each schema type has an independent version number (simple integers).
 */

/**
 * Current schema versions for all data types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Execution checkpoints */
  execution: 1,
  /** Long-term memory for one entity */
  entityMemory: 1,
  /** Aggregated stage outcome statistics */
  patternStat: 1,
  /** Global CLI settings */
  globalConfig: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

/**
 * Get the current version for a schema type
 */
export function getCurrentVersion(schemaType: SchemaType): number {
  return SCHEMA_VERSIONS[schemaType];
}

/**
 * Check if a schema version is current
 */
export function isCurrentVersion(
  schemaType: SchemaType,
  version: number
): boolean {
  return version === SCHEMA_VERSIONS[schemaType];
}
