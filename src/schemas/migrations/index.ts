/**
 * Schema Migration Framework
 *
 * Lazy migration on read - when loading data with an older schema version,
 * run the migration chain to bring it to the current version.
 *
 * Also hosts the atomic JSON writer every persisted record goes through.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SCHEMA_VERSIONS, type SchemaType } from '../versions.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Migration function type
 * Takes data at version N and returns data at version N+1
 */
export type Migration = (data: Record<string, unknown>) => Record<string, unknown>;

/**
 * Migration registry key format: "schemaType:fromVersion:toVersion"
 */
type MigrationKey = `${SchemaType}:${number}:${number}`;

// ============================================================================
// Migration Registry
// ============================================================================

/**
 * Migration registry - maps schema type to version migrations
 *
 * Register migrations when making breaking schema changes.
 *
 * @example
 * // If execution schema v2 adds a required "priority" field:
 * registerMigration('execution', 1, 2, (data) => ({
 *   ...data,
 *   priority: 'normal',
 * }));
 */
const migrations: Map<MigrationKey, Migration> = new Map();

// ============================================================================
// Core Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if migration is needed
 *
 * @param data - Raw parsed JSON data
 * @returns true if data version is older than current
 */
export function needsMigration(data: unknown, schemaType: SchemaType): boolean {
  return extractSchemaVersion(data) < SCHEMA_VERSIONS[schemaType];
}

/**
 * Migrate data from its version to current.
 *
 * The result is still unvalidated; callers parse it with the matching zod schema.
 *
 * @example
 * const raw = JSON.parse(fileContent);
 * const execution = ExecutionSchema.parse(migrateSchema(raw, 'execution'));
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  if (!isRecord(data)) {
    return data;
  }

  const current = SCHEMA_VERSIONS[schemaType];
  let version = extractSchemaVersion(data);
  let migrated: Record<string, unknown> = data;

  while (version < current) {
    const migration = migrations.get(`${schemaType}:${version}:${version + 1}`);

    if (migration) {
      migrated = migration(migrated);
    }
    // No registered migration means the step only added optional fields

    version++;
  }

  return { ...migrated, schemaVersion: current };
}

/**
 * Register a new migration
 *
 * @param fromVersion - Source version
 * @param toVersion - Target version (must be fromVersion + 1)
 */
export function registerMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number,
  migration: Migration
): void {
  if (toVersion !== fromVersion + 1) {
    throw new Error(
      `Migration must increment version by 1. Got ${fromVersion} -> ${toVersion}`
    );
  }

  const key: MigrationKey = `${schemaType}:${fromVersion}:${toVersion}`;

  if (migrations.has(key)) {
    throw new Error(`Migration already registered for ${key}`);
  }

  migrations.set(key, migration);
}

/**
 * Check if a migration exists for a specific version transition
 */
export function hasMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number
): boolean {
  return migrations.has(`${schemaType}:${fromVersion}:${toVersion}`);
}

/**
 * Remove a registered migration. Tests use this to keep the registry clean.
 */
export function unregisterMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number
): boolean {
  return migrations.delete(`${schemaType}:${fromVersion}:${toVersion}`);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract schema version from data, defaulting to 1 if not present
 */
function extractSchemaVersion(data: unknown): number {
  if (!isRecord(data)) {
    return 1;
  }

  const version = data.schemaVersion;

  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }

  return 1; // Default to version 1 for legacy data
}

// ============================================================================
// Migration Loader
// ============================================================================

/**
 * Parse JSON text and run it through the migration chain
 */
export function loadAndMigrate(json: string, schemaType: SchemaType): unknown {
  const data: unknown = JSON.parse(json);
  return migrateSchema(data, schemaType);
}

// ============================================================================
// Atomic Write
// ============================================================================

let tempCounter = 0;

/**
 * Atomically write text to a file
 *
 * Uses temp file + rename so a reader sees either the old file or the new
 * one, never a mix.
 *
 * Note: If the process crashes between temp file creation and rename,
 * orphaned .tmp.* files may remain in the target directory.
 */
export async function atomicWriteText(filePath: string, text: string): Promise<void> {
  tempCounter += 1;
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}.${tempCounter}`;

  let dirReady = false;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    dirReady = true;
    await fs.writeFile(tempPath, text, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    if (dirReady) {
      await fs.rm(tempPath, { force: true });
    }
    // Re-throw with file context for better debugging
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Atomically write JSON data to a file
 *
 * @param filePath - Target file path
 * @param data - Data to write (will be JSON.stringify'd)
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown
): Promise<void> {
  await atomicWriteText(filePath, JSON.stringify(data, null, 2));
}
