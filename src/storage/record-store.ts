/**
 * Record Stores
 *
 * Load/save-by-key persistence used for executions, entity memory and
 * pattern statistics. The file implementation keeps one JSON document per
 * key, validated with zod on the way in and out and written atomically.
 *
 * @module storage/record-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createHash } from 'node:crypto';
import type { z } from 'zod';
import { migrateSchema, type SchemaType } from '../schemas/index.js';
import { atomicWriteJson, isErrnoException, readJsonIfExists } from './atomic.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Interface
// ============================================================================

/**
 * Durable collection of records addressed by string key.
 *
 * Values handed out and taken in are copies; mutating them never changes
 * what the store holds.
 */
export interface RecordStore<T> {
  get(key: string): Promise<T | undefined>;
  put(key: string, value: T): Promise<void>;
  /** @returns true if a record was removed */
  delete(key: string): Promise<boolean>;
  /** Every readable record; unreadable ones are skipped */
  list(): Promise<T[]>;
}

/**
 * zod schema whose parse output is T, whatever its input looks like
 */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// Key Encoding
// ============================================================================

/**
 * Turn an arbitrary key into a safe file name stem.
 *
 * Keys that are already safe are kept as-is so execution files stay
 * readable; anything else becomes a slug plus a short hash so distinct keys
 * never collide.
 *
 * @example
 * encodeRecordKey('20260102-143512-acme') // '20260102-143512-acme'
 * encodeRecordKey('AT&T Inc.')            // 'at-t-inc-<hash>'
 */
export function encodeRecordKey(key: string): string {
  if (/^[a-z0-9][a-z0-9_-]{0,95}$/.test(key)) {
    return key;
  }

  const slug = key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 48);
  const hash = createHash('sha1').update(key).digest('hex').slice(0, 10);

  return `${slug || 'key'}-${hash}`;
}

// ============================================================================
// File Store
// ============================================================================

export interface FileRecordStoreOptions<T> {
  /** Directory holding the record files */
  dir: string;
  schema: RecordSchema<T>;
  /** Version family used for lazy migration on read */
  schemaType: SchemaType;
  logger?: Logger;
}

/**
 * One JSON file per key, written with temp file + rename.
 */
export class FileRecordStore<T> implements RecordStore<T> {
  private readonly dir: string;
  private readonly schema: RecordSchema<T>;
  private readonly schemaType: SchemaType;
  private readonly logger?: Logger;

  constructor(options: FileRecordStoreOptions<T>) {
    this.dir = options.dir;
    this.schema = options.schema;
    this.schemaType = options.schemaType;
    this.logger = options.logger;
  }

  /**
   * Path of the file backing a key.
   */
  pathFor(key: string): string {
    return path.join(this.dir, `${encodeRecordKey(key)}.json`);
  }

  async get(key: string): Promise<T | undefined> {
    return this.readFile(this.pathFor(key));
  }

  async put(key: string, value: T): Promise<void> {
    const validated = this.schema.parse(value);
    await atomicWriteJson(this.pathFor(key), validated);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(key));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async list(): Promise<T[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const records: T[] = [];
    for (const entry of entries.sort()) {
      // Skip temp files left behind by an interrupted write
      if (!entry.endsWith('.json')) {
        continue;
      }
      try {
        const record = await this.readFile(path.join(this.dir, entry));
        if (record !== undefined) {
          records.push(record);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger?.warn(`Skipping unreadable record ${entry}: ${message}`);
      }
    }
    return records;
  }

  private async readFile(filePath: string): Promise<T | undefined> {
    const raw = await readJsonIfExists(filePath);
    if (raw === undefined) {
      return undefined;
    }

    const result = this.schema.safeParse(migrateSchema(raw, this.schemaType));
    if (!result.success) {
      throw new Error(
        `Invalid ${this.schemaType} record in ${filePath}: ${result.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`
      );
    }
    return result.data;
  }
}

// ============================================================================
// In-Memory Store
// ============================================================================

/**
 * Process-local store with the same copy semantics as the file store.
 * Used by tests and by callers that want a throwaway engine.
 */
export class InMemoryRecordStore<T> implements RecordStore<T> {
  private readonly records = new Map<string, T>();
  /** Number of successful writes, handy for asserting nothing was persisted */
  writes = 0;

  constructor(private readonly schema?: RecordSchema<T>) {}

  async get(key: string): Promise<T | undefined> {
    const record = this.records.get(key);
    return record === undefined ? undefined : structuredClone(record);
  }

  async put(key: string, value: T): Promise<void> {
    const validated = this.schema ? this.schema.parse(value) : value;
    this.records.set(key, structuredClone(validated));
    this.writes += 1;
  }

  async delete(key: string): Promise<boolean> {
    return this.records.delete(key);
  }

  async list(): Promise<T[]> {
    return Array.from(this.records.values(), (record) => structuredClone(record));
  }
}
