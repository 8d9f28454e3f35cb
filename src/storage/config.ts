/**
 * Global Config Storage
 *
 * Global settings stored at ~/.leadscout/config.json. They tune the memory
 * tiers and context budget; every field has a default so the file is
 * optional.
 *
 * @module storage/config
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS, atomicWriteJson, migrateSchema } from '../schemas/index.js';
import { readJsonIfExists } from './atomic.js';
import { getGlobalConfigPath } from './paths.js';

/**
 * Global configuration schema
 */
export const GlobalConfigSchema = z.object({
  /** Schema version for forward compatibility */
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.globalConfig),

  /** Character budget for the context bundle handed to each stage */
  contextBudgetChars: z.number().int().min(200).default(8000),

  /** Maximum long-term facts recalled per stage */
  recallLimit: z.number().int().positive().default(25),

  /** Working-memory entries kept per run before eviction */
  workingMemoryLimit: z.number().int().positive().default(20),

  /** Working entries at or above this importance are promoted at run end */
  promoteThreshold: z.number().int().min(1).max(11).default(8),

  /** Completed executions older than this are removed by `prune` */
  retentionDays: z.number().int().positive().default(7),

  /** Parallel contact lookups during enrichment */
  enrichmentConcurrency: z.number().int().min(1).max(16).default(3),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * Default configuration when no config file exists
 */
export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = GlobalConfigSchema.parse({});

/**
 * Save global config to disk
 */
export async function saveGlobalConfig(
  config: GlobalConfig,
  dataDir?: string
): Promise<void> {
  const validated = GlobalConfigSchema.parse(config);
  await atomicWriteJson(getGlobalConfigPath(dataDir), validated);
}

/**
 * Load global config from disk
 *
 * Returns default config if file doesn't exist. Missing fields take their
 * defaults, so older files keep working as settings are added.
 *
 * @throws Error if config file exists but is invalid
 */
export async function loadGlobalConfig(dataDir?: string): Promise<GlobalConfig> {
  const raw = await readJsonIfExists(getGlobalConfigPath(dataDir));
  if (raw === undefined) {
    return DEFAULT_GLOBAL_CONFIG;
  }
  return GlobalConfigSchema.parse(migrateSchema(raw, 'globalConfig'));
}
