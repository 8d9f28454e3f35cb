/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.leadscout/                          # Default data directory
 * ├── config.json                        # Global settings
 * ├── run.lock                           # Held by the process running an analysis
 * ├── stop-request.json                  # Written by `leadscout stop`
 * ├── executions/
 * │   └── <execution_id>.json            # e.g., 20260102-143512-acme
 * └── memory/
 *     ├── entities/<entity>.json         # Long-term facts per entity
 *     └── patterns/<stage__bucket>.json  # Outcome statistics
 * ```
 *
 * Every getter takes an optional data directory so the CLI's `--data-dir`
 * flag can override the environment without mutating it.
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'executionId')
 * @throws {Error} If the ID contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (id.length === 0) {
    throw new Error(`${idName} must not be empty`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `LEADSCOUT_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.leadscout/`.
 *
 * @example
 * ```typescript
 * process.env.LEADSCOUT_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.LEADSCOUT_DATA_DIR;

  if (envDir) {
    // Resolve relative paths and expand ~ if present
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.leadscout');
}

/**
 * Directory holding one checkpoint file per execution.
 */
export function getExecutionsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'executions');
}

/**
 * Checkpoint file for a single execution.
 *
 * @throws {Error} If executionId contains path traversal characters
 */
export function getExecutionPath(executionId: string, dataDir: string = getDataDir()): string {
  validateIdSecurity(executionId, 'executionId');
  return path.join(getExecutionsDir(dataDir), `${executionId}.json`);
}

/**
 * Directory holding long-term memory, one file per entity.
 */
export function getEntityMemoryDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'memory', 'entities');
}

/**
 * Directory holding pattern statistics, one file per (stage, bucket).
 */
export function getPatternsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'memory', 'patterns');
}

/**
 * Default directory for CSV exports.
 */
export function getExportsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'exports');
}

/**
 * Global settings file.
 */
export function getGlobalConfigPath(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'config.json');
}

/**
 * Lock file owned by the process currently running an analysis.
 */
export function getRunLockPath(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'run.lock');
}

/**
 * File `leadscout stop` writes for the running process to pick up.
 */
export function getStopRequestPath(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'stop-request.json');
}
