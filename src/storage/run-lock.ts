/**
 * Run Lock and Stop Requests
 *
 * A file-based lock marks the process that is advancing an execution, so a
 * second `analyze` or `resume` cannot run alongside it and `stop` from
 * another terminal knows whom to signal. A lock whose pid no longer exists
 * is stale and removed on sight.
 *
 * @module storage/run-lock
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { NoActiveExecutionError, RunLockHeldError } from '../pipeline/errors.js';
import { atomicWriteJson, isErrnoException, readJsonIfExists } from './atomic.js';
import { getRunLockPath, getStopRequestPath } from './paths.js';

// ============================================================================
// Types
// ============================================================================

const RunLockInfoSchema = z.object({
  /** PID of the process holding the lock */
  pid: z.number().int().positive(),
  /** Execution being advanced, once known */
  executionId: z.string().optional(),
  acquiredAt: z.string(),
  /** CLI command that took the lock */
  command: z.string(),
});

export type RunLockInfo = z.infer<typeof RunLockInfoSchema>;

const StopRequestSchema = z.object({
  reason: z.string(),
  requestedAt: z.string(),
  /** PID the request was addressed to */
  pid: z.number().int().positive(),
});

export type StopRequest = z.infer<typeof StopRequestSchema>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Whether a process with this pid is alive.
 * EPERM means it exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EPERM') {
      return true;
    }
    return false;
  }
}

async function removeIfExists(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

// ============================================================================
// Lock Operations
// ============================================================================

/**
 * Read the current lock, removing it if its holder has died.
 *
 * @returns Lock info if a live process holds the lock, undefined otherwise
 */
export async function readRunLock(dataDir?: string): Promise<RunLockInfo | undefined> {
  const lockPath = getRunLockPath(dataDir);
  let raw: unknown;
  try {
    raw = await readJsonIfExists(lockPath);
  } catch {
    // Half-written or corrupt lock: nobody can own it
    await removeIfExists(lockPath);
    return undefined;
  }
  if (raw === undefined) {
    return undefined;
  }

  const parsed = RunLockInfoSchema.safeParse(raw);
  if (!parsed.success || !isProcessAlive(parsed.data.pid)) {
    await removeIfExists(lockPath);
    return undefined;
  }
  return parsed.data;
}

/**
 * Take the run lock for this process.
 *
 * Any stop request left over from an earlier run is discarded so it cannot
 * pause the new one.
 *
 * @throws RunLockHeldError if another live process holds the lock
 */
export async function acquireRunLock(
  command: string,
  options: { dataDir?: string; executionId?: string; pid?: number } = {}
): Promise<RunLockInfo> {
  const { dataDir, executionId, pid = process.pid } = options;
  const lockPath = getRunLockPath(dataDir);

  const existing = await readRunLock(dataDir);
  if (existing && existing.pid !== pid) {
    throw new RunLockHeldError(existing.pid, existing.executionId);
  }

  const info: RunLockInfo = {
    pid,
    executionId,
    acquiredAt: new Date().toISOString(),
    command,
  };

  await fs.mkdir(path.dirname(lockPath), { recursive: true });
  if (existing) {
    // Re-entrant for the same pid
    await atomicWriteJson(lockPath, info);
  } else {
    try {
      // Exclusive create - fails if another process won the race
      await fs.writeFile(lockPath, JSON.stringify(info, null, 2), { flag: 'wx' });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        const winner = await readRunLock(dataDir);
        throw new RunLockHeldError(winner?.pid ?? 0, winner?.executionId);
      }
      throw error;
    }
  }

  await removeIfExists(getStopRequestPath(dataDir));
  return info;
}

/**
 * Record which execution the lock holder is advancing.
 */
export async function updateRunLock(
  executionId: string,
  options: { dataDir?: string; pid?: number } = {}
): Promise<void> {
  const { dataDir, pid = process.pid } = options;
  const existing = await readRunLock(dataDir);
  if (!existing || existing.pid !== pid) {
    return;
  }
  await atomicWriteJson(getRunLockPath(dataDir), { ...existing, executionId });
}

/**
 * Release the lock if this process holds it.
 *
 * @returns true if a lock was removed
 */
export async function releaseRunLock(
  options: { dataDir?: string; pid?: number } = {}
): Promise<boolean> {
  const { dataDir, pid = process.pid } = options;
  const existing = await readRunLock(dataDir);
  if (!existing || existing.pid !== pid) {
    return false;
  }
  await removeIfExists(getRunLockPath(dataDir));
  await removeIfExists(getStopRequestPath(dataDir));
  return true;
}

// ============================================================================
// Stop Requests
// ============================================================================

/**
 * Ask the process holding the lock to pause at its next checkpoint.
 *
 * @throws NoActiveExecutionError if no live process holds the lock
 */
export async function requestStop(reason: string, dataDir?: string): Promise<StopRequest> {
  const lock = await readRunLock(dataDir);
  if (!lock) {
    throw new NoActiveExecutionError('No analysis is currently running');
  }

  const request: StopRequest = {
    reason,
    requestedAt: new Date().toISOString(),
    pid: lock.pid,
  };
  await atomicWriteJson(getStopRequestPath(dataDir), request);
  return request;
}

/**
 * Consume a pending stop request, if any.
 */
export async function takeStopRequest(dataDir?: string): Promise<StopRequest | undefined> {
  const requestPath = getStopRequestPath(dataDir);
  let raw: unknown;
  try {
    raw = await readJsonIfExists(requestPath);
  } catch {
    raw = { reason: 'Stop requested', requestedAt: new Date().toISOString(), pid: process.pid };
  }
  if (raw === undefined) {
    return undefined;
  }

  await removeIfExists(requestPath);
  const parsed = StopRequestSchema.safeParse(raw);
  return parsed.success
    ? parsed.data
    : { reason: 'Stop requested', requestedAt: new Date().toISOString(), pid: process.pid };
}
