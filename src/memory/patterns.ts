/**
 * Pattern Memory
 *
 * Aggregate outcome statistics per stage and entity bucket. Buckets come
 * from the entity's recorded company size, so a stage that struggles with
 * enterprises does not skew the numbers for small companies.
 *
 * @module memory/patterns
 */

import { SCHEMA_VERSIONS, type PatternStat } from '../schemas/index.js';
import type { RecordStore } from '../storage/record-store.js';

// ============================================================================
// Buckets
// ============================================================================

export const SIZE_BUCKETS = ['small', 'medium', 'large', 'enterprise'] as const;

export type SizeBucket = (typeof SIZE_BUCKETS)[number];

export const UNKNOWN_BUCKET = 'unknown';

/**
 * Bucket for a recorded `size` fact; anything unrecognized is `unknown`.
 */
export function bucketForSize(size: unknown): string {
  if (typeof size !== 'string') {
    return UNKNOWN_BUCKET;
  }
  const normalized = size.trim().toLowerCase();
  return SIZE_BUCKETS.find((bucket) => bucket === normalized) ?? UNKNOWN_BUCKET;
}

export function patternKey(stage: string, bucket: string): string {
  return `${stage}__${bucket}`;
}

// ============================================================================
// Types
// ============================================================================

export interface StageOutcome {
  success: boolean;
  durationMs: number;
  error?: string;
}

export interface PatternHint {
  stage: string;
  bucket: string;
  samples: number;
  /** 0..1 */
  successRate: number;
  averageDurationMs: number;
  lastError?: string;
  /** One-line summary for the context bundle */
  text: string;
}

/**
 * Summarize a statistic as a hint.
 *
 * @example
 * // 'roles (large): 3/4 runs succeeded (75%), avg 1.2s; last error: timeout'
 */
export function describePattern(stat: PatternStat): PatternHint {
  const samples = stat.successes + stat.failures;
  const successRate = samples === 0 ? 0 : stat.successes / samples;
  const averageDurationMs = samples === 0 ? 0 : stat.totalDurationMs / samples;

  let text =
    `${stat.stage} (${stat.bucket}): ${stat.successes}/${samples} runs succeeded ` +
    `(${Math.round(successRate * 100)}%), avg ${(averageDurationMs / 1000).toFixed(1)}s`;
  if (stat.lastError) {
    text += `; last error: ${stat.lastError}`;
  }

  return {
    stage: stat.stage,
    bucket: stat.bucket,
    samples,
    successRate,
    averageDurationMs,
    lastError: stat.lastError,
    text,
  };
}

// ============================================================================
// Pattern Tier
// ============================================================================

export interface PatternMemoryOptions {
  store: RecordStore<PatternStat>;
  clock?: () => Date;
}

export class PatternMemory {
  private readonly store: RecordStore<PatternStat>;
  private readonly clock: () => Date;

  constructor(options: PatternMemoryOptions) {
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
  }

  async record(stage: string, bucket: string, outcome: StageOutcome): Promise<PatternStat> {
    const key = patternKey(stage, bucket);
    const existing = await this.store.get(key);

    const stat: PatternStat = {
      schemaVersion: SCHEMA_VERSIONS.patternStat,
      stage,
      bucket,
      successes: (existing?.successes ?? 0) + (outcome.success ? 1 : 0),
      failures: (existing?.failures ?? 0) + (outcome.success ? 0 : 1),
      totalDurationMs: (existing?.totalDurationMs ?? 0) + Math.max(0, outcome.durationMs),
      lastError: outcome.success ? existing?.lastError : outcome.error,
      updatedAt: this.clock().toISOString(),
    };

    await this.store.put(key, stat);
    return stat;
  }

  async get(stage: string, bucket: string): Promise<PatternStat | undefined> {
    return this.store.get(patternKey(stage, bucket));
  }

  async hint(stage: string, bucket: string): Promise<PatternHint | undefined> {
    const stat = await this.get(stage, bucket);
    return stat ? describePattern(stat) : undefined;
  }

  async list(): Promise<PatternStat[]> {
    return this.store.list();
  }
}
