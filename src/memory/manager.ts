/**
 * Memory Manager
 *
 * Single entry point to the three memory tiers:
 * - working: high-detail events for the active run, bounded, never persisted
 * - long-term: durable facts per entity with append-only history
 * - patterns: outcome statistics per stage and entity bucket
 *
 * At run end, working entries at or above the promotion threshold are
 * folded into long-term memory as the `notable_events` collection; the rest
 * are discarded.
 *
 * @module memory/manager
 */

import type { EntityMemory, FactRecord, PatternStat, WorkingEntry } from '../schemas/index.js';
import type { RecordStore } from '../storage/record-store.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { WorkingMemory, formatWorkingEntry } from './working.js';
import {
  LongTermMemory,
  rankFacts,
  renderFactLine,
  type CurrentFact,
  type FactInput,
  type FactSource,
} from './long-term.js';
import {
  PatternMemory,
  bucketForSize,
  type PatternHint,
  type StageOutcome,
} from './patterns.js';

// ============================================================================
// Types
// ============================================================================

export interface MemorySettings {
  /** Working entries kept before eviction */
  workingMemoryLimit: number;
  /** Working entries at or above this importance survive the run */
  promoteThreshold: number;
}

export const DEFAULT_MEMORY_SETTINGS: MemorySettings = {
  workingMemoryLimit: 20,
  promoteThreshold: 8,
};

/** Collection fact that receives promoted working entries */
export const NOTABLE_EVENTS_KEY = 'notable_events';

export interface MemoryManagerOptions {
  entities: RecordStore<EntityMemory>;
  patterns: RecordStore<PatternStat>;
  settings?: Partial<MemorySettings>;
  clock?: () => Date;
  logger?: Logger;
}

export interface RecallBudget {
  maxItems?: number;
  maxChars?: number;
}

export interface RecalledFact extends CurrentFact {
  /** Rendered `key: value` line; its length is the fact's budget cost */
  line: string;
}

export interface EntityDescription {
  entityKey: string;
  displayName: string;
  facts: CurrentFact[];
  /** Number of records in the append-only history */
  recordCount: number;
  updatedAt: string;
}

export interface MemoryStats {
  entities: number;
  patterns: number;
  workingEntries: number;
}

interface ActiveRun {
  executionId: string;
  entityKey: string;
  displayName?: string;
}

// ============================================================================
// Manager
// ============================================================================

export class MemoryManager {
  private readonly working: WorkingMemory;
  private readonly longTerm: LongTermMemory;
  private readonly patterns: PatternMemory;
  private readonly settings: MemorySettings;
  private readonly logger: Logger;
  private activeRun: ActiveRun | undefined;

  constructor(options: MemoryManagerOptions) {
    this.settings = { ...DEFAULT_MEMORY_SETTINGS, ...options.settings };
    this.logger = options.logger ?? silentLogger;
    this.working = new WorkingMemory({
      limit: this.settings.workingMemoryLimit,
      clock: options.clock,
    });
    this.longTerm = new LongTermMemory({ store: options.entities, clock: options.clock });
    this.patterns = new PatternMemory({ store: options.patterns, clock: options.clock });
  }

  // --------------------------------------------------------------------------
  // Working tier
  // --------------------------------------------------------------------------

  /**
   * Start a fresh working tier for a run. Anything left from a previous run
   * that never ended is discarded.
   */
  beginRun(executionId: string, entityKey: string, displayName?: string): void {
    if (this.working.size > 0) {
      this.logger.debug(`Discarding ${this.working.size} working entries from an unfinished run`);
    }
    this.working.clear();
    this.activeRun = { executionId, entityKey, displayName };
  }

  rememberWorking(
    eventType: string,
    payload: Record<string, unknown>,
    importance: number
  ): WorkingEntry {
    return this.working.add(eventType, payload, importance);
  }

  workingEntries(): WorkingEntry[] {
    return this.working.list();
  }

  /**
   * Promote notable working entries and clear the tier.
   *
   * @returns The long-term records written, empty if nothing qualified
   */
  async endRun(): Promise<FactRecord[]> {
    const run = this.activeRun;
    const notable = this.working.atLeast(this.settings.promoteThreshold);
    this.working.clear();
    this.activeRun = undefined;

    if (!run || notable.length === 0) {
      return [];
    }

    return this.longTerm.append(
      run.entityKey,
      [
        {
          key: NOTABLE_EVENTS_KEY,
          kind: 'collection',
          value: notable.map(formatWorkingEntry),
          importance: Math.max(...notable.map((entry) => entry.importance)),
        },
      ],
      { executionId: run.executionId, displayName: run.displayName }
    );
  }

  get currentRun(): Readonly<ActiveRun> | undefined {
    return this.activeRun;
  }

  // --------------------------------------------------------------------------
  // Long-term tier
  // --------------------------------------------------------------------------

  async rememberLongTerm(
    entityKey: string,
    facts: FactInput | readonly FactInput[],
    source: FactSource = {}
  ): Promise<FactRecord[]> {
    const list: readonly FactInput[] = isFactList(facts) ? facts : [facts];
    const displayName =
      source.displayName ??
      (this.activeRun?.entityKey === entityKey ? this.activeRun.displayName : undefined);
    return this.longTerm.append(entityKey, list, { ...source, displayName });
  }

  /**
   * Current-view facts in recall order, cut to the longest prefix that fits
   * both budgets.
   */
  async recall(entityKey: string, budget: RecallBudget = {}): Promise<RecalledFact[]> {
    const ranked = rankFacts(await this.longTerm.currentView(entityKey));
    const recalled: RecalledFact[] = [];
    let usedChars = 0;

    for (const fact of ranked) {
      if (budget.maxItems !== undefined && recalled.length >= budget.maxItems) {
        break;
      }
      const line = renderFactLine(fact);
      if (budget.maxChars !== undefined && usedChars + line.length > budget.maxChars) {
        break;
      }
      recalled.push({ ...fact, line });
      usedChars += line.length;
    }

    return recalled;
  }

  async forget(entityKey: string): Promise<boolean> {
    return this.longTerm.forget(entityKey);
  }

  async describeEntity(entityKey: string): Promise<EntityDescription | undefined> {
    const memory = await this.longTerm.get(entityKey);
    if (!memory) {
      return undefined;
    }
    const view = await this.longTerm.currentView(entityKey);
    return {
      entityKey: memory.entityKey,
      displayName: memory.displayName,
      facts: rankFacts(view),
      recordCount: memory.records.length,
      updatedAt: memory.updatedAt,
    };
  }

  // --------------------------------------------------------------------------
  // Pattern tier
  // --------------------------------------------------------------------------

  async bucketFor(entityKey: string): Promise<string> {
    return bucketForSize(await this.longTerm.currentValue(entityKey, 'size'));
  }

  async recordOutcome(
    entityKey: string,
    stage: string,
    outcome: StageOutcome
  ): Promise<PatternStat> {
    return this.patterns.record(stage, await this.bucketFor(entityKey), outcome);
  }

  async patternHints(entityKey: string, stage: string): Promise<PatternHint[]> {
    const hint = await this.patterns.hint(stage, await this.bucketFor(entityKey));
    return hint ? [hint] : [];
  }

  async stats(): Promise<MemoryStats> {
    const [entities, patterns] = await Promise.all([this.longTerm.list(), this.patterns.list()]);
    return {
      entities: entities.length,
      patterns: patterns.length,
      workingEntries: this.working.size,
    };
  }
}

function isFactList(facts: FactInput | readonly FactInput[]): facts is readonly FactInput[] {
  return Array.isArray(facts);
}
