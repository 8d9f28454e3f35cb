/**
 * Long-Term Memory
 *
 * Durable facts about entities, kept as an append-only record history per
 * entity. Readers see a "current view": the newest value of each point fact
 * and the accumulated union of each collection fact.
 *
 * @module memory/long-term
 */

import {
  EntityMemorySchema,
  SCHEMA_VERSIONS,
  clampImportance,
  type EntityMemory,
  type FactKind,
  type FactRecord,
} from '../schemas/index.js';
import type { RecordStore } from '../storage/record-store.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A fact as a stage or caller hands it in.
 */
export interface FactInput {
  key: string;
  /** Defaults to `point` */
  kind?: FactKind;
  value: unknown;
  /** 1-10, defaults to 5 */
  importance?: number;
}

/**
 * Where a batch of facts came from.
 */
export interface FactSource {
  executionId?: string;
  stage?: string;
  /** Name to store when the entity is first seen */
  displayName?: string;
}

/**
 * The effective value of one fact key.
 */
export interface CurrentFact {
  key: string;
  kind: FactKind;
  value: unknown;
  importance: number;
  /** When the value last changed */
  recordedAt: string;
}

const DEFAULT_IMPORTANCE = 5;

// ============================================================================
// Current View
// ============================================================================

function itemsOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Fold an append-only history into its current view.
 *
 * Records are applied in append order. A point record replaces whatever the
 * key held; a collection record adds the items not already present. A kind
 * change on a key starts it over.
 */
export function computeCurrentView(records: readonly FactRecord[]): CurrentFact[] {
  const view = new Map<string, CurrentFact>();

  for (const record of records) {
    const existing = view.get(record.key);

    if (record.kind === 'point' || existing === undefined || existing.kind !== 'collection') {
      view.set(record.key, {
        key: record.key,
        kind: record.kind,
        value: record.kind === 'collection' ? dedupeItems(itemsOf(record.value)) : record.value,
        importance: record.importance,
        recordedAt: record.recordedAt,
      });
      continue;
    }

    const merged = dedupeItems([...itemsOf(existing.value), ...itemsOf(record.value)]);
    view.set(record.key, {
      ...existing,
      value: merged,
      importance: Math.max(existing.importance, record.importance),
      recordedAt:
        record.recordedAt > existing.recordedAt ? record.recordedAt : existing.recordedAt,
    });
  }

  return Array.from(view.values());
}

function dedupeItems(items: unknown[]): unknown[] {
  const seen = new Set<string>();
  const result: unknown[] = [];
  for (const item of items) {
    const fingerprint = JSON.stringify(item) ?? String(item);
    if (!seen.has(fingerprint)) {
      seen.add(fingerprint);
      result.push(item);
    }
  }
  return result;
}

/**
 * Recall order: newest first, then most important, then key.
 */
export function rankFacts(facts: readonly CurrentFact[]): CurrentFact[] {
  return [...facts].sort((a, b) => {
    if (a.recordedAt !== b.recordedAt) {
      return a.recordedAt < b.recordedAt ? 1 : -1;
    }
    if (a.importance !== b.importance) {
      return b.importance - a.importance;
    }
    return a.key.localeCompare(b.key);
  });
}

/**
 * Human-readable rendering of a fact value.
 */
export function formatFactValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => formatFactValue(item)).join(', ');
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * The `key: value` line a fact occupies in a context bundle.
 */
export function renderFactLine(fact: Pick<CurrentFact, 'key' | 'value'>): string {
  return `${fact.key}: ${formatFactValue(fact.value)}`;
}

// ============================================================================
// Long-Term Tier
// ============================================================================

export interface LongTermMemoryOptions {
  store: RecordStore<EntityMemory>;
  clock?: () => Date;
}

export class LongTermMemory {
  private readonly store: RecordStore<EntityMemory>;
  private readonly clock: () => Date;

  constructor(options: LongTermMemoryOptions) {
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Append facts to an entity's history.
   *
   * @returns The records that were written
   */
  async append(
    entityKey: string,
    facts: readonly FactInput[],
    source: FactSource = {}
  ): Promise<FactRecord[]> {
    if (facts.length === 0) {
      return [];
    }

    const now = this.clock().toISOString();
    const memory: EntityMemory = (await this.store.get(entityKey)) ?? {
      schemaVersion: SCHEMA_VERSIONS.entityMemory,
      entityKey,
      displayName: source.displayName ?? entityKey,
      records: [],
      updatedAt: now,
    };

    const written: FactRecord[] = facts.map((fact) => {
      if (fact.key.trim().length === 0) {
        throw new Error(`Fact key must not be empty (entity ${entityKey})`);
      }
      const kind = fact.kind ?? 'point';
      return {
        key: fact.key,
        kind,
        value: kind === 'collection' ? itemsOf(fact.value) : fact.value,
        importance: clampImportance(fact.importance ?? DEFAULT_IMPORTANCE),
        recordedAt: now,
        executionId: source.executionId,
        stage: source.stage,
      };
    });

    memory.records.push(...written);
    memory.updatedAt = now;
    if (source.displayName) {
      memory.displayName = source.displayName;
    }

    await this.store.put(entityKey, EntityMemorySchema.parse(memory));
    return written;
  }

  async currentView(entityKey: string): Promise<CurrentFact[]> {
    const memory = await this.store.get(entityKey);
    return memory ? computeCurrentView(memory.records) : [];
  }

  /**
   * Current value of one key, or undefined if never recorded.
   */
  async currentValue(entityKey: string, key: string): Promise<unknown> {
    const view = await this.currentView(entityKey);
    return view.find((fact) => fact.key === key)?.value;
  }

  async get(entityKey: string): Promise<EntityMemory | undefined> {
    return this.store.get(entityKey);
  }

  async list(): Promise<EntityMemory[]> {
    return this.store.list();
  }

  /**
   * Remove everything known about an entity.
   *
   * @returns true if the entity had any memory
   */
  async forget(entityKey: string): Promise<boolean> {
    return this.store.delete(entityKey);
  }
}
