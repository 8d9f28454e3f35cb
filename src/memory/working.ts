/**
 * Working Memory
 *
 * High-detail events for the run in progress. Bounded: once over its
 * limit, the least important entry is evicted, oldest first among equals.
 *
 * @module memory/working
 */

import { clampImportance, type WorkingEntry } from '../schemas/index.js';

export interface WorkingMemoryOptions {
  /** Maximum entries kept */
  limit: number;
  clock?: () => Date;
}

export class WorkingMemory {
  private entries: WorkingEntry[] = [];
  private readonly limit: number;
  private readonly clock: () => Date;

  constructor(options: WorkingMemoryOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new Error(`Working memory limit must be a positive integer, got ${options.limit}`);
    }
    this.limit = options.limit;
    this.clock = options.clock ?? (() => new Date());
  }

  add(eventType: string, payload: Record<string, unknown>, importance: number): WorkingEntry {
    const entry: WorkingEntry = {
      eventType,
      payload: structuredClone(payload),
      importance: clampImportance(importance),
      timestamp: this.clock().toISOString(),
    };
    this.entries.push(entry);
    this.evict();
    return entry;
  }

  /**
   * Entries in the order they were recorded.
   */
  list(): WorkingEntry[] {
    return structuredClone(this.entries);
  }

  /**
   * Entries at or above an importance threshold, in recorded order.
   */
  atLeast(threshold: number): WorkingEntry[] {
    return structuredClone(this.entries.filter((entry) => entry.importance >= threshold));
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }

  private evict(): void {
    while (this.entries.length > this.limit) {
      let victim = 0;
      for (let i = 1; i < this.entries.length; i++) {
        // Strictly lower wins, so ties keep the earliest (oldest) index
        if (this.entries[i].importance < this.entries[victim].importance) {
          victim = i;
        }
      }
      this.entries.splice(victim, 1);
    }
  }
}

/**
 * One-line rendering of a working entry, used when it is promoted.
 */
export function formatWorkingEntry(entry: WorkingEntry): string {
  const payload = Object.keys(entry.payload).length > 0 ? ` ${JSON.stringify(entry.payload)}` : '';
  return `${entry.eventType}${payload}`;
}
