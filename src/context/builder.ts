/**
 * Context Builder
 *
 * Assembles the size-bounded context handed to each stage. Sources fill a
 * single character budget in strict priority order:
 *
 * 1. results of the current run, latest stage first
 * 2. recalled long-term facts about the entity
 * 3. pattern hints for the stage
 *
 * Within a source the builder stops at the first item that does not fit.
 *
 * @module context/builder
 */

import type { MemoryManager } from '../memory/manager.js';
import { silentLogger, type Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export type ContextSource = 'current-run' | 'fact' | 'hint';

export interface ContextItem {
  source: ContextSource;
  label: string;
  text: string;
}

/**
 * Output of a stage that already ran in this execution.
 */
export interface CompletedStage {
  stage: string;
  data: unknown;
}

export interface ContextBundle {
  entityKey: string;
  /** Stage the bundle was built for */
  stage: string;
  /** In stage order */
  currentRun: ContextItem[];
  /** In recall order */
  facts: ContextItem[];
  hints: ContextItem[];
  usedChars: number;
  budgetChars: number;
  /** True if any current-run item was cut short */
  truncated: boolean;
}

export interface ContextBuilderOptions {
  memory: MemoryManager;
  /** Total characters across all items */
  budgetChars: number;
  /** Maximum long-term facts per bundle */
  recallLimit?: number;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

export const TRUNCATION_MARKER = '…[truncated]';

/** Below this much remaining budget an oversized result is dropped, not cut */
export const MIN_TRUNCATION_ROOM = 64;

const DEFAULT_RECALL_LIMIT = 25;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Budget cost of an item: the length of its rendered `label: text` line.
 */
export function itemCost(item: Pick<ContextItem, 'label' | 'text'>): number {
  return item.label.length + 2 + item.text.length;
}

/**
 * Text form of a stage result.
 */
export function serializeStageData(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  return JSON.stringify(data) ?? 'null';
}

/**
 * An empty bundle, for stages invoked outside a memory-backed run.
 */
export function emptyContextBundle(entityKey: string, stage: string, budgetChars = 0): ContextBundle {
  return {
    entityKey,
    stage,
    currentRun: [],
    facts: [],
    hints: [],
    usedChars: 0,
    budgetChars,
    truncated: false,
  };
}

// ============================================================================
// Builder
// ============================================================================

export class ContextBuilder {
  private readonly memory: MemoryManager;
  private readonly budgetChars: number;
  private readonly recallLimit: number;
  private readonly logger: Logger;

  constructor(options: ContextBuilderOptions) {
    if (options.budgetChars < 0) {
      throw new Error(`Context budget must not be negative, got ${options.budgetChars}`);
    }
    this.memory = options.memory;
    this.budgetChars = options.budgetChars;
    this.recallLimit = options.recallLimit ?? DEFAULT_RECALL_LIMIT;
    this.logger = options.logger ?? silentLogger;
  }

  async build(
    entityKey: string,
    stage: string,
    completed: readonly CompletedStage[]
  ): Promise<ContextBundle> {
    const bundle = emptyContextBundle(entityKey, stage, this.budgetChars);
    let remaining = this.budgetChars;

    // 1. Current run, newest first, then presented in stage order
    const taken: ContextItem[] = [];
    for (let i = completed.length - 1; i >= 0; i--) {
      const item: ContextItem = {
        source: 'current-run',
        label: completed[i].stage,
        text: serializeStageData(completed[i].data),
      };
      const cost = itemCost(item);

      if (cost <= remaining) {
        taken.push(item);
        remaining -= cost;
        continue;
      }

      if (remaining >= MIN_TRUNCATION_ROOM) {
        const room = remaining - itemCost({ label: item.label, text: '' }) - TRUNCATION_MARKER.length;
        if (room > 0) {
          const cut: ContextItem = { ...item, text: item.text.slice(0, room) + TRUNCATION_MARKER };
          taken.push(cut);
          remaining -= itemCost(cut);
          bundle.truncated = true;
        }
      }
      break;
    }
    bundle.currentRun = taken.reverse();

    // 2. Long-term facts
    const facts = await this.memory.recall(entityKey, {
      maxItems: this.recallLimit,
      maxChars: remaining,
    });
    for (const fact of facts) {
      const item: ContextItem = {
        source: 'fact',
        label: fact.key,
        text: fact.line.slice(fact.key.length + 2),
      };
      bundle.facts.push(item);
      remaining -= itemCost(item);
    }

    // 3. Pattern hints
    const hints = await this.memory.patternHints(entityKey, stage);
    for (const hint of hints) {
      const item: ContextItem = { source: 'hint', label: 'pattern', text: hint.text };
      const cost = itemCost(item);
      if (cost > remaining) {
        break;
      }
      bundle.hints.push(item);
      remaining -= cost;
    }

    bundle.usedChars = this.budgetChars - remaining;
    this.logger.debug(
      `Context for ${stage}: ${bundle.currentRun.length} results, ${bundle.facts.length} facts, ` +
        `${bundle.hints.length} hints (${bundle.usedChars}/${this.budgetChars} chars)`
    );
    return bundle;
  }
}
