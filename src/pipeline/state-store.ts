/**
 * Execution State Store
 *
 * Durable record of every Execution plus the transitions that move one
 * through its lifecycle. Every mutating operation works on the execution
 * held by the caller's ExecutionSlot and checkpoints it before returning,
 * so whatever a caller observes after an await is already on disk.
 *
 * Lifecycle:
 * ```
 * pending -> running -> (paused <-> running)* -> completed | failed
 * ```
 *
 * @module pipeline/state-store
 */

import {
  EXECUTION_HISTORY_LIMIT,
  ExecutionInputSchema,
  RESUMABLE_STATUSES,
  SCHEMA_VERSIONS,
  normalizeEntityKey,
  summarizeExecution,
  type Execution,
  type ExecutionEvent,
  type ExecutionEventType,
  type ExecutionInput,
  type ExecutionSummary,
} from '../schemas/index.js';
import type { RecordStore } from '../storage/record-store.js';
import { AlreadyCompletedError, ExecutionNotFoundError } from './errors.js';
import type { ExecutionSlot } from './execution-slot.js';
import { generateExecutionId } from './ids.js';
import { silentLogger, type Logger } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ExecutionStateStoreOptions {
  records: RecordStore<Execution>;
  /** Injectable clock for deterministic timestamps in tests */
  clock?: () => Date;
  logger?: Logger;
}

export interface HistoryQuery {
  type?: ExecutionEventType;
  /** Most recent events to return (default: 50) */
  limit?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Store
// ============================================================================

export class ExecutionStateStore {
  private readonly records: RecordStore<Execution>;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: ExecutionStateStoreOptions) {
    this.records = options.records;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  // ==========================================================================
  // Creation
  // ==========================================================================

  /**
   * Allocate and persist a new `pending` execution with no stage results.
   */
  async create(input: ExecutionInput): Promise<Execution> {
    const parsed = ExecutionInputSchema.parse(input);
    const existing = await this.records.list();
    const now = this.clock();

    const execution: Execution = {
      schemaVersion: SCHEMA_VERSIONS.execution,
      id: generateExecutionId(
        parsed.entity,
        existing.map((record) => record.id),
        now
      ),
      input: parsed,
      entityKey: normalizeEntityKey(parsed.entity),
      status: 'pending',
      stageResults: {},
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
      history: [],
    };
    this.logEvent(execution, 'execution_created');

    await this.records.put(execution.id, execution);
    this.logger.debug(`Created execution ${execution.id}`);
    return structuredClone(execution);
  }

  // ==========================================================================
  // Transitions on the current execution
  // ==========================================================================

  /**
   * Mark the slot's execution `running`.
   */
  async startExecution(slot: ExecutionSlot): Promise<void> {
    const execution = this.mutable(slot);
    execution.status = 'running';
    delete execution.error;
    this.logEvent(execution, 'execution_started');
    await this.checkpoint(execution);
  }

  /**
   * Mark a stage `running`. Checkpoints before the stage function is
   * invoked, so an interruption during the call is visible on reload.
   */
  async startStage(slot: ExecutionSlot, stage: string): Promise<void> {
    const execution = this.mutable(slot);
    const previous = execution.stageResults[stage];
    const attempts = (previous?.attempts ?? 0) + 1;

    execution.stageResults[stage] = {
      status: 'running',
      attempts,
      startedAt: this.clock().toISOString(),
    };
    this.logEvent(execution, 'stage_started', stage, `attempt ${attempts}`);
    await this.checkpoint(execution);
  }

  /**
   * Attach intermediate output to a running stage.
   *
   * @throws Error if the stage is not running
   */
  async recordPartial(slot: ExecutionSlot, stage: string, data: unknown): Promise<void> {
    const execution = this.mutable(slot);
    const record = execution.stageResults[stage];

    if (!record || record.status !== 'running') {
      throw new Error(`Cannot record partial data: stage ${stage} is not running`);
    }

    record.data = structuredClone(data);
    await this.checkpoint(execution);
  }

  async completeStage(slot: ExecutionSlot, stage: string, data: unknown): Promise<void> {
    const execution = this.mutable(slot);
    const previous = execution.stageResults[stage];

    execution.stageResults[stage] = {
      status: 'completed',
      data: structuredClone(data),
      attempts: previous?.attempts ?? 0,
      ...(previous?.startedAt ? { startedAt: previous.startedAt } : {}),
      finishedAt: this.clock().toISOString(),
    };
    this.logEvent(execution, 'stage_completed', stage);
    await this.checkpoint(execution);
  }

  /**
   * Mark a stage `failed`. Partial data committed before the failure is kept.
   */
  async failStage(slot: ExecutionSlot, stage: string, error: string): Promise<void> {
    const execution = this.mutable(slot);
    const previous = execution.stageResults[stage];

    execution.stageResults[stage] = {
      status: 'failed',
      ...(previous?.data !== undefined ? { data: previous.data } : {}),
      error,
      attempts: previous?.attempts ?? 0,
      ...(previous?.startedAt ? { startedAt: previous.startedAt } : {}),
      finishedAt: this.clock().toISOString(),
    };
    this.logEvent(execution, 'stage_failed', stage, error);
    await this.checkpoint(execution);
  }

  /**
   * Pause the slot's execution, recording why.
   *
   * Leaves the slot loaded: the paused execution stays current until the
   * owner clears it or loads another.
   *
   * @throws NoActiveExecutionError when the slot is empty
   */
  async pauseExecution(slot: ExecutionSlot, reason: string): Promise<Execution> {
    const execution = this.mutable(slot);
    execution.status = 'paused';
    execution.error = reason;
    this.logEvent(execution, 'execution_paused', undefined, reason);
    await this.checkpoint(execution);
    return structuredClone(execution);
  }

  /**
   * Load a stored execution into the slot for resumption.
   *
   * The slot receives a deep copy, so nothing done to the resumed run can
   * reach the stored checkpoint except through a later checkpoint write.
   *
   * @throws ExecutionNotFoundError for unknown ids
   * @throws AlreadyCompletedError for completed executions (nothing is mutated)
   */
  async resumeExecution(slot: ExecutionSlot, executionId: string): Promise<Execution> {
    const stored = await this.records.get(executionId);
    if (!stored) {
      throw new ExecutionNotFoundError(executionId);
    }
    if (stored.status === 'completed') {
      throw new AlreadyCompletedError(stored.id);
    }

    slot.clear();
    const execution = slot.load(stored);
    execution.status = 'running';
    delete execution.error;
    this.logEvent(execution, 'execution_resumed');
    await this.checkpoint(execution);
    return execution;
  }

  async completeExecution(slot: ExecutionSlot): Promise<Execution> {
    const execution = this.mutable(slot);
    execution.status = 'completed';
    execution.completedAt = this.clock().toISOString();
    delete execution.error;
    this.logEvent(execution, 'execution_completed');
    await this.checkpoint(execution);
    return structuredClone(execution);
  }

  async failExecution(slot: ExecutionSlot, error: string): Promise<Execution> {
    const execution = this.mutable(slot);
    execution.status = 'failed';
    execution.error = error;
    this.logEvent(execution, 'execution_failed', undefined, error);
    await this.checkpoint(execution);
    return structuredClone(execution);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async get(executionId: string): Promise<Execution | undefined> {
    return this.records.get(executionId);
  }

  /**
   * The most recent lifecycle events of one execution, oldest first.
   *
   * @throws ExecutionNotFoundError for unknown ids
   */
  async history(executionId: string, query: HistoryQuery = {}): Promise<ExecutionEvent[]> {
    const execution = await this.records.get(executionId);
    if (!execution) {
      throw new ExecutionNotFoundError(executionId);
    }

    const events = query.type
      ? execution.history.filter((event) => event.type === query.type)
      : execution.history;
    return events.slice(-(query.limit ?? 50));
  }

  /**
   * Every stored execution, newest first.
   */
  async list(): Promise<ExecutionSummary[]> {
    const executions = await this.records.list();
    return executions.sort(compareNewestFirst).map(summarizeExecution);
  }

  /**
   * Full records of completed executions, newest first.
   */
  async listCompleted(): Promise<Execution[]> {
    const executions = await this.records.list();
    return executions
      .filter((execution) => execution.status === 'completed')
      .sort(compareNewestFirst);
  }

  /**
   * Executions that can be resumed, newest first. A `running` execution
   * found here was left behind by a process that exited without pausing.
   */
  async listResumable(): Promise<ExecutionSummary[]> {
    const all = await this.list();
    return all.filter((summary) => RESUMABLE_STATUSES.includes(summary.status));
  }

  /**
   * Look up an execution by id, or by 1-based ordinal into `listResumable()`.
   *
   * @throws ExecutionNotFoundError
   */
  async resolve(reference: string): Promise<Execution> {
    const ref = reference.trim();

    if (/^\d+$/.test(ref)) {
      const ordinal = Number.parseInt(ref, 10);
      const resumable = await this.listResumable();
      const summary = ordinal >= 1 ? resumable[ordinal - 1] : undefined;
      if (!summary) {
        throw new ExecutionNotFoundError(ref);
      }
      this.logger.debug(`Resolved ordinal ${ordinal} to ${summary.id}`);
      const execution = await this.records.get(summary.id);
      if (!execution) {
        throw new ExecutionNotFoundError(summary.id);
      }
      return execution;
    }

    const execution = await this.records.get(ref);
    if (!execution) {
      throw new ExecutionNotFoundError(ref);
    }
    return execution;
  }

  // ==========================================================================
  // Housekeeping
  // ==========================================================================

  /**
   * Remove completed executions that finished more than `olderThanDays` ago.
   *
   * @returns Ids of removed executions
   */
  async prune(olderThanDays: number): Promise<string[]> {
    const cutoff = this.clock().getTime() - olderThanDays * DAY_MS;
    const executions = await this.records.list();
    const removed: string[] = [];

    for (const execution of executions) {
      if (
        execution.status === 'completed' &&
        execution.completedAt !== undefined &&
        Date.parse(execution.completedAt) < cutoff
      ) {
        await this.records.delete(execution.id);
        removed.push(execution.id);
      }
    }

    if (removed.length > 0) {
      this.logger.info(`Pruned ${removed.length} completed execution(s)`);
    }
    return removed;
  }

  async delete(executionId: string): Promise<boolean> {
    return this.records.delete(executionId);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * The slot's execution, provided it may still change.
   */
  private mutable(slot: ExecutionSlot): Execution {
    const execution = slot.require();
    if (execution.status === 'completed') {
      throw new AlreadyCompletedError(execution.id);
    }
    return execution;
  }

  private logEvent(
    execution: Execution,
    type: ExecutionEventType,
    stage?: string,
    detail?: string
  ): void {
    execution.history.push({
      type,
      at: this.clock().toISOString(),
      ...(stage !== undefined ? { stage } : {}),
      ...(detail !== undefined ? { detail } : {}),
    });
    if (execution.history.length > EXECUTION_HISTORY_LIMIT) {
      execution.history.splice(0, execution.history.length - EXECUTION_HISTORY_LIMIT);
    }
  }

  private async checkpoint(execution: Execution): Promise<void> {
    execution.updatedAt = this.clock().toISOString();
    await this.records.put(execution.id, execution);
  }
}

function compareNewestFirst(a: Execution, b: Execution): number {
  if (a.updatedAt !== b.updatedAt) {
    return a.updatedAt < b.updatedAt ? 1 : -1;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? 1 : -1;
}
