/**
 * Pipeline Orchestrator
 *
 * Runs the registered stages of one execution in order, checkpointing every
 * transition, and turns stop requests into resumable pauses.
 *
 * Key features:
 * - Stage start is checkpointed before the stage body is invoked
 * - Stage failures follow each stage's policy (abort or continue)
 * - Stops are cooperative: observed between stages and through the
 *   invocation's signal and `throwIfStopped()`
 * - Resume restores partial data, re-runs empty checkpoints and skips
 *   completed stages
 * - Memory is fed stage outcomes and facts; memory errors only warn
 *
 * @module pipeline/orchestrator
 */

import type { Execution, ExecutionInput } from '../schemas/index.js';
import {
  emptyContextBundle,
  type CompletedStage,
  type ContextBuilder,
  type ContextBundle,
} from '../context/builder.js';
import type { MemoryManager } from '../memory/manager.js';
import { NoActiveExecutionError, StageFailure, StopRequestedError } from './errors.js';
import { nullEventSink, type EventSink, type PipelineEvent } from './events.js';
import { ExecutionSlot } from './execution-slot.js';
import type { StageRegistry } from './registry.js';
import { describeStep, planResume, type ResumeStep } from './resume.js';
import type { ExecutionStateStore } from './state-store.js';
import { silentLogger, type Logger, type StageDefinition, type StageInvocation } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineOrchestratorOptions {
  registry: StageRegistry;
  store: ExecutionStateStore;
  /** Without memory, stages receive empty context bundles */
  memory?: MemoryManager;
  contextBuilder?: ContextBuilder;
  sink?: EventSink;
  logger?: Logger;
  clock?: () => Date;
}

type StageOutcome =
  | { kind: 'completed'; data: unknown }
  | { kind: 'stopped'; execution: Execution }
  | { kind: 'aborted'; execution: Execution };

/** Default reason recorded when `stop()` is called without one */
export const DEFAULT_STOP_REASON = 'Stopped by user';

/**
 * Importance of the working-memory entries the orchestrator records.
 * Failures and interruptions clear the default promotion threshold.
 */
const IMPORTANCE = {
  stageCompleted: 4,
  stageRestored: 5,
  stageFailed: 8,
  stageInterrupted: 8,
  runFailed: 9,
} as const;

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Drives one execution at a time through the stage registry.
 *
 * @example
 * ```typescript
 * const orchestrator = new PipelineOrchestrator({ registry, store, memory, contextBuilder, sink });
 *
 * process.once('SIGINT', () => orchestrator.stop('Interrupted'));
 * const execution = await orchestrator.run({ query: 'Acme', entity: 'Acme', roles: [] });
 *
 * // Later, possibly in another process
 * await orchestrator.resume(execution.id);
 * ```
 */
export class PipelineOrchestrator {
  private readonly registry: StageRegistry;
  private readonly store: ExecutionStateStore;
  private readonly memory?: MemoryManager;
  private readonly contextBuilder?: ContextBuilder;
  private readonly sink: EventSink;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private readonly slot = new ExecutionSlot();
  private active = false;
  private stopReason: string | undefined;
  private abortController = new AbortController();

  constructor(options: PipelineOrchestratorOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.memory = options.memory;
    this.contextBuilder = options.contextBuilder;
    this.sink = options.sink ?? nullEventSink;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Create an execution for `input` and run every registered stage.
   *
   * @returns The execution as it stands when control returns: completed,
   *   failed, or paused by a stop request
   */
  async run(input: ExecutionInput): Promise<Execution> {
    if (this.registry.size === 0) {
      throw new Error('No stages registered');
    }
    this.begin();
    try {
      const created = await this.store.create(input);
      this.slot.load(created);
      await this.store.startExecution(this.slot);
      this.emit({
        event: 'log',
        executionId: created.id,
        message: `Started execution ${created.id} for ${created.input.entity}`,
      });

      const steps: ResumeStep[] = this.registry.names().map((stage) => ({ stage, action: 'run' }));
      return await this.drive(steps);
    } finally {
      this.end();
    }
  }

  /**
   * Resume a paused, failed or interrupted execution by id or by 1-based
   * ordinal into the resumable list.
   *
   * @throws ExecutionNotFoundError for unknown references
   * @throws AlreadyCompletedError if the execution is completed
   */
  async resume(reference: string): Promise<Execution> {
    this.begin();
    try {
      const target = await this.store.resolve(reference);
      const execution = await this.store.resumeExecution(this.slot, target.id);
      const plan = planResume(execution, this.registry.names());

      this.emit({
        event: 'log',
        executionId: execution.id,
        message: plan.resumePoint
          ? `Resuming ${execution.id} at ${plan.resumePoint}`
          : `Resuming ${execution.id}: every stage already completed`,
      });
      return await this.drive(plan.steps, target.updatedAt);
    } finally {
      this.end();
    }
  }

  /**
   * Request a cooperative stop. The run pauses at the next stage boundary,
   * or sooner if the running stage observes the signal. Repeated calls
   * while a stop is pending do nothing.
   *
   * @throws NoActiveExecutionError when no run is in progress
   */
  stop(reason: string = DEFAULT_STOP_REASON): void {
    if (!this.active) {
      throw new NoActiveExecutionError('No active execution to stop');
    }
    if (this.stopReason !== undefined) {
      return;
    }
    this.stopReason = reason;
    this.logger.info(`Stop requested: ${reason}`);
    this.abortController.abort(new StopRequestedError(reason));
  }

  isRunning(): boolean {
    return this.active;
  }

  /**
   * Id of the current execution: the one being advanced, or the one last
   * paused.
   */
  get currentExecutionId(): string | undefined {
    return this.slot.current?.id;
  }

  // ==========================================================================
  // Run Loop
  // ==========================================================================

  /**
   * @param checkpointedAt - When the resumed execution was last written;
   *   restored stages count their time up to it
   */
  private async drive(steps: readonly ResumeStep[], checkpointedAt?: string): Promise<Execution> {
    const execution = this.slot.require();
    const results: Record<string, unknown> = {};
    const completed: CompletedStage[] = [];

    this.memory?.beginRun(execution.id, execution.entityKey, execution.input.entity);

    for (const step of steps) {
      if (step.action === 'skip') {
        results[step.stage] = step.data;
        completed.push({ stage: step.stage, data: step.data });
        continue;
      }

      if (this.stopReason !== undefined) {
        return this.pause(this.stopReason);
      }

      if (step.action === 'restore') {
        await this.restoreStage(step.stage, step.data, results, checkpointedAt);
        results[step.stage] = step.data;
        completed.push({ stage: step.stage, data: step.data });
        continue;
      }

      if (step.action === 'rerun') {
        this.emit({
          event: 'log',
          executionId: execution.id,
          stage: step.stage,
          recovery: step.recovery,
          message: describeStep(step),
        });
      }

      const stage = this.registry.get(step.stage);
      if (!stage) {
        throw new Error(`Stage ${step.stage} is not registered`);
      }

      const outcome = await this.runStage(stage, results, completed);
      if (outcome.kind !== 'completed') {
        return outcome.execution;
      }
      results[stage.name] = outcome.data;
      completed.push({ stage: stage.name, data: outcome.data });
    }

    const finished = await this.store.completeExecution(this.slot);
    this.emit({
      event: 'result',
      executionId: finished.id,
      status: 'completed',
      data: results,
      message: `Execution ${finished.id} completed`,
    });
    this.slot.clear();
    await this.endMemoryRun();
    return finished;
  }

  private async runStage(
    stage: StageDefinition,
    results: Readonly<Record<string, unknown>>,
    completed: readonly CompletedStage[]
  ): Promise<StageOutcome> {
    const execution = this.slot.require();
    const startedAt = this.clock().getTime();

    await this.store.startStage(this.slot, stage.name);
    this.emit({
      event: 'progress',
      executionId: execution.id,
      stage: stage.name,
      status: 'running',
      message: stage.description,
    });

    const invocation = this.createInvocation(
      stage.name,
      results,
      await this.buildContext(execution.entityKey, stage.name, completed)
    );

    let output: unknown;
    try {
      output = await stage.run(invocation);
    } catch (error) {
      if (this.stopReason !== undefined) {
        // Interrupted, not failed: the stage stays as last checkpointed
        this.memory?.rememberWorking(
          'stage_interrupted',
          { stage: stage.name },
          IMPORTANCE.stageInterrupted
        );
        return { kind: 'stopped', execution: await this.pause(this.stopReason, stage.name) };
      }
      return this.handleFailure(stage, StageFailure.from(stage.name, error), startedAt);
    }

    await this.store.completeStage(this.slot, stage.name, output);
    this.emit({
      event: 'progress',
      executionId: execution.id,
      stage: stage.name,
      status: 'completed',
      data: output,
    });

    const durationMs = this.clock().getTime() - startedAt;
    this.memory?.rememberWorking(
      'stage_completed',
      { stage: stage.name, durationMs },
      IMPORTANCE.stageCompleted
    );
    await this.rememberOutcome(stage, invocation, output, durationMs);
    return { kind: 'completed', data: output };
  }

  /**
   * Commit a stage's checkpointed partial data as its result without
   * invoking it. The data is fed to memory like any other stage output.
   */
  private async restoreStage(
    stageName: string,
    data: unknown,
    results: Readonly<Record<string, unknown>>,
    checkpointedAt: string | undefined
  ): Promise<void> {
    const execution = this.slot.require();
    const startedAt = execution.stageResults[stageName]?.startedAt;

    await this.store.completeStage(this.slot, stageName, data);
    this.emit({
      event: 'progress',
      executionId: execution.id,
      stage: stageName,
      status: 'completed',
      data,
      recovery: 'restored',
      message: describeStep({ stage: stageName, action: 'restore', data }),
    });
    this.memory?.rememberWorking('stage_restored', { stage: stageName }, IMPORTANCE.stageRestored);

    const stage = this.registry.get(stageName);
    if (!stage) {
      throw new Error(`Stage ${stageName} is not registered`);
    }
    const invocation = this.createInvocation(
      stageName,
      results,
      emptyContextBundle(execution.entityKey, stageName)
    );
    await this.rememberOutcome(stage, invocation, data, elapsedMs(startedAt, checkpointedAt));
  }

  private createInvocation(
    stageName: string,
    results: Readonly<Record<string, unknown>>,
    context: ContextBundle
  ): StageInvocation {
    const execution = this.slot.require();
    return {
      executionId: execution.id,
      input: structuredClone(execution.input),
      entityKey: execution.entityKey,
      results: { ...results },
      context,
      signal: this.abortController.signal,
      logger: this.logger,
      commitPartial: async (data) => {
        await this.store.recordPartial(this.slot, stageName, data);
        this.logger.debug(`Saved partial data for ${stageName}`);
      },
      throwIfStopped: () => {
        if (this.stopReason !== undefined) {
          throw new StopRequestedError(this.stopReason);
        }
      },
    };
  }

  private async handleFailure(
    stage: StageDefinition,
    failure: StageFailure,
    startedAt: number
  ): Promise<StageOutcome> {
    const execution = this.slot.require();

    await this.store.failStage(this.slot, stage.name, failure.message);
    this.emit({
      event: 'error',
      executionId: execution.id,
      stage: stage.name,
      status: 'failed',
      error: failure.message,
    });
    this.logger.warn(`Stage ${stage.name} failed: ${failure.message}`);

    this.memory?.rememberWorking(
      'stage_failed',
      { stage: stage.name, error: failure.message },
      IMPORTANCE.stageFailed
    );
    await this.safely('record outcome', async () => {
      await this.memory?.recordOutcome(execution.entityKey, stage.name, {
        success: false,
        durationMs: this.clock().getTime() - startedAt,
        error: failure.message,
      });
    });

    if (stage.onFailure === 'continue') {
      this.logger.info(`Continuing past ${stage.name} (policy: continue)`);
      return { kind: 'completed', data: stage.fallback ? stage.fallback(failure) : undefined };
    }

    const reason = `Stage ${stage.name} failed: ${failure.message}`;
    const failed = await this.store.failExecution(this.slot, reason);
    this.emit({
      event: 'error',
      executionId: failed.id,
      status: 'failed',
      error: reason,
      message: `Execution ${failed.id} failed`,
    });
    this.memory?.rememberWorking('run_failed', { stage: stage.name }, IMPORTANCE.runFailed);
    this.slot.clear();
    await this.endMemoryRun();
    return { kind: 'aborted', execution: failed };
  }

  /**
   * Checkpoint the slot's execution as paused. Nothing is mutated after this.
   */
  private async pause(reason: string, stage?: string): Promise<Execution> {
    const paused = await this.store.pauseExecution(this.slot, reason);
    this.emit({
      event: 'progress',
      executionId: paused.id,
      stage,
      status: 'paused',
      message: reason,
    });
    await this.endMemoryRun();
    return paused;
  }

  // ==========================================================================
  // Memory Wiring
  // ==========================================================================

  private async buildContext(
    entityKey: string,
    stage: string,
    completed: readonly CompletedStage[]
  ): Promise<ContextBundle> {
    if (!this.contextBuilder) {
      return emptyContextBundle(entityKey, stage);
    }
    try {
      return await this.contextBuilder.build(entityKey, stage, completed);
    } catch (error) {
      this.logger.warn(`Context build failed for ${stage}: ${errorMessage(error)}`);
      return emptyContextBundle(entityKey, stage);
    }
  }

  private async rememberOutcome(
    stage: StageDefinition,
    invocation: StageInvocation,
    output: unknown,
    durationMs: number
  ): Promise<void> {
    const memory = this.memory;
    if (!memory) {
      return;
    }

    // Facts first, so a size learned here already buckets this outcome
    await this.safely('store facts', async () => {
      const facts = stage.extractFacts?.(output, invocation) ?? [];
      if (facts.length > 0) {
        await memory.rememberLongTerm(invocation.entityKey, facts, {
          executionId: invocation.executionId,
          stage: stage.name,
          displayName: invocation.input.entity,
        });
      }
    });
    await this.safely('record outcome', async () => {
      await memory.recordOutcome(invocation.entityKey, stage.name, { success: true, durationMs });
    });
  }

  private async endMemoryRun(): Promise<void> {
    await this.safely('promote working memory', async () => {
      const promoted = await this.memory?.endRun();
      if (promoted && promoted.length > 0) {
        this.logger.debug(`Promoted ${promoted.length} notable event record(s)`);
      }
    });
  }

  /**
   * Memory is advisory: its failures are logged and never change the run.
   */
  private async safely(action: string, work: () => Promise<void>): Promise<void> {
    try {
      await work();
    } catch (error) {
      this.logger.warn(`Memory: failed to ${action}: ${errorMessage(error)}`);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private begin(): void {
    if (this.active) {
      throw new Error('An execution is already running in this orchestrator');
    }
    this.active = true;
    this.stopReason = undefined;
    this.abortController = new AbortController();
  }

  /**
   * A paused execution stays in the slot until the next run or resume
   * loads another; completion and failure have already cleared it.
   */
  private end(): void {
    this.active = false;
    this.stopReason = undefined;
  }

  private emit(event: Omit<PipelineEvent, 'timestamp'>): void {
    try {
      this.sink.emit({ ...event, timestamp: this.clock().toISOString() });
    } catch (error) {
      this.logger.warn(`Event sink failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Milliseconds between two ISO timestamps, or 0 when either is unknown.
 */
function elapsedMs(from: string | undefined, to: string | undefined): number {
  const start = from ? Date.parse(from) : NaN;
  const end = to ? Date.parse(to) : NaN;
  return Number.isFinite(start) && Number.isFinite(end) ? Math.max(0, end - start) : 0;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

