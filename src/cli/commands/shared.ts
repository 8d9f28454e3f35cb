/**
 * Shared Command Plumbing
 *
 * Pieces every command uses: the action wrapper that maps handler results
 * and errors to exit codes, option parsers, and the locked run loop used by
 * `analyze` and `resume`.
 *
 * @module cli/commands/shared
 */

import { InvalidArgumentError } from 'commander';
import type { EventSink } from '../../pipeline/events.js';
import type { PipelineOrchestrator } from '../../pipeline/orchestrator.js';
import type { Execution } from '../../schemas/index.js';
import {
  acquireRunLock,
  releaseRunLock,
  takeStopRequest,
  updateRunLock,
} from '../../storage/run-lock.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import type { EngineOptions } from '../engine.js';
import {
  JsonLinesSink,
  ProgressEventSink,
  StageProgressDisplay,
  formatExecutionSummary,
  formatLeadReport,
} from '../formatters/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators a command handler can be given instead of the defaults.
 */
export interface CommandDeps extends Omit<EngineOptions, 'sink'> {
  /** Replaces the progress display or JSON-lines stream */
  sink?: EventSink;
  /** How often a running analysis checks for `leadscout stop` (default: 250) */
  pollMs?: number;
}

export const INTERRUPT_REASON = 'Interrupted (SIGINT)';

const DEFAULT_POLL_MS = 250;

// ============================================================================
// Action Wrapper
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a handler and exit with its code. Errors are printed and mapped to
 * an exit code by `exitCodeFor`.
 */
export async function execute(base: BaseCommand, handler: () => Promise<ExitCode>): Promise<void> {
  let code: ExitCode;
  try {
    code = await handler();
  } catch (error) {
    return base.error(errorMessage(error), error);
  }
  if (code !== EXIT_CODES.SUCCESS) {
    base.exitWith(code);
  }
}

/**
 * Commander option parser for counts such as `--limit` and `--days`.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

// ============================================================================
// Locked Runs
// ============================================================================

/**
 * The sink a run reports to: the caller's, JSON lines under `--json`, or
 * the progress display.
 */
export function createRunSink(base: BaseCommand, deps: CommandDeps): EventSink {
  if (deps.sink) {
    return deps.sink;
  }
  if (base.isJson()) {
    return new JsonLinesSink();
  }
  return new ProgressEventSink(new StageProgressDisplay(), { verbose: base.isVerbose() });
}

export interface LockedRunResult {
  execution: Execution;
  /** True if Ctrl+C paused the run */
  interrupted: boolean;
}

/**
 * Advance an execution while holding the run lock.
 *
 * While `work` runs, a poll picks up stop requests written by
 * `leadscout stop` and records the execution id in the lock, and Ctrl+C
 * pauses the run instead of killing the process. The lock is released
 * however `work` ends.
 *
 * @throws RunLockHeldError if another live process is running an analysis
 */
export async function runLocked(
  base: BaseCommand,
  orchestrator: PipelineOrchestrator,
  command: string,
  work: () => Promise<Execution>,
  options: { pollMs?: number } = {}
): Promise<LockedRunResult> {
  const dataDir = base.dataDir;
  await acquireRunLock(command, { dataDir });

  let interrupted = false;
  let lockedId: string | undefined;
  let polling = false;

  const stop = (reason: string): void => {
    if (orchestrator.isRunning()) {
      orchestrator.stop(reason);
    }
  };

  const poll = async (): Promise<void> => {
    const request = await takeStopRequest(dataDir);
    if (request) {
      base.debug(`Stop request received: ${request.reason}`);
      stop(request.reason);
    }
    const current = orchestrator.currentExecutionId;
    if (current && current !== lockedId) {
      lockedId = current;
      await updateRunLock(current, { dataDir });
    }
  };

  const timer = setInterval(() => {
    if (polling) {
      return;
    }
    polling = true;
    poll()
      .catch((error: unknown) => base.warn(`Stop request check failed: ${errorMessage(error)}`))
      .finally(() => {
        polling = false;
      });
  }, options.pollMs ?? DEFAULT_POLL_MS);
  timer.unref();

  const onSigint = (): void => {
    interrupted = true;
    stop(INTERRUPT_REASON);
  };
  process.on('SIGINT', onSigint);

  try {
    const execution = await work();
    return { execution, interrupted };
  } finally {
    clearInterval(timer);
    process.off('SIGINT', onSigint);
    await releaseRunLock({ dataDir });
  }
}

/**
 * Print the outcome of analyze/resume and pick the exit code.
 *
 * - completed: SUCCESS
 * - paused by Ctrl+C: CANCELLED
 * - paused by `leadscout stop`: SUCCESS
 * - failed: ERROR
 */
export function reportRun(base: BaseCommand, result: LockedRunResult, totalStages: number): ExitCode {
  const { execution, interrupted } = result;

  if (!base.isQuiet()) {
    base.blank();
    base.info(formatExecutionSummary(execution, totalStages));
    const report = execution.status === 'completed' ? formatLeadReport(execution) : undefined;
    if (report) {
      base.blank();
      base.info(report);
    }
  }

  switch (execution.status) {
    case 'completed':
      return EXIT_CODES.SUCCESS;
    case 'paused':
      return interrupted ? EXIT_CODES.CANCELLED : EXIT_CODES.SUCCESS;
    default:
      return EXIT_CODES.ERROR;
  }
}
