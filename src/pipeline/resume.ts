/**
 * Resume Planning
 *
 * Decides, for every registered stage of a stored execution, whether a
 * resumed run skips it, restores its checkpointed data, or runs it. Pure:
 * reads the execution, never changes it.
 *
 * | Checkpointed record      | Action                                      |
 * |--------------------------|---------------------------------------------|
 * | completed                | skip (stored data feeds later stages)       |
 * | running, with data       | restore (data committed, stage not invoked) |
 * | running/failed, no data  | rerun, recovery `fresh`                     |
 * | failed, with data        | rerun, recovery `retry`                     |
 * | absent or pending        | run                                         |
 *
 * @module pipeline/resume
 */

import { hasStageData, type Execution } from '../schemas/index.js';
import type { RecoveryKind } from './events.js';

// ============================================================================
// Types
// ============================================================================

export type ResumeStep =
  | { stage: string; action: 'skip'; data: unknown }
  | { stage: string; action: 'restore'; data: unknown }
  | { stage: string; action: 'rerun'; recovery: Exclude<RecoveryKind, 'restored'> }
  | { stage: string; action: 'run' };

export interface ResumePlan {
  /** First stage not marked completed; undefined when all are */
  resumePoint: string | undefined;
  steps: ResumeStep[];
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Classify one stage of an execution.
 */
export function classifyStage(execution: Execution, stage: string): ResumeStep {
  const record = execution.stageResults[stage];

  if (!record || record.status === 'pending') {
    return { stage, action: 'run' };
  }
  if (record.status === 'completed') {
    return { stage, action: 'skip', data: record.data };
  }
  if (record.status === 'running' && hasStageData(record)) {
    return { stage, action: 'restore', data: record.data };
  }
  if (record.status === 'failed' && hasStageData(record)) {
    return { stage, action: 'rerun', recovery: 'retry' };
  }
  return { stage, action: 'rerun', recovery: 'fresh' };
}

/**
 * Build the plan for resuming `execution` over `stageNames` (registry order).
 *
 * Stages recorded in the execution but no longer registered are ignored.
 */
export function planResume(execution: Execution, stageNames: readonly string[]): ResumePlan {
  const steps = stageNames.map((stage) => classifyStage(execution, stage));
  const firstIncomplete = steps.find((step) => step.action !== 'skip');

  return {
    resumePoint: firstIncomplete?.stage,
    steps,
  };
}

/**
 * Human-readable description of a step, used in log events.
 */
export function describeStep(step: ResumeStep): string {
  switch (step.action) {
    case 'skip':
      return `${step.stage}: already completed`;
    case 'restore':
      return `${step.stage}: restored partial data from checkpoint`;
    case 'rerun':
      return step.recovery === 'fresh'
        ? `${step.stage}: no prior data saved, starting fresh`
        : `${step.stage}: previous attempt failed, retrying`;
    case 'run':
      return `${step.stage}: not started`;
  }
}
