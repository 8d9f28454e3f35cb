/**
 * Pipeline Types
 *
 * Core types for the stage registry and the stage invocation contract.
 * Stage bodies are opaque to the engine: they receive an invocation and
 * resolve with their output or throw.
 *
 * @module pipeline/types
 */

import type { ExecutionInput } from '../schemas/index.js';
import type { ContextBundle } from '../context/builder.js';
import type { FactInput } from '../memory/long-term.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger interface for pipeline and storage logging.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything; the default for engine classes.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Stage Contract
// ============================================================================

/**
 * What happens to the run when a stage fails.
 * - `abort`: the execution is marked failed
 * - `continue`: the stage's fallback output (if any) stands in and the run proceeds
 */
export type StageFailurePolicy = 'abort' | 'continue';

/**
 * Everything a stage body receives.
 */
export interface StageInvocation {
  /** Id of the execution being advanced */
  executionId: string;
  input: Readonly<ExecutionInput>;
  entityKey: string;
  /** Outputs of stages that already ran, keyed by stage name */
  results: Readonly<Record<string, unknown>>;
  /** Size-bounded memory context for this stage */
  context: ContextBundle;
  /** Aborted when a stop is requested; pass it to cancellable I/O */
  signal: AbortSignal;
  logger: Logger;
  /**
   * Persist intermediate output. If the run is interrupted before the stage
   * returns, resume restores this data instead of re-running the stage.
   */
  commitPartial(data: unknown): Promise<void>;
  /** Throws StopRequestedError if a stop is pending */
  throwIfStopped(): void;
}

/**
 * One named unit of work in the pipeline.
 */
export interface StageDefinition<TOutput = unknown> {
  name: string;
  description?: string;
  onFailure: StageFailurePolicy;
  /** Output used in place of a failed stage's result under `continue` */
  fallback?: (failure: Error) => TOutput;
  run(invocation: StageInvocation): Promise<TOutput>;
  /** Durable facts worth remembering about the entity from this output */
  extractFacts?(output: TOutput, invocation: StageInvocation): FactInput[];
}

