/**
 * Engine Error Taxonomy
 *
 * Every error the engine surfaces to callers. Each class sets `name` so
 * the CLI can map it to an exit code without string matching.
 *
 * @module pipeline/errors
 */

/**
 * A stage function threw or returned a typed failure.
 *
 * The message is the original cause's message so it can be recorded into
 * `stageResults` verbatim; the cause itself is kept for debugging.
 */
export class StageFailure extends Error {
  constructor(
    public readonly stage: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StageFailure';
  }

  /**
   * Convert anything a stage threw into a StageFailure.
   */
  static from(stage: string, error: unknown): StageFailure {
    if (error instanceof StageFailure) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StageFailure(stage, message || 'Stage failed without a message', { cause: error });
  }
}

/**
 * A pause, checkpoint or stop was requested with nothing running.
 */
export class NoActiveExecutionError extends Error {
  constructor(message = 'No active execution') {
    super(message);
    this.name = 'NoActiveExecutionError';
  }
}

/**
 * Resume (or any mutation) was requested on a completed execution.
 */
export class AlreadyCompletedError extends Error {
  constructor(public readonly executionId: string) {
    super(`Execution ${executionId} is already completed and cannot be resumed`);
    this.name = 'AlreadyCompletedError';
  }
}

/**
 * No execution matches an id or ordinal.
 */
export class ExecutionNotFoundError extends Error {
  constructor(public readonly reference: string) {
    super(`Execution not found: ${reference}`);
    this.name = 'ExecutionNotFoundError';
  }
}

/**
 * Thrown inside a stage when it observes a pending stop request.
 * The orchestrator treats it as an interruption, never as a failure.
 */
export class StopRequestedError extends Error {
  constructor(public readonly reason: string) {
    super(reason);
    this.name = 'StopRequestedError';
  }
}

/**
 * Another live process owns the run lock.
 */
export class RunLockHeldError extends Error {
  constructor(
    public readonly pid: number,
    public readonly executionId?: string
  ) {
    super(
      `Another analysis is running (pid ${pid}${executionId ? `, execution ${executionId}` : ''})`
    );
    this.name = 'RunLockHeldError';
  }
}
