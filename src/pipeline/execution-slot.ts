/**
 * Execution Slot
 *
 * Explicit holder for the single "current" execution an orchestrator is
 * advancing. The state store mutates whatever the slot holds, so a slot
 * can never point at two executions and loading one always drops the last.
 *
 * @module pipeline/execution-slot
 */

import type { Execution } from '../schemas/index.js';
import { NoActiveExecutionError } from './errors.js';

export class ExecutionSlot {
  private execution: Execution | undefined;

  /**
   * Clear the slot, then hold a deep copy of `execution`.
   *
   * @returns The copy now held by the slot
   */
  load(execution: Execution): Execution {
    this.clear();
    const copy = structuredClone(execution);
    this.execution = copy;
    return copy;
  }

  clear(): void {
    this.execution = undefined;
  }

  get current(): Execution | undefined {
    return this.execution;
  }

  /**
   * @throws NoActiveExecutionError when the slot is empty
   */
  require(): Execution {
    if (!this.execution) {
      throw new NoActiveExecutionError();
    }
    return this.execution;
  }

  isActive(): boolean {
    return this.execution !== undefined;
  }
}
