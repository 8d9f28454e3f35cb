/**
 * Stage Registry
 *
 * Ordered, named sequence of stages. Registration order is execution order.
 *
 * @module pipeline/registry
 */

import type { StageDefinition } from './types.js';

export class StageRegistry {
  private readonly stages: StageDefinition[] = [];

  /**
   * Append a stage.
   *
   * @throws Error if a stage with the same name is already registered
   */
  register<TOutput>(stage: StageDefinition<TOutput>): this {
    if (!stage.name.trim()) {
      throw new Error('Stage name must not be empty');
    }
    if (this.has(stage.name)) {
      throw new Error(`Stage already registered: ${stage.name}`);
    }
    this.stages.push(stage);
    return this;
  }

  /**
   * Append several stages in order.
   */
  registerAll(stages: readonly StageDefinition[]): this {
    for (const stage of stages) {
      this.register(stage);
    }
    return this;
  }

  get(name: string): StageDefinition | undefined {
    return this.stages.find((stage) => stage.name === name);
  }

  has(name: string): boolean {
    return this.stages.some((stage) => stage.name === name);
  }

  /**
   * Position of a stage in execution order, or -1.
   */
  indexOf(name: string): number {
    return this.stages.findIndex((stage) => stage.name === name);
  }

  names(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  list(): readonly StageDefinition[] {
    return this.stages;
  }

  get size(): number {
    return this.stages.length;
  }
}
