/**
 * Model Configuration
 *
 * Defines LLM models, temperatures, and token budgets for each task type.
 * `LEADSCOUT_MODEL` overrides the model of every task.
 *
 * @module config/models
 */

import { z } from 'zod';

/**
 * Model configuration for a specific task
 */
export interface ModelConfig {
  /** Model identifier */
  modelId: string;
  /** Temperature setting (0.0 - 2.0) */
  temperature: number;
  /** Maximum output tokens */
  maxOutputTokens: number;
}

/**
 * Task types that use LLM models
 */
export type TaskType = 'discovery' | 'verification';

export const TASK_TYPES: readonly TaskType[] = ['discovery', 'verification'];

/**
 * Default model configurations per task
 */
const DEFAULT_MODELS: Record<TaskType, ModelConfig> = {
  discovery: {
    modelId: 'gpt-4o-mini',
    temperature: 0.2,
    maxOutputTokens: 1200,
  },
  verification: {
    modelId: 'gpt-4o-mini',
    temperature: 0.3,
    maxOutputTokens: 600,
  },
};

/**
 * Get model configuration for a task, applying any override
 */
export function getModelConfig(task: TaskType, override?: string): ModelConfig {
  const defaultConfig = DEFAULT_MODELS[task];
  return override ? { ...defaultConfig, modelId: override } : defaultConfig;
}

/**
 * Get all model configurations (with any override applied)
 */
export function getAllModelConfigs(override?: string): Record<TaskType, ModelConfig> {
  return {
    discovery: getModelConfig('discovery', override),
    verification: getModelConfig('verification', override),
  };
}

/**
 * Model config schema for validation
 */
export const modelConfigSchema = z.object({
  modelId: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxOutputTokens: z.number().int().positive(),
});

/**
 * Validate a model config object
 */
export function validateModelConfig(config: unknown): ModelConfig {
  return modelConfigSchema.parse(config);
}
