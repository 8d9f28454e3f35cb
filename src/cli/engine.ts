/**
 * Engine Wiring
 *
 * Builds the orchestrator and its collaborators for one CLI invocation:
 * file-backed record stores under the data directory, memory, the context
 * builder, the lead-research stage registry and (when a key is configured)
 * the LLM client.
 *
 * @module cli/engine
 */

import { getConfig, type Config } from '../config/index.js';
import { ContextBuilder } from '../context/builder.js';
import { OpenAiLlmClient, type LlmClient } from '../llm/client.js';
import { MemoryManager } from '../memory/manager.js';
import type { EventSink } from '../pipeline/events.js';
import { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import type { StageRegistry } from '../pipeline/registry.js';
import { ExecutionStateStore } from '../pipeline/state-store.js';
import {
  EntityMemorySchema,
  ExecutionSchema,
  PatternStatSchema,
  type EntityMemory,
  type Execution,
  type PatternStat,
} from '../schemas/index.js';
import type { ServiceRegistry } from '../services/types.js';
import { createLeadResearchRegistry } from '../stages/index.js';
import { DEFAULT_GLOBAL_CONFIG, loadGlobalConfig, type GlobalConfig } from '../storage/config.js';
import { getEntityMemoryDir, getExecutionsDir, getPatternsDir } from '../storage/paths.js';
import { FileRecordStore } from '../storage/record-store.js';
import type { BaseCommand } from './base-command.js';

// ============================================================================
// Types
// ============================================================================

export interface EngineOptions {
  sink?: EventSink;
  /** Replaces the client built from OPENAI_API_KEY */
  llm?: LlmClient;
  services?: ServiceRegistry;
  /** Environment configuration (default: getConfig()) */
  config?: Config;
  /** Replaces the lead-research stages */
  registry?: StageRegistry;
}

export interface Engine {
  orchestrator: PipelineOrchestrator;
  store: ExecutionStateStore;
  memory: MemoryManager;
  registry: StageRegistry;
  settings: GlobalConfig;
  dataDir: string;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build an LLM client from the environment, if a key is configured.
 */
export function createLlmClient(config: Config): LlmClient | undefined {
  if (!config.apiKeys.openai) {
    return undefined;
  }
  return new OpenAiLlmClient({
    apiKey: config.apiKeys.openai,
    baseUrl: config.llmBaseUrl,
    timeoutMs: config.llmTimeoutMs,
    modelOverride: config.models.override,
  });
}

/**
 * Execution store over `<dataDir>/executions`.
 */
export function openExecutionStore(base: BaseCommand): ExecutionStateStore {
  const logger = base.toLogger();
  const records = new FileRecordStore<Execution>({
    dir: getExecutionsDir(base.dataDir),
    schema: ExecutionSchema,
    schemaType: 'execution',
    logger,
  });
  return new ExecutionStateStore({ records, logger });
}

/**
 * Memory manager over `<dataDir>/memory`.
 */
export function openMemory(
  base: BaseCommand,
  settings: GlobalConfig = DEFAULT_GLOBAL_CONFIG
): MemoryManager {
  const logger = base.toLogger();
  const entities = new FileRecordStore<EntityMemory>({
    dir: getEntityMemoryDir(base.dataDir),
    schema: EntityMemorySchema,
    schemaType: 'entityMemory',
    logger,
  });
  const patterns = new FileRecordStore<PatternStat>({
    dir: getPatternsDir(base.dataDir),
    schema: PatternStatSchema,
    schemaType: 'patternStat',
    logger,
  });
  return new MemoryManager({
    entities,
    patterns,
    settings: {
      workingMemoryLimit: settings.workingMemoryLimit,
      promoteThreshold: settings.promoteThreshold,
    },
    logger,
  });
}

/**
 * Wire the engine for the command's data directory.
 *
 * @throws ZodError if config.json is invalid
 */
export async function createEngine(base: BaseCommand, options: EngineOptions = {}): Promise<Engine> {
  const dataDir = base.dataDir;
  const logger = base.toLogger();
  const settings = await loadGlobalConfig(dataDir);

  const store = openExecutionStore(base);
  const memory = openMemory(base, settings);
  const contextBuilder = new ContextBuilder({
    memory,
    budgetChars: settings.contextBudgetChars,
    recallLimit: settings.recallLimit,
    logger,
  });

  const llm = options.llm ?? createLlmClient(options.config ?? getConfig());
  const registry =
    options.registry ??
    createLeadResearchRegistry({
      llm,
      services: options.services,
      enrichmentConcurrency: settings.enrichmentConcurrency,
    });

  base.debug(`Data directory: ${dataDir}`);
  base.debug(`Stages: ${registry.names().join(', ')}`);

  const orchestrator = new PipelineOrchestrator({
    registry,
    store,
    memory,
    contextBuilder,
    sink: options.sink,
    logger,
  });

  return { orchestrator, store, memory, registry, settings, dataDir };
}
