/**
 * Configuration Module
 *
 * Loads and validates environment variables for leadscout.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // LLM provider (any OpenAI-compatible endpoint)
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),

  // Data directory
  LEADSCOUT_DATA_DIR: z.string().optional(),

  // Model and request overrides
  LEADSCOUT_MODEL: z.string().optional(),
  LEADSCOUT_LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

/**
 * Environment variables failed validation.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export interface Config {
  nodeEnv: 'development' | 'test' | 'production';
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;
  apiKeys: {
    openai: string | undefined;
  };
  /** OpenAI-compatible endpoint; the SDK default when unset */
  llmBaseUrl: string | undefined;
  llmTimeoutMs: number;
  dataDir: string;
  models: {
    /** Overrides the model of every LLM task (defaults in ./models.ts) */
    override: string | undefined;
  };
}

export type ApiKeyName = keyof Config['apiKeys'];

/**
 * Build a configuration from an environment.
 *
 * Empty strings count as unset, so a blank line in `.env` does not make a
 * key look configured.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env = parsed.data;
  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',
    apiKeys: {
      openai: env.OPENAI_API_KEY,
    },
    llmBaseUrl: env.OPENAI_BASE_URL,
    llmTimeoutMs: env.LEADSCOUT_LLM_TIMEOUT_MS,
    dataDir: env.LEADSCOUT_DATA_DIR ?? join(homedir(), '.leadscout'),
    models: {
      override: env.LEADSCOUT_MODEL,
    },
  };
}

let cached: Config | undefined;

/**
 * Application configuration, loaded from `process.env` on first use.
 */
export function getConfig(): Config {
  cached ??= loadConfig();
  return cached;
}

/**
 * Forget the cached configuration. Tests use this after changing the env.
 */
export function resetConfig(): void {
  cached = undefined;
}

/**
 * Check if a specific API is configured
 */
export function hasApiKey(api: ApiKeyName, config: Config = getConfig()): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(api: ApiKeyName, config: Config = getConfig()): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new Error(
      `Missing required API key: ${api.toUpperCase()}_API_KEY. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}
