/**
 * LLM Client
 *
 * JSON-mode chat completions against any OpenAI-compatible endpoint.
 * Handles timeouts, cancellation from the stage signal, retries with
 * exponential backoff, and pulling a JSON object out of the reply.
 *
 * @module llm/client
 */

import OpenAI from 'openai';
import { getModelConfig, type TaskType } from '../config/models.js';

// ============================================================================
// Types
// ============================================================================

export interface JsonCompletionRequest {
  /** Selects model, temperature and token budget */
  task: TaskType;
  system: string;
  user: string;
  /** Overrides the task's output token budget */
  maxTokens?: number;
  /** Aborting it cancels the request and any pending retry */
  signal?: AbortSignal;
}

/**
 * What stages depend on: a prompt in, a parsed JSON object out.
 */
export interface LlmClient {
  completeJson(request: JsonCompletionRequest): Promise<Record<string, unknown>>;
}

/**
 * Request body this client sends.
 */
export interface ChatCompletionBody {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  temperature: number;
  max_tokens: number;
  response_format: { type: 'json_object' };
}

export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The slice of the OpenAI SDK the client calls; `new OpenAI().chat.completions`
 * satisfies it.
 */
export interface ChatCompletionsApi {
  create(
    body: ChatCompletionBody,
    options?: { signal?: AbortSignal }
  ): PromiseLike<ChatCompletionReply>;
}

/**
 * LLM API error with additional context.
 */
export class LlmApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LlmApiError';
  }
}

export interface OpenAiLlmClientOptions {
  apiKey?: string;
  /** OpenAI-compatible endpoint; SDK default when unset */
  baseUrl?: string;
  /** Per-attempt timeout (default: 30000) */
  timeoutMs?: number;
  /** Model used for every task instead of the defaults */
  modelOverride?: string;
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Base delay for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Injected transport; built from apiKey/baseUrl when omitted */
  completions?: ChatCompletionsApi;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_BASE_DELAY_MS = 1000;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Sleep for a specified duration.
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Request aborted');
}

/**
 * Extract the first JSON object from model output, tolerating markdown
 * code fences and surrounding prose.
 *
 * @throws LlmApiError (retryable) if no JSON object can be parsed
 */
export function parseJsonObject(content: string): Record<string, unknown> {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  const candidate = fenced ? fenced[1].trim() : content.match(/\{[\s\S]*\}/)?.[0];

  if (candidate !== undefined) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch (error) {
      throw new LlmApiError('Model returned malformed JSON', 502, true, { cause: error });
    }
  }

  throw new LlmApiError('Model returned no JSON object', 502, true);
}

/**
 * Check if an error is retryable.
 *
 * @returns true if the error is transient and worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof LlmApiError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('503') ||
      message.includes('500') ||
      message.includes('502') ||
      message.includes('504')
    );
  }

  return false;
}

export function isLlmApiError(error: unknown): error is LlmApiError {
  return error instanceof LlmApiError;
}

// ============================================================================
// Client Implementation
// ============================================================================

export class OpenAiLlmClient implements LlmClient {
  private readonly completions: ChatCompletionsApi;
  private readonly timeoutMs: number;
  private readonly modelOverride?: string;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: OpenAiLlmClientOptions) {
    if (options.completions) {
      this.completions = options.completions;
    } else {
      if (!options.apiKey) {
        throw new Error(
          'OPENAI_API_KEY environment variable is not set. ' +
            'Please set it in your .env file or environment.'
        );
      }
      // Retries are handled here so they can honour the stage signal
      this.completions = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        maxRetries: 0,
      }).chat.completions;
    }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.modelOverride = options.modelOverride;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  }

  async completeJson(request: JsonCompletionRequest): Promise<Record<string, unknown>> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (request.signal?.aborted) {
        throw abortReason(request.signal);
      }
      try {
        const content = await this.attempt(request);
        return parseJsonObject(content);
      } catch (error) {
        if (request.signal?.aborted) {
          throw abortReason(request.signal);
        }
        lastError = error;
        if (!isRetryableError(error) || attempt >= this.maxRetries) {
          break;
        }
        // Exponential backoff
        await sleep(this.baseDelayMs * Math.pow(2, attempt));
      }
    }

    throw lastError;
  }

  private async attempt(request: JsonCompletionRequest): Promise<string> {
    const config = getModelConfig(request.task, this.modelOverride);

    // Own controller for the timeout, linked to the caller's signal
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.completions.create(
        {
          model: config.modelId,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: config.temperature,
          max_tokens: request.maxTokens ?? config.maxOutputTokens,
          response_format: { type: 'json_object' },
        },
        { signal: controller.signal }
      );

      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new LlmApiError('Empty response from model', 500, true);
      }
      return content;
    } catch (error) {
      if (timedOut) {
        throw new LlmApiError(`Request timed out after ${this.timeoutMs}ms`, 408, true, {
          cause: error,
        });
      }

      if (error instanceof OpenAI.APIError) {
        const isRetryable =
          error.status === 429 || // Rate limit
          error.status === 500 || // Server error
          error.status === 502 || // Bad gateway
          error.status === 503 || // Service unavailable
          error.status === 504; // Gateway timeout

        throw new LlmApiError(error.message, error.status ?? 500, isRetryable, { cause: error });
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
