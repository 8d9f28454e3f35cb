import { describe, it, expect, jest } from '@jest/globals';
import {
  LlmApiError,
  OpenAiLlmClient,
  isRetryableError,
  parseJsonObject,
  type ChatCompletionBody,
  type ChatCompletionReply,
  type ChatCompletionsApi,
} from './client.js';

function reply(content: string | null): ChatCompletionReply {
  return { choices: [{ message: { content } }] };
}

function fakeCompletions(
  ...responses: Array<ChatCompletionReply | Error>
): ChatCompletionsApi & { bodies: ChatCompletionBody[] } {
  const bodies: ChatCompletionBody[] = [];
  let call = 0;
  return {
    bodies,
    create: async (body) => {
      bodies.push(body);
      const next = responses[Math.min(call, responses.length - 1)];
      call += 1;
      if (next instanceof Error) {
        throw next;
      }
      return next;
    },
  };
}

const REQUEST = { task: 'discovery' as const, system: 'You research companies.', user: 'Acme' };

describe('parseJsonObject', () => {
  it('parses a bare object', () => {
    expect(parseJsonObject('{"name":"Acme"}')).toEqual({ name: 'Acme' });
  });

  it('reads fenced JSON', () => {
    expect(parseJsonObject('Here you go:\n```json\n{"size": "large"}\n```')).toEqual({
      size: 'large',
    });
  });

  it('finds an object inside prose', () => {
    expect(parseJsonObject('Result: {"ok": true} hope that helps')).toEqual({ ok: true });
  });

  it('rejects arrays and text without JSON', () => {
    expect(() => parseJsonObject('[1, 2]')).toThrow('Model returned no JSON object');
    expect(() => parseJsonObject('no idea')).toThrow(LlmApiError);
  });

  it('flags malformed JSON as retryable', () => {
    let caught: unknown;
    try {
      parseJsonObject('{"name": }');
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof LlmApiError && caught.isRetryable).toBe(true);
  });
});

describe('isRetryableError', () => {
  it('uses the flag on LlmApiError', () => {
    expect(isRetryableError(new LlmApiError('bad request', 400, false))).toBe(false);
    expect(isRetryableError(new LlmApiError('overloaded', 503, true))).toBe(true);
  });

  it('recognizes transient messages', () => {
    expect(isRetryableError(new Error('socket ECONNRESET'))).toBe(true);
    expect(isRetryableError(new Error('invalid schema'))).toBe(false);
    expect(isRetryableError('timeout')).toBe(false);
  });
});

describe('OpenAiLlmClient', () => {
  it('requires an api key without an injected transport', () => {
    expect(() => new OpenAiLlmClient({})).toThrow('OPENAI_API_KEY');
  });

  it('sends the task model settings in JSON mode', async () => {
    const completions = fakeCompletions(reply('{"name":"Acme"}'));
    const client = new OpenAiLlmClient({ completions });

    const result = await client.completeJson(REQUEST);

    expect(result).toEqual({ name: 'Acme' });
    expect(completions.bodies[0]).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'You research companies.' },
        { role: 'user', content: 'Acme' },
      ],
      temperature: 0.2,
      max_tokens: 1200,
      response_format: { type: 'json_object' },
    });
  });

  it('applies the model override and token budget', async () => {
    const completions = fakeCompletions(reply('{}'));
    const client = new OpenAiLlmClient({ completions, modelOverride: 'local-model' });

    await client.completeJson({ ...REQUEST, maxTokens: 50 });

    expect(completions.bodies[0].model).toBe('local-model');
    expect(completions.bodies[0].max_tokens).toBe(50);
  });

  it('retries retryable failures', async () => {
    const completions = fakeCompletions(
      new LlmApiError('overloaded', 503, true),
      reply(null),
      reply('{"ok":true}')
    );
    const client = new OpenAiLlmClient({ completions, baseDelayMs: 0 });

    expect(await client.completeJson(REQUEST)).toEqual({ ok: true });
    expect(completions.bodies).toHaveLength(3);
  });

  it('gives up after maxRetries', async () => {
    const completions = fakeCompletions(new LlmApiError('overloaded', 503, true));
    const client = new OpenAiLlmClient({ completions, baseDelayMs: 0, maxRetries: 1 });

    await expect(client.completeJson(REQUEST)).rejects.toThrow('overloaded');
    expect(completions.bodies).toHaveLength(2);
  });

  it('does not retry permanent failures', async () => {
    const completions = fakeCompletions(new Error('invalid schema'));
    const client = new OpenAiLlmClient({ completions, baseDelayMs: 0 });

    await expect(client.completeJson(REQUEST)).rejects.toThrow('invalid schema');
    expect(completions.bodies).toHaveLength(1);
  });

  it('throws the abort reason when the caller cancels', async () => {
    const controller = new AbortController();
    controller.abort(new Error('Stop requested'));
    const create = jest.fn<ChatCompletionsApi['create']>();
    const client = new OpenAiLlmClient({ completions: { create } });

    await expect(client.completeJson({ ...REQUEST, signal: controller.signal })).rejects.toThrow(
      'Stop requested'
    );
    expect(create).not.toHaveBeenCalled();
  });

  it('times out slow requests', async () => {
    const completions: ChatCompletionsApi = {
      create: (_body, options) =>
        new Promise((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    };
    const client = new OpenAiLlmClient({ completions, timeoutMs: 10, maxRetries: 0 });

    await expect(client.completeJson(REQUEST)).rejects.toThrow('Request timed out after 10ms');
  });
});
