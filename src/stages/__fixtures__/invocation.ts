/**
 * Test doubles for stage bodies: a hand-built invocation, a scripted
 * model and scripted providers.
 */

import { emptyContextBundle, type ContextBundle } from '../../context/builder.js';
import type { JsonCompletionRequest, LlmClient } from '../../llm/client.js';
import { StopRequestedError } from '../../pipeline/errors.js';
import type { Logger, StageInvocation } from '../../pipeline/types.js';
import type { ExecutionInput } from '../../schemas/index.js';
import type { CompanyProfile, RolesOutput } from '../schemas.js';

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const record =
    (level: string) =>
    (message: string): void => {
      lines.push(`${level}: ${message}`);
    };
  return {
    lines,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export interface TestInvocation extends StageInvocation {
  logger: RecordingLogger;
  partials: unknown[];
  /** Abort the signal, as a stop request would */
  stop(reason?: string): void;
}

export function makeInvocation(
  options: {
    input?: Partial<ExecutionInput>;
    results?: Record<string, unknown>;
    context?: ContextBundle;
    stage?: string;
  } = {}
): TestInvocation {
  const controller = new AbortController();
  const partials: unknown[] = [];
  const input: ExecutionInput = { query: 'Acme', entity: 'Acme', roles: [], ...options.input };

  return {
    executionId: '20260101-090000-acme',
    input,
    entityKey: input.entity.toLowerCase(),
    results: options.results ?? {},
    context: options.context ?? emptyContextBundle('acme', options.stage ?? 'test'),
    signal: controller.signal,
    logger: recordingLogger(),
    partials,
    async commitPartial(data) {
      partials.push(data);
    },
    throwIfStopped() {
      if (controller.signal.aborted) {
        throw new StopRequestedError('Stopped by user');
      }
    },
    stop(reason = 'Stopped by user') {
      controller.abort(new StopRequestedError(reason));
    },
  };
}

/**
 * Model double that replays canned replies in order.
 */
export class ScriptedLlm implements LlmClient {
  readonly requests: JsonCompletionRequest[] = [];
  private readonly replies: Array<Record<string, unknown> | Error>;

  constructor(...replies: Array<Record<string, unknown> | Error>) {
    this.replies = replies;
  }

  async completeJson(request: JsonCompletionRequest): Promise<Record<string, unknown>> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('ScriptedLlm: no reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export const ACME_PROFILE: CompanyProfile = {
  name: 'Acme Corp',
  industry: 'Industrial Automation',
  size: 'large',
  location: 'Berlin',
  website: 'acme.test',
  growthSignals: ['Opened a new plant'],
  status: 'accepted',
  reason: 'Established manufacturer',
  sources: [],
};

export const ACME_ROLES: RolesOutput = {
  company: 'Acme Corp',
  people: [
    {
      name: 'Jane Doe',
      title: 'CEO',
      company: 'Acme Corp',
      decisionPower: 10,
      status: 'accepted',
      reason: 'Decision power: 10/10',
      source: 'network',
    },
    {
      name: 'John Roe',
      title: 'VP Sales',
      company: 'Acme Corp',
      decisionPower: 8,
      status: 'accepted',
      reason: 'Decision power: 8/10',
      source: 'network',
    },
    {
      name: 'Sam Poe',
      title: 'Sales Lead',
      company: 'Acme Corp',
      decisionPower: 4,
      status: 'rejected',
      reason: 'Decision power: 4/10',
      source: 'network',
    },
  ],
  acceptedCount: 2,
  rejectedCount: 1,
  summary: 'Found 2 decision-makers at Acme Corp',
};
