/**
 * CLI Tests
 *
 * Tests cover:
 * - Program creation and configuration
 * - Base command output, logger adapter and exit code mapping
 * - Progress display, event sinks and run summary formatters
 * - Command handlers against a temporary data directory
 *
 * @module cli/cli.test
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { createProgram } from './index.js';
import {
  BaseCommand,
  EXIT_CODES,
  createBaseCommand,
  exitCodeFor,
  getBaseCommand,
} from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import {
  JsonLinesSink,
  ProgressEventSink,
  StageProgressDisplay,
  formatDuration,
  formatEventHistory,
  formatExecutionSummary,
  formatHistoryTable,
  formatLeadReport,
  formatStageResults,
  stageLabel,
} from './formatters/index.js';
import {
  handleAnalyze,
  defaultExportFileName,
  handleEnrich,
  handleExport,
  handleForget,
  handleHistory,
  handlePrune,
  handleResume,
  handleShow,
  handleStop,
  parsePositiveInt,
} from './commands/index.js';
import { reportRun } from './commands/shared.js';
import { openExecutionStore, openMemory } from './engine.js';
import { loadConfig, ConfigError } from '../config/index.js';
import { LlmApiError } from '../llm/client.js';
import {
  AlreadyCompletedError,
  ExecutionNotFoundError,
  NoActiveExecutionError,
  RunLockHeldError,
} from '../pipeline/errors.js';
import { CollectingEventSink, type PipelineEvent } from '../pipeline/events.js';
import { ExecutionSlot } from '../pipeline/execution-slot.js';
import { StageRegistry } from '../pipeline/registry.js';
import { ExecutionStateStore } from '../pipeline/state-store.js';
import type { StageInvocation } from '../pipeline/types.js';
import {
  ExecutionSchema,
  SCHEMA_VERSIONS,
  summarizeExecution,
  type Execution,
} from '../schemas/index.js';
import {
  ServiceError,
  serviceFail,
  serviceOk,
  type ContactEnrichmentService,
  type ContactQuery,
  type ContactRecord,
} from '../services/types.js';
import { getExecutionsDir, getRunLockPath } from '../storage/paths.js';
import { FileRecordStore } from '../storage/record-store.js';
import { ACME_PROFILE, ACME_ROLES } from '../stages/__fixtures__/invocation.js';

// ============================================================================
// Helpers
// ============================================================================

const strip = (text: string): string => text.replace(/\x1b\[[0-9;]*m/g, '');

function spyConsole() {
  return {
    log: jest.spyOn(console, 'log').mockImplementation(() => {}),
    warn: jest.spyOn(console, 'warn').mockImplementation(() => {}),
    error: jest.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

type ConsoleSpy = ReturnType<typeof spyConsole>;

function restoreConsole(spy: ConsoleSpy): void {
  spy.log.mockRestore();
  spy.warn.mockRestore();
  spy.error.mockRestore();
}

function loggedLines(spy: ConsoleSpy): string[] {
  return spy.log.mock.calls.map((call) => strip(call.map(String).join(' ')));
}

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

function pausedExecution(): Execution {
  return {
    schemaVersion: SCHEMA_VERSIONS.execution,
    id: '20260102-143512-acme-corp',
    input: { query: 'Acme Corp', entity: 'Acme Corp', roles: [] },
    entityKey: 'acme corp',
    status: 'paused',
    stageResults: {
      discovery: { status: 'completed', attempts: 1, data: { name: 'Acme Corp' } },
      structure: { status: 'running', attempts: 2 },
    },
    createdAt: '2026-01-02T14:35:12.000Z',
    updatedAt: '2026-01-02T14:35:16.200Z',
    error: 'Stopped by user',
    history: [],
  };
}

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('leadscout');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const optionNames = createProgram().options.map((o) => o.long);

    expect(optionNames).toEqual(
      expect.arrayContaining(['--verbose', '--quiet', '--no-color', '--data-dir', '--json'])
    );
  });

  it('should register every command', () => {
    const commandNames = createProgram().commands.map((c) => c.name());

    expect(commandNames).toEqual([
      'analyze',
      'resume',
      'stop',
      'enrich',
      'history',
      'show',
      'export',
      'forget',
      'prune',
    ]);
  });
});

describe('Version', () => {
  it('should return formatted version info', () => {
    expect(getVersionInfo()).toBe(`leadscout v${VERSION}`);
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: ConsoleSpy;

  beforeEach(() => {
    consoleSpy = spyConsole();
  });

  afterEach(() => {
    restoreConsole(consoleSpy);
  });

  it('should create with default options', () => {
    const cmd = new BaseCommand({});

    expect(cmd.isVerbose()).toBe(false);
    expect(cmd.isQuiet()).toBe(false);
    expect(cmd.isJson()).toBe(false);
  });

  it('should show debug messages only when verbose', () => {
    new BaseCommand({}).debug('hidden');
    expect(consoleSpy.log).not.toHaveBeenCalled();

    new BaseCommand({ verbose: true }).debug('shown');
    expect(loggedLines(consoleSpy)).toEqual(['[DEBUG] shown']);
  });

  it('should treat JSON mode as quiet', () => {
    const cmd = new BaseCommand({ json: true });

    expect(cmd.isQuiet()).toBe(true);
    cmd.info('test message');
    expect(consoleSpy.log).not.toHaveBeenCalled();

    cmd.json({ ok: true });
    expect(consoleSpy.log).toHaveBeenCalledWith('{\n  "ok": true\n}');
  });

  it('should log info messages when not quiet', () => {
    new BaseCommand({}).info('test message');
    expect(consoleSpy.log).toHaveBeenCalledWith('test message');
  });

  it('should always log warnings', () => {
    new BaseCommand({ quiet: true }).warn('warning message');
    expect(consoleSpy.warn).toHaveBeenCalled();
  });

  it('should route engine logs through toLogger', () => {
    const logger = new BaseCommand({ verbose: true }).toLogger();

    logger.info('Pruned 2 completed execution(s)');
    logger.warn('Memory: failed to store facts: disk full');

    expect(loggedLines(consoleSpy)).toEqual(['[DEBUG] Pruned 2 completed execution(s)']);
    expect(strip(String(consoleSpy.warn.mock.calls[0]?.[0]))).toBe(
      'Warning: Memory: failed to store facts: disk full'
    );
  });

  it('should validate options in the factory function', () => {
    const cmd = createBaseCommand({ verbose: true, dataDir: '/tmp/leadscout-test' });

    expect(cmd).toBeInstanceOf(BaseCommand);
    expect(cmd.isVerbose()).toBe(true);
    expect(cmd.dataDir).toBe('/tmp/leadscout-test');
    expect(() => createBaseCommand({ verbose: 'yes' })).toThrow();
  });

  it('should find the base command on a parent command', () => {
    const stored = new BaseCommand({ verbose: true });
    const program = { opts: () => ({ _baseCommand: stored }), parent: null };
    const sub = { opts: () => ({}), parent: program };

    expect(getBaseCommand(sub)).toBe(stored);
  });

  it('should create default base command if not found', () => {
    expect(getBaseCommand({ opts: () => ({}) })).toBeInstanceOf(BaseCommand);
  });
});

describe('Exit Codes', () => {
  it('should define standard exit codes', () => {
    expect(EXIT_CODES).toEqual({
      SUCCESS: 0,
      ERROR: 1,
      USAGE_ERROR: 2,
      NOT_FOUND: 3,
      API_ERROR: 4,
      CANCELLED: 130,
    });
  });

  it('should map engine errors to exit codes', () => {
    expect(exitCodeFor(new NoActiveExecutionError())).toBe(EXIT_CODES.NOT_FOUND);
    expect(exitCodeFor(new ExecutionNotFoundError('9'))).toBe(EXIT_CODES.NOT_FOUND);
    expect(exitCodeFor(new AlreadyCompletedError('x'))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new ConfigError(['OPENAI_BASE_URL: Invalid url']))).toBe(
      EXIT_CODES.USAGE_ERROR
    );
    expect(exitCodeFor(new LlmApiError('rate limited', 429, true))).toBe(EXIT_CODES.API_ERROR);
    expect(exitCodeFor(new ServiceError('directory', 'quota exceeded', false))).toBe(
      EXIT_CODES.API_ERROR
    );
    expect(exitCodeFor(new RunLockHeldError(42))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor('boom')).toBe(EXIT_CODES.ERROR);
  });
});

describe('parsePositiveInt', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt('7')).toBe(7);
  });

  it.each(['0', '-3', '2.5', 'ten'])('should reject %s', (value) => {
    expect(() => parsePositiveInt(value)).toThrow('Must be a positive integer.');
  });
});

// ============================================================================
// Progress Formatter Tests
// ============================================================================

describe('Progress Formatters', () => {
  let consoleSpy: ConsoleSpy;

  beforeEach(() => {
    consoleSpy = spyConsole();
  });

  afterEach(() => {
    restoreConsole(consoleSpy);
  });

  describe('formatDuration', () => {
    it('should format milliseconds, seconds and minutes', () => {
      expect(formatDuration(850)).toBe('850ms');
      expect(formatDuration(1500)).toBe('1.5s');
      expect(formatDuration(154000)).toBe('2m 34s');
    });
  });

  describe('stageLabel', () => {
    it('should title-case stage names', () => {
      expect(stageLabel('verification')).toBe('Verification');
      expect(stageLabel('top-candidates')).toBe('Top Candidates');
    });
  });

  describe('StageProgressDisplay', () => {
    it('should initialize named stages as pending', () => {
      const display = new StageProgressDisplay(['discovery', 'structure'], { tty: false });

      expect(display.getAllStages()).toEqual([
        { name: 'discovery', status: 'pending' },
        { name: 'structure', status: 'pending' },
      ]);
    });

    it('should print plain lines without a TTY', () => {
      const display = new StageProgressDisplay(['discovery', 'structure'], { tty: false });

      display.startStage('discovery');
      display.completeStage('discovery', 1500);
      display.startStage('structure');
      display.failStage('structure', 'Missing discovery output');

      expect(loggedLines(consoleSpy)).toEqual([
        '[*] Discovery...',
        '[+] Discovery (1.5s)',
        '[*] Structure...',
        '[X] Structure - Missing discovery output',
      ]);
      expect(display.getCounts()).toMatchObject({ completed: 1, failed: 1, pending: 0 });
      expect(display.getStageDisplay('structure')?.error).toBe('Missing discovery output');
    });
  });

  describe('ProgressEventSink', () => {
    const at = (ms: number): string => new Date(Date.UTC(2026, 0, 2, 9, 0, 0) + ms).toISOString();
    const event = (fields: Omit<PipelineEvent, 'executionId'>): PipelineEvent => ({
      executionId: '20260102-090000-acme',
      ...fields,
    });

    it('should render a resumed run', () => {
      const sink = new ProgressEventSink(new StageProgressDisplay([], { tty: false }));

      sink.emit(event({ event: 'log', message: 'Resuming 20260102-090000-acme at structure', timestamp: at(0) }));
      sink.emit(event({ event: 'log', stage: 'structure', recovery: 'fresh', message: 'structure: no checkpoint data, starting fresh', timestamp: at(0) }));
      sink.emit(event({ event: 'progress', stage: 'structure', status: 'running', timestamp: at(0) }));
      sink.emit(event({ event: 'progress', stage: 'structure', status: 'completed', timestamp: at(250) }));
      sink.emit(event({ event: 'progress', stage: 'enrichment', status: 'completed', recovery: 'restored', timestamp: at(260) }));
      sink.emit(event({ event: 'progress', stage: 'verification', status: 'running', timestamp: at(300) }));
      sink.emit(event({ event: 'progress', stage: 'verification', status: 'paused', message: 'Stopped by user', timestamp: at(400) }));

      expect(loggedLines(consoleSpy)).toEqual([
        '    structure: no checkpoint data, starting fresh',
        '[*] Structure...',
        '[+] Structure (250ms)',
        '[+] Enrichment (restored from checkpoint)',
        '[*] Verification...',
        '[-] Verification paused: Stopped by user',
      ]);
    });

    it('should show plain log events only when verbose', () => {
      const quiet = new ProgressEventSink(new StageProgressDisplay([], { tty: false }));
      const verbose = new ProgressEventSink(new StageProgressDisplay([], { tty: false }), {
        verbose: true,
      });
      const log = event({ event: 'log', message: 'Started execution x for Acme', timestamp: at(0) });

      quiet.emit(log);
      expect(consoleSpy.log).not.toHaveBeenCalled();

      verbose.emit(log);
      expect(loggedLines(consoleSpy)).toEqual(['    Started execution x for Acme']);
    });

    it('should mark failed stages from error events', () => {
      const display = new StageProgressDisplay([], { tty: false });
      const sink = new ProgressEventSink(display);

      sink.emit(event({ event: 'error', stage: 'roles', status: 'failed', error: 'quota exceeded', timestamp: at(0) }));
      sink.emit(event({ event: 'error', status: 'failed', error: 'Stage roles failed: quota exceeded', timestamp: at(0) }));

      expect(loggedLines(consoleSpy)).toEqual(['[X] Roles - quota exceeded']);
      expect(display.getStageDisplay('roles')?.status).toBe('failed');
    });
  });

  describe('JsonLinesSink', () => {
    it('should write one JSON object per line', () => {
      const lines: string[] = [];
      const sink = new JsonLinesSink((line) => lines.push(line));

      sink.emit({
        event: 'progress',
        executionId: 'x',
        stage: 'discovery',
        status: 'running',
        timestamp: '2026-01-02T09:00:00.000Z',
      });

      expect(lines).toEqual([
        '{"event":"progress","executionId":"x","stage":"discovery","status":"running","timestamp":"2026-01-02T09:00:00.000Z"}\n',
      ]);
    });
  });
});

// ============================================================================
// Run Summary Formatter Tests
// ============================================================================

describe('Run Summary Formatters', () => {
  it('should format a paused execution with a resume hint', () => {
    const lines = strip(formatExecutionSummary(pausedExecution(), 5)).split('\n');

    expect(lines).toEqual([
      '=== Execution Paused ===',
      'Execution: 20260102-143512-acme-corp',
      'Entity:    Acme Corp',
      'Status:    PAUSED',
      'Stages:    1/5 completed',
      'Duration:  4.2s',
      'Reason:    Stopped by user',
      '',
      'Resume with: leadscout resume 20260102-143512-acme-corp',
    ]);
  });

  it('should format a completed execution without a resume hint', () => {
    const execution: Execution = {
      ...pausedExecution(),
      status: 'completed',
      completedAt: '2026-01-02T14:35:14.000Z',
      error: undefined,
    };
    const text = strip(formatExecutionSummary(execution));

    expect(text).toContain('Status:    COMPLETED');
    expect(text).toContain('Duration:  2.0s');
    expect(text).not.toContain('Resume with');
  });

  it('should number only resumable rows in the history table', () => {
    const paused = summarizeExecution(pausedExecution());
    const completed = summarizeExecution({
      ...pausedExecution(),
      id: '20260101-080000-globex',
      input: { query: 'Globex', entity: 'Globex', roles: [] },
      status: 'completed',
      updatedAt: '2026-01-01T08:01:00.000Z',
    });

    const lines = strip(formatHistoryTable([paused, completed], [paused.id])).split('\n');

    expect(lines[0]?.startsWith('#   EXECUTION ID')).toBe(true);
    expect(lines[2]).toBe(
      '1   ' +
        '20260102-143512-acme-corp'.padEnd(34) +
        'Acme Corp'.padEnd(22) +
        'PAUSED'.padEnd(11) +
        'structure'.padEnd(14) +
        '2026-01-02 14:35'
    );
    expect(lines[3]?.startsWith('    20260101-080000-globex')).toBe(true);
  });

  it('should list stage records with their data', () => {
    const lines = strip(formatStageResults(pausedExecution())).split('\n');

    expect(lines).toEqual([
      '[+] Discovery completed, 1 attempt',
      '    {',
      '      "name": "Acme Corp"',
      '    }',
      '[*] Structure running, 2 attempts',
    ]);
  });

  it('should build a lead report from stage outputs', () => {
    const execution: Execution = {
      ...pausedExecution(),
      status: 'completed',
      stageResults: {
        discovery: { status: 'completed', attempts: 1, data: ACME_PROFILE },
        roles: { status: 'completed', attempts: 1, data: ACME_ROLES },
        verification: {
          status: 'completed',
          attempts: 1,
          data: {
            status: 'verified',
            confidenceScore: 0.9,
            reason: 'base 0.5, accepted company +0.2, senior decision maker +0.2',
            summary: 'Acme Corp - 2 decision-makers, 0 contacts',
            recommendedAction: 'Proceed with outreach',
          },
        },
      },
    };

    expect(strip(formatLeadReport(execution) ?? '').split('\n')).toEqual([
      'Company:  Acme Corp (Industrial Automation, large)',
      'Website:  acme.test',
      '',
      'Decision makers (2):',
      '  - Jane Doe, CEO power 10',
      '  - John Roe, VP Sales power 8',
      '',
      'Verdict:  VERIFIED (confidence 0.9)',
      '  Acme Corp - 2 decision-makers, 0 contacts',
      '  Next: Proceed with outreach',
    ]);
  });

  it('should list lifecycle events with their stage and detail', () => {
    const lines = strip(
      formatEventHistory([
        { type: 'stage_started', at: '2026-01-02T14:35:13.000Z', stage: 'structure', detail: 'attempt 2' },
        { type: 'execution_completed', at: '2026-01-02T14:35:20.000Z' },
      ])
    ).split('\n');

    expect(lines).toEqual([
      `2026-01-02 14:35:13  stage_started${' '.repeat(9)}structure${' '.repeat(5)}attempt 2`,
      '2026-01-02 14:35:20  execution_completed',
    ]);
    expect(strip(formatEventHistory([]))).toBe('No events recorded.');
  });

  it('should return no report when no stage output is usable', () => {
    expect(formatLeadReport(pausedExecution())).toBeUndefined();
  });
});

// ============================================================================
// Command Handler Tests
// ============================================================================

describe('Command handlers', () => {
  let dataDir: string;
  let base: BaseCommand;
  let consoleSpy: ConsoleSpy;
  const config = loadConfig({});

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leadscout-cli-'));
    base = new BaseCommand({ dataDir, quiet: true });
    consoleSpy = spyConsole();
  });

  afterEach(async () => {
    restoreConsole(consoleSpy);
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  function twoStageRegistry(second: (invocation: StageInvocation) => Promise<unknown>): StageRegistry {
    return new StageRegistry()
      .register({ name: 'first', onFailure: 'abort', run: async () => ({ step: 1 }) })
      .register({ name: 'second', onFailure: 'abort', run: second });
  }

  /** Execution store on the same directory with a fixed clock */
  function storeAt(iso: string): ExecutionStateStore {
    const records = new FileRecordStore<Execution>({
      dir: getExecutionsDir(dataDir),
      schema: ExecutionSchema,
      schemaType: 'execution',
    });
    return new ExecutionStateStore({ records, clock: () => new Date(iso) });
  }

  async function seedPaused(iso: string, entity: string): Promise<Execution> {
    const store = storeAt(iso);
    const slot = new ExecutionSlot();
    slot.load(await store.create({ query: entity, entity, roles: [] }));
    await store.startExecution(slot);
    return store.pauseExecution(slot, 'Stopped by user');
  }

  async function seedCompleted(iso: string, entity: string): Promise<Execution> {
    const store = storeAt(iso);
    const slot = new ExecutionSlot();
    slot.load(await store.create({ query: entity, entity, roles: [] }));
    await store.startExecution(slot);
    return store.completeExecution(slot);
  }

  function jsonOutput(): unknown {
    const first = consoleSpy.log.mock.calls[0]?.[0];
    return JSON.parse(String(first));
  }

  describe('analyze', () => {
    it('should run every stage and release the run lock', async () => {
      const sink = new CollectingEventSink();
      const registry = twoStageRegistry(async () => ({ step: 2 }));

      const code = await handleAnalyze(['Acme', 'Corp,', 'Roles:', 'CEO'], base, {
        registry,
        config,
        sink,
        pollMs: 5,
      });

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const [summary] = await openExecutionStore(base).list();
      expect(summary).toMatchObject({ entity: 'Acme Corp', status: 'completed', completedStages: 2 });
      const stored = await openExecutionStore(base).resolve(summary?.id ?? '');
      expect(stored.input.roles).toEqual(['CEO']);
      expect(sink.ofKind('result')).toHaveLength(1);
      await expect(fs.access(getRunLockPath(dataDir))).rejects.toThrow();
    });

    it('should reject input without a company', async () => {
      await expect(handleAnalyze(['Roles:', 'CEO'], base, { config })).rejects.toThrow(
        'Input must name a company'
      );
    });

    it('should pause on a stop request and resume to completion', async () => {
      let firstAttempt = true;
      const registry = twoStageRegistry(async (invocation) => {
        if (!firstAttempt) {
          return { step: 2 };
        }
        firstAttempt = false;
        await handleStop({ reason: 'Stopped from another terminal' }, base);
        return waitForAbort(invocation.signal);
      });
      const deps = { registry, config, sink: new CollectingEventSink(), pollMs: 5 };

      const pausedCode = await handleAnalyze(['Acme'], base, deps);

      expect(pausedCode).toBe(EXIT_CODES.SUCCESS);
      const [paused] = await openExecutionStore(base).listResumable();
      expect(paused).toMatchObject({
        status: 'paused',
        currentStage: 'second',
        error: 'Stopped from another terminal',
      });

      const resumedCode = await handleResume('1', base, deps);

      expect(resumedCode).toBe(EXIT_CODES.SUCCESS);
      const resumed = await openExecutionStore(base).resolve(paused?.id ?? '');
      expect(resumed.status).toBe('completed');
      expect(resumed.stageResults['first']).toMatchObject({ status: 'completed', attempts: 1 });
      expect(resumed.stageResults['second']).toMatchObject({
        status: 'completed',
        attempts: 2,
        data: { step: 2 },
      });
    });

    it('should exit with ERROR when an aborting stage fails', async () => {
      const registry = twoStageRegistry(async () => {
        throw new Error('provider down');
      });

      const code = await handleAnalyze(['Acme'], base, { registry, config, sink: new CollectingEventSink() });

      expect(code).toBe(EXIT_CODES.ERROR);
      const [failed] = await openExecutionStore(base).list();
      expect(failed).toMatchObject({ status: 'failed', error: 'Stage second failed: provider down' });
    });
  });

  describe('reportRun', () => {
    it('should exit CANCELLED when Ctrl+C paused the run', () => {
      const execution = pausedExecution();

      expect(reportRun(base, { execution, interrupted: true }, 5)).toBe(EXIT_CODES.CANCELLED);
      expect(reportRun(base, { execution, interrupted: false }, 5)).toBe(EXIT_CODES.SUCCESS);
    });
  });

  describe('resume', () => {
    it('should refuse a completed execution', async () => {
      const done = await seedCompleted('2020-01-01T10:00:00.000Z', 'Globex');
      const registry = twoStageRegistry(async () => ({ step: 2 }));

      await expect(handleResume(done.id, base, { registry, config })).rejects.toBeInstanceOf(
        AlreadyCompletedError
      );
    });
  });

  describe('stop', () => {
    it('should fail with nothing running and touch no file', async () => {
      await expect(handleStop({}, base)).rejects.toBeInstanceOf(NoActiveExecutionError);
      expect(await fs.readdir(dataDir)).toEqual([]);
    });
  });

  describe('history', () => {
    it('should list resumable executions with ordinals', async () => {
      const paused = await seedPaused('2020-01-01T09:00:00.000Z', 'Acme');
      const done = await seedCompleted('2020-01-01T10:00:00.000Z', 'Globex');
      const jsonBase = new BaseCommand({ dataDir, json: true });

      await handleHistory({}, jsonBase);
      expect(jsonOutput()).toEqual([expect.objectContaining({ ordinal: 1, id: paused.id })]);

      consoleSpy.log.mockClear();
      await handleHistory({ all: true }, jsonBase);
      const rows = jsonOutput();
      expect(rows).toEqual([
        expect.objectContaining({ id: done.id, status: 'completed' }),
        expect.objectContaining({ ordinal: 1, id: paused.id, status: 'paused' }),
      ]);
    });
  });

  describe('show', () => {
    it('should print an execution by ordinal', async () => {
      const paused = await seedPaused('2020-01-01T09:00:00.000Z', 'Acme');

      await handleShow('1', new BaseCommand({ dataDir, json: true }));

      expect(jsonOutput()).toMatchObject({ id: paused.id, status: 'paused' });
    });

    it('should end with the most recent lifecycle events', async () => {
      await seedPaused('2020-01-01T09:00:00.000Z', 'Acme');

      await handleShow('1', new BaseCommand({ dataDir }), { events: 2 });

      const lines = loggedLines(consoleSpy);
      expect(lines.at(-1)).toBe(
        [
          '2020-01-01 09:00:00  execution_started',
          `2020-01-01 09:00:00  execution_paused${' '.repeat(20)}Stopped by user`,
        ].join('\n')
      );
      expect(lines.at(-3)).toBe('History');
    });

    it('should reject unknown references', async () => {
      await expect(handleShow('3', base)).rejects.toBeInstanceOf(ExecutionNotFoundError);
    });
  });

  describe('enrich', () => {
    function directory(
      answer: (query: ContactQuery) => ReturnType<ContactEnrichmentService['findContact']>
    ): ContactEnrichmentService & { queries: ContactQuery[] } {
      const queries: ContactQuery[] = [];
      return {
        name: 'directory',
        queries,
        findContact: (query) => {
          queries.push(query);
          return answer(query);
        },
      };
    }

    it('should print the contact found for "<name> at <company>"', async () => {
      const provider = directory(async (query) =>
        serviceOk({ name: query.name, email: 'jane@acme.test', source: 'directory' })
      );

      const code = await handleEnrich(['Jane', 'Doe', 'at', 'Acme', 'Corp'], new BaseCommand({ dataDir, color: false }), {
        services: { contactEnrichment: provider },
      });

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(provider.queries).toEqual([{ name: 'Jane Doe', company: 'Acme Corp' }]);
      expect(loggedLines(consoleSpy)).toEqual([
        'Enriching Jane Doe at Acme Corp',
        '[OK] Contact found',
        'Name: Jane Doe',
        'Company: Acme Corp',
        'Email: jane@acme.test',
        'Source: directory',
      ]);
    });

    it('should exit NOT_FOUND when the provider has no match', async () => {
      const provider = directory(async () => serviceOk<ContactRecord | null>(null));

      const code = await handleEnrich(['Jane Doe at Acme'], new BaseCommand({ dataDir, json: true }), {
        services: { contactEnrichment: provider },
      });

      expect(code).toBe(EXIT_CODES.NOT_FOUND);
      expect(jsonOutput()).toEqual({ name: 'Jane Doe', company: 'Acme', contact: null });
    });

    it('should exit USAGE_ERROR without a contact provider', async () => {
      const code = await handleEnrich(['Jane Doe at Acme'], base);

      expect(code).toBe(EXIT_CODES.USAGE_ERROR);
      expect(strip(String(consoleSpy.warn.mock.calls[0]?.[0]))).toBe(
        'Warning: No contact enrichment provider is configured'
      );
    });

    it('should surface provider failures as service errors', async () => {
      const provider = directory(async () => serviceFail<ContactRecord | null>('quota exceeded'));

      await expect(
        handleEnrich(['Jane Doe at Acme'], base, { services: { contactEnrichment: provider } })
      ).rejects.toThrow(new ServiceError('directory', 'quota exceeded', false));
    });

    it('should reject input without " at "', async () => {
      await expect(handleEnrich(['Jane', 'Doe'], base)).rejects.toThrow(
        'Input must be "<name> at <company>"'
      );
    });
  });

  describe('export', () => {
    it('should write completed executions to the given file', async () => {
      await seedPaused('2020-01-01T09:00:00.000Z', 'Acme');
      const done = await seedCompleted('2020-01-01T10:00:00.000Z', 'Globex');
      const output = path.join(dataDir, 'out', 'leads.csv');

      const code = await handleExport({ output }, new BaseCommand({ dataDir, json: true }));

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(jsonOutput()).toEqual({ filePath: output, executions: 1, rows: 1 });
      const lines = (await fs.readFile(output, 'utf-8')).split('\r\n');
      expect(lines[1]).toBe(
        [done.id, 'Globex', '', '', '', '', '', '', '', '', '', '2020-01-01T10:00:00.000Z'].join(',')
      );
    });

    it('should default to a timestamped file under exports/', async () => {
      await seedCompleted('2020-01-01T10:00:00.000Z', 'Globex');
      const now = new Date('2026-01-02T14:35:12.345Z');

      await handleExport({}, new BaseCommand({ dataDir, json: true }), () => now);

      const expected = path.join(dataDir, 'exports', 'leads-2026-01-02T14-35-12.csv');
      expect(defaultExportFileName(now)).toBe('leads-2026-01-02T14-35-12.csv');
      expect(jsonOutput()).toMatchObject({ filePath: expected });
      await expect(fs.access(expected)).resolves.toBeUndefined();
    });

    it('should write nothing when no execution has completed', async () => {
      await seedPaused('2020-01-01T09:00:00.000Z', 'Acme');

      await handleExport({}, new BaseCommand({ dataDir, json: true }));

      expect(jsonOutput()).toEqual({ filePath: null, executions: 0, rows: 0 });
      expect(await fs.readdir(dataDir)).toEqual(['executions']);
    });
  });

  describe('forget', () => {
    it('should clear long-term memory for the entity', async () => {
      await openMemory(base).rememberLongTerm('acme corp', { key: 'industry', value: 'Robotics' });

      await handleForget('  Acme   Corp ', new BaseCommand({ dataDir, json: true }));

      expect(jsonOutput()).toEqual({ entityKey: 'acme corp', removed: true });
      expect(await openMemory(base).recall('acme corp')).toEqual([]);
    });
  });

  describe('prune', () => {
    it('should remove old completed executions only', async () => {
      const paused = await seedPaused('2020-01-01T09:00:00.000Z', 'Acme');
      const done = await seedCompleted('2020-01-01T10:00:00.000Z', 'Globex');

      await handlePrune({ days: 7 }, new BaseCommand({ dataDir, json: true }));

      expect(jsonOutput()).toEqual({ days: 7, removed: [done.id] });
      const remaining = await openExecutionStore(base).list();
      expect(remaining.map((summary) => summary.id)).toEqual([paused.id]);
    });
  });
});
