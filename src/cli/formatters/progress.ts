/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - Stage progress display with checkmarks
 * - An EventSink that drives the display from pipeline events
 *
 * Uses the ora library for terminal spinners. Without a TTY every
 * transition is printed as one plain line instead.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { EventSink, PipelineEvent } from '../../pipeline/events.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Stage display status for progress tracking.
 */
export type DisplayStatus = 'pending' | 'running' | 'completed' | 'restored' | 'failed' | 'paused';

/**
 * Stage display information.
 */
export interface StageDisplay {
  /** Stage name as registered */
  name: string;
  /** Current status */
  status: DisplayStatus;
  /** Duration in milliseconds (if completed) */
  durationMs?: number;
  /** Error message (if failed) */
  error?: string;
}

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
}

// ============================================================================
// Status Icons
// ============================================================================

/**
 * Icons for each stage status.
 */
const STATUS_ICONS: Record<DisplayStatus, string> = {
  pending: chalk.dim('\u25CB'), // ○
  running: chalk.cyan('\u25CF'), // ●
  completed: chalk.green('\u2714'), // ✔
  restored: chalk.green('\u21BA'), // ↺
  failed: chalk.red('\u2718'), // ✘
  paused: chalk.yellow('\u2016'), // ‖
};

/**
 * Plain text icons for non-TTY output.
 */
const STATUS_ICONS_PLAIN: Record<DisplayStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
  restored: '[+]',
  failed: '[X]',
  paused: '[-]',
};

/**
 * Human-readable label for a stage name: `verification` -> `Verification`.
 */
export function stageLabel(name: string): string {
  return name
    .split(/[-_]/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading data...');
 * spinner.start();
 *
 * try {
 *   await loadData();
 *   spinner.succeed('Data loaded successfully');
 * } catch (err) {
 *   spinner.fail('Failed to load data');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  info(text?: string): this {
    this.spinner.info(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display pipeline stage progress with checkmarks.
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay(registry.names());
 *
 * progress.startStage('discovery');
 * progress.completeStage('discovery', 1234);
 *
 * progress.startStage('structure');
 * progress.failStage('structure', 'Missing discovery output');
 *
 * progress.printSummary();
 * ```
 */
export class StageProgressDisplay {
  private stages: Map<string, StageDisplay> = new Map();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor(stageNames: readonly string[] = [], options: { tty?: boolean } = {}) {
    this.isTTY = options.tty ?? process.stdout.isTTY === true;
    for (const name of stageNames) {
      this.stages.set(name, { name, status: 'pending' });
    }
  }

  /**
   * Mark a stage as running.
   */
  startStage(name: string, description?: string): void {
    const stage = this.track(name);
    stage.status = 'running';
    delete stage.error;

    const text = `${stageLabel(name)}...${description ? chalk.dim(` ${description}`) : ''}`;
    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(text).start();
    } else {
      console.log(`${STATUS_ICONS_PLAIN.running} ${stageLabel(name)}...`);
    }
  }

  completeStage(name: string, durationMs?: number): void {
    const stage = this.track(name);
    stage.status = 'completed';
    stage.durationMs = durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${stageLabel(name)} complete`);
      this.currentSpinner = null;
    } else {
      const durationStr = durationMs !== undefined ? ` (${formatDuration(durationMs)})` : '';
      console.log(`${STATUS_ICONS_PLAIN.completed} ${stageLabel(name)}${durationStr}`);
    }
  }

  /**
   * Mark a stage as completed from its checkpointed partial data.
   */
  restoreStage(name: string): void {
    this.track(name).status = 'restored';
    const line = `${stageLabel(name)} (restored from checkpoint)`;
    if (this.isTTY) {
      console.log(`${STATUS_ICONS.restored} ${line}`);
    } else {
      console.log(`${STATUS_ICONS_PLAIN.restored} ${line}`);
    }
  }

  failStage(name: string, error: string): void {
    const stage = this.track(name);
    stage.status = 'failed';
    stage.error = error;

    if (this.currentSpinner) {
      this.currentSpinner.fail(`${stageLabel(name)} failed: ${error}`);
      this.currentSpinner = null;
    } else {
      console.log(`${STATUS_ICONS_PLAIN.failed} ${stageLabel(name)} - ${error}`);
    }
  }

  /**
   * Record a pause. The stage is optional: a stop observed between stages
   * pauses the run without one.
   */
  pause(reason: string, name?: string): void {
    const label = name ? `${stageLabel(name)} paused` : 'Paused';
    if (name) {
      this.track(name).status = 'paused';
    }

    if (this.currentSpinner) {
      this.currentSpinner.warn(`${label}: ${reason}`);
      this.currentSpinner = null;
    } else {
      console.log(`${STATUS_ICONS_PLAIN.paused} ${label}: ${reason}`);
    }
  }

  /**
   * Print an indented note under the current stage.
   */
  note(message: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.stop();
      console.log(chalk.dim(`    ${message}`));
      this.currentSpinner.start();
    } else {
      console.log(`    ${message}`);
    }
  }

  getStageDisplay(name: string): StageDisplay | undefined {
    return this.stages.get(name);
  }

  getAllStages(): StageDisplay[] {
    return Array.from(this.stages.values());
  }

  formatStageLine(stage: StageDisplay): string {
    const icon = this.isTTY ? STATUS_ICONS[stage.status] : STATUS_ICONS_PLAIN[stage.status];
    let line = `${icon} ${stageLabel(stage.name)}`;

    if (stage.durationMs !== undefined) {
      line += chalk.dim(` (${formatDuration(stage.durationMs)})`);
    }
    if (stage.error) {
      line += chalk.red(` - ${stage.error}`);
    }
    return line;
  }

  printSummary(): void {
    console.log();
    console.log(chalk.bold('Pipeline Progress'));
    console.log(chalk.dim('─'.repeat(40)));
    for (const stage of this.getAllStages()) {
      console.log(this.formatStageLine(stage));
    }
    console.log();
  }

  getCounts(): Record<DisplayStatus, number> {
    const counts: Record<DisplayStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      restored: 0,
      failed: 0,
      paused: 0,
    };
    for (const stage of this.stages.values()) {
      counts[stage.status]++;
    }
    return counts;
  }

  /**
   * Stop any running spinner without a symbol, e.g. before exiting.
   */
  dispose(): void {
    this.currentSpinner?.stop();
    this.currentSpinner = null;
  }

  private track(name: string): StageDisplay {
    let stage = this.stages.get(name);
    if (!stage) {
      stage = { name, status: 'pending' };
      this.stages.set(name, stage);
    }
    return stage;
  }
}

// ============================================================================
// Event Sink
// ============================================================================

/**
 * Renders pipeline events on a StageProgressDisplay.
 *
 * Stage durations are measured between the `running` and `completed`
 * events' timestamps. Plain log events are shown only in verbose mode;
 * recovery notices always are.
 */
export class ProgressEventSink implements EventSink {
  private readonly startedAt = new Map<string, number>();

  constructor(
    readonly display: StageProgressDisplay,
    private readonly options: { verbose?: boolean } = {}
  ) {}

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'progress':
        this.onProgress(event);
        return;
      case 'error':
        if (event.stage) {
          this.display.failStage(event.stage, event.error ?? 'failed');
        }
        return;
      case 'log':
        if (event.recovery === 'fresh' || event.recovery === 'retry' || this.options.verbose) {
          if (event.message) {
            this.display.note(event.message);
          }
        }
        return;
      case 'result':
        return;
    }
  }

  private onProgress(event: PipelineEvent): void {
    const stage = event.stage;
    const at = Date.parse(event.timestamp);

    if (event.status === 'paused') {
      this.display.pause(event.message ?? 'paused', stage);
      return;
    }
    if (!stage) {
      return;
    }
    if (event.status === 'running') {
      this.startedAt.set(stage, at);
      this.display.startStage(stage, this.options.verbose ? event.message : undefined);
      return;
    }
    if (event.status === 'completed') {
      if (event.recovery === 'restored') {
        this.display.restoreStage(stage);
        return;
      }
      const started = this.startedAt.get(stage);
      this.display.completeStage(stage, started === undefined ? undefined : Math.max(0, at - started));
    }
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * formatDuration(850)    // '850ms'
 * formatDuration(1500)   // '1.5s'
 * formatDuration(154000) // '2m 34s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
