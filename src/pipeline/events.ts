/**
 * Pipeline Events
 *
 * One event per state transition, delivered synchronously to an EventSink.
 * The CLI renders them as spinners or JSON lines; a UI could forward them
 * over any push channel.
 *
 * @module pipeline/events
 */

// ============================================================================
// Types
// ============================================================================

export type PipelineEventKind = 'progress' | 'log' | 'result' | 'error';

/**
 * How a resumed stage was reconciled with its checkpoint.
 * - `restored`: partial data from the checkpoint was kept, stage not re-run
 * - `fresh`: the checkpoint held no data, stage re-runs from scratch
 * - `retry`: the stage had failed before and runs again
 */
export type RecoveryKind = 'restored' | 'fresh' | 'retry';

export type ProgressStatus = 'running' | 'completed' | 'failed' | 'paused';

export interface PipelineEvent {
  event: PipelineEventKind;
  executionId: string;
  stage?: string;
  status?: ProgressStatus;
  data?: unknown;
  error?: string;
  recovery?: RecoveryKind;
  /** Human-readable line for log-style consumers */
  message?: string;
  timestamp: string;
}

/**
 * Receives pipeline events. `emit` must not throw; sinks that do I/O
 * handle their own failures.
 */
export interface EventSink {
  emit(event: PipelineEvent): void;
}

// ============================================================================
// Built-in Sinks
// ============================================================================

/**
 * Sink that drops every event.
 */
export const nullEventSink: EventSink = {
  emit: () => undefined,
};

/**
 * Sink that keeps every event in order. Useful for tests and for callers
 * that want a transcript of a run.
 */
export class CollectingEventSink implements EventSink {
  readonly events: PipelineEvent[] = [];

  emit(event: PipelineEvent): void {
    this.events.push(event);
  }

  /**
   * Events of one kind, optionally for one stage.
   */
  ofKind(kind: PipelineEventKind, stage?: string): PipelineEvent[] {
    return this.events.filter(
      (event) => event.event === kind && (stage === undefined || event.stage === stage)
    );
  }

  /**
   * Compact `kind:stage:status` strings, handy for asserting event order.
   */
  trail(): string[] {
    return this.events.map((event) =>
      [event.event, event.stage ?? '-', event.status ?? event.recovery ?? '-'].join(':')
    );
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Forward every event to several sinks in order.
 */
export class FanOutEventSink implements EventSink {
  private readonly sinks: EventSink[];

  constructor(...sinks: EventSink[]) {
    this.sinks = sinks;
  }

  emit(event: PipelineEvent): void {
    for (const sink of this.sinks) {
      sink.emit(event);
    }
  }
}
