/**
 * JSON Lines Sink
 *
 * Streams every pipeline event as one JSON object per line, for `--json`.
 *
 * @module cli/formatters/json-lines
 */

import type { EventSink, PipelineEvent } from '../../pipeline/events.js';

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(line);
};

export class JsonLinesSink implements EventSink {
  constructor(private readonly write: LineWriter = stdoutWriter) {}

  emit(event: PipelineEvent): void {
    this.write(`${JSON.stringify(event)}\n`);
  }
}
