/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  ProgressEventSink,
  formatDuration,
  stageLabel,
  type DisplayStatus,
  type StageDisplay,
  type SpinnerOptions,
} from './progress.js';

// Machine-readable event stream
export { JsonLinesSink, type LineWriter } from './json-lines.js';

// Run summary formatters
export {
  formatExecutionSummary,
  formatLeadReport,
  formatHistoryTable,
  formatStageResults,
  formatEventHistory,
} from './run-summary.js';
