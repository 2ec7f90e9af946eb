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
  STAGE_LABELS,
  formatDuration,
  type StageStatus,
  type StageDisplay,
  type SpinnerOptions,
} from './progress.js';

// Report tables
export {
  formatDetectionStats,
  formatClusterTable,
  formatDetectionSummary,
  formatDiffSummary,
  padRight,
} from './summary.js';
