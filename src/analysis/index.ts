/**
 * Analysis Module Exports
 *
 * @module analysis
 */

export {
  computeSourceDifferences,
  comparableValue,
  KEY_FIELDS,
  type KeyField,
  type FieldValue,
  type FieldMismatch,
  type ClusterMismatch,
  type SourceDifferenceOptions,
  type SourceDifferenceReport,
} from './diff.js';
export { markDuplicates, type DuplicateFlag } from './flags.js';
