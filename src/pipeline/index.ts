/**
 * Pipeline Module Exports
 *
 * @module pipeline
 */

export * from './types.js';
export { PipelineExecutor, timed, type PipelineTiming } from './executor.js';
export { resolveDedupeConfig, resolveFeatureWeights } from './config.js';
export {
  detectDuplicates,
  type DetectOptions,
  type DetectionResult,
  type DetectionStats,
} from './detect.js';
