/**
 * Pipeline Type Definitions
 *
 * Core interfaces for the detection pipeline. These types define the
 * contracts between stages, the execution context, and the results
 * structure.
 *
 * Stages run synchronously and in order; each consumes the immutable output
 * of the previous one.
 *
 * @module pipeline/types
 */

import type { DedupeConfig } from '../schemas/config.js';

// ============================================================================
// Stage Numbers and Names
// ============================================================================

/**
 * Stage numbering:
 * - 01: Validate (ingestion screening)
 * - 02: Normalize
 * - 03: Candidates (blocking)
 * - 04: Score
 * - 05: Cluster
 * - 06: Evidence
 */
export type StageNumber = 1 | 2 | 3 | 4 | 5 | 6;

export type StageName =
  | 'listings_validated'
  | 'listings_normalized'
  | 'candidate_pairs'
  | 'pair_scores'
  | 'clusters'
  | 'evidence';

/**
 * Mapping from stage number to stage name.
 */
export const STAGE_NAMES: Record<StageNumber, StageName> = {
  1: 'listings_validated',
  2: 'listings_normalized',
  3: 'candidate_pairs',
  4: 'pair_scores',
  5: 'clusters',
  6: 'evidence',
} as const;

/**
 * Stage id in `NN_stage_name` form, e.g. `03_candidate_pairs`.
 */
export function getStageId(stageNumber: StageNumber): string {
  return `${stageNumber.toString().padStart(2, '0')}_${STAGE_NAMES[stageNumber]}`;
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Runtime context passed to each stage.
 */
export interface StageContext {
  /** Validated detection configuration */
  config: DedupeConfig;

  /** Optional logger for stage output */
  logger?: Logger;
}

// ============================================================================
// Stage Result
// ============================================================================

/**
 * Execution timing of a stage or of the whole pipeline.
 */
export interface Timing {
  /** ISO8601 timestamp when execution started */
  startedAt: string;
  /** ISO8601 timestamp when execution completed */
  completedAt: string;
  /** Duration in milliseconds */
  durationMs: number;
}

/**
 * Result returned by a stage after execution.
 *
 * @typeParam T - The type of the stage output data
 */
export interface StageResult<T> {
  /** The stage output data */
  data: T;

  /** Execution timing information */
  timing: Timing;
}

// ============================================================================
// Stage Interface
// ============================================================================

/**
 * Typed pipeline stage.
 *
 * @typeParam TInput - Output of the upstream stage
 * @typeParam TOutput - Output produced by this stage
 *
 * @example
 * ```typescript
 * const clusterStage: TypedStage<ScoreStageOutput, ClusterResult> = {
 *   id: '05_clusters',
 *   name: 'clusters',
 *   number: 5,
 *   execute(context, input) {
 *     return timed(() => buildClusters(...));
 *   },
 * };
 * ```
 */
export interface TypedStage<TInput, TOutput> {
  /** Stage identifier in format NN_stage_name */
  id: string;

  /** Stage name */
  name: StageName;

  /** Numeric stage number */
  number: StageNumber;

  /**
   * Execute the stage with the given context and typed input.
   */
  execute(context: StageContext, input: TInput): StageResult<TOutput>;
}

// ============================================================================
// Callbacks
// ============================================================================

/**
 * Stage lifecycle callbacks, used by the CLI to drive progress display.
 */
export interface PipelineCallbacks {
  /** Called when a stage starts */
  onStageStart?: (stageId: string, stageNumber: StageNumber) => void;
  /** Called when a stage completes */
  onStageComplete?: (stageId: string, stageNumber: StageNumber, timing: Timing) => void;
}
