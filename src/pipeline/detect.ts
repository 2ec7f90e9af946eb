/**
 * Duplicate Detection Entry Point
 *
 * Runs the full pipeline over one batch:
 * validate → normalize → candidates → score → cluster → evidence.
 *
 * Each call is a pure function of its inputs and config (apart from timing):
 * no state survives between calls, so independent batches can run side by
 * side. A run either completes over every accepted listing or throws before
 * producing anything.
 *
 * @module pipeline/detect
 */

import type { NormalizedListing } from '../schemas/listing.js';
import type { DedupeConfig, DedupeConfigInput } from '../schemas/config.js';
import type {
  EvidenceSummary,
  OversizedBlockWarning,
  RejectedListing,
} from '../schemas/evidence.js';
import type { Logger, PipelineCallbacks, StageContext } from './types.js';
import { PipelineExecutor, type PipelineTiming } from './executor.js';
import { resolveDedupeConfig } from './config.js';
import { validateStage } from '../stages/validate.js';
import { normalizeStage } from '../stages/normalize.js';
import { candidatesStage } from '../stages/candidates.js';
import { scoreStage } from '../stages/score.js';
import { clusterStage } from '../stages/cluster.js';
import { evidenceStage } from '../stages/evidence.js';

// ============================================================================
// Types
// ============================================================================

export interface DetectOptions extends PipelineCallbacks {
  logger?: Logger;
}

export interface DetectionStats {
  /** Records received */
  inputCount: number;
  /** Records that entered the pipeline */
  acceptedCount: number;
  /** Records rejected during validation */
  rejectedCount: number;
  /** Pairs produced by blocking */
  candidatePairCount: number;
  /** Pairs at or above the threshold */
  acceptedPairCount: number;
  /** Distinct properties found */
  clusterCount: number;
  /** Listings that duplicate another listing's property */
  duplicateCount: number;
}

export interface DetectionResult {
  /** One summary per cluster, ordered by smallest member id */
  summaries: EvidenceSummary[];
  /** Records skipped during validation */
  rejected: RejectedListing[];
  /** Blocks that exceeded maxBlockSize */
  warnings: OversizedBlockWarning[];
  /** Configuration the run used, after defaults */
  config: DedupeConfig;
  stats: DetectionStats;
  timing: PipelineTiming;
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Detect duplicate listings in a batch.
 *
 * @param listings - Raw listing records from ingestion
 * @param config - Optional detection config, defaults applied per field
 * @param options - Logger and stage callbacks
 * @throws ConfigurationError before any work if the config is invalid
 *
 * @example
 * ```typescript
 * const result = detectDuplicates(feed, { similarityThreshold: 0.8 }, { logger });
 * for (const summary of result.summaries) {
 *   if (summary.size > 1) console.log(summary.canonicalId, summary.memberIds);
 * }
 * ```
 */
export function detectDuplicates(
  listings: readonly unknown[],
  config: DedupeConfigInput = {},
  options: DetectOptions = {}
): DetectionResult {
  const resolved = resolveDedupeConfig(config);
  const context: StageContext = { config: resolved, logger: options.logger };
  const executor = new PipelineExecutor(context, options);

  const validated = executor.run(validateStage, listings);
  const normalized = executor.run(normalizeStage, validated.listings);
  const byId: ReadonlyMap<string, NormalizedListing> = new Map(normalized.map((n) => [n.id, n]));

  const candidates = executor.run(candidatesStage, normalized);
  const scores = executor.run(scoreStage, { pairs: candidates.pairs, listings: byId });
  const clustered = executor.run(clusterStage, { listings: normalized, scores });
  const summaries = executor.run(evidenceStage, {
    clusters: clustered.clusters,
    scores,
    listings: byId,
  });

  return {
    summaries,
    rejected: validated.rejected,
    warnings: candidates.warnings,
    config: resolved,
    stats: {
      inputCount: listings.length,
      acceptedCount: validated.listings.length,
      rejectedCount: validated.rejected.length,
      candidatePairCount: candidates.pairs.length,
      acceptedPairCount: clustered.stats.acceptedPairCount,
      clusterCount: clustered.stats.clusterCount,
      duplicateCount: clustered.stats.duplicateCount,
    },
    timing: executor.finish(),
  };
}
