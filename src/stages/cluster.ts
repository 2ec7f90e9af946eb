/**
 * Cluster Stage (Stage 05)
 *
 * Unions accepted pairs into clusters and picks each cluster's canonical
 * listing.
 *
 * @module stages/cluster
 */

import type { NormalizedListing } from '../schemas/listing.js';
import type { SimilarityScore } from '../schemas/evidence.js';
import { getStageId, type TypedStage } from '../pipeline/types.js';
import { timed } from '../pipeline/executor.js';
import { buildClusters, type ClusterResult } from '../dedupe/cluster.js';

export interface ClusterStageInput {
  listings: readonly NormalizedListing[];
  scores: ReadonlyMap<string, SimilarityScore>;
}

export const clusterStage: TypedStage<ClusterStageInput, ClusterResult> = {
  id: getStageId(5),
  name: 'clusters',
  number: 5,

  execute(context, input) {
    return timed(() => {
      const result = buildClusters(input.listings, input.scores, context.config.similarityThreshold);

      context.logger?.info(
        `[cluster] Reduced ${result.stats.originalCount} → ${result.stats.clusterCount} properties ` +
          `(${result.stats.duplicateCount} duplicates)`
      );

      const merged = result.clusters.filter((c) => c.memberIds.length > 1);
      if (merged.length > 0) {
        context.logger?.debug(`[cluster] ${merged.length} clusters with multiple members:`);
        for (const cluster of merged.slice(0, 5)) {
          context.logger?.debug(
            `  - ${cluster.clusterId}: ${cluster.memberIds.length} members, ` +
              `canonical=${cluster.canonicalId}, confidence=${cluster.confidence.toFixed(3)}`
          );
        }
        if (merged.length > 5) {
          context.logger?.debug(`  ... and ${merged.length - 5} more`);
        }
      }

      return result;
    });
  },
};

export default clusterStage;
