/**
 * Evidence Stage (Stage 06)
 *
 * Builds the per-cluster evidence summaries returned to callers.
 *
 * @module stages/evidence
 */

import type { NormalizedListing } from '../schemas/listing.js';
import type { Cluster, EvidenceSummary, SimilarityScore } from '../schemas/evidence.js';
import { getStageId, type TypedStage } from '../pipeline/types.js';
import { timed } from '../pipeline/executor.js';
import { summarizeClusters } from '../dedupe/evidence.js';

export interface EvidenceStageInput {
  clusters: readonly Cluster[];
  scores: ReadonlyMap<string, SimilarityScore>;
  listings: ReadonlyMap<string, NormalizedListing>;
}

export const evidenceStage: TypedStage<EvidenceStageInput, EvidenceSummary[]> = {
  id: getStageId(6),
  name: 'evidence',
  number: 6,

  execute(context, input) {
    return timed(() => {
      const summaries = summarizeClusters(
        input.clusters,
        input.scores,
        input.listings,
        context.config.similarityThreshold
      );

      const crossSource = summaries.filter((s) => s.sources.length > 1).length;
      context.logger?.info(
        `[evidence] ${summaries.length} summaries, ${crossSource} spanning both sources`
      );

      return summaries;
    });
  },
};

export default evidenceStage;
