/**
 * Scoring Stage (Stage 04)
 *
 * Scores every candidate pair. Pairs are independent; results are keyed by
 * pair key.
 *
 * @module stages/score
 */

import type { NormalizedListing } from '../schemas/listing.js';
import type { CandidatePair, SimilarityScore } from '../schemas/evidence.js';
import { getStageId, type TypedStage } from '../pipeline/types.js';
import { timed } from '../pipeline/executor.js';
import { scoreCandidatePairs } from '../dedupe/similarity.js';

export interface ScoreStageInput {
  pairs: readonly CandidatePair[];
  listings: ReadonlyMap<string, NormalizedListing>;
}

export const scoreStage: TypedStage<ScoreStageInput, Map<string, SimilarityScore>> = {
  id: getStageId(4),
  name: 'pair_scores',
  number: 4,

  execute(context, input) {
    return timed(() => {
      const { config } = context;
      const scores = scoreCandidatePairs(input.pairs, input.listings, config.featureWeights);

      let accepted = 0;
      for (const score of scores.values()) {
        if (score.score >= config.similarityThreshold) accepted++;
      }
      context.logger?.info(
        `[score] Scored ${scores.size} pairs, ${accepted} at or above ${config.similarityThreshold}`
      );

      return scores;
    });
  },
};

export default scoreStage;
