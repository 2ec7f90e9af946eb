/**
 * Candidate Pair Stage (Stage 03)
 *
 * Blocks normalized listings and emits the pairs worth scoring.
 * Needs the whole batch at once: blocking is a global index.
 *
 * @module stages/candidates
 */

import type { NormalizedListing } from '../schemas/listing.js';
import { getStageId, type TypedStage } from '../pipeline/types.js';
import { timed } from '../pipeline/executor.js';
import { generateCandidatePairs, type CandidateGenerationResult } from '../dedupe/blocking.js';

export const candidatesStage: TypedStage<readonly NormalizedListing[], CandidateGenerationResult> = {
  id: getStageId(3),
  name: 'candidate_pairs',
  number: 3,

  execute(context, input) {
    return timed(() => {
      const result = generateCandidatePairs(input, { maxBlockSize: context.config.maxBlockSize });

      const allPairs = (input.length * (input.length - 1)) / 2;
      context.logger?.info(
        `[candidates] ${result.pairs.length} candidate pairs from ${result.blocks.length} blocks ` +
          `(all-pairs would be ${allPairs})`
      );
      for (const warning of result.warnings) {
        context.logger?.warn(`[candidates] ${warning.message}`);
      }

      return result;
    });
  },
};

export default candidatesStage;
