/**
 * Validation Stage (Stage 01)
 *
 * Screens the raw batch handed over by ingestion. Rejected records are
 * reported and skipped; the rest of the batch continues.
 *
 * @module stages/validate
 */

import type { Listing } from '../schemas/listing.js';
import type { RejectedListing } from '../schemas/evidence.js';
import { getStageId, type TypedStage } from '../pipeline/types.js';
import { timed } from '../pipeline/executor.js';
import { toRejectedListing, validateListings } from '../dedupe/ingest.js';

/**
 * Output of the validation stage.
 */
export interface ValidateStageOutput {
  /** Listings allowed into the pipeline */
  listings: Listing[];
  /** Records skipped, in input order */
  rejected: RejectedListing[];
}

export const validateStage: TypedStage<readonly unknown[], ValidateStageOutput> = {
  id: getStageId(1),
  name: 'listings_validated',
  number: 1,

  execute(context, input) {
    return timed(() => {
      const { accepted, errors } = validateListings(input);

      for (const error of errors) {
        context.logger?.warn(`[validate] ${error.message}`);
      }
      context.logger?.info(
        `[validate] Accepted ${accepted.length} of ${input.length} listings` +
          (errors.length > 0 ? ` (${errors.length} rejected)` : '')
      );

      return { listings: accepted, rejected: errors.map(toRejectedListing) };
    });
  },
};

export default validateStage;
