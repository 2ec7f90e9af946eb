/**
 * Normalization Stage (Stage 02)
 *
 * Maps each accepted listing to its NormalizedListing. Listings are
 * independent of one another.
 *
 * @module stages/normalize
 */

import type { Listing, NormalizedListing } from '../schemas/listing.js';
import { getStageId, type TypedStage } from '../pipeline/types.js';
import { timed } from '../pipeline/executor.js';
import { normalizeListing } from '../dedupe/normalize.js';

export const normalizeStage: TypedStage<readonly Listing[], NormalizedListing[]> = {
  id: getStageId(2),
  name: 'listings_normalized',
  number: 2,

  execute(context, input) {
    return timed(() => {
      const normalized = input.map((listing) => normalizeListing(listing, context.config));

      const sparse = normalized.filter((n) => n.price === null && n.surface === null).length;
      const noCity = normalized.filter((n) => n.city === '').length;
      context.logger?.info(`[normalize] Normalized ${normalized.length} listings`);
      if (sparse > 0 || noCity > 0) {
        context.logger?.debug(
          `[normalize] ${sparse} without price or surface, ${noCity} without city`
        );
      }

      return normalized;
    });
  },
};

export default normalizeStage;
