/**
 * Per-listing duplicate flags, for tabular exports.
 *
 * @module analysis/flags
 */

import type { EvidenceSummary } from '../schemas/evidence.js';

export interface DuplicateFlag {
  listingId: string;
  clusterId: string;
  canonicalId: string;
  /** True for every member that is not its cluster's canonical listing */
  isDuplicate: boolean;
}

/**
 * Flag every listing of a run, sorted by listing id.
 */
export function markDuplicates(summaries: readonly EvidenceSummary[]): DuplicateFlag[] {
  const flags: DuplicateFlag[] = [];

  for (const summary of summaries) {
    for (const listingId of summary.memberIds) {
      flags.push({
        listingId,
        clusterId: summary.clusterId,
        canonicalId: summary.canonicalId,
        isDuplicate: listingId !== summary.canonicalId,
      });
    }
  }

  return flags.sort((x, y) => (x.listingId < y.listingId ? -1 : x.listingId > y.listingId ? 1 : 0));
}
