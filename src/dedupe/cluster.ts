/**
 * Cluster Formation for Listing Deduplication
 *
 * Groups listings describing the same property:
 * 1. Map listing ids onto a dense index (ids sorted lexicographically)
 * 2. Union every scored pair with score >= threshold
 * 3. Each union-find component becomes one cluster
 *
 * Canonical representative, in order of preference:
 * - most non-missing fields
 * - earliest ingestion timestamp
 * - lexicographically smallest id
 *
 * Clusters are ordered by their smallest member id and numbered in that
 * order, so identical input yields identical output whatever the input order.
 *
 * @module dedupe/cluster
 */

import type { NormalizedListing } from '../schemas/listing.js';
import type { Cluster, SimilarityScore } from '../schemas/evidence.js';
import { UnionFind } from './union-find.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of the clustering process.
 */
export interface ClusterResult {
  /** One cluster per property, singletons included */
  clusters: Cluster[];
  /** Statistics about the clustering process */
  stats: {
    originalCount: number;
    clusterCount: number;
    /** Pairs at or above the threshold */
    acceptedPairCount: number;
    /** Listings that are not the canonical of their cluster */
    duplicateCount: number;
  };
}

// ============================================================================
// Canonical selection
// ============================================================================

function timestampOf(listing: NormalizedListing): number {
  return Date.parse(listing.ingestedAt);
}

/**
 * Total order used to choose a canonical listing. Negative when `a` is
 * preferred over `b`.
 */
export function compareCanonicalPreference(a: NormalizedListing, b: NormalizedListing): number {
  if (a.completeness !== b.completeness) {
    return b.completeness - a.completeness;
  }

  const timeA = timestampOf(a);
  const timeB = timestampOf(b);
  if (timeA !== timeB) {
    return timeA - timeB;
  }

  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Pick the canonical representative of a group of listings.
 *
 * @throws Error for an empty group
 */
export function selectCanonical(members: readonly NormalizedListing[]): NormalizedListing {
  if (members.length === 0) {
    throw new Error('Cannot select a canonical listing from an empty cluster');
  }
  return members.reduce((best, current) =>
    compareCanonicalPreference(current, best) < 0 ? current : best
  );
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Form clusters from scored pairs.
 *
 * @param listings - Every accepted listing of the batch
 * @param scores - Scores of the candidate pairs, keyed by pair key
 * @param threshold - Minimum score for a pair to merge its listings
 * @returns Clusters covering every listing exactly once
 * @throws Error if a score references a listing missing from `listings`
 *
 * @example
 * ```typescript
 * const { clusters } = buildClusters(normalized, scores, 0.75);
 * const merged = clusters.filter((c) => c.memberIds.length > 1);
 * ```
 */
export function buildClusters(
  listings: readonly NormalizedListing[],
  scores: ReadonlyMap<string, SimilarityScore>,
  threshold: number
): ClusterResult {
  const sorted = [...listings].sort((x, y) => (x.id < y.id ? -1 : x.id > y.id ? 1 : 0));
  const indexOf = new Map<string, number>();
  sorted.forEach((listing, index) => indexOf.set(listing.id, index));

  const resolve = (id: string): number => {
    const index = indexOf.get(id);
    if (index === undefined) {
      throw new Error(`Score references unknown listing ${id}`);
    }
    return index;
  };

  const forest = new UnionFind(sorted.length);
  let acceptedPairCount = 0;

  for (const { pair, score } of scores.values()) {
    const x = resolve(pair.a);
    const y = resolve(pair.b);
    if (score >= threshold) {
      forest.union(x, y);
      acceptedPairCount++;
    }
  }

  // Weakest scored link inside each component, accepted or not
  const weakest = new Map<number, number>();
  for (const { pair, score } of scores.values()) {
    const root = forest.find(resolve(pair.a));
    if (root !== forest.find(resolve(pair.b))) continue;
    weakest.set(root, Math.min(weakest.get(root) ?? 1, score));
  }

  const clusters = forest.components().map((indices, clusterIndex): Cluster => {
    const members = indices.map((i) => sorted[i]);
    const canonical = selectCanonical(members);
    const confidence = members.length === 1 ? 1.0 : (weakest.get(forest.find(indices[0])) ?? 1.0);

    return Object.freeze({
      clusterId: `cluster_${clusterIndex.toString().padStart(3, '0')}`,
      memberIds: members.map((m) => m.id),
      canonicalId: canonical.id,
      confidence,
    });
  });

  return {
    clusters,
    stats: {
      originalCount: sorted.length,
      clusterCount: clusters.length,
      acceptedPairCount,
      duplicateCount: sorted.length - clusters.length,
    },
  };
}
