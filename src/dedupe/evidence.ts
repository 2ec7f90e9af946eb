/**
 * Evidence Reporting
 *
 * Builds the per-cluster summary handed to the presentation side: members,
 * canonical id, confidence, and the feature breakdown of every scored pair
 * inside the cluster. Read-only over clusters and scores.
 *
 * Confidence is the minimum intra-cluster pair score, so one weak link in a
 * chain of merges stays visible.
 *
 * @module dedupe/evidence
 */

import type { FeatureName, ListingSource } from '../schemas/common.js';
import type { NormalizedListing, Range } from '../schemas/listing.js';
import type {
  Cluster,
  EvidenceSummary,
  FeatureBreakdown,
  PairEvidence,
  SimilarityScore,
} from '../schemas/evidence.js';

// ============================================================================
// Constants
// ============================================================================

/** Jaccard similarity from which the text feature counts as matched */
export const TEXT_MATCH_THRESHOLD = 0.5;

// ============================================================================
// Matched fields
// ============================================================================

/**
 * Whether two tolerance bands overlap. Unknown bands never overlap.
 */
export function bandsOverlap(x: Range | null, y: Range | null): boolean {
  if (x === null || y === null) {
    return false;
  }
  return x.low <= y.high && y.low <= x.high;
}

/**
 * Features on which two listings agree.
 */
export function matchedFields(
  a: NormalizedListing,
  b: NormalizedListing,
  features: FeatureBreakdown
): FeatureName[] {
  const matched: FeatureName[] = [];

  if (features.city) matched.push('city');
  if (bandsOverlap(a.priceBand, b.priceBand)) matched.push('price');
  if (bandsOverlap(a.surfaceBand, b.surfaceBand)) matched.push('surface');
  if (features.rooms === true) matched.push('rooms');
  if (features.text !== null && features.text >= TEXT_MATCH_THRESHOLD) matched.push('text');

  return matched;
}

// ============================================================================
// Summaries
// ============================================================================

function lookup(listings: ReadonlyMap<string, NormalizedListing>, id: string): NormalizedListing {
  const listing = listings.get(id);
  if (!listing) {
    throw new Error(`Evidence references unknown listing ${id}`);
  }
  return listing;
}

function toPairEvidence(
  score: SimilarityScore,
  listings: ReadonlyMap<string, NormalizedListing>,
  threshold: number
): PairEvidence {
  const a = lookup(listings, score.pair.a);
  const b = lookup(listings, score.pair.b);

  return {
    a: a.id,
    b: b.id,
    score: score.score,
    accepted: score.score >= threshold,
    features: { ...score.features },
    matchedFields: matchedFields(a, b, score.features),
    exactMatch: a.fingerprint === b.fingerprint,
  };
}

/**
 * Summarize one cluster.
 *
 * @param cluster - Cluster to describe
 * @param scores - Scores to draw from; those not inside the cluster are ignored
 * @param listings - Normalized listings by id
 * @param threshold - Threshold the clusters were built with
 */
export function summarizeCluster(
  cluster: Cluster,
  scores: Iterable<SimilarityScore>,
  listings: ReadonlyMap<string, NormalizedListing>,
  threshold: number
): EvidenceSummary {
  const members = new Set(cluster.memberIds);
  const pairs: PairEvidence[] = [];

  for (const score of scores) {
    if (members.has(score.pair.a) && members.has(score.pair.b)) {
      pairs.push(toPairEvidence(score, listings, threshold));
    }
  }
  pairs.sort((x, y) => (x.a !== y.a ? (x.a < y.a ? -1 : 1) : x.b < y.b ? -1 : x.b > y.b ? 1 : 0));

  const sources = new Set<ListingSource>();
  for (const id of cluster.memberIds) {
    sources.add(lookup(listings, id).source);
  }

  const confidence =
    pairs.length === 0 ? 1.0 : pairs.reduce((min, pair) => Math.min(min, pair.score), 1.0);

  return {
    clusterId: cluster.clusterId,
    memberIds: [...cluster.memberIds],
    canonicalId: cluster.canonicalId,
    confidence,
    size: cluster.memberIds.length,
    sources: [...sources].sort(),
    pairs,
  };
}

/**
 * Summarize every cluster of a run, in cluster order.
 */
export function summarizeClusters(
  clusters: readonly Cluster[],
  scores: ReadonlyMap<string, SimilarityScore>,
  listings: ReadonlyMap<string, NormalizedListing>,
  threshold: number
): EvidenceSummary[] {
  const clusterOf = new Map<string, string>();
  for (const cluster of clusters) {
    for (const id of cluster.memberIds) {
      clusterOf.set(id, cluster.clusterId);
    }
  }

  const scoresByCluster = new Map<string, SimilarityScore[]>();
  for (const score of scores.values()) {
    const clusterId = clusterOf.get(score.pair.a);
    if (clusterId === undefined || clusterId !== clusterOf.get(score.pair.b)) continue;
    const bucket = scoresByCluster.get(clusterId) ?? [];
    bucket.push(score);
    scoresByCluster.set(clusterId, bucket);
  }

  return clusters.map((cluster) =>
    summarizeCluster(cluster, scoresByCluster.get(cluster.clusterId) ?? [], listings, threshold)
  );
}
