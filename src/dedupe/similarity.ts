/**
 * Similarity Scoring for Listing Deduplication
 *
 * Composite score of two normalized listings as a weighted sum of:
 * - city match (boolean, canonical tokens)
 * - price closeness
 * - surface closeness
 * - room count match (boolean)
 * - text similarity (Jaccard over title + description tokens)
 *
 * Missing-input policy:
 * - price, surface, rooms and text are excluded when either side lacks the
 *   input, and their weight is redistributed pro-rata over what remains
 * - city is never excluded: an unknown city on either side scores 0
 *
 * Scoring is pure and symmetric: scoreListings(a, b) equals
 * scoreListings(b, a) field for field.
 *
 * @module dedupe/similarity
 */

import type { NormalizedListing } from '../schemas/listing.js';
import type { FeatureName } from '../schemas/common.js';
import type { FeatureWeights } from '../schemas/config.js';
import type { CandidatePair, FeatureBreakdown, SimilarityScore } from '../schemas/evidence.js';
import { makePair, pairKey } from './blocking.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Fixed feature order. Sums are always accumulated in this order so that
 * swapping the two listings cannot change the floating point result.
 */
export const FEATURE_NAMES: readonly FeatureName[] = ['city', 'price', 'surface', 'rooms', 'text'];

// ============================================================================
// Feature functions
// ============================================================================

/**
 * Relative closeness of two positive measures:
 * `1 - min(1, |x - y| / max(x, y))`, or null when either is unknown.
 *
 * @example
 * ```typescript
 * closeness(300000, 305000); // 0.98360...
 * closeness(50, null);       // null
 * ```
 */
export function closeness(x: number | null, y: number | null): number | null {
  if (x === null || y === null) {
    return null;
  }
  const largest = Math.max(x, y);
  if (largest <= 0) {
    return null;
  }
  return 1 - Math.min(1, Math.abs(x - y) / largest);
}

/**
 * Jaccard coefficient of two token sets: |A ∩ B| / |A ∪ B|.
 *
 * @returns 1.0 when both are empty, 0.0 when exactly one is
 */
export function jaccardSimilarity(a: readonly string[], b: readonly string[]): number {
  const setA = new Set(a);
  const setB = new Set(b);

  if (setA.size === 0 && setB.size === 0) {
    return 1.0;
  }
  if (setA.size === 0 || setB.size === 0) {
    return 0.0;
  }

  let intersection = 0;
  for (const token of setA) {
    if (setB.has(token)) intersection++;
  }
  const union = setA.size + setB.size - intersection;

  return intersection / union;
}

/**
 * Compute the per-feature breakdown for two listings.
 */
export function compareFeatures(a: NormalizedListing, b: NormalizedListing): FeatureBreakdown {
  return {
    city: a.city !== '' && a.city === b.city,
    price: closeness(a.price, b.price),
    surface: closeness(a.surface, b.surface),
    rooms: a.rooms === null || b.rooms === null ? null : a.rooms === b.rooms,
    text:
      a.tokens.length === 0 || b.tokens.length === 0 ? null : jaccardSimilarity(a.tokens, b.tokens),
  };
}

function featureValue(features: FeatureBreakdown, name: FeatureName): number | null {
  const value = features[name];
  if (value === null) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

// ============================================================================
// Composite score
// ============================================================================

/**
 * Score two listings.
 *
 * Excluded features get an effective weight of 0 and the remaining weights
 * are rescaled so they sum to 1. If nothing with a positive weight remains
 * the score is 0.
 *
 * @throws Error if both listings share the same id
 */
export function scoreListings(
  a: NormalizedListing,
  b: NormalizedListing,
  weights: FeatureWeights
): SimilarityScore {
  const pair = makePair(a.id, b.id);
  if (!pair) {
    throw new Error(`Cannot score listing ${a.id} against itself`);
  }

  const features = compareFeatures(a, b);

  let presentWeight = 0;
  for (const name of FEATURE_NAMES) {
    if (featureValue(features, name) !== null) {
      presentWeight += weights[name];
    }
  }

  const effectiveWeights: FeatureWeights = { city: 0, price: 0, surface: 0, rooms: 0, text: 0 };
  let score = 0;

  if (presentWeight > 0) {
    for (const name of FEATURE_NAMES) {
      const value = featureValue(features, name);
      if (value === null) continue;
      effectiveWeights[name] = weights[name] / presentWeight;
      score += effectiveWeights[name] * value;
    }
  }

  return Object.freeze({
    pair,
    score: Math.min(1, Math.max(0, score)),
    features: Object.freeze(features),
    effectiveWeights: Object.freeze(effectiveWeights),
  });
}

/**
 * Score every candidate pair.
 *
 * Pairs are independent of one another; the result is keyed by pairKey().
 *
 * @throws Error if a pair references an id missing from `listings`
 */
export function scoreCandidatePairs(
  pairs: readonly CandidatePair[],
  listings: ReadonlyMap<string, NormalizedListing>,
  weights: FeatureWeights
): Map<string, SimilarityScore> {
  const scores = new Map<string, SimilarityScore>();

  for (const pair of pairs) {
    const a = listings.get(pair.a);
    const b = listings.get(pair.b);
    if (!a || !b) {
      throw new Error(`Candidate pair ${pair.a}/${pair.b} references an unknown listing`);
    }
    scores.set(pairKey(pair.a, pair.b), scoreListings(a, b, weights));
  }

  return scores;
}
