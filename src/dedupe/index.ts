/**
 * Deduplication Module Exports
 *
 * Normalization, blocking, similarity scoring, clustering and evidence
 * reporting for listing deduplication.
 *
 * @module dedupe
 */

// Errors
export { InvalidListingError, ConfigurationError } from './errors.js';

// Ingestion validation
export { validateListings, extractListingId, toRejectedListing, type IngestResult } from './ingest.js';

// Normalization
export {
  normalizeListing,
  normalizeContent,
  stripDiacritics,
  tokenize,
  cityKey,
  canonicalCity,
  parseScrapedNumber,
  parsePositiveMeasure,
  parseRoomCount,
  toleranceBand,
  bucketOf,
  countKnownFields,
  type NormalizeOptions,
} from './normalize.js';

// Fingerprints
export { fingerprintListing, type FingerprintFields } from './hash.js';

// Blocking
export {
  generateCandidatePairs,
  blockKeysFor,
  makePair,
  pairKey,
  comparePairs,
  type BlockingOptions,
  type BlockStats,
  type CandidateGenerationResult,
} from './blocking.js';

// Similarity
export {
  scoreListings,
  scoreCandidatePairs,
  compareFeatures,
  closeness,
  jaccardSimilarity,
  FEATURE_NAMES,
} from './similarity.js';

// Clustering
export { UnionFind } from './union-find.js';
export {
  buildClusters,
  selectCanonical,
  compareCanonicalPreference,
  type ClusterResult,
} from './cluster.js';

// Evidence
export {
  summarizeCluster,
  summarizeClusters,
  matchedFields,
  bandsOverlap,
  TEXT_MATCH_THRESHOLD,
} from './evidence.js';
