/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used in the pipeline.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  ListingSourceSchema,
  ListingKindSchema,
  AdvertiserSchema,
  PropertyTypeSchema,
  FeatureNameSchema,
  type ISO8601Timestamp,
  type ListingSource,
  type ListingKind,
  type Advertiser,
  type PropertyType,
  type FeatureName,
} from './common.js';

// ============================================================================
// Listings
// ============================================================================

export {
  ScrapedNumberSchema,
  ListingSchema,
  RangeSchema,
  NormalizedListingSchema,
  type ScrapedNumber,
  type Listing,
  type ListingInput,
  type Range,
  type NormalizedListing,
} from './listing.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  FeatureWeightsSchema,
  DedupeConfigSchema,
  DEFAULT_FEATURE_WEIGHTS,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_PRICE_BUCKET_SIZE,
  DEFAULT_SURFACE_BUCKET_SIZE,
  DEFAULT_MAX_BLOCK_SIZE,
  DEFAULT_PRICE_TOLERANCE,
  DEFAULT_SURFACE_TOLERANCE,
  type FeatureWeights,
  type DedupeConfigInput,
  type DedupeConfig,
} from './config.js';

// ============================================================================
// Pairs, Scores, Clusters, Evidence
// ============================================================================

export {
  CandidatePairSchema,
  FeatureBreakdownSchema,
  SimilarityScoreSchema,
  ClusterSchema,
  PairEvidenceSchema,
  EvidenceSummarySchema,
  OversizedBlockWarningSchema,
  RejectionReasonSchema,
  RejectedListingSchema,
  type CandidatePair,
  type FeatureBreakdown,
  type SimilarityScore,
  type Cluster,
  type PairEvidence,
  type EvidenceSummary,
  type OversizedBlockWarning,
  type RejectionReason,
  type RejectedListing,
} from './evidence.js';
