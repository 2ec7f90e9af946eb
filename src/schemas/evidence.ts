/**
 * Pairing, Scoring and Evidence Schemas
 *
 * Output shapes of the candidate, scoring, clustering and evidence stages.
 * These are what the presentation side receives.
 *
 * @module schemas/evidence
 */

import { z } from 'zod';
import { FeatureNameSchema, ListingSourceSchema } from './common.js';
import { FeatureWeightsSchema } from './config.js';

// ============================================================================
// Candidate Pair
// ============================================================================

/**
 * Unordered pair of listing ids, stored with `a < b`.
 */
export const CandidatePairSchema = z
  .object({
    a: z.string().min(1),
    b: z.string().min(1),
  })
  .refine((pair) => pair.a < pair.b, {
    message: 'Pair ids must be distinct and ordered (a < b)',
    path: ['b'],
  });

export type CandidatePair = z.infer<typeof CandidatePairSchema>;

// ============================================================================
// Similarity Score
// ============================================================================

/**
 * Per-feature values. `null` means the feature was excluded because an input
 * was missing on at least one side. City is never excluded.
 */
export const FeatureBreakdownSchema = z.object({
  city: z.boolean(),
  price: z.number().min(0).max(1).nullable(),
  surface: z.number().min(0).max(1).nullable(),
  rooms: z.boolean().nullable(),
  text: z.number().min(0).max(1).nullable(),
});

export type FeatureBreakdown = z.infer<typeof FeatureBreakdownSchema>;

export const SimilarityScoreSchema = z.object({
  pair: CandidatePairSchema,
  /** Composite score in [0, 1] */
  score: z.number().min(0).max(1),
  features: FeatureBreakdownSchema,
  /** Weights actually applied after redistribution (excluded features are 0) */
  effectiveWeights: FeatureWeightsSchema,
});

export type SimilarityScore = z.infer<typeof SimilarityScoreSchema>;

// ============================================================================
// Cluster
// ============================================================================

export const ClusterSchema = z.object({
  /** Cluster identifier, stable for identical input and config */
  clusterId: z.string().min(1),
  /** Sorted member listing ids */
  memberIds: z.array(z.string().min(1)).min(1),
  /** Canonical representative */
  canonicalId: z.string().min(1),
  /** Minimum scored intra-cluster pair score, 1.0 for singletons */
  confidence: z.number().min(0).max(1),
});

export type Cluster = z.infer<typeof ClusterSchema>;

// ============================================================================
// Evidence
// ============================================================================

export const PairEvidenceSchema = z.object({
  a: z.string().min(1),
  b: z.string().min(1),
  score: z.number().min(0).max(1),
  /** Whether the pair met the threshold and caused a merge */
  accepted: z.boolean(),
  features: FeatureBreakdownSchema,
  /** Features that agree within tolerance */
  matchedFields: z.array(FeatureNameSchema),
  /** Both listings carry the same exact-content fingerprint */
  exactMatch: z.boolean(),
});

export type PairEvidence = z.infer<typeof PairEvidenceSchema>;

export const EvidenceSummarySchema = z.object({
  clusterId: z.string().min(1),
  memberIds: z.array(z.string().min(1)).min(1),
  canonicalId: z.string().min(1),
  confidence: z.number().min(0).max(1),
  size: z.number().int().positive(),
  /** Distinct sources present in the cluster */
  sources: z.array(ListingSourceSchema),
  /** Every scored intra-cluster pair */
  pairs: z.array(PairEvidenceSchema),
});

export type EvidenceSummary = z.infer<typeof EvidenceSummarySchema>;

// ============================================================================
// Warnings and rejections
// ============================================================================

/**
 * Non-fatal signal: a block exceeded maxBlockSize. Its listings were still
 * fully compared.
 */
export const OversizedBlockWarningSchema = z.object({
  kind: z.literal('oversized_block'),
  blockKey: z.string(),
  size: z.number().int().positive(),
  maxBlockSize: z.number().int().positive(),
  message: z.string(),
});

export type OversizedBlockWarning = z.infer<typeof OversizedBlockWarningSchema>;

export const RejectionReasonSchema = z.enum([
  'missing_identifier',
  'duplicate_identifier',
  'invalid_record',
]);

export type RejectionReason = z.infer<typeof RejectionReasonSchema>;

/**
 * A record dropped before normalization.
 */
export const RejectedListingSchema = z.object({
  /** Position of the record in the input batch */
  index: z.number().int().nonnegative(),
  /** Identifier, when the record had one */
  id: z.string().nullable(),
  reason: RejectionReasonSchema,
  message: z.string(),
});

export type RejectedListing = z.infer<typeof RejectedListingSchema>;
