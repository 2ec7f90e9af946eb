/**
 * Detection Configuration Schema
 *
 * Every field is optional; omitted fields take the documented defaults.
 * Cross-field checks (weights summing to zero) live in pipeline/config.ts
 * so they can be reported as a ConfigurationError.
 *
 * @module schemas/config
 */

import { z } from 'zod';

// ============================================================================
// Feature Weights
// ============================================================================

/**
 * Weight of each similarity feature in the composite score.
 */
export const FeatureWeightsSchema = z.object({
  city: z.number().finite().nonnegative(),
  price: z.number().finite().nonnegative(),
  surface: z.number().finite().nonnegative(),
  rooms: z.number().finite().nonnegative(),
  text: z.number().finite().nonnegative(),
});

export type FeatureWeights = z.infer<typeof FeatureWeightsSchema>;

/**
 * Default feature weights (sum to 1.0).
 */
export const DEFAULT_FEATURE_WEIGHTS: FeatureWeights = {
  city: 0.25,
  price: 0.25,
  surface: 0.25,
  rooms: 0.1,
  text: 0.15,
};

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SIMILARITY_THRESHOLD = 0.75;
export const DEFAULT_PRICE_BUCKET_SIZE = 10_000;
export const DEFAULT_SURFACE_BUCKET_SIZE = 5;
export const DEFAULT_MAX_BLOCK_SIZE = 500;
export const DEFAULT_PRICE_TOLERANCE = 0.05;
export const DEFAULT_SURFACE_TOLERANCE = 0.05;

// ============================================================================
// Dedupe Config Schema
// ============================================================================

export const DedupeConfigSchema = z.object({
  /** Minimum composite score for two listings to be merged */
  similarityThreshold: z.number().min(0).max(1).default(DEFAULT_SIMILARITY_THRESHOLD),

  /** Partial weight overrides, merged over DEFAULT_FEATURE_WEIGHTS */
  featureWeights: FeatureWeightsSchema.partial().default({}),

  /** Price blocking granularity in EUR */
  priceBucketSize: z.number().finite().positive().default(DEFAULT_PRICE_BUCKET_SIZE),

  /** Surface blocking granularity in square meters */
  surfaceBucketSize: z.number().finite().positive().default(DEFAULT_SURFACE_BUCKET_SIZE),

  /** Block size above which an oversized-block warning is raised */
  maxBlockSize: z.number().int().positive().default(DEFAULT_MAX_BLOCK_SIZE),

  /** Raw city spelling -> canonical city */
  cityAliasTable: z.record(z.string(), z.string()).default({}),

  /** Relative half-width of the price tolerance band */
  priceTolerance: z.number().min(0).lt(1).default(DEFAULT_PRICE_TOLERANCE),

  /** Relative half-width of the surface tolerance band */
  surfaceTolerance: z.number().min(0).lt(1).default(DEFAULT_SURFACE_TOLERANCE),
});

/**
 * Configuration as accepted from callers.
 */
export type DedupeConfigInput = z.input<typeof DedupeConfigSchema>;

/**
 * Configuration after validation, with weights merged and normalized to sum 1.
 */
export type DedupeConfig = Omit<z.output<typeof DedupeConfigSchema>, 'featureWeights'> & {
  featureWeights: FeatureWeights;
};
