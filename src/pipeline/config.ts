/**
 * Detection Config Resolution
 *
 * Validates caller config with DedupeConfigSchema, merges weight overrides
 * over the defaults and rescales them to sum to 1. Any problem is a
 * ConfigurationError raised before the pipeline starts.
 *
 * @module pipeline/config
 */

import {
  DedupeConfigSchema,
  DEFAULT_FEATURE_WEIGHTS,
  type DedupeConfig,
  type DedupeConfigInput,
  type FeatureWeights,
} from '../schemas/config.js';
import { ConfigurationError } from '../dedupe/errors.js';
import { FEATURE_NAMES } from '../dedupe/similarity.js';

/** Allowed drift of the weight sum from 1 before weights are rescaled */
const WEIGHT_SUM_EPSILON = 1e-9;

/**
 * Merge partial weight overrides over the defaults and rescale to sum 1.
 *
 * @throws ConfigurationError if the merged weights sum to zero
 */
export function resolveFeatureWeights(overrides: Partial<FeatureWeights> = {}): FeatureWeights {
  const merged: FeatureWeights = { ...DEFAULT_FEATURE_WEIGHTS };
  for (const name of FEATURE_NAMES) {
    const override = overrides[name];
    if (override !== undefined) {
      merged[name] = override;
    }
  }
  const total = merged.city + merged.price + merged.surface + merged.rooms + merged.text;

  if (!(total > 0)) {
    throw new ConfigurationError('Feature weights must not sum to zero', ['featureWeights']);
  }
  if (Math.abs(total - 1) <= WEIGHT_SUM_EPSILON) {
    return merged;
  }

  return {
    city: merged.city / total,
    price: merged.price / total,
    surface: merged.surface / total,
    rooms: merged.rooms / total,
    text: merged.text / total,
  };
}

/**
 * Validate and complete a detection config.
 *
 * @throws ConfigurationError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = resolveDedupeConfig({ similarityThreshold: 0.8 });
 * config.priceBucketSize; // 10000
 * ```
 */
export function resolveDedupeConfig(input: DedupeConfigInput = {}): DedupeConfig {
  const parsed = DedupeConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid detection config: ${issues.join('; ')}`, issues);
  }

  return {
    ...parsed.data,
    featureWeights: resolveFeatureWeights(parsed.data.featureWeights),
  };
}
