/**
 * Configuration Module
 *
 * Loads and validates environment variables for the listing dedupe tool.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { getDataDir } from '../storage/paths.js';

/**
 * Treat `VAR=` (as shipped in .env.example) like an unset variable instead of
 * letting coercion turn it into 0.
 */
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema
  );
}

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Data directory (reports are written under it), resolved by storage/paths
  DEDUPE_DATA_DIR: z.string().optional(),

  // Detection overrides, applied below CLI flags
  DEDUPE_SIMILARITY_THRESHOLD: blankAsUnset(z.coerce.number().min(0).max(1).optional()),
  DEDUPE_MAX_BLOCK_SIZE: blankAsUnset(z.coerce.number().int().positive().optional()),
});

type Env = z.infer<typeof envSchema>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  // Data directory
  dataDir: getDataDir(),

  // Detection defaults from the environment (undefined = engine default)
  detection: {
    similarityThreshold: env.DEDUPE_SIMILARITY_THRESHOLD,
    maxBlockSize: env.DEDUPE_MAX_BLOCK_SIZE,
  },
} as const;

export type Config = typeof config;
