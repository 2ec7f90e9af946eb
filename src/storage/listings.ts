/**
 * Listing Feed Files
 *
 * Loads raw listing batches and city alias tables from JSON. Records are
 * returned unvalidated; screening happens in the detection pipeline.
 *
 * @module storage/listings
 */

import { z } from 'zod';
import { readJson } from './atomic.js';

const FeedSchema = z.union([
  z.array(z.unknown()),
  z.object({ listings: z.array(z.unknown()) }).transform((feed) => feed.listings),
]);

const AliasTableSchema = z.record(z.string().min(1));

/**
 * Load a listing feed: either a bare JSON array or `{ "listings": [...] }`.
 *
 * @throws Error if the file is missing, not JSON, or not a feed
 */
export async function loadListingsFile(filePath: string): Promise<unknown[]> {
  const parsed = FeedSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new Error(`Not a listing feed (expected an array of listings): ${filePath}`);
  }
  return parsed.data;
}

/**
 * Load a city alias table: a JSON object mapping variant to canonical name.
 *
 * @example
 * ```json
 * { "Paris 15e": "Paris", "Marseille 8e": "Marseille" }
 * ```
 */
export async function loadAliasTable(filePath: string): Promise<Record<string, string>> {
  const parsed = AliasTableSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new Error(`Not a city alias table (expected an object of strings): ${filePath}`);
  }
  return parsed.data;
}
