/**
 * Listing Fingerprints
 *
 * Stable hash of a listing's normalized content. Two listings with the same
 * fingerprint carry identical title, city, price, surface and rooms: the
 * same ad re-scraped, or copied verbatim to the other site.
 *
 * @module dedupe/hash
 */

import { createHash } from 'node:crypto';

/**
 * Normalized fields that make up a fingerprint.
 */
export interface FingerprintFields {
  /** Title after normalizeContent() */
  title: string;
  /** Canonical city token */
  city: string;
  price: number | null;
  surface: number | null;
  rooms: number | null;
}

/**
 * Generate a fingerprint from normalized fields.
 *
 * Seed format: `${title}|${city}|${price}|${surface}|${rooms}` with unknown
 * values written as empty strings.
 *
 * @returns 16-character hex string (truncated SHA-256)
 *
 * @example
 * ```typescript
 * fingerprintListing({ title: 'appartement 2 pieces', city: 'paris', price: 300000, surface: 50, rooms: 2 });
 * // '3f9c0a...' (16 hex chars)
 * ```
 */
export function fingerprintListing(fields: FingerprintFields): string {
  const seed = [fields.title, fields.city, fields.price, fields.surface, fields.rooms]
    .map((part) => (part === null ? '' : String(part)))
    .join('|');

  return createHash('sha256').update(seed).digest('hex').substring(0, 16);
}
