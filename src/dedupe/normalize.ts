/**
 * Listing Normalization
 *
 * Turns a Listing into a NormalizedListing: canonical city token, parsed
 * numeric fields with tolerance bands and blocking buckets, and a token set
 * for lexical comparison.
 *
 * Every function here is pure. Missing or unusable numeric values become
 * `null` and stay `null`; nothing is defaulted to zero.
 *
 * @module dedupe/normalize
 */

import type { Listing, NormalizedListing, Range, ScrapedNumber } from '../schemas/listing.js';
import type { DedupeConfig } from '../schemas/config.js';
import { fingerprintListing } from './hash.js';
import stopWordList from './stopwords.json';

// ============================================================================
// Types
// ============================================================================

/**
 * Subset of the detection config the normalizer depends on.
 */
export type NormalizeOptions = Pick<
  DedupeConfig,
  | 'cityAliasTable'
  | 'priceBucketSize'
  | 'surfaceBucketSize'
  | 'priceTolerance'
  | 'surfaceTolerance'
>;

// ============================================================================
// Constants
// ============================================================================

/**
 * Extended emoji regex covering the common Unicode emoji blocks.
 */
const EMOJI_REGEX =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{2600}-\u{26FF}\u{2700}-\u{27BF}\u{FE00}-\u{FE0F}\u{1F900}-\u{1F9FF}\u{1FA00}-\u{1FAFF}]/gu;

/** Combining diacritical marks left behind by NFD decomposition */
const DIACRITICS_REGEX = /[\u0300-\u036f]/g;

/**
 * Grouped thousands ("300 000", "1.200.000", "1 250,50") or a plain
 * decimal ("45,5", "45.5", "3").
 */
const SCRAPED_NUMBER_REGEX = /\d{1,3}(?:[\s.]\d{3})+(?:,\d+)?|\d+(?:[.,]\d+)?/;

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

// ============================================================================
// Text
// ============================================================================

/**
 * Remove accents: "Étage à Orléans" -> "Etage a Orleans".
 */
export function stripDiacritics(text: string): string {
  return text.normalize('NFD').replace(DIACRITICS_REGEX, '');
}

/**
 * Normalize free text for comparison.
 *
 * Lower-cases, strips accents, URLs, emoji and punctuation, then collapses
 * whitespace.
 *
 * @example
 * ```typescript
 * normalizeContent('Bel Appartement - 3 pièces, vue dégagée !');
 * // 'bel appartement 3 pieces vue degagee'
 * ```
 */
export function normalizeContent(content: string | null | undefined): string {
  if (!content) {
    return '';
  }

  return stripDiacritics(content.toLowerCase())
    .replace(/https?:\/\/\S+/g, ' ')
    .replace(EMOJI_REGEX, ' ')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Tokenize text into a sorted, de-duplicated token list.
 * Stop words and single letters are dropped; single digits are kept since
 * they usually carry a room count or floor.
 */
export function tokenize(...texts: Array<string | null | undefined>): string[] {
  const tokens = new Set<string>();

  for (const text of texts) {
    for (const token of normalizeContent(text).split(' ')) {
      if (token.length === 0 || STOP_WORDS.has(token)) continue;
      if (token.length === 1 && !/\d/.test(token)) continue;
      tokens.add(token);
    }
  }

  return [...tokens].sort();
}

// ============================================================================
// City
// ============================================================================

/**
 * Reduce a city spelling to a bare comparable key:
 * "Paris 15ème" -> "paris15eme", "Saint-Étienne" -> "saintetienne".
 */
export function cityKey(raw: string | null | undefined): string {
  if (!raw) {
    return '';
  }
  return stripDiacritics(raw.toLowerCase()).replace(/[^\p{L}\p{N}]/gu, '');
}

/**
 * Canonical city token, following the alias table when the key is listed.
 * Alias keys and values go through the same reduction as the input, so the
 * table can be written with natural spellings.
 *
 * @returns Canonical token, or '' when the city is unknown
 */
export function canonicalCity(
  raw: string | null | undefined,
  aliasTable: Readonly<Record<string, string>> = {}
): string {
  const key = cityKey(raw);
  if (key === '') {
    return '';
  }

  for (const [alias, canonical] of Object.entries(aliasTable)) {
    if (cityKey(alias) === key) {
      return cityKey(canonical);
    }
  }
  return key;
}

// ============================================================================
// Numbers
// ============================================================================

/**
 * Parse a scraped numeric field.
 *
 * @example
 * ```typescript
 * parseScrapedNumber('300 000 €'); // 300000
 * parseScrapedNumber('45,5 m²');   // 45.5
 * parseScrapedNumber('n/c');       // null
 * ```
 */
export function parseScrapedNumber(value: ScrapedNumber | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const match = SCRAPED_NUMBER_REGEX.exec(value);
  if (!match) {
    return null;
  }

  const parsed = Number(match[0].replace(/[\s.](?=\d{3}(?:\D|$))/g, '').replace(',', '.'));
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Strictly positive measure (price, surface); anything else is unknown.
 */
export function parsePositiveMeasure(value: ScrapedNumber | undefined): number | null {
  const parsed = parseScrapedNumber(value);
  return parsed !== null && parsed > 0 ? parsed : null;
}

/**
 * Room count: a non-negative integer, otherwise unknown.
 */
export function parseRoomCount(value: ScrapedNumber | undefined): number | null {
  const parsed = parseScrapedNumber(value);
  return parsed !== null && Number.isInteger(parsed) && parsed >= 0 ? parsed : null;
}

/**
 * Symmetric relative tolerance band around a value.
 */
export function toleranceBand(value: number | null, tolerance: number): Range | null {
  if (value === null) {
    return null;
  }
  return { low: value * (1 - tolerance), high: value * (1 + tolerance) };
}

/**
 * Round a value to the nearest bucket index.
 */
export function bucketOf(value: number | null, bucketSize: number): number | null {
  return value === null ? null : Math.round(value / bucketSize);
}

// ============================================================================
// Listing
// ============================================================================

function hasText(value: string | null): boolean {
  return value !== null && value.trim().length > 0;
}

/**
 * Count the fields a listing actually carries. Used to pick the most
 * informative listing as a cluster's canonical representative.
 */
export function countKnownFields(listing: Listing): number {
  const known = [
    hasText(listing.title),
    hasText(listing.city),
    hasText(listing.postalCode),
    parsePositiveMeasure(listing.price) !== null,
    parsePositiveMeasure(listing.surface) !== null,
    parseRoomCount(listing.rooms) !== null,
    listing.propertyType !== null,
    listing.agencyOrPrivate !== null,
    hasText(listing.description),
    hasText(listing.url),
  ];
  return known.filter(Boolean).length;
}

/**
 * Normalize a listing for blocking and scoring.
 *
 * Total for any schema-valid listing: unparseable numbers are propagated as
 * unknown rather than rejected. The result is frozen.
 */
export function normalizeListing(listing: Listing, options: NormalizeOptions): NormalizedListing {
  const city = canonicalCity(listing.city, options.cityAliasTable);
  const price = parsePositiveMeasure(listing.price);
  const surface = parsePositiveMeasure(listing.surface);
  const rooms = parseRoomCount(listing.rooms);

  return Object.freeze({
    id: listing.id,
    source: listing.source,
    kind: listing.kind,
    city,
    price,
    priceBand: toleranceBand(price, options.priceTolerance),
    priceBucket: bucketOf(price, options.priceBucketSize),
    surface,
    surfaceBand: toleranceBand(surface, options.surfaceTolerance),
    surfaceBucket: bucketOf(surface, options.surfaceBucketSize),
    rooms,
    tokens: tokenize(listing.title, listing.description),
    fingerprint: fingerprintListing({
      title: normalizeContent(listing.title),
      city,
      price,
      surface,
      rooms,
    }),
    completeness: countKnownFields(listing),
    ingestedAt: listing.ingestedAt,
  });
}
