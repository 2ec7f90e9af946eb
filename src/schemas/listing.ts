/**
 * Listing Schemas
 *
 * A Listing is the record handed over by the ingestion side (one scraped ad).
 * A NormalizedListing is derived from it by the normalizer and is the only
 * shape the blocking, scoring and clustering code looks at.
 *
 * @module schemas/listing
 */

import { z } from 'zod';
import {
  AdvertiserSchema,
  ISO8601TimestampSchema,
  ListingKindSchema,
  ListingSourceSchema,
  PropertyTypeSchema,
} from './common.js';

// ============================================================================
// Raw numeric fields
// ============================================================================

/**
 * A numeric field as scraped: either a number or the text shown on the site
 * (e.g. "300 000 €", "45,5 m²", "3 pièces"). Missing values are null.
 */
export const ScrapedNumberSchema = z.union([z.number(), z.string()]).nullable();

export type ScrapedNumber = z.infer<typeof ScrapedNumberSchema>;

// ============================================================================
// Listing Schema
// ============================================================================

/**
 * Listing: one ad as delivered by ingestion. Immutable once ingested.
 */
export const ListingSchema = z.object({
  /** Globally unique identifier across sources */
  id: z.string().trim().min(1, 'Listing identifier is required'),

  /** Site the ad was scraped from */
  source: ListingSourceSchema,

  /** Ad title, empty when the site shows none */
  title: z.string().default(''),

  /** City as written on the ad */
  city: z.string().default(''),

  /** Postal code, when shown */
  postalCode: z.string().nullable().default(null),

  /** Asking price or monthly rent in EUR */
  price: ScrapedNumberSchema.default(null),

  /** Living surface in square meters */
  surface: ScrapedNumberSchema.default(null),

  /** Number of rooms */
  rooms: ScrapedNumberSchema.default(null),

  /** Sale or rental */
  kind: ListingKindSchema,

  /** Property type, when shown */
  propertyType: PropertyTypeSchema.nullable().default(null),

  /** Agency or private advertiser, when known */
  agencyOrPrivate: AdvertiserSchema.nullable().default(null),

  /** Free-text description blob */
  description: z.string().nullable().default(null),

  /** Ad URL */
  url: z.string().nullable().default(null),

  /** When the ad was ingested */
  ingestedAt: ISO8601TimestampSchema,
});

export type Listing = z.infer<typeof ListingSchema>;

/**
 * Input shape accepted by ListingSchema (fields with defaults may be omitted).
 */
export type ListingInput = z.input<typeof ListingSchema>;

// ============================================================================
// Normalized Listing Schema
// ============================================================================

/**
 * Closed interval used for tolerance bands.
 */
export const RangeSchema = z.object({
  low: z.number(),
  high: z.number(),
});

export type Range = z.infer<typeof RangeSchema>;

/**
 * NormalizedListing: comparable form of a Listing, one-to-one with it.
 */
export const NormalizedListingSchema = z.object({
  id: z.string().min(1),
  source: ListingSourceSchema,
  kind: ListingKindSchema,

  /** Canonical city token, '' when unknown */
  city: z.string(),

  /** Exact price, null when unknown */
  price: z.number().positive().nullable(),
  /** Price tolerance band */
  priceBand: RangeSchema.nullable(),
  /** Price rounded to the blocking bucket */
  priceBucket: z.number().int().nullable(),

  /** Surface in square meters, null when unknown */
  surface: z.number().positive().nullable(),
  surfaceBand: RangeSchema.nullable(),
  surfaceBucket: z.number().int().nullable(),

  /** Room count, null when unknown */
  rooms: z.number().int().nonnegative().nullable(),

  /** Sorted, de-duplicated title + description tokens */
  tokens: z.array(z.string()),

  /** Exact-content fingerprint */
  fingerprint: z.string().regex(/^[0-9a-f]{16}$/),

  /** Number of non-missing listing fields */
  completeness: z.number().int().nonnegative(),

  ingestedAt: ISO8601TimestampSchema,
});

export type NormalizedListing = z.infer<typeof NormalizedListingSchema>;
