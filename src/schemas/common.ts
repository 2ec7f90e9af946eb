/**
 * Common Zod Schemas - Shared types used across the pipeline
 *
 * @module schemas/common
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Enumeration Schemas
// ============================================

/**
 * Listing site a record was scraped from.
 */
export const ListingSourceSchema = z.enum(['seloger', 'leboncoin']);

export type ListingSource = z.infer<typeof ListingSourceSchema>;

/**
 * Whether the listing offers the property for sale or for rent.
 */
export const ListingKindSchema = z.enum(['sale', 'rental']);

export type ListingKind = z.infer<typeof ListingKindSchema>;

/**
 * Who published the listing.
 */
export const AdvertiserSchema = z.enum(['agency', 'private']);

export type Advertiser = z.infer<typeof AdvertiserSchema>;

/**
 * Coarse property type as reported by the listing site.
 */
export const PropertyTypeSchema = z.enum(['apartment', 'house', 'studio', 'other']);

export type PropertyType = z.infer<typeof PropertyTypeSchema>;

/**
 * Features compared by the similarity scorer.
 */
export const FeatureNameSchema = z.enum(['city', 'price', 'surface', 'rooms', 'text']);

export type FeatureName = z.infer<typeof FeatureNameSchema>;
