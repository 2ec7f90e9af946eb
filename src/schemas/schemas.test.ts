/**
 * Unit tests for the listing, config and evidence schemas.
 */

import { describe, it, expect } from '@jest/globals';

import {
  ISO8601TimestampSchema,
  ListingSourceSchema,
  ListingSchema,
  NormalizedListingSchema,
  DedupeConfigSchema,
  FeatureWeightsSchema,
  DEFAULT_FEATURE_WEIGHTS,
  CandidatePairSchema,
  ClusterSchema,
  EvidenceSummarySchema,
  RejectedListingSchema,
} from './index.js';

// ============================================================================
// Common
// ============================================================================

describe('ISO8601TimestampSchema', () => {
  it('should accept UTC and offset timestamps', () => {
    expect(ISO8601TimestampSchema.safeParse('2024-01-15T10:30:00.000Z').success).toBe(true);
    expect(ISO8601TimestampSchema.safeParse('2024-01-15T10:30:00+01:00').success).toBe(true);
  });

  it('should reject dates without a time', () => {
    const result = ISO8601TimestampSchema.safeParse('2024-01-15');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Must be a valid ISO8601 timestamp');
    }
  });
});

describe('ListingSourceSchema', () => {
  it('should only know the two supported sites', () => {
    expect(ListingSourceSchema.options).toEqual(['seloger', 'leboncoin']);
    expect(ListingSourceSchema.safeParse('pap').success).toBe(false);
  });
});

// ============================================================================
// Listing
// ============================================================================

describe('ListingSchema', () => {
  const minimal = {
    id: 'sl-1',
    source: 'seloger',
    kind: 'sale',
    ingestedAt: '2024-01-01T08:00:00Z',
  };

  it('should fill defaults for omitted fields', () => {
    expect(ListingSchema.parse(minimal)).toEqual({
      ...minimal,
      title: '',
      city: '',
      postalCode: null,
      price: null,
      surface: null,
      rooms: null,
      propertyType: null,
      agencyOrPrivate: null,
      description: null,
      url: null,
    });
  });

  it('should keep scraped numbers as text', () => {
    const listing = ListingSchema.parse({ ...minimal, price: '300 000 €', surface: 45.5 });

    expect(listing.price).toBe('300 000 €');
    expect(listing.surface).toBe(45.5);
  });

  it('should trim the identifier and reject a blank one', () => {
    expect(ListingSchema.parse({ ...minimal, id: '  sl-1 ' }).id).toBe('sl-1');

    const result = ListingSchema.safeParse({ ...minimal, id: '   ' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Listing identifier is required');
    }
  });

  it('should reject an unknown kind', () => {
    expect(ListingSchema.safeParse({ ...minimal, kind: 'auction' }).success).toBe(false);
  });
});

describe('NormalizedListingSchema', () => {
  const normalized = {
    id: 'sl-1',
    source: 'seloger',
    kind: 'sale',
    city: 'paris',
    price: 300000,
    priceBand: { low: 285000, high: 315000 },
    priceBucket: 30,
    surface: null,
    surfaceBand: null,
    surfaceBucket: null,
    rooms: 2,
    tokens: ['appartement'],
    fingerprint: '0123456789abcdef',
    completeness: 6,
    ingestedAt: '2024-01-01T08:00:00Z',
  };

  it('should accept a normalized listing', () => {
    expect(NormalizedListingSchema.safeParse(normalized).success).toBe(true);
  });

  it('should require a 16 hex digit fingerprint', () => {
    expect(NormalizedListingSchema.safeParse({ ...normalized, fingerprint: 'abc' }).success).toBe(
      false
    );
  });

  it('should reject a non-positive price', () => {
    expect(NormalizedListingSchema.safeParse({ ...normalized, price: 0 }).success).toBe(false);
  });
});

// ============================================================================
// Config
// ============================================================================

describe('DedupeConfigSchema', () => {
  it('should apply defaults to an empty object', () => {
    const config = DedupeConfigSchema.parse({});

    expect(config.similarityThreshold).toBe(0.75);
    expect(config.featureWeights).toEqual({});
    expect(config.maxBlockSize).toBe(500);
  });

  it('should accept partial weight overrides', () => {
    expect(DedupeConfigSchema.parse({ featureWeights: { text: 0.3 } }).featureWeights).toEqual({
      text: 0.3,
    });
  });

  it('should reject negative weights', () => {
    expect(DedupeConfigSchema.safeParse({ featureWeights: { price: -1 } }).success).toBe(false);
  });

  it('should reject a tolerance of 1 or more', () => {
    expect(DedupeConfigSchema.safeParse({ priceTolerance: 1 }).success).toBe(false);
  });

  it('should reject a fractional block size', () => {
    expect(DedupeConfigSchema.safeParse({ maxBlockSize: 2.5 }).success).toBe(false);
  });
});

describe('DEFAULT_FEATURE_WEIGHTS', () => {
  it('should be a valid weight set summing to 1', () => {
    expect(FeatureWeightsSchema.safeParse(DEFAULT_FEATURE_WEIGHTS).success).toBe(true);
    const sum = Object.values(DEFAULT_FEATURE_WEIGHTS).reduce((a, b) => a + b, 0);
    expect(sum).toBeCloseTo(1, 10);
  });
});

// ============================================================================
// Evidence
// ============================================================================

describe('CandidatePairSchema', () => {
  it('should accept an ordered pair', () => {
    expect(CandidatePairSchema.safeParse({ a: 'lbc-1', b: 'sl-1' }).success).toBe(true);
  });

  it('should reject reversed and self pairs', () => {
    expect(CandidatePairSchema.safeParse({ a: 'sl-1', b: 'lbc-1' }).success).toBe(false);
    expect(CandidatePairSchema.safeParse({ a: 'sl-1', b: 'sl-1' }).success).toBe(false);
  });
});

describe('ClusterSchema', () => {
  it('should require at least one member', () => {
    const cluster = { clusterId: 'cluster_000', memberIds: [], canonicalId: 'sl-1', confidence: 1 };
    expect(ClusterSchema.safeParse(cluster).success).toBe(false);
  });

  it('should bound confidence to [0, 1]', () => {
    const cluster = {
      clusterId: 'cluster_000',
      memberIds: ['sl-1'],
      canonicalId: 'sl-1',
      confidence: 1.2,
    };
    expect(ClusterSchema.safeParse(cluster).success).toBe(false);
  });
});

describe('EvidenceSummarySchema', () => {
  it('should accept a two-listing summary', () => {
    const summary = {
      clusterId: 'cluster_000',
      memberIds: ['lbc-1', 'sl-1'],
      canonicalId: 'sl-1',
      confidence: 0.9,
      size: 2,
      sources: ['leboncoin', 'seloger'],
      pairs: [
        {
          a: 'lbc-1',
          b: 'sl-1',
          score: 0.9,
          accepted: true,
          features: { city: true, price: 0.98, surface: null, rooms: true, text: null },
          matchedFields: ['city', 'price', 'rooms'],
          exactMatch: false,
        },
      ],
    };

    expect(EvidenceSummarySchema.safeParse(summary).success).toBe(true);
  });
});

describe('RejectedListingSchema', () => {
  it('should accept a rejection without an identifier', () => {
    const rejected = { index: 3, id: null, reason: 'missing_identifier', message: 'no id' };
    expect(RejectedListingSchema.safeParse(rejected).success).toBe(true);
  });

  it('should reject an unknown reason', () => {
    const rejected = { index: 3, id: null, reason: 'too_old', message: 'old' };
    expect(RejectedListingSchema.safeParse(rejected).success).toBe(false);
  });
});
