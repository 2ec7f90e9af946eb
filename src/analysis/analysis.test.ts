/**
 * Tests for cross-source differences and duplicate flags.
 */

import { describe, it, expect } from '@jest/globals';
import { computeSourceDifferences, comparableValue } from './diff.js';
import { markDuplicates } from './flags.js';
import { ListingSchema, type Listing } from '../schemas/listing.js';
import type { EvidenceSummary } from '../schemas/evidence.js';

// ============================================================================
// Helpers
// ============================================================================

function listing(fields: Record<string, unknown>): Listing {
  return ListingSchema.parse({
    source: 'seloger',
    kind: 'sale',
    city: 'Paris',
    ingestedAt: '2024-01-01T08:00:00Z',
    ...fields,
  });
}

function summary(clusterId: string, memberIds: string[], canonicalId = memberIds[0]): EvidenceSummary {
  return {
    clusterId,
    memberIds,
    canonicalId,
    confidence: 1,
    size: memberIds.length,
    sources: [],
    pairs: [],
  };
}

// ============================================================================
// comparableValue
// ============================================================================

describe('comparableValue', () => {
  it('should compare normalized text and parsed numbers', () => {
    const ad = listing({ id: 'sl-1', title: 'Bel Appartement !', city: 'PARIS', price: '300 000 €' });

    expect(comparableValue(ad, 'title')).toBe('bel appartement');
    expect(comparableValue(ad, 'city')).toBe('paris');
    expect(comparableValue(ad, 'price')).toBe(300000);
  });

  it('should map empty and non-positive values to null', () => {
    const ad = listing({ id: 'sl-1', title: '', postalCode: '  ', price: 0 });

    expect(comparableValue(ad, 'title')).toBeNull();
    expect(comparableValue(ad, 'postalCode')).toBeNull();
    expect(comparableValue(ad, 'price')).toBeNull();
  });
});

// ============================================================================
// computeSourceDifferences
// ============================================================================

describe('computeSourceDifferences', () => {
  it('should list single-site clusters per site', () => {
    const listings = [
      listing({ id: 'sl-1' }),
      listing({ id: 'lbc-1', source: 'leboncoin', city: 'Lyon' }),
    ];

    const report = computeSourceDifferences(listings, [
      summary('cluster_000', ['lbc-1']),
      summary('cluster_001', ['sl-1']),
    ]);

    expect(report).toEqual({
      onlySeLoger: ['cluster_001'],
      onlyLeBoncoin: ['cluster_000'],
      sharedCount: 0,
      mismatches: [],
    });
  });

  it('should ignore formatting differences between the sites', () => {
    const listings = [
      listing({ id: 'sl-1', title: 'Bel Appartement', price: '300 000 €', surface: 50, rooms: 2 }),
      listing({
        id: 'lbc-1',
        source: 'leboncoin',
        title: 'bel appartement',
        city: 'PARIS',
        price: 300000,
        surface: '50 m²',
        rooms: '2',
      }),
    ];

    const report = computeSourceDifferences(listings, [summary('cluster_000', ['lbc-1', 'sl-1'])]);

    expect(report.sharedCount).toBe(1);
    expect(report.mismatches).toEqual([]);
  });

  it('should report the values each site shows for a disagreeing field', () => {
    const listings = [
      listing({ id: 'sl-1', price: 300000, agencyOrPrivate: 'agency' }),
      listing({ id: 'lbc-1', source: 'leboncoin', price: 305000, agencyOrPrivate: 'private' }),
      listing({ id: 'lbc-2', source: 'leboncoin', price: 305000 }),
    ];

    const report = computeSourceDifferences(listings, [
      summary('cluster_000', ['lbc-1', 'lbc-2', 'sl-1'], 'sl-1'),
    ]);

    expect(report.mismatches).toEqual([
      {
        clusterId: 'cluster_000',
        canonicalId: 'sl-1',
        memberIds: { seloger: ['sl-1'], leboncoin: ['lbc-1', 'lbc-2'] },
        fields: [
          { field: 'price', values: { seloger: [300000], leboncoin: [305000] } },
          {
            field: 'agencyOrPrivate',
            values: { seloger: ['agency'], leboncoin: ['private', null] },
          },
        ],
      },
    ]);
  });

  it('should compare cities through the alias table of the run', () => {
    const listings = [
      listing({ id: 'sl-1', city: 'Paris 15e' }),
      listing({ id: 'lbc-1', source: 'leboncoin', city: 'Paris' }),
    ];
    const summaries = [summary('cluster_000', ['lbc-1', 'sl-1'])];

    expect(computeSourceDifferences(listings, summaries).mismatches[0].fields).toEqual([
      { field: 'city', values: { seloger: ['paris15e'], leboncoin: ['paris'] } },
    ]);
    expect(
      computeSourceDifferences(listings, summaries, { cityAliasTable: { 'Paris 15e': 'Paris' } })
        .mismatches
    ).toEqual([]);
  });

  it('should throw when a summary names an unknown listing', () => {
    expect(() => computeSourceDifferences([], [summary('cluster_000', ['sl-9'])])).toThrow(
      'Summary cluster_000 references unknown listing sl-9'
    );
  });
});

// ============================================================================
// markDuplicates
// ============================================================================

describe('markDuplicates', () => {
  it('should flag every non-canonical member, sorted by listing id', () => {
    const flags = markDuplicates([
      summary('cluster_000', ['lbc-1', 'sl-1'], 'sl-1'),
      summary('cluster_001', ['sl-2']),
    ]);

    expect(flags).toEqual([
      { listingId: 'lbc-1', clusterId: 'cluster_000', canonicalId: 'sl-1', isDuplicate: true },
      { listingId: 'sl-1', clusterId: 'cluster_000', canonicalId: 'sl-1', isDuplicate: false },
      { listingId: 'sl-2', clusterId: 'cluster_001', canonicalId: 'sl-2', isDuplicate: false },
    ]);
  });

  it('should return nothing for an empty run', () => {
    expect(markDuplicates([])).toEqual([]);
  });
});
