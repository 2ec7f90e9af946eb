/**
 * Tests for the mock listing feed.
 */

import { describe, it, expect } from '@jest/globals';
import { createRandom, generateMockListings } from './mock.js';
import { ListingSchema } from '../schemas/listing.js';

describe('createRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const first = createRandom(7);
    const second = createRandom(7);

    const a = [first(), first(), first()];
    const b = [second(), second(), second()];

    expect(a).toEqual(b);
    for (const value of a) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should differ between seeds', () => {
    expect(createRandom(1)()).not.toBe(createRandom(2)());
  });
});

describe('generateMockListings', () => {
  it('should be deterministic for identical options', () => {
    expect(generateMockListings({ seed: 3 })).toEqual(generateMockListings({ seed: 3 }));
  });

  it('should produce base listings plus the requested share of copies', () => {
    const { listings, duplicatePairs } = generateMockListings({ total: 10, duplicateRatio: 0.5 });

    expect(listings).toHaveLength(15);
    expect(duplicatePairs).toHaveLength(5);
  });

  it('should split base listings between the two sites', () => {
    const { listings } = generateMockListings({ total: 7, duplicateRatio: 0 });

    expect(listings.filter((l) => l.source === 'seloger')).toHaveLength(4);
    expect(listings.filter((l) => l.source === 'leboncoin')).toHaveLength(3);
    expect(listings[0].id).toMatch(/^sl-[0-9a-f]{12}$/);
    expect(listings[6].id).toMatch(/^lbc-[0-9a-f]{12}$/);
  });

  it('should put every copy on the other site', () => {
    const { listings, duplicatePairs } = generateMockListings({ total: 12, duplicateRatio: 1 });
    const byId = new Map(listings.map((l) => [l.id, l]));

    for (const [originalId, copyId] of duplicatePairs) {
      const original = byId.get(originalId);
      const copy = byId.get(copyId);
      expect(copy?.source).not.toBe(original?.source);
      expect(copy?.city).toBe(original?.city);
      expect(copy?.title).toBe(original?.title);
    }
  });

  it('should generate unique, schema-valid listings', () => {
    const { listings } = generateMockListings({ total: 30, duplicateRatio: 0.5 });

    expect(new Set(listings.map((l) => l.id)).size).toBe(listings.length);
    for (const listing of listings) {
      expect(ListingSchema.safeParse(listing).success).toBe(true);
    }
  });

  it('should space ingestion timestamps one minute apart', () => {
    const { listings } = generateMockListings({
      total: 2,
      duplicateRatio: 0,
      startAt: '2024-03-01T00:00:00.000Z',
    });

    expect(listings.map((l) => l.ingestedAt)).toEqual([
      '2024-03-01T00:00:00.000Z',
      '2024-03-01T00:01:00.000Z',
    ]);
  });

  it('should return an empty feed for a zero total', () => {
    expect(generateMockListings({ total: 0 })).toEqual({ listings: [], duplicatePairs: [] });
  });
});
