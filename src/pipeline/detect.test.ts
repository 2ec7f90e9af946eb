/**
 * End-to-end tests for duplicate detection.
 */

import { describe, it, expect } from '@jest/globals';
import { detectDuplicates, type DetectionResult } from './detect.js';
import type { Logger } from './types.js';
import { ConfigurationError } from '../dedupe/errors.js';
import { generateMockListings } from '../fixtures/mock.js';

// ============================================================================
// Helpers
// ============================================================================

const DEFAULTS = { source: 'seloger', kind: 'sale', city: 'Paris', ingestedAt: '2024-01-01T08:00:00Z' };

function listing(fields: Record<string, unknown>): Record<string, unknown> {
  return { ...DEFAULTS, ...fields };
}

function clusterMembers(result: DetectionResult): string[][] {
  return result.summaries.map((s) => s.memberIds);
}

/** Flat score of two Paris ads agreeing on everything but price */
function flatScore(x: number, y: number): number {
  const price = 1 - Math.abs(x - y) / Math.max(x, y);
  return (0.25 + 0.25 * price + 0.25 + 0.1) / 0.85;
}

const FLAT_A = listing({ id: 'sl-1', price: 300000, surface: 50, rooms: 2 });
const FLAT_B = listing({
  id: 'lbc-1',
  source: 'leboncoin',
  price: 305000,
  surface: 50,
  rooms: 2,
  ingestedAt: '2024-01-02T08:00:00Z',
});

// ============================================================================
// Scenarios
// ============================================================================

describe('detectDuplicates', () => {
  it('should merge two ads of the same flat from both sites', () => {
    const result = detectDuplicates([FLAT_A, FLAT_B]);

    expect(result.summaries).toHaveLength(1);
    const [summary] = result.summaries;
    expect(summary.clusterId).toBe('cluster_000');
    expect(summary.memberIds).toEqual(['lbc-1', 'sl-1']);
    expect(summary.canonicalId).toBe('sl-1');
    expect(summary.sources).toEqual(['leboncoin', 'seloger']);
    expect(summary.confidence).toBeCloseTo(flatScore(300000, 305000), 10);
    expect(summary.pairs[0].accepted).toBe(true);
    expect(summary.pairs[0].matchedFields).toEqual(['city', 'price', 'surface', 'rooms']);
  });

  it('should keep similar flats in different cities apart', () => {
    const result = detectDuplicates([FLAT_A, { ...FLAT_B, city: 'Lyon' }]);

    expect(clusterMembers(result)).toEqual([['lbc-1'], ['sl-1']]);
    expect(result.stats.candidatePairCount).toBe(0);
  });

  it('should match sparse listings on city, rooms and text', () => {
    const result = detectDuplicates([
      listing({ id: 'sl-1', rooms: 3, title: 'Maison familiale avec jardin' }),
      listing({ id: 'lbc-1', source: 'leboncoin', rooms: 3, title: 'Maison familiale, jardin' }),
    ]);

    expect(clusterMembers(result)).toEqual([['lbc-1', 'sl-1']]);
    expect(result.summaries[0].pairs[0].score).toBeCloseTo(1, 10);
    expect(result.summaries[0].pairs[0].matchedFields).toEqual(['city', 'rooms', 'text']);
  });

  it('should return a single listing as its own cluster', () => {
    const result = detectDuplicates([FLAT_A]);

    expect(result.summaries).toEqual([
      {
        clusterId: 'cluster_000',
        memberIds: ['sl-1'],
        canonicalId: 'sl-1',
        confidence: 1,
        size: 1,
        sources: ['seloger'],
        pairs: [],
      },
    ]);
  });

  it('should handle an empty batch', () => {
    const result = detectDuplicates([]);

    expect(result.summaries).toEqual([]);
    expect(result.stats).toEqual({
      inputCount: 0,
      acceptedCount: 0,
      rejectedCount: 0,
      candidatePairCount: 0,
      acceptedPairCount: 0,
      clusterCount: 0,
      duplicateCount: 0,
    });
  });

  it('should warn about oversized blocks and still cluster them', () => {
    const feed = ['a', 'b', 'c'].map((id) => listing({ id, price: 300000, surface: 50, rooms: 2 }));

    const result = detectDuplicates(feed, { maxBlockSize: 2 });

    expect(result.warnings.map((w) => w.blockKey)).toEqual(['paris|p:30', 'paris|s:10']);
    expect(clusterMembers(result)).toEqual([['a', 'b', 'c']]);
  });

  it('should merge transitively and report the weakest link as confidence', () => {
    const feed = [
      listing({ id: 'a', price: 300000, surface: 50, rooms: 2 }),
      listing({ id: 'b', price: 320000, surface: 50, rooms: 2 }),
      listing({ id: 'c', price: 340000, surface: 50, rooms: 2 }),
    ];

    const result = detectDuplicates(feed, { similarityThreshold: 0.97 });

    expect(clusterMembers(result)).toEqual([['a', 'b', 'c']]);
    const [summary] = result.summaries;
    expect(summary.pairs.map((p) => [p.a, p.b, p.accepted])).toEqual([
      ['a', 'b', true],
      ['a', 'c', false],
      ['b', 'c', true],
    ]);
    expect(summary.confidence).toBeCloseTo(flatScore(300000, 340000), 10);
    expect(result.stats.acceptedPairCount).toBe(2);
  });

  it('should keep every pair apart when ids contain separator-like text', () => {
    const fields = { price: 300000, surface: 50, rooms: 2 };
    const feed = [
      listing({ id: 'a', ...fields }),
      listing({ id: 'b::c', ...fields }),
      listing({ id: 'a::b', city: 'Lyon', ...fields }),
      listing({ id: 'c', city: 'Lyon', ...fields }),
    ];

    const forward = detectDuplicates(feed);
    const reversed = detectDuplicates([...feed].reverse());

    expect(clusterMembers(forward)).toEqual([
      ['a', 'b::c'],
      ['a::b', 'c'],
    ]);
    expect(forward.stats.candidatePairCount).toBe(2);
    expect(reversed.summaries).toEqual(forward.summaries);
  });

  it('should skip rejected records and process the rest', () => {
    const result = detectDuplicates([FLAT_A, { title: 'no id' }, FLAT_A, FLAT_B]);

    expect(result.rejected.map((r) => [r.index, r.reason])).toEqual([
      [1, 'missing_identifier'],
      [2, 'duplicate_identifier'],
    ]);
    expect(result.stats).toMatchObject({ inputCount: 4, acceptedCount: 2, rejectedCount: 2 });
    expect(clusterMembers(result)).toEqual([['lbc-1', 'sl-1']]);
  });

  it('should reject an invalid config before doing any work', () => {
    const stages: string[] = [];

    expect(() =>
      detectDuplicates([FLAT_A], { similarityThreshold: 2 }, { onStageStart: (id) => stages.push(id) })
    ).toThrow(ConfigurationError);
    expect(stages).toEqual([]);
  });

  it('should report the resolved config', () => {
    const result = detectDuplicates([], { featureWeights: { text: 0 } });

    expect(result.config.featureWeights.text).toBe(0);
    expect(result.config.featureWeights.city).toBeCloseTo(0.25 / 0.85, 10);
  });

  it('should run every stage in order and log through the given logger', () => {
    const started: string[] = [];
    const completed: number[] = [];
    const infos: string[] = [];
    const logger: Logger = {
      debug: () => {},
      info: (message) => infos.push(message),
      warn: () => {},
      error: () => {},
    };

    const result = detectDuplicates([FLAT_A, FLAT_B], {}, {
      logger,
      onStageStart: (id) => started.push(id),
      onStageComplete: (_id, n) => completed.push(n),
    });

    expect(started).toEqual([
      '01_listings_validated',
      '02_listings_normalized',
      '03_candidate_pairs',
      '04_pair_scores',
      '05_clusters',
      '06_evidence',
    ]);
    expect(completed).toEqual([1, 2, 3, 4, 5, 6]);
    expect(infos[0]).toBe('[validate] Accepted 2 of 2 listings');
    expect(Object.keys(result.timing.perStage)).toEqual(started);
  });
});

// ============================================================================
// Properties
// ============================================================================

describe('detectDuplicates properties', () => {
  const { listings } = generateMockListings({ total: 40, duplicateRatio: 0.4, seed: 11 });

  it('should place every accepted listing in exactly one cluster', () => {
    const result = detectDuplicates(listings);
    const members = result.summaries.flatMap((s) => s.memberIds).sort();

    expect(members).toEqual(listings.map((l) => l.id).sort());
    expect(result.stats.clusterCount + result.stats.duplicateCount).toBe(listings.length);
    for (const summary of result.summaries) {
      expect(summary.memberIds).toContain(summary.canonicalId);
    }
  });

  it('should give the same clusters for any input order', () => {
    const forward = detectDuplicates(listings);
    const reversed = detectDuplicates([...listings].reverse());

    expect(reversed.summaries).toEqual(forward.summaries);
  });

  it('should give the same result when run twice', () => {
    expect(detectDuplicates(listings).summaries).toEqual(detectDuplicates(listings).summaries);
  });

  it('should only split clusters when the threshold rises', () => {
    const loose = detectDuplicates(listings, { similarityThreshold: 0.6 });
    const strict = detectDuplicates(listings, { similarityThreshold: 0.9 });

    const looseClusterOf = new Map<string, string>();
    for (const summary of loose.summaries) {
      for (const id of summary.memberIds) looseClusterOf.set(id, summary.clusterId);
    }

    for (const summary of strict.summaries) {
      const owners = new Set(summary.memberIds.map((id) => looseClusterOf.get(id)));
      expect(owners.size).toBe(1);
    }
    expect(strict.summaries.length).toBeGreaterThanOrEqual(loose.summaries.length);
  });

  it('should find the cross-site copies of the mock feed', () => {
    const { listings: feed, duplicatePairs } = generateMockListings({ total: 20, seed: 5 });
    const result = detectDuplicates(feed);
    const clusterOf = new Map<string, string>();
    for (const summary of result.summaries) {
      for (const id of summary.memberIds) clusterOf.set(id, summary.clusterId);
    }

    const found = duplicatePairs.filter(([original, copy]) => clusterOf.get(original) === clusterOf.get(copy));
    expect(found.length).toBeGreaterThan(0);
  });
});
