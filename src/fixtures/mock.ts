/**
 * Mock Listing Feed
 *
 * Generates a deterministic SeLoger/LeBoncoin feed for demos and manual
 * testing: a base set of listings split between the two sites, plus
 * cross-site copies of some of them carrying small price changes and
 * dropped fields, the way the same ad drifts when re-posted.
 *
 * @module fixtures/mock
 */

import { createHash } from 'node:crypto';
import type { Listing } from '../schemas/listing.js';
import type { ListingKind, ListingSource, PropertyType } from '../schemas/common.js';

// ============================================================================
// Types
// ============================================================================

export interface MockFeedOptions {
  /** Number of base listings (default 40) */
  total?: number;
  /** Share of base listings copied to the other site (default 0.3) */
  duplicateRatio?: number;
  /** PRNG seed (default 42) */
  seed?: number;
  /** Timestamp of the first listing (default 2024-01-01T08:00:00.000Z) */
  startAt?: string;
}

export interface MockFeed {
  listings: Listing[];
  /** Pairs [original id, copy id] that describe the same property */
  duplicatePairs: Array<[string, string]>;
}

// ============================================================================
// Constants
// ============================================================================

const CITIES: ReadonlyArray<readonly [string, string]> = [
  ['Paris', '75000'],
  ['Lyon', '69000'],
  ['Marseille', '13000'],
  ['Toulouse', '31000'],
  ['Bordeaux', '33000'],
  ['Lille', '59000'],
];

const PROPERTY_TYPES: readonly PropertyType[] = ['apartment', 'house', 'studio'];

const PROPERTY_LABELS: Record<PropertyType, string> = {
  apartment: 'Appartement',
  house: 'Maison',
  studio: 'Studio',
  other: 'Bien',
};

const KINDS: readonly ListingKind[] = ['sale', 'rental'];

// ============================================================================
// Seeded random
// ============================================================================

/**
 * mulberry32 generator returning floats in [0, 1).
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

function otherSource(source: ListingSource): ListingSource {
  return source === 'seloger' ? 'leboncoin' : 'seloger';
}

function stableId(source: ListingSource, seed: string): string {
  const hash = createHash('sha256').update(`${source}|${seed}`).digest('hex').substring(0, 12);
  return `${source === 'seloger' ? 'sl' : 'lbc'}-${hash}`;
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Generate a mock feed. Identical options always yield an identical feed.
 *
 * @example
 * ```typescript
 * const { listings, duplicatePairs } = generateMockListings({ total: 20, seed: 7 });
 * ```
 */
export function generateMockListings(options: MockFeedOptions = {}): MockFeed {
  const total = Math.max(0, Math.floor(options.total ?? 40));
  const duplicateRatio = Math.min(1, Math.max(0, options.duplicateRatio ?? 0.3));
  const random = createRandom(options.seed ?? 42);
  const start = Date.parse(options.startAt ?? '2024-01-01T08:00:00.000Z');
  const timestamp = (offset: number): string => new Date(start + offset * 60_000).toISOString();

  const base: Listing[] = [];
  for (let i = 0; i < total; i++) {
    const source: ListingSource = i < Math.ceil(total / 2) ? 'seloger' : 'leboncoin';
    const [city, postalCode] = pick(random, CITIES);
    const propertyType = pick(random, PROPERTY_TYPES);
    const kind = pick(random, KINDS);
    const rooms = propertyType === 'studio' ? 1 : randomInt(random, 2, 5);
    const surface = randomInt(random, 18, 140);
    const price = kind === 'rental' ? randomInt(random, 40, 350) * 10 : randomInt(random, 80, 1200) * 1000;

    base.push({
      id: stableId(source, `base-${i}`),
      source,
      title: `${PROPERTY_LABELS[propertyType]} ${rooms} pièces ${surface} m² ${city}`,
      city,
      postalCode,
      price,
      surface,
      rooms,
      kind,
      propertyType,
      agencyOrPrivate: random() < 0.6 ? 'agency' : 'private',
      description: null,
      url: null,
      ingestedAt: timestamp(i),
    });
  }

  const copies: Listing[] = [];
  const duplicatePairs: Array<[string, string]> = [];
  const copyCount = Math.floor(base.length * duplicateRatio);

  for (let i = 0; i < copyCount; i++) {
    const original = base[i];
    const source = otherSource(original.source);
    const copy: Listing = {
      ...original,
      id: stableId(source, `copy-${i}`),
      source,
      ingestedAt: timestamp(total + i),
    };

    if (random() < 0.3 && typeof original.price === 'number') {
      const step = original.kind === 'rental' ? 10 : 1000;
      copy.price = original.price + randomInt(random, -3, 3) * step;
    }
    if (random() < 0.2) {
      const dropped = pick(random, ['surface', 'rooms', 'agencyOrPrivate'] as const);
      copy[dropped] = null;
    }

    copies.push(copy);
    duplicatePairs.push([original.id, copy.id]);
  }

  return { listings: [...base, ...copies], duplicatePairs };
}
