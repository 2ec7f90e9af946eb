/**
 * Candidate Pair Generation (Blocking)
 *
 * Avoids the all-pairs comparison by grouping listings into blocks that
 * share coarse attributes and only pairing listings inside a block:
 *
 * - `city|p:<bucket>`: same canonical city, same rounded price
 * - `city|s:<bucket>`: same canonical city, same rounded surface
 * - `city|*`: fallback for listings with neither price nor surface. The
 *   block holds every listing of the city but only pairs that involve at
 *   least one such sparse listing are emitted; the others already meet in
 *   their price and surface blocks.
 *
 * Oversized blocks are still fully paired. They are reported as warnings.
 *
 * @module dedupe/blocking
 */

import type { NormalizedListing } from '../schemas/listing.js';
import type { CandidatePair, OversizedBlockWarning } from '../schemas/evidence.js';

// ============================================================================
// Types
// ============================================================================

export interface BlockingOptions {
  /** Block size above which a warning is raised */
  maxBlockSize: number;
}

/**
 * Size and yield of one block.
 */
export interface BlockStats {
  key: string;
  size: number;
  pairCount: number;
}

export interface CandidateGenerationResult {
  /** Unique pairs, sorted by (a, b) */
  pairs: CandidatePair[];
  /** Every block that held at least two listings, sorted by key */
  blocks: BlockStats[];
  /** One warning per block larger than maxBlockSize */
  warnings: OversizedBlockWarning[];
}

interface Block {
  members: string[];
  /** Only pairs touching one of these ids are emitted; null = all pairs */
  anchors: ReadonlySet<string> | null;
}

// ============================================================================
// Pair helpers
// ============================================================================

/**
 * Build the unordered pair for two ids, or null for a self-pair.
 */
export function makePair(x: string, y: string): CandidatePair | null {
  if (x === y) {
    return null;
  }
  return x < y ? { a: x, b: y } : { a: y, b: x };
}

/**
 * Order-independent key of a pair: pairKey(x, y) === pairKey(y, x).
 * JSON-encoded so that no two distinct pairs share a key, whatever the ids hold.
 */
export function pairKey(x: string, y: string): string {
  return JSON.stringify(x < y ? [x, y] : [y, x]);
}

/**
 * Sort order of pairs: by first id, then second id.
 */
export function comparePairs(p: CandidatePair, q: CandidatePair): number {
  if (p.a !== q.a) return p.a < q.a ? -1 : 1;
  return p.b < q.b ? -1 : p.b > q.b ? 1 : 0;
}

// ============================================================================
// Block keys
// ============================================================================

function cityPart(listing: NormalizedListing): string {
  return listing.city === '' ? '?' : listing.city;
}

/**
 * Price and surface block keys of a listing. Empty for fully sparse
 * listings, which are handled by the city fallback block.
 */
export function blockKeysFor(listing: NormalizedListing): string[] {
  const keys: string[] = [];
  if (listing.priceBucket !== null) {
    keys.push(`${cityPart(listing)}|p:${listing.priceBucket}`);
  }
  if (listing.surfaceBucket !== null) {
    keys.push(`${cityPart(listing)}|s:${listing.surfaceBucket}`);
  }
  return keys;
}

function isSparse(listing: NormalizedListing): boolean {
  return listing.price === null && listing.surface === null;
}

function collectBlocks(listings: readonly NormalizedListing[]): Map<string, Block> {
  const blocks = new Map<string, Block>();
  const byCity = new Map<string, string[]>();
  const sparseByCity = new Map<string, Set<string>>();

  for (const listing of listings) {
    for (const key of blockKeysFor(listing)) {
      const block = blocks.get(key) ?? { members: [], anchors: null };
      block.members.push(listing.id);
      blocks.set(key, block);
    }

    const city = cityPart(listing);
    const cityMembers = byCity.get(city) ?? [];
    cityMembers.push(listing.id);
    byCity.set(city, cityMembers);

    if (isSparse(listing)) {
      const sparse = sparseByCity.get(city) ?? new Set<string>();
      sparse.add(listing.id);
      sparseByCity.set(city, sparse);
    }
  }

  for (const [city, sparse] of sparseByCity) {
    blocks.set(`${city}|*`, { members: byCity.get(city) ?? [], anchors: sparse });
  }

  return blocks;
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Generate the candidate pairs for a batch of normalized listings.
 *
 * Each unordered pair appears once, however many blocks produced it, and no
 * listing is paired with itself. Output ordering does not depend on input
 * ordering.
 *
 * @example
 * ```typescript
 * const { pairs, warnings } = generateCandidatePairs(normalized, { maxBlockSize: 500 });
 * ```
 */
export function generateCandidatePairs(
  listings: readonly NormalizedListing[],
  options: BlockingOptions
): CandidateGenerationResult {
  const blocks = collectBlocks(listings);
  const pairs = new Map<string, CandidatePair>();
  const stats: BlockStats[] = [];
  const warnings: OversizedBlockWarning[] = [];

  for (const [key, block] of blocks) {
    const members = [...new Set(block.members)].sort();
    if (members.length < 2) continue;

    let pairCount = 0;
    for (let i = 0; i < members.length; i++) {
      for (let j = i + 1; j < members.length; j++) {
        const x = members[i];
        const y = members[j];
        if (block.anchors && !block.anchors.has(x) && !block.anchors.has(y)) continue;

        const pair = makePair(x, y);
        if (!pair) continue;
        pairs.set(pairKey(x, y), pair);
        pairCount++;
      }
    }

    stats.push({ key, size: members.length, pairCount });

    if (members.length > options.maxBlockSize) {
      warnings.push({
        kind: 'oversized_block',
        blockKey: key,
        size: members.length,
        maxBlockSize: options.maxBlockSize,
        message:
          `Block "${key}" holds ${members.length} listings (max ${options.maxBlockSize}); ` +
          `all ${pairCount} pairs were still compared`,
      });
    }
  }

  const byKey = (x: { key: string }, y: { key: string }): number =>
    x.key < y.key ? -1 : x.key > y.key ? 1 : 0;

  return {
    pairs: [...pairs.values()].sort(comparePairs),
    blocks: stats.sort(byKey),
    warnings: warnings.sort((w1, w2) => byKey({ key: w1.blockKey }, { key: w2.blockKey })),
  };
}
