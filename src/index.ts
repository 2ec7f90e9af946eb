/**
 * Listing Dedupe
 *
 * Library entry point. `detectDuplicates` runs the whole detection
 * pipeline; the building blocks are exported for callers that need a
 * single step.
 *
 * @example
 * ```typescript
 * import { detectDuplicates } from 'listing-dedupe';
 *
 * const { summaries, rejected, warnings } = detectDuplicates(feed, { similarityThreshold: 0.8 });
 * ```
 *
 * @module listing-dedupe
 */

export * from './schemas/index.js';
export * from './dedupe/index.js';
export * from './pipeline/index.js';
export * from './analysis/index.js';
export { generateMockListings, createRandom, type MockFeed, type MockFeedOptions } from './fixtures/mock.js';
