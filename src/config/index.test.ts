/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';

describe('config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset module cache to get fresh config
    jest.resetModules();
    process.env = { ...originalEnv };
    delete process.env.DEDUPE_DATA_DIR;
    delete process.env.DEDUPE_SIMILARITY_THRESHOLD;
    delete process.env.DEDUPE_MAX_BLOCK_SIZE;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should use default data directory when not specified', async () => {
    const { config } = await import('./index.js');
    expect(config.dataDir).toMatch(/\.listing-dedupe$/);
  });

  it('should use custom data directory when specified', async () => {
    process.env.DEDUPE_DATA_DIR = '/custom/path';
    const { config } = await import('./index.js');
    expect(config.dataDir).toBe('/custom/path');
  });

  it('should treat blank detection overrides as unset', async () => {
    process.env.DEDUPE_SIMILARITY_THRESHOLD = '';
    process.env.DEDUPE_MAX_BLOCK_SIZE = '  ';
    const { config } = await import('./index.js');
    expect(config.detection.similarityThreshold).toBeUndefined();
    expect(config.detection.maxBlockSize).toBeUndefined();
  });

  it('should keep an explicit zero threshold', async () => {
    process.env.DEDUPE_SIMILARITY_THRESHOLD = '0';
    const { config } = await import('./index.js');
    expect(config.detection.similarityThreshold).toBe(0);
  });

  it('should leave detection overrides undefined by default', async () => {
    const { config } = await import('./index.js');
    expect(config.detection.similarityThreshold).toBeUndefined();
    expect(config.detection.maxBlockSize).toBeUndefined();
  });

  it('should coerce numeric detection overrides', async () => {
    process.env.DEDUPE_SIMILARITY_THRESHOLD = '0.8';
    process.env.DEDUPE_MAX_BLOCK_SIZE = '250';
    const { config } = await import('./index.js');
    expect(config.detection.similarityThreshold).toBe(0.8);
    expect(config.detection.maxBlockSize).toBe(250);
  });
});
