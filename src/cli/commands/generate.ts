/**
 * Generate Command
 *
 * Writes a deterministic mock feed to try the other commands on.
 *
 * @module cli/commands/generate
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { generateMockListings, type MockFeed } from '../../fixtures/mock.js';
import { atomicWriteJson } from '../../storage/atomic.js';

export interface GenerateCommandOptions {
  total: string;
  duplicateRatio: string;
  seed: string;
  output: string;
}

function parseCount(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${flag} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Write a mock SeLoger/LeBoncoin feed with known duplicates')
    .option('-n, --total <count>', 'Number of distinct listings', '40')
    .option('-r, --duplicate-ratio <ratio>', 'Share of listings copied to the other site', '0.3')
    .option('-s, --seed <number>', 'Random seed', '42')
    .option('-o, --output <file>', 'Feed file to write', 'mock-listings.json')
    .action(async (options: GenerateCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleGenerate(options, base);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        base.error(message, error instanceof Error ? error : undefined);
      }
    });
}

export async function handleGenerate(
  options: GenerateCommandOptions,
  base: BaseCommand
): Promise<MockFeed> {
  const feed = generateMockListings({
    total: parseCount(options.total, '--total'),
    duplicateRatio: parseCount(options.duplicateRatio, '--duplicate-ratio'),
    seed: parseCount(options.seed, '--seed'),
  });

  await atomicWriteJson(options.output, feed.listings);

  base.success(
    `Wrote ${feed.listings.length} listings (${feed.duplicatePairs.length} cross-site copies) to ${options.output}`
  );
  return feed;
}
