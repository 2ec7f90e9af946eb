/**
 * Shared Detection Options
 *
 * Flags common to commands that run detection, and their translation into
 * a detection config. Flags win over environment defaults.
 *
 * @module cli/commands/options
 */

import type { Command } from 'commander';
import { config } from '../../config/index.js';
import type { DedupeConfigInput } from '../../schemas/config.js';
import { loadAliasTable } from '../../storage/listings.js';

/**
 * Raw detection flags as commander hands them over.
 */
export interface DetectionFlags {
  threshold?: string;
  maxBlockSize?: string;
  aliases?: string;
}

/**
 * Register the detection flags on a command.
 */
export function addDetectionOptions(command: Command): Command {
  return command
    .option('-t, --threshold <score>', 'Similarity threshold between 0 and 1 (default 0.75)')
    .option('--max-block-size <count>', 'Block size above which a warning is reported')
    .option('--aliases <file>', 'JSON file mapping city variants to canonical names');
}

/**
 * Build a detection config from flags and environment defaults.
 *
 * Numeric flags are passed through as numbers, so malformed values are
 * reported by config validation like any other invalid setting.
 */
export async function buildDetectionConfig(flags: DetectionFlags): Promise<DedupeConfigInput> {
  const input: DedupeConfigInput = {
    similarityThreshold:
      flags.threshold !== undefined ? Number(flags.threshold) : config.detection.similarityThreshold,
    maxBlockSize:
      flags.maxBlockSize !== undefined ? Number(flags.maxBlockSize) : config.detection.maxBlockSize,
  };

  if (flags.aliases !== undefined) {
    input.cityAliasTable = await loadAliasTable(flags.aliases);
  }
  return input;
}
