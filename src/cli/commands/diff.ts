/**
 * Diff Command
 *
 * Compares what SeLoger and LeBoncoin show for the same properties.
 *
 * @module cli/commands/diff
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { addDetectionOptions, buildDetectionConfig, type DetectionFlags } from './options.js';
import { progressCallbacks, reportRunWarnings } from './detect.js';
import { formatDiffSummary } from '../formatters/summary.js';
import { detectDuplicates } from '../../pipeline/detect.js';
import { validateListings } from '../../dedupe/ingest.js';
import {
  computeSourceDifferences,
  type SourceDifferenceReport,
} from '../../analysis/diff.js';
import { markDuplicates, type DuplicateFlag } from '../../analysis/flags.js';
import { loadListingsFile } from '../../storage/listings.js';
import { atomicWriteJson } from '../../storage/atomic.js';
import { getReportPath } from '../../storage/paths.js';

export interface DiffCommandOptions extends DetectionFlags {
  output?: string;
  format: 'table' | 'json';
}

export interface DiffReport extends SourceDifferenceReport {
  input: string;
  generatedAt: string;
  flags: DuplicateFlag[];
}

export function registerDiffCommand(program: Command): void {
  addDetectionOptions(
    program
      .command('diff <input>')
      .description('Compare SeLoger and LeBoncoin listings of the same properties')
  )
    .option('-o, --output <file>', 'Write the JSON report to this file')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (input: string, options: DiffCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleDiff(input, options, base);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        base.error(message, error instanceof Error ? error : undefined);
      }
    });
}

export async function handleDiff(
  input: string,
  options: DiffCommandOptions,
  base: BaseCommand
): Promise<DiffReport> {
  const records = await loadListingsFile(input);
  const detectionConfig = await buildDetectionConfig(options);

  const result = detectDuplicates(records, detectionConfig, {
    logger: base.logger,
    ...progressCallbacks(base, options.format),
  });
  reportRunWarnings(base, result);

  // Same screening as the run, so the listings line up with its clusters
  const { accepted } = validateListings(records);

  const generatedAt = new Date();
  const report: DiffReport = {
    input,
    generatedAt: generatedAt.toISOString(),
    ...computeSourceDifferences(accepted, result.summaries, {
      cityAliasTable: result.config.cityAliasTable,
    }),
    flags: markDuplicates(result.summaries),
  };
  const reportPath = options.output ?? getReportPath('diff', generatedAt, base.dataDir);
  await atomicWriteJson(reportPath, report);

  if (options.format === 'json') {
    base.json(report);
    return report;
  }

  base.section('Cross-source Differences');
  base.lines(formatDiffSummary(report));
  base.blank();
  base.success(`Report written to ${reportPath}`);
  return report;
}
