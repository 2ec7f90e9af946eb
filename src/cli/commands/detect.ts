/**
 * Detect Command
 *
 * Runs duplicate detection over a listing feed, prints a summary and
 * writes the full JSON report.
 *
 * @module cli/commands/detect
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { addDetectionOptions, buildDetectionConfig, type DetectionFlags } from './options.js';
import { StageProgressDisplay } from '../formatters/progress.js';
import { formatDetectionSummary } from '../formatters/summary.js';
import { detectDuplicates, type DetectionResult } from '../../pipeline/detect.js';
import type { PipelineCallbacks } from '../../pipeline/types.js';
import { loadListingsFile } from '../../storage/listings.js';
import { atomicWriteJson } from '../../storage/atomic.js';
import { getReportPath } from '../../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

export interface DetectCommandOptions extends DetectionFlags {
  /** Report path (default: <dataDir>/reports/detect-<timestamp>.json) */
  output?: string;
  /** Output format */
  format: 'table' | 'json';
}

export interface DetectionReport extends DetectionResult {
  input: string;
  generatedAt: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Stage callbacks driving a progress display, or none when output is
 * machine-readable or quiet.
 */
export function progressCallbacks(base: BaseCommand, format: string): PipelineCallbacks {
  if (format === 'json' || base.isQuiet()) {
    return {};
  }
  const progress = new StageProgressDisplay();
  return {
    onStageStart: (_stageId, stageNumber) => progress.startStage(stageNumber),
    onStageComplete: (_stageId, stageNumber, timing) =>
      progress.completeStage(stageNumber, timing.durationMs),
  };
}

/**
 * Surface rejected records and oversized blocks as warnings.
 */
export function reportRunWarnings(base: BaseCommand, result: DetectionResult): void {
  for (const rejected of result.rejected) {
    base.warn(rejected.message);
  }
  for (const warning of result.warnings) {
    base.warn(warning.message);
  }
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerDetectCommand(program: Command): void {
  addDetectionOptions(
    program
      .command('detect <input>')
      .description('Find listings that describe the same property')
  )
    .option('-o, --output <file>', 'Write the JSON report to this file')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (input: string, options: DetectCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleDetect(input, options, base);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        base.error(message, error instanceof Error ? error : undefined);
      }
    });
}

/**
 * Handle the detect command.
 */
export async function handleDetect(
  input: string,
  options: DetectCommandOptions,
  base: BaseCommand
): Promise<DetectionReport> {
  base.debug(`Detecting duplicates in ${input}`);

  const listings = await loadListingsFile(input);
  const detectionConfig = await buildDetectionConfig(options);

  const result = detectDuplicates(listings, detectionConfig, {
    logger: base.logger,
    ...progressCallbacks(base, options.format),
  });
  reportRunWarnings(base, result);

  const generatedAt = new Date();
  const report: DetectionReport = { input, generatedAt: generatedAt.toISOString(), ...result };
  const reportPath = options.output ?? getReportPath('detect', generatedAt, base.dataDir);
  await atomicWriteJson(reportPath, report);

  if (options.format === 'json') {
    base.json(report);
    return report;
  }

  base.section('Detection Summary');
  base.lines(formatDetectionSummary(result));
  base.blank();
  base.success(`Report written to ${reportPath}`);
  return report;
}
