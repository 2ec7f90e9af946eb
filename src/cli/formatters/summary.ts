/**
 * Report Formatters
 *
 * Table output for detection and cross-source diff results. Functions
 * return lines so commands decide where (and whether) they are printed.
 *
 * @module cli/formatters/summary
 */

import chalk from 'chalk';
import type { DetectionResult } from '../../pipeline/detect.js';
import type { EvidenceSummary } from '../../schemas/evidence.js';
import type { FieldValue, SourceDifferenceReport } from '../../analysis/diff.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Helpers
// ============================================================================

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width, ignoring ANSI codes.
 */
export function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function formatValue(value: FieldValue): string {
  return value === null ? '?' : String(value);
}

// ============================================================================
// Detection
// ============================================================================

/**
 * Key figures of a detection run.
 */
export function formatDetectionStats(result: DetectionResult): string[] {
  const { stats } = result;
  return [
    `${chalk.dim('Listings:')}        ${stats.inputCount} read, ${stats.acceptedCount} accepted, ${stats.rejectedCount} rejected`,
    `${chalk.dim('Candidate pairs:')} ${stats.candidatePairCount} compared, ${stats.acceptedPairCount} accepted`,
    `${chalk.dim('Properties:')}      ${stats.clusterCount} (${plural(stats.duplicateCount, 'duplicate')})`,
    `${chalk.dim('Duration:')}        ${formatDuration(result.timing.durationMs)}`,
  ];
}

/**
 * Table of multi-member clusters, largest first, at most `limit` rows.
 */
export function formatClusterTable(summaries: readonly EvidenceSummary[], limit = 20): string[] {
  const groups = summaries
    .filter((s) => s.size > 1)
    .sort((x, y) => y.size - x.size || (x.clusterId < y.clusterId ? -1 : 1));

  if (groups.length === 0) {
    return ['No duplicates found.'];
  }

  const header =
    padRight('CLUSTER', 14) +
    padRight('SIZE', 6) +
    padRight('CONF', 7) +
    padRight('CANONICAL', 22) +
    'MEMBERS';
  const lines = [chalk.bold(header), chalk.dim('-'.repeat(80))];

  for (const group of groups.slice(0, limit)) {
    const others = group.memberIds.filter((id) => id !== group.canonicalId).join(', ');
    lines.push(
      padRight(group.clusterId, 14) +
        padRight(String(group.size), 6) +
        padRight(group.confidence.toFixed(2), 7) +
        padRight(truncate(group.canonicalId, 20), 22) +
        truncate(others, 40)
    );
  }

  if (groups.length > limit) {
    lines.push(chalk.dim(`... and ${groups.length - limit} more (see the JSON report)`));
  }
  return lines;
}

/**
 * Full table output of a detection run.
 */
export function formatDetectionSummary(result: DetectionResult, limit = 20): string[] {
  return [...formatDetectionStats(result), '', ...formatClusterTable(result.summaries, limit)];
}

// ============================================================================
// Cross-source differences
// ============================================================================

/**
 * Table output of a cross-source difference report.
 */
export function formatDiffSummary(report: SourceDifferenceReport, limit = 20): string[] {
  const lines = [
    `${chalk.dim('Only on SeLoger:')}   ${report.onlySeLoger.length}`,
    `${chalk.dim('Only on LeBoncoin:')} ${report.onlyLeBoncoin.length}`,
    `${chalk.dim('On both sites:')}     ${report.sharedCount} (${report.mismatches.length} with differences)`,
  ];

  for (const mismatch of report.mismatches.slice(0, limit)) {
    lines.push('');
    lines.push(chalk.bold(`${mismatch.clusterId} (canonical ${mismatch.canonicalId})`));
    for (const field of mismatch.fields) {
      const seloger = field.values.seloger.map(formatValue).join(' | ');
      const leboncoin = field.values.leboncoin.map(formatValue).join(' | ');
      lines.push(`  ${padRight(field.field, 16)} seloger: ${seloger}  leboncoin: ${leboncoin}`);
    }
  }

  if (report.mismatches.length > limit) {
    lines.push('');
    lines.push(chalk.dim(`... and ${report.mismatches.length - limit} more (see the JSON report)`));
  }
  return lines;
}
