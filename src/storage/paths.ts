/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * ~/.listing-dedupe/                       # Default data directory
 * └── reports/
 *     ├── detect-20240101-080000.json      # Detection reports
 *     └── diff-20240101-080500.json        # Cross-source diff reports
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

export type ReportKind = 'detect' | 'diff';

/**
 * Gets the root data directory for the application.
 *
 * Uses the `DEDUPE_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.listing-dedupe/`.
 *
 * @example
 * ```typescript
 * process.env.DEDUPE_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.DEDUPE_DATA_DIR;

  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.listing-dedupe');
}

export function getReportsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'reports');
}

/**
 * Timestamp in `YYYYMMDD-HHMMSS` form (UTC).
 */
export function formatReportTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}

/**
 * Gets the default path of a report file.
 *
 * @example
 * ```typescript
 * getReportPath('detect', new Date('2024-01-01T08:00:00Z'));
 * // '/home/me/.listing-dedupe/reports/detect-20240101-080000.json'
 * ```
 */
export function getReportPath(
  kind: ReportKind,
  date: Date = new Date(),
  dataDir: string = getDataDir()
): string {
  return path.join(getReportsDir(dataDir), `${kind}-${formatReportTimestamp(date)}.json`);
}
