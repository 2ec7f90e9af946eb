/**
 * Storage Layer
 *
 * File-based persistence for listing feeds and detection reports.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  getDataDir,
  getReportsDir,
  getReportPath,
  formatReportTimestamp,
  type ReportKind,
} from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson, fileExists, FileNotFoundError } from './atomic.js';

// Feed files
export { loadListingsFile, loadAliasTable } from './listings.js';
