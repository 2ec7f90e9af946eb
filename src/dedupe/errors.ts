/**
 * Detection Errors
 *
 * @module dedupe/errors
 */

import type { RejectionReason } from '../schemas/evidence.js';

/**
 * A listing could not enter the pipeline. Raised per record during
 * ingestion validation; the record is skipped and the batch continues.
 */
export class InvalidListingError extends Error {
  constructor(
    message: string,
    public readonly reason: RejectionReason,
    public readonly index: number,
    public readonly listingId: string | null
  ) {
    super(message);
    this.name = 'InvalidListingError';
  }
}

/**
 * The caller's configuration is unusable. Raised before any work is done.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
