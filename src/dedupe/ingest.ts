/**
 * Ingestion Validation
 *
 * Screens a raw batch before normalization. Records without an identifier,
 * with an identifier already used earlier in the batch, or failing the
 * Listing schema are rejected one by one; the rest of the batch continues.
 *
 * @module dedupe/ingest
 */

import { ListingSchema, type Listing } from '../schemas/listing.js';
import type { RejectedListing } from '../schemas/evidence.js';
import { InvalidListingError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface IngestResult {
  /** Listings that passed validation, in input order */
  accepted: Listing[];
  /** One error per rejected record, in input order */
  errors: InvalidListingError[];
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Identifier of a raw record, trimmed, or null when absent or blank.
 */
export function extractListingId(record: unknown): string | null {
  if (!isRecord(record)) {
    return null;
  }
  const id = record['id'];
  if (typeof id === 'number' && Number.isFinite(id)) {
    return String(id);
  }
  if (typeof id !== 'string') {
    return null;
  }
  const trimmed = id.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Convert a validation error into the serializable rejection record.
 */
export function toRejectedListing(error: InvalidListingError): RejectedListing {
  return {
    index: error.index,
    id: error.listingId,
    reason: error.reason,
    message: error.message,
  };
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Validate a raw batch of listing records.
 *
 * The first record using an identifier wins; later records with the same
 * identifier are rejected as duplicates.
 *
 * @example
 * ```typescript
 * const { accepted, errors } = validateListings(JSON.parse(feed));
 * for (const err of errors) logger.warn(err.message);
 * ```
 */
export function validateListings(records: readonly unknown[]): IngestResult {
  const accepted: Listing[] = [];
  const errors: InvalidListingError[] = [];
  const seen = new Set<string>();

  records.forEach((record, index) => {
    const id = extractListingId(record);

    if (id === null) {
      errors.push(
        new InvalidListingError(
          `Record #${index} has no identifier`,
          'missing_identifier',
          index,
          null
        )
      );
      return;
    }

    if (seen.has(id)) {
      errors.push(
        new InvalidListingError(
          `Record #${index} reuses identifier "${id}"`,
          'duplicate_identifier',
          index,
          id
        )
      );
      return;
    }

    const parsed = ListingSchema.safeParse({ ...(isRecord(record) ? record : {}), id });
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      errors.push(
        new InvalidListingError(
          `Record #${index} ("${id}") is invalid: ${details}`,
          'invalid_record',
          index,
          id
        )
      );
      return;
    }

    seen.add(id);
    accepted.push(Object.freeze(parsed.data));
  });

  return { accepted, errors };
}
