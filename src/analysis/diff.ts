/**
 * Cross-Source Differences
 *
 * Compares what the two sites publish about the same property. Clusters
 * seen on a single site are listed per site; clusters spanning both sites
 * are checked field by field and every disagreeing field is reported with
 * the values each site shows.
 *
 * @module analysis/diff
 */

import type { Listing } from '../schemas/listing.js';
import type { ListingSource } from '../schemas/common.js';
import type { EvidenceSummary } from '../schemas/evidence.js';
import {
  canonicalCity,
  normalizeContent,
  parsePositiveMeasure,
  parseRoomCount,
} from '../dedupe/normalize.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Listing fields compared across sources.
 */
export const KEY_FIELDS = [
  'title',
  'city',
  'postalCode',
  'kind',
  'propertyType',
  'rooms',
  'surface',
  'price',
  'agencyOrPrivate',
] as const;

export type KeyField = (typeof KEY_FIELDS)[number];

export type FieldValue = string | number | null;

export interface FieldMismatch {
  field: KeyField;
  /** Distinct values shown on each site, unknown last */
  values: Record<ListingSource, FieldValue[]>;
}

export interface ClusterMismatch {
  clusterId: string;
  canonicalId: string;
  /** Member ids per site */
  memberIds: Record<ListingSource, string[]>;
  fields: FieldMismatch[];
}

export interface SourceDifferenceOptions {
  /** Alias table the detection run used, so merged city spellings compare equal */
  cityAliasTable?: Readonly<Record<string, string>>;
}

export interface SourceDifferenceReport {
  /** Clusters only present on SeLoger */
  onlySeLoger: string[];
  /** Clusters only present on LeBoncoin */
  onlyLeBoncoin: string[];
  /** Number of clusters present on both sites */
  sharedCount: number;
  /** Shared clusters whose sites disagree on at least one field */
  mismatches: ClusterMismatch[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Comparable form of a field: parsed numbers, normalized text, raw enums.
 */
export function comparableValue(
  listing: Listing,
  field: KeyField,
  cityAliasTable: Readonly<Record<string, string>> = {}
): FieldValue {
  switch (field) {
    case 'title': {
      const title = normalizeContent(listing.title);
      return title === '' ? null : title;
    }
    case 'city': {
      const city = canonicalCity(listing.city, cityAliasTable);
      return city === '' ? null : city;
    }
    case 'price':
      return parsePositiveMeasure(listing.price);
    case 'surface':
      return parsePositiveMeasure(listing.surface);
    case 'rooms':
      return parseRoomCount(listing.rooms);
    case 'postalCode': {
      const postalCode = listing.postalCode?.trim() ?? '';
      return postalCode === '' ? null : postalCode;
    }
    case 'kind':
      return listing.kind;
    case 'propertyType':
      return listing.propertyType;
    case 'agencyOrPrivate':
      return listing.agencyOrPrivate;
  }
}

function compareValues(x: FieldValue, y: FieldValue): number {
  if (x === y) return 0;
  if (x === null) return 1;
  if (y === null) return -1;
  if (typeof x === 'number' && typeof y === 'number') return x - y;
  return String(x) < String(y) ? -1 : 1;
}

function distinctValues(
  listings: readonly Listing[],
  field: KeyField,
  cityAliasTable: Readonly<Record<string, string>>
): FieldValue[] {
  return [
    ...new Set(listings.map((listing) => comparableValue(listing, field, cityAliasTable))),
  ].sort(compareValues);
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Build the cross-source difference report for a detection run.
 *
 * @param listings - Listings the run was given (rejected ones are ignored)
 * @param summaries - Evidence summaries of the run
 * @param options - Settings of the run, e.g. its city alias table
 * @throws Error if a summary references a listing missing from `listings`
 */
export function computeSourceDifferences(
  listings: readonly Listing[],
  summaries: readonly EvidenceSummary[],
  options: SourceDifferenceOptions = {}
): SourceDifferenceReport {
  const aliases = options.cityAliasTable ?? {};
  const byId = new Map(listings.map((listing) => [listing.id, listing]));
  const report: SourceDifferenceReport = {
    onlySeLoger: [],
    onlyLeBoncoin: [],
    sharedCount: 0,
    mismatches: [],
  };

  for (const summary of summaries) {
    const members = summary.memberIds.map((id) => {
      const listing = byId.get(id);
      if (!listing) {
        throw new Error(`Summary ${summary.clusterId} references unknown listing ${id}`);
      }
      return listing;
    });

    const seloger = members.filter((m) => m.source === 'seloger');
    const leboncoin = members.filter((m) => m.source === 'leboncoin');

    if (leboncoin.length === 0) {
      report.onlySeLoger.push(summary.clusterId);
      continue;
    }
    if (seloger.length === 0) {
      report.onlyLeBoncoin.push(summary.clusterId);
      continue;
    }

    report.sharedCount++;

    const fields: FieldMismatch[] = [];
    for (const field of KEY_FIELDS) {
      if (distinctValues(members, field, aliases).length <= 1) continue;
      fields.push({
        field,
        values: {
          seloger: distinctValues(seloger, field, aliases),
          leboncoin: distinctValues(leboncoin, field, aliases),
        },
      });
    }

    if (fields.length > 0) {
      report.mismatches.push({
        clusterId: summary.clusterId,
        canonicalId: summary.canonicalId,
        memberIds: {
          seloger: seloger.map((m) => m.id),
          leboncoin: leboncoin.map((m) => m.id),
        },
        fields,
      });
    }
  }

  return report;
}
