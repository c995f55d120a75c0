/**
 * Claim set construction and merging.
 *
 * Claims are keyed by their triple, never by position, so the same rows in any
 * order (or repeated) give the same set.
 */

import { compareStrings } from '@/common/utils/text.js';

import type { ClaimSet, PresenceClaim } from '../types.js';
import type { ResolvedRow, RowOutcome, RowProvenance } from '@/common/types/rows.js';

const SEPARATOR = '\u0000';

export const claimKey = (organizationId: string, sectorCode: string, unitCode: string): string =>
  [organizationId, sectorCode, unitCode].join(SEPARATOR);

const provenanceKey = (provenance: RowProvenance): string =>
  `${provenance.sourceFile ?? ''}${SEPARATOR}${String(provenance.rowNumber ?? '')}`;

// Provenances without a row number sort after the numbered ones of their file.
const compareRowNumbers = (a: number | undefined, b: number | undefined): number => {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a - b;
};

const compareProvenance = (a: RowProvenance, b: RowProvenance): number =>
  compareStrings(a.sourceFile ?? '', b.sourceFile ?? '') ||
  compareRowNumbers(a.rowNumber, b.rowNumber);

const mergeProvenance = (
  left: readonly RowProvenance[],
  right: readonly RowProvenance[]
): RowProvenance[] => {
  const byKey = new Map<string, RowProvenance>();
  for (const provenance of [...left, ...right]) {
    byKey.set(provenanceKey(provenance), provenance);
  }
  return [...byKey.values()].sort(compareProvenance);
};

const addClaim = (claims: Map<string, PresenceClaim>, claim: PresenceClaim): void => {
  const key = claimKey(claim.organizationId, claim.sectorCode, claim.unitCode);
  const existing = claims.get(key);

  claims.set(
    key,
    existing === undefined
      ? claim
      : { ...existing, provenance: mergeProvenance(existing.provenance, claim.provenance) }
  );
};

const toClaim = (row: ResolvedRow): PresenceClaim => ({
  organizationId: row.organizationId,
  sectorCode: row.sectorCode,
  unitCode: row.unitCode,
  provenance: row.source.provenance === undefined ? [] : [row.source.provenance],
});

/**
 * Builds the distinct claims of the resolved rows. Unresolved rows are ignored.
 */
export const buildClaims = (rows: readonly RowOutcome[]): ClaimSet => {
  const claims = new Map<string, PresenceClaim>();

  for (const row of rows) {
    if (row.status !== 'resolved') continue;
    addClaim(claims, toClaim(row));
  }

  return claims;
};

/**
 * Union of claim sets. Commutative: merge order does not matter.
 */
export const mergeClaimSets = (...sets: readonly ClaimSet[]): ClaimSet => {
  const merged = new Map<string, PresenceClaim>();
  for (const set of sets) {
    for (const claim of set.values()) {
      addClaim(merged, claim);
    }
  }
  return merged;
};
