/**
 * Aggregate Presence Use Case
 *
 * 1. Drop unresolved rows
 * 2. Collapse the remaining rows into distinct claims
 * 3. Reject claims whose unit is not in the index
 * 4. For every requested level, roll each claim up to its ancestor at that
 *    level and count distinct organizations per (unit, sector) and distinct
 *    sectors per unit
 *
 * Every intermediate structure is keyed, and the output is sorted, so the
 * result does not depend on the order of the input rows.
 */

import { compareStrings } from '@/common/utils/text.js';

import { buildClaims } from './build-claims.js';
import { createAggregationInvariantViolation } from '../errors.js';

import type {
  AggregateOptions,
  AggregateRecord,
  AggregationInvariantViolation,
  ClaimSet,
  PresenceAggregation,
  PresenceClaim,
} from '../types.js';
import type { RowOutcome } from '@/common/types/rows.js';
import type { AdminIndex, AdminUnit } from '@/modules/admin-hierarchy/index.js';

interface UnitBucket {
  unit: AdminUnit;
  level: number;
  /** sector code -> organization ids */
  sectors: Map<string, Set<string>>;
}

const compareClaims = (a: PresenceClaim, b: PresenceClaim): number =>
  compareStrings(a.unitCode, b.unitCode) ||
  compareStrings(a.sectorCode, b.sectorCode) ||
  compareStrings(a.organizationId, b.organizationId);

const compareBuckets = (a: UnitBucket, b: UnitBucket): number =>
  a.level - b.level ||
  compareStrings(a.unit.countryCode, b.unit.countryCode) ||
  compareStrings(a.unit.code, b.unit.code);

const toRecords = (bucket: UnitBucket): AggregateRecord[] =>
  [...bucket.sectors.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([sectorCode, organizations]) => ({
      level: bucket.level,
      countryCode: bucket.unit.countryCode,
      unitCode: bucket.unit.code,
      sectorCode,
      organizationCount: organizations.size,
      organizationIds: [...organizations].sort(compareStrings),
      unitSectorCount: bucket.sectors.size,
    }));

/**
 * Rolls an already built claim set up to the requested levels.
 */
export const aggregateClaims = (
  index: AdminIndex,
  claimSet: ClaimSet,
  options: AggregateOptions
): PresenceAggregation => {
  const levels = [...new Set(options.levels)].sort((a, b) => a - b);
  const buckets = new Map<string, UnitBucket>();
  const claims: PresenceClaim[] = [];
  const violations: AggregationInvariantViolation[] = [];

  for (const claim of [...claimSet.values()].sort(compareClaims)) {
    const unit = index.getUnit(claim.unitCode);
    if (unit === undefined) {
      violations.push(createAggregationInvariantViolation(claim));
      continue;
    }
    claims.push(claim);

    for (const level of levels) {
      const ancestor = index.getAncestorAtLevel(unit, level);
      if (ancestor === undefined) continue;

      const key = `${String(level)}|${ancestor.code}`;
      let bucket = buckets.get(key);
      if (bucket === undefined) {
        bucket = { unit: ancestor, level, sectors: new Map() };
        buckets.set(key, bucket);
      }

      const organizations = bucket.sectors.get(claim.sectorCode) ?? new Set<string>();
      organizations.add(claim.organizationId);
      bucket.sectors.set(claim.sectorCode, organizations);
    }
  }

  const records = [...buckets.values()].sort(compareBuckets).flatMap(toRecords);

  return { claims, records, violations };
};

/**
 * Deduplicates the resolved rows into claims and aggregates them.
 */
export const aggregatePresence = (
  index: AdminIndex,
  rows: readonly RowOutcome[],
  options: AggregateOptions
): PresenceAggregation => aggregateClaims(index, buildClaims(rows), options);
