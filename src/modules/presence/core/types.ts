/**
 * Domain types for presence aggregation.
 */

import type { RowProvenance } from '@/common/types/rows.js';

/**
 * "This organization is active in this sector in this place."
 * One claim per distinct triple, whatever the number of source rows behind it.
 */
export interface PresenceClaim {
  readonly organizationId: string;
  readonly sectorCode: string;
  readonly unitCode: string;
  /** Distinct provenances of the contributing rows, ordered */
  readonly provenance: readonly RowProvenance[];
}

/** Claims keyed by their (organization, sector, unit) triple */
export type ClaimSet = ReadonlyMap<string, PresenceClaim>;

/**
 * Distinct organizations of one sector in one admin unit.
 */
export interface AggregateRecord {
  readonly level: number;
  readonly countryCode: string;
  readonly unitCode: string;
  readonly sectorCode: string;
  readonly organizationCount: number;
  /** Ordered organization ids */
  readonly organizationIds: readonly string[];
  /** Distinct sectors present in the unit, all sectors together */
  readonly unitSectorCount: number;
}

export interface AggregateOptions {
  /** Admin levels to roll claims up to, e.g. [0, 1, 2] */
  levels: readonly number[];
}

/**
 * Claim whose admin unit is not in the index. Signals a defect upstream.
 */
export interface AggregationInvariantViolation {
  readonly type: 'AggregationInvariantViolation';
  readonly message: string;
  readonly claim: PresenceClaim;
}

export interface PresenceAggregation {
  /** Valid claims, ordered by unit, sector and organization */
  readonly claims: readonly PresenceClaim[];
  readonly records: readonly AggregateRecord[];
  readonly violations: readonly AggregationInvariantViolation[];
}
