/**
 * Domain types for a presence run.
 *
 * A run takes the source rows of one or more countries through location,
 * organization and sector resolution, aggregates the resulting claims and
 * derives the coverage indicators and review lists.
 */

import { type Static, Type } from '@sinclair/typebox';

import { CodeListEntrySchema } from '@/modules/code-lists/index.js';
import { OrganizationConfigSchema } from '@/modules/organizations/index.js';

import type { UnresolvedRow } from '@/common/types/rows.js';
import type { AdminIndex } from '@/modules/admin-hierarchy/index.js';
import type { CodeList } from '@/modules/code-lists/index.js';
import type { CoverageRow } from '@/modules/coverage/index.js';
import type { LocationResolverOptions } from '@/modules/location-resolver/index.js';
import type { OrganizationNormalizer } from '@/modules/organizations/index.js';
import type { AggregateRecord, AggregationInvariantViolation } from '@/modules/presence/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** National, admin1 and admin2 */
export const DEFAULT_LEVELS: readonly number[] = [0, 1, 2];

/** Sector cells starting with this mark an HXL hashtag row */
export const HXL_TAG_PREFIX = '#';

// ─────────────────────────────────────────────────────────────────────────────
// File Schemas
// ─────────────────────────────────────────────────────────────────────────────

const FuzzyMatchSchema = Type.Union([
  Type.Object({
    metric: Type.Literal('edit-distance'),
    maxDistance: Type.Integer({ minimum: 0 }),
    minInputLength: Type.Optional(Type.Integer({ minimum: 0 })),
  }),
  Type.Object({
    metric: Type.Literal('fuse'),
    threshold: Type.Number({ minimum: 0, maximum: 1 }),
    minInputLength: Type.Optional(Type.Integer({ minimum: 0 })),
  }),
]);

const MatchingSchema = Type.Object({
  fuzzy: Type.Optional(FuzzyMatchSchema),
});

export const RunConfigFileSchema = Type.Object({
  /** Admin levels to aggregate and report */
  levels: Type.Optional(Type.Array(Type.Integer({ minimum: 0 }), { minItems: 1 })),
  /** Only these countries (ISO3) are processed when set */
  countries: Type.Optional(Type.Array(Type.String())),
  location: Type.Optional(MatchingSchema),
  organizations: Type.Optional(OrganizationConfigSchema),
  sectors: Type.Array(CodeListEntrySchema),
  sectorMatching: Type.Optional(MatchingSchema),
  orgTypes: Type.Optional(Type.Array(CodeListEntrySchema)),
  orgTypeMatching: Type.Optional(MatchingSchema),
  /** Sectors every admin unit is checked against for coverage gaps */
  gapSectors: Type.Optional(Type.Array(Type.String())),
  /** Read the reference period from source file names, e.g. `xyz-april-june-2025.csv` */
  datesInFileNames: Type.Optional(Type.Boolean()),
});

export type RunConfig = Static<typeof RunConfigFileSchema>;

export const SourceRowSchema = Type.Object({
  countryCode: Type.String({ minLength: 1 }),
  locations: Type.Array(Type.String()),
  orgName: Type.String(),
  orgAcronym: Type.Optional(Type.String()),
  orgType: Type.Optional(Type.String()),
  sector: Type.String(),
  provenance: Type.Optional(
    Type.Object({
      sourceFile: Type.Optional(Type.String()),
      rowNumber: Type.Optional(Type.Integer({ minimum: 1 })),
    })
  ),
});

export const SourceRowsFileSchema = Type.Array(SourceRowSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Run Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Immutable collaborators of a run, built once from the configuration.
 */
export interface PresenceRunDeps {
  index: AdminIndex;
  organizations: OrganizationNormalizer;
  sectors: CodeList;
  orgTypes?: CodeList | undefined;
  location: LocationResolverOptions;
}

export interface PresenceRunOptions {
  levels: readonly number[];
  /** Only these countries are processed when set */
  countries?: readonly string[] | undefined;
  /** Sectors checked for coverage gaps; defaults to the sectors present */
  gapSectors?: readonly string[] | undefined;
  /** Derive reference periods from source file names; on unless false */
  datesInFileNames?: boolean | undefined;
}

/** Calendar dates as `YYYY-MM-DD`, both inclusive */
export interface ReferencePeriod {
  readonly start: string;
  readonly end: string;
}

export type ReferencePeriodParse =
  | { readonly status: 'found'; readonly period: ReferencePeriod }
  | { readonly status: 'absent' }
  | { readonly status: 'invalid'; readonly reason: string };

export interface InvalidReferencePeriodHint {
  readonly sourceFile: string;
  readonly reason: string;
}

/**
 * Entry of the organisations table.
 */
export interface Organization {
  readonly id: string;
  readonly name: string;
  readonly acronym: string | null;
  readonly typeCode: string | null;
  readonly matchedVia: 'alias' | 'derived';
}

export interface AdminCell {
  readonly level: number;
  readonly code: string;
  readonly name: string;
}

/**
 * Row of the flat canonical presence table.
 */
export interface PresenceRow {
  readonly countryCode: string;
  /** The claim's unit and its ancestors, admin1 first; empty for national presence */
  readonly admins: readonly AdminCell[];
  readonly level: number;
  readonly organizationId: string;
  readonly organizationName: string;
  readonly organizationAcronym: string | null;
  readonly organizationTypeCode: string | null;
  readonly organizationTypeName: string | null;
  readonly sectorCode: string;
  readonly sectorName: string;
  /** Earliest start and latest end over the claim's source files; null when none has a period */
  readonly referencePeriodStart: string | null;
  readonly referencePeriodEnd: string | null;
  /** Distinct source rows behind the claim */
  readonly sourceRowCount: number;
}

/**
 * Organization id that was derived from the name because no alias matched.
 */
export interface UnmatchedOrganizationHint {
  readonly id: string;
  readonly rawNames: readonly string[];
  readonly countryCodes: readonly string[];
}

export interface UnknownOrgTypeHint {
  readonly rawType: string;
  readonly countryCode: string;
  readonly organizationId: string;
}

export interface CountryRunStats {
  readonly countryCode: string;
  readonly rowsIn: number;
  readonly hxlRowsSkipped: number;
  readonly rowsResolved: number;
  readonly rowsUnresolved: number;
  readonly claims: number;
}

export interface PresenceReview {
  readonly unresolvedRows: readonly UnresolvedRow[];
  readonly unmatchedOrganizations: readonly UnmatchedOrganizationHint[];
  readonly unknownOrgTypes: readonly UnknownOrgTypeHint[];
  /** Source files whose name holds a period that could not be read */
  readonly invalidReferencePeriods: readonly InvalidReferencePeriodHint[];
  readonly violations: readonly AggregationInvariantViolation[];
}

export interface PresenceRunResult {
  readonly records: readonly AggregateRecord[];
  readonly coverage: readonly CoverageRow[];
  readonly presence: readonly PresenceRow[];
  readonly organizations: readonly Organization[];
  readonly review: PresenceReview;
  readonly stats: readonly CountryRunStats[];
  /** Rows of countries outside the `countries` filter */
  readonly excludedRows: number;
}
