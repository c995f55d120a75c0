/**
 * Run Presence Use Case
 *
 * 1. Group the rows by country and drop countries outside the filter
 * 2. Per country: skip HXL hashtag rows, resolve every row, build its claim set
 * 3. Merge the country claim sets (set union) and aggregate them
 * 4. Compute coverage for every unit of the processed countries
 * 5. Read the reference period of every source file from its name
 * 6. Build the organisations and presence tables and the review lists
 *
 * Countries are independent of each other; the merge is commutative.
 */

import { compareStrings, normalizeCode } from '@/common/utils/text.js';
import { computeCoverage } from '@/modules/coverage/index.js';
import { aggregateClaims, buildClaims, mergeClaimSets } from '@/modules/presence/index.js';

import { buildPresenceTable } from './build-presence-table.js';
import { collectOrganizations, type ResolvedOrganizationRow } from './collect-organizations.js';
import { collectReferencePeriods } from './reference-period.js';
import { isHxlTagRow, resolveSourceRow } from './resolve-source-row.js';

import type {
  CountryRunStats,
  PresenceRunDeps,
  PresenceRunOptions,
  PresenceRunResult,
} from '../types.js';
import type { RowOutcome, SourceRow, UnresolvedRow } from '@/common/types/rows.js';
import type { AdminUnit } from '@/modules/admin-hierarchy/index.js';
import type { ClaimSet } from '@/modules/presence/index.js';

interface CountryRun {
  claims: ClaimSet;
  resolved: ResolvedOrganizationRow[];
  unresolved: UnresolvedRow[];
  stats: CountryRunStats;
}

const groupByCountry = (rows: readonly SourceRow[]): Map<string, SourceRow[]> => {
  const groups = new Map<string, SourceRow[]>();
  for (const row of rows) {
    const countryCode = normalizeCode(row.countryCode);
    const group = groups.get(countryCode);
    if (group === undefined) {
      groups.set(countryCode, [row]);
    } else {
      group.push(row);
    }
  }
  return groups;
};

/**
 * Resolves the rows of one country. Uses only immutable collaborators, so
 * countries can be processed in any order.
 */
export const runCountry = (
  deps: PresenceRunDeps,
  countryCode: string,
  rows: readonly SourceRow[]
): CountryRun => {
  const outcomes: RowOutcome[] = [];
  const resolved: ResolvedOrganizationRow[] = [];
  const unresolved: UnresolvedRow[] = [];
  let hxlRowsSkipped = 0;

  for (const row of rows) {
    if (isHxlTagRow(row)) {
      hxlRowsSkipped++;
      continue;
    }

    const { outcome, organization } = resolveSourceRow(deps, row);
    outcomes.push(outcome);

    if (outcome.status === 'resolved' && organization !== undefined) {
      resolved.push({ row: outcome, organization });
    } else if (outcome.status === 'unresolved') {
      unresolved.push(outcome);
    }
  }

  const claims = buildClaims(outcomes);

  return {
    claims,
    resolved,
    unresolved,
    stats: {
      countryCode,
      rowsIn: rows.length,
      hxlRowsSkipped,
      rowsResolved: resolved.length,
      rowsUnresolved: unresolved.length,
      claims: claims.size,
    },
  };
};

export const runPresence = (
  deps: PresenceRunDeps,
  rows: readonly SourceRow[],
  options: PresenceRunOptions
): PresenceRunResult => {
  const levels = [...new Set(options.levels)].sort((a, b) => a - b);
  const allowed =
    options.countries === undefined ? undefined : new Set(options.countries.map(normalizeCode));

  const groups = groupByCountry(rows);
  const countryCodes = [...groups.keys()]
    .filter((countryCode) => allowed === undefined || allowed.has(countryCode))
    .sort(compareStrings);

  let excludedRows = 0;
  for (const [countryCode, group] of groups) {
    if (allowed !== undefined && !allowed.has(countryCode)) {
      excludedRows += group.length;
    }
  }

  const runs = countryCodes.map((countryCode) =>
    runCountry(deps, countryCode, groups.get(countryCode) ?? [])
  );

  const aggregation = aggregateClaims(
    deps.index,
    mergeClaimSets(...runs.map((run) => run.claims)),
    { levels }
  );

  const units: AdminUnit[] = countryCodes.flatMap((countryCode) => [
    ...deps.index.listUnits({ countryCode }),
  ]);
  const coverage = computeCoverage(aggregation.records, units, {
    levels,
    sectors: options.gapSectors,
  });

  const collection = collectOrganizations(
    deps,
    runs.flatMap((run) => run.resolved)
  );
  const organizationsById = new Map(collection.organizations.map((org) => [org.id, org]));

  const sourceFiles =
    options.datesInFileNames === false
      ? []
      : countryCodes.flatMap((countryCode) =>
          (groups.get(countryCode) ?? []).flatMap((row) =>
            row.provenance?.sourceFile === undefined ? [] : [row.provenance.sourceFile]
          )
        );
  const periods = collectReferencePeriods(sourceFiles);

  return {
    records: aggregation.records,
    coverage,
    presence: buildPresenceTable(deps, aggregation.claims, organizationsById, periods.byFile),
    organizations: collection.organizations,
    review: {
      unresolvedRows: runs.flatMap((run) => run.unresolved),
      unmatchedOrganizations: collection.unmatched,
      unknownOrgTypes: collection.unknownOrgTypes,
      invalidReferencePeriods: periods.invalid,
      violations: aggregation.violations,
    },
    stats: runs.map((run) => run.stats),
    excludedRows,
  };
};
