/**
 * Build Presence Table Use Case
 *
 * Flattens the claims into the canonical presence table, one row per claim,
 * with the full admin path of the claim's unit, the sector and organization
 * type names and the reference period of the claim's source files. Rows are
 * ordered by country, then admin codes from admin1 down, then sector and
 * organization.
 */

import { compareStrings } from '@/common/utils/text.js';

import { spanPeriods } from './reference-period.js';

import type {
  AdminCell,
  Organization,
  PresenceRow,
  PresenceRunDeps,
  ReferencePeriod,
} from '../types.js';
import type { AdminIndex, AdminUnit } from '@/modules/admin-hierarchy/index.js';
import type { PresenceClaim } from '@/modules/presence/index.js';

const toAdminCells = (index: AdminIndex, unit: AdminUnit): AdminCell[] => {
  const cells: AdminCell[] = [];
  for (let level = 1; level <= unit.level; level++) {
    const ancestor = index.getAncestorAtLevel(unit, level);
    if (ancestor !== undefined) {
      cells.push({ level, code: ancestor.code, name: ancestor.name });
    }
  }
  return cells;
};

const compareAdminPaths = (a: readonly AdminCell[], b: readonly AdminCell[]): number => {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = compareStrings(a[i]?.code ?? '', b[i]?.code ?? '');
    if (result !== 0) return result;
  }
  return 0;
};

const comparePresenceRows = (a: PresenceRow, b: PresenceRow): number =>
  compareStrings(a.countryCode, b.countryCode) ||
  compareAdminPaths(a.admins, b.admins) ||
  compareStrings(a.sectorCode, b.sectorCode) ||
  compareStrings(a.organizationId, b.organizationId);

const claimPeriod = (
  claim: PresenceClaim,
  periods: ReadonlyMap<string, ReferencePeriod>
): ReferencePeriod | undefined =>
  spanPeriods(
    claim.provenance.flatMap((provenance) => {
      const period =
        provenance.sourceFile === undefined ? undefined : periods.get(provenance.sourceFile);
      return period === undefined ? [] : [period];
    })
  );

export const buildPresenceTable = (
  deps: Pick<PresenceRunDeps, 'index' | 'sectors' | 'orgTypes'>,
  claims: readonly PresenceClaim[],
  organizations: ReadonlyMap<string, Organization>,
  periods: ReadonlyMap<string, ReferencePeriod>
): PresenceRow[] => {
  const rows: PresenceRow[] = [];

  for (const claim of claims) {
    const unit = deps.index.getUnit(claim.unitCode);
    if (unit === undefined) continue;

    const organization = organizations.get(claim.organizationId);
    const typeCode = organization?.typeCode ?? null;
    const period = claimPeriod(claim, periods);
    rows.push({
      countryCode: unit.countryCode,
      admins: toAdminCells(deps.index, unit),
      level: unit.level,
      organizationId: claim.organizationId,
      organizationName: organization?.name ?? claim.organizationId,
      organizationAcronym: organization?.acronym ?? null,
      organizationTypeCode: typeCode,
      organizationTypeName:
        typeCode === null ? null : (deps.orgTypes?.getName(typeCode) ?? null),
      sectorCode: claim.sectorCode,
      sectorName: deps.sectors.getName(claim.sectorCode) ?? claim.sectorCode,
      referencePeriodStart: period?.start ?? null,
      referencePeriodEnd: period?.end ?? null,
      sourceRowCount: claim.provenance.length,
    });
  }

  return rows.sort(comparePresenceRows);
};
