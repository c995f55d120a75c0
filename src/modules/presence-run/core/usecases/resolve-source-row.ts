/**
 * Resolve Source Row Use Case
 *
 * Takes one source row through sector, organization and location resolution,
 * in that order. The first stage that fails sends the row to the review list;
 * failures are returned as data, never thrown.
 */

import { resolveRowLocation } from '@/modules/location-resolver/index.js';

import { HXL_TAG_PREFIX, type PresenceRunDeps } from '../types.js';

import type { RowOutcome, SourceRow, UnresolvedRow } from '@/common/types/rows.js';
import type { OrganizationMatch } from '@/modules/organizations/index.js';

export interface SourceRowResolution {
  outcome: RowOutcome;
  /** Set once the organization stage passed */
  organization?: OrganizationMatch | undefined;
}

/**
 * Whether the row is the HXL hashtag row that follows the header row.
 */
export const isHxlTagRow = (row: SourceRow): boolean =>
  row.sector.trim().startsWith(HXL_TAG_PREFIX);

const unresolvedRow = (
  row: SourceRow,
  stage: UnresolvedRow['stage'],
  reason: string,
  rawValue: string,
  candidates: readonly string[] = []
): UnresolvedRow => ({
  status: 'unresolved',
  source: row,
  confidence: 'unresolved',
  stage,
  reason,
  rawValue,
  candidates,
});

/**
 * The name used for the organization: its name, or its acronym when the name
 * cell is empty.
 */
export const getOrganizationLabel = (row: SourceRow): string => {
  const name = row.orgName.trim();
  return name === '' ? (row.orgAcronym?.trim() ?? '') : name;
};

export const resolveSourceRow = (deps: PresenceRunDeps, row: SourceRow): SourceRowResolution => {
  const sector = deps.sectors.match(row.sector);
  if (sector.status === 'missing') {
    return { outcome: unresolvedRow(row, 'sector', 'MissingSector', row.sector) };
  }
  if (sector.status === 'unmatched') {
    return {
      outcome: unresolvedRow(row, 'sector', 'UnknownSector', sector.raw, sector.candidates),
    };
  }

  const label = getOrganizationLabel(row);
  const organization = deps.organizations.normalize(label, row.countryCode);
  if (organization === undefined) {
    return { outcome: unresolvedRow(row, 'organization', 'MissingOrganization', label) };
  }

  const location = resolveRowLocation(
    deps.index,
    { countryCode: row.countryCode, locations: row.locations },
    deps.location
  );
  if (location.status === 'unresolved') {
    return {
      outcome: unresolvedRow(
        row,
        'location',
        location.reason,
        location.rawLocation,
        location.candidates
      ),
      organization,
    };
  }

  return {
    outcome: {
      status: 'resolved',
      source: row,
      unitCode: location.unit.code,
      level: location.unit.level,
      confidence: location.confidence,
      organizationId: organization.id,
      sectorCode: sector.code,
    },
    organization,
  };
};
