/**
 * Collect Organizations Use Case
 *
 * Builds the organisations table from the resolved rows. Configured aliases
 * provide name, acronym and type; for derived ids the values come from the rows,
 * picking the smallest value when rows disagree so the table does not depend on
 * row order.
 */

import { compareStrings, normalizeCode } from '@/common/utils/text.js';
import { MAX_ACRONYM_LENGTH } from '@/modules/organizations/index.js';

import { getOrganizationLabel } from './resolve-source-row.js';

import type {
  Organization,
  PresenceRunDeps,
  UnknownOrgTypeHint,
  UnmatchedOrganizationHint,
} from '../types.js';
import type { ResolvedRow } from '@/common/types/rows.js';
import type { OrganizationMatch } from '@/modules/organizations/index.js';

export interface ResolvedOrganizationRow {
  row: ResolvedRow;
  organization: OrganizationMatch;
}

export interface OrganizationCollection {
  organizations: Organization[];
  unmatched: UnmatchedOrganizationHint[];
  unknownOrgTypes: UnknownOrgTypeHint[];
}

interface Accumulator {
  match: OrganizationMatch;
  rawNames: Set<string>;
  acronyms: Set<string>;
  typeCodes: Set<string>;
  countryCodes: Set<string>;
}

const smallest = (values: Iterable<string>): string | undefined =>
  [...values].sort(compareStrings)[0];

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === '' ? undefined : trimmed;
};

const toOrganization = (acc: Accumulator): Organization => {
  const alias = acc.match.alias;
  const acronym = nonEmpty(alias?.acronym) ?? smallest(acc.acronyms);

  return {
    id: acc.match.id,
    name: alias?.name ?? smallest(acc.rawNames) ?? acc.match.cleanedName,
    acronym: acronym === undefined ? null : acronym.slice(0, MAX_ACRONYM_LENGTH),
    typeCode: nonEmpty(alias?.typeCode) ?? smallest(acc.typeCodes) ?? null,
    matchedVia: acc.match.via,
  };
};

export const collectOrganizations = (
  deps: Pick<PresenceRunDeps, 'orgTypes'>,
  rows: readonly ResolvedOrganizationRow[]
): OrganizationCollection => {
  const accumulators = new Map<string, Accumulator>();
  const unknownOrgTypes = new Map<string, UnknownOrgTypeHint>();

  for (const { row, organization } of rows) {
    let acc = accumulators.get(organization.id);
    if (acc === undefined) {
      acc = {
        match: organization,
        rawNames: new Set(),
        acronyms: new Set(),
        typeCodes: new Set(),
        countryCodes: new Set(),
      };
      accumulators.set(organization.id, acc);
    }

    const countryCode = normalizeCode(row.source.countryCode);
    const rawName = nonEmpty(getOrganizationLabel(row.source));
    const acronym = nonEmpty(row.source.orgAcronym);
    if (rawName !== undefined) acc.rawNames.add(rawName);
    if (acronym !== undefined) acc.acronyms.add(acronym);
    acc.countryCodes.add(countryCode);

    const rawType = nonEmpty(row.source.orgType);
    if (rawType === undefined || deps.orgTypes === undefined) continue;

    const type = deps.orgTypes.match(rawType);
    if (type.status === 'matched') {
      acc.typeCodes.add(type.code);
    } else {
      const key = `${countryCode}|${organization.id}|${rawType}`;
      unknownOrgTypes.set(key, { rawType, countryCode, organizationId: organization.id });
    }
  }

  const ordered = [...accumulators.values()].sort((a, b) => compareStrings(a.match.id, b.match.id));

  return {
    organizations: ordered.map(toOrganization),
    unmatched: ordered
      .filter((acc) => acc.match.via === 'derived')
      .map((acc) => ({
        id: acc.match.id,
        rawNames: [...acc.rawNames].sort(compareStrings),
        countryCodes: [...acc.countryCodes].sort(compareStrings),
      })),
    unknownOrgTypes: [...unknownOrgTypes.entries()]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([, hint]) => hint),
  };
};
