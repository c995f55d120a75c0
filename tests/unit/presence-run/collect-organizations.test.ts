/**
 * Unit tests for collectOrganizations use case.
 */

import { describe, expect, it } from 'vitest';

import {
  collectOrganizations,
  type ResolvedOrganizationRow,
} from '@/modules/presence-run/core/usecases/collect-organizations.js';

import { makeResolvedRow, makeRunDeps, makeSourceRow } from '../../fixtures/builders.js';

import type { SourceRow } from '@/common/types/rows.js';
import type { OrganizationMatch } from '@/modules/organizations/index.js';

const deps = makeRunDeps();

const derived = (id: string): OrganizationMatch => ({ id, cleanedName: id, via: 'derived' });

const entry = (organization: OrganizationMatch, source: Partial<SourceRow>): ResolvedOrganizationRow => ({
  row: makeResolvedRow({ organizationId: organization.id, source: makeSourceRow(source) }),
  organization,
});

describe('collectOrganizations', () => {
  const longAcronym = 'A'.repeat(40);

  const rows: ResolvedOrganizationRow[] = [
    entry(derived('orgx'), { orgName: 'OrgX', orgAcronym: 'OX', orgType: 'National NGO', countryCode: 'xyz' }),
    entry(derived('orgx'), { orgName: 'ORGX Ltd', orgAcronym: longAcronym, orgType: 'UN Agency' }),
    entry(derived('orgz'), { orgName: '', orgAcronym: 'ZZ', orgType: 'Mystery' }),
    entry(derived('orgz'), { orgName: '', orgAcronym: 'ZZ', orgType: 'Mystery' }),
  ];

  it('builds one entry per organization id, ordered by id', () => {
    const { organizations } = collectOrganizations(deps, rows);

    expect(organizations).toEqual([
      {
        id: 'orgx',
        name: 'ORGX Ltd',
        acronym: 'A'.repeat(32),
        typeCode: 'NNGO',
        matchedVia: 'derived',
      },
      { id: 'orgz', name: 'ZZ', acronym: 'ZZ', typeCode: null, matchedVia: 'derived' },
    ]);
  });

  it('lists derived organizations for review', () => {
    const { unmatched } = collectOrganizations(deps, rows);

    expect(unmatched).toEqual([
      { id: 'orgx', rawNames: ['ORGX Ltd', 'OrgX'], countryCodes: ['XYZ'] },
      { id: 'orgz', rawNames: ['ZZ'], countryCodes: ['XYZ'] },
    ]);
  });

  it('reports each unknown organization type once', () => {
    const { unknownOrgTypes } = collectOrganizations(deps, rows);

    expect(unknownOrgTypes).toEqual([
      { rawType: 'Mystery', countryCode: 'XYZ', organizationId: 'orgz' },
    ]);
  });

  it('takes name, acronym and type from the configured alias', () => {
    const match = deps.organizations.normalize('CRI');
    expect(match?.via).toBe('alias');
    if (match === undefined) return;

    const result = collectOrganizations(deps, [
      entry(match, { orgName: 'care relief', orgAcronym: 'C.R.I.', orgType: 'National NGO' }),
    ]);

    expect(result.organizations).toEqual([
      {
        id: 'care-relief',
        name: 'Care Relief International',
        acronym: 'CRI',
        typeCode: 'INGO',
        matchedVia: 'alias',
      },
    ]);
    expect(result.unmatched).toEqual([]);
  });

  it('leaves types out when no organization type list is configured', () => {
    const result = collectOrganizations({}, rows);

    expect(result.organizations.map((org) => org.typeCode)).toEqual([null, null]);
    expect(result.unknownOrgTypes).toEqual([]);
  });
});
