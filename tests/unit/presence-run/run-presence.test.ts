/**
 * Unit tests for runPresence use case.
 */

import { describe, expect, it } from 'vitest';

import { createOrganizationNormalizer } from '@/modules/organizations/index.js';
import { runPresence } from '@/modules/presence-run/index.js';

import { makeRunDeps, makeSourceRow } from '../../fixtures/builders.js';

import type { SourceRow } from '@/common/types/rows.js';

const deps = makeRunDeps();

const at = (sourceFile: string, rowNumber: number) => ({ provenance: { sourceFile, rowNumber } });

const rows: SourceRow[] = [
  makeSourceRow({
    locations: ['#adm1+name'],
    orgName: '#org+name',
    sector: '#sector',
    ...at('xyz.xlsx', 2),
  }),
  makeSourceRow({ ...at('xyz.xlsx', 3) }),
  makeSourceRow({ locations: ['A1'], orgName: 'orgx', sector: 'HEA', ...at('xyz.xlsx', 4) }),
  makeSourceRow({
    locations: ['North', 'Riverside'],
    orgName: 'Care Relief International',
    orgType: 'International NGO',
    sector: 'Education',
    ...at('xyz.xlsx', 5),
  }),
  makeSourceRow({ locations: ['Central'], orgName: 'OrgY', ...at('xyz.xlsx', 6) }),
  makeSourceRow({
    locations: [],
    orgName: 'OrgY',
    orgType: 'Local group',
    sector: 'WASH',
    ...at('xyz.xlsx', 7),
  }),
  makeSourceRow({ countryCode: 'QRS', locations: ['Coast'], ...at('qrs.xlsx', 3) }),
  makeSourceRow({ countryCode: 'ABC', locations: ['Somewhere'], ...at('abc.xlsx', 3) }),
];

describe('runPresence', () => {
  const result = runPresence(deps, rows, { levels: [0, 1, 2], countries: ['xyz', 'QRS'] });

  it('skips countries outside the filter', () => {
    expect(result.excludedRows).toBe(1);
    expect(result.stats.map((stats) => stats.countryCode)).toEqual(['QRS', 'XYZ']);
  });

  it('reports per country statistics', () => {
    expect(result.stats).toEqual([
      {
        countryCode: 'QRS',
        rowsIn: 1,
        hxlRowsSkipped: 0,
        rowsResolved: 1,
        rowsUnresolved: 0,
        claims: 1,
      },
      {
        countryCode: 'XYZ',
        rowsIn: 6,
        hxlRowsSkipped: 1,
        rowsResolved: 4,
        rowsUnresolved: 1,
        claims: 3,
      },
    ]);
  });

  it('aggregates the claims of every country', () => {
    expect(
      result.records.map((record) => [
        record.level,
        record.unitCode,
        record.sectorCode,
        record.organizationCount,
        record.unitSectorCount,
      ])
    ).toEqual([
      [0, 'QRS', 'HEA', 1, 1],
      [0, 'XYZ', 'EDU', 1, 3],
      [0, 'XYZ', 'HEA', 1, 3],
      [0, 'XYZ', 'WSH', 1, 3],
      [1, 'B1', 'HEA', 1, 1],
      [1, 'A1', 'EDU', 1, 2],
      [1, 'A1', 'HEA', 1, 2],
      [2, 'A101', 'EDU', 1, 1],
    ]);
  });

  it('covers every unit of the processed countries', () => {
    expect(result.coverage.map((row) => row.unitCode)).toEqual([
      'QRS',
      'XYZ',
      'B1',
      'A1',
      'A2',
      'A3',
      'A4',
      'A101',
      'A102',
      'A201',
      'A301',
    ]);

    const south = result.coverage.find((row) => row.unitCode === 'A2');
    expect(south?.hasPresence).toBe(false);
    expect(south?.gapSectors).toEqual(['EDU', 'HEA', 'WSH']);
  });

  it('builds the organisations table', () => {
    expect(result.organizations).toEqual([
      {
        id: 'care-relief',
        name: 'Care Relief International',
        acronym: 'CRI',
        typeCode: 'INGO',
        matchedVia: 'alias',
      },
      { id: 'orgx', name: 'OrgX', acronym: null, typeCode: null, matchedVia: 'derived' },
      { id: 'orgy', name: 'OrgY', acronym: null, typeCode: null, matchedVia: 'derived' },
    ]);
  });

  it('builds the presence table ordered by country and admin path', () => {
    expect(result.presence).toEqual([
      {
        countryCode: 'QRS',
        admins: [{ level: 1, code: 'B1', name: 'Coast' }],
        level: 1,
        organizationId: 'orgx',
        organizationName: 'OrgX',
        organizationAcronym: null,
        organizationTypeCode: null,
        organizationTypeName: null,
        sectorCode: 'HEA',
        sectorName: 'Health',
        referencePeriodStart: null,
        referencePeriodEnd: null,
        sourceRowCount: 1,
      },
      {
        countryCode: 'XYZ',
        admins: [],
        level: 0,
        organizationId: 'orgy',
        organizationName: 'OrgY',
        organizationAcronym: null,
        organizationTypeCode: null,
        organizationTypeName: null,
        sectorCode: 'WSH',
        sectorName: 'Water Sanitation Hygiene',
        referencePeriodStart: null,
        referencePeriodEnd: null,
        sourceRowCount: 1,
      },
      {
        countryCode: 'XYZ',
        admins: [{ level: 1, code: 'A1', name: 'North' }],
        level: 1,
        organizationId: 'orgx',
        organizationName: 'OrgX',
        organizationAcronym: null,
        organizationTypeCode: null,
        organizationTypeName: null,
        sectorCode: 'HEA',
        sectorName: 'Health',
        referencePeriodStart: null,
        referencePeriodEnd: null,
        sourceRowCount: 2,
      },
      {
        countryCode: 'XYZ',
        admins: [
          { level: 1, code: 'A1', name: 'North' },
          { level: 2, code: 'A101', name: 'Riverside' },
        ],
        level: 2,
        organizationId: 'care-relief',
        organizationName: 'Care Relief International',
        organizationAcronym: 'CRI',
        organizationTypeCode: 'INGO',
        organizationTypeName: 'International NGO',
        sectorCode: 'EDU',
        sectorName: 'Education',
        referencePeriodStart: null,
        referencePeriodEnd: null,
        sourceRowCount: 1,
      },
    ]);
  });

  it('collects the review lists', () => {
    expect(result.review.unresolvedRows).toHaveLength(1);
    expect(result.review.unresolvedRows[0]).toMatchObject({
      stage: 'location',
      reason: 'Ambiguous',
      rawValue: 'Central',
      candidates: ['A3', 'A4'],
      source: { provenance: { sourceFile: 'xyz.xlsx', rowNumber: 6 } },
    });
    expect(result.review.unmatchedOrganizations).toEqual([
      { id: 'orgx', rawNames: ['OrgX', 'orgx'], countryCodes: ['QRS', 'XYZ'] },
      { id: 'orgy', rawNames: ['OrgY'], countryCodes: ['XYZ'] },
    ]);
    expect(result.review.unknownOrgTypes).toEqual([
      { rawType: 'Local group', countryCode: 'XYZ', organizationId: 'orgy' },
    ]);
    expect(result.review.invalidReferencePeriods).toEqual([]);
    expect(result.review.violations).toEqual([]);
  });

  it('processes every country without a filter', () => {
    const all = runPresence(deps, rows, { levels: [1] });

    expect(all.excludedRows).toBe(0);
    expect(all.stats.map((stats) => stats.countryCode)).toEqual(['ABC', 'QRS', 'XYZ']);
    expect(all.review.unresolvedRows.map((row) => row.reason)).toEqual([
      'UnknownCountry',
      'Ambiguous',
    ]);
  });

  it('does not depend on row order', () => {
    const reversed = runPresence(deps, [...rows].reverse(), {
      levels: [2, 1, 0],
      countries: ['QRS', 'XYZ'],
    });

    expect(reversed.records).toEqual(result.records);
    expect(reversed.coverage).toEqual(result.coverage);
    expect(reversed.presence).toEqual(result.presence);
    expect(reversed.organizations).toEqual(result.organizations);
  });

  it('does not change when rows are repeated', () => {
    const repeated = runPresence(deps, [...rows, ...rows], {
      levels: [0, 1, 2],
      countries: ['XYZ', 'QRS'],
    });

    expect(repeated.records).toEqual(result.records);
    expect(repeated.presence).toEqual(result.presence);
  });
});

describe('runPresence with configured organization ids', () => {
  const deps = makeRunDeps({
    organizations: createOrganizationNormalizer({
      aliases: [{ id: 'org-a', name: 'Alpha Relief' }],
    })._unsafeUnwrap(),
  });
  const rows = [
    makeSourceRow({ orgName: 'Alpha Relief' }),
    makeSourceRow({ orgName: 'Org A' }),
  ];

  it('keeps a derived id apart from an equal configured id', () => {
    const result = runPresence(deps, rows, { levels: [1] });

    expect(result.records[0]).toMatchObject({
      unitCode: 'A1',
      organizationCount: 2,
      organizationIds: ['org-a', 'org-a~2'],
    });
    expect(result.organizations.map((org) => [org.id, org.matchedVia])).toEqual([
      ['org-a', 'alias'],
      ['org-a~2', 'derived'],
    ]);
  });

  it('describes the organizations the same way in any row order', () => {
    const forward = runPresence(deps, rows, { levels: [1] });
    const reversed = runPresence(deps, [...rows].reverse(), { levels: [1] });

    expect(reversed.organizations).toEqual(forward.organizations);
  });
});

describe('runPresence reference periods', () => {
  const deps = makeRunDeps();
  const rows = [
    makeSourceRow({ provenance: { sourceFile: 'in/xyz-3w-april-june-2025.csv', rowNumber: 2 } }),
    makeSourceRow({ provenance: { sourceFile: 'xyz_jan_to_mar_2025.csv', rowNumber: 2 } }),
    makeSourceRow({ sector: 'WASH', provenance: { sourceFile: 'xyz.xlsx', rowNumber: 2 } }),
    makeSourceRow({ sector: 'Education', provenance: { sourceFile: 'xyz-report-june-2025.csv' } }),
  ];

  it('stamps the span of the source file periods on each presence row', () => {
    const result = runPresence(deps, rows, { levels: [1] });

    expect(
      result.presence.map((row) => [
        row.sectorCode,
        row.referencePeriodStart,
        row.referencePeriodEnd,
      ])
    ).toEqual([
      ['EDU', null, null],
      ['HEA', '2025-01-01', '2025-06-30'],
      ['WSH', null, null],
    ]);
  });

  it('lists file names whose period cannot be read', () => {
    const result = runPresence(deps, rows, { levels: [1] });

    expect(result.review.invalidReferencePeriods).toEqual([
      { sourceFile: 'xyz-report-june-2025.csv', reason: "'report' is not a month" },
    ]);
  });

  it('leaves the periods empty when file names carry no dates', () => {
    const result = runPresence(deps, rows, { levels: [1], datesInFileNames: false });

    expect(result.presence.every((row) => row.referencePeriodStart === null)).toBe(true);
    expect(result.review.invalidReferencePeriods).toEqual([]);
  });
});
