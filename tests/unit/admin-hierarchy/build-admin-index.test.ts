/**
 * Unit tests for buildAdminIndex use case.
 */

import { describe, expect, it } from 'vitest';

import { buildAdminIndex } from '@/modules/admin-hierarchy/index.js';

import { makeAdminIndex, makeReferenceRecords } from '../../fixtures/builders.js';

import type { AdminUnitRecord } from '@/modules/admin-hierarchy/index.js';

const codes = (units: readonly { code: string }[]): string[] => units.map((unit) => unit.code);

describe('buildAdminIndex', () => {
  describe('lookups', () => {
    const index = makeAdminIndex();

    it('indexes every unit', () => {
      expect(index.size).toBe(11);
    });

    it('finds units by code, case-insensitively, within their country', () => {
      expect(index.lookupByCode('xyz', 'a101')?.name).toBe('Riverside');
      expect(index.lookupByCode('QRS', 'A101')).toBeUndefined();
    });

    it('derives the country code from the level 0 ancestor', () => {
      expect(index.getUnit('A301')?.countryCode).toBe('XYZ');
      expect(index.getUnit('B1')?.countryCode).toBe('QRS');
    });

    it('finds units by normalized name and alias', () => {
      expect(codes(index.lookupByName('XYZ', 1, '  NORTH '))).toEqual(['A1']);
      expect(codes(index.lookupByName('XYZ', 1, 'shamal'))).toEqual(['A1']);
      expect(codes(index.lookupByName('XYZ', 1, 'Central'))).toEqual(['A3', 'A4']);
    });

    it('scopes name lookups by level', () => {
      expect(codes(index.lookupByName('XYZ', 2, 'Riverside'))).toEqual(['A101', 'A201']);
      expect(index.lookupByName('XYZ', 1, 'Riverside')).toEqual([]);
    });

    it('lists a name once per unit when an alias repeats it', () => {
      const dupIndex = makeAdminIndex([
        { code: 'XYZ', name: 'Testland', level: 0 },
        { code: 'A1', name: 'North', level: 1, parentCode: 'XYZ', aliases: ['north', 'NORTH'] },
      ]);

      expect(codes(dupIndex.lookupByName('XYZ', 1, 'North'))).toEqual(['A1']);
    });

    it('tells canonical names apart from aliases', () => {
      const north = index.getUnit('A1');
      expect(north).toBeDefined();
      if (north === undefined) return;

      expect(index.isCanonicalName(north, 'north')).toBe(true);
      expect(index.isCanonicalName(north, 'shamal')).toBe(false);
    });

    it('recognizes the code shape of a level', () => {
      expect(index.matchesCodePattern('XYZ', 1, 'a9')).toBe(true);
      expect(index.matchesCodePattern('XYZ', 2, 'A1')).toBe(false);
      expect(index.matchesCodePattern('XYZ', 1, 'North')).toBe(false);
    });

    it('walks up to ancestors', () => {
      const unit = index.getUnit('A101');
      expect(unit).toBeDefined();
      if (unit === undefined) return;

      expect(index.getAncestorAtLevel(unit, 2)?.code).toBe('A101');
      expect(index.getAncestorAtLevel(unit, 1)?.code).toBe('A1');
      expect(index.getAncestorAtLevel(unit, 0)?.code).toBe('XYZ');
      expect(index.getAncestorAtLevel(unit, 3)).toBeUndefined();
      expect(index.getParent(unit)?.code).toBe('A1');
    });

    it('checks containment', () => {
      const riverside = index.getUnit('A201');
      expect(riverside).toBeDefined();
      if (riverside === undefined) return;

      expect(index.isWithin(riverside, 'A2')).toBe(true);
      expect(index.isWithin(riverside, 'XYZ')).toBe(true);
      expect(index.isWithin(riverside, 'A201')).toBe(true);
      expect(index.isWithin(riverside, 'A1')).toBe(false);
      expect(index.isWithin(riverside, 'UNKNOWN')).toBe(false);
    });

    it('lists units ordered by level, country and code', () => {
      expect(codes(index.listUnits({ countryCode: 'xyz', level: 2 }))).toEqual([
        'A101',
        'A102',
        'A201',
        'A301',
      ]);
      expect(codes(index.listUnits({ level: 1 }))).toEqual(['B1', 'A1', 'A2', 'A3', 'A4']);
      expect(codes(index.listCountries())).toEqual(['QRS', 'XYZ']);
    });

    it('freezes units', () => {
      const unit = index.getUnit('A1');
      expect(Object.isFrozen(unit)).toBe(true);
    });
  });

  describe('validation', () => {
    const withRecords = (...extra: AdminUnitRecord[]): AdminUnitRecord[] => [
      ...makeReferenceRecords(),
      ...extra,
    ];

    it('rejects duplicate codes', () => {
      const result = buildAdminIndex(
        withRecords({ code: 'a1', name: 'Again', level: 1, parentCode: 'XYZ' })
      );

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'DuplicateCode',
        code: 'a1',
        levels: [1, 1],
      });
    });

    it('rejects units without a parent code', () => {
      const result = buildAdminIndex(withRecords({ code: 'A9', name: 'Lost', level: 1 }));

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'OrphanUnit',
        code: 'A9',
        parentCode: null,
      });
    });

    it('rejects units whose parent is missing', () => {
      const result = buildAdminIndex(
        withRecords({ code: 'A501', name: 'Far', level: 2, parentCode: 'A5' })
      );

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'OrphanUnit',
        code: 'A501',
        parentCode: 'A5',
      });
    });

    it('rejects parents that are not exactly one level up', () => {
      const result = buildAdminIndex(
        withRecords({ code: 'A502', name: 'Skip', level: 2, parentCode: 'XYZ' })
      );

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidParent',
        code: 'A502',
        parentCode: 'XYZ',
      });
    });

    it('rejects countries with a parent', () => {
      const result = buildAdminIndex(
        withRecords({ code: 'ZZZ', name: 'Nested', level: 0, parentCode: 'XYZ' })
      );

      expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'InvalidParent', code: 'ZZZ' });
    });

    it('rejects negative and fractional levels', () => {
      expect(
        buildAdminIndex(withRecords({ code: 'N1', name: 'Neg', level: -1 }))._unsafeUnwrapErr()
      ).toMatchObject({ type: 'InvalidLevel', code: 'N1', level: -1 });
      expect(
        buildAdminIndex(
          withRecords({ code: 'F1', name: 'Frac', level: 1.5, parentCode: 'XYZ' })
        )._unsafeUnwrapErr()
      ).toMatchObject({ type: 'InvalidLevel', code: 'F1' });
    });

    it('reports the same error whatever the record order', () => {
      const records = withRecords(
        { code: 'A501', name: 'Far', level: 2, parentCode: 'A5' },
        { code: 'A9', name: 'Lost', level: 1 }
      );

      const forward = buildAdminIndex(records)._unsafeUnwrapErr();
      const backward = buildAdminIndex([...records].reverse())._unsafeUnwrapErr();

      expect(forward).toMatchObject({ type: 'OrphanUnit', code: 'A9' });
      expect(backward).toEqual(forward);
    });
  });
});
