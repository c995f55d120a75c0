/**
 * Build Admin Index Use Case
 *
 * Validates the reference hierarchy and indexes it:
 * 1. Levels must be non-negative integers
 * 2. Codes must be unique across the whole hierarchy
 * 3. Every unit above level 0 needs an existing parent exactly one level up
 * 4. Units are indexed by code, by normalized name/alias and by code shape
 *
 * The first violation found is returned; records are checked in (level, code)
 * order so the reported error does not depend on file order.
 */

import { err, ok, type Result } from 'neverthrow';

import { codeShape, compareStrings, normalizeCode, normalizeText } from '@/common/utils/text.js';

import {
  createDuplicateCodeError,
  createInvalidLevelError,
  createInvalidParentError,
  createOrphanUnitError,
  type AdminHierarchyConfigError,
} from '../errors.js';
import {
  compareAdminUnits,
  type AdminIndex,
  type AdminUnit,
  type AdminUnitQuery,
  type AdminUnitRecord,
} from '../types.js';

const nameKey = (countryCode: string, level: number, normalizedName: string): string =>
  `${countryCode}|${String(level)}|${normalizedName}`;

const shapeKey = (countryCode: string, level: number): string =>
  `${countryCode}|${String(level)}`;

const compareRecords = (a: AdminUnitRecord, b: AdminUnitRecord): number =>
  a.level - b.level || compareStrings(a.code, b.code);

const checkUniqueCodes = (
  records: readonly AdminUnitRecord[]
): Result<Map<string, AdminUnitRecord>, AdminHierarchyConfigError> => {
  const byCode = new Map<string, AdminUnitRecord>();

  for (const record of records) {
    const key = normalizeCode(record.code);
    const existing = byCode.get(key);
    if (existing !== undefined) {
      return err(createDuplicateCodeError(record.code, [existing.level, record.level]));
    }
    byCode.set(key, record);
  }

  return ok(byCode);
};

/**
 * Creates the admin unit for `record`, given its already created parent.
 */
const toAdminUnit = (record: AdminUnitRecord, parent: AdminUnit | undefined): AdminUnit =>
  Object.freeze({
    code: record.code.trim(),
    name: record.name.trim(),
    level: record.level,
    countryCode: parent === undefined ? normalizeCode(record.code) : parent.countryCode,
    parentCode: parent === undefined ? null : parent.code,
    aliases: Object.freeze([...(record.aliases ?? [])]),
  });

const createAdminIndex = (units: Map<string, AdminUnit>): AdminIndex => {
  const byName = new Map<string, AdminUnit[]>();
  const shapes = new Map<string, Set<string>>();
  const canonicalNames = new Map<string, string>();
  const ordered = [...units.values()].sort(compareAdminUnits);

  for (const unit of ordered) {
    const normalizedName = normalizeText(unit.name);
    canonicalNames.set(unit.code, normalizedName);

    const keys = new Set([normalizedName, ...unit.aliases.map(normalizeText)]);
    for (const normalized of keys) {
      if (normalized === '') continue;
      const key = nameKey(unit.countryCode, unit.level, normalized);
      const bucket = byName.get(key);
      if (bucket === undefined) {
        byName.set(key, [unit]);
      } else {
        bucket.push(unit);
      }
    }

    const key = shapeKey(unit.countryCode, unit.level);
    const set = shapes.get(key) ?? new Set<string>();
    set.add(codeShape(unit.code));
    shapes.set(key, set);
  }

  const getUnit = (code: string): AdminUnit | undefined => units.get(normalizeCode(code));

  const getParent = (unit: AdminUnit): AdminUnit | undefined =>
    unit.parentCode === null ? undefined : getUnit(unit.parentCode);

  const getAncestorAtLevel = (unit: AdminUnit, level: number): AdminUnit | undefined => {
    if (level > unit.level || level < 0) {
      return undefined;
    }

    let current: AdminUnit | undefined = unit;
    while (current !== undefined && current.level > level) {
      current = getParent(current);
    }
    return current;
  };

  return {
    size: units.size,

    lookupByCode(countryCode: string, code: string): AdminUnit | undefined {
      const unit = getUnit(code);
      if (unit === undefined || unit.countryCode !== normalizeCode(countryCode)) {
        return undefined;
      }
      return unit;
    },

    lookupByName(countryCode: string, level: number, name: string): readonly AdminUnit[] {
      const normalized = normalizeText(name);
      if (normalized === '') {
        return [];
      }
      return byName.get(nameKey(normalizeCode(countryCode), level, normalized)) ?? [];
    },

    matchesCodePattern(countryCode: string, level: number, raw: string): boolean {
      const set = shapes.get(shapeKey(normalizeCode(countryCode), level));
      return set?.has(codeShape(raw)) ?? false;
    },

    isCanonicalName(unit: AdminUnit, normalizedName: string): boolean {
      return canonicalNames.get(unit.code) === normalizedName;
    },

    getUnit,
    getParent,
    getAncestorAtLevel,

    isWithin(unit: AdminUnit, ancestorCode: string): boolean {
      const ancestor = getUnit(ancestorCode);
      if (ancestor === undefined) {
        return false;
      }
      return getAncestorAtLevel(unit, ancestor.level)?.code === ancestor.code;
    },

    listUnits(query: AdminUnitQuery = {}): readonly AdminUnit[] {
      const countryCode =
        query.countryCode === undefined ? undefined : normalizeCode(query.countryCode);
      return ordered.filter(
        (unit) =>
          (countryCode === undefined || unit.countryCode === countryCode) &&
          (query.level === undefined || unit.level === query.level)
      );
    },

    listCountries(): readonly AdminUnit[] {
      return ordered.filter((unit) => unit.level === 0);
    },
  };
};

/**
 * Validates and indexes the reference hierarchy.
 */
export const buildAdminIndex = (
  records: readonly AdminUnitRecord[]
): Result<AdminIndex, AdminHierarchyConfigError> => {
  for (const record of records) {
    if (!Number.isInteger(record.level) || record.level < 0) {
      return err(createInvalidLevelError(record.code, record.level));
    }
  }

  const uniqueResult = checkUniqueCodes(records);
  if (uniqueResult.isErr()) {
    return err(uniqueResult.error);
  }
  const recordsByCode = uniqueResult.value;

  const units = new Map<string, AdminUnit>();

  for (const record of [...records].sort(compareRecords)) {
    const parentCode = record.parentCode?.trim();

    if (record.level === 0) {
      if (parentCode !== undefined && parentCode !== '') {
        return err(
          createInvalidParentError(record.code, parentCode, 'country units cannot have a parent')
        );
      }
      units.set(normalizeCode(record.code), toAdminUnit(record, undefined));
      continue;
    }

    if (parentCode === undefined || parentCode === '') {
      return err(createOrphanUnitError(record.code, null));
    }

    const parentRecord = recordsByCode.get(normalizeCode(parentCode));
    if (parentRecord === undefined) {
      return err(createOrphanUnitError(record.code, parentCode));
    }

    if (parentRecord.level !== record.level - 1) {
      return err(
        createInvalidParentError(
          record.code,
          parentCode,
          `expected level ${String(record.level - 1)}, found level ${String(parentRecord.level)}`
        )
      );
    }

    // Parents sort before their children, so the parent unit exists already.
    const parent = units.get(normalizeCode(parentCode));
    units.set(normalizeCode(record.code), toAdminUnit(record, parent));
  }

  return ok(createAdminIndex(units));
};
