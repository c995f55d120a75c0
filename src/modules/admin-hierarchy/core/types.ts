/**
 * Domain types for the admin hierarchy module.
 *
 * The reference hierarchy is a forest of administrative units, one tree per
 * country: the country itself is the level 0 unit, admin1 units are level 1,
 * admin2 units level 2 and so on.
 */

import { type Static, Type } from '@sinclair/typebox';

import { compareStrings } from '@/common/utils/text.js';

// ─────────────────────────────────────────────────────────────────────────────
// Reference File Schema
// ─────────────────────────────────────────────────────────────────────────────

export const AdminUnitRecordSchema = Type.Object({
  code: Type.String({ minLength: 1, description: 'P-code, or ISO3 code for level 0' }),
  name: Type.String({ minLength: 1 }),
  level: Type.Integer(),
  parentCode: Type.Optional(Type.String({ minLength: 1 })),
  aliases: Type.Optional(Type.Array(Type.String())),
});

export const ReferenceHierarchyFileSchema = Type.Object({
  metadata: Type.Optional(
    Type.Object({
      source: Type.String(),
      lastUpdated: Type.Optional(Type.String()),
    })
  ),
  units: Type.Array(AdminUnitRecordSchema),
});

export type AdminUnitRecord = Static<typeof AdminUnitRecordSchema>;

export type ReferenceHierarchyFileDTO = Static<typeof ReferenceHierarchyFileSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Index Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An administrative unit owned by the index.
 */
export interface AdminUnit {
  readonly code: string;
  readonly name: string;
  /** 0 = country, 1 = admin1, 2 = admin2 ... */
  readonly level: number;
  /** ISO3 code of the country the unit belongs to */
  readonly countryCode: string;
  /** Code of the parent unit, null for countries */
  readonly parentCode: string | null;
  readonly aliases: readonly string[];
}

export interface AdminUnitQuery {
  countryCode?: string | undefined;
  level?: number | undefined;
}

/**
 * Read-only index over the reference hierarchy.
 *
 * Built once per run by `buildAdminIndex` and passed by reference to everything
 * that needs hierarchy data.
 */
export interface AdminIndex {
  /**
   * Finds a unit of the given country by code (case-insensitive).
   */
  lookupByCode(countryCode: string, code: string): AdminUnit | undefined;

  /**
   * Returns every unit at `level` whose normalized name or alias equals the
   * normalized `name`, ordered by code. Disambiguation is left to the caller.
   */
  lookupByName(countryCode: string, level: number, name: string): readonly AdminUnit[];

  /**
   * Whether `raw` has the shape of the codes this index holds for the
   * country and level.
   */
  matchesCodePattern(countryCode: string, level: number, raw: string): boolean;

  /**
   * Whether the unit's own name (not an alias) normalizes to `normalizedName`.
   */
  isCanonicalName(unit: AdminUnit, normalizedName: string): boolean;

  getUnit(code: string): AdminUnit | undefined;
  getParent(unit: AdminUnit): AdminUnit | undefined;

  /**
   * The unit itself when `level` equals its level, its ancestor at `level`
   * when above it, undefined when `level` is below the unit.
   */
  getAncestorAtLevel(unit: AdminUnit, level: number): AdminUnit | undefined;

  /** Whether `unit` is `ancestorCode` or lies below it. */
  isWithin(unit: AdminUnit, ancestorCode: string): boolean;

  /** Units matching the query, ordered by level, country and code. */
  listUnits(query?: AdminUnitQuery): readonly AdminUnit[];

  /** Level 0 units, ordered by code. */
  listCountries(): readonly AdminUnit[];

  readonly size: number;
}

/**
 * Orders units by level, country and code.
 */
export const compareAdminUnits = (a: AdminUnit, b: AdminUnit): number =>
  a.level - b.level ||
  compareStrings(a.countryCode, b.countryCode) ||
  compareStrings(a.code, b.code);
