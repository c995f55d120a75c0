/**
 * Compute Coverage Use Case
 *
 * Produces one indicator row per admin unit per reported level. Absence of
 * presence is a result in itself: units without organizations get a row with
 * zero counts and `hasPresence: false`.
 */

import { compareStrings } from '@/common/utils/text.js';
import { compareAdminUnits } from '@/modules/admin-hierarchy/index.js';

import type { CoverageOptions, CoverageRow, SectorCoverage } from '../types.js';
import type { AdminUnit } from '@/modules/admin-hierarchy/index.js';
import type { AggregateRecord } from '@/modules/presence/index.js';

const unitKey = (level: number, unitCode: string): string => `${String(level)}|${unitCode}`;

const toCoverageRow = (
  unit: AdminUnit,
  records: readonly AggregateRecord[],
  expectedSectors: readonly string[]
): CoverageRow => {
  const organizations = new Set<string>();
  const counts = new Map<string, number>();

  for (const record of records) {
    counts.set(record.sectorCode, record.organizationCount);
    for (const id of record.organizationIds) {
      organizations.add(id);
    }
  }

  const sectorCodes = [...new Set([...expectedSectors, ...counts.keys()])].sort(compareStrings);
  const sectors: SectorCoverage[] = sectorCodes.map((sectorCode) => ({
    sectorCode,
    organizationCount: counts.get(sectorCode) ?? 0,
  }));

  return {
    level: unit.level,
    countryCode: unit.countryCode,
    unitCode: unit.code,
    unitName: unit.name,
    parentCode: unit.parentCode,
    organizationCount: organizations.size,
    sectorCount: sectors.filter((sector) => sector.organizationCount > 0).length,
    sectors,
    hasPresence: organizations.size > 0,
    gapSectors: expectedSectors
      .filter((sectorCode) => (counts.get(sectorCode) ?? 0) === 0)
      .sort(compareStrings),
  };
};

export const computeCoverage = (
  aggregates: readonly AggregateRecord[],
  fullAdminList: readonly AdminUnit[],
  options: CoverageOptions
): CoverageRow[] => {
  const levels = new Set(options.levels);

  const recordsByUnit = new Map<string, AggregateRecord[]>();
  for (const record of aggregates) {
    const key = unitKey(record.level, record.unitCode);
    const bucket = recordsByUnit.get(key);
    if (bucket === undefined) {
      recordsByUnit.set(key, [record]);
    } else {
      bucket.push(record);
    }
  }

  const expectedSectors = [
    ...new Set(options.sectors ?? aggregates.map((record) => record.sectorCode)),
  ].sort(compareStrings);

  const units = new Map<string, AdminUnit>();
  for (const unit of fullAdminList) {
    if (!levels.has(unit.level)) continue;
    units.set(unitKey(unit.level, unit.code), unit);
  }

  return [...units.values()]
    .sort(compareAdminUnits)
    .map((unit) =>
      toCoverageRow(unit, recordsByUnit.get(unitKey(unit.level, unit.code)) ?? [], expectedSectors)
    );
};
