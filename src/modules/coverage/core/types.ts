/**
 * Domain types for coverage indicators.
 */

export interface SectorCoverage {
  readonly sectorCode: string;
  readonly organizationCount: number;
}

/**
 * Indicators of one admin unit at its level.
 * Units without any organization are emitted too, with zero counts.
 */
export interface CoverageRow {
  readonly level: number;
  readonly countryCode: string;
  readonly unitCode: string;
  readonly unitName: string;
  readonly parentCode: string | null;
  /** Distinct organizations across all sectors */
  readonly organizationCount: number;
  /** Sectors with at least one organization */
  readonly sectorCount: number;
  /** Expected and present sectors, ordered by code */
  readonly sectors: readonly SectorCoverage[];
  readonly hasPresence: boolean;
  /** Expected sectors without any organization */
  readonly gapSectors: readonly string[];
}

export interface CoverageOptions {
  /** Levels to report */
  levels: readonly number[];
  /**
   * Sectors every unit is checked against for gaps.
   * Defaults to the sectors present anywhere in the aggregates.
   */
  sectors?: readonly string[] | undefined;
}
