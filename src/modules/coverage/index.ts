// Use cases
export { computeCoverage } from './core/usecases/compute-coverage.js';

// Types
export type { CoverageOptions, CoverageRow, SectorCoverage } from './core/types.js';
