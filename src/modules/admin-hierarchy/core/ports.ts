import type { AdminReferenceRepoError } from './errors.js';
import type { AdminUnitRecord } from './types.js';
import type { Result } from 'neverthrow';

export interface AdminReferenceRepo {
  /**
   * Load every unit record of the reference hierarchy.
   * Records are returned unvalidated against each other; `buildAdminIndex` checks
   * the hierarchy itself.
   */
  loadUnits(): Promise<Result<AdminUnitRecord[], AdminReferenceRepoError>>;
}
