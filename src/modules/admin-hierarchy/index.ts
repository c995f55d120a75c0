// Repository
export {
  createAdminReferenceRepo,
  type AdminReferenceRepoOptions,
} from './shell/repo/fs-repo.js';
export type { AdminReferenceRepo } from './core/ports.js';

// Use cases
export { buildAdminIndex } from './core/usecases/build-admin-index.js';

// Types
export {
  compareAdminUnits,
  AdminUnitRecordSchema,
  ReferenceHierarchyFileSchema,
} from './core/types.js';
export type {
  AdminIndex,
  AdminUnit,
  AdminUnitQuery,
  AdminUnitRecord,
  ReferenceHierarchyFileDTO,
} from './core/types.js';

// Errors
export type {
  AdminHierarchyConfigError,
  AdminReferenceRepoError,
  DuplicateCodeError,
  InvalidLevelError,
  InvalidParentError,
  OrphanUnitError,
} from './core/errors.js';
