// Repository
export {
  createPresenceInputRepo,
  type PresenceInputRepoOptions,
} from './shell/repo/fs-repo.js';
export type { PresenceInputRepo } from './core/ports.js';

// Service
export {
  createPresenceService,
  toRunOptions,
  type PresenceService,
  type PresenceServiceDeps,
} from './shell/service/presence-service.js';

// Use cases
export { runCountry, runPresence } from './core/usecases/run-presence.js';
export { getOrganizationLabel, isHxlTagRow, resolveSourceRow } from './core/usecases/resolve-source-row.js';
export { collectOrganizations } from './core/usecases/collect-organizations.js';
export { buildPresenceTable } from './core/usecases/build-presence-table.js';
export {
  collectReferencePeriods,
  parseReferencePeriod,
  spanPeriods,
} from './core/usecases/reference-period.js';

// Types
export {
  DEFAULT_LEVELS,
  HXL_TAG_PREFIX,
  RunConfigFileSchema,
  SourceRowSchema,
  SourceRowsFileSchema,
} from './core/types.js';
export type {
  AdminCell,
  CountryRunStats,
  InvalidReferencePeriodHint,
  Organization,
  PresenceReview,
  PresenceRow,
  PresenceRunDeps,
  PresenceRunOptions,
  PresenceRunResult,
  ReferencePeriod,
  ReferencePeriodParse,
  RunConfig,
  UnknownOrgTypeHint,
  UnmatchedOrganizationHint,
} from './core/types.js';

// Errors
export type { PresenceConfigError } from './core/errors.js';
