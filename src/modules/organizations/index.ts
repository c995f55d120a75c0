// Use cases
export {
  createNameCleaner,
  createOrganizationNormalizer,
} from './core/usecases/create-organization-normalizer.js';

// Types
export {
  DEFAULT_LEGAL_SUFFIXES,
  MAX_ACRONYM_LENGTH,
  OrganizationAliasSchema,
  OrganizationConfigSchema,
} from './core/types.js';
export type {
  OrganizationAlias,
  OrganizationConfig,
  OrganizationMatch,
  OrganizationNormalizer,
} from './core/types.js';

// Errors
export type {
  ConflictingAliasError,
  DuplicateOrganizationIdError,
  OrganizationConfigError,
} from './core/errors.js';
