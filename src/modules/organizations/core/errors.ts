export interface ConflictingAliasError {
  readonly type: 'ConflictingAlias';
  readonly message: string;
  readonly pattern: string;
  readonly countryCode: string | null;
  readonly ids: readonly string[];
}

export interface DuplicateOrganizationIdError {
  readonly type: 'DuplicateOrganizationId';
  readonly message: string;
  readonly id: string;
}

export type OrganizationConfigError = ConflictingAliasError | DuplicateOrganizationIdError;

export const createConflictingAliasError = (
  pattern: string,
  countryCode: string | null,
  ids: readonly string[]
): ConflictingAliasError => ({
  type: 'ConflictingAlias',
  message: `Organization pattern '${pattern}'${countryCode === null ? '' : ` (${countryCode})`} maps to several ids: ${ids.join(', ')}`,
  pattern,
  countryCode,
  ids,
});

export const createDuplicateOrganizationIdError = (id: string): DuplicateOrganizationIdError => ({
  type: 'DuplicateOrganizationId',
  message: `Organization id '${id}' is configured with different names`,
  id,
});
