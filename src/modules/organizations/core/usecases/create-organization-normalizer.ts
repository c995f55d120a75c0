/**
 * Create Organization Normalizer Use Case
 *
 * Pipeline applied to every raw organization name:
 * 1. Casefold, strip diacritics, turn punctuation into spaces, collapse spaces
 * 2. Strip trailing legal entity suffixes ("Ltd", "GmbH", "e.V." ...)
 * 3. Look the cleaned name up in the alias mapping, country scoped first
 * 4. Otherwise derive the id from the cleaned name itself
 *
 * Two names are only merged when they clean to the same string or when the
 * alias mapping says so. A derived id never equals a configured id: on a clash
 * it takes a `~2`, `~3` ... suffix, which no derived slug contains.
 */

import { err, ok, type Result } from 'neverthrow';

import { compareStrings, normalizeCode, normalizeLabel, toSlug } from '@/common/utils/text.js';

import {
  createConflictingAliasError,
  createDuplicateOrganizationIdError,
  type OrganizationConfigError,
} from '../errors.js';
import {
  DEFAULT_LEGAL_SUFFIXES,
  type OrganizationAlias,
  type OrganizationConfig,
  type OrganizationMatch,
  type OrganizationNormalizer,
} from '../types.js';

const GLOBAL_SCOPE = '';
const DERIVED_ID_SEPARATOR = '~';

const scopedKey = (scope: string, cleaned: string): string => `${scope}|${cleaned}`;

const tokenize = (value: string): string[] =>
  normalizeLabel(value)
    .split(' ')
    .filter((token) => token !== '');

const endsWith = (tokens: readonly string[], suffix: readonly string[]): boolean =>
  tokens.length > suffix.length &&
  suffix.every((token, i) => tokens[tokens.length - suffix.length + i] === token);

/**
 * Builds the cleaning function for a list of legal suffixes.
 * A name is never stripped down to nothing.
 */
export const createNameCleaner = (legalSuffixes: readonly string[]): ((raw: string) => string) => {
  const suffixes = legalSuffixes.map(tokenize).filter((tokens) => tokens.length > 0);

  return (raw: string): string => {
    const tokens = tokenize(raw);

    let stripped = true;
    while (stripped) {
      stripped = false;
      for (const suffix of suffixes) {
        if (endsWith(tokens, suffix)) {
          tokens.splice(tokens.length - suffix.length);
          stripped = true;
          break;
        }
      }
    }

    return tokens.join(' ');
  };
};

const deriveId = (cleanedName: string, configuredIds: ReadonlySet<string>): string => {
  const slug = toSlug(cleanedName);
  let id = slug;
  for (let n = 2; configuredIds.has(id); n++) {
    id = `${slug}${DERIVED_ID_SEPARATOR}${String(n)}`;
  }
  return id;
};

export const createOrganizationNormalizer = (
  config: OrganizationConfig
): Result<OrganizationNormalizer, OrganizationConfigError> => {
  const clean = createNameCleaner(config.legalSuffixes ?? DEFAULT_LEGAL_SUFFIXES);
  const aliasesById = new Map<string, OrganizationAlias>();
  const lookup = new Map<string, OrganizationAlias>();

  for (const alias of config.aliases ?? []) {
    const existing = aliasesById.get(alias.id);
    if (existing !== undefined && existing.name !== alias.name) {
      return err(createDuplicateOrganizationIdError(alias.id));
    }
    // Global entries describe the organization better than country specific ones.
    if (existing === undefined || (existing.countryCode !== undefined && alias.countryCode === undefined)) {
      aliasesById.set(alias.id, alias);
    }

    const scope = alias.countryCode === undefined ? GLOBAL_SCOPE : normalizeCode(alias.countryCode);
    const spellings = [alias.name, alias.acronym ?? '', ...(alias.patterns ?? [])];

    for (const spelling of spellings) {
      const cleaned = clean(spelling);
      if (cleaned === '') continue;

      const key = scopedKey(scope, cleaned);
      const mapped = lookup.get(key);
      if (mapped !== undefined && mapped.id !== alias.id) {
        return err(
          createConflictingAliasError(
            cleaned,
            scope === GLOBAL_SCOPE ? null : scope,
            [mapped.id, alias.id].sort(compareStrings)
          )
        );
      }
      lookup.set(key, mapped ?? alias);
    }
  }

  const configuredIds: ReadonlySet<string> = new Set(aliasesById.keys());

  return ok({
    clean,

    normalize(rawName: string, countryCode?: string): OrganizationMatch | undefined {
      const cleanedName = clean(rawName);
      if (cleanedName === '') {
        return undefined;
      }

      const scoped =
        countryCode === undefined
          ? undefined
          : lookup.get(scopedKey(normalizeCode(countryCode), cleanedName));
      const alias = scoped ?? lookup.get(scopedKey(GLOBAL_SCOPE, cleanedName));

      if (alias !== undefined) {
        return { id: alias.id, cleanedName, via: 'alias', alias: aliasesById.get(alias.id) ?? alias };
      }

      return { id: deriveId(cleanedName, configuredIds), cleanedName, via: 'derived' };
    },
  });
};
