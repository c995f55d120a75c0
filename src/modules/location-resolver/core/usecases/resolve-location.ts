/**
 * Resolve Location Use Case
 *
 * Resolves one raw admin cell against the admin index. First success wins:
 * 1. Code lookup, when the value has the shape of this level's codes -> exact
 * 2. Normalized name/alias lookup, narrowed by the parent hint when several
 *    units share the name -> exact or alias
 * 3. Approximate match over the level's names and aliases, if configured -> fuzzy
 *
 * Failures are returned as data with the candidates that could not be told apart.
 */

import { findBestFuzzyMatch, type FuzzyTerm } from '@/common/utils/fuzzy-match.js';
import { normalizeText } from '@/common/utils/text.js';

import type {
  LocationFailure,
  LocationFailureReason,
  LocationResolution,
  LocationResolverOptions,
  ResolveLocationInput,
} from '../types.js';
import type { AdminIndex, AdminUnit } from '@/modules/admin-hierarchy/index.js';

const unresolved = (
  input: ResolveLocationInput,
  reason: LocationFailureReason,
  candidates: readonly string[] = []
): LocationFailure => ({
  status: 'unresolved',
  confidence: 'unresolved',
  reason,
  rawLocation: input.rawLocation,
  level: input.expectedLevel,
  candidates,
});

const resolveByName = (
  index: AdminIndex,
  input: ResolveLocationInput,
  normalized: string
): LocationResolution | undefined => {
  const candidates = index.lookupByName(input.countryCode, input.expectedLevel, normalized);
  if (candidates.length === 0) {
    return undefined;
  }

  let remaining: readonly AdminUnit[] = candidates;
  if (remaining.length > 1 && input.parentCode !== undefined) {
    const parentCode = input.parentCode;
    remaining = remaining.filter((unit) => index.isWithin(unit, parentCode));
  }

  const [unit] = remaining;
  if (unit === undefined || remaining.length > 1) {
    return unresolved(
      input,
      'Ambiguous',
      candidates.map((candidate) => candidate.code)
    );
  }

  return {
    status: 'resolved',
    unit,
    confidence: index.isCanonicalName(unit, normalized) ? 'exact' : 'alias',
  };
};

const resolveByFuzzyMatch = (
  index: AdminIndex,
  input: ResolveLocationInput,
  normalized: string,
  options: LocationResolverOptions
): LocationResolution => {
  if (options.fuzzy === undefined) {
    return unresolved(input, 'NotFound');
  }

  const parentCode = input.parentCode;
  const units = index
    .listUnits({ countryCode: input.countryCode, level: input.expectedLevel })
    .filter((unit) => parentCode === undefined || index.isWithin(unit, parentCode));

  const terms: FuzzyTerm[] = units.flatMap((unit) =>
    [unit.name, ...unit.aliases].map((term) => ({ key: unit.code, term: normalizeText(term) }))
  );

  const outcome = findBestFuzzyMatch(normalized, terms, options.fuzzy);

  switch (outcome.type) {
    case 'match': {
      const unit = index.getUnit(outcome.key);
      return unit === undefined
        ? unresolved(input, 'NotFound')
        : { status: 'resolved', unit, confidence: 'fuzzy' };
    }
    case 'tie':
      return unresolved(input, 'Ambiguous', outcome.keys);
    case 'none':
      return unresolved(input, 'NotFound');
  }
};

/**
 * Resolves a raw (country, admin name or code) pair at the expected level.
 */
export const resolveLocation = (
  index: AdminIndex,
  input: ResolveLocationInput,
  options: LocationResolverOptions = {}
): LocationResolution => {
  const raw = input.rawLocation.trim();
  if (raw === '') {
    return unresolved(input, 'EmptyLocation');
  }

  if (index.lookupByCode(input.countryCode, input.countryCode)?.level !== 0) {
    return unresolved(input, 'UnknownCountry');
  }

  if (index.matchesCodePattern(input.countryCode, input.expectedLevel, raw)) {
    const unit = index.lookupByCode(input.countryCode, raw);
    if (unit?.level === input.expectedLevel) {
      return { status: 'resolved', unit, confidence: 'exact' };
    }
  }

  const normalized = normalizeText(raw);
  const byName = resolveByName(index, input, normalized);
  if (byName !== undefined) {
    return byName;
  }

  return resolveByFuzzyMatch(index, input, normalized, options);
};
