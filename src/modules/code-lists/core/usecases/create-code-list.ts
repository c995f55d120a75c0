/**
 * Create Code List Use Case
 *
 * Lookup order for a raw value:
 * 1. Exact code
 * 2. Normalized code, preferred name or alias
 * 3. Approximate match over every known value, if configured
 */

import { err, ok, type Result } from 'neverthrow';

import { findBestFuzzyMatch, type FuzzyTerm } from '@/common/utils/fuzzy-match.js';
import { compareStrings, normalizeText } from '@/common/utils/text.js';

import {
  createConflictingListKeyError,
  createDuplicateListCodeError,
  type CodeListConfigError,
} from '../errors.js';

import type { CodeList, CodeListEntry, CodeListOptions, CodeMatch, CodeMatchVia } from '../types.js';

interface KeyTarget {
  code: string;
  via: Exclude<CodeMatchVia, 'fuzzy'>;
}

export const createCodeList = (
  kind: string,
  entries: readonly CodeListEntry[],
  options: CodeListOptions = {}
): Result<CodeList, CodeListConfigError> => {
  const names = new Map<string, string>();
  const keys = new Map<string, KeyTarget>();

  for (const entry of entries) {
    const code = entry.code.trim();
    if (names.has(code)) {
      return err(createDuplicateListCodeError(kind, code));
    }
    names.set(code, entry.name.trim());
  }

  const register = (raw: string, target: KeyTarget): Result<void, CodeListConfigError> => {
    const key = normalizeText(raw);
    if (key === '') {
      return ok(undefined);
    }

    const existing = keys.get(key);
    if (existing === undefined) {
      keys.set(key, target);
      return ok(undefined);
    }

    if (existing.code !== target.code) {
      return err(
        createConflictingListKeyError(kind, key, [existing.code, target.code].sort(compareStrings))
      );
    }
    return ok(undefined);
  };

  // Codes first, then names, then aliases: a key keeps the strongest way it was registered.
  const registrations: [string, KeyTarget][] = [
    ...entries.map((entry): [string, KeyTarget] => [entry.code, { code: entry.code.trim(), via: 'code' }]),
    ...entries.map((entry): [string, KeyTarget] => [entry.name, { code: entry.code.trim(), via: 'name' }]),
    ...entries.flatMap((entry) =>
      (entry.aliases ?? []).map((alias): [string, KeyTarget] => [
        alias,
        { code: entry.code.trim(), via: 'alias' },
      ])
    ),
  ];

  for (const [raw, target] of registrations) {
    const result = register(raw, target);
    if (result.isErr()) {
      return err(result.error);
    }
  }

  const terms: FuzzyTerm[] = [...keys.entries()].map(([term, target]) => ({
    key: target.code,
    term,
  }));
  const orderedCodes = [...names.keys()].sort(compareStrings);

  return ok({
    kind,

    match(raw: string): CodeMatch {
      const trimmed = raw.trim();
      if (trimmed === '') {
        return { status: 'missing' };
      }

      if (names.has(trimmed)) {
        return { status: 'matched', code: trimmed, via: 'code' };
      }

      const normalized = normalizeText(trimmed);
      const target = keys.get(normalized);
      if (target !== undefined) {
        return { status: 'matched', code: target.code, via: target.via };
      }

      if (options.fuzzy === undefined) {
        return { status: 'unmatched', raw: trimmed, candidates: [] };
      }

      const outcome = findBestFuzzyMatch(normalized, terms, options.fuzzy);
      switch (outcome.type) {
        case 'match':
          return { status: 'matched', code: outcome.key, via: 'fuzzy' };
        case 'tie':
          return { status: 'unmatched', raw: trimmed, candidates: outcome.keys };
        case 'none':
          return { status: 'unmatched', raw: trimmed, candidates: [] };
      }
    },

    getName(code: string): string | undefined {
      return names.get(code);
    },

    codes(): readonly string[] {
      return orderedCodes;
    },
  });
};
