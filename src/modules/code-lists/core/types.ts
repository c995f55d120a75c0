/**
 * Domain types for code lists (sectors, organization types).
 *
 * A code list maps the many ways a value is written in submissions
 * ("Health", "SANTE", "health cluster") onto one canonical code.
 */

import { type Static, Type } from '@sinclair/typebox';

import type { FuzzyMatchOptions } from '@/common/utils/fuzzy-match.js';

export const CodeListEntrySchema = Type.Object({
  code: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  aliases: Type.Optional(Type.Array(Type.String())),
});

export type CodeListEntry = Static<typeof CodeListEntrySchema>;

/** How a raw value was matched */
export type CodeMatchVia = 'code' | 'name' | 'alias' | 'fuzzy';

export type CodeMatch =
  | { readonly status: 'matched'; readonly code: string; readonly via: CodeMatchVia }
  | { readonly status: 'missing' }
  | { readonly status: 'unmatched'; readonly raw: string; readonly candidates: readonly string[] };

export interface CodeListOptions {
  /** Approximate matching; disabled when undefined */
  fuzzy?: FuzzyMatchOptions | undefined;
}

export interface CodeList {
  /** What the list holds, used in messages ("sector", "org type") */
  readonly kind: string;

  match(raw: string): CodeMatch;

  /** Preferred name of a code, undefined for unknown codes */
  getName(code: string): string | undefined;

  /** All codes, ordered */
  codes(): readonly string[];
}
