/**
 * Domain types for organization normalization.
 */

import { type Static, Type } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Schema
// ─────────────────────────────────────────────────────────────────────────────

export const OrganizationAliasSchema = Type.Object({
  /** Canonical organization id */
  id: Type.String({ minLength: 1 }),
  /** Canonical organization name */
  name: Type.String({ minLength: 1 }),
  acronym: Type.Optional(Type.String()),
  typeCode: Type.Optional(Type.String()),
  /** Restricts the patterns to one country (ISO3) */
  countryCode: Type.Optional(Type.String()),
  /** Raw spellings that map to this organization */
  patterns: Type.Optional(Type.Array(Type.String())),
});

export const OrganizationConfigSchema = Type.Object({
  aliases: Type.Optional(Type.Array(OrganizationAliasSchema)),
  /** Overrides the default legal entity suffixes */
  legalSuffixes: Type.Optional(Type.Array(Type.String())),
});

export type OrganizationAlias = Static<typeof OrganizationAliasSchema>;

export type OrganizationConfig = Static<typeof OrganizationConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Suffixes stripped from the end of organization names */
export const DEFAULT_LEGAL_SUFFIXES: readonly string[] = [
  'Ltd',
  'Limited',
  'Inc',
  'Incorporated',
  'LLC',
  'PLC',
  'Pvt',
  'GmbH',
  'gGmbH',
  'e.V.',
  'ASBL',
  'S.A.',
];

/** Longest acronym kept in the organisations table */
export const MAX_ACRONYM_LENGTH = 32;

// ─────────────────────────────────────────────────────────────────────────────
// Normalizer Types
// ─────────────────────────────────────────────────────────────────────────────

export interface OrganizationMatch {
  readonly id: string;
  /** Name after casefolding, punctuation and suffix removal */
  readonly cleanedName: string;
  /** `alias` when the configured mapping matched, `derived` otherwise */
  readonly via: 'alias' | 'derived';
  readonly alias?: OrganizationAlias | undefined;
}

export interface OrganizationNormalizer {
  /**
   * Maps a raw organization name to a stable organization id.
   * Returns undefined when nothing is left of the name after cleaning.
   */
  normalize(rawName: string, countryCode?: string): OrganizationMatch | undefined;

  /** Cleans a raw name the same way `normalize` does */
  clean(rawName: string): string;
}
