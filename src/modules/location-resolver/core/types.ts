/**
 * Domain types for location resolution.
 */

import type { ResolvedConfidence } from '@/common/types/rows.js';
import type { FuzzyMatchOptions } from '@/common/utils/fuzzy-match.js';
import type { AdminUnit } from '@/modules/admin-hierarchy/index.js';

export type LocationFailureReason = 'EmptyLocation' | 'UnknownCountry' | 'Ambiguous' | 'NotFound';

export interface LocationMatch {
  readonly status: 'resolved';
  readonly unit: AdminUnit;
  readonly confidence: ResolvedConfidence;
}

export interface LocationFailure {
  readonly status: 'unresolved';
  readonly confidence: 'unresolved';
  readonly reason: LocationFailureReason;
  readonly rawLocation: string;
  readonly level: number;
  /** Codes of the candidates that could not be told apart, ordered */
  readonly candidates: readonly string[];
}

export type LocationResolution = LocationMatch | LocationFailure;

export interface LocationResolverOptions {
  /** Approximate matching; disabled when undefined */
  fuzzy?: FuzzyMatchOptions | undefined;
}

export interface ResolveLocationInput {
  countryCode: string;
  rawLocation: string;
  expectedLevel: number;
  /** Resolved code of an ancestor, used to disambiguate name matches */
  parentCode?: string | undefined;
}

export interface ResolveRowLocationInput {
  countryCode: string;
  /** Raw admin cells from admin1 downward */
  locations: readonly string[];
}
