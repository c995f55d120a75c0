/**
 * Row-level data model shared by the resolution, aggregation and run modules.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Source Rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Where a source row came from.
 */
export interface RowProvenance {
  readonly sourceFile?: string | undefined;
  /** 1-based row number in the source file */
  readonly rowNumber?: number | undefined;
}

/**
 * One decoded row of a country's 3W submission.
 *
 * Fields are already plain strings; workbook decoding happens upstream.
 */
export interface SourceRow {
  /** ISO3 code of the submitting country */
  readonly countryCode: string;
  /**
   * Raw admin cells from admin1 downward. A cell holds a code or a name,
   * an empty string means the column was not filled.
   */
  readonly locations: readonly string[];
  readonly orgName: string;
  readonly orgAcronym?: string | undefined;
  readonly orgType?: string | undefined;
  readonly sector: string;
  readonly provenance?: RowProvenance | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution Outcomes
// ─────────────────────────────────────────────────────────────────────────────

export type MatchConfidence = 'exact' | 'alias' | 'fuzzy' | 'unresolved';

export type ResolvedConfidence = Exclude<MatchConfidence, 'unresolved'>;

/**
 * A source row whose location, organization and sector all resolved.
 */
export interface ResolvedRow {
  readonly status: 'resolved';
  readonly source: SourceRow;
  readonly unitCode: string;
  readonly level: number;
  readonly confidence: ResolvedConfidence;
  readonly organizationId: string;
  readonly sectorCode: string;
}

export type ResolutionStage = 'location' | 'sector' | 'organization';

/**
 * A source row kept aside for manual review.
 */
export interface UnresolvedRow {
  readonly status: 'unresolved';
  readonly source: SourceRow;
  readonly confidence: 'unresolved';
  readonly stage: ResolutionStage;
  readonly reason: string;
  /** The raw value that failed to resolve */
  readonly rawValue: string;
  /** Candidate codes when the failure was an ambiguity */
  readonly candidates: readonly string[];
}

export type RowOutcome = ResolvedRow | UnresolvedRow;
