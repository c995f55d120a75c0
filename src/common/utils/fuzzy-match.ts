/**
 * Approximate matching used as the last resolution step for locations and
 * code list values.
 *
 * Two metrics are supported, both tuned entirely by configuration:
 * - `edit-distance`: optimal string alignment distance (an adjacent
 *   transposition counts as one edit), accepted when <= `maxDistance`
 * - `fuse`: Fuse.js score (0 is a perfect match), accepted when <= `threshold`
 *
 * Matching is decided per key (a key may own several terms, e.g. a name plus its
 * aliases): the key keeps its best score, and only a unique best key is a match.
 */

// eslint-disable-next-line @typescript-eslint/naming-convention -- Fuse.js library exports PascalCase
import Fuse, { type IFuseOptions } from 'fuse.js';

export interface EditDistanceOptions {
  metric: 'edit-distance';
  /** Highest accepted distance (inclusive) */
  maxDistance: number;
  /** Inputs shorter than this never match */
  minInputLength?: number | undefined;
}

export interface FuseOptions {
  metric: 'fuse';
  /** Highest accepted Fuse.js score (inclusive), between 0 and 1 */
  threshold: number;
  /** Inputs shorter than this never match */
  minInputLength?: number | undefined;
}

export type FuzzyMatchOptions = EditDistanceOptions | FuseOptions;

/**
 * A searchable term owned by a key (unit code, sector code, ...).
 * Terms are expected to be normalized already.
 */
export interface FuzzyTerm {
  key: string;
  term: string;
}

export type FuzzyOutcome =
  | { type: 'match'; key: string; score: number }
  | { type: 'tie'; keys: string[]; score: number }
  | { type: 'none' };

/**
 * Optimal string alignment distance between two strings.
 */
export const editDistance = (a: string, b: string): number => {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const matrix: number[][] = [];
  for (let i = 0; i <= a.length; i++) {
    const row: number[] = [i];
    for (let j = 1; j <= b.length; j++) {
      row.push(i === 0 ? j : 0);
    }
    matrix.push(row);
  }

  const at = (i: number, j: number): number => matrix[i]?.[j] ?? Number.POSITIVE_INFINITY;

  for (let i = 1; i <= a.length; i++) {
    const row = matrix[i];
    if (row === undefined) continue;

    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      let value = Math.min(
        at(i - 1, j) + 1, // deletion
        at(i, j - 1) + 1, // insertion
        at(i - 1, j - 1) + cost // substitution
      );

      if (
        i > 1 &&
        j > 1 &&
        a.charAt(i - 1) === b.charAt(j - 2) &&
        a.charAt(i - 2) === b.charAt(j - 1)
      ) {
        value = Math.min(value, at(i - 2, j - 2) + 1); // transposition
      }

      row[j] = value;
    }
  }

  return at(a.length, b.length);
};

const scoreByEditDistance = (
  input: string,
  terms: readonly FuzzyTerm[],
  maxDistance: number
): Map<string, number> => {
  const scores = new Map<string, number>();

  for (const { key, term } of terms) {
    const distance = editDistance(input, term);
    if (distance > maxDistance) continue;

    const existing = scores.get(key);
    if (existing === undefined || distance < existing) {
      scores.set(key, distance);
    }
  }

  return scores;
};

const scoreByFuse = (
  input: string,
  terms: readonly FuzzyTerm[],
  threshold: number
): Map<string, number> => {
  const options: IFuseOptions<FuzzyTerm> = {
    keys: ['term'],
    includeScore: true,
    ignoreLocation: true,
    threshold,
  };
  const fuse = new Fuse([...terms], options);
  const scores = new Map<string, number>();

  for (const result of fuse.search(input)) {
    const score = result.score ?? 1;
    if (score > threshold) continue;

    const existing = scores.get(result.item.key);
    if (existing === undefined || score < existing) {
      scores.set(result.item.key, score);
    }
  }

  return scores;
};

/**
 * Finds the key whose terms are closest to `input`.
 *
 * Returns `tie` when several keys share the best accepted score, so the caller
 * can report the candidates instead of picking one.
 */
export const findBestFuzzyMatch = (
  input: string,
  terms: readonly FuzzyTerm[],
  options: FuzzyMatchOptions
): FuzzyOutcome => {
  if (input.length === 0 || input.length < (options.minInputLength ?? 0) || terms.length === 0) {
    return { type: 'none' };
  }

  const scores =
    options.metric === 'edit-distance'
      ? scoreByEditDistance(input, terms, options.maxDistance)
      : scoreByFuse(input, terms, options.threshold);

  let best = Number.POSITIVE_INFINITY;
  for (const score of scores.values()) {
    if (score < best) best = score;
  }

  const bestKeys = [...scores.entries()]
    .filter(([, score]) => score === best)
    .map(([key]) => key)
    .sort();

  const [first] = bestKeys;
  if (first === undefined) {
    return { type: 'none' };
  }

  if (bestKeys.length === 1) {
    return { type: 'match', key: first, score: best };
  }

  return { type: 'tie', keys: bestKeys, score: best };
};
