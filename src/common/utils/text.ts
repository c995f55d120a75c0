/**
 * Text normalization helpers shared by the matching modules.
 *
 * Every lookup key in the reference indexes goes through the same functions,
 * so raw spreadsheet cells and reference names compare equal whenever they
 * differ only in casing, accents or spacing.
 */

const COMBINING_MARKS_RE = /[\u0300-\u036f]/g;
const WHITESPACE_RE = /\s+/g;
const NON_ALPHANUMERIC_RE = /[^\p{L}\p{N}]+/gu;

/**
 * Trims, casefolds, strips diacritics and collapses internal whitespace.
 */
export const normalizeText = (value: string): string =>
  value
    .normalize('NFD')
    .replace(COMBINING_MARKS_RE, '')
    .toLowerCase()
    .replace(WHITESPACE_RE, ' ')
    .trim();

/**
 * Like {@link normalizeText}, and additionally turns every run of punctuation
 * into a single space. The result only contains letters, digits and single spaces.
 */
export const normalizeLabel = (value: string): string =>
  normalizeText(value).replace(NON_ALPHANUMERIC_RE, ' ').replace(WHITESPACE_RE, ' ').trim();

/**
 * Shape of a code: ASCII letters become `A`, digits become `9`.
 * `AF0101` -> `AA9999`.
 */
export const codeShape = (value: string): string =>
  value.trim().toUpperCase().replace(/[A-Z]/g, 'A').replace(/[0-9]/g, '9');

/** Canonical form of a code used as a map key. */
export const normalizeCode = (value: string): string => value.trim().toUpperCase();

/** Turns a cleaned label into a dash separated identifier. */
export const toSlug = (label: string): string => label.replace(/ /g, '-');

/** Code point ordering, independent of the host locale. */
export const compareStrings = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};
