/**
 * Reference Period Use Case
 *
 * Source files are often named after the period they report on, e.g.
 * `testland-3w-april-june-2025.csv` or `testland_jan_to_mar_2024.xlsx`.
 * The period runs from the first day of the start month to the last day of
 * the end month. An end month before the start month crosses the year
 * boundary, the year in the name being the end year.
 */

import { compareStrings } from '@/common/utils/text.js';

import type {
  InvalidReferencePeriodHint,
  ReferencePeriod,
  ReferencePeriodParse,
} from '../types.js';

const PERIOD_IN_NAME_RE =
  /(?<![a-zA-Z0-9])([a-zA-Z]+)[\s\-_]+(?:to)?[\s\-_]*([a-zA-Z]+)[\s\-_]+(\d{4})(?!\d)/;

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

/**
 * Month index (0-11) of a full English month name or its three letter
 * abbreviation; `sept` is accepted too.
 */
const monthIndex = (word: string): number | undefined => {
  const lower = word.toLowerCase();
  if (lower === 'sept') return 8;
  const index = MONTHS.findIndex((month) => month === lower || month.slice(0, 3) === lower);
  return index === -1 ? undefined : index;
};

const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

const fileName = (sourceFile: string): string => sourceFile.split(/[\\/]/).pop() ?? sourceFile;

export const parseReferencePeriod = (sourceFile: string): ReferencePeriodParse => {
  const match = PERIOD_IN_NAME_RE.exec(fileName(sourceFile));
  if (match === null) {
    return { status: 'absent' };
  }

  const [, startWord = '', endWord = '', yearText = ''] = match;
  const startMonth = monthIndex(startWord);
  const endMonth = monthIndex(endWord);
  if (startMonth === undefined || endMonth === undefined) {
    const word = startMonth === undefined ? startWord : endWord;
    return { status: 'invalid', reason: `'${word}' is not a month` };
  }

  const year = Number(yearText);
  const startYear = endMonth < startMonth ? year - 1 : year;

  return {
    status: 'found',
    period: {
      start: toIsoDate(new Date(Date.UTC(startYear, startMonth, 1))),
      // Day 0 of the next month is the last day of the end month.
      end: toIsoDate(new Date(Date.UTC(year, endMonth + 1, 0))),
    },
  };
};

export interface ReferencePeriods {
  /** Periods of the source files that have one */
  byFile: ReadonlyMap<string, ReferencePeriod>;
  invalid: InvalidReferencePeriodHint[];
}

/**
 * Parses the periods of distinct source files, reporting unreadable ones in
 * file name order.
 */
export const collectReferencePeriods = (sourceFiles: Iterable<string>): ReferencePeriods => {
  const byFile = new Map<string, ReferencePeriod>();
  const invalid: InvalidReferencePeriodHint[] = [];

  for (const sourceFile of [...new Set(sourceFiles)].sort(compareStrings)) {
    const parsed = parseReferencePeriod(sourceFile);
    if (parsed.status === 'found') {
      byFile.set(sourceFile, parsed.period);
    } else if (parsed.status === 'invalid') {
      invalid.push({ sourceFile, reason: parsed.reason });
    }
  }

  return { byFile, invalid };
};

/**
 * Smallest period covering all of `periods`, undefined for none.
 */
export const spanPeriods = (periods: readonly ReferencePeriod[]): ReferencePeriod | undefined => {
  const [first, ...rest] = periods;
  if (first === undefined) {
    return undefined;
  }

  return rest.reduce<ReferencePeriod>(
    (span, period) => ({
      start: compareStrings(period.start, span.start) < 0 ? period.start : span.start,
      end: compareStrings(period.end, span.end) > 0 ? period.end : span.end,
    }),
    first
  );
};
