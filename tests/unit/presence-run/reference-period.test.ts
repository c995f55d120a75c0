/**
 * Unit tests for reading reference periods from file names.
 */

import { describe, expect, it } from 'vitest';

import {
  collectReferencePeriods,
  parseReferencePeriod,
  spanPeriods,
} from '@/modules/presence-run/index.js';

describe('parseReferencePeriod', () => {
  it('reads a start and end month followed by the year', () => {
    expect(parseReferencePeriod('testland-3w-operational-presence-april-june-2025.csv')).toEqual({
      status: 'found',
      period: { start: '2025-04-01', end: '2025-06-30' },
    });
  });

  it('accepts abbreviations, "to" and other separators', () => {
    expect(parseReferencePeriod('testland_Jan to Mar_2024.xlsx')).toEqual({
      status: 'found',
      period: { start: '2024-01-01', end: '2024-03-31' },
    });
    expect(parseReferencePeriod('testland-sept-dec-2023.csv')).toEqual({
      status: 'found',
      period: { start: '2023-09-01', end: '2023-12-31' },
    });
  });

  it('ends on the last day of a leap February', () => {
    expect(parseReferencePeriod('testland-jan-feb-2024.csv')).toEqual({
      status: 'found',
      period: { start: '2024-01-01', end: '2024-02-29' },
    });
  });

  it('starts in the previous year when the period crosses the year boundary', () => {
    expect(parseReferencePeriod('testland-november-january-2025.csv')).toEqual({
      status: 'found',
      period: { start: '2024-11-01', end: '2025-01-31' },
    });
  });

  it('only looks at the file name, not the directories', () => {
    expect(parseReferencePeriod('march-may-2020/testland.csv')).toEqual({ status: 'absent' });
  });

  it('reports a name whose words are not months', () => {
    expect(parseReferencePeriod('testland-report-june-2025.csv')).toEqual({
      status: 'invalid',
      reason: "'report' is not a month",
    });
    expect(parseReferencePeriod('testland-april-later-2025.csv')).toEqual({
      status: 'invalid',
      reason: "'later' is not a month",
    });
  });

  it('finds nothing in a name without dates', () => {
    expect(parseReferencePeriod('testland-3w.xlsx')).toEqual({ status: 'absent' });
    expect(parseReferencePeriod('testland-3w-june-2025.xlsx')).toEqual({ status: 'absent' });
  });
});

describe('collectReferencePeriods', () => {
  it('keeps readable periods and lists unreadable names in order', () => {
    const periods = collectReferencePeriods([
      'b-report-june-2025.csv',
      'a-april-june-2025.csv',
      'plain.csv',
      'a-april-june-2025.csv',
      'a-later-june-2025.csv',
    ]);

    expect([...periods.byFile]).toEqual([
      ['a-april-june-2025.csv', { start: '2025-04-01', end: '2025-06-30' }],
    ]);
    expect(periods.invalid).toEqual([
      { sourceFile: 'a-later-june-2025.csv', reason: "'later' is not a month" },
      { sourceFile: 'b-report-june-2025.csv', reason: "'report' is not a month" },
    ]);
  });
});

describe('spanPeriods', () => {
  it('covers every period', () => {
    expect(
      spanPeriods([
        { start: '2025-04-01', end: '2025-06-30' },
        { start: '2025-01-01', end: '2025-03-31' },
        { start: '2025-02-01', end: '2025-07-31' },
      ])
    ).toEqual({ start: '2025-01-01', end: '2025-07-31' });
  });

  it('returns undefined for no periods', () => {
    expect(spanPeriods([])).toBeUndefined();
  });
});
