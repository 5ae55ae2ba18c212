import { describe, expect, it } from 'vitest';
import {
  earliestDate,
  filterByWindow,
  resolveWindowStart,
  sortForDisplay,
  summarizeByCategory,
  weekEnding,
  weeklySeries
} from './aggregator.js';
import { type ActivityRecord } from './types.js';

const sumHours = (rows: ActivityRecord[]): number => rows.reduce((sum, r) => sum + r.hours, 0);

const records: ActivityRecord[] = [
  { date: '2024-01-01', category: 'A', hours: 2 },
  { date: '2024-01-03', category: 'A', hours: 1 },
  { date: '2024-01-10', category: 'B', hours: 3 }
];

describe('filterByWindow', () => {
  it('keeps records on or after the start date', () => {
    expect(filterByWindow(records, '2024-01-02')).toEqual(records.slice(1));
    expect(filterByWindow(records, '2024-01-03')).toEqual(records.slice(1));
  });

  it('applies an inclusive end date when given', () => {
    expect(filterByWindow(records, '2024-01-01', '2024-01-03')).toEqual(records.slice(0, 2));
  });

  it('returns nothing without a start date', () => {
    expect(filterByWindow(records, undefined)).toEqual([]);
  });
});

describe('resolveWindowStart', () => {
  const today = new Date(2024, 0, 31);

  it.each([
    ['last-7-days', '2024-01-24'],
    ['last-30-days', '2024-01-01'],
    ['last-5-months', '2023-09-03']
  ] as const)('%s starts on %s', (window, expected) => {
    expect(resolveWindowStart(window, records, today)).toBe(expected);
  });

  it('starts all-time at the earliest record', () => {
    const shuffled = [records[2], records[0], records[1]];
    expect(resolveWindowStart('all-time', shuffled, today)).toBe('2024-01-01');
    expect(resolveWindowStart('all-time', [], today)).toBeUndefined();
  });
});

describe('summarizeByCategory', () => {
  it('totals the filtered window', () => {
    expect(summarizeByCategory(filterByWindow(records, '2024-01-02'))).toEqual({
      kind: 'totals',
      categories: [
        { category: 'A', hours: 1, share: 0.25 },
        { category: 'B', hours: 3, share: 0.75 }
      ],
      total: 4
    });
  });

  it('orders categories by first appearance', () => {
    const summary = summarizeByCategory([records[2], ...records]);
    expect(summary.kind === 'totals' ? summary.categories.map(c => c.category) : []).toEqual(['B', 'A']);
  });

  it('returns the empty marker for no records', () => {
    expect(summarizeByCategory([])).toEqual({ kind: 'empty', total: 0 });
  });

  it('returns the empty marker when hours sum to zero', () => {
    expect(summarizeByCategory([{ date: '2024-01-01', category: 'A', hours: 0 }])).toEqual({ kind: 'empty', total: 0 });
  });

  it('conserves the total over all time', () => {
    const start = earliestDate(records);
    expect(summarizeByCategory(filterByWindow(records, start)).total).toBe(sumHours(records));
  });

  it('never shrinks as the window widens', () => {
    const totals = ['2024-01-10', '2024-01-03', '2024-01-02', '2024-01-01']
      .map(start => summarizeByCategory(filterByWindow(records, start)).total);
    expect(totals).toEqual([3, 4, 4, 6]);
  });
});

describe('weeklySeries', () => {
  it('keys weeks by the closing Sunday', () => {
    expect(weekEnding('2024-01-01')).toBe('2024-01-07');
    expect(weekEnding('2024-01-07')).toBe('2024-01-07');
    expect(weekEnding('2024-01-08')).toBe('2024-01-14');
  });

  it('sums hours per week in chronological order', () => {
    expect(weeklySeries([records[2], records[0], records[1]])).toEqual([
      { weekEnding: '2024-01-07', hours: 3 },
      { weekEnding: '2024-01-14', hours: 3 }
    ]);
  });

  it('skips empty weeks unless asked to fill them', () => {
    const sparse = [...records, { date: '2024-01-30', category: 'A', hours: 0.5 }];
    expect(weeklySeries(sparse).map(p => p.weekEnding)).toEqual(['2024-01-07', '2024-01-14', '2024-02-04']);
    expect(weeklySeries(sparse, { fillGaps: true })).toEqual([
      { weekEnding: '2024-01-07', hours: 3 },
      { weekEnding: '2024-01-14', hours: 3 },
      { weekEnding: '2024-01-21', hours: 0 },
      { weekEnding: '2024-01-28', hours: 0 },
      { weekEnding: '2024-02-04', hours: 0.5 }
    ]);
  });

  it('conserves total hours', () => {
    const total = weeklySeries(records).reduce((sum, p) => sum + p.hours, 0);
    expect(total).toBe(sumHours(records));
  });

  it('is empty for no records', () => {
    expect(weeklySeries([], { fillGaps: true })).toEqual([]);
  });
});

describe('sortForDisplay', () => {
  it('orders newest first and keeps load positions', () => {
    const rows = sortForDisplay([
      { date: '2024-01-01', category: 'A', hours: 1 },
      { date: '2024-01-10', category: 'B', hours: 1 },
      { date: '2024-01-03', category: 'A', hours: 1 },
      { date: '2024-01-10', category: 'C', hours: 1 }
    ]);
    expect(rows.map(r => [r.position, r.category])).toEqual([[1, 'B'], [3, 'C'], [2, 'A'], [0, 'A']]);
  });
});
