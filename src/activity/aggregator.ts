import { addWeeks, endOfWeek, subDays } from 'date-fns';
import { formatActivityDate, parseIsoDate } from './dates.js';
import {
  type ActivityRecord,
  type CategorySummary,
  type NamedWindow,
  type PositionedRecord,
  type WeeklyPoint
} from './types.js';

const WINDOW_DAYS: Record<Exclude<NamedWindow, 'all-time'>, number> = {
  'last-7-days': 7,
  'last-30-days': 30,
  'last-5-months': 5 * 30
};

export const earliestDate = (records: ActivityRecord[]): string | undefined =>
  records.reduce<string | undefined>((min, r) => (min === undefined || r.date < min ? r.date : min), undefined);

/**
 * Start date of a named window. `all-time` starts at the earliest record,
 * which is undefined for an empty log.
 */
export const resolveWindowStart = (window: NamedWindow, records: ActivityRecord[], today: Date): string | undefined => {
  if (window === 'all-time') return earliestDate(records);
  return formatActivityDate(subDays(today, WINDOW_DAYS[window]));
};

export const filterByWindow = (records: ActivityRecord[], startDate: string | undefined, endDate?: string): ActivityRecord[] => {
  if (startDate === undefined) return [];
  return records.filter(r => r.date >= startDate && (endDate === undefined || r.date <= endDate));
};

/**
 * Totals hours per category in order of first appearance.
 * An empty input and an all-zero input both come back as `kind: 'empty'`.
 */
export const summarizeByCategory = (records: ActivityRecord[]): CategorySummary => {
  const totals = new Map<string, number>();
  for (const r of records) {
    totals.set(r.category, (totals.get(r.category) ?? 0) + r.hours);
  }
  const total = [...totals.values()].reduce((sum, hours) => sum + hours, 0);
  if (total === 0) return { kind: 'empty', total: 0 };

  return {
    kind: 'totals',
    categories: [...totals.entries()].map(([category, hours]) => ({ category, hours, share: hours / total })),
    total
  };
};

export const weekEnding = (date: string): string =>
  formatActivityDate(endOfWeek(parseIsoDate(date), { weekStartsOn: 1 }));

/**
 * Sums hours per Monday–Sunday week, keyed by the closing Sunday.
 * Weeks without records are skipped unless `fillGaps` is set.
 */
export const weeklySeries = (records: ActivityRecord[], options: { fillGaps?: boolean } = {}): WeeklyPoint[] => {
  const buckets = new Map<string, number>();
  for (const r of records) {
    const key = weekEnding(r.date);
    buckets.set(key, (buckets.get(key) ?? 0) + r.hours);
  }
  const points = [...buckets.entries()]
    .map(([week, hours]) => ({ weekEnding: week, hours }))
    .sort((a, b) => a.weekEnding.localeCompare(b.weekEnding));

  if (options.fillGaps !== true || points.length < 2) return points;

  const filled: WeeklyPoint[] = [];
  const last = points[points.length - 1].weekEnding;
  for (let cursor = parseIsoDate(points[0].weekEnding); ; cursor = addWeeks(cursor, 1)) {
    const week = formatActivityDate(cursor);
    if (week > last) break;
    filled.push({ weekEnding: week, hours: buckets.get(week) ?? 0 });
  }
  return filled;
};

/**
 * Newest first; ties keep load order. Each row carries its load position,
 * which is what the store's delete expects.
 */
export const sortForDisplay = (records: ActivityRecord[]): PositionedRecord[] =>
  records
    .map((r, position) => ({ ...r, position }))
    .sort((a, b) => b.date.localeCompare(a.date) || a.position - b.position);
