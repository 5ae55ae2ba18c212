export interface ActivityRecord {
  /** Calendar date, `yyyy-MM-dd`. */
  date: string
  category: string
  hours: number
}

export interface ActivityLogSnapshot {
  records: ActivityRecord[]
  revision: string
}

export interface PositionedRecord extends ActivityRecord {
  position: number
}

export interface CategoryTotal {
  category: string
  hours: number
  share: number
}

export type CategorySummary =
  | { kind: 'empty', total: 0 }
  | { kind: 'totals', categories: CategoryTotal[], total: number };

export interface WeeklyPoint {
  /** The Sunday closing the week, `yyyy-MM-dd`. */
  weekEnding: string
  hours: number
}

export const NAMED_WINDOWS = ['last-7-days', 'last-30-days', 'last-5-months', 'all-time'] as const;
export type NamedWindow = typeof NAMED_WINDOWS[number];
