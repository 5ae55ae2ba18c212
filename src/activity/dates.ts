import { format, isValid, parse, parseISO } from 'date-fns';

export const ISO_DATE = 'yyyy-MM-dd';

interface DatePattern {
  pattern: string
  // date-fns reads `yyyy` as 1–4 digits, so each pattern also pins the digit layout.
  shape: RegExp
}

// ISO dates and date-times (fractional seconds, `Z` or offsets) are handled before this list.
// Tried in order; year-first forms come before month-first so `2024/01/03` never reads as a US date.
export const DATE_PATTERNS: readonly DatePattern[] = [
  { pattern: 'yyyy-M-d', shape: /^\d{4}-\d{1,2}-\d{1,2}$/ },
  { pattern: 'yyyy-M-d HH:mm', shape: /^\d{4}-\d{1,2}-\d{1,2} \d{1,2}:\d{2}$/ },
  { pattern: 'yyyy/M/d', shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/ },
  { pattern: 'yyyy/M/d HH:mm:ss', shape: /^\d{4}\/\d{1,2}\/\d{1,2} \d{1,2}:\d{2}:\d{2}$/ },
  { pattern: 'yyyy/M/d HH:mm', shape: /^\d{4}\/\d{1,2}\/\d{1,2} \d{1,2}:\d{2}$/ },
  { pattern: 'yyyy.M.d', shape: /^\d{4}\.\d{1,2}\.\d{1,2}$/ },
  { pattern: 'yyyyMMdd', shape: /^\d{8}$/ },
  { pattern: 'M/d/yyyy', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: 'M/d/yyyy HH:mm', shape: /^\d{1,2}\/\d{1,2}\/\d{4} \d{1,2}:\d{2}$/ },
  { pattern: 'M/d/yy', shape: /^\d{1,2}\/\d{1,2}\/\d{2}$/ },
  { pattern: 'd.M.yyyy', shape: /^\d{1,2}\.\d{1,2}\.\d{4}$/ },
  { pattern: 'MMM d, yyyy', shape: /^[A-Za-z]{3} \d{1,2}, \d{4}$/ },
  { pattern: 'MMMM d, yyyy', shape: /^[A-Za-z]+ \d{1,2}, \d{4}$/ },
  { pattern: 'd MMM yyyy', shape: /^\d{1,2} [A-Za-z]{3} \d{4}$/ },
  { pattern: 'd MMMM yyyy', shape: /^\d{1,2} [A-Za-z]+ \d{4}$/ }
];

const ISO_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ]|$)/;

// Two-digit years resolve to 1950–2049.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Normalizes a raw date cell to `yyyy-MM-dd`, dropping any time of day.
 * An ISO date-time keeps the calendar date as written, whatever its offset.
 * Returns undefined when no pattern matches.
 */
export const parseActivityDate = (raw: string): string | undefined => {
  const text = raw.trim();
  if (text === '') return undefined;

  const iso = ISO_PREFIX.exec(text);
  if (iso !== null && isValid(parseISO(text))) {
    return iso[1];
  }

  for (const { pattern, shape } of DATE_PATTERNS) {
    if (!shape.test(text)) continue;
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, ISO_DATE);
    }
  }
  return undefined;
};

export const formatActivityDate = (date: Date): string => format(date, ISO_DATE);

export const parseIsoDate = (value: string): Date => parse(value, ISO_DATE, REFERENCE_DATE);
