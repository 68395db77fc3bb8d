/**
 * Date normalizer: canonical output is a calendar date, `YYYY-MM-DD`.
 *
 * Patterns are tried in order; the first whose shape matches and whose
 * calendar date is real wins. "01/02/2024" therefore reads as January 2
 * (US before EU), while "15/01/2024" falls through to the EU pattern.
 */

import { format, isValid, parse } from 'date-fns';
import type { CalendarDate, NormalizedField, RawValue } from '../types';
import { accepted, describeRaw, readPresentText, rejected } from './field-result';

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;

export interface DatePattern {
  key: string;
  /** Full-string shape; when it has a capture group, only group 1 is parsed. */
  shape: RegExp;
  /** date-fns parse format */
  format: string;
}

export const DATE_PATTERNS: readonly DatePattern[] = [
  { key: 'iso', shape: /^\d{4}-\d{2}-\d{2}$/, format: 'yyyy-MM-dd' },
  {
    key: 'iso_datetime',
    shape: /^(\d{4}-\d{2}-\d{2})[t ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:z|[+-]\d{2}:?\d{2})?$/i,
    format: 'yyyy-MM-dd',
  },
  { key: 'iso_slash', shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/, format: 'yyyy/M/d' },
  { key: 'us_slash', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'M/d/yyyy' },
  { key: 'eu_slash', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'd/M/yyyy' },
  { key: 'us_dash', shape: /^\d{1,2}-\d{1,2}-\d{4}$/, format: 'M-d-yyyy' },
  { key: 'eu_dot', shape: /^\d{1,2}\.\d{1,2}\.\d{4}$/, format: 'd.M.yyyy' },
  { key: 'day_mon_year_dash', shape: /^\d{1,2}-[a-z]{3}-\d{4}$/i, format: 'd-MMM-yyyy' },
  { key: 'day_mon_year', shape: /^\d{1,2} [a-z]{3} \d{4}$/i, format: 'd MMM yyyy' },
  { key: 'day_month_year', shape: /^\d{1,2} [a-z]{4,9} \d{4}$/i, format: 'd MMMM yyyy' },
  { key: 'month_day_year', shape: /^[a-z]{4,9} \d{1,2}, \d{4}$/i, format: 'MMMM d, yyyy' },
  { key: 'mon_day_year', shape: /^[a-z]{3} \d{1,2}, \d{4}$/i, format: 'MMM d, yyyy' },
  { key: 'compact', shape: /^\d{8}$/, format: 'yyyyMMdd' },
];

const EPOCH_SHAPE = /^\d{9,13}$/;
// Fixed so parsing never depends on the wall clock.
const REFERENCE_DATE = new Date(2000, 0, 1);

function epochToCalendarDate(digits: string): CalendarDate {
  const n = Number(digits);
  // ≤ 11 digits: seconds; 12–13 digits: milliseconds
  const ms = digits.length <= 11 ? n * 1000 : n;
  return new Date(ms).toISOString().slice(0, 10);
}

/** Returns the canonical date for `text`, or null when no pattern reads it. */
export function parseDateText(text: string): CalendarDate | null {
  const input = text.replace(/\s+/g, ' ');

  for (const pattern of DATE_PATTERNS) {
    const match = pattern.shape.exec(input);
    if (!match) continue;
    const parsed = parse(match[1] ?? input, pattern.format, REFERENCE_DATE);
    if (isValid(parsed)) return format(parsed, 'yyyy-MM-dd');
  }

  if (EPOCH_SHAPE.test(input)) return epochToCalendarDate(input);
  return null;
}

function yearOf(date: CalendarDate): number {
  return Number(date.slice(0, 4));
}

export function normalizeDate(raw: RawValue | undefined): NormalizedField<CalendarDate> {
  const read = readPresentText(raw);
  if (!read.present) return rejected(raw, 'MissingField', 'No date');

  const date = parseDateText(read.text);
  if (date === null) {
    return rejected(raw, 'InvalidFormat', `Cannot read ${describeRaw(raw)} as a date`);
  }

  const year = yearOf(date);
  if (year < MIN_YEAR || year > MAX_YEAR) {
    return rejected(raw, 'OutOfRange', `Date ${describeRaw(raw)} falls outside ${MIN_YEAR}–${MAX_YEAR}`);
  }
  return accepted(raw, date);
}
