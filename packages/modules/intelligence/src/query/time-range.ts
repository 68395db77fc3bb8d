/**
 * Time ranges → inclusive calendar windows relative to a reference date.
 */

import {
  addDays,
  addQuarters,
  endOfMonth,
  endOfQuarter,
  endOfYear,
  format,
  parseISO,
  startOfMonth,
  startOfQuarter,
  startOfYear,
  subDays,
  subQuarters,
  subYears,
} from 'date-fns';
import { TIME_RANGE_LABELS } from '../constants';
import type { CalendarDate, TimeRange, TimeWindow } from '../types';

export const ALL_TIME: TimeRange = { kind: 'preset', preset: 'all_time' };

function day(date: Date): CalendarDate {
  return format(date, 'yyyy-MM-dd');
}

function span(from: Date, to: Date): TimeWindow {
  return { from: day(from), to: day(to) };
}

/** Inclusive `{ from, to }` for `range` as seen on `asOf`; null for all-time. */
export function resolveTimeWindow(range: TimeRange, asOf: CalendarDate): TimeWindow | null {
  const now = parseISO(asOf);

  if (range.kind === 'quarter') {
    const year = range.year ?? now.getFullYear();
    const start = new Date(year, (range.quarter - 1) * 3, 1);
    return span(start, endOfQuarter(start));
  }

  switch (range.preset) {
    case 'all_time':
      return null;
    case 'this_month':
      return span(startOfMonth(now), endOfMonth(now));
    case 'this_quarter':
      return span(startOfQuarter(now), endOfQuarter(now));
    case 'next_quarter': {
      const next = addQuarters(startOfQuarter(now), 1);
      return span(next, endOfQuarter(next));
    }
    case 'last_quarter': {
      const last = subQuarters(startOfQuarter(now), 1);
      return span(last, endOfQuarter(last));
    }
    case 'this_year':
      return span(startOfYear(now), endOfYear(now));
    case 'last_year': {
      const last = subYears(startOfYear(now), 1);
      return span(last, endOfYear(last));
    }
    // N-day windows count asOf as one of their N days
    case 'last_30_days':
      return span(subDays(now, 29), now);
    case 'last_90_days':
      return span(subDays(now, 89), now);
    case 'next_30_days':
      return span(now, addDays(now, 29));
  }
}

export function isInWindow(date: CalendarDate, range: TimeWindow): boolean {
  // canonical dates compare lexically
  return date >= range.from && date <= range.to;
}

export function describeTimeRange(range: TimeRange): string {
  if (range.kind === 'preset') return TIME_RANGE_LABELS[range.preset];
  return range.year === null ? `Q${range.quarter}` : `Q${range.quarter} ${range.year}`;
}
