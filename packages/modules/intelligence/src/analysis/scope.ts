/**
 * Scoping: applies the intent's sector filter and time window to the
 * normalized dataset before any analyzer runs.
 *
 * A record only passes a filter when the filtered field is valid: an unknown
 * sector never matches a sector filter, an unreadable date never falls inside
 * a window. Stage and status filters do not scope; analyzers report them as
 * focus metrics so distributions stay whole.
 */

import type { Sector } from '../constants';
import type { AnalysisDataset, CalendarDate, NormalizedField, QueryIntent, TimeWindow } from '../types';
import type { CategoryMatch } from '../types';
import { mappedCategory } from '../normalizers/category';
import { isInWindow, resolveTimeWindow } from '../query/time-range';

function matchesSector(field: NormalizedField<CategoryMatch<Sector>>, sectors: readonly Sector[]): boolean {
  if (sectors.length === 0) return true;
  const sector = mappedCategory(field);
  return sector !== null && sectors.includes(sector);
}

function matchesWindow(field: NormalizedField<CalendarDate>, window: TimeWindow | null): boolean {
  if (window === null) return true;
  return field.valid && field.value !== null && isInWindow(field.value, window);
}

export function scopeDataset(
  dataset: AnalysisDataset,
  intent: Pick<QueryIntent, 'filters' | 'timeRange'>,
  asOf: CalendarDate,
): AnalysisDataset {
  const window = resolveTimeWindow(intent.timeRange, asOf);
  const sectors = intent.filters.sector;

  return {
    deals: dataset.deals.filter(
      (d) => matchesSector(d.fields.sector, sectors) && matchesWindow(d.fields.closeDate, window),
    ),
    workOrders: dataset.workOrders.filter(
      (w) => matchesSector(w.fields.sector, sectors) && matchesWindow(w.fields.endDate, window),
    ),
  };
}
