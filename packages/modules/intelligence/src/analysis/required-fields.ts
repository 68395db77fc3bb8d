import type { BoardKind, DealFieldName, QueryIntent, WorkOrderFieldName } from '../types';
import type { QueryCategory } from '../constants';
import { DEALS_BOARD } from '../boards/deals';
import { WORK_ORDERS_BOARD } from '../boards/work-orders';

export interface RequiredFields {
  deals: DealFieldName[];
  workOrders: WorkOrderFieldName[];
}

const BASE_FIELDS: Record<QueryCategory, RequiredFields> = {
  pipeline_overview: { deals: ['amount', 'stage'], workOrders: [] },
  revenue_forecast: { deals: ['amount', 'stage'], workOrders: ['revenue', 'status'] },
  execution_status: { deals: [], workOrders: ['revenue', 'status'] },
  leadership_update: { deals: ['amount', 'stage'], workOrders: ['revenue', 'status'] },
  unknown: { deals: [], workOrders: [] },
};

const BOARDS_USED: Record<QueryCategory, readonly BoardKind[]> = {
  pipeline_overview: ['deals'],
  revenue_forecast: ['deals', 'work_orders'],
  execution_status: ['work_orders'],
  leadership_update: ['deals', 'work_orders'],
  unknown: [],
};

/** Boards whose records an analysis reads. */
export function boardsUsedBy(category: QueryCategory): readonly BoardKind[] {
  return BOARDS_USED[category];
}

/**
 * Fields a record must have valid to count toward the analysis: the
 * category's own fields, plus sector under a sector filter and the board's
 * date field under a time range.
 */
export function requiredFieldsFor(intent: Pick<QueryIntent, 'category' | 'filters' | 'timeRange'>): RequiredFields {
  const base = BASE_FIELDS[intent.category];
  const deals = [...base.deals];
  const workOrders = [...base.workOrders];
  const used = BOARDS_USED[intent.category];
  const timed = !(intent.timeRange.kind === 'preset' && intent.timeRange.preset === 'all_time');

  if (used.includes('deals')) {
    if (intent.filters.sector.length > 0) deals.push('sector');
    if (timed) deals.push(DEALS_BOARD.dateField);
  }
  if (used.includes('work_orders')) {
    if (intent.filters.sector.length > 0) workOrders.push('sector');
    if (timed) workOrders.push(WORK_ORDERS_BOARD.dateField);
  }
  return { deals, workOrders };
}
