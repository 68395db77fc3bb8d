import type { DealRecord, QueryFilters, RawRecord, RawValue, WorkOrderRecord } from '../types';
import { normalizeDeal } from '../boards/deals';
import { normalizeWorkOrder } from '../boards/work-orders';
import { DEFAULT_ANALYSIS_CONFIG } from '../config/analysis-config';
import type { AnalysisContext } from '../analysis/context';

let seq = 0;

export function rawRecord(columns: Record<string, RawValue>, id = `rec-${++seq}`): RawRecord {
  return { id, columns };
}

export function deal(columns: Record<string, RawValue>): DealRecord {
  return normalizeDeal(rawRecord(columns));
}

export function workOrder(columns: Record<string, RawValue>): WorkOrderRecord {
  return normalizeWorkOrder(rawRecord(columns));
}

export function noFilters(overrides: Partial<QueryFilters> = {}): { filters: QueryFilters } {
  return { filters: { sector: [], stage: [], status: [], ...overrides } };
}

export function testContext(overrides: Partial<AnalysisContext> = {}): AnalysisContext {
  return { config: DEFAULT_ANALYSIS_CONFIG, asOf: '2024-06-15', dataConfidence: 100, ...overrides };
}

/** Eight deals covering every stage, an unmapped stage and a missing amount. */
export function pipelineDeals(): DealRecord[] {
  return [
    deal({ 'Item Name': 'D1', Amount: 100000, Stage: 'Lead', Sector: 'Energy' }),
    deal({ 'Item Name': 'D2', Amount: '$200,000', Stage: 'Qualified', Sector: 'Energy' }),
    deal({ 'Item Name': 'D3', Amount: '300000', Stage: 'Proposal', Sector: 'Technology' }),
    deal({ 'Item Name': 'D4', Amount: 400000, Stage: 'Negotiation', Sector: 'tech' }),
    deal({ 'Item Name': 'D5', Amount: 500000, Stage: 'Closed Won', Sector: 'Finance' }),
    deal({ 'Item Name': 'D6', Amount: 600000, Stage: 'Closed Lost', Sector: 'banking' }),
    deal({ 'Item Name': 'D7', Amount: 50000, Stage: 'Mystery', Sector: 'Aerospace' }),
    deal({ 'Item Name': 'D8', Amount: null, Stage: 'Lead', Sector: 'Energy' }),
  ];
}

/** Eight work orders; with asOf 2024-06-15 two are overdue. */
export function executionOrders(): WorkOrderRecord[] {
  return [
    workOrder({ 'Item Name': 'W1', Revenue: 80000, Status: 'Completed', 'Start Date': '2024-01-01', 'End Date': '2024-01-31' }),
    workOrder({ 'Item Name': 'W2', Revenue: 20000, Status: 'done', 'Start Date': '2024-02-01', 'End Date': '2024-02-11' }),
    workOrder({ 'Item Name': 'W3', Revenue: 50000, Status: 'In Progress', 'End Date': '2024-05-01' }),
    workOrder({ 'Item Name': 'W4', Revenue: 30000, Status: 'On Hold', 'End Date': '2024-07-01' }),
    workOrder({ 'Item Name': 'W5', Revenue: 20000, Status: 'Planning' }),
    workOrder({ 'Item Name': 'W6', Revenue: 10000, Status: 'Cancelled', 'End Date': '2024-01-01' }),
    workOrder({ 'Item Name': 'W7', Revenue: 5000, Status: 'Mystery', 'End Date': '2024-06-01' }),
    workOrder({ 'Item Name': 'W8', Revenue: 7000, Status: null }),
  ];
}
