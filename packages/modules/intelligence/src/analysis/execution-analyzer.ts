/**
 * Execution analyzer: work-order status distribution, completion, delivered
 * revenue, backlog, on-hold exposure and overdue work.
 */

import { differenceInCalendarDays, parseISO } from 'date-fns';
import { pluralize, roundTo, toDollars } from '@boardlens/shared';
import { BACKLOG_STATUSES, CLOSED_STATUSES, UNKNOWN_BUCKET, WORK_ORDER_STATUSES } from '../constants';
import type { WorkOrderStatus } from '../constants';
import type { AnalysisDataset, AnalyzerOutput, CalendarDate, KeyMetrics, QueryIntent, WorkOrderRecord } from '../types';
import type { AnalysisConfig } from '../config/analysis-config';
import type { AnalysisContext } from './context';
import type { Bucket } from './distribution';
import { categoryBucket, centsIn, centsOf, countOf, distributionRows, ratio, reportedRatio, tally } from './distribution';
import { money, percent } from './narrative';
import { sectorRows } from './pipeline-analyzer';

// ── Facts ────────────────────────────────────────────────────────────

export interface ExecutionFacts {
  totalOrders: number;
  statuses: Map<string, Bucket>;
  completedCount: number;
  /** Completed ÷ all work orders; null with none. */
  completionRate: number | null;
  deliveredCents: number;
  backlogCents: number;
  onHoldCents: number;
  /** On-hold share of backlog value; null with no backlog. */
  onHoldRatio: number | null;
  averageCompletionDays: number | null;
  overdueCount: number;
  overdueCents: number;
  sectors: Map<string, Bucket>;
}

/** Days from start to end of a completed order; null unless both dates are valid and ordered. */
export function completionDays(order: WorkOrderRecord): number | null {
  const { startDate, endDate } = order.fields;
  if (!startDate.valid || !endDate.valid || startDate.value === null || endDate.value === null) return null;
  const days = differenceInCalendarDays(parseISO(endDate.value), parseISO(startDate.value));
  return days >= 0 ? days : null;
}

/** Past its end date and neither Completed nor Cancelled. */
export function isOverdue(order: WorkOrderRecord, asOf: CalendarDate): boolean {
  const bucket = categoryBucket(order.fields.status);
  const end = order.fields.endDate;
  if (bucket === null || !end.valid || end.value === null) return false;
  const closed = bucket !== UNKNOWN_BUCKET && CLOSED_STATUSES.includes(bucket);
  return !closed && end.value < asOf;
}

export function computeExecutionFacts(workOrders: readonly WorkOrderRecord[], asOf: CalendarDate): ExecutionFacts {
  const revenueCents = (w: WorkOrderRecord) => centsOf(w.fields.revenue);
  const statuses = tally(workOrders, (w) => categoryBucket(w.fields.status), revenueCents);

  const completedCount = countOf(statuses, 'Completed');

  const durations: number[] = [];
  for (const order of workOrders) {
    if (categoryBucket(order.fields.status) !== 'Completed') continue;
    const days = completionDays(order);
    if (days !== null) durations.push(days);
  }

  const overdue = workOrders.filter((w) => isOverdue(w, asOf));
  const backlogCents = centsIn(statuses, BACKLOG_STATUSES);
  const onHoldCents = centsIn(statuses, ['On Hold']);

  return {
    totalOrders: workOrders.length,
    statuses,
    completedCount,
    completionRate: ratio(completedCount, workOrders.length),
    deliveredCents: centsIn(statuses, ['Completed']),
    backlogCents,
    onHoldCents,
    onHoldRatio: ratio(onHoldCents, backlogCents),
    averageCompletionDays:
      durations.length > 0 ? roundTo(durations.reduce((a, b) => a + b, 0) / durations.length, 1) : null,
    overdueCount: overdue.length,
    overdueCents: overdue.reduce((sum, w) => sum + (revenueCents(w) ?? 0), 0),
    sectors: tally(workOrders, (w) => categoryBucket(w.fields.sector), revenueCents),
  };
}

// ── Metrics ──────────────────────────────────────────────────────────

export function executionMetrics(facts: ExecutionFacts, focus: readonly WorkOrderStatus[]): KeyMetrics {
  const metrics: KeyMetrics = {
    total_work_orders: facts.totalOrders,
    status_distribution: distributionRows(facts.statuses, WORK_ORDER_STATUSES, 'status'),
    completed: facts.completedCount,
    completion_rate: reportedRatio(facts.completionRate),
    delivered_revenue: toDollars(facts.deliveredCents),
    backlog_value: toDollars(facts.backlogCents),
    on_hold_value: toDollars(facts.onHoldCents),
    on_hold_ratio: reportedRatio(facts.onHoldRatio),
    average_completion_days: facts.averageCompletionDays,
    overdue: { count: facts.overdueCount, value: toDollars(facts.overdueCents) },
    sector_breakdown: sectorRows(facts.sectors),
  };
  if (focus.length > 0) {
    metrics.status_focus = focus.map((status) => ({
      status,
      count: countOf(facts.statuses, status),
      value: toDollars(centsIn(facts.statuses, [status])),
    }));
  }
  return metrics;
}

// ── Narrative ────────────────────────────────────────────────────────

function completionSentence(facts: ExecutionFacts): string {
  if (facts.completionRate === null) return 'No work orders to report on, so completion rate is not available.';
  return `${facts.completedCount} completed (${percent(facts.completionRate)}), delivering ${money(facts.deliveredCents)}.`;
}

function executionImplications(
  facts: ExecutionFacts,
  focus: readonly WorkOrderStatus[],
  config: AnalysisConfig,
): string[] {
  const out: string[] = [];

  if (facts.onHoldRatio !== null && facts.onHoldRatio > config.health.onHoldCeiling) {
    out.push(`${money(facts.onHoldCents)} of backlog (${percent(facts.onHoldRatio)}) is On Hold; unblock it to protect delivery.`);
  }
  if (facts.overdueCount > 0) {
    out.push(
      `${pluralize(facts.overdueCount, 'work order')} worth ${money(facts.overdueCents)} ${facts.overdueCount === 1 ? 'is' : 'are'} past the end date and still open.`,
    );
  }
  if (facts.averageCompletionDays !== null) {
    out.push(`Completed work orders took ${facts.averageCompletionDays} days on average.`);
  }
  const unknown = countOf(facts.statuses, UNKNOWN_BUCKET);
  if (unknown > 0) {
    out.push(`${pluralize(unknown, 'work order')} ${unknown === 1 ? 'has' : 'have'} an unrecognized status.`);
  }
  for (const status of focus) {
    const count = countOf(facts.statuses, status);
    out.push(`${status}: ${pluralize(count, 'work order')} worth ${money(centsIn(facts.statuses, [status]))}.`);
  }

  if (out.length === 0) out.push('No execution exceptions stand out.');
  return out;
}

export function analyzeExecution(
  dataset: AnalysisDataset,
  intent: Pick<QueryIntent, 'filters'>,
  context: AnalysisContext,
): AnalyzerOutput {
  const facts = computeExecutionFacts(dataset.workOrders, context.asOf);
  const focus = intent.filters.status;

  return {
    executiveSummary:
      `${pluralize(facts.totalOrders, 'work order')}: ${completionSentence(facts)} ` +
      `Backlog stands at ${money(facts.backlogCents)} across Planning, In Progress and On Hold.`,
    keyMetrics: executionMetrics(facts, focus),
    implications: executionImplications(facts, focus, context.config),
  };
}
