// ── Canonical vocabularies ───────────────────────────────────────────
// Order matters: distributions and filter sets are reported in this order.

export const SECTORS = [
  'Energy',
  'Technology',
  'Healthcare',
  'Finance',
  'Manufacturing',
  'Retail',
  'Education',
  'Government',
  'Mining',
  'Infrastructure',
] as const;
export type Sector = (typeof SECTORS)[number];

export const PIPELINE_STAGES = [
  'Lead',
  'Qualified',
  'Proposal',
  'Negotiation',
  'Closed Won',
  'Closed Lost',
] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export const OPEN_STAGES: readonly PipelineStage[] = ['Lead', 'Qualified', 'Proposal', 'Negotiation'];
export const LATE_STAGES: readonly PipelineStage[] = ['Proposal', 'Negotiation'];
/** Stages a deal only reaches after qualification (conversion-rate denominator). */
export const QUALIFIED_OR_LATER: readonly PipelineStage[] = ['Qualified', 'Proposal', 'Negotiation', 'Closed Won'];

export const WORK_ORDER_STATUSES = [
  'Planning',
  'In Progress',
  'On Hold',
  'Completed',
  'Cancelled',
] as const;
export type WorkOrderStatus = (typeof WORK_ORDER_STATUSES)[number];

export const BACKLOG_STATUSES: readonly WorkOrderStatus[] = ['Planning', 'In Progress', 'On Hold'];
export const CLOSED_STATUSES: readonly WorkOrderStatus[] = ['Completed', 'Cancelled'];

/** Bucket label for values that are present but match no canonical entry. */
export const UNKNOWN_BUCKET = 'Unknown' as const;

// ── Query categories ─────────────────────────────────────────────────

export const INTENT_CATEGORIES = [
  'leadership_update',
  'pipeline_overview',
  'revenue_forecast',
  'execution_status',
] as const;
export type IntentCategory = (typeof INTENT_CATEGORIES)[number];
export type QueryCategory = IntentCategory | 'unknown';

export const QUERY_CATEGORY_LABELS: Record<QueryCategory, string> = {
  leadership_update: 'Leadership Update',
  pipeline_overview: 'Pipeline Overview',
  revenue_forecast: 'Revenue Forecast',
  execution_status: 'Execution Status',
  unknown: 'Unknown',
};

// ── Time ranges ──────────────────────────────────────────────────────

export const TIME_RANGE_PRESETS = [
  'all_time',
  'this_month',
  'this_quarter',
  'next_quarter',
  'last_quarter',
  'this_year',
  'last_year',
  'last_30_days',
  'last_90_days',
  'next_30_days',
] as const;
export type TimeRangePreset = (typeof TIME_RANGE_PRESETS)[number];

export const TIME_RANGE_LABELS: Record<TimeRangePreset, string> = {
  all_time: 'All Time',
  this_month: 'This Month',
  this_quarter: 'This Quarter',
  next_quarter: 'Next Quarter',
  last_quarter: 'Last Quarter',
  this_year: 'This Year',
  last_year: 'Last Year',
  last_30_days: 'Last 30 Days',
  last_90_days: 'Last 90 Days',
  next_30_days: 'Next 30 Days',
};
