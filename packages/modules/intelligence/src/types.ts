/**
 * Types for the board intelligence pipeline.
 */

import type {
  IntentCategory,
  PipelineStage,
  QueryCategory,
  Sector,
  TimeRangePreset,
  WorkOrderStatus,
} from './constants';

// ── Raw input ────────────────────────────────────────────────────────

export type RawValue = string | number | null;

export type BoardKind = 'deals' | 'work_orders';

export const BOARD_LABELS: Record<BoardKind, string> = {
  deals: 'Deals',
  work_orders: 'Work Orders',
};

/** One board item as fetched: column name → untyped value, in board order. */
export interface RawRecord {
  readonly id: string;
  readonly columns: Readonly<Record<string, RawValue>>;
}

// ── Normalization ────────────────────────────────────────────────────

export type IssueKind = 'MissingField' | 'InvalidFormat' | 'OutOfRange' | 'UnmappedCategory';

/** `YYYY-MM-DD` */
export type CalendarDate = string;

export interface NormalizedField<T> {
  /** Value as received; `undefined` when the column was absent. */
  readonly rawValue: RawValue | undefined;
  readonly value: T | null;
  readonly valid: boolean;
  readonly issue: IssueKind | null;
  /** Human-readable reason when `issue` is set. */
  readonly detail: string | null;
}

/** Field outcome without the typed value: what the validator reads. */
export type FieldOutcome = Pick<NormalizedField<unknown>, 'rawValue' | 'valid' | 'issue' | 'detail'>;

export type CategoryMatch<C extends string> =
  | { readonly kind: 'mapped'; readonly category: C }
  | { readonly kind: 'unmapped'; readonly raw: string };

export interface DealFields {
  readonly name: NormalizedField<string>;
  readonly amount: NormalizedField<number>;
  readonly stage: NormalizedField<CategoryMatch<PipelineStage>>;
  readonly sector: NormalizedField<CategoryMatch<Sector>>;
  readonly closeDate: NormalizedField<CalendarDate>;
  readonly owner: NormalizedField<string>;
  readonly company: NormalizedField<string>;
}

export interface WorkOrderFields {
  readonly name: NormalizedField<string>;
  readonly revenue: NormalizedField<number>;
  readonly status: NormalizedField<CategoryMatch<WorkOrderStatus>>;
  readonly sector: NormalizedField<CategoryMatch<Sector>>;
  readonly startDate: NormalizedField<CalendarDate>;
  readonly endDate: NormalizedField<CalendarDate>;
  readonly projectManager: NormalizedField<string>;
  readonly client: NormalizedField<string>;
}

export type DealFieldName = keyof DealFields;
export type WorkOrderFieldName = keyof WorkOrderFields;

export interface NormalizedRecord<B extends BoardKind, F> {
  readonly id: string;
  readonly board: B;
  readonly fields: F;
}

export type DealRecord = NormalizedRecord<'deals', DealFields>;
export type WorkOrderRecord = NormalizedRecord<'work_orders', WorkOrderFields>;

// ── Validation ───────────────────────────────────────────────────────

export interface ValidationIssue {
  recordId: string;
  board: BoardKind;
  /** Field name, or `_record` when the record itself could not be read. */
  fieldName: string;
  issueKind: IssueKind;
  detail: string;
}

export interface IssueCount {
  board: BoardKind;
  fieldName: string;
  issueKind: IssueKind;
  count: number;
}

export interface DataQualityReport {
  /** 0–100: share of records usable for the fields the analysis needs. */
  confidenceScore: number;
  totalRecords: number;
  validRecords: number;
  /** Sorted by descending count, then field name. */
  warnings: string[];
  issueCounts: IssueCount[];
}

export interface BoardValidation<R> {
  records: R[];
  issues: ValidationIssue[];
  report: DataQualityReport;
}

// ── Query intent ─────────────────────────────────────────────────────

export type TimeRange =
  | { readonly kind: 'preset'; readonly preset: TimeRangePreset }
  | { readonly kind: 'quarter'; readonly quarter: 1 | 2 | 3 | 4; readonly year: number | null };

export interface TimeWindow {
  from: CalendarDate;
  to: CalendarDate;
}

export interface QueryFilters {
  sector: Sector[];
  stage: PipelineStage[];
  status: WorkOrderStatus[];
}

export interface QueryIntent {
  query: string;
  category: QueryCategory;
  timeRange: TimeRange;
  filters: QueryFilters;
  /** 0–1 */
  confidence: number;
  /** Vocabulary terms that contributed to the selected category. */
  matchedTerms: string[];
  scores: Record<IntentCategory, number>;
}

// ── Analysis output ──────────────────────────────────────────────────

export type MetricValue =
  | number
  | string
  | null
  | MetricValue[]
  | { [key: string]: MetricValue };

export type KeyMetrics = { [name: string]: MetricValue };

export interface AnalysisResult {
  executiveSummary: string;
  keyMetrics: KeyMetrics;
  dataQuality: DataQualityReport;
  implications: string[];
}

/** What an individual analyzer contributes before the assembler merges quality data. */
export type AnalyzerOutput = Omit<AnalysisResult, 'dataQuality'>;

export type ResponseStatus = 'ok' | 'no_data' | 'unintelligible';

export interface IntentSummary {
  category: QueryCategory;
  categoryLabel: string;
  confidence: number;
  timeRange: string;
  filters: QueryFilters;
}

export interface BoardResponse extends AnalysisResult {
  runId: string;
  status: ResponseStatus;
  intent: IntentSummary;
}

export interface AnalysisDataset {
  deals: readonly DealRecord[];
  workOrders: readonly WorkOrderRecord[];
}
