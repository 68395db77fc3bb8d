import type { BoardResponse, IssueKind, MetricValue, QueryFilters, ResponseStatus } from '../types';
import type { QueryCategory } from '../constants';

/** Flat snake_case document handed to the response boundary. */
export interface WireResponse {
  run_id: string;
  status: ResponseStatus;
  executive_summary: string;
  key_metrics: { [name: string]: MetricValue };
  data_quality: {
    confidence_score: number;
    total_records: number;
    valid_records: number;
    warnings: string[];
    issue_counts: Array<{ board: string; field_name: string; issue_kind: IssueKind; count: number }>;
  };
  implications: string[];
  intent: {
    category: QueryCategory;
    category_label: string;
    confidence: number;
    time_range: string;
    filters: QueryFilters;
  };
}

export function toWireResponse(response: BoardResponse): WireResponse {
  const q = response.dataQuality;
  return {
    run_id: response.runId,
    status: response.status,
    executive_summary: response.executiveSummary,
    key_metrics: response.keyMetrics,
    data_quality: {
      confidence_score: q.confidenceScore,
      total_records: q.totalRecords,
      valid_records: q.validRecords,
      warnings: [...q.warnings],
      issue_counts: q.issueCounts.map((c) => ({
        board: c.board,
        field_name: c.fieldName,
        issue_kind: c.issueKind,
        count: c.count,
      })),
    },
    implications: [...response.implications],
    intent: {
      category: response.intent.category,
      category_label: response.intent.categoryLabel,
      confidence: response.intent.confidence,
      time_range: response.intent.timeRange,
      filters: response.intent.filters,
    },
  };
}
