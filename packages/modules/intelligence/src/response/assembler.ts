/**
 * Response assembler: turns an intent, a quality report and (when there is
 * something to analyze) analyzer output into a BoardResponse.
 *
 * Three outcomes: `unintelligible` for a query no category matched,
 * `no_data` when the boards the analysis reads have no records left after
 * scoping, `ok` otherwise. No metrics are emitted for the first two.
 */

import { pluralize } from '@boardlens/shared';
import { QUERY_CATEGORY_LABELS } from '../constants';
import type {
  AnalysisDataset,
  AnalyzerOutput,
  BoardResponse,
  CalendarDate,
  DataQualityReport,
  IntentSummary,
  QueryIntent,
} from '../types';
import type { AnalysisConfig } from '../config/analysis-config';
import { computeExecutionFacts } from '../analysis/execution-analyzer';
import { dataConfidenceCaveat, money, percent } from '../analysis/narrative';
import { computePipelineFacts } from '../analysis/pipeline-analyzer';
import { describeTimeRange } from '../query/time-range';

export const NO_DATA_SUMMARY = 'No data available for this query';

export const EXAMPLE_QUERIES: readonly string[] = [
  "How's our pipeline looking this quarter?",
  'What is the revenue forecast for the energy sector?',
  'How many work orders are on hold?',
  'Give me a leadership update.',
];

export function summarizeIntent(intent: QueryIntent): IntentSummary {
  return {
    category: intent.category,
    categoryLabel: QUERY_CATEGORY_LABELS[intent.category],
    confidence: intent.confidence,
    timeRange: describeTimeRange(intent.timeRange),
    filters: {
      sector: [...intent.filters.sector],
      stage: [...intent.filters.stage],
      status: [...intent.filters.status],
    },
  };
}

/** Report with warnings cut to the configured limit; the counts stay whole. */
export function capWarnings(quality: DataQualityReport, maxWarnings: number): DataQualityReport {
  if (quality.warnings.length <= maxWarnings) return quality;
  return { ...quality, warnings: quality.warnings.slice(0, maxWarnings) };
}

function describeScope(intent: QueryIntent): string {
  const parts: string[] = [];
  if (intent.filters.sector.length > 0) parts.push(`sector ${intent.filters.sector.join(', ')}`);
  if (!(intent.timeRange.kind === 'preset' && intent.timeRange.preset === 'all_time')) {
    parts.push(`time range ${describeTimeRange(intent.timeRange)}`);
  }
  return parts.join(' and ');
}

export interface AssembleBase {
  runId: string;
  intent: QueryIntent;
  quality: DataQualityReport;
  config: AnalysisConfig;
}

/** Headline counts over every readable record; null when both boards are empty. */
export function availableDataSnapshot(
  dataset: AnalysisDataset,
  config: AnalysisConfig,
  asOf: CalendarDate,
): string | null {
  const pipeline = computePipelineFacts(dataset.deals, config);
  const execution = computeExecutionFacts(dataset.workOrders, asOf);

  const parts: string[] = [];
  if (pipeline.totalDeals > 0) {
    parts.push(`${pluralize(pipeline.totalDeals, 'deal')} in the pipeline worth ${money(pipeline.totalValueCents)}`);
  }
  if (execution.completionRate !== null) {
    parts.push(`${pluralize(execution.totalOrders, 'work order')} at ${percent(execution.completionRate)} completion`);
  }
  return parts.length > 0 ? `Based on available data: ${parts.join('; ')}.` : null;
}

export function assembleUnintelligible(
  { runId, intent, quality, config }: AssembleBase,
  available: AnalysisDataset,
  asOf: CalendarDate,
): BoardResponse {
  const noMatch = `I couldn't match "${intent.query.trim()}" to a pipeline, revenue, execution or leadership question.`;
  const snapshot = availableDataSnapshot(available, config, asOf);
  return {
    runId,
    status: 'unintelligible',
    intent: summarizeIntent(intent),
    executiveSummary: snapshot ? `${noMatch} ${snapshot}` : noMatch,
    keyMetrics: {},
    dataQuality: capWarnings(quality, config.quality.maxWarnings),
    implications: EXAMPLE_QUERIES.map((q) => `Try asking: "${q}"`),
  };
}

export function assembleNoData({ runId, intent, quality, config }: AssembleBase): BoardResponse {
  const scope = describeScope(intent);
  return {
    runId,
    status: 'no_data',
    intent: summarizeIntent(intent),
    executiveSummary: scope ? `${NO_DATA_SUMMARY} (${scope}).` : `${NO_DATA_SUMMARY}.`,
    keyMetrics: {},
    dataQuality: capWarnings(quality, config.quality.maxWarnings),
    implications: scope
      ? [`No records match ${scope}; widen the filters to see results.`]
      : ['The boards this question needs returned no records.'],
  };
}

export function assembleAnalysis(base: AssembleBase, output: AnalyzerOutput): BoardResponse {
  const { runId, intent, quality, config } = base;
  const implications = [...output.implications];

  if (quality.confidenceScore < config.quality.lowConfidenceThreshold) {
    const caveat = dataConfidenceCaveat(quality.confidenceScore);
    if (!implications.includes(caveat)) implications.push(caveat);
  }

  return {
    runId,
    status: 'ok',
    intent: summarizeIntent(intent),
    executiveSummary: output.executiveSummary,
    keyMetrics: output.keyMetrics,
    dataQuality: capWarnings(quality, config.quality.maxWarnings),
    implications,
  };
}
