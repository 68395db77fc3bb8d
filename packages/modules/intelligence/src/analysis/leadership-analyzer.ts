/**
 * Leadership analyzer: runs the pipeline, revenue and execution analyses
 * over the scoped dataset and condenses them into a health rating,
 * highlights, risks and opportunities.
 */

import { toDollars } from '@boardlens/shared';
import { SECTORS, UNKNOWN_BUCKET } from '../constants';
import type { AnalysisDataset, AnalyzerOutput, QueryIntent } from '../types';
import type { AnalysisContext } from './context';
import { rankByValue, ratio } from './distribution';
import type { ExecutionFacts } from './execution-analyzer';
import { computeExecutionFacts, executionMetrics } from './execution-analyzer';
import type { LeadershipFacts } from './leadership-rules';
import { allMatches, classifyHealth, OPPORTUNITY_RULES, RISK_RULES } from './leadership-rules';
import { dollars, money, percent, renderOpportunity, renderRisk } from './narrative';
import type { PipelineFacts } from './pipeline-analyzer';
import { computePipelineFacts, pipelineMetrics, winRateSentence } from './pipeline-analyzer';
import type { RevenueFacts } from './revenue-analyzer';
import { computeRevenueFacts, revenueMetrics } from './revenue-analyzer';

const MAX_HIGHLIGHTS = 3;

export function topOpenSector(pipeline: PipelineFacts): LeadershipFacts['topSector'] {
  let total = 0;
  for (const b of pipeline.openSectors.values()) total += b.cents;
  const [top] = rankByValue(pipeline.openSectors, SECTORS).filter((b) => b.name !== UNKNOWN_BUCKET);
  const share = top ? ratio(top.cents, total) : null;
  if (!top || share === null || top.cents <= 0) return null;
  return { sector: top.name, share, value: toDollars(top.cents) };
}

export function buildLeadershipFacts(
  pipeline: PipelineFacts,
  execution: ExecutionFacts,
  dataConfidence: number,
): LeadershipFacts {
  return {
    winRate: pipeline.winRate,
    weightedPipeline: toDollars(pipeline.weightedCents),
    openWeightedPipeline: toDollars(pipeline.openWeightedCents),
    onHoldRatio: execution.onHoldRatio,
    onHoldValue: toDollars(execution.onHoldCents),
    backlogValue: toDollars(execution.backlogCents),
    overdueCount: execution.overdueCount,
    overdueValue: toDollars(execution.overdueCents),
    lateStageCount: pipeline.lateStageCount,
    lateStageValue: toDollars(pipeline.lateStageCents),
    topSector: topOpenSector(pipeline),
    dataConfidence,
  };
}

/** Sentences for the first available headline metrics, in fixed priority. */
export function buildHighlights(pipeline: PipelineFacts, revenue: RevenueFacts, execution: ExecutionFacts): string[] {
  const candidates: Array<string | null> = [
    pipeline.totalDeals > 0
      ? `Weighted pipeline of ${money(pipeline.weightedCents)} across ${pipeline.totalDeals} deals.`
      : null,
    pipeline.winRate !== null ? winRateSentence(pipeline) : null,
    execution.completionRate !== null
      ? `${percent(execution.completionRate)} of work orders completed, delivering ${money(execution.deliveredCents)}.`
      : null,
    revenue.recognizedCents > 0 ? `Recognized revenue of ${money(revenue.recognizedCents)}.` : null,
  ];
  return candidates.filter((c): c is string => c !== null).slice(0, MAX_HIGHLIGHTS);
}

export function analyzeLeadership(
  dataset: AnalysisDataset,
  intent: Pick<QueryIntent, 'filters'>,
  context: AnalysisContext,
): AnalyzerOutput {
  const { config } = context;
  const pipeline = computePipelineFacts(dataset.deals, config);
  const revenue = computeRevenueFacts(dataset.deals, dataset.workOrders, config);
  const execution = computeExecutionFacts(dataset.workOrders, context.asOf);

  const facts = buildLeadershipFacts(pipeline, execution, context.dataConfidence);
  const health = classifyHealth(facts, config);
  const riskSignals = allMatches(RISK_RULES, facts, config);
  const opportunitySignals = allMatches(OPPORTUNITY_RULES, facts, config);
  const highlights = buildHighlights(pipeline, revenue, execution);
  const risks = riskSignals.map((s) => renderRisk(s, facts, config));
  const opportunities = opportunitySignals.map((s) => renderOpportunity(s, facts));

  const summary = [`Pipeline health is ${health}.`, ...highlights].join(' ');

  return {
    executiveSummary: summary,
    keyMetrics: {
      pipeline_health: health,
      highlights,
      risks,
      opportunities,
      risk_signals: riskSignals,
      opportunity_signals: opportunitySignals,
      weighted_pipeline_floor: config.health.weightedPipelineFloor,
      pipeline: pipelineMetrics(pipeline, intent.filters.stage),
      revenue: revenueMetrics(revenue),
      execution: executionMetrics(execution, intent.filters.status),
    },
    implications: [
      ...(risks.length > 0 ? risks : ['No significant risks identified.']),
      ...(opportunities.length > 0 ? opportunities : [`Keep converting the ${dollars(facts.openWeightedPipeline)} weighted open pipeline.`]),
    ],
  };
}
