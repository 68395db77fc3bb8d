/**
 * Pipeline analyzer: deal counts, stage distribution, weighted pipeline,
 * win and conversion rates.
 *
 * A deal's amount only counts when valid; its weighted contribution needs a
 * valid stage too. Unmapped stages are weighted with `unknownStageWeight`.
 */

import { pluralize, toDollars } from '@boardlens/shared';
import { LATE_STAGES, OPEN_STAGES, PIPELINE_STAGES, QUALIFIED_OR_LATER, SECTORS, UNKNOWN_BUCKET } from '../constants';
import type { PipelineStage } from '../constants';
import type { AnalysisDataset, AnalyzerOutput, DealRecord, KeyMetrics, MetricValue, QueryIntent } from '../types';
import type { AnalysisConfig } from '../config/analysis-config';
import { stageWeight } from '../config/analysis-config';
import { mappedCategory } from '../normalizers/category';
import type { AnalysisContext } from './context';
import type { Bucket } from './distribution';
import {
  categoryBucket,
  centsIn,
  centsOf,
  countOf,
  distributionRows,
  rankByValue,
  ratio,
  reportedRatio,
  sumCents,
  tally,
  valueByBucket,
} from './distribution';
import { money, percent } from './narrative';

// ── Facts ────────────────────────────────────────────────────────────

export interface PipelineFacts {
  totalDeals: number;
  /** Deals with a valid amount. */
  valuedDeals: number;
  totalValueCents: number;
  openValueCents: number;
  weightedCents: number;
  /** Weighted value of open-stage deals only (forecast). */
  openWeightedCents: number;
  wonCount: number;
  lostCount: number;
  wonValueCents: number;
  winRate: number | null;
  conversionRate: number | null;
  averageDealSizeCents: number | null;
  stages: Map<string, Bucket>;
  sectors: Map<string, Bucket>;
  /** Sector buckets over open-stage deals only. */
  openSectors: Map<string, Bucket>;
  lateStageCount: number;
  lateStageCents: number;
}

/** Weighted cents of one deal; null unless amount and stage are both valid. */
export function weightedCentsOf(deal: DealRecord, config: AnalysisConfig): number | null {
  const cents = centsOf(deal.fields.amount);
  const stage = deal.fields.stage;
  if (cents === null || !stage.valid || stage.value === null) return null;
  const weight = stageWeight(config, stage.value.kind === 'mapped' ? stage.value.category : null);
  return Math.round(cents * weight);
}

function isOpen(deal: DealRecord): boolean {
  const stage = mappedCategory(deal.fields.stage);
  return stage !== null && OPEN_STAGES.includes(stage);
}

export function computePipelineFacts(deals: readonly DealRecord[], config: AnalysisConfig): PipelineFacts {
  const amountCents = (d: DealRecord) => centsOf(d.fields.amount);
  const stages = tally(deals, (d) => categoryBucket(d.fields.stage), amountCents);
  const sectors = tally(deals, (d) => categoryBucket(d.fields.sector), amountCents);
  const open = deals.filter(isOpen);

  const valuedDeals = deals.filter((d) => centsOf(d.fields.amount) !== null).length;
  const totalValueCents = sumCents(deals, amountCents);
  const wonCount = countOf(stages, 'Closed Won');
  const lostCount = countOf(stages, 'Closed Lost');
  const qualified = QUALIFIED_OR_LATER.reduce((n, stage) => n + countOf(stages, stage), 0);

  return {
    totalDeals: deals.length,
    valuedDeals,
    totalValueCents,
    openValueCents: centsIn(stages, OPEN_STAGES),
    weightedCents: sumCents(deals, (d) => weightedCentsOf(d, config)),
    openWeightedCents: sumCents(open, (d) => weightedCentsOf(d, config)),
    wonCount,
    lostCount,
    wonValueCents: centsIn(stages, ['Closed Won']),
    winRate: ratio(wonCount, wonCount + lostCount),
    conversionRate: ratio(wonCount, qualified),
    averageDealSizeCents: valuedDeals > 0 ? Math.round(totalValueCents / valuedDeals) : null,
    stages,
    sectors,
    openSectors: tally(open, (d) => categoryBucket(d.fields.sector), amountCents),
    lateStageCount: LATE_STAGES.reduce((n, stage) => n + countOf(stages, stage), 0),
    lateStageCents: centsIn(stages, LATE_STAGES),
  };
}

// ── Metrics ──────────────────────────────────────────────────────────

export function sectorRows(sectors: ReadonlyMap<string, Bucket>): MetricValue[] {
  return rankByValue(sectors, SECTORS).map((b) => ({ sector: b.name, count: b.count, value: toDollars(b.cents) }));
}

export function pipelineMetrics(facts: PipelineFacts, focus: readonly PipelineStage[]): KeyMetrics {
  const metrics: KeyMetrics = {
    total_deals: facts.totalDeals,
    total_value: toDollars(facts.totalValueCents),
    open_pipeline_value: toDollars(facts.openValueCents),
    weighted_pipeline_value: toDollars(facts.weightedCents),
    average_deal_size: facts.averageDealSizeCents === null ? null : toDollars(facts.averageDealSizeCents),
    win_rate: reportedRatio(facts.winRate),
    conversion_rate: reportedRatio(facts.conversionRate),
    closed_won: facts.wonCount,
    closed_lost: facts.lostCount,
    stage_distribution: distributionRows(facts.stages, PIPELINE_STAGES, 'stage'),
    value_by_stage: valueByBucket(facts.stages, PIPELINE_STAGES),
    sector_breakdown: sectorRows(facts.sectors),
    late_stage: { count: facts.lateStageCount, value: toDollars(facts.lateStageCents) },
  };
  if (focus.length > 0) {
    metrics.stage_focus = focus.map((stage) => ({
      stage,
      count: countOf(facts.stages, stage),
      value: toDollars(centsIn(facts.stages, [stage])),
    }));
  }
  return metrics;
}

// ── Narrative ────────────────────────────────────────────────────────

export function winRateSentence(facts: PipelineFacts): string {
  if (facts.winRate === null) return 'No deals have closed yet, so win rate is not available.';
  return `Win rate is ${percent(facts.winRate)} (${facts.wonCount} won, ${facts.lostCount} lost).`;
}

function pipelineImplications(facts: PipelineFacts, focus: readonly PipelineStage[], config: AnalysisConfig): string[] {
  const out: string[] = [];

  if (facts.lateStageCount > 0) {
    out.push(
      `${pluralize(facts.lateStageCount, 'deal')} worth ${money(facts.lateStageCents)} ${facts.lateStageCount === 1 ? 'is' : 'are'} in Proposal or Negotiation and closest to closing.`,
    );
  }
  if (facts.winRate !== null && facts.winRate < config.health.weakWinRate) {
    out.push(`Win rate is below ${percent(config.health.weakWinRate)}; review deal qualification before adding more pipeline.`);
  }
  const unknown = countOf(facts.stages, UNKNOWN_BUCKET);
  if (unknown > 0) {
    out.push(
      `${pluralize(unknown, 'deal')} ${unknown === 1 ? 'has' : 'have'} an unrecognized stage and ${unknown === 1 ? 'is' : 'are'} weighted at ${percent(config.unknownStageWeight)}.`,
    );
  }
  for (const stage of focus) {
    const count = countOf(facts.stages, stage);
    out.push(`${stage}: ${pluralize(count, 'deal')} worth ${money(centsIn(facts.stages, [stage]))}.`);
  }

  if (out.length === 0) out.push('No pipeline exceptions stand out.');
  return out;
}

export function analyzePipeline(
  dataset: AnalysisDataset,
  intent: Pick<QueryIntent, 'filters'>,
  context: AnalysisContext,
): AnalyzerOutput {
  const facts = computePipelineFacts(dataset.deals, context.config);
  const focus = intent.filters.stage;

  return {
    executiveSummary:
      `${pluralize(facts.totalDeals, 'deal')} in the pipeline worth ${money(facts.totalValueCents)}, ` +
      `with a weighted value of ${money(facts.weightedCents)}. ${winRateSentence(facts)}`,
    keyMetrics: pipelineMetrics(facts, focus),
    implications: pipelineImplications(facts, focus, context.config),
  };
}
