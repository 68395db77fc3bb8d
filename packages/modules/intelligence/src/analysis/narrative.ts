/**
 * Narrative fragments: the sentences analyzers and the leadership rules
 * emit. Kept apart from the computations so rules can be tested on signal
 * keys alone.
 */

import { formatMoney, formatPercent, pluralize, toDollars } from '@boardlens/shared';
import type { AnalysisConfig } from '../config/analysis-config';
import type { LeadershipFacts, OpportunitySignal, RiskSignal } from './leadership-rules';

/** Whole-dollar display of an integer-cents amount. */
export function money(cents: number): string {
  return formatMoney(toDollars(cents), 0);
}

export function dollars(amount: number): string {
  return formatMoney(amount, 0);
}

export function percent(ratio: number): string {
  return formatPercent(ratio, 1);
}

export function dataConfidenceCaveat(confidence: number): string {
  return `Data confidence is ${confidence.toFixed(1)}%: some records lack the fields this answer needs, so treat the figures as indicative.`;
}

export function renderRisk(signal: RiskSignal, f: LeadershipFacts, config: AnalysisConfig): string {
  switch (signal) {
    case 'low_win_rate':
      return `Win rate of ${percent(f.winRate ?? 0)} is below ${percent(config.health.weakWinRate)}; deal qualification or competitive positioning needs review.`;
    case 'high_on_hold_backlog':
      return `${percent(f.onHoldRatio ?? 0)} of backlog value (${dollars(f.onHoldValue)}) is On Hold, a sign of delivery blockers.`;
    case 'thin_pipeline':
      return `Open weighted pipeline of ${dollars(f.openWeightedPipeline)} is below the ${dollars(config.health.weightedPipelineFloor)} floor.`;
    case 'overdue_work':
      return `${pluralize(f.overdueCount, 'work order')} worth ${dollars(f.overdueValue)} ${f.overdueCount === 1 ? 'is' : 'are'} past the end date and still open.`;
    case 'low_data_confidence':
      return dataConfidenceCaveat(f.dataConfidence);
  }
}

export function renderOpportunity(signal: OpportunitySignal, f: LeadershipFacts): string {
  switch (signal) {
    case 'dominant_sector':
      return f.topSector
        ? `${f.topSector.sector} holds ${percent(f.topSector.share)} of open pipeline value (${dollars(f.topSector.value)}).`
        : 'One sector dominates the open pipeline.';
    case 'late_stage_deals':
      return `${pluralize(f.lateStageCount, 'deal')} worth ${dollars(f.lateStageValue)} ${f.lateStageCount === 1 ? 'is' : 'are'} in Proposal or Negotiation, close to closing.`;
    case 'strong_win_rate':
      return `Win rate of ${percent(f.winRate ?? 0)} supports expanding the pipeline.`;
    case 'convertible_backlog':
      return `${dollars(f.backlogValue)} of backlog can convert to near-term revenue.`;
  }
}
