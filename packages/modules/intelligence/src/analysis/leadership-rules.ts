/**
 * Leadership rules: ordered `(predicate, signal)` tables over a flat fact
 * sheet. Health is first-match; risks and opportunities keep every signal
 * whose predicate holds, in table order. Rendering lives in the narrative
 * step so these tables stay testable on their own.
 */

import type { AnalysisConfig } from '../config/analysis-config';

export type HealthRating = 'Strong' | 'Healthy' | 'Needs Attention';

export type RiskSignal =
  | 'low_win_rate'
  | 'high_on_hold_backlog'
  | 'thin_pipeline'
  | 'overdue_work'
  | 'low_data_confidence';

export type OpportunitySignal =
  | 'dominant_sector'
  | 'late_stage_deals'
  | 'strong_win_rate'
  | 'convertible_backlog';

export interface LeadershipFacts {
  winRate: number | null;
  weightedPipeline: number;
  /** Weighted value of open-stage deals. */
  openWeightedPipeline: number;
  onHoldRatio: number | null;
  onHoldValue: number;
  backlogValue: number;
  overdueCount: number;
  overdueValue: number;
  lateStageCount: number;
  lateStageValue: number;
  /** Largest sector by open pipeline value, with its share of that value. */
  topSector: { sector: string; share: number; value: number } | null;
  /** 0–100 */
  dataConfidence: number;
}

export interface Rule<S> {
  signal: S;
  when: (facts: LeadershipFacts, config: AnalysisConfig) => boolean;
}

// ── Predicates ──────────────────────────────────────────────────────

const winRateAtLeast = (f: LeadershipFacts, threshold: number) => f.winRate !== null && f.winRate >= threshold;
const winRateBelow = (f: LeadershipFacts, threshold: number) => f.winRate !== null && f.winRate < threshold;
const onHoldAbove = (f: LeadershipFacts, ceiling: number) => f.onHoldRatio !== null && f.onHoldRatio > ceiling;

// ── Tables ──────────────────────────────────────────────────────────

export const HEALTH_RULES: readonly Rule<HealthRating>[] = [
  {
    signal: 'Strong',
    when: (f, c) => winRateAtLeast(f, c.health.strongWinRate) && f.weightedPipeline > c.health.weightedPipelineFloor,
  },
  {
    signal: 'Needs Attention',
    when: (f, c) => winRateBelow(f, c.health.weakWinRate) || onHoldAbove(f, c.health.onHoldCeiling),
  },
];

export const DEFAULT_HEALTH: HealthRating = 'Healthy';

export const RISK_RULES: readonly Rule<RiskSignal>[] = [
  { signal: 'low_win_rate', when: (f, c) => winRateBelow(f, c.health.weakWinRate) },
  { signal: 'high_on_hold_backlog', when: (f, c) => onHoldAbove(f, c.health.onHoldCeiling) },
  { signal: 'thin_pipeline', when: (f, c) => f.openWeightedPipeline < c.health.weightedPipelineFloor },
  { signal: 'overdue_work', when: (f) => f.overdueCount > 0 },
  { signal: 'low_data_confidence', when: (f, c) => f.dataConfidence < c.quality.lowConfidenceThreshold },
];

export const OPPORTUNITY_RULES: readonly Rule<OpportunitySignal>[] = [
  {
    signal: 'dominant_sector',
    when: (f, c) => f.topSector !== null && f.topSector.share >= c.opportunities.dominantSectorShare,
  },
  { signal: 'late_stage_deals', when: (f, c) => f.lateStageCount >= c.opportunities.lateStageDealCount },
  { signal: 'strong_win_rate', when: (f, c) => winRateAtLeast(f, c.health.strongWinRate) },
  {
    signal: 'convertible_backlog',
    when: (f, c) => f.backlogValue > 0 && !onHoldAbove(f, c.health.onHoldCeiling),
  },
];

// ── Evaluation ──────────────────────────────────────────────────────

export function firstMatch<S>(rules: readonly Rule<S>[], facts: LeadershipFacts, config: AnalysisConfig, fallback: S): S {
  for (const rule of rules) {
    if (rule.when(facts, config)) return rule.signal;
  }
  return fallback;
}

export function allMatches<S>(rules: readonly Rule<S>[], facts: LeadershipFacts, config: AnalysisConfig): S[] {
  return rules.filter((rule) => rule.when(facts, config)).map((rule) => rule.signal);
}

export function classifyHealth(facts: LeadershipFacts, config: AnalysisConfig): HealthRating {
  return firstMatch(HEALTH_RULES, facts, config, DEFAULT_HEALTH);
}
