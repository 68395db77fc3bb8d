import { describe, it, expect } from 'vitest';
import {
  analyzeLeadership,
  buildLeadershipFacts,
  classifyHealth,
  computeExecutionFacts,
  computePipelineFacts,
  OPPORTUNITY_RULES,
  RISK_RULES,
} from '../analysis';
import type { LeadershipFacts } from '../analysis';
import { allMatches } from '../analysis/leadership-rules';
import { renderOpportunity, renderRisk } from '../analysis/narrative';
import { pipelineMetrics } from '../analysis/pipeline-analyzer';
import { DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from '../config/analysis-config';
import { deal, executionOrders, noFilters, pipelineDeals, testContext } from './fixtures';

function facts(overrides: Partial<LeadershipFacts> = {}): LeadershipFacts {
  return {
    winRate: 0.3,
    weightedPipeline: 800000,
    openWeightedPipeline: 600000,
    onHoldRatio: 0.1,
    onHoldValue: 10000,
    backlogValue: 100000,
    overdueCount: 0,
    overdueValue: 0,
    lateStageCount: 1,
    lateStageValue: 50000,
    topSector: { sector: 'Energy', share: 0.3, value: 180000 },
    dataConfidence: 95,
    ...overrides,
  };
}

describe('classifyHealth', () => {
  const config = DEFAULT_ANALYSIS_CONFIG;

  it('is Strong with a high win rate above the pipeline floor', () => {
    expect(classifyHealth(facts({ winRate: 0.4 }), config)).toBe('Strong');
  });

  it('is not Strong below the pipeline floor', () => {
    expect(classifyHealth(facts({ winRate: 0.5, weightedPipeline: 500000 }), config)).toBe('Healthy');
  });

  it('needs attention on a weak win rate or a large on-hold share', () => {
    expect(classifyHealth(facts({ winRate: 0.19 }), config)).toBe('Needs Attention');
    expect(classifyHealth(facts({ winRate: null, onHoldRatio: 0.25 }), config)).toBe('Needs Attention');
  });

  it('takes the first matching rule', () => {
    expect(classifyHealth(facts({ winRate: 0.45, onHoldRatio: 0.9 }), config)).toBe('Strong');
  });

  it('defaults to Healthy, including when win rate is undefined', () => {
    expect(classifyHealth(facts(), config)).toBe('Healthy');
    expect(classifyHealth(facts({ winRate: null }), config)).toBe('Healthy');
  });

  it('follows configured thresholds', () => {
    const strict = resolveAnalysisConfig({ health: { strongWinRate: 0.6 } });
    expect(classifyHealth(facts({ winRate: 0.5 }), strict)).toBe('Healthy');
  });

  it('compares the unrounded win rate against thresholds', () => {
    const deals = [
      deal({ Amount: 400000, Stage: 'Closed Won', Sector: 'Energy' }),
      deal({ Amount: 400000, Stage: 'Closed Won', Sector: 'Energy' }),
      deal({ Amount: 100000, Stage: 'Closed Lost', Sector: 'Energy' }),
    ];
    const strict = resolveAnalysisConfig({ health: { strongWinRate: 0.6667 } });
    const pipeline = computePipelineFacts(deals, strict);
    const leadership = buildLeadershipFacts(pipeline, computeExecutionFacts([], '2024-06-30'), 100);

    expect(pipelineMetrics(pipeline, []).win_rate).toBe(0.6667);
    expect(leadership.weightedPipeline).toBe(800000);
    expect(classifyHealth(leadership, strict)).toBe('Healthy');
  });
});

describe('risk and opportunity rules', () => {
  const config = DEFAULT_ANALYSIS_CONFIG;

  it('emits nothing for an unremarkable fact sheet', () => {
    expect(allMatches(RISK_RULES, facts(), config)).toEqual([]);
    expect(allMatches(OPPORTUNITY_RULES, facts({ backlogValue: 0 }), config)).toEqual([]);
  });

  it('emits every matching risk in table order', () => {
    const signals = allMatches(
      RISK_RULES,
      facts({ winRate: 0.1, onHoldRatio: 0.5, openWeightedPipeline: 1000, overdueCount: 3, dataConfidence: 40 }),
      config,
    );
    expect(signals).toEqual(['low_win_rate', 'high_on_hold_backlog', 'thin_pipeline', 'overdue_work', 'low_data_confidence']);
  });

  it('emits every matching opportunity in table order', () => {
    const signals = allMatches(
      OPPORTUNITY_RULES,
      facts({ winRate: 0.45, lateStageCount: 3, topSector: { sector: 'Energy', share: 0.35, value: 1 } }),
      config,
    );
    expect(signals).toEqual(['dominant_sector', 'late_stage_deals', 'strong_win_rate', 'convertible_backlog']);
  });

  it('renders signals as sentences', () => {
    expect(renderRisk('thin_pipeline', facts({ openWeightedPipeline: 120000 }), config)).toBe(
      'Open weighted pipeline of $120,000 is below the $500,000 floor.',
    );
    expect(renderOpportunity('convertible_backlog', facts())).toBe('$100,000 of backlog can convert to near-term revenue.');
  });
});

describe('analyzeLeadership', () => {
  const dataset = { deals: pipelineDeals(), workOrders: executionOrders() };

  it('rates health and lists highlights, risks and opportunities', () => {
    const result = analyzeLeadership(dataset, noFilters(), testContext());

    expect(result.keyMetrics.pipeline_health).toBe('Strong');
    expect(result.keyMetrics.highlights).toEqual([
      'Weighted pipeline of $1,010,000 across 8 deals.',
      'Win rate is 50.0% (1 won, 1 lost).',
      '25.0% of work orders completed, delivering $100,000.',
    ]);
    expect(result.keyMetrics.risk_signals).toEqual(['high_on_hold_backlog', 'overdue_work']);
    expect(result.keyMetrics.opportunity_signals).toEqual(['dominant_sector', 'strong_win_rate']);
    expect(result.executiveSummary).toBe(
      'Pipeline health is Strong. Weighted pipeline of $1,010,000 across 8 deals. ' +
        'Win rate is 50.0% (1 won, 1 lost). 25.0% of work orders completed, delivering $100,000.',
    );
    expect(result.implications).toEqual([
      '30.0% of backlog value ($30,000) is On Hold, a sign of delivery blockers.',
      '2 work orders worth $55,000 are past the end date and still open.',
      'Technology holds 70.0% of open pipeline value ($700,000).',
      'Win rate of 50.0% supports expanding the pipeline.',
    ]);
  });

  it('nests the pipeline, revenue and execution metrics', () => {
    const { keyMetrics } = analyzeLeadership(dataset, noFilters(), testContext());
    expect(keyMetrics.pipeline).toMatchObject({ total_deals: 8, win_rate: 0.5 });
    expect(keyMetrics.revenue).toMatchObject({ recognized_revenue: 600000 });
    expect(keyMetrics.execution).toMatchObject({ total_work_orders: 8, backlog_value: 100000 });
  });

  it('flags low data confidence as a risk', () => {
    const result = analyzeLeadership(dataset, noFilters(), testContext({ dataConfidence: 50 }));
    expect(result.keyMetrics.risk_signals).toContain('low_data_confidence');
  });
});
