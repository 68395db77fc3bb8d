import { describe, it, expect } from 'vitest';
import {
  assembleAnalysis,
  assembleNoData,
  assembleUnintelligible,
  availableDataSnapshot,
  capWarnings,
  EXAMPLE_QUERIES,
  toWireResponse,
} from '../response';
import type { AssembleBase } from '../response';
import { DEFAULT_ANALYSIS_CONFIG } from '../config/analysis-config';
import { buildQualityReport } from '../validation';
import { dataConfidenceCaveat } from '../analysis';
import type { IssueCount, QueryIntent } from '../types';
import { executionOrders, pipelineDeals } from './fixtures';

function intent(overrides: Partial<QueryIntent> = {}): QueryIntent {
  return {
    query: 'How is the pipeline?',
    category: 'pipeline_overview',
    timeRange: { kind: 'preset', preset: 'all_time' },
    filters: { sector: [], stage: [], status: [] },
    confidence: 0.5,
    matchedTerms: ['pipeline'],
    scores: { leadership_update: 0, pipeline_overview: 2, revenue_forecast: 0, execution_status: 0 },
    ...overrides,
  };
}

function base(overrides: Partial<AssembleBase> = {}): AssembleBase {
  return {
    runId: 'run-1',
    intent: intent(),
    quality: buildQualityReport(10, 10, []),
    config: DEFAULT_ANALYSIS_CONFIG,
    ...overrides,
  };
}

function missing(fieldName: string, count: number): IssueCount {
  return { board: 'deals', fieldName, issueKind: 'MissingField', count };
}

describe('capWarnings', () => {
  it('keeps the first warnings and every issue count', () => {
    const counts = [7, 6, 5, 4, 3, 2, 1].map((n, i) => missing(`field${i}`, n));
    const quality = buildQualityReport(20, 10, counts);

    const capped = capWarnings(quality, 5);

    expect(capped.warnings).toHaveLength(5);
    expect(capped.warnings[0]).toBe("7 records missing 'field0' field (Deals)");
    expect(capped.issueCounts).toHaveLength(7);
  });

  it('returns the report unchanged under the limit', () => {
    const quality = buildQualityReport(4, 3, [missing('amount', 1)]);
    expect(capWarnings(quality, 5)).toBe(quality);
  });
});

describe('assembleAnalysis', () => {
  const output = { executiveSummary: 'Summary.', keyMetrics: { total_deals: 3 }, implications: ['One.'] };

  it('passes analyzer output through with status ok', () => {
    const response = assembleAnalysis(base(), output);

    expect(response.status).toBe('ok');
    expect(response.runId).toBe('run-1');
    expect(response.executiveSummary).toBe('Summary.');
    expect(response.keyMetrics).toEqual({ total_deals: 3 });
    expect(response.implications).toEqual(['One.']);
    expect(response.intent).toEqual({
      category: 'pipeline_overview',
      categoryLabel: 'Pipeline Overview',
      confidence: 0.5,
      timeRange: 'All Time',
      filters: { sector: [], stage: [], status: [] },
    });
  });

  it('appends a caveat when confidence is low', () => {
    const quality = buildQualityReport(4, 2, [missing('amount', 2)]);
    const response = assembleAnalysis(base({ quality }), output);

    expect(response.implications).toEqual([
      'One.',
      'Data confidence is 50.0%: some records lack the fields this answer needs, so treat the figures as indicative.',
    ]);
  });

  it('does not repeat a caveat the analyzer already gave', () => {
    const quality = buildQualityReport(4, 2, [missing('amount', 2)]);
    const withCaveat = { ...output, implications: [dataConfidenceCaveat(50)] };

    expect(assembleAnalysis(base({ quality }), withCaveat).implications).toHaveLength(1);
  });
});

describe('assembleNoData', () => {
  it('names the scope that matched nothing', () => {
    const scoped = intent({
      filters: { sector: ['Mining'], stage: [], status: [] },
      timeRange: { kind: 'quarter', quarter: 3, year: 2024 },
    });
    const response = assembleNoData(base({ intent: scoped }));

    expect(response.status).toBe('no_data');
    expect(response.executiveSummary).toBe('No data available for this query (sector Mining and time range Q3 2024).');
    expect(response.keyMetrics).toEqual({});
    expect(response.implications).toEqual([
      'No records match sector Mining and time range Q3 2024; widen the filters to see results.',
    ]);
  });

  it('reports empty boards without a scope', () => {
    const response = assembleNoData(base());
    expect(response.executiveSummary).toBe('No data available for this query.');
    expect(response.implications).toEqual(['The boards this question needs returned no records.']);
  });
});

describe('assembleUnintelligible', () => {
  it('echoes the query and suggests examples', () => {
    const response = assembleUnintelligible(
      base({ intent: intent({ query: '  asdf  ', category: 'unknown', confidence: 0 }) }),
      { deals: [], workOrders: [] },
      '2024-06-30',
    );

    expect(response.status).toBe('unintelligible');
    expect(response.executiveSummary).toBe(
      'I couldn\'t match "asdf" to a pipeline, revenue, execution or leadership question.',
    );
    expect(response.keyMetrics).toEqual({});
    expect(response.implications).toHaveLength(EXAMPLE_QUERIES.length);
    expect(response.implications[0]).toBe(`Try asking: "${EXAMPLE_QUERIES[0]}"`);
    expect(response.intent.categoryLabel).toBe('Unknown');
  });

  it('adds a snapshot of the available data without metrics', () => {
    const response = assembleUnintelligible(
      base({ intent: intent({ query: 'asdf', category: 'unknown', confidence: 0 }) }),
      { deals: pipelineDeals(), workOrders: executionOrders() },
      '2024-06-30',
    );

    expect(response.executiveSummary).toBe(
      'I couldn\'t match "asdf" to a pipeline, revenue, execution or leadership question. ' +
        'Based on available data: 8 deals in the pipeline worth $2,150,000; 8 work orders at 25.0% completion.',
    );
    expect(response.keyMetrics).toEqual({});
  });
});

describe('availableDataSnapshot', () => {
  it('mentions only the boards that have records', () => {
    expect(availableDataSnapshot({ deals: pipelineDeals(), workOrders: [] }, DEFAULT_ANALYSIS_CONFIG, '2024-06-30')).toBe(
      'Based on available data: 8 deals in the pipeline worth $2,150,000.',
    );
    expect(availableDataSnapshot({ deals: [], workOrders: executionOrders() }, DEFAULT_ANALYSIS_CONFIG, '2024-06-30')).toBe(
      'Based on available data: 8 work orders at 25.0% completion.',
    );
    expect(availableDataSnapshot({ deals: [], workOrders: [] }, DEFAULT_ANALYSIS_CONFIG, '2024-06-30')).toBeNull();
  });
});

describe('toWireResponse', () => {
  it('renames every field to snake_case', () => {
    const quality = buildQualityReport(4, 3, [missing('amount', 1)]);
    const wire = toWireResponse(assembleNoData(base({ quality })));

    expect(wire).toEqual({
      run_id: 'run-1',
      status: 'no_data',
      executive_summary: 'No data available for this query.',
      key_metrics: {},
      data_quality: {
        confidence_score: 75,
        total_records: 4,
        valid_records: 3,
        warnings: ["1 record missing 'amount' field (Deals)"],
        issue_counts: [{ board: 'deals', field_name: 'amount', issue_kind: 'MissingField', count: 1 }],
      },
      implications: ['The boards this question needs returned no records.'],
      intent: {
        category: 'pipeline_overview',
        category_label: 'Pipeline Overview',
        confidence: 0.5,
        time_range: 'All Time',
        filters: { sector: [], stage: [], status: [] },
      },
    });
  });
});
