import type { IntentCategory } from '../constants';
import type { AnalysisDataset, AnalyzerOutput, QueryIntent } from '../types';
import type { AnalysisContext } from './context';
import { analyzeExecution } from './execution-analyzer';
import { analyzeLeadership } from './leadership-analyzer';
import { analyzePipeline } from './pipeline-analyzer';
import { analyzeRevenue } from './revenue-analyzer';

export type Analyzer = (
  dataset: AnalysisDataset,
  intent: Pick<QueryIntent, 'filters'>,
  context: AnalysisContext,
) => AnalyzerOutput;

export const ANALYZERS: Readonly<Record<IntentCategory, Analyzer>> = {
  leadership_update: analyzeLeadership,
  pipeline_overview: analyzePipeline,
  revenue_forecast: analyzeRevenue,
  execution_status: analyzeExecution,
};

export type { AnalysisContext } from './context';
export { scopeDataset } from './scope';
export { requiredFieldsFor, boardsUsedBy } from './required-fields';
export type { RequiredFields } from './required-fields';
export { analyzePipeline, computePipelineFacts, weightedCentsOf } from './pipeline-analyzer';
export type { PipelineFacts } from './pipeline-analyzer';
export { analyzeRevenue, computeRevenueFacts } from './revenue-analyzer';
export type { RevenueFacts } from './revenue-analyzer';
export { analyzeExecution, computeExecutionFacts } from './execution-analyzer';
export type { ExecutionFacts } from './execution-analyzer';
export { analyzeLeadership, buildLeadershipFacts, buildHighlights } from './leadership-analyzer';
export { classifyHealth, HEALTH_RULES, RISK_RULES, OPPORTUNITY_RULES } from './leadership-rules';
export type { HealthRating, LeadershipFacts, RiskSignal, OpportunitySignal, Rule } from './leadership-rules';
export { dataConfidenceCaveat } from './narrative';
