export const MODULE_KEY = 'intelligence' as const;
export const MODULE_NAME = 'Board Intelligence';
export const MODULE_VERSION = '0.1.0';

// ── Entry point ──────────────────────────────────────────────────────
export { answerQuery, answerQueryInputSchema } from './answer-query';
export type { AnswerQueryInput } from './answer-query';

// ── Types & vocabulary ───────────────────────────────────────────────
export * from './types';
export * from './constants';
export { VOCABULARY, buildVocabulary, vocabularyKey } from './config/vocabulary';
export type { Vocabulary, CategoryVocabulary } from './config/vocabulary';

// ── Configuration ────────────────────────────────────────────────────
export {
  DEFAULT_ANALYSIS_CONFIG,
  analysisConfigSchema,
  analysisConfigOverridesSchema,
  resolveAnalysisConfig,
  getAnalysisConfig,
  resetAnalysisConfig,
  stageWeight,
} from './config/analysis-config';
export type { AnalysisConfig, AnalysisConfigOverrides } from './config/analysis-config';

// ── Boards ───────────────────────────────────────────────────────────
export * from './boards';

// ── Normalizers ──────────────────────────────────────────────────────
export * from './normalizers';

// ── Validation ───────────────────────────────────────────────────────
export * from './validation';

// ── Query interpretation ─────────────────────────────────────────────
export * from './query';

// ── Analysis ─────────────────────────────────────────────────────────
export * from './analysis';

// ── Response ─────────────────────────────────────────────────────────
export * from './response';
