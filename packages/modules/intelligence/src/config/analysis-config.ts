/**
 * Analysis configuration: stage weights and the thresholds the leadership
 * rules and the assembler compare against.
 *
 * Values are configuration, not semantics: callers may override any of them
 * per request, and the process-wide default picks up environment overrides
 * through the runtime config.
 */

import { z } from 'zod';
import { ConfigurationError, toErrorDetails } from '@boardlens/shared';
import { getRuntimeConfig } from '@boardlens/core';
import type { PipelineStage } from '../constants';

const ratio = z.number().min(0).max(1);
const amount = z.number().min(0).finite();

const stageWeightsSchema = z.object({
  Lead: ratio,
  Qualified: ratio,
  Proposal: ratio,
  Negotiation: ratio,
  'Closed Won': ratio,
  'Closed Lost': ratio,
}) satisfies z.ZodType<Record<PipelineStage, number>>;

const analysisConfigShape = z.object({
  stageWeights: stageWeightsSchema,
  /** Weight for deals whose stage is present but unmapped. */
  unknownStageWeight: ratio,
  health: z.object({
    strongWinRate: ratio,
    weakWinRate: ratio,
    weightedPipelineFloor: amount,
    /** Max share of backlog value sitting On Hold before it is a risk. */
    onHoldCeiling: ratio,
  }),
  opportunities: z.object({
    lateStageDealCount: z.number().int().min(1),
    /** Sector share of pipeline value that counts as dominant. */
    dominantSectorShare: ratio,
  }),
  quality: z.object({
    /** Below this confidence (0–100) the response carries a caveat. */
    lowConfidenceThreshold: z.number().min(0).max(100),
    maxWarnings: z.number().int().min(1),
  }),
});

export const analysisConfigSchema = analysisConfigShape.refine(
  (c) => c.health.weakWinRate <= c.health.strongWinRate,
  { message: 'weakWinRate must not exceed strongWinRate', path: ['health', 'weakWinRate'] },
);

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

/** Per-request overrides; each section is merged key by key over the base config. */
export const analysisConfigOverridesSchema = z
  .object({
    stageWeights: stageWeightsSchema.partial(),
    unknownStageWeight: ratio,
    health: analysisConfigShape.shape.health.partial(),
    opportunities: analysisConfigShape.shape.opportunities.partial(),
    quality: analysisConfigShape.shape.quality.partial(),
  })
  .partial()
  .strict();

export type AnalysisConfigOverrides = z.infer<typeof analysisConfigOverridesSchema>;

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  stageWeights: Object.freeze({
    Lead: 0.1,
    Qualified: 0.25,
    Proposal: 0.5,
    Negotiation: 0.75,
    'Closed Won': 1,
    'Closed Lost': 0,
  }),
  unknownStageWeight: 0,
  health: Object.freeze({
    strongWinRate: 0.4,
    weakWinRate: 0.2,
    weightedPipelineFloor: 500_000,
    onHoldCeiling: 0.2,
  }),
  opportunities: Object.freeze({
    lateStageDealCount: 3,
    dominantSectorShare: 0.35,
  }),
  quality: Object.freeze({
    lowConfidenceThreshold: 70,
    maxWarnings: 5,
  }),
});

/** Merge partial overrides over `base` and validate the result. */
export function resolveAnalysisConfig(
  overrides: AnalysisConfigOverrides = {},
  base: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
): AnalysisConfig {
  const merged = {
    stageWeights: { ...base.stageWeights, ...overrides.stageWeights },
    unknownStageWeight: overrides.unknownStageWeight ?? base.unknownStageWeight,
    health: { ...base.health, ...overrides.health },
    opportunities: { ...base.opportunities, ...overrides.opportunities },
    quality: { ...base.quality, ...overrides.quality },
  };

  const parsed = analysisConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid analysis configuration', toErrorDetails(parsed.error));
  }
  return parsed.data;
}

export function stageWeight(config: AnalysisConfig, stage: PipelineStage | null): number {
  return stage === null ? config.unknownStageWeight : config.stageWeights[stage];
}

let _config: AnalysisConfig | null = null;

/** Defaults plus environment threshold overrides, resolved once. */
export function getAnalysisConfig(): AnalysisConfig {
  if (_config) return _config;
  const { thresholds } = getRuntimeConfig();
  const { lowConfidenceThreshold, ...health } = thresholds;
  _config = resolveAnalysisConfig({
    health,
    quality: lowConfidenceThreshold !== undefined ? { lowConfidenceThreshold } : undefined,
  });
  return _config;
}

export function resetAnalysisConfig(): void {
  _config = null;
}
