/**
 * Runtime configuration: everything the process reads from its environment.
 *
 * Resolved once and memoized; resolving applies the log level. Threshold
 * overrides are left partial so the analysis layer can merge them over its
 * own defaults.
 */

import { z } from 'zod';
import { ConfigurationError, toErrorDetails } from '@boardlens/shared';
import { parseLogLevel, setLogLevel } from '../observability/logger';
import type { LogLevel } from '../observability/logger';

export interface ThresholdOverrides {
  strongWinRate?: number;
  weakWinRate?: number;
  weightedPipelineFloor?: number;
  onHoldCeiling?: number;
  lowConfidenceThreshold?: number;
}

export interface RuntimeConfig {
  logLevel: LogLevel;
  thresholds: ThresholdOverrides;
}

const optionalNumber = z.coerce.number().finite().optional();

const envSchema = z.object({
  LOG_LEVEL: z.string().optional(),
  BOARDLENS_STRONG_WIN_RATE: optionalNumber,
  BOARDLENS_WEAK_WIN_RATE: optionalNumber,
  BOARDLENS_WEIGHTED_PIPELINE_FLOOR: optionalNumber,
  BOARDLENS_ON_HOLD_CEILING: optionalNumber,
  BOARDLENS_LOW_CONFIDENCE_THRESHOLD: optionalNumber,
});

// Empty strings in the environment mean "unset".
function stripEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function parseRuntimeConfig(env: NodeJS.ProcessEnv): RuntimeConfig {
  const parsed = envSchema.safeParse(stripEmpty(env));
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', toErrorDetails(parsed.error));
  }
  const e = parsed.data;

  const thresholds: ThresholdOverrides = {};
  if (e.BOARDLENS_STRONG_WIN_RATE !== undefined) thresholds.strongWinRate = e.BOARDLENS_STRONG_WIN_RATE;
  if (e.BOARDLENS_WEAK_WIN_RATE !== undefined) thresholds.weakWinRate = e.BOARDLENS_WEAK_WIN_RATE;
  if (e.BOARDLENS_WEIGHTED_PIPELINE_FLOOR !== undefined) thresholds.weightedPipelineFloor = e.BOARDLENS_WEIGHTED_PIPELINE_FLOOR;
  if (e.BOARDLENS_ON_HOLD_CEILING !== undefined) thresholds.onHoldCeiling = e.BOARDLENS_ON_HOLD_CEILING;
  if (e.BOARDLENS_LOW_CONFIDENCE_THRESHOLD !== undefined) thresholds.lowConfidenceThreshold = e.BOARDLENS_LOW_CONFIDENCE_THRESHOLD;

  return {
    logLevel: parseLogLevel(e.LOG_LEVEL),
    thresholds,
  };
}

let _config: RuntimeConfig | null = null;

export function getRuntimeConfig(): RuntimeConfig {
  if (_config) return _config;
  _config = parseRuntimeConfig(process.env);
  setLogLevel(_config.logLevel);
  return _config;
}

/** Drop the memoized config (tests that mutate process.env). */
export function resetRuntimeConfig(): void {
  _config = null;
}
