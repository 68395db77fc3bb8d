/**
 * Vocabulary tables: canonical categories, synonyms, null tokens, intent
 * keywords and time phrases.
 *
 * Loaded once from vocabulary.json, validated, and frozen. Nothing mutates
 * these maps after module load.
 */

import { z } from 'zod';
import { ConfigurationError, toErrorDetails } from '@boardlens/shared';
import {
  INTENT_CATEGORIES,
  PIPELINE_STAGES,
  SECTORS,
  TIME_RANGE_PRESETS,
  WORK_ORDER_STATUSES,
} from '../constants';
import type { IntentCategory, PipelineStage, Sector, TimeRangePreset, WorkOrderStatus } from '../constants';
import { tokenize } from '../query/tokenize';
import rawVocabulary from './vocabulary.json';

// ── Types ────────────────────────────────────────────────────────────

export interface QueryTerm<C extends string> {
  /** Tokenized form, e.g. `oil gas` for "oil & gas". */
  term: string;
  category: C;
}

export interface CategoryVocabulary<C extends string> {
  canonical: readonly C[];
  /** vocabularyKey(synonym or canonical name) → category */
  lookup: ReadonlyMap<string, C>;
  /** Every synonym in tokenized form, for whole-word matching inside longer values. */
  valueTerms: readonly QueryTerm<C>[];
  /** Terms the query interpreter may treat as filter mentions (stop-terms removed). */
  queryTerms: readonly QueryTerm<C>[];
}

export interface WeightedTerm {
  term: string;
  weight: number;
}

export interface IntentVocabulary {
  /** Score at which confidence reaches 1. */
  saturation: number;
  terms: readonly WeightedTerm[];
}

export interface TimePhraseGroup {
  preset: TimeRangePreset;
  phrases: readonly string[];
}

export interface Vocabulary {
  nullTokens: ReadonlySet<string>;
  sectors: CategoryVocabulary<Sector>;
  stages: CategoryVocabulary<PipelineStage>;
  statuses: CategoryVocabulary<WorkOrderStatus>;
  intents: Readonly<Record<IntentCategory, IntentVocabulary>>;
  timePhrases: readonly TimePhraseGroup[];
}

// ── Schema ───────────────────────────────────────────────────────────

const synonymList = z.array(z.string().min(1));

const intentSchema = z.object({
  saturation: z.number().positive(),
  terms: z.record(z.string().min(1), z.number().positive()),
});

const vocabularySchema = z.object({
  nullTokens: z.array(z.string().min(1)),
  sectors: z.record(z.enum(SECTORS), synonymList),
  stages: z.record(z.enum(PIPELINE_STAGES), synonymList),
  statuses: z.record(z.enum(WORK_ORDER_STATUSES), synonymList),
  queryStopTerms: z.array(z.string().min(1)),
  intentKeywords: z.object({
    leadership_update: intentSchema,
    pipeline_overview: intentSchema,
    revenue_forecast: intentSchema,
    execution_status: intentSchema,
  }),
  timePhrases: z.array(
    z.object({
      preset: z.enum(TIME_RANGE_PRESETS),
      phrases: z.array(z.string().min(1)).min(1),
    }),
  ),
});

type VocabularyFile = z.infer<typeof vocabularySchema>;

// ── Builders ─────────────────────────────────────────────────────────

/** Lookup key for a category value: case-folded, whitespace and underscores collapsed. */
export function vocabularyKey(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_]+/g, ' ');
}

function buildCategoryVocabulary<C extends string>(
  table: string,
  canonical: readonly C[],
  synonyms: Partial<Record<C, string[]>>,
  stopTerms: ReadonlySet<string>,
): CategoryVocabulary<C> {
  const lookup = new Map<string, C>();
  const valueTerms: QueryTerm<C>[] = [];
  const seenTerms = new Set<string>();

  for (const category of canonical) {
    for (const entry of [category, ...(synonyms[category] ?? [])]) {
      const key = vocabularyKey(entry);
      const existing = lookup.get(key);
      if (existing && existing !== category) {
        throw new ConfigurationError(
          `Vocabulary "${table}" maps "${entry}" to both ${existing} and ${category}`,
        );
      }
      lookup.set(key, category);

      const term = tokenize(entry).join(' ');
      if (term && !seenTerms.has(term)) {
        seenTerms.add(term);
        valueTerms.push({ term, category });
      }
    }
  }

  return Object.freeze({
    canonical,
    lookup,
    valueTerms: Object.freeze(valueTerms),
    queryTerms: Object.freeze(valueTerms.filter((t) => !stopTerms.has(t.term))),
  });
}

function buildIntentVocabulary(raw: VocabularyFile['intentKeywords'][IntentCategory]): IntentVocabulary {
  return Object.freeze({
    saturation: raw.saturation,
    terms: Object.freeze(
      Object.entries(raw.terms).map(([term, weight]) => ({ term: tokenize(term).join(' '), weight })),
    ),
  });
}

export function buildVocabulary(input: unknown): Vocabulary {
  const parsed = vocabularySchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid vocabulary file', toErrorDetails(parsed.error));
  }
  const file = parsed.data;
  const stopTerms = new Set(file.queryStopTerms.map((t) => tokenize(t).join(' ')));

  const intents: Record<IntentCategory, IntentVocabulary> = {
    leadership_update: buildIntentVocabulary(file.intentKeywords.leadership_update),
    pipeline_overview: buildIntentVocabulary(file.intentKeywords.pipeline_overview),
    revenue_forecast: buildIntentVocabulary(file.intentKeywords.revenue_forecast),
    execution_status: buildIntentVocabulary(file.intentKeywords.execution_status),
  };
  for (const category of INTENT_CATEGORIES) {
    if (intents[category].terms.length === 0) {
      throw new ConfigurationError(`Intent "${category}" has no keywords`);
    }
  }

  return Object.freeze({
    nullTokens: new Set(file.nullTokens.map(vocabularyKey)),
    sectors: buildCategoryVocabulary('sectors', SECTORS, file.sectors, stopTerms),
    stages: buildCategoryVocabulary('stages', PIPELINE_STAGES, file.stages, stopTerms),
    statuses: buildCategoryVocabulary('statuses', WORK_ORDER_STATUSES, file.statuses, stopTerms),
    intents: Object.freeze(intents),
    timePhrases: Object.freeze(
      file.timePhrases.map((g) => Object.freeze({ preset: g.preset, phrases: Object.freeze([...g.phrases]) })),
    ),
  });
}

/** Process-wide vocabulary, built once at module load. */
export const VOCABULARY: Vocabulary = buildVocabulary(rawVocabulary);
