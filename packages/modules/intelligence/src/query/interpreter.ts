/**
 * Query interpreter: free text → QueryIntent.
 *
 * Rule-based and deterministic. Each intent category has a weighted keyword
 * list; the best-scoring category wins, ties going to the broader category
 * (INTENT_CATEGORIES order). Time range and filters are extracted
 * independently of the category.
 */

import { INTENT_CATEGORIES } from '../constants';
import type { IntentCategory, QueryCategory } from '../constants';
import type { CategoryVocabulary, Vocabulary } from '../config/vocabulary';
import { VOCABULARY } from '../config/vocabulary';
import type { QueryFilters, QueryIntent, TimeRange } from '../types';
import { ALL_TIME } from './time-range';
import { containsTerm, toSearchText } from './tokenize';

// ── Category scoring ────────────────────────────────────────────────

interface CategoryScore {
  category: IntentCategory;
  score: number;
  matchedTerms: string[];
}

function scoreCategory(search: string, category: IntentCategory, vocabulary: Vocabulary): CategoryScore {
  const matchedTerms: string[] = [];
  let score = 0;
  for (const { term, weight } of vocabulary.intents[category].terms) {
    if (containsTerm(search, term)) {
      matchedTerms.push(term);
      score += weight;
    }
  }
  return { category, score, matchedTerms };
}

// ── Time range ──────────────────────────────────────────────────────

const QUARTER_MENTION = / q([1-4])(?: (\d{4}))? /;

export function extractTimeRange(query: string, vocabulary: Vocabulary = VOCABULARY): TimeRange {
  const search = toSearchText(query);
  const quarter = QUARTER_MENTION.exec(search);
  if (quarter) {
    const q = Number(quarter[1]);
    if (q === 1 || q === 2 || q === 3 || q === 4) {
      const year = quarter[2] ? Number(quarter[2]) : null;
      return { kind: 'quarter', quarter: q, year };
    }
  }

  for (const group of vocabulary.timePhrases) {
    if (group.phrases.some((phrase) => containsTerm(search, phrase))) {
      return { kind: 'preset', preset: group.preset };
    }
  }
  return ALL_TIME;
}

// ── Filters ─────────────────────────────────────────────────────────

function scanCategories<C extends string>(search: string, vocabulary: CategoryVocabulary<C>): C[] {
  const hits = new Set<C>();
  for (const { term, category } of vocabulary.queryTerms) {
    if (containsTerm(search, term)) hits.add(category);
  }
  // report in canonical order, not match order
  return vocabulary.canonical.filter((c) => hits.has(c));
}

export function extractFilters(query: string, vocabulary: Vocabulary = VOCABULARY): QueryFilters {
  const search = toSearchText(query);
  return {
    sector: scanCategories(search, vocabulary.sectors),
    stage: scanCategories(search, vocabulary.stages),
    status: scanCategories(search, vocabulary.statuses),
  };
}

// ── Interpreter ─────────────────────────────────────────────────────

export function interpretQuery(query: string, vocabulary: Vocabulary = VOCABULARY): QueryIntent {
  const search = toSearchText(query);

  let best: CategoryScore | null = null;
  const scores: Record<IntentCategory, number> = {
    leadership_update: 0,
    pipeline_overview: 0,
    revenue_forecast: 0,
    execution_status: 0,
  };
  for (const category of INTENT_CATEGORIES) {
    const result = scoreCategory(search, category, vocabulary);
    scores[category] = result.score;
    // strict > keeps the earlier (higher-priority) category on ties
    if (result.score > 0 && (best === null || result.score > best.score)) best = result;
  }

  const category: QueryCategory = best ? best.category : 'unknown';
  const confidence = best ? Math.min(1, best.score / vocabulary.intents[best.category].saturation) : 0;

  return {
    query,
    category,
    timeRange: extractTimeRange(query, vocabulary),
    filters: extractFilters(query, vocabulary),
    confidence,
    matchedTerms: best ? best.matchedTerms : [],
    scores,
  };
}
