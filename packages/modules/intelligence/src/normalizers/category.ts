/**
 * Category normalizers (sector, pipeline stage, work-order status).
 *
 * Two passes: exact lookup of the case-folded value against canonical names
 * and synonyms, then whole-word containment ("Closed - Won", "IT Services").
 * Containment only counts when every matching term points at one category.
 * Values that match nothing stay usable as `unmapped` and bucket to Unknown.
 */

import type { CategoryMatch, NormalizedField, RawValue } from '../types';
import type { PipelineStage, Sector, WorkOrderStatus } from '../constants';
import { UNKNOWN_BUCKET } from '../constants';
import type { CategoryVocabulary } from '../config/vocabulary';
import { VOCABULARY, vocabularyKey } from '../config/vocabulary';
import { containsTerm, toSearchText } from '../query/tokenize';
import { accepted, readPresentText, rejected } from './field-result';

export function matchCategory<C extends string>(
  text: string,
  vocabulary: CategoryVocabulary<C>,
): C | null {
  const exact = vocabulary.lookup.get(vocabularyKey(text));
  if (exact) return exact;

  const search = toSearchText(text);
  const hits = new Set<C>();
  for (const { term, category } of vocabulary.valueTerms) {
    if (containsTerm(search, term)) hits.add(category);
  }
  if (hits.size !== 1) return null;
  const [only] = hits;
  return only ?? null;
}

export function normalizeCategory<C extends string>(
  raw: RawValue | undefined,
  vocabulary: CategoryVocabulary<C>,
  label: string,
): NormalizedField<CategoryMatch<C>> {
  const read = readPresentText(raw);
  if (!read.present) return rejected(raw, 'MissingField', `No ${label}`);

  const category = matchCategory(read.text, vocabulary);
  if (category) return accepted<CategoryMatch<C>>(raw, { kind: 'mapped', category });

  return {
    rawValue: raw,
    value: { kind: 'unmapped', raw: read.text },
    valid: true,
    issue: 'UnmappedCategory',
    detail: `${label} "${read.text}" is not in the vocabulary; bucketed as ${UNKNOWN_BUCKET}`,
  };
}

export function normalizeSector(raw: RawValue | undefined): NormalizedField<CategoryMatch<Sector>> {
  return normalizeCategory(raw, VOCABULARY.sectors, 'Sector');
}

export function normalizeStage(raw: RawValue | undefined): NormalizedField<CategoryMatch<PipelineStage>> {
  return normalizeCategory(raw, VOCABULARY.stages, 'Stage');
}

export function normalizeStatus(raw: RawValue | undefined): NormalizedField<CategoryMatch<WorkOrderStatus>> {
  return normalizeCategory(raw, VOCABULARY.statuses, 'Status');
}

/** Distribution bucket for a category value. */
export function bucketOf<C extends string>(match: CategoryMatch<C>): C | typeof UNKNOWN_BUCKET {
  return match.kind === 'mapped' ? match.category : UNKNOWN_BUCKET;
}

/** The mapped category of a valid field, or null (missing, invalid or unmapped). */
export function mappedCategory<C extends string>(field: NormalizedField<CategoryMatch<C>>): C | null {
  return field.valid && field.value?.kind === 'mapped' ? field.value.category : null;
}
