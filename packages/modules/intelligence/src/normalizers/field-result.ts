import type { IssueKind, NormalizedField, RawValue } from '../types';
import { VOCABULARY, vocabularyKey } from '../config/vocabulary';

export function accepted<T>(rawValue: RawValue | undefined, value: T): NormalizedField<T> {
  return { rawValue, value, valid: true, issue: null, detail: null };
}

export function rejected<T>(
  rawValue: RawValue | undefined,
  issue: Exclude<IssueKind, 'UnmappedCategory'>,
  detail: string,
): NormalizedField<T> {
  return { rawValue, value: null, valid: false, issue, detail };
}

export type PresentText =
  | { present: false }
  | { present: true; text: string };

/**
 * Common first step: null, undefined, blank strings and null tokens
 * ("N/A", "none", "-") are all "missing". Numbers are stringified.
 */
export function readPresentText(raw: RawValue | undefined): PresentText {
  if (raw === null || raw === undefined) return { present: false };
  const text = typeof raw === 'number' ? String(raw) : raw.trim();
  if (text === '' || VOCABULARY.nullTokens.has(vocabularyKey(text))) return { present: false };
  return { present: true, text };
}

export function describeRaw(raw: RawValue | undefined): string {
  return typeof raw === 'string' ? `"${raw}"` : String(raw);
}
