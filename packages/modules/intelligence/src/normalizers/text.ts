import type { NormalizedField, RawValue } from '../types';
import { accepted, readPresentText, rejected } from './field-result';

export function normalizeText(raw: RawValue | undefined): NormalizedField<string> {
  const read = readPresentText(raw);
  if (!read.present) return rejected(raw, 'MissingField', 'No value');
  return accepted(raw, read.text);
}
