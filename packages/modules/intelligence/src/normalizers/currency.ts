/**
 * Currency / numeric normalizer.
 *
 * Accepts "$1,250,000", "USD 1250", "(1,250.50)" (accounting negative),
 * "-$300", "1.250.000,75" (dot-grouped with a decimal comma) and plain numbers.
 */

import type { NormalizedField, RawValue } from '../types';
import { accepted, describeRaw, readPresentText, rejected } from './field-result';

/** Keeps batch totals in integer cents below Number.MAX_SAFE_INTEGER. */
export const MAX_ABS_AMOUNT = 1e12;

const CURRENCY_CODES = /(usd|eur|gbp|inr|aud|cad|chf|jpy)(?![a-z])/gi;
const CURRENCY_SYMBOLS = /[$€£¥₹]/g;
const DECIMAL = /^-?(\d+(\.\d*)?|\.\d+)$/;
const DOT_GROUPED = /^-?[1-9]\d{0,2}(\.\d{3})+(,\d+)?$/;
const COMMA_GROUPED = /^-?\d{1,3}(,\d{3})+(\.\d+)?$/;

function checkRange(raw: RawValue | undefined, value: number): NormalizedField<number> {
  if (!Number.isFinite(value) || Math.abs(value) > MAX_ABS_AMOUNT) {
    return rejected(raw, 'OutOfRange', `Amount ${describeRaw(raw)} is outside the supported range`);
  }
  // -0 → 0
  return accepted(raw, value === 0 ? 0 : value);
}

export function parseAmountText(input: string): number | null {
  let text = input.trim();
  let negative = false;

  const paren = /^\((.*)\)$/.exec(text);
  if (paren) {
    negative = true;
    text = (paren[1] ?? '').trim();
  }

  text = text
    .replace(CURRENCY_CODES, '')
    .replace(CURRENCY_SYMBOLS, '')
    .replace(/[\s ]+/g, '');

  if (DOT_GROUPED.test(text)) {
    text = text.replace(/\./g, '').replace(',', '.');
  } else if (COMMA_GROUPED.test(text)) {
    text = text.replace(/,/g, '');
  } else if (text.includes(',')) {
    // "1,5" or "12,34" is not a thousands grouping
    return null;
  }

  if (!DECIMAL.test(text)) return null;
  // "(-5)" is not an accounting negative
  if (negative && text.startsWith('-')) return null;

  const value = Number(text);
  return negative ? -value : value;
}

export function normalizeCurrency(raw: RawValue | undefined): NormalizedField<number> {
  if (typeof raw === 'number') return checkRange(raw, raw);

  const read = readPresentText(raw);
  if (!read.present) return rejected(raw, 'MissingField', 'No amount');

  const value = parseAmountText(read.text);
  if (value === null) {
    return rejected(raw, 'InvalidFormat', `Cannot read ${describeRaw(raw)} as an amount`);
  }
  return checkRange(raw, value);
}
