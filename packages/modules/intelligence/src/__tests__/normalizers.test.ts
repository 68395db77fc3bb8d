import { describe, it, expect } from 'vitest';
import {
  normalizeCurrency,
  normalizeDate,
  normalizeSector,
  normalizeStage,
  normalizeStatus,
  normalizeText,
  parseAmountText,
  parseDateText,
  DATE_PATTERNS,
} from '../normalizers';

describe('normalizeDate', () => {
  it('reads ISO, US and textual forms as the same calendar date', () => {
    for (const raw of ['2024-01-15', '01/15/2024', '15-Jan-2024']) {
      expect(normalizeDate(raw)).toEqual({
        rawValue: raw,
        value: '2024-01-15',
        valid: true,
        issue: null,
        detail: null,
      });
    }
  });

  it('supports at least ten patterns', () => {
    expect(DATE_PATTERNS.length).toBeGreaterThanOrEqual(10);
  });

  it.each([
    ['2024-01-15T10:30:00Z', '2024-01-15'],
    ['2024/1/15', '2024-01-15'],
    ['15/01/2024', '2024-01-15'],
    ['01-15-2024', '2024-01-15'],
    ['15.01.2024', '2024-01-15'],
    ['15 Jan 2024', '2024-01-15'],
    ['15 January 2024', '2024-01-15'],
    ['January 15, 2024', '2024-01-15'],
    ['Jan 15, 2024', '2024-01-15'],
    ['20240115', '2024-01-15'],
    ['1705276800', '2024-01-15'],
    ['1705276800000', '2024-01-15'],
  ])('parses %s', (raw, expected) => {
    expect(parseDateText(raw)).toBe(expected);
  });

  it('reads numeric epoch seconds', () => {
    expect(normalizeDate(1705276800).value).toBe('2024-01-15');
  });

  it('prefers the US reading when both are real dates', () => {
    expect(parseDateText('01/02/2024')).toBe('2024-01-02');
  });

  it('marks empty and null values as missing', () => {
    for (const raw of [null, undefined, '', '   ', 'N/A']) {
      const result = normalizeDate(raw);
      expect(result.valid).toBe(false);
      expect(result.issue).toBe('MissingField');
      expect(result.value).toBeNull();
    }
  });

  it('marks unreadable and impossible dates as invalid format', () => {
    for (const raw of ['next tuesday', '02/30/2024', '2024-13-01']) {
      const result = normalizeDate(raw);
      expect(result.issue).toBe('InvalidFormat');
      expect(result.value).toBeNull();
      expect(result.rawValue).toBe(raw);
    }
  });

  it('rejects years outside 1900–2100', () => {
    const result = normalizeDate('1850-03-01');
    expect(result.valid).toBe(false);
    expect(result.issue).toBe('OutOfRange');
  });

  it('is idempotent on canonical dates', () => {
    const once = normalizeDate('January 15, 2024');
    expect(normalizeDate(once.value).value).toBe(once.value);
  });
});

describe('normalizeCurrency', () => {
  it('strips symbols and separators', () => {
    const result = normalizeCurrency('$1,250,000');
    expect(result.value).toBe(1250000);
    expect(result.valid).toBe(true);
  });

  it('treats N/A as missing', () => {
    const result = normalizeCurrency('N/A');
    expect(result.valid).toBe(false);
    expect(result.issue).toBe('MissingField');
    expect(result.value).toBeNull();
    expect(result.rawValue).toBe('N/A');
  });

  it.each([
    ['(1,250)', -1250],
    ['USD 1250', 1250],
    ['USD1250', 1250],
    ['€ 99.50', 99.5],
    ['-$300', -300],
    ['1.250.000,75', 1250000.75],
    ['1,250,000.50', 1250000.5],
    ['0.500', 0.5],
    [' 42 ', 42],
  ])('parses %s', (raw, expected) => {
    expect(parseAmountText(raw)).toBe(expected);
  });

  it('reports non-numeric residue as invalid format', () => {
    for (const raw of ['abc', '12abc', '(-5)', '1-2', '1,5', '12,34', '1,2,3', '1,2345', '1.250,5.0']) {
      expect(normalizeCurrency(raw).issue).toBe('InvalidFormat');
    }
  });

  it('reports huge or non-finite amounts as out of range', () => {
    expect(normalizeCurrency(1e16).issue).toBe('OutOfRange');
    expect(normalizeCurrency(999999999999999).issue).toBe('OutOfRange');
    expect(normalizeCurrency('$1,000,000,000,001').issue).toBe('OutOfRange');
    expect(normalizeCurrency(1e12).value).toBe(1e12);
    expect(normalizeCurrency(Number.POSITIVE_INFINITY).issue).toBe('OutOfRange');
  });

  it('is idempotent on canonical amounts', () => {
    const once = normalizeCurrency('$1,250,000');
    expect(normalizeCurrency(once.value).value).toBe(once.value);
  });
});

describe('category normalizers', () => {
  it('maps IT, software and tech to Technology', () => {
    for (const raw of ['IT', 'software', 'tech']) {
      expect(normalizeSector(raw).value).toEqual({ kind: 'mapped', category: 'Technology' });
    }
  });

  it('matches whole words inside longer values', () => {
    expect(normalizeSector('IT Services').value).toEqual({ kind: 'mapped', category: 'Technology' });
    expect(normalizeSector('Oil & Gas').value).toEqual({ kind: 'mapped', category: 'Energy' });
    expect(normalizeStage('Closed - Won').value).toEqual({ kind: 'mapped', category: 'Closed Won' });
    expect(normalizeStatus('Working on it').value).toEqual({ kind: 'mapped', category: 'In Progress' });
  });

  it('keeps unmapped values usable but flagged', () => {
    const result = normalizeSector('Aerospace');
    expect(result.valid).toBe(true);
    expect(result.issue).toBe('UnmappedCategory');
    expect(result.value).toEqual({ kind: 'unmapped', raw: 'Aerospace' });
  });

  it('treats a literal "Unknown" as an unmapped value, not a missing one', () => {
    expect(normalizeStage('Unknown').issue).toBe('UnmappedCategory');
  });

  it('marks blanks as missing', () => {
    const result = normalizeStatus('  ');
    expect(result.valid).toBe(false);
    expect(result.issue).toBe('MissingField');
  });

  it('is idempotent on canonical names', () => {
    expect(normalizeStage('Closed Won').value).toEqual({ kind: 'mapped', category: 'Closed Won' });
    expect(normalizeStatus('On Hold').value).toEqual({ kind: 'mapped', category: 'On Hold' });
  });
});

describe('normalizeText', () => {
  it('trims values', () => {
    expect(normalizeText('  Acme Corp  ').value).toBe('Acme Corp');
  });

  it('marks empty and absent values as missing', () => {
    expect(normalizeText('').issue).toBe('MissingField');
    expect(normalizeText(undefined).issue).toBe('MissingField');
  });
});
