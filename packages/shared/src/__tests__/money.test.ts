import { describe, it, expect } from 'vitest';
import { toCents, toDollars, formatMoney } from '../utils/money';

describe('money utilities', () => {
  describe('toCents', () => {
    it('converts dollars to cents', () => {
      expect(toCents(12.5)).toBe(1250);
      expect(toCents(0)).toBe(0);
      expect(toCents(99.99)).toBe(9999);
    });

    it('rounds to avoid floating point errors', () => {
      expect(toCents(0.1 + 0.2)).toBe(30);
    });
  });

  describe('toDollars', () => {
    it('converts cents to dollars', () => {
      expect(toDollars(1250)).toBe(12.5);
      expect(toDollars(9999)).toBe(99.99);
    });
  });

  describe('formatMoney', () => {
    it('formats as USD with grouping and 2 decimal places', () => {
      expect(formatMoney(12.5)).toBe('$12.50');
      expect(formatMoney(0)).toBe('$0.00');
      expect(formatMoney(1000)).toBe('$1,000.00');
    });

    it('supports whole-dollar output and negatives', () => {
      expect(formatMoney(1250000, 0)).toBe('$1,250,000');
      expect(formatMoney(-500, 0)).toBe('-$500');
    });
  });
});
