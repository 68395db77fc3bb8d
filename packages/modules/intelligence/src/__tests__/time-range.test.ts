import { describe, it, expect } from 'vitest';
import { describeTimeRange, isInWindow, resolveTimeWindow } from '../query';
import type { TimeRangePreset } from '../constants';

const preset = (p: TimeRangePreset) => ({ kind: 'preset', preset: p }) as const;

describe('resolveTimeWindow', () => {
  it('returns null for all time', () => {
    expect(resolveTimeWindow(preset('all_time'), '2024-05-10')).toBeNull();
  });

  it.each([
    ['this_month', { from: '2024-05-01', to: '2024-05-31' }],
    ['this_quarter', { from: '2024-04-01', to: '2024-06-30' }],
    ['next_quarter', { from: '2024-07-01', to: '2024-09-30' }],
    ['last_quarter', { from: '2024-01-01', to: '2024-03-31' }],
    ['this_year', { from: '2024-01-01', to: '2024-12-31' }],
    ['last_year', { from: '2023-01-01', to: '2023-12-31' }],
    ['last_30_days', { from: '2024-04-11', to: '2024-05-10' }],
    ['last_90_days', { from: '2024-02-11', to: '2024-05-10' }],
    ['next_30_days', { from: '2024-05-10', to: '2024-06-08' }],
  ] as const)('resolves %s relative to 2024-05-10', (p, expected) => {
    expect(resolveTimeWindow(preset(p), '2024-05-10')).toEqual(expected);
  });

  it('crosses year boundaries', () => {
    expect(resolveTimeWindow(preset('last_quarter'), '2024-01-20')).toEqual({ from: '2023-10-01', to: '2023-12-31' });
    expect(resolveTimeWindow(preset('next_quarter'), '2024-11-05')).toEqual({ from: '2025-01-01', to: '2025-03-31' });
  });

  it('resolves explicit quarters, defaulting to the reference year', () => {
    expect(resolveTimeWindow({ kind: 'quarter', quarter: 3, year: 2023 }, '2024-05-10')).toEqual({
      from: '2023-07-01',
      to: '2023-09-30',
    });
    expect(resolveTimeWindow({ kind: 'quarter', quarter: 1, year: null }, '2024-05-10')).toEqual({
      from: '2024-01-01',
      to: '2024-03-31',
    });
  });
});

describe('isInWindow', () => {
  it('includes both ends', () => {
    const window = { from: '2024-04-01', to: '2024-06-30' };
    expect(isInWindow('2024-04-01', window)).toBe(true);
    expect(isInWindow('2024-06-30', window)).toBe(true);
    expect(isInWindow('2024-07-01', window)).toBe(false);
  });

  it('holds exactly 30 calendar days for the last 30 days', () => {
    const window = resolveTimeWindow(preset('last_30_days'), '2024-05-10');
    if (!window) throw new Error('expected a window');

    const day = (month: string, n: number) => `2024-${month}-${String(n).padStart(2, '0')}`;
    const days = [
      ...Array.from({ length: 30 }, (_, i) => day('04', i + 1)),
      ...Array.from({ length: 10 }, (_, i) => day('05', i + 1)),
    ];
    expect(days.filter((d) => isInWindow(d, window))).toHaveLength(30);
    expect(isInWindow('2024-04-10', window)).toBe(false);
    expect(isInWindow('2024-04-11', window)).toBe(true);
  });
});

describe('describeTimeRange', () => {
  it('labels presets and quarters', () => {
    expect(describeTimeRange(preset('this_quarter'))).toBe('This Quarter');
    expect(describeTimeRange({ kind: 'quarter', quarter: 3, year: 2024 })).toBe('Q3 2024');
    expect(describeTimeRange({ kind: 'quarter', quarter: 2, year: null })).toBe('Q2');
  });
});
