/**
 * Counting and money-bucketing helpers shared by the analyzers.
 *
 * Money is accumulated as integer cents so totals are independent of record
 * order; conversion back to dollars happens once, at output.
 */

import { roundTo, toCents, toDollars } from '@boardlens/shared';
import { UNKNOWN_BUCKET } from '../constants';
import type { CategoryMatch, MetricValue, NormalizedField } from '../types';
import { bucketOf } from '../normalizers/category';

export interface Bucket {
  count: number;
  cents: number;
}

/** Cents of a valid money field; null when the field is not usable. */
export function centsOf(field: NormalizedField<number>): number | null {
  return field.valid && field.value !== null ? toCents(field.value) : null;
}

export function sumCents<T>(items: Iterable<T>, cents: (item: T) => number | null): number {
  let total = 0;
  for (const item of items) total += cents(item) ?? 0;
  return total;
}

/** Bucket key of a valid category field (unmapped → Unknown); null when missing or invalid. */
export function categoryBucket<C extends string>(field: NormalizedField<CategoryMatch<C>>): C | typeof UNKNOWN_BUCKET | null {
  return field.valid && field.value !== null ? bucketOf(field.value) : null;
}

/**
 * Count items per bucket, and sum their money where `cents` gives a value.
 * Items whose bucket is null are skipped.
 */
export function tally<T>(
  items: Iterable<T>,
  bucket: (item: T) => string | null,
  cents: (item: T) => number | null = () => null,
): Map<string, Bucket> {
  const out = new Map<string, Bucket>();
  for (const item of items) {
    const key = bucket(item);
    if (key === null) continue;
    const entry = out.get(key) ?? { count: 0, cents: 0 };
    entry.count++;
    entry.cents += cents(item) ?? 0;
    out.set(key, entry);
  }
  return out;
}

export function countOf(buckets: ReadonlyMap<string, Bucket>, key: string): number {
  return buckets.get(key)?.count ?? 0;
}

export function centsIn(buckets: ReadonlyMap<string, Bucket>, keys: readonly string[]): number {
  return keys.reduce((sum, key) => sum + (buckets.get(key)?.cents ?? 0), 0);
}

export function percentage(part: number, whole: number): number {
  return whole > 0 ? roundTo((100 * part) / whole, 1) : 0;
}

/** Unrounded ratio for threshold checks; null when undefined. */
export function ratio(part: number, whole: number): number | null {
  return whole > 0 ? part / whole : null;
}

/** A ratio as it appears in key metrics. */
export function reportedRatio(value: number | null): number | null {
  return value === null ? null : roundTo(value, 4);
}

/**
 * One row per canonical category plus Unknown, in canonical order:
 * `{ [label]: name, count, percentage }`.
 */
export function distributionRows(
  buckets: ReadonlyMap<string, Bucket>,
  canonical: readonly string[],
  label: string,
): MetricValue[] {
  let total = 0;
  for (const b of buckets.values()) total += b.count;
  return [...canonical, UNKNOWN_BUCKET].map((name) => {
    const count = countOf(buckets, name);
    return { [label]: name, count, percentage: percentage(count, total) };
  });
}

/** `{ name: dollars }` in canonical order (plus Unknown). */
export function valueByBucket(buckets: ReadonlyMap<string, Bucket>, canonical: readonly string[]): { [name: string]: MetricValue } {
  const out: { [name: string]: MetricValue } = {};
  for (const name of [...canonical, UNKNOWN_BUCKET]) {
    out[name] = toDollars(buckets.get(name)?.cents ?? 0);
  }
  return out;
}

/** Buckets sorted by value, largest first; ties keep canonical order. */
export function rankByValue(buckets: ReadonlyMap<string, Bucket>, canonical: readonly string[]): Array<{ name: string } & Bucket> {
  return [...canonical, UNKNOWN_BUCKET]
    .flatMap((name) => {
      const b = buckets.get(name);
      return b ? [{ name, ...b }] : [];
    })
    .sort((a, b) => b.cents - a.cents);
}
