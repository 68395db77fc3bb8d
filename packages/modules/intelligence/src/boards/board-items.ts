/**
 * Adapter from the board service's item payload to RawRecord.
 *
 * Items arrive as `{ id, name, column_values: [{ column: { title }, text, value }] }`.
 * The item name becomes the "Item Name" column; a column's display `text`
 * wins over its `value`, and JSON-encoded values carrying a `text` or `label`
 * key are unwrapped. Anything unexpected is passed through as-is so the
 * validator can report it.
 */

import { z } from 'zod';
import type { RawRecord, RawValue } from '../types';

const columnValueSchema = z.object({
  id: z.string().optional(),
  column: z.object({ title: z.string() }).partial().nullish(),
  title: z.string().nullish(),
  text: z.union([z.string(), z.number()]).nullish(),
  value: z.union([z.string(), z.number()]).nullish(),
});

export const boardItemSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  name: z.string().nullish(),
  column_values: z.array(columnValueSchema).default([]),
});

export type BoardItem = z.input<typeof boardItemSchema>;

const jsonWrapperSchema = z.object({
  text: z.union([z.string(), z.number()]).optional(),
  label: z.union([z.string(), z.number()]).optional(),
});

function unwrapJsonValue(value: string): RawValue {
  if (!value.startsWith('{')) return value;
  let decoded: unknown;
  try {
    decoded = JSON.parse(value);
  } catch {
    // not JSON after all; keep the literal text
    return value;
  }
  const wrapper = jsonWrapperSchema.safeParse(decoded);
  if (!wrapper.success) return value;
  return wrapper.data.text ?? wrapper.data.label ?? value;
}

function cellValue(text: string | number | null | undefined, value: string | number | null | undefined): RawValue {
  if (text !== null && text !== undefined && text !== '') return text;
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? unwrapJsonValue(value) : value;
}

/**
 * Convert one fetched item. Returns null when the payload is not an item at
 * all (no id), so callers can hand the original value to the validator.
 */
export function boardItemToRawRecord(item: unknown): RawRecord | null {
  const parsed = boardItemSchema.safeParse(item);
  if (!parsed.success) return null;

  const columns: Record<string, RawValue> = {};
  if (parsed.data.name !== undefined && parsed.data.name !== null) {
    columns['Item Name'] = parsed.data.name;
  }
  for (const cv of parsed.data.column_values) {
    const title = cv.column?.title ?? cv.title ?? cv.id;
    if (!title) continue;
    columns[title] = cellValue(cv.text, cv.value);
  }

  return { id: parsed.data.id, columns };
}

/** Convert a page of items; unreadable entries are kept unchanged for the validator. */
export function boardItemsToRawInput(items: readonly unknown[]): unknown[] {
  return items.map((item) => boardItemToRawRecord(item) ?? item);
}
