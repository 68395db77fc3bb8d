import type { RawRecord, RawValue } from '../types';

function columnKey(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_]+/g, ' ');
}

/**
 * Read a column by name, ignoring case and spacing differences
 * ("Close Date", "close_date", " CLOSE  DATE "). Returns `undefined` when the
 * board has no such column.
 */
export function readColumn(record: RawRecord, column: string): RawValue | undefined {
  if (Object.prototype.hasOwnProperty.call(record.columns, column)) {
    return record.columns[column];
  }
  const wanted = columnKey(column);
  for (const [name, value] of Object.entries(record.columns)) {
    if (columnKey(name) === wanted) return value;
  }
  return undefined;
}
