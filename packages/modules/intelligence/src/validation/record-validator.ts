/**
 * Record validator: runs a board's normalizers over a batch and builds the
 * quality report.
 *
 * Pure function. A record is valid when every field the pending analysis
 * requires is valid; other fields are normalized and audited but do not
 * affect validity or warnings. A record that cannot be read at all is
 * reported against `_record` and produces no NormalizedRecord.
 */

import { z } from 'zod';
import type { BoardKind, BoardValidation, FieldOutcome, NormalizedRecord, RawRecord, RawValue, ValidationIssue } from '../types';
import type { BoardDefinition } from '../boards/board-definition';
import { buildQualityReport, countIssues, RECORD_FIELD } from './quality-report';

const rawRecordSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().finite()]).transform(String),
  columns: z.record(z.unknown()),
});

type ReadResult =
  | { ok: true; record: RawRecord }
  | { ok: false; recordId: string | null; detail: string };

function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value) ?? null;
}

function idOf(item: unknown): string | null {
  if (typeof item !== 'object' || item === null || !('id' in item)) return null;
  const id = item.id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

export function readRawRecord(item: unknown): ReadResult {
  const parsed = rawRecordSchema.safeParse(item);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? first.path.join('.') : 'record';
    return {
      ok: false,
      recordId: idOf(item),
      detail: `Unreadable record: ${where} ${first?.message ?? 'is invalid'}`,
    };
  }

  const columns: Record<string, RawValue> = {};
  for (const [name, value] of Object.entries(parsed.data.columns)) {
    columns[name] = toRawValue(value);
  }
  return { ok: true, record: { id: parsed.data.id, columns } };
}

export function validateBoard<F extends string, R extends NormalizedRecord<BoardKind, Record<F, FieldOutcome>>>(
  board: BoardDefinition<F, R>,
  input: readonly unknown[],
  requiredFields: readonly F[],
): BoardValidation<R> {
  const required = new Set<string>(requiredFields);
  const records: R[] = [];
  const issues: ValidationIssue[] = [];
  const reportable: ValidationIssue[] = [];
  let validRecords = 0;

  input.forEach((item, index) => {
    const read = readRawRecord(item);
    if (!read.ok) {
      const issue: ValidationIssue = {
        recordId: read.recordId ?? `#${index + 1}`,
        board: board.kind,
        fieldName: RECORD_FIELD,
        issueKind: 'InvalidFormat',
        detail: read.detail,
      };
      issues.push(issue);
      reportable.push(issue);
      return;
    }

    const record = board.normalize(read.record);
    records.push(record);

    let usable = true;
    for (const fieldName of board.fieldNames) {
      const field: FieldOutcome = record.fields[fieldName];
      const isRequired = required.has(fieldName);
      if (isRequired && !field.valid) usable = false;
      if (!field.issue) continue;

      const issue: ValidationIssue = {
        recordId: record.id,
        board: board.kind,
        fieldName,
        issueKind: field.issue,
        detail: field.detail ?? field.issue,
      };
      issues.push(issue);
      if (isRequired) reportable.push(issue);
    }
    if (usable) validRecords++;
  });

  return {
    records,
    issues,
    report: buildQualityReport(input.length, validRecords, countIssues(reportable)),
  };
}
