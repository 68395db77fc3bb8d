import { pluralize } from '@boardlens/shared';
import type { DataQualityReport, IssueCount, IssueKind, ValidationIssue } from '../types';
import { BOARD_LABELS } from '../types';

/** Pseudo field name for issues about the record as a whole. */
export const RECORD_FIELD = '_record';

const ISSUE_KIND_ORDER: Record<IssueKind, number> = {
  MissingField: 0,
  InvalidFormat: 1,
  OutOfRange: 2,
  UnmappedCategory: 3,
};

/** 100 × valid / total; an empty batch is fully confident (no data is not bad data). */
export function computeConfidence(validRecords: number, totalRecords: number): number {
  if (totalRecords <= 0) return 100;
  return (100 * validRecords) / totalRecords;
}

export function compareIssueCounts(a: IssueCount, b: IssueCount): number {
  if (a.count !== b.count) return b.count - a.count;
  if (a.fieldName !== b.fieldName) return a.fieldName < b.fieldName ? -1 : 1;
  if (a.board !== b.board) return a.board < b.board ? -1 : 1;
  return ISSUE_KIND_ORDER[a.issueKind] - ISSUE_KIND_ORDER[b.issueKind];
}

export function countIssues(issues: readonly ValidationIssue[]): IssueCount[] {
  const groups = new Map<string, IssueCount>();
  for (const issue of issues) {
    const key = `${issue.board}\u0000${issue.fieldName}\u0000${issue.issueKind}`;
    const existing = groups.get(key);
    if (existing) {
      existing.count++;
    } else {
      groups.set(key, { board: issue.board, fieldName: issue.fieldName, issueKind: issue.issueKind, count: 1 });
    }
  }
  return [...groups.values()].sort(compareIssueCounts);
}

export function renderWarning(c: IssueCount): string {
  const records = pluralize(c.count, 'record');
  const board = BOARD_LABELS[c.board];

  if (c.fieldName === RECORD_FIELD) {
    return `${records} could not be read (${board})`;
  }
  switch (c.issueKind) {
    case 'MissingField':
      return `${records} missing '${c.fieldName}' field (${board})`;
    case 'InvalidFormat':
      return `${records} with unreadable '${c.fieldName}' values (${board})`;
    case 'OutOfRange':
      return `${records} with out-of-range '${c.fieldName}' values (${board})`;
    case 'UnmappedCategory':
      return `${records} with unrecognized '${c.fieldName}' values, counted as Unknown (${board})`;
  }
}

export function buildQualityReport(
  totalRecords: number,
  validRecords: number,
  issueCounts: IssueCount[],
): DataQualityReport {
  const sorted = [...issueCounts].sort(compareIssueCounts);
  return {
    confidenceScore: computeConfidence(validRecords, totalRecords),
    totalRecords,
    validRecords,
    warnings: sorted.map(renderWarning),
    issueCounts: sorted,
  };
}

/** Combine per-board reports into the report for the whole query. */
export function mergeQualityReports(reports: readonly DataQualityReport[]): DataQualityReport {
  let total = 0;
  let valid = 0;
  const counts: IssueCount[] = [];
  for (const r of reports) {
    total += r.totalRecords;
    valid += r.validRecords;
    counts.push(...r.issueCounts);
  }
  return buildQualityReport(total, valid, counts);
}
