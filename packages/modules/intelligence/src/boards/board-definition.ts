import type { BoardKind, FieldOutcome, NormalizedRecord, RawRecord } from '../types';

/** Everything the validator needs to know about one board. */
export interface BoardDefinition<F extends string, R extends NormalizedRecord<BoardKind, Record<F, FieldOutcome>>> {
  kind: BoardKind;
  fieldNames: readonly F[];
  columns: Readonly<Record<F, string>>;
  /** Field the time-range filter applies to. */
  dateField: F;
  normalize(raw: RawRecord): R;
}
