import type { BoardDefinition } from './board-definition';
import type { DealFieldName, DealRecord, RawRecord } from '../types';
import { readColumn } from './columns';
import { normalizeCurrency, normalizeDate, normalizeSector, normalizeStage, normalizeText } from '../normalizers';

export const DEAL_COLUMNS: Record<DealFieldName, string> = {
  name: 'Item Name',
  amount: 'Amount',
  stage: 'Stage',
  sector: 'Sector',
  closeDate: 'Close Date',
  owner: 'Owner',
  company: 'Company',
};

export function normalizeDeal(raw: RawRecord): DealRecord {
  const col = (field: DealFieldName) => readColumn(raw, DEAL_COLUMNS[field]);
  return {
    id: raw.id,
    board: 'deals',
    fields: {
      name: normalizeText(col('name')),
      amount: normalizeCurrency(col('amount')),
      stage: normalizeStage(col('stage')),
      sector: normalizeSector(col('sector')),
      closeDate: normalizeDate(col('closeDate')),
      owner: normalizeText(col('owner')),
      company: normalizeText(col('company')),
    },
  };
}

export const DEALS_BOARD: BoardDefinition<DealFieldName, DealRecord> = {
  kind: 'deals',
  fieldNames: ['name', 'amount', 'stage', 'sector', 'closeDate', 'owner', 'company'],
  columns: DEAL_COLUMNS,
  dateField: 'closeDate',
  normalize: normalizeDeal,
};
