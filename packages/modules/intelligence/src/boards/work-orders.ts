import type { BoardDefinition } from './board-definition';
import type { RawRecord, WorkOrderFieldName, WorkOrderRecord } from '../types';
import { readColumn } from './columns';
import { normalizeCurrency, normalizeDate, normalizeSector, normalizeStatus, normalizeText } from '../normalizers';

export const WORK_ORDER_COLUMNS: Record<WorkOrderFieldName, string> = {
  name: 'Item Name',
  revenue: 'Revenue',
  status: 'Status',
  sector: 'Sector',
  startDate: 'Start Date',
  endDate: 'End Date',
  projectManager: 'Project Manager',
  client: 'Client',
};

export function normalizeWorkOrder(raw: RawRecord): WorkOrderRecord {
  const col = (field: WorkOrderFieldName) => readColumn(raw, WORK_ORDER_COLUMNS[field]);
  return {
    id: raw.id,
    board: 'work_orders',
    fields: {
      name: normalizeText(col('name')),
      revenue: normalizeCurrency(col('revenue')),
      status: normalizeStatus(col('status')),
      sector: normalizeSector(col('sector')),
      startDate: normalizeDate(col('startDate')),
      endDate: normalizeDate(col('endDate')),
      projectManager: normalizeText(col('projectManager')),
      client: normalizeText(col('client')),
    },
  };
}

export const WORK_ORDERS_BOARD: BoardDefinition<WorkOrderFieldName, WorkOrderRecord> = {
  kind: 'work_orders',
  fieldNames: ['name', 'revenue', 'status', 'sector', 'startDate', 'endDate', 'projectManager', 'client'],
  columns: WORK_ORDER_COLUMNS,
  dateField: 'endDate',
  normalize: normalizeWorkOrder,
};
