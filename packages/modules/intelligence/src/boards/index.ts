export { DEALS_BOARD, DEAL_COLUMNS, normalizeDeal } from './deals';
export { WORK_ORDERS_BOARD, WORK_ORDER_COLUMNS, normalizeWorkOrder } from './work-orders';
export { readColumn } from './columns';
export { boardItemToRawRecord, boardItemsToRawInput, boardItemSchema } from './board-items';
export type { BoardItem } from './board-items';
export type { BoardDefinition } from './board-definition';
