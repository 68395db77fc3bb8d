export { generateUlid, isValidUlid } from './ulid';
export { toCents, toDollars, formatMoney } from './money';
export { formatPercent, roundTo, pluralize } from './format';
