export { normalizeText } from './text';
export { normalizeCurrency, parseAmountText, MAX_ABS_AMOUNT } from './currency';
export { normalizeDate, parseDateText, DATE_PATTERNS, MIN_YEAR, MAX_YEAR } from './date';
export type { DatePattern } from './date';
export {
  normalizeSector,
  normalizeStage,
  normalizeStatus,
  normalizeCategory,
  matchCategory,
  bucketOf,
  mappedCategory,
} from './category';
export { readPresentText } from './field-result';
