export { interpretQuery, extractFilters, extractTimeRange } from './interpreter';
export { resolveTimeWindow, describeTimeRange, isInWindow, ALL_TIME } from './time-range';
export { tokenize, toSearchText, containsTerm } from './tokenize';
