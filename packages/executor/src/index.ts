export { executePlan, executeMetric } from './execute.js';
export type { TableLookup } from './execute.js';
export { applyTimeScope, applyFilters, matchesFilter, dateColumn } from './filters.js';
export { aggregate, isAggregation, numericValues } from './aggregate.js';
export { evaluateComparison } from './comparison.js';
