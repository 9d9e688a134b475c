// packages/executor/src/execute.ts
// Deterministic plan execution over in-memory tables. No I/O, no model calls.

import type { ExecutionResult, MetricResult, MetricResults, PlanMetric, QueryPlan, Table, TimeScope } from '@tapwise/core';
import { aggregate, isAggregation, numericValues } from './aggregate.js';
import { evaluateComparison } from './comparison.js';
import { applyFilters, applyTimeScope } from './filters.js';

export interface TableLookup {
  get(name: string): Table | undefined;
}

export function executeMetric(metric: PlanMetric, scope: TimeScope, tables: TableLookup): MetricResult {
  const table = tables.get(metric.dataset);
  if (!table) return { error: `Unknown dataset ${metric.dataset}` };

  const scoped = applyTimeScope(table, table.rows, scope);
  const filtered = applyFilters(table, scoped, metric.filters);

  if (!table.columns.some((c) => c.name === metric.column)) {
    return { error: `Unknown column ${metric.column} in ${metric.dataset}` };
  }

  const values = numericValues(filtered.map((r) => r[metric.column]));
  if (values.length === 0) return { error: 'No data after filtering' };
  if (!isAggregation(metric.agg)) return { error: `Unknown agg ${metric.agg}` };

  return {
    value: aggregate(values, metric.agg),
    dataset: metric.dataset,
    column: metric.column,
    agg: metric.agg,
    filters: metric.filters,
    rows: values.length
  };
}

/** Each metric is evaluated independently; a failing metric never affects the others. */
export function executePlan(plan: QueryPlan, tables: TableLookup): ExecutionResult {
  const metrics: MetricResults = {};
  for (const m of plan.metrics) {
    try {
      metrics[m.name] = executeMetric(m, plan.time_scope, tables);
    } catch (err) {
      metrics[m.name] = { error: `Execution failed: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
  return { metrics, comparison: evaluateComparison(plan.comparison, metrics) };
}
