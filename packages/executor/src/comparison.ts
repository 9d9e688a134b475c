import { isMetricError } from '@tapwise/core';
import type { Comparison, ComparisonOutcome, MetricResults, MetricValue } from '@tapwise/core';

function side(results: MetricResults, name: string | null, label: string): MetricValue | string {
  if (!name) return `${label} metric not set`;
  const r = results[name];
  if (!r) return `${label} metric ${name} not in results`;
  if (isMetricError(r)) return `${label} metric ${name} failed: ${r.error}`;
  return r;
}

export function evaluateComparison(comparison: Comparison, results: MetricResults): ComparisonOutcome {
  if (comparison.type === 'none') return { type: 'none' };

  const { left_metric: left, right_metric: right } = comparison;
  const base = { type: 'which_is_greater' as const, left, right };
  const l = side(results, left, 'left');
  const r = side(results, right, 'right');
  if (typeof l === 'string') return { ...base, greater: null, tie: false, reason: l };
  if (typeof r === 'string') return { ...base, greater: null, tie: false, reason: r };

  if (l.value === r.value) return { ...base, greater: null, tie: true };
  return { ...base, greater: l.value > r.value ? left : right, tie: false };
}
