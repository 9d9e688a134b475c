/* packages/core/test/schemas.spec.ts */
import { describe, it, expect } from 'vitest';
import { CatalogFileSchema, QueryPlanSchema, noopPlan } from '../src/index.js';

describe('QueryPlanSchema', () => {
  it('fills defaults for a bare object', () => {
    expect(QueryPlanSchema.parse({})).toEqual(noopPlan());
  });

  it('normalizes op aliases, agg case and missing filters', () => {
    const plan = QueryPlanSchema.parse({
      metrics: [
        { name: 'a', dataset: 'd', column: 'c', agg: ' Mean ', filters: [{ column: 'country', op: '=', value: 'Kenya' }] },
        { name: 'b', dataset: 'd', column: 'c', agg: 'sum', filters: [{ column: 'x', op: '<>', value: 1 }] },
        { name: 'c', dataset: 'd', column: 'c', agg: 'max' }
      ]
    });
    expect(plan.metrics[0].agg).toBe('mean');
    expect(plan.metrics[0].filters[0].op).toBe('==');
    expect(plan.metrics[1].filters[0].op).toBe('!=');
    expect(plan.metrics[2].filters).toEqual([]);
  });

  it('coerces 4-digit year strings and swaps reversed ranges', () => {
    expect(QueryPlanSchema.parse({ time_scope: { type: 'year', year: '2020' } }).time_scope)
      .toEqual({ type: 'year', year: 2020 });
    expect(QueryPlanSchema.parse({ time_scope: { type: 'range', start_year: 2022, end_year: '2018' } }).time_scope)
      .toEqual({ type: 'range', start_year: 2018, end_year: 2022 });
  });

  it('rejects years outside four digits', () => {
    expect(QueryPlanSchema.safeParse({ time_scope: { type: 'range', start_year: 0, end_year: 2_000_000_000 } }).success)
      .toBe(false);
    expect(QueryPlanSchema.safeParse({ time_scope: { type: 'year', year: 20201 } }).success).toBe(false);
    expect(QueryPlanSchema.safeParse({ time_scope: { type: 'range', start_year: 1000, end_year: 9999 } }).success)
      .toBe(true);
  });

  it('rejects a year scope without a year', () => {
    expect(QueryPlanSchema.safeParse({ time_scope: { type: 'year' } }).success).toBe(false);
  });

  it('rejects duplicate metric names', () => {
    const res = QueryPlanSchema.safeParse({
      metrics: [
        { name: 'm', dataset: 'd', column: 'c', agg: 'sum' },
        { name: 'm', dataset: 'd', column: 'c', agg: 'mean' }
      ]
    });
    expect(res.success).toBe(false);
    if (!res.success) expect(res.error.issues[0].message).toBe('Duplicate metric name: m');
  });

  it('keeps unknown aggregations for the executor to report', () => {
    const plan = QueryPlanSchema.parse({ metrics: [{ name: 'm', dataset: 'd', column: 'c', agg: 'median' }] });
    expect(plan.metrics[0].agg).toBe('median');
  });

  it('rejects unknown comparison types', () => {
    expect(QueryPlanSchema.safeParse({ comparison: { type: 'ratio' } }).success).toBe(false);
  });
});

describe('CatalogFileSchema', () => {
  it('joins column_notes given as lines', () => {
    const file = CatalogFileSchema.parse({
      datasets: { w: { path: 'w.csv', column_notes: ['- a: first', '- b: second'] } }
    });
    expect(file.datasets.w.column_notes).toBe('- a: first\n- b: second');
    expect(file.datasets.w.description).toBe('');
  });

  it('rejects unknown keys', () => {
    expect(CatalogFileSchema.safeParse({ datasets: { w: { path: 'w.csv', url: 'x' } } }).success).toBe(false);
  });
});
