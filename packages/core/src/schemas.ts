// packages/core/src/schemas.ts
import { z } from 'zod';

// ---- filters ----
export const FilterOpEnum = z.enum(['<', '<=', '>', '>=', '==', '!=']);

// models sometimes answer with SQL-ish spellings
const OP_ALIASES: Record<string, string> = { '=': '==', '===': '==', '<>': '!=', '!==': '!=' };

export const PlanFilterSchema = z.object({
  column: z.string().min(1),
  op: z.preprocess(
    (v) => (typeof v === 'string' ? OP_ALIASES[v.trim()] ?? v.trim() : v),
    FilterOpEnum
  ),
  value: z.union([z.string(), z.number(), z.boolean()]).nullable()
});

// ---- time scope (tagged) ----
const YearSchema = z.union([
  z.number().int().min(1000).max(9999),
  z.string().trim().regex(/^\d{4}$/, 'expected a 4-digit year').transform(Number)
]);

export const TimeScopeSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('all') }),
    z.object({ type: z.literal('year'), year: YearSchema }),
    z.object({ type: z.literal('range'), start_year: YearSchema, end_year: YearSchema })
  ])
  .transform((ts) =>
    ts.type === 'range' && ts.start_year > ts.end_year
      ? { type: 'range' as const, start_year: ts.end_year, end_year: ts.start_year }
      : ts
  );

// ---- metrics ----
export const AggregationEnum = z.enum(['sum', 'mean', 'max', 'min']);

export const PlanMetricSchema = z.object({
  name: z.string().min(1),
  dataset: z.string().min(1),
  column: z.string().min(1),
  // unknown aggregations are an execution error for that metric, not a planning failure
  agg: z.string().trim().toLowerCase(),
  filters: z.array(PlanFilterSchema).nullish().transform((f) => f ?? [])
});

// ---- comparison ----
export const ComparisonSchema = z.object({
  type: z.enum(['none', 'which_is_greater']),
  left_metric: z.string().nullish().transform((v) => v ?? null),
  right_metric: z.string().nullish().transform((v) => v ?? null)
});

// ---- query plan ----
export const QueryPlanSchema = z
  .object({
    time_scope: TimeScopeSchema.nullish().transform((ts) => ts ?? { type: 'all' as const }),
    metrics: z.array(PlanMetricSchema).nullish().transform((m) => m ?? []),
    comparison: ComparisonSchema.nullish().transform(
      (c) => c ?? { type: 'none' as const, left_metric: null, right_metric: null }
    )
  })
  .superRefine((plan, ctx) => {
    const seen = new Set<string>();
    plan.metrics.forEach((m, i) => {
      if (seen.has(m.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['metrics', i, 'name'],
          message: `Duplicate metric name: ${m.name}`
        });
      }
      seen.add(m.name);
    });
  });

export type FilterOp = z.infer<typeof FilterOpEnum>;
export type PlanFilter = z.output<typeof PlanFilterSchema>;
export type TimeScope = z.output<typeof TimeScopeSchema>;
export type Aggregation = z.infer<typeof AggregationEnum>;
export type PlanMetric = z.output<typeof PlanMetricSchema>;
export type Comparison = z.output<typeof ComparisonSchema>;
export type QueryPlan = z.output<typeof QueryPlanSchema>;

/** The plan executed when the model reply cannot be used. */
export function noopPlan(): QueryPlan {
  return {
    time_scope: { type: 'all' },
    metrics: [],
    comparison: { type: 'none', left_metric: null, right_metric: null }
  };
}

// ---- catalog file ----
export const ColumnTypeEnum = z.enum(['number', 'text', 'date']);

export const CatalogEntrySchema = z.object({
  path: z.string().min(1),
  description: z.string().default(''),
  column_notes: z
    .union([z.string(), z.array(z.string())])
    .default('')
    .transform((n) => (Array.isArray(n) ? n.join('\n') : n)),
  columns: z.record(ColumnTypeEnum).optional()
}).strict();

export const CatalogFileSchema = z.object({
  datasets: z.record(CatalogEntrySchema)
}).strict();
export type CatalogFile = z.output<typeof CatalogFileSchema>;
