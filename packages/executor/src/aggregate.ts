import { toNumber } from '@tapwise/catalog';
import { AggregationEnum } from '@tapwise/core';
import type { Aggregation, CellValue } from '@tapwise/core';

export function numericValues(cells: Array<CellValue | undefined>): number[] {
  const out: number[] = [];
  for (const c of cells) {
    const n = toNumber(c);
    if (n !== null) out.push(n);
  }
  return out;
}

export function isAggregation(agg: string): agg is Aggregation {
  return AggregationEnum.safeParse(agg).success;
}

/** `values` must be non-empty. */
export function aggregate(values: number[], agg: Aggregation): number {
  switch (agg) {
    case 'sum':
      return values.reduce((a, b) => a + b, 0);
    case 'mean':
      return values.reduce((a, b) => a + b, 0) / values.length;
    case 'max':
      return values.reduce((a, b) => (b > a ? b : a));
    case 'min':
      return values.reduce((a, b) => (b < a ? b : a));
  }
}
