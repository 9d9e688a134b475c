import { isDateColumn, toNumber } from '@tapwise/catalog';
import type { CellValue, ColumnType, FilterOp, PlanFilter, Row, Table, TimeScope } from '@tapwise/core';

type Scalar = PlanFilter['value'];

/** First column whose name contains "date", if any. */
export function dateColumn(table: Table): string | undefined {
  return table.columns.find((c) => isDateColumn(c.name))?.name;
}

function yearsOf(scope: TimeScope): string[] {
  switch (scope.type) {
    case 'all':
      return [];
    case 'year':
      return [String(scope.year)];
    case 'range': {
      const out: string[] = [];
      for (let y = scope.start_year; y <= scope.end_year; y++) out.push(String(y));
      return out;
    }
  }
}

/**
 * Year matching is a substring test on the date column's text, so "2020"
 * matches "2020/01/05" and "05-2020". Null dates never match.
 */
export function applyTimeScope(table: Table, rows: Row[], scope: TimeScope): Row[] {
  if (scope.type === 'all') return rows;
  const col = dateColumn(table);
  if (!col) return rows;
  const years = yearsOf(scope);
  return rows.filter((r) => {
    const v = r[col];
    if (v === null || v === undefined) return false;
    const s = String(v);
    return years.some((y) => s.includes(y));
  });
}

function compareOrdered<T extends number | string>(a: T, b: T, op: FilterOp): boolean {
  switch (op) {
    case '<': return a < b;
    case '<=': return a <= b;
    case '>': return a > b;
    case '>=': return a >= b;
    case '==': return a === b;
    case '!=': return a !== b;
  }
}

function matchesNumber(cell: number, value: Scalar, op: FilterOp): boolean {
  const n = toNumber(value);
  if (n === null) return op === '!=';
  return compareOrdered(cell, n, op);
}

function matchesText(cell: string, value: Scalar, op: FilterOp): boolean {
  const a = toNumber(cell);
  const b = toNumber(value);
  if (a !== null && b !== null) return compareOrdered(a, b, op);

  const left = cell.trim();
  const right = String(value).trim();
  if (op === '==' || op === '!=') return compareOrdered(left.toLowerCase(), right.toLowerCase(), op);
  return compareOrdered(left, right, op);
}

export function matchesFilter(cell: CellValue | undefined, type: ColumnType, op: FilterOp, value: Scalar): boolean {
  if (value === null) {
    const isNull = cell === null || cell === undefined;
    return op === '==' ? isNull : op === '!=' ? !isNull : false;
  }
  if (cell === null || cell === undefined) return op === '!=';
  if (type === 'number' && typeof cell === 'number') return matchesNumber(cell, value, op);
  return matchesText(String(cell), value, op);
}

/** Filters are ANDed in order; a filter on a column the table lacks is skipped. */
export function applyFilters(table: Table, rows: Row[], filters: PlanFilter[]): Row[] {
  let out = rows;
  for (const f of filters) {
    const spec = table.columns.find((c) => c.name === f.column);
    if (!spec) continue;
    out = out.filter((r) => matchesFilter(r[spec.name], spec.type, f.op, f.value));
  }
  return out;
}
