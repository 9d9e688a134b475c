// packages/catalog/src/table-store.ts
import fs from 'node:fs';
import Papa from 'papaparse';
import { Errors, createLogger } from '@tapwise/core';
import type { CellValue, ColumnSpec, ColumnType, Logger, Row, Table } from '@tapwise/core';
import type { DatasetCatalog } from './catalog.js';

export function isDateColumn(name: string): boolean {
  return name.toLowerCase().includes('date');
}

export function toNumber(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string') {
    const s = v.trim();
    if (s === '') return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function isBlank(v: unknown): boolean {
  return v === null || v === undefined || (typeof v === 'string' && v.trim() === '');
}

// Date-like names stay strings (substring year matching); otherwise numeric iff every value is.
function inferType(name: string, values: unknown[]): ColumnType {
  if (isDateColumn(name)) return 'date';
  let seen = 0;
  for (const v of values) {
    if (isBlank(v)) continue;
    if (toNumber(v) === null) return 'text';
    seen++;
  }
  return seen > 0 ? 'number' : 'text';
}

function normalizeCell(v: unknown, type: ColumnType): CellValue {
  if (isBlank(v)) return null;
  if (type === 'number') return toNumber(v);
  return String(v).trim();
}

function columnNames(records: Array<Record<string, unknown>>): string[] {
  const seen = new Set<string>();
  for (const r of records) for (const k of Object.keys(r)) seen.add(k);
  return [...seen];
}

export function buildTable(
  name: string,
  records: Array<Record<string, unknown>>,
  declared?: Readonly<Record<string, ColumnType>>,
  order?: string[]
): Table {
  const columns: ColumnSpec[] = (order ?? columnNames(records)).map((col) => {
    const type = declared?.[col];
    return type
      ? { name: col, type, declared: true }
      : { name: col, type: inferType(col, records.map(r => r[col])) };
  });

  const rows = records.map((r) => {
    const row: Row = {};
    for (const c of columns) row[c.name] = normalizeCell(r[c.name], c.type);
    return row;
  });

  return { name, columns, rows };
}

export function parseCsv(text: string): { fields: string[]; records: Array<Record<string, string>>; errors: number } {
  const res = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim()
  });
  return { fields: res.meta.fields ?? [], records: res.data, errors: res.errors.length };
}

/** Named, read-only tables shared by the index and the executor. */
export class TableStore {
  private readonly tables = new Map<string, Table>();

  private constructor(tables: Table[]) {
    for (const t of tables) this.tables.set(t.name, t);
  }

  static fromTables(tables: Table[]): TableStore {
    return new TableStore(tables);
  }

  static async load(catalog: DatasetCatalog, logger: Logger = createLogger('table-store')): Promise<TableStore> {
    const tables: Table[] = [];
    for (const d of catalog.list()) {
      if (!fs.existsSync(d.location)) throw Errors.DATASET_MISSING(d.name, d.location);

      const text = await fs.promises.readFile(d.location, 'utf-8');
      const { fields, records, errors } = parseCsv(text);
      if (errors > 0) logger.warn({ dataset: d.name, errors }, 'csv-parse-issues');

      const table = buildTable(d.name, records, d.columns, fields);
      logger.info({ dataset: d.name, rows: table.rows.length, columns: table.columns.length }, 'dataset-loaded');
      tables.push(table);
    }
    return new TableStore(tables);
  }

  get(name: string): Table | undefined {
    return this.tables.get(name);
  }

  names(): string[] {
    return [...this.tables.keys()];
  }

  get size(): number {
    return this.tables.size;
  }
}
