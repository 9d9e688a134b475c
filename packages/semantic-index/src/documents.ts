import { noteFor } from '@tapwise/catalog';
import type { DatasetCatalog, TableStore } from '@tapwise/catalog';
import type { DatasetDescriptor, SemanticDocument, Table } from '@tapwise/core';

export const datasetDocId = (dataset: string) => `dataset::${dataset}`;
export const columnDocId = (dataset: string, column: string) => `column::${dataset}::${column}`;

/** Up to `limit` distinct non-null values of a column, in row order. */
export function exampleValues(table: Table, column: string, limit = 5): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const row of table.rows) {
    const v = row[column];
    if (v === null || v === undefined) continue;
    const s = String(v);
    if (seen.has(s)) continue;
    seen.add(s);
    out.push(s);
    if (out.length >= limit) break;
  }
  return out;
}

export function datasetDocument(d: DatasetDescriptor, table?: Table): SemanticDocument {
  const cols = table ? table.columns.map(c => c.name) : [];
  return {
    id: datasetDocId(d.name),
    kind: 'dataset',
    dataset: d.name,
    text: [
      `DATASET: ${d.name}`,
      `DESCRIPTION: ${d.description}`,
      `COLUMNS: ${cols.join(', ')}`
    ].join('\n')
  };
}

export function columnDocuments(d: DatasetDescriptor, table: Table): SemanticDocument[] {
  return table.columns.map(({ name }) => ({
    id: columnDocId(d.name, name),
    kind: 'column' as const,
    dataset: d.name,
    column: name,
    text: [
      `DATASET: ${d.name}`,
      `COLUMN: ${name}`,
      `NOTE: ${noteFor(d, name)}`,
      `EXAMPLE_VALUES: ${exampleValues(table, name).join(', ')}`
    ].join('\n')
  }));
}

/** One dataset document per catalog entry, one column document per loaded column. */
export function buildDocuments(catalog: DatasetCatalog, tables: TableStore): SemanticDocument[] {
  const docs: SemanticDocument[] = [];
  for (const d of catalog.list()) {
    const table = tables.get(d.name);
    docs.push(datasetDocument(d, table));
    if (table) docs.push(...columnDocuments(d, table));
  }
  return docs;
}
