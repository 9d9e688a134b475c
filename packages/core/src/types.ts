import type { Aggregation, PlanFilter } from './schemas.js';

// --------------------
// Catalog & tables
// --------------------
export type ColumnType = 'number' | 'text' | 'date';

export type CellValue = number | string | null;

export type Row = Record<string, CellValue>;

export interface ColumnSpec {
  name: string;
  type: ColumnType;
  declared?: boolean; // true when typed by the catalog rather than at load time
}

export interface Table {
  name: string;
  columns: ColumnSpec[];
  rows: Row[];
}

export interface DatasetDescriptor {
  name: string;
  location: string;      // absolute path of the backing CSV
  description: string;
  columnNotes: string;   // one note line per column, matched by substring
  columns?: Readonly<Record<string, ColumnType>>;
}

// --------------------
// Semantic documents
// --------------------
export type DocumentKind = 'dataset' | 'column';

export interface SemanticDocument {
  id: string;            // dataset::<name> | column::<name>::<col>
  kind: DocumentKind;
  dataset: string;
  column?: string;
  text: string;
}

export interface EmbeddedDocument extends SemanticDocument {
  embedding: number[];
}

export interface RetrievedDocument extends SemanticDocument {
  score: number;
}

export interface Embedder {
  readonly id: string;   // provider:model, part of the index signature
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

// --------------------
// Execution results
// --------------------
export interface MetricValue {
  value: number;
  dataset: string;
  column: string;
  agg: Aggregation;
  filters: PlanFilter[];
  rows: number;          // numeric values that went into the aggregate
}

export interface MetricError {
  error: string;
}

export type MetricResult = MetricValue | MetricError;

export type MetricResults = Record<string, MetricResult>;

export function isMetricError(r: MetricResult): r is MetricError {
  return 'error' in r;
}

export type ComparisonOutcome =
  | { type: 'none' }
  | {
      type: 'which_is_greater';
      left: string | null;
      right: string | null;
      greater: string | null;
      tie: boolean;
      reason?: string;
    };

export interface ExecutionResult {
  metrics: MetricResults;
  comparison: ComparisonOutcome;
}
