// packages/catalog/src/catalog.ts
import fs from 'node:fs';
import path from 'node:path';
import { CatalogFileSchema, Errors, errorMessage } from '@tapwise/core';
import type { CatalogFile, DatasetDescriptor } from '@tapwise/core';

function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export class DatasetCatalog {
  private readonly byName = new Map<string, DatasetDescriptor>();

  constructor(descriptors: DatasetDescriptor[]) {
    for (const d of descriptors) {
      this.byName.set(d.name, Object.freeze({
        ...d,
        ...(d.columns ? { columns: Object.freeze({ ...d.columns }) } : {})
      }));
    }
  }

  get(name: string): DatasetDescriptor | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  list(): DatasetDescriptor[] {
    return [...this.byName.values()];
  }

  get size(): number {
    return this.byName.size;
  }
}

/** Relative dataset paths are resolved against `baseDir` (the catalog file's directory). */
export function catalogFromFile(file: CatalogFile, baseDir: string): DatasetCatalog {
  return new DatasetCatalog(
    Object.entries(file.datasets).map(([name, entry]) => ({
      name,
      location: path.resolve(baseDir, entry.path),
      description: entry.description,
      columnNotes: entry.column_notes,
      ...(entry.columns ? { columns: entry.columns } : {})
    }))
  );
}

/**
 * Reads catalog.json, from `catalogPath` or the nearest one above the working
 * directory. A missing or malformed catalog is a configuration error.
 */
export function loadCatalog(catalogPath?: string): DatasetCatalog {
  const p = catalogPath ? path.resolve(catalogPath) : findUp('catalog.json');
  if (!p || !fs.existsSync(p)) throw Errors.CATALOG_NOT_FOUND(p ?? path.resolve('catalog.json'));

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, 'utf-8'));
  } catch (e) {
    throw Errors.CATALOG_INVALID(p, [errorMessage(e)]);
  }

  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw Errors.CATALOG_INVALID(p, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return catalogFromFile(parsed.data, path.dirname(p));
}

/** First note line mentioning the column, trimmed; '' when none does. */
export function noteFor(descriptor: DatasetDescriptor, column: string): string {
  for (const line of descriptor.columnNotes.split(/\r?\n/)) {
    if (line.includes(column)) return line.trim();
  }
  return '';
}
