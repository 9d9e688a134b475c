import fs from 'node:fs';
import { createHash } from 'node:crypto';
import type { DatasetCatalog } from '@tapwise/catalog';

function fileMtime(p: string): number | null {
  return fs.existsSync(p) ? fs.statSync(p).mtimeMs : null;
}

/**
 * Content hash of the catalog: name, path, file mtime, description and notes of
 * every dataset (sorted by name), plus the embedder id. Any change means the
 * persisted index is stale.
 */
export function computeSignature(catalog: DatasetCatalog, embedderId: string | null = null): string {
  const datasets = catalog
    .list()
    .slice()
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(d => ({
      dataset_name: d.name,
      path: d.location,
      mtime: fileMtime(d.location),
      description: d.description,
      column_notes: d.columnNotes
    }));
  const payload = JSON.stringify({ embedder: embedderId, datasets });
  return createHash('sha256').update(payload, 'utf-8').digest('hex');
}
