import type { QueryPlan, RetrievedDocument } from '@tapwise/core';

export function renderContext(docs: RetrievedDocument[]): string {
  return docs
    .map((d) => `[${d.kind}] dataset=${d.dataset}, column=${d.column ?? ''}\n${d.text}`)
    .join('\n\n---\n\n');
}

/** Metric datasets/columns that no retrieved document mentions. */
export function unseenReferences(plan: QueryPlan, docs: RetrievedDocument[]): string[] {
  const datasets = new Set(docs.map((d) => d.dataset));
  const columns = new Set<string>();
  for (const d of docs) {
    if (d.column) columns.add(`${d.dataset}.${d.column}`);
    // dataset documents list their columns on the COLUMNS line
    const line = d.kind === 'dataset' ? d.text.split('\n').find((l) => l.startsWith('COLUMNS: ')) : undefined;
    if (line) {
      for (const c of line.slice('COLUMNS: '.length).split(', ')) if (c) columns.add(`${d.dataset}.${c}`);
    }
  }

  const out: string[] = [];
  for (const m of plan.metrics) {
    if (!datasets.has(m.dataset)) out.push(m.dataset);
    else if (!columns.has(`${m.dataset}.${m.column}`)) out.push(`${m.dataset}.${m.column}`);
  }
  return out;
}
