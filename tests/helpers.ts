/* tests/helpers.ts */
// In-process stand-ins shared by the package and http specs.
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Embedder } from '@tapwise/core';
import type { AssistantModel, PlanRequest, SummaryRequest } from '@tapwise/llm';

/**
 * Bag-of-keywords embedder: dimension i counts occurrences of vocab[i]
 * (case-insensitive). Records every call so tests can count embeddings.
 */
export class KeywordEmbedder implements Embedder {
  readonly id: string;
  readonly calls: string[][] = [];
  failWith: Error | null = null;

  constructor(private readonly vocab: string[], id = 'test:keywords') {
    this.id = id;
  }

  get embeddedTexts(): number {
    return this.calls.reduce((n, c) => n + c.length, 0);
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    if (this.failWith) throw this.failWith;
    return texts.map((t) => {
      const lower = t.toLowerCase();
      return this.vocab.map((w) => lower.split(w.toLowerCase()).length - 1);
    });
  }
}

export type ScriptedReply = string | Error | 'hang';

/** AssistantModel that answers from queues; an empty queue yields ''. */
export class ScriptedModel implements AssistantModel {
  readonly planCalls: PlanRequest[] = [];
  readonly summaryCalls: SummaryRequest[] = [];

  constructor(
    readonly planReplies: ScriptedReply[] = [],
    readonly summaryReplies: ScriptedReply[] = []
  ) {}

  compilePlan(req: PlanRequest, signal?: AbortSignal): Promise<string> {
    this.planCalls.push(req);
    return reply(this.planReplies.shift() ?? '', signal);
  }

  summarize(req: SummaryRequest, signal?: AbortSignal): Promise<string> {
    this.summaryCalls.push(req);
    return reply(this.summaryReplies.shift() ?? '', signal);
  }
}

function reply(r: ScriptedReply, signal?: AbortSignal): Promise<string> {
  if (r instanceof Error) return Promise.reject(r);
  if (r === 'hang') {
    // settles only when the caller aborts
    return new Promise((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  }
  return Promise.resolve(r);
}

export interface FixtureDataset {
  file: string;
  csv: string;
  description?: string;
  column_notes?: string | string[];
  columns?: Record<string, 'number' | 'text' | 'date'>;
}

/** Writes CSVs plus a catalog.json into a fresh temp dir; returns the catalog path. */
export function writeCatalogFixture(datasets: Record<string, FixtureDataset>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tapwise-'));
  const entries: Record<string, object> = {};
  for (const [name, d] of Object.entries(datasets)) {
    fs.writeFileSync(path.join(dir, d.file), d.csv);
    entries[name] = {
      path: d.file,
      description: d.description ?? '',
      column_notes: d.column_notes ?? '',
      ...(d.columns ? { columns: d.columns } : {})
    };
  }
  const catalogPath = path.join(dir, 'catalog.json');
  fs.writeFileSync(catalogPath, JSON.stringify({ datasets: entries }, null, 2));
  return catalogPath;
}

export function removeFixture(catalogPath: string): void {
  const dir = path.dirname(catalogPath);
  if (!catalogPath || !dir.startsWith(os.tmpdir())) return;
  fs.rmSync(dir, { recursive: true, force: true });
}

export const WATER_ACCESS_CSV = [
  'country,zone,date_YY,safely_managed_pct,basic_pct',
  'Kenya,Nairobi,2020,80,15',
  'Kenya,Mombasa,2021,90,8',
  'Uganda,Central,2020,40,45',
  'Uganda,Central,2021,44,41'
].join('\n');

export const WATER_ACCESS: FixtureDataset = {
  file: 'water_access.csv',
  csv: WATER_ACCESS_CSV,
  description: 'Water access levels by zone and year.',
  column_notes: [
    '- country: Country name',
    '- zone: Administrative zone',
    '- date_YY: Year',
    '- safely_managed_pct: Percentage of population with safely managed water',
    '- basic_pct: Percentage of population with basic water'
  ]
};

export const PRODUCTION: FixtureDataset = {
  file: 'production.csv',
  csv: [
    'country,date_YYMMDD,production_m3',
    'Kenya,2020/01/05,100',
    'Kenya,2019/12/31,200',
    'Uganda,2020/11/02,300'
  ].join('\n'),
  description: 'Daily water production volumes.',
  column_notes: '- country: Country name\n- date_YYMMDD: Calendar date\n- production_m3: Volume produced (m3)'
};

export const VOCAB = ['water', 'access', 'production', 'country', 'safely', 'volume', 'zone', 'date', 'percentage'];
