/* apps/http/test/app.spec.ts */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { AnswerSummarizer, Assistant } from '@tapwise/assistant';
import { DatasetCatalog, TableStore, loadCatalog } from '@tapwise/catalog';
import { Errors, silentLogger } from '@tapwise/core';
import { PlanCompiler } from '@tapwise/planner';
import { SemanticIndex, SqliteIndexStore } from '@tapwise/semantic-index';
import { buildApp } from '../src/app.js';
import {
  KeywordEmbedder, ScriptedModel, VOCAB, WATER_ACCESS, removeFixture, writeCatalogFixture
} from '../../../tests/helpers.js';

const KENYA_PLAN = {
  time_scope: { type: 'all' },
  metrics: [{
    name: 'kenya_mean', dataset: 'water_access', column: 'safely_managed_pct', agg: 'mean',
    filters: [{ column: 'country', op: '==', value: 'Kenya' }]
  }],
  comparison: { type: 'none', left_metric: null, right_metric: null }
};

describe('HTTP surface', () => {
  let catalogPath: string;
  let catalog: DatasetCatalog;
  let tables: TableStore;
  let index: SemanticIndex;
  let signature: string;
  let model: ScriptedModel;
  let app: FastifyInstance;
  const store = new SqliteIndexStore(':memory:');

  beforeAll(async () => {
    catalogPath = writeCatalogFixture({ water_access: WATER_ACCESS });
    catalog = loadCatalog(catalogPath);
    tables = await TableStore.load(catalog, silentLogger);
    index = new SemanticIndex(catalog, tables, new KeywordEmbedder(VOCAB), store, { logger: silentLogger });
    signature = (await index.init()).signature;

    model = new ScriptedModel();
    const compiler = new PlanCompiler(index, model, { logger: silentLogger });
    const assistant = new Assistant({
      compiler,
      tables,
      summarizer: new AnswerSummarizer(model, { logger: silentLogger }),
      logger: silentLogger
    });
    app = await buildApp({ catalog, tables, index, compiler, assistant, topK: 8, debugErrors: false }, { logger: false });
  });

  afterAll(async () => {
    await app.close();
    await store.close();
    removeFixture(catalogPath);
  });

  it('GET /healthz answers ok with a request id', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    expect(res.headers['x-request-id']).toMatch(/^req-[a-z0-9]+$/);
  });

  it('GET /readyz reports the index', async () => {
    const res = await app.inject({ method: 'GET', url: '/readyz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, index: { documents: 6, signature }, datasets: 1 });
  });

  it('GET /datasets lists typed columns and row counts', async () => {
    const res = await app.inject({ method: 'GET', url: '/datasets' });
    expect(res.json()).toEqual({
      datasets: [{
        name: 'water_access',
        description: 'Water access levels by zone and year.',
        columns: [
          { name: 'country', type: 'text' },
          { name: 'zone', type: 'text' },
          { name: 'date_YY', type: 'date' },
          { name: 'safely_managed_pct', type: 'number' },
          { name: 'basic_pct', type: 'number' }
        ],
        rows: 4
      }]
    });
  });

  it('POST /answer returns only the answer unless debugging', async () => {
    model.planReplies.push(JSON.stringify(KENYA_PLAN));
    model.summaryReplies.push('Kenya averaged 85.');
    const plain = await app.inject({ method: 'POST', url: '/answer', payload: { question: 'Kenya average?' } });
    expect(plain.statusCode).toBe(200);
    expect(plain.json()).toEqual({ answer: 'Kenya averaged 85.' });

    model.planReplies.push(JSON.stringify(KENYA_PLAN));
    model.summaryReplies.push('Kenya averaged 85.');
    const debug = await app.inject({
      method: 'POST', url: '/answer?debug=1', payload: { question: 'Kenya average?' }
    });
    const body = debug.json();
    expect(body.answer).toBe('Kenya averaged 85.');
    expect(body.results.kenya_mean.value).toBe(85);
    expect(body.comparison).toEqual({ type: 'none' });
    expect(body.trace.retrieved).toHaveLength(6);
  });

  it('POST /answer rejects a blank question', async () => {
    const res = await app.inject({ method: 'POST', url: '/answer', payload: { question: '   ' } });
    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.code).toBe('VALIDATION');
    expect(body.details[0]).toEqual({ path: 'question', msg: 'question must not be blank', code: 'too_small' });
    expect(res.headers['x-request-id']).toBe(body.requestId);
  });

  it('POST /plan returns the compiled plan and its context', async () => {
    model.planReplies.push('not a plan');
    const res = await app.inject({ method: 'POST', url: '/plan', payload: { question: 'safely managed water' } });
    const body = res.json();
    expect(body.fallback).toBe('non-json reply');
    expect(body.plan.metrics).toEqual([]);
    expect(body.retrieved).toHaveLength(6);
  });

  it('POST /execute runs a plan and validates it', async () => {
    const ok = await app.inject({ method: 'POST', url: '/execute', payload: { plan: KENYA_PLAN } });
    expect(ok.statusCode).toBe(200);
    expect(ok.json().results.kenya_mean).toMatchObject({ value: 85, rows: 2 });

    const bad = await app.inject({
      method: 'POST', url: '/execute', payload: { plan: { ...KENYA_PLAN, time_scope: { type: 'year' } } }
    });
    expect(bad.statusCode).toBe(400);
    expect(bad.json().details[0].path).toBe('plan.time_scope.year');
  });

  it('POST /retrieve honours topK', async () => {
    const res = await app.inject({
      method: 'POST', url: '/retrieve', payload: { question: 'safely managed water percentage', topK: 2 }
    });
    const { documents } = res.json();
    expect(documents).toHaveLength(2);
    expect(documents[0].id).toBe('column::water_access::safely_managed_pct');
  });

  it('maps malformed JSON bodies to 400', async () => {
    const res = await app.inject({
      method: 'POST', url: '/answer', headers: { 'content-type': 'application/json' }, payload: '{ nope'
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('VALIDATION');
  });
});

describe('HTTP error handling', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    const tables = TableStore.fromTables([]);
    const model = new ScriptedModel();
    const failingIndex = {
      retrieve: () => Promise.reject(Errors.EMBEDDING_FAILED('provider down')),
      status: () => null
    };
    const compiler = new PlanCompiler(failingIndex, model, { logger: silentLogger });
    app = await buildApp({
      catalog: new DatasetCatalog([]),
      tables,
      index: failingIndex,
      compiler,
      assistant: new Assistant({ compiler, tables, summarizer: new AnswerSummarizer(model, { logger: silentLogger }), logger: silentLogger }),
      topK: 8,
      debugErrors: false
    }, { logger: false });
  });

  afterAll(async () => { await app.close(); });

  it('classifies configuration failures as 503', async () => {
    const res = await app.inject({ method: 'POST', url: '/retrieve', payload: { question: 'q' } });
    expect(res.statusCode).toBe(503);
    const body = res.json();
    expect(body).toEqual({
      code: 'CONFIG',
      message: 'Request failed',
      error: 'Embedding failed: provider down',
      requestId: res.headers['x-request-id']
    });
  });

  it('adds the error code in debug mode', async () => {
    const res = await app.inject({
      method: 'POST', url: '/retrieve', headers: { 'x-debug': '1' }, payload: { question: 'q' }
    });
    expect(res.json().trace).toEqual({ errorCode: 'CONFIG' });
  });

  it('is not ready before the index initialized', async () => {
    const res = await app.inject({ method: 'GET', url: '/readyz' });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ ok: false, index: null, datasets: 0 });
  });
});
