// apps/http/src/app.ts
import Fastify from 'fastify';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z, ZodError } from 'zod';
import type { Assistant } from '@tapwise/assistant';
import type { DatasetCatalog, TableStore } from '@tapwise/catalog';
import { QueryPlanSchema } from '@tapwise/core';
import { executePlan } from '@tapwise/executor';
import type { PlanCompiler } from '@tapwise/planner';
import type { SemanticIndex } from '@tapwise/semantic-index';
import { classifyError, zodDetails } from './errors.js';

export interface AppDeps {
  catalog: DatasetCatalog;
  tables: TableStore;
  index: Pick<SemanticIndex, 'retrieve' | 'status'>;
  compiler: Pick<PlanCompiler, 'compile'>;
  assistant: Pick<Assistant, 'ask'>;
  topK: number;
  debugErrors: boolean;
}

export interface AppOptions {
  logger?: boolean | { level: string };
  corsOrigins?: string[];
  rateLimitMax?: number;
}

const QuestionBody = z.object({ question: z.string().trim().min(1, 'question must not be blank') });
const RetrieveBody = QuestionBody.extend({ topK: z.number().int().min(1).max(50).optional() });
const ExecuteBody = z.object({ plan: QueryPlanSchema });

export function shouldDebug(req: FastifyRequest, force = false): boolean {
  const q = req.query;
  const flag = typeof q === 'object' && q !== null && 'debug' in q ? String(q.debug) : '';
  const h = String(req.headers['x-debug'] ?? '');
  return flag === '1' || h === '1' || force;
}

function validationFailed(req: FastifyRequest, reply: FastifyReply, e: ZodError) {
  return reply.status(400).send({ code: 'VALIDATION', message: 'Invalid request', details: zodDetails(e), requestId: req.id });
}

export async function buildApp(deps: AppDeps, opts: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? true,
    bodyLimit: 1_000_000
  });

  const allow = opts.corsOrigins ?? [];
  await app.register(cors, {
    origin: (origin: string | undefined, cb: (err: Error | null, allow: boolean) => void) => {
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 600,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err, requestId: req.id }, 'request-error');
    const { code, status, message } = classifyError(err);
    void reply.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(err instanceof ZodError ? { details: zodDetails(err) } : {}),
      ...(shouldDebug(req, deps.debugErrors) ? { trace: { errorCode: code } } : {})
    });
  });

  // ------------------------------------
  // POST /answer  (question -> answer text)
  // ------------------------------------
  app.post('/answer', async (req, reply) => {
    const body = QuestionBody.safeParse(req.body);
    if (!body.success) return validationFailed(req, reply, body.error);

    const res = await deps.assistant.ask(body.data.question);
    if (!shouldDebug(req, deps.debugErrors)) return reply.send({ answer: res.answer });
    return reply.send(res);
  });

  // ------------------------------------
  // POST /plan  (question -> QueryPlan; nothing executed)
  // ------------------------------------
  app.post('/plan', async (req, reply) => {
    const body = QuestionBody.safeParse(req.body);
    if (!body.success) return validationFailed(req, reply, body.error);

    const compiled = await deps.compiler.compile(body.data.question);
    return reply.send({
      plan: compiled.plan,
      fallback: compiled.fallback ?? null,
      retrieved: compiled.retrieved
    });
  });

  // ------------------------------------
  // POST /execute  (QueryPlan -> metric results)
  // ------------------------------------
  app.post('/execute', async (req, reply) => {
    const body = ExecuteBody.safeParse(req.body);
    if (!body.success) return validationFailed(req, reply, body.error);

    const { metrics, comparison } = executePlan(body.data.plan, deps.tables);
    return reply.send({ plan: body.data.plan, results: metrics, comparison });
  });

  // ------------------------------------
  // POST /retrieve  (question -> ranked documentation)
  // ------------------------------------
  app.post('/retrieve', async (req, reply) => {
    const body = RetrieveBody.safeParse(req.body);
    if (!body.success) return validationFailed(req, reply, body.error);

    const documents = await deps.index.retrieve(body.data.question, body.data.topK ?? deps.topK);
    return reply.send({ documents });
  });

  app.get('/datasets', async () => ({
    datasets: deps.catalog.list().map((d) => {
      const table = deps.tables.get(d.name);
      return {
        name: d.name,
        description: d.description,
        columns: table ? table.columns.map((c) => ({ name: c.name, type: c.type })) : [],
        rows: table ? table.rows.length : 0
      };
    })
  }));

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (_req, reply) => {
    const status = deps.index.status();
    const ok = status !== null;
    return reply.status(ok ? 200 : 503).send({
      ok,
      index: status ? { documents: status.documents, signature: status.signature } : null,
      datasets: deps.tables.size
    });
  });

  return app;
}
