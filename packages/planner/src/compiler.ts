// packages/planner/src/compiler.ts
// question → retrieved context → model reply → validated QueryPlan

import { createLogger, errorMessage, noopPlan, withTimeout } from '@tapwise/core';
import type { Logger, QueryPlan, RetrievedDocument } from '@tapwise/core';
import type { AssistantModel } from '@tapwise/llm';
import { renderContext, unseenReferences } from './context.js';
import { parsePlan } from './parse.js';

/** Anything that can return ranked documentation; SemanticIndex is one. */
export interface Retriever {
  retrieve(question: string, topK?: number): Promise<RetrievedDocument[]>;
}

export interface PlanCompilerOptions {
  topK?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface CompiledPlan {
  plan: QueryPlan;
  retrieved: RetrievedDocument[];
  fallback?: string;
  retrieveMs: number;
  planMs: number;
}

export class PlanCompiler {
  private readonly topK: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly retriever: Retriever,
    private readonly model: AssistantModel,
    opts: PlanCompilerOptions = {}
  ) {
    this.topK = opts.topK ?? 8;
    this.timeoutMs = opts.timeoutMs ?? 20_000;
    this.logger = opts.logger ?? createLogger('planner');
  }

  /** Never throws; every failure yields the no-op plan plus a `fallback` reason. */
  async compile(question: string): Promise<CompiledPlan> {
    const t0 = Date.now();
    let retrieved: RetrievedDocument[];
    try {
      retrieved = await this.retriever.retrieve(question, this.topK);
    } catch (e) {
      this.logger.warn({ err: errorMessage(e) }, 'retrieve-failed');
      return { plan: noopPlan(), retrieved: [], fallback: `retrieval failed: ${errorMessage(e)}`, retrieveMs: Date.now() - t0, planMs: 0 };
    }
    const retrieveMs = Date.now() - t0;

    const t1 = Date.now();
    let raw: string;
    try {
      raw = await withTimeout(
        (signal) => this.model.compilePlan({ question, context: renderContext(retrieved) }, signal),
        this.timeoutMs,
        'plan'
      );
    } catch (e) {
      this.logger.warn({ err: errorMessage(e) }, 'plan-model-failed');
      return { plan: noopPlan(), retrieved, fallback: `model call failed: ${errorMessage(e)}`, retrieveMs, planMs: Date.now() - t1 };
    }

    const { plan, fallback } = parsePlan(raw);
    const planMs = Date.now() - t1;
    if (fallback) {
      this.logger.warn({ fallback, raw }, 'plan-fallback');
      return { plan, retrieved, fallback, retrieveMs, planMs };
    }

    const unseen = unseenReferences(plan, retrieved);
    if (unseen.length) this.logger.warn({ unseen }, 'plan-references-outside-context');
    return { plan, retrieved, retrieveMs, planMs };
  }
}
