// packages/assistant/src/assistant.ts
// RECEIVED → PLANNED → EXECUTED → SUMMARIZED → RETURNED

import { createLogger, emptyTrace, errorMessage, isMetricError, noopPlan } from '@tapwise/core';
import type { AnswerTrace, ComparisonOutcome, Logger, MetricResults, QueryPlan } from '@tapwise/core';
import { executePlan } from '@tapwise/executor';
import type { TableLookup } from '@tapwise/executor';
import type { PlanCompiler } from '@tapwise/planner';
import { FALLBACK_ANSWER } from './summarizer.js';
import type { AnswerSummarizer } from './summarizer.js';

export interface AssistantResponse {
  answer: string;
  plan: QueryPlan;
  results: MetricResults;
  comparison: ComparisonOutcome;
  trace: AnswerTrace;
}

export interface AssistantDeps {
  compiler: Pick<PlanCompiler, 'compile'>;
  tables: TableLookup;
  summarizer: Pick<AnswerSummarizer, 'summarize'>;
  logger?: Logger;
}

function fallbackResponse(trace: AnswerTrace = emptyTrace()): AssistantResponse {
  return { answer: FALLBACK_ANSWER, plan: noopPlan(), results: {}, comparison: { type: 'none' }, trace };
}

/** Public entrypoint. Never throws. */
export class Assistant {
  private readonly compiler: AssistantDeps['compiler'];
  private readonly tables: TableLookup;
  private readonly summarizer: AssistantDeps['summarizer'];
  private readonly logger: Logger;

  constructor(deps: AssistantDeps) {
    this.compiler = deps.compiler;
    this.tables = deps.tables;
    this.summarizer = deps.summarizer;
    this.logger = deps.logger ?? createLogger('assistant');
  }

  async answer(question: string): Promise<string> {
    return (await this.ask(question)).answer;
  }

  async ask(question: string): Promise<AssistantResponse> {
    const q = typeof question === 'string' ? question.trim() : '';
    if (!q) return fallbackResponse();

    const trace = emptyTrace();
    try {
      this.logger.debug({ question: q }, 'RECEIVED');

      const compiled = await this.compiler.compile(q);
      trace.retrieved = compiled.retrieved.map((d) => ({ id: d.id, score: d.score }));
      trace.retrieveMs = compiled.retrieveMs;
      trace.planMs = compiled.planMs;
      if (compiled.fallback) trace.planFallback = compiled.fallback;
      this.logger.info({ metrics: compiled.plan.metrics.length, fallback: compiled.fallback }, 'PLANNED');

      const t0 = Date.now();
      const execution = executePlan(compiled.plan, this.tables);
      trace.executeMs = Date.now() - t0;
      trace.metricErrors = Object.values(execution.metrics).filter(isMetricError).length;
      this.logger.info({ errors: trace.metricErrors, comparison: execution.comparison }, 'EXECUTED');

      const t1 = Date.now();
      const summary = await this.summarizer.summarize(q, compiled.plan, execution);
      trace.summarizeMs = Date.now() - t1;
      if (summary.fallback) trace.summaryFallback = summary.fallback;
      this.logger.info({ fallback: summary.fallback }, 'SUMMARIZED');

      this.logger.debug('RETURNED');
      return {
        answer: summary.text,
        plan: compiled.plan,
        results: execution.metrics,
        comparison: execution.comparison,
        trace
      };
    } catch (e) {
      this.logger.error({ err: errorMessage(e) }, 'answer-failed');
      return fallbackResponse(trace);
    }
  }
}
