import { createLogger, errorMessage, isMetricError, withTimeout } from '@tapwise/core';
import type { ComparisonOutcome, ExecutionResult, Logger, MetricResults, QueryPlan } from '@tapwise/core';
import type { AssistantModel } from '@tapwise/llm';

export const FALLBACK_ANSWER =
  'I could not confidently answer that from the available datasets. Try naming the indicator, the country or the year you are interested in.';

export function formatNumber(n: number): string {
  return Number.isInteger(n) ? String(n) : String(Math.round(n * 100) / 100);
}

function comparisonLine(outcome: ComparisonOutcome, results: MetricResults): string | null {
  if (outcome.type === 'none') return null;
  if (outcome.tie) return `Comparison: ${outcome.left} and ${outcome.right} are equal.`;
  if (!outcome.greater) return `Comparison: not available (${outcome.reason ?? 'missing metric'}).`;

  const loser = outcome.greater === outcome.left ? outcome.right : outcome.left;
  const win = results[outcome.greater];
  const lose = loser ? results[loser] : undefined;
  if (!win || isMetricError(win) || !lose || isMetricError(lose)) {
    return `Comparison: ${outcome.greater} is greater.`;
  }
  return `Comparison: ${outcome.greater} (${formatNumber(win.value)}) is greater than ${loser} (${formatNumber(lose.value)}).`;
}

/** Deterministic answer text: one line per metric, then the comparison winner. */
export function templateSummary(question: string, execution: ExecutionResult): string {
  const lines = [`Results for: ${question}`];
  for (const [name, r] of Object.entries(execution.metrics)) {
    lines.push(
      isMetricError(r)
        ? `- ${name}: error (${r.error})`
        : `- ${name}: ${r.agg} of ${r.column} in ${r.dataset} = ${formatNumber(r.value)} (${r.rows} values)`
    );
  }
  const cmp = comparisonLine(execution.comparison, execution.metrics);
  if (cmp) lines.push(cmp);
  return lines.join('\n');
}

export interface SummaryResult {
  text: string;
  /** set when the model was not used or its reply was unusable */
  fallback?: string;
}

export interface AnswerSummarizerOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export class AnswerSummarizer {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly model: AssistantModel, opts: AnswerSummarizerOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 20_000;
    this.logger = opts.logger ?? createLogger('summarizer');
  }

  async summarize(question: string, plan: QueryPlan, execution: ExecutionResult): Promise<SummaryResult> {
    if (Object.keys(execution.metrics).length === 0) {
      return { text: FALLBACK_ANSWER, fallback: 'no metrics' };
    }

    try {
      const text = await withTimeout(
        (signal) =>
          this.model.summarize(
            { question, plan, results: execution.metrics, comparison: execution.comparison },
            signal
          ),
        this.timeoutMs,
        'summary'
      );
      if (text.trim()) return { text: text.trim() };
      this.logger.warn('summary-empty');
      return { text: templateSummary(question, execution), fallback: 'empty reply' };
    } catch (e) {
      this.logger.warn({ err: errorMessage(e) }, 'summary-model-failed');
      return { text: templateSummary(question, execution), fallback: `model call failed: ${errorMessage(e)}` };
    }
  }
}
