import type { ComparisonOutcome, MetricResults, QueryPlan } from '@tapwise/core';

export interface PlanRequest {
  question: string;
  context: string;
}

export interface SummaryRequest {
  question: string;
  plan: QueryPlan;
  results: MetricResults;
  comparison: ComparisonOutcome;
}

/**
 * The language-model seam. `compilePlan` returns the raw reply text (expected
 * to hold a JSON object); `summarize` returns prose.
 */
export interface AssistantModel {
  compilePlan(req: PlanRequest, signal?: AbortSignal): Promise<string>;
  summarize(req: SummaryRequest, signal?: AbortSignal): Promise<string>;
}
