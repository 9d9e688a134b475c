import { QueryPlanSchema, noopPlan } from '@tapwise/core';
import type { QueryPlan } from '@tapwise/core';
import { coerceJsonObject } from '@tapwise/llm';

export interface ParsedPlan {
  plan: QueryPlan;
  /** set when the no-op plan replaced the reply */
  fallback?: string;
}

export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

/** Model reply → validated plan, or the no-op plan with the reason. Never throws. */
export function parsePlan(raw: unknown): ParsedPlan {
  let obj: Record<string, unknown>;
  try {
    obj = coerceJsonObject(raw);
  } catch {
    return { plan: noopPlan(), fallback: 'non-json reply' };
  }

  const parsed = QueryPlanSchema.safeParse(obj);
  if (!parsed.success) {
    return { plan: noopPlan(), fallback: `invalid plan: ${formatIssues(parsed.error.issues).join('; ')}` };
  }
  return { plan: parsed.data };
}
