// packages/core/src/trace.ts
// AnswerTrace: what happened inside one answer() call

export interface RetrievalHit {
  id: string;
  score: number;
}

export interface AnswerTrace {
  retrieved: RetrievalHit[];
  planFallback?: string;     // why the no-op plan was used, if it was
  summaryFallback?: string;  // why the template summary was used, if it was
  metricErrors: number;
  retrieveMs: number;
  planMs: number;            // model call + parse, excluding retrieval
  executeMs: number;
  summarizeMs: number;
}

export function emptyTrace(): AnswerTrace {
  return { retrieved: [], metricErrors: 0, retrieveMs: 0, planMs: 0, executeMs: 0, summarizeMs: 0 };
}
