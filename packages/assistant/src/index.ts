export { Assistant } from './assistant.js';
export type { AssistantDeps, AssistantResponse } from './assistant.js';
export { AnswerSummarizer, templateSummary, formatNumber, FALLBACK_ANSWER } from './summarizer.js';
export type { AnswerSummarizerOptions, SummaryResult } from './summarizer.js';
