export type { AssistantModel, PlanRequest, SummaryRequest } from './model.js';
export { OpenAIAssistantModel, OpenAIEmbedder } from './openai.js';
export type { OpenAIModelOptions, OpenAIEmbedderOptions, OpenAIClientOptions } from './openai.js';
export { coerceJsonObject, firstBalancedObject, JsonCoercionError } from './json.js';
export {
  PLAN_SYSTEM_PROMPT,
  PLAN_OUTPUT_SHAPE,
  SUMMARY_SYSTEM_PROMPT,
  planUserPrompt,
  summaryUserPrompt
} from './prompts.js';
