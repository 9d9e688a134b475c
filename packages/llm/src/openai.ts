import OpenAI from 'openai';
import type { Embedder } from '@tapwise/core';
import type { AssistantModel, PlanRequest, SummaryRequest } from './model.js';
import { PLAN_SYSTEM_PROMPT, SUMMARY_SYSTEM_PROMPT, planUserPrompt, summaryUserPrompt } from './prompts.js';

export interface OpenAIClientOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
}

export interface OpenAIModelOptions extends OpenAIClientOptions {
  planModel: string;
  summaryModel?: string;
}

export interface OpenAIEmbedderOptions extends OpenAIClientOptions {
  model: string;
  batchSize?: number;
}

// Retries are off: a failed call falls back instead of multiplying latency.
function createClient(opts: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: opts.apiKey,
    ...(opts.baseURL ? { baseURL: opts.baseURL } : {}),
    maxRetries: 0,
    ...(opts.timeoutMs ? { timeout: opts.timeoutMs } : {})
  });
}

/** Chat-completions backed model; works with any OpenAI-compatible endpoint. */
export class OpenAIAssistantModel implements AssistantModel {
  private readonly client: OpenAI;
  private readonly planModel: string;
  private readonly summaryModel: string;

  constructor(opts: OpenAIModelOptions) {
    this.client = createClient(opts);
    this.planModel = opts.planModel;
    this.summaryModel = opts.summaryModel ?? opts.planModel;
  }

  async compilePlan(req: PlanRequest, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.planModel,
        messages: [
          { role: 'system', content: PLAN_SYSTEM_PROMPT },
          { role: 'user', content: planUserPrompt(req.question, req.context) }
        ],
        response_format: { type: 'json_object' },
        temperature: 0.1,
        max_tokens: 500
      },
      { signal }
    );
    return completion.choices[0]?.message?.content?.trim() ?? '';
  }

  async summarize(req: SummaryRequest, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.summaryModel,
        messages: [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: summaryUserPrompt(req) }
        ],
        temperature: 0.3,
        max_tokens: 220
      },
      { signal }
    );
    return completion.choices[0]?.message?.content?.trim() ?? '';
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly id: string;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly batchSize: number;

  constructor(opts: OpenAIEmbedderOptions) {
    this.client = createClient(opts);
    this.model = opts.model;
    this.batchSize = Math.max(1, opts.batchSize ?? 96);
    this.id = `openai:${opts.model}`;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const out: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const res = await this.client.embeddings.create(
        { model: this.model, input: texts.slice(i, i + this.batchSize) },
        { signal }
      );
      const ordered = res.data.slice().sort((a, b) => a.index - b.index);
      for (const d of ordered) out.push(d.embedding);
    }
    return out;
  }
}
