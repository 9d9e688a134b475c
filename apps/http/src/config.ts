// apps/http/src/config.ts
import { z } from 'zod';
import { Errors } from '@tapwise/core';

const flag = z
  .string()
  .optional()
  .transform((v) => v === '1' || v === 'true');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CATALOG_PATH: optionalString,
  INDEX_PATH: z.string().default('.tapwise/semantic-index.sqlite'),
  LLM_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  LLM_BASE_URL: optionalString,
  PLAN_MODEL: optionalString,
  SUMMARY_MODEL: optionalString,
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_API_KEY: optionalString,
  EMBEDDING_BASE_URL: optionalString,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  RETRIEVE_TOP_K: z.coerce.number().int().min(1).max(50).default(8),
  CORS_ORIGIN: z.string().default(''),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  DEBUG_ERRORS: flag
});

// used only against the default OpenAI endpoint
export const DEFAULT_PLAN_MODEL = 'gpt-4o-mini';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  catalogPath?: string;
  indexPath: string;
  llm: { apiKey: string; baseURL?: string; planModel: string; summaryModel: string; timeoutMs: number };
  embedding: { apiKey: string; baseURL?: string; model: string };
  topK: number;
  corsOrigins: string[];
  rateLimitMax: number;
  debugErrors: boolean;
}

/** Parses the environment once. A missing API key or a malformed value is a CONFIG error. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw Errors.CONFIG(
      `Invalid environment: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  const e = parsed.data;
  const apiKey = e.LLM_API_KEY ?? e.OPENAI_API_KEY;
  if (!apiKey) throw Errors.CONFIG('LLM_API_KEY (or OPENAI_API_KEY) is required');

  const planModel = e.PLAN_MODEL ?? (e.LLM_BASE_URL ? undefined : DEFAULT_PLAN_MODEL);
  if (!planModel) throw Errors.CONFIG('PLAN_MODEL is required when LLM_BASE_URL is set');

  // a custom chat provider's key never goes to the default embeddings endpoint
  const reuseChatKey = !e.LLM_BASE_URL || e.EMBEDDING_BASE_URL !== undefined;
  const embeddingKey = e.EMBEDDING_API_KEY ?? e.OPENAI_API_KEY ?? (reuseChatKey ? apiKey : undefined);
  if (!embeddingKey) {
    throw Errors.CONFIG('EMBEDDING_API_KEY (or OPENAI_API_KEY) is required when LLM_BASE_URL is set');
  }

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    catalogPath: e.CATALOG_PATH,
    indexPath: e.INDEX_PATH,
    llm: {
      apiKey,
      baseURL: e.LLM_BASE_URL,
      planModel,
      summaryModel: e.SUMMARY_MODEL ?? planModel,
      timeoutMs: e.LLM_TIMEOUT_MS
    },
    embedding: {
      apiKey: embeddingKey,
      baseURL: e.EMBEDDING_BASE_URL,
      model: e.EMBEDDING_MODEL
    },
    topK: e.RETRIEVE_TOP_K,
    corsOrigins: e.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
    debugErrors: e.DEBUG_ERRORS
  };
}
