// apps/http/src/bootstrap.ts
// catalog → tables → index (reuse or rebuild) → compiler/summarizer → assistant

import { Assistant, AnswerSummarizer } from '@tapwise/assistant';
import { TableStore, loadCatalog } from '@tapwise/catalog';
import type { DatasetCatalog } from '@tapwise/catalog';
import type { Embedder, Logger } from '@tapwise/core';
import { OpenAIAssistantModel, OpenAIEmbedder } from '@tapwise/llm';
import type { AssistantModel } from '@tapwise/llm';
import { PlanCompiler } from '@tapwise/planner';
import { SemanticIndex, SqliteIndexStore } from '@tapwise/semantic-index';
import type { IndexStore } from '@tapwise/semantic-index';
import type { AppConfig } from './config.js';

export interface Services {
  catalog: DatasetCatalog;
  tables: TableStore;
  index: SemanticIndex;
  compiler: PlanCompiler;
  assistant: Assistant;
  topK: number;
  debugErrors: boolean;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  model?: AssistantModel;
  embedder?: Embedder;
  store?: IndexStore;
}

/** Configuration problems (catalog, dataset files, embedder) surface here and abort startup. */
export async function bootstrap(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Promise<Services> {
  const catalog = loadCatalog(config.catalogPath);
  logger.info({ datasets: catalog.size }, 'catalog-loaded');

  const tables = await TableStore.load(catalog, logger);

  const model = overrides.model ?? new OpenAIAssistantModel({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    planModel: config.llm.planModel,
    summaryModel: config.llm.summaryModel,
    timeoutMs: config.llm.timeoutMs
  });
  const embedder = overrides.embedder ?? new OpenAIEmbedder({
    apiKey: config.embedding.apiKey,
    baseURL: config.embedding.baseURL,
    model: config.embedding.model,
    timeoutMs: config.llm.timeoutMs
  });
  const store = overrides.store ?? new SqliteIndexStore(config.indexPath);

  const index = new SemanticIndex(catalog, tables, embedder, store, { logger });
  const status = await index.init();
  logger.info({ ...status }, 'index-ready');

  const compiler = new PlanCompiler(index, model, { topK: config.topK, timeoutMs: config.llm.timeoutMs, logger });
  const summarizer = new AnswerSummarizer(model, { timeoutMs: config.llm.timeoutMs, logger });
  const assistant = new Assistant({ compiler, tables, summarizer, logger });

  return {
    catalog,
    tables,
    index,
    compiler,
    assistant,
    topK: config.topK,
    debugErrors: config.debugErrors,
    close: () => store.close()
  };
}
