// apps/http/src/index.ts
import { createLogger } from '@tapwise/core';
import { buildApp } from './app.js';
import { bootstrap } from './bootstrap.js';
import { loadConfig } from './config.js';

async function main() {
  const config = loadConfig();
  const bootLog = createLogger('boot', config.logLevel);
  const services = await bootstrap(config, bootLog);

  const app = await buildApp(services, {
    logger: { level: config.logLevel },
    corsOrigins: config.corsOrigins,
    rateLimitMax: config.rateLimitMax
  });

  app.log.info(
    {
      catalog: config.catalogPath ?? 'catalog.json (nearest)',
      index: config.indexPath,
      plan_model: config.llm.planModel,
      embedding_model: config.embedding.model,
      llm_base_url: config.llm.baseURL ? 'env:LLM_BASE_URL' : 'default'
    },
    'assistant-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([app.close(), services.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`HTTP on :${config.port}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
