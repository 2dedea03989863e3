/**
 * Support Knowledge Assistant - Bootstrap
 * =======================================
 * Validates configuration, builds or loads the knowledge base, then serves HTTP.
 */

import { env } from './env';
import { KnowledgeAssistant, createLLMClient } from './ai';
import { createApp } from './server';
import { createError } from './lib/errors';
import { appLogger, logError } from './utils/logger';

async function main(): Promise<void> {
  if (!env.OPENAI_API_KEY) {
    throw createError.config.providerMissing('OPENAI_API_KEY');
  }

  const client = createLLMClient('openai', {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    defaultModel: env.OPENAI_MODEL,
    defaultEmbeddingModel: env.EMBEDDING_MODEL,
    timeoutMs: env.GENERATION_TIMEOUT_MS,
  });

  appLogger.info({ docsPath: env.DOCS_PATH, indexPath: env.VECTOR_DB_PATH }, 'Initializing knowledge assistant...');

  const assistant = await KnowledgeAssistant.create({
    client,
    docsPath: env.DOCS_PATH,
    indexPath: env.VECTOR_DB_PATH,
    embeddingModel: env.EMBEDDING_MODEL,
    embeddingBatchSize: env.EMBEDDING_BATCH_SIZE,
    maxChunks: env.MAX_RELEVANT_CHUNKS,
    similarityThreshold: env.SIMILARITY_THRESHOLD,
    maxSectionLength: env.CHUNK_MAX_LENGTH,
    overlap: env.CHUNK_OVERLAP,
    generation: {
      model: env.OPENAI_MODEL,
      maxAttempts: env.GENERATION_MAX_ATTEMPTS,
      baseDelayMs: env.GENERATION_BASE_DELAY_MS,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
      actionCrossCheck: env.ACTION_CROSS_CHECK,
    },
  });

  const app = createApp(assistant, { resolveRateLimitPoints: env.RESOLVE_RATE_LIMIT_POINTS });

  const server = app.listen(env.PORT, env.HOST, () => {
    appLogger.info({ host: env.HOST, port: env.PORT }, `Server running on http://${env.HOST}:${env.PORT}`);
  });

  const shutdown = (signal: string) => {
    appLogger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) {
        logError({ error: err, context: 'app' });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logError({
    error: error instanceof Error ? error : new Error(String(error)),
    context: 'app',
    metadata: { phase: 'startup' },
  });
  process.exit(1);
});
