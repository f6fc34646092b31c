// src/context.ts
// What: Process-wide application context.
// How: Builds the OpenAI client, the pg pool (only when DATABASE_URL is set) and the RagService once, and hands
//      them to the HTTP layer. close() flushes the index and ends the pool; it is safe to call twice.

import OpenAI from 'openai';
import type { Pool } from 'pg';
import type { AppConfig } from './config/env.js';
import type { DocumentStore } from './db/documentStore.js';
import { PgDocumentStore } from './db/documentStore.js';
import { MemoryDocumentStore } from './db/memoryDocumentStore.js';
import { createPool } from './db/pool.js';
import type { Logger } from './logging.js';
import { OpenAIEmbeddingFunction } from './services/embeddings.js';
import { createFetchDownloader } from './services/fileRegistry.js';
import { OpenAIGenerationFunction } from './services/generation.js';
import { RagService } from './services/ragService.js';

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  service: RagService;
  close(): Promise<void>;
}

export function createAppContext(config: AppConfig, logger: Logger): AppContext {
  // Retries belong to the embedding adapter; generation is never retried.
  const openai = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: 0,
  });

  let pool: Pool | null = null;
  let store: DocumentStore;
  if (config.DATABASE_URL) {
    pool = createPool(config.DATABASE_URL);
    store = new PgDocumentStore(pool);
  } else {
    logger.warn('DATABASE_URL not set; document metadata is kept in memory only');
    store = new MemoryDocumentStore();
  }

  const service = new RagService({
    store,
    embedder: new OpenAIEmbeddingFunction(openai, config.OPENAI_EMBED_MODEL),
    generator: new OpenAIGenerationFunction(openai, config.OPENAI_CHAT_MODEL, config.GENERATION_TEMPERATURE),
    settings: config.rag,
    logger,
    indexPath: config.INDEX_PATH,
    autosave: config.INDEX_AUTOSAVE,
    downloader: createFetchDownloader(config.FILE_DOWNLOAD_MAX_BYTES),
    downloadTimeoutMs: config.FILE_DOWNLOAD_TIMEOUT_MS,
  });

  let closed = false;
  return {
    config,
    logger,
    service,
    async close() {
      if (closed) return;
      closed = true;
      try {
        await service.flushIndex();
      } finally {
        if (pool) await pool.end();
      }
    },
  };
}
