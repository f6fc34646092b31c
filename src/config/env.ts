/**
 * src/config/env.ts
 * What: Environment configuration loader/validator.
 * How: Loads .env via dotenv and validates process.env with zod. Service settings (keys, models, ports, paths)
 *      stay on AppConfig; retrieval tuning variables are collected into RagSettings and checked for range by
 *      resolveRagSettings(), so a bad CHUNK_OVERLAP fails at boot rather than on the first upload.
 */

import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { resolveRagSettings, type RagSettings, type RagSettingsInput } from './settings.js';

const optionalNumber = z.preprocess(
  (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.coerce.number().optional(),
);

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? parseInt(v, 10) : undefined),
    z.number().int().positive().default(def),
  );

const booleanFlag = (def: boolean) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? ['1', 'true', 'yes'].includes(v.trim().toLowerCase()) : undefined),
    z.boolean().default(def),
  );

const schema = z.object({
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_EMBED_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  DATABASE_URL: z.string().optional(),
  PORT: intWithDefault(3000),
  INDEX_PATH: z.string().default('data/vector-index.json'),
  INDEX_AUTOSAVE: booleanFlag(true),
  NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
  FILE_DOWNLOAD_TIMEOUT_MS: intWithDefault(60_000),
  FILE_DOWNLOAD_MAX_BYTES: intWithDefault(25 * 1024 * 1024),

  CHUNK_SIZE: optionalNumber,
  CHUNK_OVERLAP: optionalNumber,
  EMBEDDING_BATCH_MAX: optionalNumber,
  EMBEDDING_CONCURRENCY: optionalNumber,
  EMBEDDING_MAX_ATTEMPTS: optionalNumber,
  EMBEDDING_RETRY_BASE_MS: optionalNumber,
  EMBEDDING_TIMEOUT_MS: optionalNumber,
  EMBEDDING_CACHE_SIZE: optionalNumber,
  RETRIEVAL_OVERFETCH_FACTOR: optionalNumber,
  RETRIEVAL_TOP_K: optionalNumber,
  RETRIEVAL_MIN_SCORE: optionalNumber,
  MAX_CONTEXT_TOKENS: optionalNumber,
  GENERATION_TIMEOUT_MS: optionalNumber,
  APPROXIMATE_INDEX_THRESHOLD: optionalNumber,
  SEARCH_WIDTH: optionalNumber,
  GRAPH_DEGREE: optionalNumber,
});

export interface AppConfig {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL?: string;
  OPENAI_EMBED_MODEL: string;
  OPENAI_CHAT_MODEL: string;
  GENERATION_TEMPERATURE: number;
  // Unset means document metadata lives in process memory.
  DATABASE_URL?: string;
  PORT: number;
  INDEX_PATH: string; // absolute
  INDEX_AUTOSAVE: boolean;
  NODE_ENV: 'production' | 'development' | 'test';
  // Registered files are fetched with these limits.
  FILE_DOWNLOAD_TIMEOUT_MS: number;
  FILE_DOWNLOAD_MAX_BYTES: number;
  rag: RagSettings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;

  // Unset variables stay undefined and take the settings defaults.
  const ragInput: RagSettingsInput = {
    chunkSize: e.CHUNK_SIZE,
    overlap: e.CHUNK_OVERLAP,
    embeddingBatchMax: e.EMBEDDING_BATCH_MAX,
    embeddingConcurrency: e.EMBEDDING_CONCURRENCY,
    embeddingMaxAttempts: e.EMBEDDING_MAX_ATTEMPTS,
    embeddingRetryBaseMs: e.EMBEDDING_RETRY_BASE_MS,
    embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
    embeddingCacheSize: e.EMBEDDING_CACHE_SIZE,
    retrievalOverfetchFactor: e.RETRIEVAL_OVERFETCH_FACTOR,
    topK: e.RETRIEVAL_TOP_K,
    minScore: e.RETRIEVAL_MIN_SCORE,
    maxContextTokens: e.MAX_CONTEXT_TOKENS,
    generationTimeoutMs: e.GENERATION_TIMEOUT_MS,
    approximateIndexThreshold: e.APPROXIMATE_INDEX_THRESHOLD,
    searchWidth: e.SEARCH_WIDTH,
    graphDegree: e.GRAPH_DEGREE,
  };

  const databaseUrl = e.DATABASE_URL?.trim();

  return {
    OPENAI_API_KEY: e.OPENAI_API_KEY,
    OPENAI_BASE_URL: e.OPENAI_BASE_URL,
    OPENAI_EMBED_MODEL: e.OPENAI_EMBED_MODEL,
    OPENAI_CHAT_MODEL: e.OPENAI_CHAT_MODEL,
    GENERATION_TEMPERATURE: e.GENERATION_TEMPERATURE,
    DATABASE_URL: databaseUrl ? databaseUrl : undefined,
    PORT: e.PORT,
    INDEX_PATH: path.resolve(process.cwd(), e.INDEX_PATH),
    INDEX_AUTOSAVE: e.INDEX_AUTOSAVE,
    NODE_ENV: e.NODE_ENV,
    FILE_DOWNLOAD_TIMEOUT_MS: e.FILE_DOWNLOAD_TIMEOUT_MS,
    FILE_DOWNLOAD_MAX_BYTES: e.FILE_DOWNLOAD_MAX_BYTES,
    rag: resolveRagSettings(ragInput),
  };
}
