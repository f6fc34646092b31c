// src/config/settings.ts
// What: Retrieval tuning knobs with defaults and valid ranges.
// How: A zod schema declares every field; resolveRagSettings() fills defaults and converts validation issues
//      into a single ConfigError so callers see every bad field at once. An unset overlap follows chunkSize.

import { z } from 'zod';
import { ConfigError } from '../errors.js';

const DEFAULT_OVERLAP = 200;

const int = (min: number, max: number, def: number) => z.number().int().min(min).max(max).default(def);

const schema = z
  .object({
    chunkSize: int(1, 100_000, 1000),
    overlap: int(0, 99_999, DEFAULT_OVERLAP),
    embeddingBatchMax: int(1, 2048, 64),
    embeddingConcurrency: int(1, 16, 2),
    embeddingMaxAttempts: int(1, 10, 3),
    embeddingRetryBaseMs: int(0, 60_000, 500),
    embeddingTimeoutMs: int(1, 600_000, 30_000),
    embeddingCacheSize: int(0, 1_000_000, 10_000),
    retrievalOverfetchFactor: z.number().min(1).max(20).default(3),
    topK: int(1, 100, 5),
    minScore: z.number().min(-1).max(1).default(-1),
    maxContextTokens: int(1, 1_000_000, 3000),
    generationTimeoutMs: int(1, 600_000, 60_000),
    approximateIndexThreshold: int(1, 10_000_000, 10_000),
    searchWidth: int(1, 10_000, 64),
    graphDegree: int(2, 128, 16),
  })
  .strict()
  .refine((s) => s.overlap < s.chunkSize, {
    message: 'overlap must be smaller than chunkSize',
    path: ['overlap'],
  });

export type RagSettings = z.infer<typeof schema>;

export type RagSettingsInput = Partial<RagSettings>;

/** A fifth of the chunk, capped at DEFAULT_OVERLAP. */
export function defaultOverlap(chunkSize: number): number {
  return Math.min(DEFAULT_OVERLAP, Math.floor(chunkSize / 5));
}

export function resolveRagSettings(input: RagSettingsInput = {}): RagSettings {
  const { chunkSize, overlap } = input;
  const withOverlap =
    overlap === undefined && typeof chunkSize === 'number' && Number.isInteger(chunkSize) && chunkSize > 0
      ? { ...input, overlap: defaultOverlap(chunkSize) }
      : input;
  const parsed = schema.safeParse(withOverlap);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid retrieval settings: ${issues.join('; ')}`, {
      operation: 'resolveRagSettings',
      details: { issues },
    });
  }
  return parsed.data;
}

export const DEFAULT_RAG_SETTINGS: RagSettings = resolveRagSettings();
