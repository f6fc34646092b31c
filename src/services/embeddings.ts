// src/services/embeddings.ts
// What: Embedding client adapter and the OpenAI embedding function behind it.
// How: EmbeddingAdapter.embedBatch() dedupes texts, serves repeats from an LRU keyed by SHA-256 of the text,
//      splits the misses into batches of embeddingBatchMax, and runs batches through p-limit. Each batch call
//      gets a deadline and is retried with doubling backoff on transient failures; anything else surfaces as
//      EmbeddingServiceError with the input positions of the failed batch. One failed batch fails the call:
//      queued batches are dropped and running ones are aborted.

import { createHash } from 'crypto';
import type OpenAI from 'openai';
import pLimit from 'p-limit';
import type { Logger } from 'pino';
import { EmbeddingServiceError, errorMessage } from '../errors.js';
import { LruCache } from '../util/lruCache.js';
import { AbortedError, TimeoutError, sleep, withTimeout } from '../util/timeout.js';

export interface EmbeddingFunction {
  embed(texts: string[], options: { signal: AbortSignal }): Promise<number[][]>;
}

export interface EmbeddingAdapterOptions {
  batchMax: number;
  concurrency: number;
  maxAttempts: number;
  retryBaseMs: number;
  timeoutMs: number;
  cacheSize: number;
}

const MAX_RETRY_DELAY_MS = 10_000;

const TRANSIENT_STATUS = new Set([408, 409, 429]);
const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);
const TRANSIENT_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'FetchError']);

export function isTransientError(err: unknown): boolean {
  if (err instanceof TimeoutError) return true;
  if (!(err instanceof Error)) return false;
  if (TRANSIENT_NAMES.has(err.name)) return true;
  const status: unknown = Reflect.get(err, 'status');
  if (typeof status === 'number' && (TRANSIENT_STATUS.has(status) || status >= 500)) return true;
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' && TRANSIENT_CODES.has(code);
}

export function textKey(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

interface PendingBatch {
  texts: string[];
  keys: string[];
  // Input positions covered by this batch; one key may stand for several positions.
  positions: number[];
}

export class EmbeddingAdapter {
  private readonly cache: LruCache<string, number[]>;
  private dimension: number | null = null;

  constructor(
    private readonly fn: EmbeddingFunction,
    private readonly options: EmbeddingAdapterOptions,
    private readonly logger: Logger,
  ) {
    this.cache = new LruCache(options.cacheSize);
  }

  /** Dimension of the first vector ever returned; null until then. */
  get knownDimension(): number | null {
    return this.dimension;
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const results: Array<number[] | undefined> = new Array(texts.length);
    const missPositions = new Map<string, number[]>();
    const missTexts: Array<{ key: string; text: string }> = [];

    texts.forEach((text, i) => {
      const key = textKey(text);
      const cached = this.cache.get(key);
      if (cached) {
        results[i] = cached;
        return;
      }
      const positions = missPositions.get(key);
      if (positions) {
        positions.push(i);
      } else {
        missPositions.set(key, [i]);
        missTexts.push({ key, text });
      }
    });

    const batches: PendingBatch[] = [];
    for (let offset = 0; offset < missTexts.length; offset += this.options.batchMax) {
      const slice = missTexts.slice(offset, offset + this.options.batchMax);
      batches.push({
        texts: slice.map((m) => m.text),
        keys: slice.map((m) => m.key),
        positions: slice.flatMap((m) => missPositions.get(m.key) ?? []),
      });
    }

    if (batches.length > 0) {
      this.logger.debug(
        { texts: texts.length, misses: missTexts.length, batches: batches.length },
        'Embedding batch request',
      );
    }

    // The first failed batch drops the queued ones and aborts those still in flight, retries included.
    const limit = pLimit(this.options.concurrency);
    const batchesController = new AbortController();
    const cancelBatches = () => {
      limit.clearQueue();
      batchesController.abort();
    };
    if (signal?.aborted) cancelBatches();
    else signal?.addEventListener('abort', cancelBatches, { once: true });

    try {
      await Promise.all(
        batches.map((batch) =>
          limit(async () => {
            try {
              const vectors = await this.callWithRetry(batch, batchesController.signal);
              vectors.forEach((vector, j) => {
                const key = batch.keys[j];
                if (key === undefined) return;
                this.cache.set(key, vector);
                for (const pos of missPositions.get(key) ?? []) results[pos] = vector;
              });
            } catch (err) {
              cancelBatches();
              throw err;
            }
          }),
        ),
      );
    } finally {
      signal?.removeEventListener('abort', cancelBatches);
    }

    return results.map((vector, i) => {
      if (!vector) {
        throw new EmbeddingServiceError('Embedding missing from service response', [i], {
          operation: 'embedBatch',
        });
      }
      return vector;
    });
  }

  private async callWithRetry(batch: PendingBatch, signal?: AbortSignal): Promise<number[][]> {
    const { maxAttempts, retryBaseMs, timeoutMs } = this.options;
    let lastErr: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const vectors = await withTimeout((s) => this.fn.embed(batch.texts, { signal: s }), timeoutMs, signal);
        return this.checkResponse(batch, vectors);
      } catch (err) {
        if (err instanceof EmbeddingServiceError) throw err;
        lastErr = err;
        if (err instanceof AbortedError || !isTransientError(err) || attempt === maxAttempts) break;

        const delay = Math.min(retryBaseMs * 2 ** (attempt - 1), MAX_RETRY_DELAY_MS);
        this.logger.warn(
          { attempt, maxAttempts, delay, batchSize: batch.texts.length, err: errorMessage(err) },
          'Transient embedding failure; retrying',
        );
        try {
          await sleep(delay, signal);
        } catch (sleepErr) {
          lastErr = sleepErr;
          break;
        }
      }
    }

    throw new EmbeddingServiceError(`Embedding request failed: ${errorMessage(lastErr)}`, [...batch.positions].sort((a, b) => a - b), {
      operation: 'embedBatch',
      details: { batchSize: batch.texts.length, transient: isTransientError(lastErr) },
      cause: lastErr,
    });
  }

  private checkResponse(batch: PendingBatch, vectors: number[][]): number[][] {
    const positions = [...batch.positions].sort((a, b) => a - b);
    if (!Array.isArray(vectors) || vectors.length !== batch.texts.length) {
      throw new EmbeddingServiceError(
        `Malformed embedding response: expected ${batch.texts.length} vectors, got ${Array.isArray(vectors) ? vectors.length : 'none'}`,
        positions,
        { operation: 'embedBatch' },
      );
    }
    for (const vector of vectors) {
      const expected = this.dimension ?? vector.length;
      if (vector.length === 0 || vector.length !== expected) {
        throw new EmbeddingServiceError(
          `Malformed embedding response: vector dimension ${vector.length}, expected ${expected}`,
          positions,
          { operation: 'embedBatch', details: { expected, actual: vector.length } },
        );
      }
      this.dimension = expected;
    }
    return vectors;
  }
}

/** Embedding function backed by the OpenAI embeddings endpoint. */
export class OpenAIEmbeddingFunction implements EmbeddingFunction {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async embed(texts: string[], options: { signal: AbortSignal }): Promise<number[][]> {
    const res = await this.client.embeddings.create({ model: this.model, input: texts }, { signal: options.signal });
    // The endpoint reports each vector's input position; do not rely on array order.
    const out: number[][] = new Array(texts.length);
    for (const d of res.data) out[d.index] = d.embedding;
    return Array.from(out, (v) => v ?? []);
  }
}
