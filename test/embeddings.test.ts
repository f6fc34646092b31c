import { describe, expect, it } from 'vitest';
import { EmbeddingServiceError } from '../src/errors.js';
import {
  EmbeddingAdapter,
  isTransientError,
  textKey,
  type EmbeddingAdapterOptions,
  type EmbeddingFunction,
} from '../src/services/embeddings.js';
import { TimeoutError } from '../src/util/timeout.js';
import { KeywordEmbedder, keywordVector, silentLogger } from './helpers.js';

const baseOptions: EmbeddingAdapterOptions = {
  batchMax: 64,
  concurrency: 1,
  maxAttempts: 3,
  retryBaseMs: 0,
  timeoutMs: 1000,
  cacheSize: 100,
};

function adapter(fn: EmbeddingFunction, overrides: Partial<EmbeddingAdapterOptions> = {}): EmbeddingAdapter {
  return new EmbeddingAdapter(fn, { ...baseOptions, ...overrides }, silentLogger);
}

function httpError(status: number, message = `status ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

/** Fails the first `failures` calls with `error`, then embeds by keyword. */
class FlakyEmbedder implements EmbeddingFunction {
  calls = 0;

  constructor(
    private failures: number,
    private readonly error: () => Error,
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw this.error();
    }
    return texts.map(keywordVector);
  }
}

describe('EmbeddingAdapter', () => {
  it('splits input into batches and returns vectors in input order', async () => {
    const fn = new KeywordEmbedder();
    const texts = ['alpha', 'beta', 'gamma', 'delta', 'alpha beta'];
    const vectors = await adapter(fn, { batchMax: 2 }).embedBatch(texts);
    expect(fn.calls).toEqual([['alpha', 'beta'], ['gamma', 'delta'], ['alpha beta']]);
    expect(vectors).toEqual(texts.map(keywordVector));
  });

  it('returns [] without calling the service for empty input', async () => {
    const fn = new KeywordEmbedder();
    expect(await adapter(fn).embedBatch([])).toEqual([]);
    expect(fn.calls).toEqual([]);
  });

  it('embeds repeated texts once and serves later calls from the cache', async () => {
    const fn = new KeywordEmbedder();
    const a = adapter(fn);
    const first = await a.embedBatch(['alpha', 'beta', 'alpha']);
    expect(first[2]).toEqual(first[0]);
    await a.embedBatch(['beta', 'gamma']);
    expect(fn.calls).toEqual([['alpha', 'beta'], ['gamma']]);
  });

  it('evicts the least recently used entry when the cache is full', async () => {
    const fn = new KeywordEmbedder();
    const a = adapter(fn, { cacheSize: 2 });
    await a.embedBatch(['alpha', 'beta']);
    await a.embedBatch(['alpha']); // hit: beta is now the eldest
    await a.embedBatch(['gamma']); // evicts beta
    await a.embedBatch(['alpha', 'beta']);
    expect(fn.calls).toEqual([['alpha', 'beta'], ['gamma'], ['beta']]);
  });

  it('does not cache when the cache size is 0', async () => {
    const fn = new KeywordEmbedder();
    const a = adapter(fn, { cacheSize: 0 });
    await a.embedBatch(['alpha']);
    await a.embedBatch(['alpha']);
    expect(fn.calls).toEqual([['alpha'], ['alpha']]);
  });

  it('retries transient failures', async () => {
    const fn = new FlakyEmbedder(2, () => httpError(429));
    const vectors = await adapter(fn).embedBatch(['gamma']);
    expect(fn.calls).toBe(3);
    expect(vectors).toEqual([keywordVector('gamma')]);
  });

  it('gives up after maxAttempts transient failures', async () => {
    const fn = new FlakyEmbedder(10, () => httpError(503, 'unavailable'));
    const err = await adapter(fn, { maxAttempts: 3 })
      .embedBatch(['alpha', 'beta'])
      .catch((e: unknown) => e);
    expect(fn.calls).toBe(3);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    if (!(err instanceof EmbeddingServiceError)) return;
    expect(err.batchIndices).toEqual([0, 1]);
    expect(err.message).toBe('Embedding request failed: unavailable');
    expect(err.cause).toBeInstanceOf(Error);
  });

  it('does not retry a permanent failure and reports the failed batch positions', async () => {
    let calls = 0;
    const fn: EmbeddingFunction = {
      async embed(texts) {
        calls += 1;
        if (texts.includes('t2')) throw httpError(400, 'bad request');
        return texts.map(() => [1, 0]);
      },
    };
    const err = await adapter(fn, { batchMax: 2 })
      .embedBatch(['t0', 't1', 't2', 't3'])
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    if (!(err instanceof EmbeddingServiceError)) return;
    expect(err.batchIndices).toEqual([2, 3]);
    expect(calls).toBe(2);
  });

  it('drops queued batches once one batch has failed', async () => {
    let calls = 0;
    const fn: EmbeddingFunction = {
      async embed() {
        calls += 1;
        throw httpError(400, 'bad request');
      },
    };
    const err = await adapter(fn, { batchMax: 1, concurrency: 1 })
      .embedBatch(['t0', 't1', 't2', 't3', 't4', 't5'])
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    if (!(err instanceof EmbeddingServiceError)) return;
    expect(err.batchIndices).toEqual([0]);
    expect(calls).toBe(1);
  });

  it('aborts batches still in flight when a sibling fails', async () => {
    const started: string[] = [];
    let siblingAborted = false;
    const fn: EmbeddingFunction = {
      embed(texts, { signal }) {
        started.push(...texts);
        if (texts[0] === 't0') {
          return new Promise<number[][]>((_resolve, reject) => {
            setTimeout(() => reject(httpError(400, 'bad request')), 5);
          });
        }
        return new Promise<number[][]>((_resolve, reject) => {
          signal.addEventListener('abort', () => {
            siblingAborted = true;
            reject(new Error('aborted'));
          });
        });
      },
    };
    const err = await adapter(fn, { batchMax: 1, concurrency: 2, timeoutMs: 1000 })
      .embedBatch(['t0', 't1', 't2', 't3'])
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    if (!(err instanceof EmbeddingServiceError)) return;
    expect(err.message).toBe('Embedding request failed: bad request');
    expect(started).toEqual(['t0', 't1']);
    expect(siblingAborted).toBe(true);
  });

  it('reports every position a duplicated text stood for', async () => {
    const fn: EmbeddingFunction = {
      async embed() {
        throw httpError(401, 'unauthorized');
      },
    };
    const err = await adapter(fn)
      .embedBatch(['x', 'y', 'x'])
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    if (!(err instanceof EmbeddingServiceError)) return;
    expect(err.batchIndices).toEqual([0, 1, 2]);
  });

  it('treats a response with the wrong count as malformed', async () => {
    let calls = 0;
    const fn: EmbeddingFunction = {
      async embed() {
        calls += 1;
        return [[1, 0]];
      },
    };
    await expect(adapter(fn).embedBatch(['a', 'b'])).rejects.toThrow(
      'Malformed embedding response: expected 2 vectors, got 1',
    );
    expect(calls).toBe(1);
  });

  it('rejects a vector dimension that changes between calls', async () => {
    let dimension = 3;
    const fn: EmbeddingFunction = {
      async embed(texts) {
        return texts.map(() => Array.from({ length: dimension }, () => 1));
      },
    };
    const a = adapter(fn);
    await a.embedBatch(['first']);
    expect(a.knownDimension).toBe(3);
    dimension = 4;
    await expect(a.embedBatch(['second'])).rejects.toBeInstanceOf(EmbeddingServiceError);
  });

  it('times out slow calls and retries them', async () => {
    let calls = 0;
    const fn: EmbeddingFunction = {
      embed() {
        calls += 1;
        return new Promise<number[][]>(() => undefined);
      },
    };
    const err = await adapter(fn, { timeoutMs: 10, maxAttempts: 2 })
      .embedBatch(['slow'])
      .catch((e: unknown) => e);
    expect(calls).toBe(2);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    if (!(err instanceof EmbeddingServiceError)) return;
    expect(err.cause).toBeInstanceOf(TimeoutError);
  });

  it('stops without calling the service when the caller has already aborted', async () => {
    const fn = new KeywordEmbedder();
    const controller = new AbortController();
    controller.abort();
    await expect(adapter(fn).embedBatch(['alpha'], controller.signal)).rejects.toBeInstanceOf(EmbeddingServiceError);
    expect(fn.calls).toEqual([]);
  });
});

describe('isTransientError', () => {
  it('classifies errors', () => {
    expect(isTransientError(new TimeoutError(5))).toBe(true);
    expect(isTransientError(httpError(429))).toBe(true);
    expect(isTransientError(httpError(500))).toBe(true);
    expect(isTransientError(httpError(408))).toBe(true);
    expect(isTransientError(httpError(400))).toBe(false);
    expect(isTransientError(httpError(401))).toBe(false);
    expect(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
    const connection = new Error('connection');
    connection.name = 'APIConnectionError';
    expect(isTransientError(connection)).toBe(true);
    expect(isTransientError('nope')).toBe(false);
  });
});

describe('textKey', () => {
  it('is the sha256 of the exact text', () => {
    expect(textKey('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(textKey('a')).not.toBe(textKey('a '));
  });
});
