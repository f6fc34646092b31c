import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DimensionMismatchError,
  DuplicateIdError,
  IndexLoadError,
  InvalidArgumentError,
} from '../src/errors.js';
import { INDEX_FORMAT, VectorIndex, type VectorIndexOptions } from '../src/services/vectorIndex.js';
import { silentLogger } from './helpers.js';

function makeIndex(overrides: Partial<VectorIndexOptions> = {}): VectorIndex {
  return new VectorIndex(
    { approximateThreshold: 10_000, searchWidth: 64, graphDegree: 16, ...overrides },
    silentLogger,
  );
}

describe('VectorIndex', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vector-index-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns an inserted vector as its own nearest neighbor with score 1', async () => {
    const index = makeIndex();
    await index.insert('doc-a#0', [1, 2, 3]);
    const [hit] = await index.query([2, 4, 6], 1);
    expect(hit?.id).toBe('doc-a#0');
    expect(hit?.score).toBeCloseTo(1, 5);
  });

  it('orders results by descending similarity', async () => {
    const index = makeIndex();
    await index.insert('doc-1#0', [0, 0, 1]); // C
    await index.insert('doc-1#1', [1, 0, 0]); // A
    await index.insert('doc-1#2', [1, 1, 0]); // B
    const results = await index.query([1, 0.1, 0], 2);
    expect(results.map((r) => r.id)).toEqual(['doc-1#1', 'doc-1#2']);
    expect(results[0]?.score).toBeGreaterThan(results[1]?.score ?? 1);
  });

  it('breaks score ties by insertion order', async () => {
    const index = makeIndex();
    await index.insert('doc-1#5', [0, 1]);
    await index.insert('doc-1#2', [0, 1]);
    await index.insert('doc-1#9', [1, 0]);
    const results = await index.query([0, 1], 3);
    expect(results.map((r) => r.id)).toEqual(['doc-1#5', 'doc-1#2', 'doc-1#9']);
  });

  it('returns every entry when k exceeds the entry count, and [] when empty', async () => {
    const index = makeIndex();
    expect(await index.query([1, 0], 3)).toEqual([]);
    await index.insert('doc-1#0', [1, 0]);
    await index.insert('doc-1#1', [0, 1]);
    expect((await index.query([1, 0], 10)).map((r) => r.id)).toEqual(['doc-1#0', 'doc-1#1']);
  });

  it('rejects a non-positive or fractional k', async () => {
    const index = makeIndex();
    await index.insert('doc-1#0', [1, 0]);
    await expect(index.query([1, 0], 0)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(index.query([1, 0], -2)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(index.query([1, 0], 1.5)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('fixes the dimension on first insert and leaves the index unchanged on mismatch', async () => {
    const index = makeIndex();
    await index.insert('doc-1#0', [1, 0, 0]);
    await expect(index.insert('doc-1#1', [1, 0])).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(index.query([1, 0], 1)).rejects.toBeInstanceOf(DimensionMismatchError);
    const stats = await index.stats();
    expect(stats).toEqual({ entryCount: 1, dimension: 3, documentCount: 1, approximate: false });
    expect(await index.has('doc-1#1')).toBe(false);
  });

  it('rejects duplicates, zero vectors and malformed chunk ids', async () => {
    const index = makeIndex();
    await index.insert('doc-1#0', [1, 0]);
    await expect(index.insert('doc-1#0', [0, 1])).rejects.toBeInstanceOf(DuplicateIdError);
    await expect(index.insert('doc-1#1', [0, 0])).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(index.insert('doc-1#2', [Number.NaN, 1])).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(index.insert('no-ordinal', [0, 1])).rejects.toBeInstanceOf(InvalidArgumentError);
    expect((await index.stats()).entryCount).toBe(1);
  });

  it('inserts a batch atomically', async () => {
    const index = makeIndex();
    await expect(
      index.insertMany([
        { id: 'doc-2#0', vector: [1, 0] },
        { id: 'doc-2#1', vector: [1, 0, 0] },
      ]),
    ).rejects.toBeInstanceOf(DimensionMismatchError);
    expect((await index.stats()).entryCount).toBe(0);

    await expect(
      index.insertMany([
        { id: 'doc-2#0', vector: [1, 0] },
        { id: 'doc-2#0', vector: [0, 1] },
      ]),
    ).rejects.toBeInstanceOf(DuplicateIdError);
    expect((await index.stats()).entryCount).toBe(0);
  });

  it('deletes by document idempotently', async () => {
    const index = makeIndex();
    await index.insertMany([
      { id: 'doc-a#0', vector: [1, 0] },
      { id: 'doc-a#1', vector: [0.9, 0.1] },
      { id: 'doc-b#0', vector: [0.8, 0.2] },
    ]);
    expect(await index.deleteByDocument('doc-a')).toBe(2);
    expect(await index.deleteByDocument('doc-a')).toBe(0);
    expect(await index.deleteByDocument('doc-unknown')).toBe(0);
    expect((await index.query([1, 0], 5)).map((r) => r.id)).toEqual(['doc-b#0']);
    expect(await index.documentIds()).toEqual(['doc-b']);
  });

  it('round-trips through persist and load with identical query results', async () => {
    const file = path.join(dir, 'nested', 'index.json');
    const index = makeIndex();
    await index.insertMany([
      { id: 'doc-a#0', vector: [0.3, 0.7, 0.1] },
      { id: 'doc-a#1', vector: [0.9, 0.05, 0.2] },
      { id: 'doc-b#0', vector: [0.2, 0.2, 0.9] },
      { id: 'doc-b#1', vector: [0.4, 0.4, 0.4] },
    ]);
    const bytes = await index.persist(file);
    expect(bytes).toBe((await fs.stat(file)).size);

    const persisted: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(persisted).toMatchObject({ format: INDEX_FORMAT, version: 1, metric: 'cosine', dimension: 3, count: 4 });

    const restored = makeIndex();
    await restored.load(file);
    const target = [0.5, 0.3, 0.3];
    expect(await restored.query(target, 4)).toEqual(await index.query(target, 4));
    expect(await restored.documentIds()).toEqual(['doc-a', 'doc-b']);
  });

  it('keeps the current state when loading a missing or corrupt file', async () => {
    const index = makeIndex();
    await index.insert('doc-a#0', [1, 0]);

    await expect(index.load(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(IndexLoadError);

    const corrupt = path.join(dir, 'corrupt.json');
    await fs.writeFile(corrupt, '{"format":', 'utf8');
    await expect(index.load(corrupt)).rejects.toBeInstanceOf(IndexLoadError);

    const wrongCount = path.join(dir, 'wrong-count.json');
    await fs.writeFile(
      wrongCount,
      JSON.stringify({
        format: INDEX_FORMAT,
        version: 1,
        metric: 'cosine',
        dimension: 2,
        count: 2,
        entries: [{ id: 'doc-x#0', vector: [1, 0] }],
      }),
      'utf8',
    );
    await expect(index.load(wrongCount)).rejects.toThrow(/count 2 != 1 entries/);

    expect(await index.has('doc-a#0')).toBe(true);
    expect((await index.stats()).entryCount).toBe(1);
  });

  it('accepts concurrent inserts of different ids', async () => {
    const index = makeIndex();
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => index.insert(`doc-${i % 4}#${i}`, [1, i + 1])),
    );
    expect(await index.stats()).toMatchObject({ entryCount: 20, documentCount: 4 });
    for (let i = 0; i < 20; i++) expect(await index.has(`doc-${i % 4}#${i}`)).toBe(true);
  });

  it('serves a query racing a delete from the state before or after it', async () => {
    const index = makeIndex();
    await index.insertMany([
      { id: 'doc-a#0', vector: [1, 0] },
      { id: 'doc-a#1', vector: [0.9, 0.1] },
      { id: 'doc-b#0', vector: [0.8, 0.2] },
      { id: 'doc-b#1', vector: [0.1, 0.9] },
    ]);
    const before = (await index.query([1, 0], 4)).map((r) => r.id);

    // Issued without awaiting: the lock grants them in call order.
    const [first, removed, second] = await Promise.all([
      index.query([1, 0], 4),
      index.deleteByDocument('doc-a'),
      index.query([1, 0], 4),
    ]);

    expect(removed).toBe(2);
    expect(before).toEqual(['doc-a#0', 'doc-a#1', 'doc-b#0', 'doc-b#1']);
    expect(first.map((r) => r.id)).toEqual(before);
    expect(second.map((r) => r.id)).toEqual(['doc-b#0', 'doc-b#1']);
  });

  it('rejects an index file whose dimension differs from the configured one', async () => {
    const file = path.join(dir, 'three.json');
    const source = makeIndex();
    await source.insert('doc-a#0', [1, 0, 0]);
    await source.persist(file);

    const fixed = makeIndex({ dimension: 2 });
    await expect(fixed.load(file)).rejects.toBeInstanceOf(IndexLoadError);
  });
});

describe('VectorIndex approximate mode', () => {
  function pseudoRandomVectors(count: number, dimension: number, start = 42): number[][] {
    // Park-Miller generator so the data set is fixed.
    let seed = start;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647 - 0.5;
    };
    return Array.from({ length: count }, () => Array.from({ length: dimension }, next));
  }

  it('matches brute force when the search width covers the graph', async () => {
    const vectors = pseudoRandomVectors(30, 8);
    const items = vectors.map((vector, i) => ({ id: `doc-${i % 3}#${i}`, vector }));

    const exact = makeIndex();
    const approx = makeIndex({ approximateThreshold: 1, searchWidth: 64, graphDegree: 16 });
    await exact.insertMany(items);
    await approx.insertMany(items);
    expect((await approx.stats()).approximate).toBe(true);
    expect((await exact.stats()).approximate).toBe(false);

    for (const target of pseudoRandomVectors(5, 8)) {
      expect(await approx.query(target, 10)).toEqual(await exact.query(target, 10));
    }
  });

  it('still matches brute force after a delete rebuilds the graph', async () => {
    const items = pseudoRandomVectors(24, 6).map((vector, i) => ({ id: `doc-${i % 4}#${i}`, vector }));
    const exact = makeIndex();
    const approx = makeIndex({ approximateThreshold: 1, searchWidth: 64, graphDegree: 16 });
    await exact.insertMany(items);
    await approx.insertMany(items);
    await exact.deleteByDocument('doc-1');
    await approx.deleteByDocument('doc-1');

    const [target] = pseudoRandomVectors(1, 6);
    if (!target) throw new Error('no target vector');
    const results = await approx.query(target, 18);
    expect(results).toHaveLength(18);
    expect(results.some((r) => r.id.startsWith('doc-1#'))).toBe(false);
    expect(results).toEqual(await exact.query(target, 18));
  });

  it('reproduces the same results after a persist and load round trip', async () => {
    const file = path.join(os.tmpdir(), `vector-index-approx-${process.pid}.json`);
    const options = { approximateThreshold: 1, searchWidth: 16, graphDegree: 16 };
    const items = pseudoRandomVectors(50, 8).map((vector, i) => ({ id: `doc-${i % 5}#${i}`, vector }));
    const index = makeIndex(options);
    await index.insertMany(items);

    try {
      await index.persist(file);
      const restored = makeIndex(options);
      await restored.load(file);
      expect(await restored.stats()).toEqual({ entryCount: 50, dimension: 8, documentCount: 5, approximate: true });
      for (const target of pseudoRandomVectors(10, 8, 7)) {
        expect(await restored.query(target, 10)).toEqual(await index.query(target, 10));
      }
    } finally {
      await fs.rm(file, { force: true });
    }
  });

  it('finds more true neighbors with a wider search', async () => {
    const items = pseudoRandomVectors(200, 16).map((vector, i) => ({ id: `doc-${i % 5}#${i}`, vector }));
    const queries = pseudoRandomVectors(20, 16, 7);

    const exact = makeIndex();
    await exact.insertMany(items);
    const truth = await Promise.all(queries.map(async (p) => (await exact.query(p, 10)).map((r) => r.id)));

    async function recallAt10(searchWidth: number): Promise<number> {
      const approx = makeIndex({ approximateThreshold: 1, searchWidth, graphDegree: 4 });
      await approx.insertMany(items);
      let hits = 0;
      for (const [i, target] of queries.entries()) {
        const expected = new Set(truth[i]);
        for (const r of await approx.query(target, 10)) if (expected.has(r.id)) hits += 1;
      }
      return hits / (queries.length * 10);
    }

    const narrow = await recallAt10(1);
    const wide = await recallAt10(200);
    expect(narrow).toBeLessThan(0.9);
    expect(wide).toBeGreaterThanOrEqual(0.95);
  });
});
