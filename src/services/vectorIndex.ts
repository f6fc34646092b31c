// src/services/vectorIndex.ts
// What: Owned vector index over chunk embeddings: insert, delete-by-document, k-NN query, persist and load.
// How: Vectors are normalized once on insert and kept in a Map whose order is insertion order. Queries score
//      by dot product: an exact scan below approximateThreshold entries, the HNSW graph at or above it. All
//      state sits behind a readers-writer lock; queries compute synchronously under the read lock, so they
//      see the index either before or after a write, never halfway. persist/load hold the write lock for the
//      whole file operation. load validates the file completely before swapping it in.

import { promises as fs } from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  DimensionMismatchError,
  DuplicateIdError,
  IndexLoadError,
  InvalidArgumentError,
  errorMessage,
} from '../errors.js';
import { documentIdOf, type ScoredId } from '../models/types.js';
import { ReadWriteLock } from '../util/rwLock.js';
import { clampSimilarity, dot, isFiniteVector, l2Norm, normalize } from '../util/vector.js';
import { HnswGraph, compareScored, type GraphEntry } from './hnswGraph.js';

export const INDEX_FORMAT = 'pdf-rag-core/vector-index';
export const INDEX_FORMAT_VERSION = 1;

export interface VectorIndexOptions {
  // Fixed dimension; when omitted the first insert or load decides it.
  dimension?: number;
  approximateThreshold: number;
  searchWidth: number;
  graphDegree: number;
}

export interface VectorIndexStats {
  entryCount: number;
  dimension: number | null;
  documentCount: number;
  approximate: boolean;
}

interface IndexEntry extends GraphEntry {
  documentId: string;
}

interface IndexState {
  dimension: number | null;
  entries: Map<string, IndexEntry>;
  byDocument: Map<string, Set<string>>;
  nextSeq: number;
  graph: HnswGraph | null;
}

const persistedSchema = z
  .object({
    format: z.literal(INDEX_FORMAT),
    version: z.literal(INDEX_FORMAT_VERSION),
    metric: z.literal('cosine'),
    dimension: z.number().int().positive().nullable(),
    count: z.number().int().nonnegative(),
    entries: z.array(
      z.object({
        id: z.string().min(1),
        vector: z.array(z.number().finite()),
      }),
    ),
  })
  .superRefine((data, ctx) => {
    if (data.count !== data.entries.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `count ${data.count} != ${data.entries.length} entries` });
    }
    if (data.entries.length > 0 && data.dimension === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'dimension missing for a non-empty index' });
    }
  });

type PersistedIndex = z.infer<typeof persistedSchema>;

function emptyState(dimension: number | null): IndexState {
  return { dimension, entries: new Map(), byDocument: new Map(), nextSeq: 0, graph: null };
}

export class VectorIndex {
  private state: IndexState;
  private readonly lock = new ReadWriteLock();
  private readonly fixedDimension: number | null;

  constructor(
    private readonly options: VectorIndexOptions,
    private readonly logger: Logger,
  ) {
    this.fixedDimension = options.dimension ?? null;
    this.state = emptyState(this.fixedDimension);
  }

  async insert(chunkId: string, vector: ArrayLike<number>): Promise<void> {
    await this.insertMany([{ id: chunkId, vector }]);
  }

  /** Validates the whole batch first; either every entry is added or none is. */
  async insertMany(items: ReadonlyArray<{ id: string; vector: ArrayLike<number> }>): Promise<void> {
    await this.lock.write(() => {
      const s = this.state;
      let dimension = s.dimension;
      const seen = new Set<string>();
      const prepared: Array<{ id: string; documentId: string; vector: Float32Array }> = [];

      for (const item of items) {
        const documentId = documentIdOf(item.id);
        if (documentId === null) {
          throw new InvalidArgumentError(`Malformed chunk id: ${item.id}`, {
            operation: 'insert',
            details: { chunkId: item.id },
          });
        }
        if (s.entries.has(item.id) || seen.has(item.id)) {
          throw new DuplicateIdError(item.id, { operation: 'insert' });
        }
        if (dimension !== null && item.vector.length !== dimension) {
          throw new DimensionMismatchError(dimension, item.vector.length, {
            operation: 'insert',
            details: { chunkId: item.id },
          });
        }
        const unit = isFiniteVector(item.vector) ? normalize(item.vector) : null;
        if (!unit) {
          throw new InvalidArgumentError(`Vector for ${item.id} is zero or not finite`, {
            operation: 'insert',
            details: { chunkId: item.id },
          });
        }
        dimension = item.vector.length;
        seen.add(item.id);
        prepared.push({ id: item.id, documentId, vector: unit });
      }

      s.dimension = dimension;
      for (const p of prepared) this.addEntry(s, p.id, p.documentId, p.vector);
      this.syncGraph(s, false);
    });
  }

  /** Removes every entry of the document; returns how many were removed. Repeat calls are no-ops. */
  async deleteByDocument(documentId: string): Promise<number> {
    return this.lock.write(() => {
      const s = this.state;
      const ids = s.byDocument.get(documentId);
      if (!ids || ids.size === 0) return 0;
      for (const id of ids) s.entries.delete(id);
      s.byDocument.delete(documentId);
      // The graph cannot drop nodes; rebuild it from what is left.
      this.syncGraph(s, true);
      this.logger.debug({ documentId, removed: ids.size }, 'Removed document vectors');
      return ids.size;
    });
  }

  async query(vector: ArrayLike<number>, k: number): Promise<ScoredId[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer (got ${k})`, {
        operation: 'query',
        details: { k },
      });
    }
    return this.lock.read(() => {
      const s = this.state;
      if (s.entries.size === 0) return [];
      if (s.dimension !== null && vector.length !== s.dimension) {
        throw new DimensionMismatchError(s.dimension, vector.length, { operation: 'query' });
      }
      const unit = isFiniteVector(vector) ? normalize(vector) : null;
      if (!unit) {
        throw new InvalidArgumentError('Query vector is zero or not finite', { operation: 'query' });
      }

      const scored = s.graph
        ? s.graph.search(unit, k, this.options.searchWidth)
        : this.scan(s, unit, k);
      return scored.map(({ entry, score }) => ({ id: entry.id, score: clampSimilarity(score) }));
    });
  }

  async has(chunkId: string): Promise<boolean> {
    return this.lock.read(() => this.state.entries.has(chunkId));
  }

  async stats(): Promise<VectorIndexStats> {
    return this.lock.read(() => ({
      entryCount: this.state.entries.size,
      dimension: this.state.dimension,
      documentCount: this.state.byDocument.size,
      approximate: this.state.graph !== null,
    }));
  }

  async documentIds(): Promise<string[]> {
    return this.lock.read(() => [...this.state.byDocument.keys()]);
  }

  /** Writes the index atomically (temp file + rename); returns the bytes written. */
  async persist(filePath: string): Promise<number> {
    return this.lock.write(async () => {
      const s = this.state;
      const doc: PersistedIndex = {
        format: INDEX_FORMAT,
        version: INDEX_FORMAT_VERSION,
        metric: 'cosine',
        dimension: s.dimension,
        count: s.entries.size,
        entries: [...s.entries.values()].map((e) => ({ id: e.id, vector: Array.from(e.vector) })),
      };
      const body = JSON.stringify(doc);
      const tmp = `${filePath}.${process.pid}.tmp`;
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tmp, body, 'utf8');
      await fs.rename(tmp, filePath);
      const bytes = Buffer.byteLength(body);
      this.logger.info({ path: filePath, entries: doc.count, bytes }, 'Vector index persisted');
      return bytes;
    });
  }

  /** Replaces the index with the file's contents; on any failure the current index is kept. */
  async load(filePath: string): Promise<void> {
    await this.lock.write(async () => {
      let raw: string;
      try {
        raw = await fs.readFile(filePath, 'utf8');
      } catch (err) {
        throw new IndexLoadError(filePath, `Cannot read index file: ${errorMessage(err)}`, {
          operation: 'load',
          cause: err,
        });
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (err) {
        throw new IndexLoadError(filePath, 'Index file is not valid JSON', { operation: 'load', cause: err });
      }

      const parsed = persistedSchema.safeParse(json);
      if (!parsed.success) {
        throw new IndexLoadError(filePath, `Index file is invalid: ${parsed.error.errors[0]?.message ?? 'unknown issue'}`, {
          operation: 'load',
          cause: parsed.error,
        });
      }

      const next = this.buildState(filePath, parsed.data);
      this.state = next;
      this.logger.info({ path: filePath, entries: next.entries.size, dimension: next.dimension }, 'Vector index loaded');
    });
  }

  private buildState(filePath: string, data: PersistedIndex): IndexState {
    const fail = (message: string): never => {
      throw new IndexLoadError(filePath, message, { operation: 'load' });
    };

    if (this.fixedDimension !== null && data.dimension !== null && data.dimension !== this.fixedDimension) {
      fail(`Index dimension ${data.dimension} does not match configured ${this.fixedDimension}`);
    }

    const next = emptyState(data.dimension ?? this.fixedDimension);
    for (const item of data.entries) {
      const documentId = documentIdOf(item.id);
      if (documentId === null) return fail(`Malformed chunk id in index file: ${item.id}`);
      if (next.entries.has(item.id)) return fail(`Duplicate chunk id in index file: ${item.id}`);
      if (item.vector.length !== data.dimension) {
        return fail(`Entry ${item.id} has dimension ${item.vector.length}, expected ${data.dimension}`);
      }
      // Stored vectors are already unit length; renormalizing would perturb the last bits of every score.
      const norm = l2Norm(item.vector);
      if (norm === 0) return fail(`Entry ${item.id} has a zero vector`);
      const unit = Math.abs(norm - 1) < 1e-4 ? Float32Array.from(item.vector) : normalize(item.vector);
      if (!unit) return fail(`Entry ${item.id} has a zero vector`);
      this.addEntry(next, item.id, documentId, unit);
    }
    this.syncGraph(next, true);
    return next;
  }

  private addEntry(s: IndexState, id: string, documentId: string, vector: Float32Array): void {
    const entry: IndexEntry = { id, documentId, vector, seq: s.nextSeq++ };
    s.entries.set(id, entry);
    let ids = s.byDocument.get(documentId);
    if (!ids) {
      ids = new Set();
      s.byDocument.set(documentId, ids);
    }
    ids.add(id);
    s.graph?.add(entry);
  }

  private syncGraph(s: IndexState, rebuild: boolean): void {
    if (s.entries.size < this.options.approximateThreshold) {
      s.graph = null;
      return;
    }
    if (s.graph && !rebuild) return;

    const graph = new HnswGraph({
      maxNeighbors: this.options.graphDegree,
      efConstruction: Math.max(this.options.searchWidth, this.options.graphDegree * 2),
    });
    for (const entry of s.entries.values()) graph.add(entry);
    s.graph = graph;
    this.logger.debug({ entries: s.entries.size }, 'Approximate search graph built');
  }

  private scan(s: IndexState, unit: Float32Array, k: number): Array<{ entry: GraphEntry; score: number }> {
    const scored: Array<{ entry: GraphEntry; score: number }> = [];
    for (const entry of s.entries.values()) scored.push({ entry, score: dot(unit, entry.vector) });
    scored.sort(compareScored);
    return scored.slice(0, k);
  }
}
