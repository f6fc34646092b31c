// src/services/retriever.ts
// What: Query text to ordered, provenance-carrying passages.
// How: Embeds the query as a one-item batch, over-fetches ceil(k * overfetchFactor) candidates from the index,
//      drops filtered documents, low scores and chunks the store no longer has (a delete that raced the query),
//      then truncates to k. No index lock is held while the embedding call is in flight.

import type { Logger } from 'pino';
import { EmptyIndexError, InvalidArgumentError } from '../errors.js';
import { documentIdOf, type RetrievedChunk } from '../models/types.js';
import type { DocumentStore } from '../db/documentStore.js';
import type { EmbeddingAdapter } from './embeddings.js';
import type { VectorIndex } from './vectorIndex.js';

export interface RetrieverOptions {
  overfetchFactor: number;
  minScore: number;
}

export interface RetrieveOptions {
  // Restrict results to these documents.
  documentIds?: Iterable<string>;
  signal?: AbortSignal;
}

export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingAdapter,
    private readonly index: VectorIndex,
    private readonly store: DocumentStore,
    private readonly options: RetrieverOptions,
    private readonly logger: Logger,
  ) {}

  async retrieve(queryText: string, k: number, opts: RetrieveOptions = {}): Promise<RetrievedChunk[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer (got ${k})`, {
        operation: 'retrieve',
        details: { k },
      });
    }
    if (queryText.trim().length === 0) {
      throw new InvalidArgumentError('Query text is empty', { operation: 'retrieve' });
    }

    const { entryCount } = await this.index.stats();
    if (entryCount === 0) throw new EmptyIndexError({ operation: 'retrieve' });

    const [queryVector] = await this.embeddings.embedBatch([queryText], opts.signal);
    if (!queryVector) throw new InvalidArgumentError('No embedding returned for query', { operation: 'retrieve' });

    const fetchK = Math.max(k, Math.ceil(k * this.options.overfetchFactor));
    const candidates = await this.index.query(queryVector, fetchK);

    const allowed = opts.documentIds ? new Set(opts.documentIds) : null;
    const kept = candidates.filter((c) => {
      if (c.score < this.options.minScore) return false;
      if (!allowed) return true;
      const documentId = documentIdOf(c.id);
      return documentId !== null && allowed.has(documentId);
    });

    const chunks = await this.store.getChunks(kept.map((c) => c.id));
    const out: RetrievedChunk[] = [];
    for (const c of kept) {
      const chunk = chunks.get(c.id);
      if (!chunk) continue;
      out.push({ chunk, score: c.score });
      if (out.length === k) break;
    }

    this.logger.debug(
      { k, fetched: candidates.length, filtered: kept.length, returned: out.length },
      'Retrieval finished',
    );
    return out;
  }
}
