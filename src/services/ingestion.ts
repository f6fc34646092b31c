// src/services/ingestion.ts
// What: Write path: raw document text -> chunks -> embeddings -> document store -> vector index.
// How: Reserves the document id in an in-flight set, chunks the text, embeds every chunk through the adapter
//      (no index lock held), stores the document row with its chunks, then inserts all vectors in one atomic
//      insertMany. If anything after the store write fails, the document's vectors are removed and the row is
//      marked deleted before the error is rethrown, so no chunk is left half-indexed. A delete that arrives while
//      an ingest of the same id is running flags it; the ingest then removes what it wrote before returning.

import type { Logger } from 'pino';
import { DuplicateIdError, InvalidArgumentError } from '../errors.js';
import type { DocumentStore } from '../db/documentStore.js';
import { CHUNK_ID_SEPARATOR, chunkIdFor, type ChunkRecord, type DocumentRecord } from '../models/types.js';
import { chunkText } from './chunking.js';
import type { EmbeddingAdapter } from './embeddings.js';
import type { VectorIndex } from './vectorIndex.js';

export interface IngestMeta {
  filename: string;
  pageCount?: number | null;
}

export interface IngestionOptions {
  chunkSize: number;
  overlap: number;
}

interface InFlightIngest {
  deleteRequested: boolean;
}

export class IngestionPipeline {
  private readonly inFlight = new Map<string, InFlightIngest>();

  constructor(
    private readonly embeddings: EmbeddingAdapter,
    private readonly index: VectorIndex,
    private readonly store: DocumentStore,
    private readonly options: IngestionOptions,
    private readonly logger: Logger,
  ) {}

  async ingest(documentId: string, rawText: string, meta: IngestMeta, signal?: AbortSignal): Promise<DocumentRecord> {
    if (documentId.trim().length === 0 || documentId.includes(CHUNK_ID_SEPARATOR)) {
      throw new InvalidArgumentError(`Invalid document id: "${documentId}"`, {
        operation: 'ingest',
        details: { documentId },
      });
    }
    if (this.inFlight.has(documentId)) {
      throw new DuplicateIdError(documentId, { operation: 'ingest', details: { reason: 'in_flight' } });
    }

    const state: InFlightIngest = { deleteRequested: false };
    this.inFlight.set(documentId, state);
    try {
      const existing = await this.store.getDocument(documentId);
      if (existing && !existing.deleted) {
        throw new DuplicateIdError(documentId, { operation: 'ingest', details: { reason: 'exists' } });
      }
      return await this.run(documentId, rawText, meta, state, signal);
    } finally {
      this.inFlight.delete(documentId);
    }
  }

  /**
   * Index first, then the store. Returns whether an active document was removed, or an ingest of it was running.
   * The running ingest undoes its own writes once it sees the flag.
   */
  async deleteDocument(documentId: string): Promise<boolean> {
    const running = this.inFlight.get(documentId);
    if (running) running.deleteRequested = true;

    const removed = await this.index.deleteByDocument(documentId);
    const wasActive = await this.store.markDeleted(documentId);
    if (removed > 0 || wasActive || running) {
      this.logger.info({ documentId, vectors: removed, ingestRunning: Boolean(running) }, 'Document deleted');
    }
    return wasActive || Boolean(running);
  }

  private async run(
    documentId: string,
    rawText: string,
    meta: IngestMeta,
    state: InFlightIngest,
    signal: AbortSignal | undefined,
  ): Promise<DocumentRecord> {
    const startedAt = Date.now();
    const chunks: ChunkRecord[] = [];
    for (const c of chunkText(rawText, this.options.chunkSize, this.options.overlap)) {
      chunks.push({
        id: chunkIdFor(documentId, c.ordinal),
        documentId,
        ordinal: c.ordinal,
        text: c.text,
        charStart: c.charStart,
        charEnd: c.charEnd,
      });
    }

    const vectors = await this.embeddings.embedBatch(
      chunks.map((c) => c.text),
      signal,
    );

    const doc: DocumentRecord = {
      id: documentId,
      filename: meta.filename,
      ingestedAt: new Date().toISOString(),
      pageCount: meta.pageCount ?? null,
      chunkCount: chunks.length,
      deleted: false,
    };

    await this.store.putDocument(doc, chunks);

    if (chunks.length === 0) {
      if (state.deleteRequested) return this.discard(doc);
      this.logger.warn({ documentId, filename: meta.filename }, 'No chunks produced; document recorded without vectors');
      return doc;
    }

    try {
      await this.index.insertMany(chunks.map((c, i) => ({ id: c.id, vector: vectors[i] ?? [] })));
    } catch (err) {
      this.logger.error({ err, documentId }, 'Index insert failed; rolling back document');
      await this.rollback(documentId);
      throw err;
    }

    // Checked after the insert: a delete flagged before this point found no vectors to remove.
    if (state.deleteRequested) return this.discard(doc);

    this.logger.info(
      { documentId, filename: meta.filename, chunks: chunks.length, durationMs: Date.now() - startedAt },
      'Document ingested',
    );
    return doc;
  }

  private async discard(doc: DocumentRecord): Promise<DocumentRecord> {
    const removed = await this.index.deleteByDocument(doc.id);
    await this.store.markDeleted(doc.id);
    this.logger.warn({ documentId: doc.id, vectors: removed }, 'Document deleted while ingesting; writes removed');
    return { ...doc, deleted: true };
  }

  private async rollback(documentId: string): Promise<void> {
    try {
      await this.index.deleteByDocument(documentId);
      await this.store.markDeleted(documentId);
    } catch (rollbackErr) {
      // The insert failure is what the caller sees; this one is only logged.
      this.logger.error({ err: rollbackErr, documentId }, 'Rollback after failed ingest did not complete');
    }
  }
}
