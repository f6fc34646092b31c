// src/services/ragService.ts
// What: The operations the HTTP layer (and anything else) calls: ingest, retrieve, answer, chat with its
//       conversation log, delete, list, URL file registration, index persistence and stats.
// How: Wires the chunker, embedding adapter, vector index, retriever, orchestrator and ingestion pipeline from
//      injected collaborators. After loadIndex() it reconciles the index with the document store: vectors of
//      documents the store no longer lists as active are dropped, and active documents without vectors are
//      reported. With autosave on, the index is written to indexPath after every ingest and delete. A file that
//      failed to load is not overwritten by flushIndex() until the index has changed. chat() records every
//      exchange, answered or not, in the store's conversation log.

import { promises as fs } from 'fs';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { RagSettings } from '../config/settings.js';
import type { DocumentStore } from '../db/documentStore.js';
import {
  ConfigError,
  EmbeddingServiceError,
  EmptyIndexError,
  GenerationServiceError,
  errorMessage,
} from '../errors.js';
import type {
  AnswerResult,
  ConversationRecord,
  DocumentRecord,
  IndexStats,
  Page,
  RegisteredFileRecord,
  RegisteredFileStatus,
  RetrievedChunk,
} from '../models/types.js';
import { EmbeddingAdapter, type EmbeddingFunction } from './embeddings.js';
import {
  FileRegistry,
  createFetchDownloader,
  type FileRegistration,
  type PdfDownloader,
  type ProcessSummary,
} from './fileRegistry.js';
import { AnswerOrchestrator, COULD_NOT_ANSWER, type GenerationFunction } from './generation.js';
import { IngestionPipeline, type IngestMeta } from './ingestion.js';
import { Retriever } from './retriever.js';
import { handleUpload, type UploadResult } from './uploader.js';
import { VectorIndex } from './vectorIndex.js';

export interface RagServiceDeps {
  store: DocumentStore;
  embedder: EmbeddingFunction;
  generator: GenerationFunction;
  settings: RagSettings;
  logger: Logger;
  indexPath?: string;
  autosave?: boolean;
  /** Fetches registered files; Node's fetch when omitted. */
  downloader?: PdfDownloader;
  downloadTimeoutMs?: number;
}

export interface RetrieveRequest {
  topK?: number;
  documentIds?: string[];
  signal?: AbortSignal;
}

export interface AnswerRequest extends RetrieveRequest {
  maxContextTokens?: number;
}

export interface ChatResult extends AnswerResult {
  answered: boolean;
  conversationId: string;
  modelName: string;
  createdAt: string;
}

export interface ConversationPage extends Page<ConversationRecord> {
  page: number;
  limit: number;
}

export interface LoadIndexResult {
  loaded: boolean;
  entries: number;
  droppedDocuments: string[];
  missingDocuments: string[];
}

export class RagService {
  readonly index: VectorIndex;
  private readonly store: DocumentStore;
  private readonly settings: RagSettings;
  private readonly logger: Logger;
  private readonly indexPath: string | undefined;
  private readonly autosave: boolean;
  private readonly embeddings: EmbeddingAdapter;
  private readonly retriever: Retriever;
  private readonly orchestrator: AnswerOrchestrator;
  private readonly pipeline: IngestionPipeline;
  private readonly files: FileRegistry;
  private readonly modelName: string;
  // Set when indexPath holds a file load() rejected; cleared by the next ingest or delete.
  private keepUnreadableFile = false;

  constructor(deps: RagServiceDeps) {
    const { settings, logger } = deps;
    this.store = deps.store;
    this.settings = settings;
    this.logger = logger;
    this.indexPath = deps.indexPath;
    this.autosave = Boolean(deps.autosave && deps.indexPath);
    this.modelName = deps.generator.modelName ?? 'unknown';

    this.embeddings = new EmbeddingAdapter(
      deps.embedder,
      {
        batchMax: settings.embeddingBatchMax,
        concurrency: settings.embeddingConcurrency,
        maxAttempts: settings.embeddingMaxAttempts,
        retryBaseMs: settings.embeddingRetryBaseMs,
        timeoutMs: settings.embeddingTimeoutMs,
        cacheSize: settings.embeddingCacheSize,
      },
      logger.child({ component: 'embeddings' }),
    );
    this.index = new VectorIndex(
      {
        approximateThreshold: settings.approximateIndexThreshold,
        searchWidth: settings.searchWidth,
        graphDegree: settings.graphDegree,
      },
      logger.child({ component: 'vector-index' }),
    );
    this.retriever = new Retriever(
      this.embeddings,
      this.index,
      this.store,
      { overfetchFactor: settings.retrievalOverfetchFactor, minScore: settings.minScore },
      logger.child({ component: 'retriever' }),
    );
    this.orchestrator = new AnswerOrchestrator(
      deps.generator,
      { timeoutMs: settings.generationTimeoutMs },
      logger.child({ component: 'generation' }),
    );
    this.pipeline = new IngestionPipeline(
      this.embeddings,
      this.index,
      this.store,
      { chunkSize: settings.chunkSize, overlap: settings.overlap },
      logger.child({ component: 'ingestion' }),
    );
    this.files = new FileRegistry(
      this.store,
      this,
      deps.downloader ?? createFetchDownloader(),
      { downloadTimeoutMs: deps.downloadTimeoutMs ?? 60_000, concurrency: 2 },
      logger.child({ component: 'file-registry' }),
    );
  }

  async ingest(documentId: string, rawText: string, meta: IngestMeta, signal?: AbortSignal): Promise<DocumentRecord> {
    const doc = await this.pipeline.ingest(documentId, rawText, meta, signal);
    await this.indexChanged('ingest');
    return doc;
  }

  async ingestPdf(buffer: Uint8Array, filename: string): Promise<UploadResult> {
    return handleUpload(this, buffer, filename, this.logger.child({ component: 'upload' }));
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    return this.store.getDocument(id);
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return this.store.listDocuments();
  }

  async deleteDocument(id: string): Promise<boolean> {
    const wasActive = await this.pipeline.deleteDocument(id);
    if (wasActive) await this.indexChanged('delete');
    return wasActive;
  }

  async retrieve(queryText: string, req: RetrieveRequest = {}): Promise<RetrievedChunk[]> {
    return this.retriever.retrieve(queryText, req.topK ?? this.settings.topK, {
      documentIds: req.documentIds,
      signal: req.signal,
    });
  }

  /** Retrieval errors (including EmptyIndexError) surface before generation is called. */
  async retrieveAndAnswer(queryText: string, req: AnswerRequest = {}): Promise<AnswerResult> {
    const retrieved = await this.retrieve(queryText, req);
    return this.orchestrator.answer(
      queryText,
      retrieved,
      req.maxContextTokens ?? this.settings.maxContextTokens,
      req.signal,
    );
  }

  /**
   * retrieveAndAnswer() with the exchange recorded. An empty index or a failed model call gives answered=false
   * and the fixed reply; a failure to record is logged, not raised.
   */
  async chat(queryText: string, req: AnswerRequest = {}): Promise<ChatResult> {
    let answered = true;
    let result: AnswerResult;
    try {
      result = await this.retrieveAndAnswer(queryText, req);
    } catch (err) {
      if (
        !(err instanceof EmptyIndexError || err instanceof EmbeddingServiceError || err instanceof GenerationServiceError)
      ) {
        throw err;
      }
      this.logger.warn({ err, code: err.code }, 'Chat could not be answered');
      answered = false;
      result = { answer: COULD_NOT_ANSWER, citations: [], contextChunkIds: [] };
    }

    const entry: ConversationRecord = {
      id: `conv-${uuidv4()}`,
      question: queryText,
      answer: result.answer,
      answered,
      citedChunkIds: result.citations.map((c) => c.chunkId),
      modelName: this.modelName,
      createdAt: new Date().toISOString(),
    };
    try {
      await this.store.appendConversation(entry);
    } catch (err) {
      this.logger.error({ err, conversationId: entry.id }, `Could not record conversation: ${errorMessage(err)}`);
    }
    return { ...result, answered, conversationId: entry.id, modelName: entry.modelName, createdAt: entry.createdAt };
  }

  /** Newest first; page is 1-based. */
  async listConversations(page: number, limit: number): Promise<ConversationPage> {
    const { items, total } = await this.store.listConversations({ limit, offset: (page - 1) * limit });
    return { items, total, page, limit };
  }

  async registerFiles(files: readonly FileRegistration[]): Promise<RegisteredFileRecord[]> {
    return this.files.register(files);
  }

  async listRegisteredFiles(status?: RegisteredFileStatus): Promise<RegisteredFileRecord[]> {
    return this.files.list(status);
  }

  async processRegisteredFiles(): Promise<ProcessSummary> {
    return this.files.processPending();
  }

  async indexStats(): Promise<IndexStats> {
    const s = await this.index.stats();
    return { ...s, onDiskBytes: await this.onDiskBytes() };
  }

  /**
   * Loads the index from indexPath and reconciles it with the store. A missing file is a fresh start, not an
   * error; an unreadable or invalid one raises IndexLoadError and leaves the index as it was.
   */
  async loadIndex(): Promise<LoadIndexResult> {
    const filePath = this.requireIndexPath('load');
    if (!(await fileExists(filePath))) {
      this.logger.info({ path: filePath }, 'No persisted index found; starting empty');
      return { loaded: false, entries: 0, droppedDocuments: [], missingDocuments: [] };
    }

    try {
      await this.index.load(filePath);
    } catch (err) {
      this.keepUnreadableFile = true;
      throw err;
    }
    this.keepUnreadableFile = false;
    const { droppedDocuments, missingDocuments } = await this.reconcile();
    const { entryCount } = await this.index.stats();
    return { loaded: true, entries: entryCount, droppedDocuments, missingDocuments };
  }

  async persistIndex(): Promise<number> {
    const bytes = await this.index.persist(this.requireIndexPath('persist'));
    this.keepUnreadableFile = false;
    return bytes;
  }

  /**
   * Shutdown save. Returns null, writing nothing, without an index path or while indexPath still holds a file
   * that failed to load and nothing has been ingested or deleted since.
   */
  async flushIndex(): Promise<number | null> {
    if (!this.indexPath) return null;
    if (this.keepUnreadableFile) {
      this.logger.warn({ path: this.indexPath }, 'Index unchanged since a failed load; leaving the file as it is');
      return null;
    }
    return this.persistIndex();
  }

  private async reconcile(): Promise<{ droppedDocuments: string[]; missingDocuments: string[] }> {
    const active = await this.store.listDocuments();
    const activeIds = new Set(active.map((d) => d.id));
    const indexed = new Set(await this.index.documentIds());

    const droppedDocuments: string[] = [];
    for (const documentId of indexed) {
      if (activeIds.has(documentId)) continue;
      await this.index.deleteByDocument(documentId);
      droppedDocuments.push(documentId);
    }
    const missingDocuments = active.filter((d) => d.chunkCount > 0 && !indexed.has(d.id)).map((d) => d.id);

    if (droppedDocuments.length > 0) {
      this.logger.warn({ documents: droppedDocuments }, 'Dropped index entries of documents not active in the store');
    }
    if (missingDocuments.length > 0) {
      this.logger.warn({ documents: missingDocuments }, 'Active documents have no vectors; re-ingest them');
    }
    return { droppedDocuments, missingDocuments };
  }

  private async indexChanged(reason: string): Promise<void> {
    this.keepUnreadableFile = false;
    if (!this.autosave || !this.indexPath) return;
    try {
      await this.index.persist(this.indexPath);
    } catch (err) {
      // The write already succeeded; the next save or shutdown persists it again.
      this.logger.error({ err, reason, path: this.indexPath }, `Index autosave failed: ${errorMessage(err)}`);
    }
  }

  private async onDiskBytes(): Promise<number | null> {
    if (!this.indexPath) return null;
    try {
      const st = await fs.stat(this.indexPath);
      return st.size;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  private requireIndexPath(operation: string): string {
    if (!this.indexPath) {
      throw new ConfigError('No index path configured', { operation });
    }
    return this.indexPath;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, 'code') === 'ENOENT';
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}
