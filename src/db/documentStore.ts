// src/db/documentStore.ts
// What: Document metadata store contract and its Postgres implementation.
// How: putDocument() upserts the document row and its chunk rows in one transaction; markDeleted() flags the
//      document and drops its chunks in one transaction, so a deleted document never has chunk provenance
//      left behind. The same store keeps the chat conversation log and PDFs registered by URL. Row mapping
//      converts snake_case columns to the shared record types.

import type { Pool, PoolClient } from 'pg';
import type {
  ChunkRecord,
  ConversationRecord,
  DocumentRecord,
  Page,
  RegisteredFileRecord,
  RegisteredFileStatus,
} from '../models/types.js';

export type FileStatusUpdate = Pick<RegisteredFileRecord, 'status' | 'documentId' | 'processedAt' | 'error'>;

export interface DocumentStore {
  putDocument(doc: DocumentRecord, chunks: ChunkRecord[]): Promise<void>;
  getDocument(id: string): Promise<DocumentRecord | null>;
  /** Returns false when there was no active document with this id. */
  markDeleted(id: string): Promise<boolean>;
  listDocuments(opts?: { includeDeleted?: boolean }): Promise<DocumentRecord[]>;
  /** Chunks of active documents only; unknown ids are absent from the map. */
  getChunks(ids: string[]): Promise<Map<string, ChunkRecord>>;

  appendConversation(entry: ConversationRecord): Promise<void>;
  /** Newest first. */
  listConversations(opts: { limit: number; offset: number }): Promise<Page<ConversationRecord>>;
  /** A URL is registered once; registering it again returns the existing record. */
  registerFile(file: RegisteredFileRecord): Promise<RegisteredFileRecord>;
  /** In registration order. */
  listFiles(opts?: { statuses?: RegisteredFileStatus[] }): Promise<RegisteredFileRecord[]>;
  updateFile(id: string, update: FileStatusUpdate): Promise<void>;
}

// Type aliases (not interfaces) so they satisfy pg's QueryResultRow constraint.
type DocumentRow = {
  id: string;
  filename: string;
  ingested_at: Date | string;
  page_count: number | null;
  chunk_count: number;
  deleted: boolean;
};

type ChunkRow = {
  id: string;
  document_id: string;
  ordinal: number;
  content: string;
  char_start: number;
  char_end: number;
};

type ConversationRow = {
  id: string;
  question: string;
  answer: string;
  answered: boolean;
  cited_chunk_ids: string[];
  model_name: string;
  created_at: Date | string;
};

type RegisteredFileRow = {
  id: string;
  filename: string;
  download_url: string;
  url_hash: string;
  size: number | string | null;
  content_type: string;
  registered_at: Date | string;
  status: string;
  document_id: string | null;
  processed_at: Date | string | null;
  error: string | null;
};

const FILE_STATUSES: readonly RegisteredFileStatus[] = ['pending', 'indexed', 'failed'];

function toFileStatus(value: string): RegisteredFileStatus {
  const status = FILE_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown registered file status: ${value}`);
  return status;
}

export function toDocumentRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    filename: row.filename,
    ingestedAt: new Date(row.ingested_at).toISOString(),
    pageCount: row.page_count === null ? null : Number(row.page_count),
    chunkCount: Number(row.chunk_count),
    deleted: Boolean(row.deleted),
  };
}

export function toChunkRecord(row: ChunkRow): ChunkRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    ordinal: Number(row.ordinal),
    text: row.content,
    charStart: Number(row.char_start),
    charEnd: Number(row.char_end),
  };
}

export function toConversationRecord(row: ConversationRow): ConversationRecord {
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    answered: Boolean(row.answered),
    citedChunkIds: [...row.cited_chunk_ids],
    modelName: row.model_name,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

export function toRegisteredFileRecord(row: RegisteredFileRow): RegisteredFileRecord {
  return {
    id: row.id,
    filename: row.filename,
    downloadUrl: row.download_url,
    urlHash: row.url_hash,
    size: row.size === null ? null : Number(row.size),
    contentType: row.content_type,
    registeredAt: new Date(row.registered_at).toISOString(),
    status: toFileStatus(row.status),
    documentId: row.document_id,
    processedAt: row.processed_at === null ? null : new Date(row.processed_at).toISOString(),
    error: row.error,
  };
}

const DOCUMENT_COLUMNS = 'id, filename, ingested_at, page_count, chunk_count, deleted';
const CONVERSATION_COLUMNS = 'id, question, answer, answered, cited_chunk_ids, model_name, created_at';
const FILE_COLUMNS =
  'id, filename, download_url, url_hash, size, content_type, registered_at, status, document_id, processed_at, error';
const CHUNK_INSERT_BATCH = 200;

export class PgDocumentStore implements DocumentStore {
  constructor(private readonly pool: Pool) {}

  async putDocument(doc: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    await this.inTransaction(async (client) => {
      await client.query(
        `INSERT INTO documents (id, filename, ingested_at, page_count, chunk_count, deleted)
         VALUES ($1, $2, $3, $4, $5, FALSE)
         ON CONFLICT (id) DO UPDATE SET
           filename = EXCLUDED.filename,
           ingested_at = EXCLUDED.ingested_at,
           page_count = EXCLUDED.page_count,
           chunk_count = EXCLUDED.chunk_count,
           deleted = FALSE`,
        [doc.id, doc.filename, doc.ingestedAt, doc.pageCount, doc.chunkCount],
      );
      // A re-ingested id replaces whatever provenance it had before.
      await client.query('DELETE FROM chunks WHERE document_id = $1', [doc.id]);

      for (let offset = 0; offset < chunks.length; offset += CHUNK_INSERT_BATCH) {
        const batch = chunks.slice(offset, offset + CHUNK_INSERT_BATCH);
        const params: Array<string | number> = [];
        const tuples = batch.map((c, i) => {
          const base = i * 6;
          params.push(c.id, c.documentId, c.ordinal, c.text, c.charStart, c.charEnd);
          return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6})`;
        });
        await client.query(
          `INSERT INTO chunks (id, document_id, ordinal, content, char_start, char_end) VALUES ${tuples.join(', ')}`,
          params,
        );
      }
    });
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    const r = await this.pool.query<DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1 LIMIT 1`, [id]);
    const row = r.rows[0];
    return row ? toDocumentRecord(row) : null;
  }

  async markDeleted(id: string): Promise<boolean> {
    return this.inTransaction(async (client) => {
      const r = await client.query('UPDATE documents SET deleted = TRUE WHERE id = $1 AND NOT deleted', [id]);
      await client.query('DELETE FROM chunks WHERE document_id = $1', [id]);
      return (r.rowCount ?? 0) > 0;
    });
  }

  async listDocuments(opts: { includeDeleted?: boolean } = {}): Promise<DocumentRecord[]> {
    const where = opts.includeDeleted ? '' : 'WHERE NOT deleted';
    const r = await this.pool.query<DocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents ${where} ORDER BY ingested_at DESC, id`,
    );
    return r.rows.map(toDocumentRecord);
  }

  async getChunks(ids: string[]): Promise<Map<string, ChunkRecord>> {
    const out = new Map<string, ChunkRecord>();
    if (ids.length === 0) return out;
    const r = await this.pool.query<ChunkRow>(
      `SELECT c.id, c.document_id, c.ordinal, c.content, c.char_start, c.char_end
       FROM chunks c
       JOIN documents d ON d.id = c.document_id
       WHERE c.id = ANY($1::text[]) AND NOT d.deleted`,
      [ids],
    );
    for (const row of r.rows) out.set(row.id, toChunkRecord(row));
    return out;
  }

  async appendConversation(entry: ConversationRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO conversations (${CONVERSATION_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [entry.id, entry.question, entry.answer, entry.answered, entry.citedChunkIds, entry.modelName, entry.createdAt],
    );
  }

  async listConversations(opts: { limit: number; offset: number }): Promise<Page<ConversationRecord>> {
    const [rows, count] = await Promise.all([
      this.pool.query<ConversationRow>(
        `SELECT ${CONVERSATION_COLUMNS} FROM conversations ORDER BY created_at DESC, seq DESC LIMIT $1 OFFSET $2`,
        [opts.limit, opts.offset],
      ),
      this.pool.query<{ total: string }>('SELECT COUNT(*) AS total FROM conversations'),
    ]);
    return { items: rows.rows.map(toConversationRecord), total: Number(count.rows[0]?.total ?? 0) };
  }

  async registerFile(file: RegisteredFileRecord): Promise<RegisteredFileRecord> {
    await this.pool.query(
      `INSERT INTO registered_files (${FILE_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (url_hash) DO NOTHING`,
      [
        file.id,
        file.filename,
        file.downloadUrl,
        file.urlHash,
        file.size,
        file.contentType,
        file.registeredAt,
        file.status,
        file.documentId,
        file.processedAt,
        file.error,
      ],
    );
    const r = await this.pool.query<RegisteredFileRow>(
      `SELECT ${FILE_COLUMNS} FROM registered_files WHERE url_hash = $1 LIMIT 1`,
      [file.urlHash],
    );
    const row = r.rows[0];
    if (!row) throw new Error(`Registered file ${file.id} not found after insert`);
    return toRegisteredFileRecord(row);
  }

  async listFiles(opts: { statuses?: RegisteredFileStatus[] } = {}): Promise<RegisteredFileRecord[]> {
    const r = opts.statuses
      ? await this.pool.query<RegisteredFileRow>(
          `SELECT ${FILE_COLUMNS} FROM registered_files WHERE status = ANY($1::text[]) ORDER BY seq`,
          [opts.statuses],
        )
      : await this.pool.query<RegisteredFileRow>(`SELECT ${FILE_COLUMNS} FROM registered_files ORDER BY seq`);
    return r.rows.map(toRegisteredFileRecord);
  }

  async updateFile(id: string, update: FileStatusUpdate): Promise<void> {
    await this.pool.query(
      'UPDATE registered_files SET status = $2, document_id = $3, processed_at = $4, error = $5 WHERE id = $1',
      [id, update.status, update.documentId, update.processedAt, update.error],
    );
  }

  private async inTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let inTx = false;
    try {
      await client.query('BEGIN');
      inTx = true;
      const result = await fn(client);
      await client.query('COMMIT');
      inTx = false;
      return result;
    } catch (err) {
      if (inTx) {
        // The original error is the one worth reporting.
        await client.query('ROLLBACK').catch(() => undefined);
      }
      throw err;
    } finally {
      client.release();
    }
  }
}
