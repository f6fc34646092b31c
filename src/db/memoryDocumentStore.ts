// src/db/memoryDocumentStore.ts
// What: In-process DocumentStore used when no DATABASE_URL is configured, and by tests.
// How: Plain maps with the same semantics as PgDocumentStore: upsert replaces a document's chunks, and
//      markDeleted drops them. Conversations and registered files are arrays in insertion order. Records are
//      copied on the way in and out.

import type {
  ChunkRecord,
  ConversationRecord,
  DocumentRecord,
  Page,
  RegisteredFileRecord,
  RegisteredFileStatus,
} from '../models/types.js';
import type { DocumentStore, FileStatusUpdate } from './documentStore.js';

export class MemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly chunks = new Map<string, ChunkRecord>();
  private readonly chunkIdsByDocument = new Map<string, string[]>();
  private readonly conversations: ConversationRecord[] = [];
  private readonly files: RegisteredFileRecord[] = [];

  async putDocument(doc: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    this.dropChunks(doc.id);
    this.documents.set(doc.id, { ...doc, deleted: false });
    for (const c of chunks) this.chunks.set(c.id, { ...c });
    this.chunkIdsByDocument.set(
      doc.id,
      chunks.map((c) => c.id),
    );
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    const doc = this.documents.get(id);
    return doc ? { ...doc } : null;
  }

  async markDeleted(id: string): Promise<boolean> {
    const doc = this.documents.get(id);
    this.dropChunks(id);
    if (!doc || doc.deleted) return false;
    this.documents.set(id, { ...doc, deleted: true });
    return true;
  }

  async listDocuments(opts: { includeDeleted?: boolean } = {}): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((d) => opts.includeDeleted || !d.deleted)
      .sort((a, b) => b.ingestedAt.localeCompare(a.ingestedAt) || a.id.localeCompare(b.id))
      .map((d) => ({ ...d }));
  }

  async getChunks(ids: string[]): Promise<Map<string, ChunkRecord>> {
    const out = new Map<string, ChunkRecord>();
    for (const id of ids) {
      const chunk = this.chunks.get(id);
      if (chunk && this.documents.get(chunk.documentId)?.deleted === false) out.set(id, { ...chunk });
    }
    return out;
  }

  async appendConversation(entry: ConversationRecord): Promise<void> {
    this.conversations.push({ ...entry, citedChunkIds: [...entry.citedChunkIds] });
  }

  async listConversations(opts: { limit: number; offset: number }): Promise<Page<ConversationRecord>> {
    // Later appends win ties on createdAt.
    const newestFirst = this.conversations
      .map((c, seq) => ({ c, seq }))
      .sort((a, b) => b.c.createdAt.localeCompare(a.c.createdAt) || b.seq - a.seq)
      .map(({ c }) => ({ ...c, citedChunkIds: [...c.citedChunkIds] }));
    return { items: newestFirst.slice(opts.offset, opts.offset + opts.limit), total: this.conversations.length };
  }

  async registerFile(file: RegisteredFileRecord): Promise<RegisteredFileRecord> {
    const existing = this.files.find((f) => f.urlHash === file.urlHash);
    if (existing) return { ...existing };
    this.files.push({ ...file });
    return { ...file };
  }

  async listFiles(opts: { statuses?: RegisteredFileStatus[] } = {}): Promise<RegisteredFileRecord[]> {
    const { statuses } = opts;
    return this.files.filter((f) => !statuses || statuses.includes(f.status)).map((f) => ({ ...f }));
  }

  async updateFile(id: string, update: FileStatusUpdate): Promise<void> {
    const i = this.files.findIndex((f) => f.id === id);
    const current = this.files[i];
    if (current) this.files[i] = { ...current, ...update };
  }

  private dropChunks(documentId: string): void {
    for (const id of this.chunkIdsByDocument.get(documentId) ?? []) this.chunks.delete(id);
    this.chunkIdsByDocument.delete(documentId);
  }
}
