// src/models/types.ts
// What: Shared TypeScript types for stored entities and DTOs used by routes/services.
// How: DocumentRecord/ChunkRecord mirror the document store columns; the rest are service results.

export interface DocumentRecord {
  id: string;
  filename: string;
  ingestedAt: string; // ISO timestamp
  pageCount: number | null;
  chunkCount: number;
  deleted: boolean;
}

export interface ChunkRecord {
  id: string; // `${documentId}#${ordinal}`
  documentId: string;
  ordinal: number;
  text: string;
  charStart: number; // inclusive
  charEnd: number; // exclusive
}

export interface ScoredId {
  id: string;
  score: number; // cosine similarity in [-1, 1]
}

export interface RetrievedChunk {
  chunk: ChunkRecord;
  score: number;
}

export interface Citation {
  marker: string;
  chunkId: string;
  documentId: string;
  score: number;
  charStart: number;
  charEnd: number;
}

export interface AnswerResult {
  answer: string;
  citations: Citation[];
  // Chunks that made it into the prompt, in prompt order.
  contextChunkIds: string[];
}

export interface IndexStats {
  entryCount: number;
  dimension: number | null;
  documentCount: number;
  approximate: boolean;
  onDiskBytes: number | null;
}

// One answered (or declined) chat question.
export interface ConversationRecord {
  id: string;
  question: string;
  answer: string;
  answered: boolean;
  citedChunkIds: string[];
  modelName: string;
  createdAt: string; // ISO timestamp
}

export type RegisteredFileStatus = 'pending' | 'indexed' | 'failed';

// A PDF known by its download URL, ingested later by processPending().
export interface RegisteredFileRecord {
  id: string;
  filename: string;
  downloadUrl: string;
  urlHash: string; // sha256 of downloadUrl
  size: number | null;
  contentType: string;
  registeredAt: string;
  status: RegisteredFileStatus;
  documentId: string | null;
  processedAt: string | null;
  error: string | null;
}

export interface Page<T> {
  items: T[];
  total: number;
}

export const CHUNK_ID_SEPARATOR = '#';

export function chunkIdFor(documentId: string, ordinal: number): string {
  return `${documentId}${CHUNK_ID_SEPARATOR}${ordinal}`;
}

/** Returns the owning document id, or null when the id has no `#<ordinal>` suffix. */
export function documentIdOf(chunkId: string): string | null {
  const idx = chunkId.lastIndexOf(CHUNK_ID_SEPARATOR);
  if (idx <= 0) return null;
  const ordinal = chunkId.slice(idx + 1);
  if (!/^\d+$/.test(ordinal)) return null;
  return chunkId.slice(0, idx);
}
