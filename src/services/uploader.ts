// src/services/uploader.ts
// What: Handles PDF uploads - computes hash, extracts text, triggers ingestion.
// How: The document id is derived from the SHA256 of the file bytes, so the same PDF uploaded twice maps to the
//      same id and is reported as already_exists. The filename is sanitized before it is stored.

import { createHash } from 'crypto';
import path from 'path';
import type { Logger } from 'pino';
import { DuplicateIdError, EmbeddingServiceError, InvalidArgumentError } from '../errors.js';
import type { DocumentRecord } from '../models/types.js';
import type { IngestMeta } from './ingestion.js';
import { extractPdfText } from './pdf.js';

/**
 * Compute SHA256 hash of a buffer.
 */
export function computeFileHash(buffer: Uint8Array): string {
  return createHash('sha256').update(buffer).digest('hex');
}

export function documentIdForHash(fileHash: string): string {
  return `doc-${fileHash.slice(0, 16)}`;
}

/**
 * Sanitize filename to prevent path traversal and ensure valid characters.
 * - Removes path components (/, \)
 * - Limits length to 200 characters
 * - Replaces problematic characters
 */
export function sanitizeFilename(name: string): string {
  // Windows separators are not path separators for path.basename on POSIX.
  let sanitized = path.basename(name.replace(/\\/g, '/'));

  sanitized = sanitized.replace(/[<>:"|?*\x00-\x1f]/g, '_');

  // Limit length (preserve extension)
  const ext = path.extname(sanitized);
  const base = path.basename(sanitized, ext);
  const maxBaseLen = 200 - ext.length;

  if (base.length > maxBaseLen) {
    sanitized = base.substring(0, maxBaseLen) + ext;
  }

  return sanitized || 'upload.pdf';
}

export interface UploadTarget {
  getDocument(id: string): Promise<DocumentRecord | null>;
  ingest(documentId: string, rawText: string, meta: IngestMeta): Promise<DocumentRecord>;
}

export interface UploadResult {
  success: boolean;
  document_id: string;
  filename: string;
  chunks_count?: number;
  page_count?: number | null;
  status: 'indexed' | 'already_exists' | 'failed_parse' | 'failed_embed';
  error?: string;
}

/**
 * Handle an uploaded PDF:
 * 1. Compute hash -> document id
 * 2. Skip when the document is already active
 * 3. Extract text and run the ingestion pipeline
 */
export async function handleUpload(
  target: UploadTarget,
  buffer: Uint8Array,
  originalFilename: string,
  logger: Logger,
): Promise<UploadResult> {
  const filename = sanitizeFilename(originalFilename);
  const fileHash = computeFileHash(buffer);
  const documentId = documentIdForHash(fileHash);

  logger.info({ filename, hash: fileHash, documentId }, 'Processing upload');

  const existing = await target.getDocument(documentId);
  if (existing && !existing.deleted) {
    return {
      success: true,
      document_id: documentId,
      filename: existing.filename,
      chunks_count: existing.chunkCount,
      page_count: existing.pageCount,
      status: 'already_exists',
    };
  }

  let text: string;
  let pageCount: number;
  try {
    ({ text, pageCount } = await extractPdfText(buffer));
  } catch (err) {
    if (!(err instanceof InvalidArgumentError)) throw err;
    logger.warn({ err, filename }, 'PDF text extraction failed');
    return { success: false, document_id: documentId, filename, status: 'failed_parse', error: err.message };
  }

  try {
    const doc = await target.ingest(documentId, text, { filename, pageCount });
    return {
      success: true,
      document_id: documentId,
      filename,
      chunks_count: doc.chunkCount,
      page_count: doc.pageCount,
      status: 'indexed',
    };
  } catch (err) {
    if (err instanceof DuplicateIdError) {
      // A concurrent upload of the same bytes got there first.
      return { success: true, document_id: documentId, filename, status: 'already_exists' };
    }
    if (err instanceof EmbeddingServiceError) {
      logger.error({ err, filename, documentId }, 'Embedding failed during upload');
      return { success: false, document_id: documentId, filename, status: 'failed_embed', error: err.message };
    }
    throw err;
  }
}
