// src/services/fileRegistry.ts
// What: PDFs registered by download URL and ingested later in one processing run.
// How: register() keys every URL by its SHA-256, so the same URL registered twice keeps its first record.
//      processPending() takes every pending or failed file, downloads it under a deadline, hands the bytes to the
//      upload handler and records indexed or failed with the reason. Runs never overlap: a call made while one
//      is in progress gets that run's summary.

import { createHash } from 'crypto';
import pLimit from 'p-limit';
import type { Logger } from 'pino';
import type { DocumentStore, FileStatusUpdate } from '../db/documentStore.js';
import { InvalidArgumentError, errorMessage } from '../errors.js';
import type { RegisteredFileRecord, RegisteredFileStatus } from '../models/types.js';
import { withTimeout } from '../util/timeout.js';
import { sanitizeFilename, type UploadResult } from './uploader.js';

export type PdfDownloader = (url: string, signal: AbortSignal) => Promise<Uint8Array>;

export interface FileRegistration {
  filename: string;
  downloadUrl: string;
  size?: number | null;
  contentType?: string;
}

export interface FileRegistryOptions {
  downloadTimeoutMs: number;
  concurrency: number;
}

export interface ProcessSummary {
  processed: number;
  indexed: number;
  failed: number;
  files: RegisteredFileRecord[];
}

export interface PdfIngestTarget {
  ingestPdf(buffer: Uint8Array, filename: string): Promise<UploadResult>;
}

export const DEFAULT_MAX_DOWNLOAD_BYTES = 25 * 1024 * 1024;

export function urlHash(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

export function fileIdForUrlHash(hash: string): string {
  return `file-${hash.slice(0, 16)}`;
}

/** Node's fetch; a non-2xx answer or a body over maxBytes is an error. */
export function createFetchDownloader(maxBytes: number = DEFAULT_MAX_DOWNLOAD_BYTES): PdfDownloader {
  return async (url, signal) => {
    const res = await fetch(url, { signal });
    if (!res.ok) {
      throw new Error(`Download returned ${res.status} ${res.statusText}`.trim());
    }
    const declared = Number(res.headers.get('content-length'));
    if (declared > maxBytes) {
      throw new Error(`Download is ${declared} bytes; the limit is ${maxBytes}`);
    }
    const body = new Uint8Array(await res.arrayBuffer());
    if (body.byteLength > maxBytes) {
      throw new Error(`Download is ${body.byteLength} bytes; the limit is ${maxBytes}`);
    }
    return body;
  };
}

function checkDownloadUrl(raw: string): void {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw new InvalidArgumentError(`Invalid download URL: ${raw}`, { operation: 'register_files', cause: err });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidArgumentError(`Download URL must use http or https: ${raw}`, {
      operation: 'register_files',
      details: { protocol: url.protocol },
    });
  }
}

export class FileRegistry {
  private running: Promise<ProcessSummary> | null = null;

  constructor(
    private readonly store: DocumentStore,
    private readonly target: PdfIngestTarget,
    private readonly download: PdfDownloader,
    private readonly options: FileRegistryOptions,
    private readonly logger: Logger,
  ) {}

  /** Every URL is checked before any is stored. */
  async register(files: readonly FileRegistration[]): Promise<RegisteredFileRecord[]> {
    for (const f of files) checkDownloadUrl(f.downloadUrl);

    const registered: RegisteredFileRecord[] = [];
    for (const f of files) {
      const hash = urlHash(f.downloadUrl);
      registered.push(
        await this.store.registerFile({
          id: fileIdForUrlHash(hash),
          filename: sanitizeFilename(f.filename),
          downloadUrl: f.downloadUrl,
          urlHash: hash,
          size: f.size ?? null,
          contentType: f.contentType ?? 'application/pdf',
          registeredAt: new Date().toISOString(),
          status: 'pending',
          documentId: null,
          processedAt: null,
          error: null,
        }),
      );
    }
    this.logger.info({ count: registered.length }, 'Files registered');
    return registered;
  }

  async list(status?: RegisteredFileStatus): Promise<RegisteredFileRecord[]> {
    return this.store.listFiles(status ? { statuses: [status] } : {});
  }

  processPending(): Promise<ProcessSummary> {
    if (!this.running) {
      this.running = this.runPending().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async runPending(): Promise<ProcessSummary> {
    const files = await this.store.listFiles({ statuses: ['pending', 'failed'] });
    if (files.length === 0) {
      this.logger.info('No registered files to process');
      return { processed: 0, indexed: 0, failed: 0, files: [] };
    }

    const startedAt = Date.now();
    const limit = pLimit(this.options.concurrency);
    const done = await Promise.all(files.map((f) => limit(() => this.processOne(f))));
    const indexed = done.filter((f) => f.status === 'indexed').length;

    this.logger.info(
      { processed: done.length, indexed, failed: done.length - indexed, durationMs: Date.now() - startedAt },
      'Registered files processed',
    );
    return { processed: done.length, indexed, failed: done.length - indexed, files: done };
  }

  private async processOne(file: RegisteredFileRecord): Promise<RegisteredFileRecord> {
    let bytes: Uint8Array;
    try {
      bytes = await withTimeout((signal) => this.download(file.downloadUrl, signal), this.options.downloadTimeoutMs);
    } catch (err) {
      this.logger.warn({ err, fileId: file.id, url: file.downloadUrl }, 'Download failed');
      return this.finish(file, { status: 'failed', documentId: null, error: `Download failed: ${errorMessage(err)}` });
    }

    let result: UploadResult;
    try {
      result = await this.target.ingestPdf(bytes, file.filename);
    } catch (err) {
      this.logger.error({ err, fileId: file.id }, 'Ingest of registered file failed');
      return this.finish(file, { status: 'failed', documentId: null, error: `Ingest failed: ${errorMessage(err)}` });
    }

    if (result.success) {
      return this.finish(file, { status: 'indexed', documentId: result.document_id, error: null });
    }
    return this.finish(file, {
      status: 'failed',
      documentId: null,
      error: result.error ?? result.status,
    });
  }

  private async finish(
    file: RegisteredFileRecord,
    outcome: Omit<FileStatusUpdate, 'processedAt'>,
  ): Promise<RegisteredFileRecord> {
    const update: FileStatusUpdate = { ...outcome, processedAt: new Date().toISOString() };
    await this.store.updateFile(file.id, update);
    return { ...file, ...update };
  }
}
