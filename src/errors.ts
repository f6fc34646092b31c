// src/errors.ts
// What: Error taxonomy for the retrieval core.
// How: Every error extends RagError, which carries a stable code, the failing operation and a details bag
//      for structured logging. The underlying error, when there is one, travels in the standard `cause`.

export type RagErrorCode =
  | 'CONFIG_ERROR'
  | 'DIMENSION_MISMATCH'
  | 'DUPLICATE_ID'
  | 'INVALID_ARGUMENT'
  | 'EMBEDDING_SERVICE_ERROR'
  | 'GENERATION_SERVICE_ERROR'
  | 'INDEX_LOAD_ERROR'
  | 'EMPTY_INDEX';

export interface RagErrorOptions {
  operation: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class RagError extends Error {
  readonly code: RagErrorCode;
  readonly operation: string;
  readonly details: Record<string, unknown>;

  constructor(code: RagErrorCode, message: string, opts: RagErrorOptions) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'RagError';
    this.code = code;
    this.operation = opts.operation;
    this.details = opts.details ?? {};
  }
}

export class ConfigError extends RagError {
  constructor(message: string, opts: RagErrorOptions) {
    super('CONFIG_ERROR', message, opts);
    this.name = 'ConfigError';
  }
}

export class DimensionMismatchError extends RagError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, opts: RagErrorOptions) {
    super('DIMENSION_MISMATCH', `Vector dimension mismatch: expected ${expected}, got ${actual}`, {
      ...opts,
      details: { ...opts.details, expected, actual },
    });
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class DuplicateIdError extends RagError {
  readonly id: string;

  constructor(id: string, opts: RagErrorOptions) {
    super('DUPLICATE_ID', `Duplicate id: ${id}`, { ...opts, details: { ...opts.details, id } });
    this.name = 'DuplicateIdError';
    this.id = id;
  }
}

export class InvalidArgumentError extends RagError {
  constructor(message: string, opts: RagErrorOptions) {
    super('INVALID_ARGUMENT', message, opts);
    this.name = 'InvalidArgumentError';
  }
}

export class EmbeddingServiceError extends RagError {
  /** Input positions of the texts whose batch failed. */
  readonly batchIndices: number[];

  constructor(message: string, batchIndices: number[], opts: RagErrorOptions) {
    super('EMBEDDING_SERVICE_ERROR', message, { ...opts, details: { ...opts.details, batchIndices } });
    this.name = 'EmbeddingServiceError';
    this.batchIndices = batchIndices;
  }
}

export class GenerationServiceError extends RagError {
  constructor(message: string, opts: RagErrorOptions) {
    super('GENERATION_SERVICE_ERROR', message, opts);
    this.name = 'GenerationServiceError';
  }
}

export class IndexLoadError extends RagError {
  readonly path: string;

  constructor(path: string, message: string, opts: RagErrorOptions) {
    super('INDEX_LOAD_ERROR', message, { ...opts, details: { ...opts.details, path } });
    this.name = 'IndexLoadError';
    this.path = path;
  }
}

// Informational: nothing has been ingested yet.
export class EmptyIndexError extends RagError {
  constructor(opts: RagErrorOptions) {
    super('EMPTY_INDEX', 'The vector index is empty; ingest documents first', opts);
    this.name = 'EmptyIndexError';
  }
}

const HTTP_STATUS: Record<RagErrorCode, number> = {
  CONFIG_ERROR: 400,
  DIMENSION_MISMATCH: 400,
  DUPLICATE_ID: 409,
  INVALID_ARGUMENT: 400,
  EMBEDDING_SERVICE_ERROR: 502,
  GENERATION_SERVICE_ERROR: 502,
  INDEX_LOAD_ERROR: 500,
  EMPTY_INDEX: 404,
};

export function httpStatusFor(err: unknown): number {
  return err instanceof RagError ? HTTP_STATUS[err.code] : 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
