/**
 * Error codes shared by every failure the assistant can raise.
 */
export enum ErrorCode {
  INGESTION_FAILED = 'INGESTION_FAILED',
  EMBEDDING_UNAVAILABLE = 'EMBEDDING_UNAVAILABLE',
  INDEX_CORRUPT = 'INDEX_CORRUPT',
  GENERATION_UNAVAILABLE = 'GENERATION_UNAVAILABLE',
  CONFIGURATION = 'CONFIGURATION',
  CANCELLED = 'CANCELLED',
}

export class RagError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'RagError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** A document could not be read. Aborts the index build. */
export class IngestionError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.INGESTION_FAILED, message, cause);
    this.name = 'IngestionError';
  }
}

export class EmbeddingUnavailableError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EMBEDDING_UNAVAILABLE, message, cause);
    this.name = 'EmbeddingUnavailableError';
  }
}

/** The persisted index cannot be read back; callers rebuild it. */
export class IndexCorruptError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.INDEX_CORRUPT, message, cause);
    this.name = 'IndexCorruptError';
  }
}

export class GenerationUnavailableError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.GENERATION_UNAVAILABLE, message, cause);
    this.name = 'GenerationUnavailableError';
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.CONFIGURATION, message, cause);
    this.name = 'ConfigurationError';
  }
}

export class CancelledError extends RagError {
  constructor(message = 'Operation cancelled', cause?: unknown) {
    super(ErrorCode.CANCELLED, message, cause);
    this.name = 'CancelledError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
