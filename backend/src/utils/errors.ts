/**
 * Error taxonomy for the ingestion and query pipeline.
 *
 * Every error carries a stable `code` so routes can map it to a status
 * without string matching. Compression failures have no class here: they
 * are always recovered locally.
 */

export type RagErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INVALID_ARGUMENT'
  | 'EMBEDDING_UNAVAILABLE'
  | 'EMBEDDING_SPACE_MISMATCH'
  | 'GENERATION_UNAVAILABLE'
  | 'INVARIANT_VIOLATION'
  | 'INGESTION_IN_PROGRESS';

export class RagError extends Error {
  constructor(
    message: string,
    public readonly code: RagErrorCode,
    public readonly originalError?: unknown,
  ) {
    const causeMessage = originalError instanceof Error ? originalError.message : undefined;
    super(causeMessage ? `${message}: ${causeMessage}` : message);
    this.name = 'RagError';
    if (originalError instanceof Error && originalError.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }
  }
}

/**
 * Bad chunking, retrieval or provider settings. Fatal at startup.
 */
export class InvalidConfiguration extends RagError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfiguration';
  }
}

export class InvalidArgument extends RagError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgument';
  }
}

/**
 * The embedding provider could not be reached after all retry attempts.
 * Aborts an ingestion run; the live index stays in place.
 */
export class EmbeddingUnavailable extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EMBEDDING_UNAVAILABLE', cause);
    this.name = 'EmbeddingUnavailable';
  }
}

/**
 * The active embedding provider does not produce vectors in the space the
 * index was built with.
 */
export class EmbeddingSpaceMismatch extends RagError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Index was built with embedding space "${expected}" but the active provider is "${actual}"`, 'EMBEDDING_SPACE_MISMATCH');
    this.name = 'EmbeddingSpaceMismatch';
  }
}

export class GenerationUnavailable extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'GENERATION_UNAVAILABLE', cause);
    this.name = 'GenerationUnavailable';
  }
}

/**
 * A programming error. Never caught and continued.
 */
export class InvariantViolation extends RagError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolation';
  }
}

export class IngestionInProgress extends RagError {
  constructor() {
    super('An ingestion run is already in progress', 'INGESTION_IN_PROGRESS');
    this.name = 'IngestionInProgress';
  }
}

export function isRagError(err: unknown): err is RagError {
  return err instanceof RagError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
