/**
 * RAG Pipeline Errors
 *
 * Every failure the pipeline surfaces is a RAGError subclass carrying a
 * stable code and whether the failed operation may be retried.
 */

export type RAGErrorCode =
  | 'INVALID_CONFIG'
  | 'DIMENSION_MISMATCH'
  | 'EMPTY_INDEX'
  | 'NO_CONTEXT_AVAILABLE'
  | 'SERVICE_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'SERVICE_TIMEOUT'
  | 'INVALID_INPUT';

/**
 * External service an error originated from.
 */
export type ServiceName = 'embedding' | 'generation';

export class RAGError extends Error {
  constructor(
    message: string,
    public readonly code: RAGErrorCode,
    public readonly retryable: boolean = false,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RAGError';
  }
}

/**
 * Bad chunking or query parameters, bad environment, bad snapshot.
 */
export class InvalidConfigError extends RAGError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_CONFIG', false, cause);
    this.name = 'InvalidConfigError';
  }
}

/**
 * A vector's length differs from the dimension the index was built with.
 */
export class DimensionMismatchError extends RAGError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context = 'vector'
  ) {
    super(
      `Dimension mismatch for ${context}: expected ${expected}, got ${actual}. ` +
      'Rebuild the index after changing the embedding model.',
      'DIMENSION_MISMATCH'
    );
    this.name = 'DimensionMismatchError';
  }
}

export class EmptyIndexError extends RAGError {
  constructor(message = 'No passages are indexed for the selected books') {
    super(message, 'EMPTY_INDEX');
    this.name = 'EmptyIndexError';
  }
}

export class NoContextAvailableError extends RAGError {
  constructor(message = 'No passage fits into the prompt context') {
    super(message, 'NO_CONTEXT_AVAILABLE');
    this.name = 'NoContextAvailableError';
  }
}

/**
 * Transport or server failure (retryable), or a permanent service error
 * such as bad credentials or an unknown model (not retryable).
 */
export class ServiceUnavailableError extends RAGError {
  constructor(
    public readonly service: ServiceName,
    message: string,
    retryable: boolean,
    cause?: unknown
  ) {
    super(message, 'SERVICE_UNAVAILABLE', retryable, cause);
    this.name = 'ServiceUnavailableError';
  }
}

export class RateLimitedError extends RAGError {
  constructor(
    public readonly service: ServiceName,
    message: string,
    cause?: unknown
  ) {
    super(message, 'RATE_LIMITED', true, cause);
    this.name = 'RateLimitedError';
  }
}

export class ServiceTimeoutError extends RAGError {
  constructor(
    public readonly service: ServiceName,
    public readonly timeoutMs: number,
    cause?: unknown
  ) {
    super(`${service} call timed out after ${timeoutMs}ms`, 'SERVICE_TIMEOUT', true, cause);
    this.name = 'ServiceTimeoutError';
  }
}

export class InvalidInputError extends RAGError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_INPUT', false, cause);
    this.name = 'InvalidInputError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isRAGError(error: unknown): error is RAGError {
  return error instanceof RAGError;
}

export function isRetryableError(error: unknown): boolean {
  return isRAGError(error) && error.retryable;
}
