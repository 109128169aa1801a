/**
 * Error taxonomy
 *
 * Every error a collaborator can observe from the engine. Storage errors
 * from the SQLite driver never escape unwrapped; they are converted to
 * StorageFailureError with the name of the operation that failed.
 */

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Thrown when a path is not tracked or an archive ID is unknown
 */
export class NotFoundError extends Error {
  constructor(
    public readonly key: string,
    public readonly kind: 'path' | 'archive' = 'path'
  ) {
    super(kind === 'path' ? `Not tracked: ${key}` : `Archive record not found: ${key}`);
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when a path is registered again with different content and
 * without update intent
 */
export class ConflictError extends Error {
  constructor(
    public readonly path: string,
    public readonly existingHash: string,
    public readonly incomingHash: string
  ) {
    super(
      `Conflict: ${path} is already tracked with hash ${existingHash.slice(0, 12)}; ` +
        `pass { update: true } to replace it`
    );
    this.name = 'ConflictError';
  }
}

/**
 * Thrown when a consolidation destination fails validation or an
 * opportunity no longer matches the tracked sources
 */
export class ValidationFailureError extends Error {
  constructor(
    message: string,
    public readonly problems: string[]
  ) {
    super(`${message}: ${problems.join('; ')}`);
    this.name = 'ValidationFailureError';
  }
}

/**
 * Raised by an unreadable index segment. Search catches it and reports a
 * partial result instead.
 */
export class IndexDegradedError extends Error {
  public readonly errorCause: Error | undefined;

  constructor(
    public readonly segment: number,
    errorCause?: Error
  ) {
    super(`Index segment ${segment} is unreadable${errorCause ? `: ${errorCause.message}` : ''}`);
    this.name = 'IndexDegradedError';
    this.errorCause = errorCause;
  }
}

/**
 * Thrown when the durable store cannot complete an operation
 */
export class StorageFailureError extends Error {
  public readonly errorCause: Error | undefined;

  constructor(
    public readonly operation: string,
    errorCause?: Error
  ) {
    super(`Storage failure during ${operation}${errorCause ? `: ${errorCause.message}` : ''}`);
    this.name = 'StorageFailureError';
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Errors that carry engine semantics and must pass through storage guards
 */
export function isDomainError(error: unknown): boolean {
  return (
    error instanceof NotFoundError ||
    error instanceof ConflictError ||
    error instanceof ValidationFailureError ||
    error instanceof IndexDegradedError ||
    error instanceof StorageFailureError
  );
}

/**
 * Wrap anything thrown by the driver as a StorageFailureError
 */
export function toStorageFailure(operation: string, error: unknown): Error {
  if (error instanceof Error && isDomainError(error)) {
    return error;
  }
  return new StorageFailureError(
    operation,
    error instanceof Error ? error : new Error(String(error))
  );
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
