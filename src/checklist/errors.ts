// ============================================================================
// Checklist Error Types: Typed failures surfaced to the API layer
// ============================================================================

export type ChecklistErrorCode =
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'INVALID_ARGUMENT'
  | 'CONFLICT_RETRYABLE'
  | 'STORAGE_UNAVAILABLE';

/**
 * Base error for all checklist and template failures.
 * Messages carry ids only, never step content or request bodies.
 */
export class ChecklistError extends Error {
  readonly code: ChecklistErrorCode;

  constructor(message: string, code: ChecklistErrorCode) {
    super(message);
    this.name = 'ChecklistError';
    this.code = code;
  }
}

/** Referenced template or checklist does not exist. */
export class NotFoundError extends ChecklistError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** Caller does not own the target record. */
export class ForbiddenError extends ChecklistError {
  constructor(message: string) {
    super(message, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

/** Step index out of range or otherwise malformed input. */
export class InvalidArgumentError extends ChecklistError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Thrown when a concurrent write won the race.
 * The engine retries these; callers see one only when retries run out.
 */
export class ConflictRetryableError extends ChecklistError {
  constructor(message: string) {
    super(message, 'CONFLICT_RETRYABLE');
    this.name = 'ConflictRetryableError';
  }
}

/**
 * The persistence collaborator failed.
 * Keeps the underlying error as `cause` for server-side logging.
 */
export class StorageUnavailableError extends ChecklistError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage unavailable during ${operation}: ${detail}`, 'STORAGE_UNAVAILABLE');
    this.name = 'StorageUnavailableError';
    this.cause = cause;
  }
}
