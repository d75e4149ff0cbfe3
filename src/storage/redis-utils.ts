import { ChecklistError, ConflictRetryableError, StorageUnavailableError } from '../checklist/errors.js';

/** Reply shape of ioredis `multi().exec()` */
export type ExecResult = [error: Error | null, result: unknown][] | null;

/**
 * Run a Redis operation, converting anything that is not already a typed
 * ChecklistError into StorageUnavailableError.
 */
export async function withStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ChecklistError) throw err;
    throw new StorageUnavailableError(operation, err);
  }
}

/**
 * Throw if a MULTI block was aborted (null reply) or any queued command failed.
 * Redis does not roll back on command errors, so callers only use MULTI for
 * commands that cannot fail on well-typed keys.
 */
export function assertExecSucceeded(result: ExecResult): void {
  if (result === null) {
    throw new ConflictRetryableError('Transaction aborted by a concurrent write');
  }
  for (const [error] of result) {
    if (error) throw error;
  }
}
