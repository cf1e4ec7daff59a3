import { DomainError } from './domain-error.js'

/**
 * Any failure of the backing store that is not a concurrency conflict.
 * The original error is kept as `cause`, untouched.
 */
export class StorageError extends DomainError {
  readonly code = 'STORAGE_ERROR'

  constructor(message: string, cause?: unknown) {
    super(message, cause instanceof Error ? { cause: cause.message } : {})
    this.cause = cause
  }

  static from(cause: unknown, context: string): StorageError {
    if (cause instanceof StorageError) {
      return cause
    }
    const detail = cause instanceof Error ? cause.message : String(cause)
    return new StorageError(`${context}: ${detail}`, cause)
  }
}
