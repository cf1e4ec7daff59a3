import { DomainError } from './domain-error.js'

export type ConflictReason =
  | 'version_mismatch'
  | 'lock_timeout'
  | 'lock_unavailable'
  | 'deadlock'
  | 'serialization_failure'
  | 'retries_exhausted'

/**
 * A transient conflict with another writer. The whole transactional sequence
 * may be re-run from a fresh boundary.
 */
export class ConcurrencyConflictError extends DomainError {
  readonly code = 'CONCURRENCY_CONFLICT'

  constructor(
    readonly reason: ConflictReason,
    message: string,
    readonly attempts?: number,
    options?: { cause?: unknown }
  ) {
    super(message, attempts === undefined ? { reason } : { reason, attempts })
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }

  static exhausted(attempts: number, last: ConcurrencyConflictError): ConcurrencyConflictError {
    return new ConcurrencyConflictError(
      'retries_exhausted',
      `Gave up after ${attempts} attempts: ${last.message}`,
      attempts,
      { cause: last }
    )
  }
}
