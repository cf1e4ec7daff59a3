import { ConcurrencyConflictError, type ConflictReason } from '../../core/errors/concurrency-error.js'
import { StorageError } from '../../core/errors/storage-error.js'

// SQLSTATE codes, see https://www.postgresql.org/docs/current/errcodes-appendix.html
export const SQLSTATE = {
  uniqueViolation: '23505',
  serializationFailure: '40001',
  deadlockDetected: '40P01',
  lockNotAvailable: '55P03'
} as const

export interface PgErrorFields {
  code?: string
  constraint?: string
  message: string
}

export function pgErrorFields(error: unknown): PgErrorFields {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) }
  }
  return {
    code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
    constraint: 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : undefined,
    message: error instanceof Error ? error.message : String(error)
  }
}

function conflictReason(fields: PgErrorFields): ConflictReason | null {
  switch (fields.code) {
    case SQLSTATE.serializationFailure:
      return 'serialization_failure'
    case SQLSTATE.deadlockDetected:
      return 'deadlock'
    case SQLSTATE.lockNotAvailable:
      // lock_timeout and NOWAIT both raise 55P03
      return /lock timeout/i.test(fields.message) ? 'lock_timeout' : 'lock_unavailable'
    default:
      return null
  }
}

/**
 * Map a driver error to ConcurrencyConflictError when it signals contention;
 * anything else becomes StorageError carrying the original error.
 */
export function translatePgError(error: unknown, context: string): ConcurrencyConflictError | StorageError {
  const fields = pgErrorFields(error)
  const reason = conflictReason(fields)

  if (reason !== null) {
    return new ConcurrencyConflictError(reason, `${context}: ${fields.message}`, undefined, { cause: error })
  }

  return StorageError.from(error, context)
}
