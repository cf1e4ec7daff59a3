import type { ResultAsync } from 'neverthrow'
import type { AccountStore } from './account-store.js'
import type { LedgerStore } from './ledger-store.js'
import type { ConcurrencyConflictError } from '../errors/concurrency-error.js'
import type { AccountAlreadyExistsError } from '../errors/account-errors.js'
import type { StorageError } from '../errors/storage-error.js'

export type CommitError = ConcurrencyConflictError | AccountAlreadyExistsError | StorageError

/**
 * One open storage transaction with the stores bound to it.
 *
 * Not reentrant: each `UnitOfWorkFactory.begin()` call yields an
 * independent transaction.
 */
export interface UnitOfWork {
  readonly accounts: AccountStore
  readonly ledger: LedgerStore

  /**
   * Make every write of this unit durable. Version mismatches and lock or
   * serialization signals fail with ConcurrencyConflictError; the
   * transaction is rolled back in that case.
   */
  commit(): ResultAsync<void, CommitError>

  /**
   * Discard every write. Safe to call repeatedly, after a commit, or after
   * a failed commit.
   */
  rollback(): ResultAsync<void, StorageError>

  /**
   * Return the underlying connection. Rolls back first unless the unit was
   * committed. Idempotent.
   */
  release(): Promise<void>
}

export interface UnitOfWorkFactory {
  begin(): ResultAsync<UnitOfWork, StorageError>
}
