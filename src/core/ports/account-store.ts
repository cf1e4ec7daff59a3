import type { ResultAsync } from 'neverthrow'
import type { Account } from '../domain/account.js'
import type { AccountNumber } from '../domain/account-number.js'
import type { AccountAlreadyExistsError } from '../errors/account-errors.js'
import type { ConcurrencyConflictError } from '../errors/concurrency-error.js'
import type { StorageError } from '../errors/storage-error.js'

export type AccountReadError = ConcurrencyConflictError | StorageError

export type AccountWriteError = ConcurrencyConflictError | AccountAlreadyExistsError | StorageError

/**
 * Account persistence scoped to one unit of work.
 */
export interface AccountStore {
  /**
   * Plain read, takes no lock.
   */
  getByNumber(number: AccountNumber): ResultAsync<Account | null, AccountReadError>

  /**
   * Read with exclusive intent. No other unit of work can take the same
   * guarantee on this row until the current one ends. A lock timeout, busy
   * row or deadlock is reported as ConcurrencyConflictError.
   *
   * Backends without row locks fall back to a plain read and rely on the
   * version check at save/commit time.
   */
  getByNumberForUpdate(number: AccountNumber): ResultAsync<Account | null, AccountReadError>

  /**
   * Insert a new account (version 0) or update an existing one, guarded by
   * its version. Advances `account.version` on success.
   */
  save(account: Account): ResultAsync<void, AccountWriteError>
}
