import type { ResultAsync } from 'neverthrow'
import type { AccountId } from '../domain/account-id.js'
import type { LedgerEntry } from '../domain/ledger-entry.js'
import type { ConcurrencyConflictError } from '../errors/concurrency-error.js'
import type { StorageError } from '../errors/storage-error.js'

export type LedgerError = ConcurrencyConflictError | StorageError

export interface LedgerPage {
  limit?: number
  offset?: number
}

/**
 * Append-only ledger scoped to one unit of work.
 */
export interface LedgerStore {
  save(entry: LedgerEntry): ResultAsync<void, LedgerError>

  /**
   * Entries for an account, most recent first.
   */
  listByAccount(accountId: AccountId, page?: LedgerPage): ResultAsync<LedgerEntry[], LedgerError>
}
