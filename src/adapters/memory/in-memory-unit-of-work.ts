import { Result, ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow'
import { Account } from '../../core/domain/account.js'
import type { AccountId } from '../../core/domain/account-id.js'
import type { AccountNumber } from '../../core/domain/account-number.js'
import { LedgerEntry } from '../../core/domain/ledger-entry.js'
import type { AccountReadError, AccountStore, AccountWriteError } from '../../core/ports/account-store.js'
import type { LedgerPage, LedgerStore } from '../../core/ports/ledger-store.js'
import type { CommitError, UnitOfWork, UnitOfWorkFactory } from '../../core/ports/unit-of-work.js'
import { AccountAlreadyExistsError } from '../../core/errors/account-errors.js'
import { ConcurrencyConflictError } from '../../core/errors/concurrency-error.js'
import { StorageError } from '../../core/errors/storage-error.js'
import type { LockMode } from '../../config/config.js'
import type { InMemoryDatabase, StagedAccount, StoredEntry } from './in-memory-database.js'

export interface InMemoryUnitOfWorkOptions {
  database: InMemoryDatabase
  /** How long a locking read waits for another unit (default 2000ms) */
  lockTimeoutMs?: number
  lockMode?: LockMode
  /**
   * When false, locking reads are plain reads and conflicts are caught only
   * by the version check at commit.
   */
  rowLocking?: boolean
}

type UnitState = 'active' | 'committed' | 'rolled_back' | 'released'

export class InMemoryUnitOfWorkFactory implements UnitOfWorkFactory {
  readonly database: InMemoryDatabase
  private readonly lockTimeoutMs: number
  private readonly lockMode: LockMode
  private readonly rowLocking: boolean

  constructor(options: InMemoryUnitOfWorkOptions) {
    this.database = options.database
    this.lockTimeoutMs = options.lockTimeoutMs ?? 2000
    this.lockMode = options.lockMode ?? 'wait'
    this.rowLocking = options.rowLocking ?? true
  }

  begin(): ResultAsync<UnitOfWork, StorageError> {
    return okAsync(
      new InMemoryUnitOfWork(this.database, {
        lockTimeoutMs: this.lockTimeoutMs,
        lockMode: this.lockMode,
        rowLocking: this.rowLocking
      })
    )
  }
}

/**
 * Writes are staged per unit and only reach the database at commit, after
 * the version of every staged row has been re-checked.
 */
export class InMemoryUnitOfWork implements UnitOfWork {
  readonly accounts: AccountStore
  readonly ledger: LedgerStore

  private readonly owner = Symbol('unit-of-work')
  private readonly stagedAccounts = new Map<AccountId, StagedAccount>()
  private readonly stagedEntries: StoredEntry[] = []
  private state: UnitState = 'active'

  constructor(
    private readonly database: InMemoryDatabase,
    private readonly options: { lockTimeoutMs: number; lockMode: LockMode; rowLocking: boolean }
  ) {
    this.accounts = {
      getByNumber: number => this.getByNumber(number),
      getByNumberForUpdate: number => this.getByNumberForUpdate(number),
      save: account => this.saveAccount(account)
    }
    this.ledger = {
      save: entry => this.saveEntry(entry),
      listByAccount: (accountId, page) => this.listByAccount(accountId, page)
    }
  }

  get status(): UnitState {
    return this.state
  }

  commit(): ResultAsync<void, CommitError> {
    if (this.state !== 'active') {
      return errAsync(new StorageError(`Cannot commit a unit of work that is ${this.state}`))
    }

    const staged = [...this.stagedAccounts.values()]
    const check = this.database.check(staged)

    if (check.status !== 'ok') {
      this.discard('rolled_back')
      return errAsync(
        check.status === 'duplicate_number'
          ? new AccountAlreadyExistsError(check.accountNumber)
          : new ConcurrencyConflictError(
              'version_mismatch',
              `Account ${check.accountNumber} was changed by another transaction`
            )
      )
    }

    this.database.apply(staged, this.stagedEntries)
    this.discard('committed')
    return okAsync(undefined)
  }

  rollback(): ResultAsync<void, StorageError> {
    if (this.state === 'active') {
      this.discard('rolled_back')
    }
    return okAsync(undefined)
  }

  async release(): Promise<void> {
    if (this.state === 'active') {
      this.discard('rolled_back')
    }
    this.state = 'released'
  }

  private getByNumber(number: AccountNumber): ResultAsync<Account | null, StorageError> {
    const active = this.ensureActive()
    if (active.isErr()) {
      return errAsync(active.error)
    }
    return okAsync(this.read(number))
  }

  private getByNumberForUpdate(number: AccountNumber): ResultAsync<Account | null, AccountReadError> {
    const active = this.ensureActive()
    if (active.isErr()) {
      return errAsync(active.error)
    }
    if (!this.options.rowLocking) {
      return okAsync(this.read(number))
    }

    return new ResultAsync(
      this.database.locks
        .acquire(number.value, this.owner, {
          timeoutMs: this.options.lockTimeoutMs,
          mode: this.options.lockMode
        })
        .then((locked): Result<Account | null, AccountReadError> => {
          if (locked.isErr()) {
            return err(locked.error)
          }
          // The unit may have been rolled back while it was waiting
          if (this.state !== 'active') {
            this.database.locks.releaseAll(this.owner)
            return err(new StorageError(`Unit of work was ${this.state} while waiting for a lock`))
          }
          return ok(this.read(number))
        })
    )
  }

  private saveAccount(account: Account): ResultAsync<void, AccountWriteError> {
    const active = this.ensureActive()
    if (active.isErr()) {
      return errAsync(active.error)
    }

    const previous = this.stagedAccounts.get(account.id)
    const expectedVersion = previous?.expectedVersion ?? account.version

    if (previous === undefined) {
      if (account.isNew && this.database.isNumberTaken(account.number.value)) {
        return errAsync(new AccountAlreadyExistsError(account.number.value))
      }
      if (!account.isNew && this.database.currentVersion(account.id) !== account.version) {
        return errAsync(
          new ConcurrencyConflictError(
            'version_mismatch',
            `Account ${account.number.value} was changed by another transaction`
          )
        )
      }
    }

    account.markPersisted()
    this.stagedAccounts.set(account.id, { props: account.snapshot(), expectedVersion })
    return okAsync(undefined)
  }

  private saveEntry(entry: LedgerEntry): ResultAsync<void, StorageError> {
    const active = this.ensureActive()
    if (active.isErr()) {
      return errAsync(active.error)
    }
    this.stagedEntries.push({
      sequence: this.database.nextSequence(),
      props: {
        id: entry.id,
        accountId: entry.accountId,
        type: entry.type,
        amount: entry.amount,
        correlationId: entry.correlationId,
        counterpartyAccountNumber: entry.counterpartyAccountNumber,
        occurredAt: entry.occurredAt
      }
    })
    return okAsync(undefined)
  }

  private listByAccount(accountId: AccountId, page: LedgerPage = {}): ResultAsync<LedgerEntry[], StorageError> {
    const active = this.ensureActive()
    if (active.isErr()) {
      return errAsync(active.error)
    }

    const own = this.stagedEntries
      .filter(stored => stored.props.accountId === accountId)
      .map(stored => ({ sequence: stored.sequence, entry: LedgerEntry.restore(stored.props) }))

    const ordered = [...this.database.listEntries(accountId), ...own].sort(
      (a, b) =>
        b.entry.occurredAt.getTime() - a.entry.occurredAt.getTime() || b.sequence - a.sequence
    )

    const offset = page.offset ?? 0
    const end = page.limit === undefined ? undefined : offset + page.limit
    return okAsync(ordered.slice(offset, end).map(item => item.entry))
  }

  // Own staged writes win over committed state
  private read(number: AccountNumber): Account | null {
    for (const staged of this.stagedAccounts.values()) {
      if (staged.props.number.value === number.value) {
        return Account.restore({ ...staged.props })
      }
    }
    return this.database.findAccountByNumber(number.value)
  }

  private ensureActive(): Result<void, StorageError> {
    if (this.state !== 'active') {
      return err(new StorageError(`Unit of work is ${this.state}`))
    }
    return ok(undefined)
  }

  private discard(next: UnitState): void {
    this.stagedAccounts.clear()
    this.stagedEntries.length = 0
    this.state = next
    this.database.locks.releaseAll(this.owner)
  }
}
