import { Result, ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow'
import type { AccountStore } from '../../core/ports/account-store.js'
import type { LedgerStore } from '../../core/ports/ledger-store.js'
import type { CommitError, UnitOfWork, UnitOfWorkFactory } from '../../core/ports/unit-of-work.js'
import { StorageError } from '../../core/errors/storage-error.js'
import type { LockMode } from '../../config/config.js'
import type { PgClient, PgPool } from './pg-client.js'
import { translatePgError } from './pg-errors.js'
import { PostgresAccountStore } from './postgres-account-store.js'
import { PostgresLedgerStore } from './postgres-ledger-store.js'
import { TableConfigOptions, TableNames, createTableNames } from './table-config.js'

export interface PostgresUnitOfWorkOptions {
  pool: PgPool
  /**
   * Table configuration - use prefix or custom table names
   */
  tables?: TableConfigOptions
  /** Applied with `SET LOCAL lock_timeout`; 0 waits forever (default 2000ms) */
  lockTimeoutMs?: number
  lockMode?: LockMode
  /** When false, no row locks are taken and the version guard alone detects conflicts */
  rowLocking?: boolean
}

type UnitState = 'active' | 'committed' | 'rolled_back' | 'released'

export class PostgresUnitOfWorkFactory implements UnitOfWorkFactory {
  private readonly pool: PgPool
  private readonly tables: TableNames
  private readonly lockTimeoutMs: number
  private readonly lockMode: LockMode
  private readonly rowLocking: boolean

  constructor(options: PostgresUnitOfWorkOptions) {
    this.pool = options.pool
    this.tables = createTableNames(options.tables)
    this.lockTimeoutMs = options.lockTimeoutMs ?? 2000
    this.lockMode = options.lockMode ?? 'wait'
    this.rowLocking = options.rowLocking ?? true
  }

  begin(): ResultAsync<UnitOfWork, StorageError> {
    return ResultAsync.fromPromise(this.open(), error =>
      StorageError.from(error, 'Failed to begin unit of work')
    )
  }

  private async open(): Promise<UnitOfWork> {
    const client = await this.pool.connect()

    try {
      await client.query('BEGIN')
      // set_config(..., true) is SET LOCAL and takes a bind parameter
      await client.query(`SELECT set_config('lock_timeout', $1, true)`, [`${this.lockTimeoutMs}ms`])
    } catch (error) {
      client.release(error instanceof Error ? error : true)
      throw error
    }

    return new PostgresUnitOfWork(client, this.tables, {
      lockMode: this.lockMode,
      rowLocking: this.rowLocking
    })
  }
}

/**
 * One pooled connection holding one database transaction.
 */
export class PostgresUnitOfWork implements UnitOfWork {
  readonly accounts: AccountStore
  readonly ledger: LedgerStore

  private state: UnitState = 'active'
  // Set when the connection can no longer be trusted; the pool then discards it
  private connectionError: Error | null = null

  constructor(
    private readonly client: PgClient,
    tables: TableNames,
    options: { lockMode: LockMode; rowLocking: boolean }
  ) {
    const guarded = { query: (text: string, values?: unknown[]) => this.query(text, values) }
    this.accounts = new PostgresAccountStore(guarded, tables, options)
    this.ledger = new PostgresLedgerStore(guarded, tables)
  }

  get status(): UnitState {
    return this.state
  }

  commit(): ResultAsync<void, CommitError> {
    if (this.state !== 'active') {
      return errAsync(new StorageError(`Cannot commit a unit of work that is ${this.state}`))
    }
    return new ResultAsync(this.commitTransaction())
  }

  rollback(): ResultAsync<void, StorageError> {
    if (this.state !== 'active') {
      return okAsync(undefined)
    }
    return new ResultAsync(this.rollbackTransaction())
  }

  async release(): Promise<void> {
    if (this.state === 'released') {
      return
    }
    if (this.state === 'active') {
      // A failed rollback is recorded in connectionError
      await this.rollbackTransaction()
    }
    this.state = 'released'
    this.client.release(this.connectionError ?? undefined)
  }

  private async commitTransaction(): Promise<Result<void, CommitError>> {
    try {
      const result = await this.client.query('COMMIT')
      // COMMIT on an aborted transaction succeeds but reports ROLLBACK
      if (result.command === 'ROLLBACK') {
        this.state = 'rolled_back'
        return err(new StorageError('Transaction was aborted by an earlier error and has been rolled back'))
      }
      this.state = 'committed'
      return ok(undefined)
    } catch (error) {
      const translated = translatePgError(error, 'Commit failed')
      await this.rollbackTransaction()
      return err(translated)
    }
  }

  private async rollbackTransaction(): Promise<Result<void, StorageError>> {
    this.state = 'rolled_back'
    try {
      await this.client.query('ROLLBACK')
      return ok(undefined)
    } catch (error) {
      this.connectionError = error instanceof Error ? error : new Error(String(error))
      return err(StorageError.from(error, 'Rollback failed'))
    }
  }

  private query(text: string, values?: unknown[]): ReturnType<PgClient['query']> {
    if (this.state !== 'active') {
      return Promise.reject(new StorageError(`Unit of work is ${this.state}`))
    }
    return this.client.query(text, values)
  }
}
