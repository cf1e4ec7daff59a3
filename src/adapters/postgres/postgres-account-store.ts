import { Result, ResultAsync, err, ok } from 'neverthrow'
import type { Account } from '../../core/domain/account.js'
import type { AccountNumber } from '../../core/domain/account-number.js'
import type { AccountReadError, AccountStore, AccountWriteError } from '../../core/ports/account-store.js'
import { AccountAlreadyExistsError } from '../../core/errors/account-errors.js'
import { ConcurrencyConflictError } from '../../core/errors/concurrency-error.js'
import type { LockMode } from '../../config/config.js'
import { mapAccountToParams, mapOptionalAccount } from './mappers/account-mapper.js'
import type { PgQueryable } from './pg-client.js'
import { SQLSTATE, pgErrorFields, translatePgError } from './pg-errors.js'
import { accountNumberConstraint, type TableNames } from './table-config.js'

const ACCOUNT_COLUMNS = 'account_id, account_number, balance_cents, currency, version'

export interface PostgresAccountStoreOptions {
  lockMode: LockMode
  /** When false, `getByNumberForUpdate` issues a plain SELECT */
  rowLocking: boolean
}

export class PostgresAccountStore implements AccountStore {
  constructor(
    private readonly client: PgQueryable,
    private readonly tables: TableNames,
    private readonly options: PostgresAccountStoreOptions
  ) {}

  getByNumber(number: AccountNumber): ResultAsync<Account | null, AccountReadError> {
    return ResultAsync.fromPromise(
      this.client.query(
        `SELECT ${ACCOUNT_COLUMNS} FROM ${this.tables.accounts} WHERE account_number = $1`,
        [number.value]
      ),
      error => translatePgError(error, `Failed to read account ${number.value}`)
    ).andThen(result => mapOptionalAccount(result.rows))
  }

  getByNumberForUpdate(number: AccountNumber): ResultAsync<Account | null, AccountReadError> {
    return ResultAsync.fromPromise(
      this.client.query(
        `SELECT ${ACCOUNT_COLUMNS} FROM ${this.tables.accounts} WHERE account_number = $1${this.lockClause()}`,
        [number.value]
      ),
      error => translatePgError(error, `Failed to lock account ${number.value}`)
    ).andThen(result => mapOptionalAccount(result.rows))
  }

  save(account: Account): ResultAsync<void, AccountWriteError> {
    const params = mapAccountToParams(account)

    if (account.isNew) {
      return ResultAsync.fromPromise(
        this.client.query(
          `INSERT INTO ${this.tables.accounts} (${ACCOUNT_COLUMNS}) VALUES ($1, $2, $3, $4, 1)`,
          [params.account_id, params.account_number, params.balance_cents, params.currency]
        ),
        (error): AccountWriteError => this.translateInsertError(error, params.account_number)
      ).map(() => account.markPersisted())
    }

    return ResultAsync.fromPromise(
      this.client.query(
        `UPDATE ${this.tables.accounts}
         SET balance_cents = $1, currency = $2, version = version + 1
         WHERE account_id = $3 AND version = $4`,
        [params.balance_cents, params.currency, params.account_id, params.version]
      ),
      error => translatePgError(error, `Failed to update account ${params.account_number}`)
    )
      .andThen((result): Result<void, ConcurrencyConflictError> =>
        result.rowCount === 1
          ? ok(undefined)
          : err(
              new ConcurrencyConflictError(
                'version_mismatch',
                `Account ${params.account_number} was changed by another transaction (expected version ${params.version})`
              )
            )
      )
      .map(() => account.markPersisted())
  }

  private lockClause(): string {
    if (!this.options.rowLocking) {
      return ''
    }
    return this.options.lockMode === 'nowait' ? ' FOR UPDATE NOWAIT' : ' FOR UPDATE'
  }

  private translateInsertError(error: unknown, accountNumber: string): AccountWriteError {
    const fields = pgErrorFields(error)
    if (
      fields.code === SQLSTATE.uniqueViolation &&
      fields.constraint === accountNumberConstraint(this.tables)
    ) {
      return new AccountAlreadyExistsError(accountNumber)
    }
    return translatePgError(error, `Failed to insert account ${accountNumber}`)
  }
}
