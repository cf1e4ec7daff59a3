import { ResultAsync } from 'neverthrow'
import type { AccountId } from '../../core/domain/account-id.js'
import type { LedgerEntry } from '../../core/domain/ledger-entry.js'
import type { LedgerError, LedgerPage, LedgerStore } from '../../core/ports/ledger-store.js'
import { mapLedgerEntryToParams, mapRowsToLedgerEntries } from './mappers/ledger-entry-mapper.js'
import type { PgQueryable } from './pg-client.js'
import { translatePgError } from './pg-errors.js'
import type { TableNames } from './table-config.js'

const ENTRY_COLUMNS =
  'entry_id, account_id, entry_type, amount_cents, currency, correlation_id, counterparty_account_number, occurred_at'

export class PostgresLedgerStore implements LedgerStore {
  constructor(
    private readonly client: PgQueryable,
    private readonly tables: TableNames
  ) {}

  save(entry: LedgerEntry): ResultAsync<void, LedgerError> {
    return ResultAsync.fromPromise(
      this.client.query(
        `INSERT INTO ${this.tables.ledgerEntries} (${ENTRY_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        mapLedgerEntryToParams(entry)
      ),
      error => translatePgError(error, `Failed to append ledger entry ${entry.id}`)
    ).map(() => undefined)
  }

  listByAccount(accountId: AccountId, page: LedgerPage = {}): ResultAsync<LedgerEntry[], LedgerError> {
    let query = `
      SELECT ${ENTRY_COLUMNS}
      FROM ${this.tables.ledgerEntries}
      WHERE account_id = $1
      ORDER BY occurred_at DESC, seq DESC
    `
    const params: unknown[] = [accountId]
    let paramIndex = 2

    if (page.limit !== undefined) {
      query += ` LIMIT $${paramIndex++}`
      params.push(page.limit)
    }

    if (page.offset !== undefined) {
      query += ` OFFSET $${paramIndex++}`
      params.push(page.offset)
    }

    return ResultAsync.fromPromise(
      this.client.query(query, params),
      error => translatePgError(error, `Failed to list ledger entries for account ${accountId}`)
    ).andThen(result => mapRowsToLedgerEntries(result.rows))
  }
}
