import { BankingService } from '../../core/services/banking-service.js'
import type { RetryPolicy } from '../../core/services/retry.js'
import type { LockingConfig } from '../../config/config.js'
import type { Logger } from '../../logging/logger.js'
import type { PgPool } from './pg-client.js'
import { PostgresUnitOfWorkFactory } from './postgres-unit-of-work.js'
import { TableConfigOptions, createTableNames, generateSchema } from './table-config.js'

export { PostgresAccountStore, type PostgresAccountStoreOptions } from './postgres-account-store.js'
export { PostgresLedgerStore } from './postgres-ledger-store.js'
export {
  PostgresUnitOfWork,
  PostgresUnitOfWorkFactory,
  type PostgresUnitOfWorkOptions
} from './postgres-unit-of-work.js'
export { translatePgError, SQLSTATE } from './pg-errors.js'
export type { PgClient, PgPool, PgQueryable } from './pg-client.js'
export * from './table-config.js'
export * from './mappers/account-mapper.js'
export * from './mappers/ledger-entry-mapper.js'

export interface CreatePostgresBankingServiceOptions {
  pool: PgPool
  /**
   * Table configuration - use prefix or custom table names
   */
  tables?: TableConfigOptions
  defaultCurrency?: string
  retryPolicy?: RetryPolicy
  locking?: Partial<LockingConfig>
  logger?: Logger
}

/**
 * Create a BankingService backed by PostgreSQL.
 *
 * @example
 * ```typescript
 * import pg from 'pg'
 *
 * const pool = new pg.Pool({ connectionString: process.env.DATABASE_URL })
 * await runMigrations(pool)
 * const banking = createPostgresBankingService({ pool })
 * ```
 */
export function createPostgresBankingService(options: CreatePostgresBankingServiceOptions): BankingService {
  const unitOfWork = new PostgresUnitOfWorkFactory({
    pool: options.pool,
    tables: options.tables,
    lockTimeoutMs: options.locking?.timeoutMs,
    lockMode: options.locking?.mode,
    rowLocking: options.locking?.rowLocking
  })

  return new BankingService({
    unitOfWork,
    defaultCurrency: options.defaultCurrency,
    retryPolicy: options.retryPolicy,
    logger: options.logger
  })
}

const SCHEMA_VERSION = 1

export async function runMigrations(pool: PgPool, tableOptions?: TableConfigOptions): Promise<void> {
  const tables = createTableNames(tableOptions)
  const client = await pool.connect()

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${tables.schemaMigrations} (
        version INTEGER PRIMARY KEY,
        applied_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
      )
    `)

    const result = await client.query(`
      SELECT COALESCE(MAX(version), 0) AS version FROM ${tables.schemaMigrations}
    `)

    const currentVersion = Number(result.rows[0]?.version ?? 0)

    if (currentVersion < SCHEMA_VERSION) {
      await client.query('BEGIN')
      try {
        await client.query(generateSchema(tables))
        await client.query(
          `INSERT INTO ${tables.schemaMigrations} (version) VALUES ($1) ON CONFLICT DO NOTHING`,
          [SCHEMA_VERSION]
        )
        await client.query('COMMIT')
      } catch (error) {
        await client.query('ROLLBACK')
        throw error
      }
    }
  } finally {
    client.release()
  }
}
