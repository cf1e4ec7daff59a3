import type { QueryResult, QueryResultRow } from 'pg'

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>
}

/**
 * The slice of a `pg` PoolClient the adapter uses.
 */
export interface PgClient extends PgQueryable {
  release(error?: Error | boolean): void
}

/**
 * The slice of a `pg` Pool the adapter uses; a `new Pool()` satisfies it.
 */
export interface PgPool {
  connect(): Promise<PgClient>
}
