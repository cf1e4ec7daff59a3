export interface TableNames {
  accounts: string
  ledgerEntries: string
  schemaMigrations: string
}

export interface TableConfigOptions {
  /**
   * Prefix for all table names (e.g., 'bank_' -> 'bank_accounts')
   */
  prefix?: string

  /**
   * Custom table names (overrides prefix for specific tables)
   */
  tables?: Partial<TableNames>
}

const DEFAULT_TABLES: TableNames = {
  accounts: 'accounts',
  ledgerEntries: 'ledger_entries',
  schemaMigrations: 'schema_migrations'
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

// PostgreSQL truncates identifiers past this length
const MAX_IDENTIFIER_LENGTH = 63

// Longest suffix or prefix each table lends to a derived constraint or index name
const DERIVED_NAME_OVERHEAD: Record<keyof TableNames, number> = {
  accounts: '_account_number_format'.length,
  ledgerEntries: 'idx_'.length + '_account_occurred'.length,
  schemaMigrations: '_pkey'.length
}

const TABLE_KEYS = ['accounts', 'ledgerEntries', 'schemaMigrations'] as const

/**
 * Unique constraint on the account number, reported back by PostgreSQL on a duplicate insert.
 */
export function accountNumberConstraint(tables: TableNames): string {
  return `${tables.accounts}_account_number_key`
}

export function createTableNames(options: TableConfigOptions = {}): TableNames {
  const prefix = options.prefix ?? ''

  const names: TableNames = {
    accounts: options.tables?.accounts ?? `${prefix}${DEFAULT_TABLES.accounts}`,
    ledgerEntries: options.tables?.ledgerEntries ?? `${prefix}${DEFAULT_TABLES.ledgerEntries}`,
    schemaMigrations: options.tables?.schemaMigrations ?? `${prefix}${DEFAULT_TABLES.schemaMigrations}`
  }

  // Table names are interpolated into SQL
  for (const key of TABLE_KEYS) {
    const name = names[key]
    if (!IDENTIFIER.test(name)) {
      throw new Error(`Invalid table name: ${name}`)
    }
    const maxLength = MAX_IDENTIFIER_LENGTH - DERIVED_NAME_OVERHEAD[key]
    if (name.length > maxLength) {
      throw new Error(`Table name too long: ${name} (at most ${maxLength} characters)`)
    }
  }

  return names
}

/**
 * Generate the SQL schema for the account and ledger tables.
 * Use this to integrate into your own migration system.
 */
export function generateSchema(tables: TableNames): string {
  return `
-- Accounts: one row per account, guarded by an optimistic version counter
CREATE TABLE IF NOT EXISTS ${tables.accounts} (
    account_id UUID PRIMARY KEY,
    account_number VARCHAR(12) NOT NULL,
    balance_cents NUMERIC NOT NULL,
    currency CHAR(3) NOT NULL,
    version INTEGER NOT NULL DEFAULT 1,
    created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP,
    CONSTRAINT ${accountNumberConstraint(tables)} UNIQUE (account_number),
    CONSTRAINT ${tables.accounts}_account_number_format CHECK (account_number ~ '^[0-9]{6,12}$'),
    CONSTRAINT ${tables.accounts}_balance_non_negative CHECK (balance_cents >= 0 AND scale(balance_cents) = 0),
    CONSTRAINT ${tables.accounts}_version_positive CHECK (version >= 1)
);

-- Ledger entries: append-only
CREATE TABLE IF NOT EXISTS ${tables.ledgerEntries} (
    entry_id UUID PRIMARY KEY,
    seq BIGSERIAL NOT NULL,
    account_id UUID NOT NULL REFERENCES ${tables.accounts}(account_id),
    entry_type VARCHAR(16) NOT NULL CHECK (entry_type IN ('DEPOSIT', 'WITHDRAWAL', 'TRANSFER_IN', 'TRANSFER_OUT')),
    amount_cents NUMERIC NOT NULL CHECK (amount_cents > 0 AND scale(amount_cents) = 0),
    currency CHAR(3) NOT NULL,
    correlation_id UUID,
    counterparty_account_number VARCHAR(12),
    occurred_at TIMESTAMP WITH TIME ZONE NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_${tables.ledgerEntries}_account_occurred ON ${tables.ledgerEntries}(account_id, occurred_at DESC, seq DESC);
CREATE INDEX IF NOT EXISTS idx_${tables.ledgerEntries}_correlation_id ON ${tables.ledgerEntries}(correlation_id);
`.trim()
}
