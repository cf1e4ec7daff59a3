import { Result, err, ok } from 'neverthrow'
import { z } from 'zod'
import { Account } from '../../../core/domain/account.js'
import { AccountNumber } from '../../../core/domain/account-number.js'
import { Money } from '../../../core/domain/money.js'
import { StorageError } from '../../../core/errors/storage-error.js'

export const accountRowSchema = z.object({
  account_id: z.string(),
  account_number: z.string(),
  // NUMERIC arrives as a string
  balance_cents: z.union([z.string(), z.number(), z.bigint()]),
  currency: z.string(),
  version: z.coerce.number().int().min(1)
})

export type AccountRow = z.infer<typeof accountRowSchema>

export function mapRowToAccount(raw: unknown): Result<Account, StorageError> {
  const parsed = accountRowSchema.safeParse(raw)
  if (!parsed.success) {
    return err(new StorageError(`Malformed account row: ${parsed.error.message}`, parsed.error))
  }

  const row = parsed.data

  return AccountNumber.parse(row.account_number)
    .andThen(number =>
      Money.of(row.balance_cents, row.currency).map(balance =>
        Account.restore({ id: row.account_id, number, balance, version: row.version })
      )
    )
    .mapErr(error => new StorageError(`Invalid account row ${row.account_id}: ${error.message}`, error))
}

export function mapAccountToParams(account: Account): {
  account_id: string
  account_number: string
  balance_cents: string
  currency: string
  version: number
} {
  return {
    account_id: account.id,
    account_number: account.number.value,
    balance_cents: account.balance.toCents(),
    currency: account.currency,
    version: account.version
  }
}

export function mapOptionalAccount(rows: unknown[]): Result<Account | null, StorageError> {
  if (rows.length === 0) {
    return ok(null)
  }
  return mapRowToAccount(rows[0])
}
