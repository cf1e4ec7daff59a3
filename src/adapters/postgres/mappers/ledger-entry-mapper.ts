import { Result, err, ok } from 'neverthrow'
import { z } from 'zod'
import { AccountNumber } from '../../../core/domain/account-number.js'
import { LedgerEntry, LEDGER_ENTRY_TYPES } from '../../../core/domain/ledger-entry.js'
import { Money } from '../../../core/domain/money.js'
import { StorageError } from '../../../core/errors/storage-error.js'
import type { InvalidAccountNumberError } from '../../../core/errors/validation-errors.js'

export const ledgerEntryRowSchema = z.object({
  entry_id: z.string(),
  account_id: z.string(),
  entry_type: z.enum(LEDGER_ENTRY_TYPES),
  amount_cents: z.union([z.string(), z.number(), z.bigint()]),
  currency: z.string(),
  correlation_id: z.string().nullable(),
  counterparty_account_number: z.string().nullable(),
  occurred_at: z.coerce.date()
})

export type LedgerEntryRow = z.infer<typeof ledgerEntryRowSchema>

export function mapRowToLedgerEntry(raw: unknown): Result<LedgerEntry, StorageError> {
  const parsed = ledgerEntryRowSchema.safeParse(raw)
  if (!parsed.success) {
    return err(new StorageError(`Malformed ledger row: ${parsed.error.message}`, parsed.error))
  }

  const row = parsed.data

  const counterparty: Result<AccountNumber | undefined, InvalidAccountNumberError> =
    row.counterparty_account_number === null
      ? ok(undefined)
      : AccountNumber.parse(row.counterparty_account_number)

  return counterparty
    .andThen(counterpartyAccountNumber =>
      Money.of(row.amount_cents, row.currency).map(amount =>
        LedgerEntry.restore({
          id: row.entry_id,
          accountId: row.account_id,
          type: row.entry_type,
          amount,
          correlationId: row.correlation_id ?? undefined,
          counterpartyAccountNumber,
          occurredAt: row.occurred_at
        })
      )
    )
    .mapErr(error => new StorageError(`Invalid ledger row ${row.entry_id}: ${error.message}`, error))
}

export function mapLedgerEntryToParams(entry: LedgerEntry): unknown[] {
  return [
    entry.id,
    entry.accountId,
    entry.type,
    entry.amount.toCents(),
    entry.amount.currency,
    entry.correlationId ?? null,
    entry.counterpartyAccountNumber?.value ?? null,
    entry.occurredAt
  ]
}

export function mapRowsToLedgerEntries(rows: unknown[]): Result<LedgerEntry[], StorageError> {
  return Result.combine(rows.map(mapRowToLedgerEntry))
}
