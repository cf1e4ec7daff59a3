import type { LedgerEntry, LedgerEntryType } from '../domain/ledger-entry.js'

export interface AccountCreatedResult {
  accountId: string
  accountNumber: string
  balanceCents: string
  currency: string
}

export interface BalanceResult {
  accountNumber: string
  balanceCents: string
  currency: string
}

export interface TransferResult {
  correlationId: string
  fromAccountNumber: string
  toAccountNumber: string
  fromBalanceCents: string
  toBalanceCents: string
  currency: string
  /** How many attempts the transfer needed, 1 when no conflict occurred */
  attempts: number
}

export interface LedgerEntryResult {
  entryId: string
  entryType: LedgerEntryType
  amountCents: string
  currency: string
  correlationId: string | null
  counterpartyAccountNumber: string | null
  occurredAt: Date
}

export function toLedgerEntryResult(entry: LedgerEntry): LedgerEntryResult {
  return {
    entryId: entry.id,
    entryType: entry.type,
    amountCents: entry.amount.toCents(),
    currency: entry.amount.currency,
    correlationId: entry.correlationId ?? null,
    counterpartyAccountNumber: entry.counterpartyAccountNumber?.value ?? null,
    occurredAt: entry.occurredAt
  }
}
