import type { DecimalInput } from '../utils/decimal.js'

export interface CreateAccountCommand {
  accountNumber: string
  /** Defaults to the service's configured currency */
  currency?: string
  /** Minor units; a non-zero value is recorded as a DEPOSIT entry */
  initialBalanceCents?: DecimalInput
}

export interface DepositCommand {
  accountNumber: string
  amountCents: DecimalInput
  currency?: string
}

export interface WithdrawCommand {
  accountNumber: string
  amountCents: DecimalInput
  currency?: string
}

export interface TransferCommand {
  fromAccountNumber: string
  toAccountNumber: string
  amountCents: DecimalInput
  currency?: string
}

export interface GetBalanceQuery {
  accountNumber: string
}

export interface GetTransactionsQuery {
  accountNumber: string
  limit?: number
  offset?: number
}
