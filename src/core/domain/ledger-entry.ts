import { randomUUID } from 'node:crypto'
import { Result, err, ok } from 'neverthrow'
import type { AccountId } from './account-id.js'
import type { AccountNumber } from './account-number.js'
import type { Money } from './money.js'
import { InvalidAmountError } from '../errors/validation-errors.js'

export const LEDGER_ENTRY_TYPES = ['DEPOSIT', 'WITHDRAWAL', 'TRANSFER_IN', 'TRANSFER_OUT'] as const

export type LedgerEntryType = (typeof LEDGER_ENTRY_TYPES)[number]

export interface LedgerEntryProps {
  id: string
  accountId: AccountId
  type: LedgerEntryType
  amount: Money
  correlationId?: string
  counterpartyAccountNumber?: AccountNumber
  occurredAt: Date
}

export type CreateLedgerEntryProps = Omit<LedgerEntryProps, 'id' | 'occurredAt'> & {
  occurredAt?: Date
}

/**
 * Immutable record of one balance-affecting event on one account.
 */
export class LedgerEntry {
  readonly id: string
  readonly accountId: AccountId
  readonly type: LedgerEntryType
  readonly amount: Money
  readonly correlationId?: string
  readonly counterpartyAccountNumber?: AccountNumber
  readonly occurredAt: Date

  private constructor(props: LedgerEntryProps) {
    this.id = props.id
    this.accountId = props.accountId
    this.type = props.type
    this.amount = props.amount
    this.correlationId = props.correlationId
    this.counterpartyAccountNumber = props.counterpartyAccountNumber
    this.occurredAt = new Date(props.occurredAt.getTime())
    Object.freeze(this)
  }

  static create(props: CreateLedgerEntryProps): Result<LedgerEntry, InvalidAmountError> {
    if (props.amount.isZero()) {
      return err(new InvalidAmountError('ledger entry amount must be greater than zero', props.amount.toCents()))
    }

    return ok(new LedgerEntry({
      ...props,
      id: randomUUID(),
      occurredAt: props.occurredAt ?? new Date()
    }))
  }

  static restore(props: LedgerEntryProps): LedgerEntry {
    return new LedgerEntry(props)
  }

  static isEntryType(value: string): value is LedgerEntryType {
    return LEDGER_ENTRY_TYPES.some(type => type === value)
  }

  get isCredit(): boolean {
    return this.type === 'DEPOSIT' || this.type === 'TRANSFER_IN'
  }

  toString(): string {
    const counterparty = this.counterpartyAccountNumber
      ? ` <-> ${this.counterpartyAccountNumber.value}`
      : ''
    return `${this.occurredAt.toISOString()} ${this.type} ${this.amount.toString()}${counterparty}`
  }
}
