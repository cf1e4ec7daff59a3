import { describe, it, expect } from 'vitest'
import { AccountNumber } from '../../../src/core/domain/account-number.js'
import { LedgerEntry } from '../../../src/core/domain/ledger-entry.js'
import { Money } from '../../../src/core/domain/money.js'

const brl = (cents: number) => Money.of(cents, 'BRL')._unsafeUnwrap()

describe('LedgerEntry', () => {
  it('should create an entry with a generated id and timestamp', () => {
    const entry = LedgerEntry.create({ accountId: 'acc-1', type: 'DEPOSIT', amount: brl(100) })._unsafeUnwrap()

    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/)
    expect(entry.accountId).toBe('acc-1')
    expect(entry.type).toBe('DEPOSIT')
    expect(entry.amount.toCents()).toBe('100')
    expect(entry.occurredAt).toBeInstanceOf(Date)
    expect(entry.correlationId).toBeUndefined()
  })

  it('should reject a zero amount', () => {
    const result = LedgerEntry.create({ accountId: 'acc-1', type: 'WITHDRAWAL', amount: brl(0) })
    expect(result._unsafeUnwrapErr().code).toBe('INVALID_AMOUNT')
  })

  it('should be immutable', () => {
    const entry = LedgerEntry.create({ accountId: 'acc-1', type: 'DEPOSIT', amount: brl(1) })._unsafeUnwrap()
    expect(Object.isFrozen(entry)).toBe(true)
  })

  it('should copy the occurredAt date', () => {
    const occurredAt = new Date('2024-03-01T10:00:00.000Z')
    const entry = LedgerEntry.create({
      accountId: 'acc-1',
      type: 'DEPOSIT',
      amount: brl(1),
      occurredAt
    })._unsafeUnwrap()

    occurredAt.setFullYear(2000)
    expect(entry.occurredAt.toISOString()).toBe('2024-03-01T10:00:00.000Z')
  })

  it('should tell credits from debits', () => {
    const make = (type: 'DEPOSIT' | 'WITHDRAWAL' | 'TRANSFER_IN' | 'TRANSFER_OUT') =>
      LedgerEntry.create({ accountId: 'acc-1', type, amount: brl(1) })._unsafeUnwrap()

    expect(make('DEPOSIT').isCredit).toBe(true)
    expect(make('TRANSFER_IN').isCredit).toBe(true)
    expect(make('WITHDRAWAL').isCredit).toBe(false)
    expect(make('TRANSFER_OUT').isCredit).toBe(false)
  })

  it('should recognise entry types', () => {
    expect(LedgerEntry.isEntryType('TRANSFER_OUT')).toBe(true)
    expect(LedgerEntry.isEntryType('REFUND')).toBe(false)
  })

  it('should format with the counterparty', () => {
    const entry = LedgerEntry.create({
      accountId: 'acc-1',
      type: 'TRANSFER_OUT',
      amount: brl(250),
      correlationId: 'corr-1',
      counterpartyAccountNumber: AccountNumber.parse('200000')._unsafeUnwrap(),
      occurredAt: new Date('2024-03-01T10:00:00.000Z')
    })._unsafeUnwrap()

    expect(entry.toString()).toBe('2024-03-01T10:00:00.000Z TRANSFER_OUT BRL 250 <-> 200000')
  })
})
