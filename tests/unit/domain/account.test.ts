import { describe, it, expect } from 'vitest'
import { Account } from '../../../src/core/domain/account.js'
import { AccountNumber } from '../../../src/core/domain/account-number.js'
import { Money } from '../../../src/core/domain/money.js'
import { anAccount } from '../../../src/testing/index.js'

const brl = (cents: number) => Money.of(cents, 'BRL')._unsafeUnwrap()

describe('Account', () => {
  it('should open with a zero balance and version 0', () => {
    const number = AccountNumber.parse('100000')._unsafeUnwrap()
    const account = Account.open(number, 'brl')._unsafeUnwrap()

    expect(account.balance.toCents()).toBe('0')
    expect(account.currency).toBe('BRL')
    expect(account.version).toBe(0)
    expect(account.isNew).toBe(true)
    expect(account.id).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('should not open with an invalid currency', () => {
    const number = AccountNumber.parse('100000')._unsafeUnwrap()
    expect(Account.open(number, 'XX')._unsafeUnwrapErr().code).toBe('INVALID_CURRENCY')
  })

  it('should deposit', () => {
    const account = anAccount().withBalance(100).build()
    expect(account.deposit(brl(50)).isOk()).toBe(true)
    expect(account.balance.toCents()).toBe('150')
  })

  it('should reject a zero deposit', () => {
    const account = anAccount().withBalance(100).build()
    expect(account.deposit(brl(0))._unsafeUnwrapErr().code).toBe('INVALID_AMOUNT')
    expect(account.balance.toCents()).toBe('100')
  })

  it('should reject a deposit in another currency', () => {
    const account = anAccount().withBalance(100).build()
    const usd = Money.of(5, 'USD')._unsafeUnwrap()
    expect(account.deposit(usd)._unsafeUnwrapErr().code).toBe('CURRENCY_MISMATCH')
  })

  it('should withdraw down to zero', () => {
    const account = anAccount().withBalance(100).build()
    expect(account.withdraw(brl(100)).isOk()).toBe(true)
    expect(account.balance.isZero()).toBe(true)
  })

  it('should report insufficient funds and leave the balance alone', () => {
    const account = anAccount().withNumber('200000').withBalance(100).build()
    const error = account.withdraw(brl(101))._unsafeUnwrapErr()

    expect(error.code).toBe('INSUFFICIENT_FUNDS')
    expect(error.details).toEqual({
      accountNumber: '200000',
      requested: '101',
      available: '100',
      currency: 'BRL'
    })
    expect(account.balance.toCents()).toBe('100')
  })

  it('should reject a zero withdrawal', () => {
    const account = anAccount().withBalance(100).build()
    expect(account.withdraw(brl(0))._unsafeUnwrapErr().code).toBe('INVALID_AMOUNT')
  })

  it('should advance the version when persisted', () => {
    const account = anAccount().unsaved().build()
    account.markPersisted()
    expect(account.version).toBe(1)
    expect(account.isNew).toBe(false)
    account.markPersisted()
    expect(account.version).toBe(2)
  })

  it('should snapshot its current state', () => {
    const account = anAccount().withId('acc-1').withBalance(10).withVersion(4).build()
    account.deposit(brl(5))

    const snapshot = account.snapshot()
    expect(snapshot.id).toBe('acc-1')
    expect(snapshot.balance.toCents()).toBe('15')
    expect(snapshot.version).toBe(4)
  })

  it('should compare identity by id', () => {
    const a = anAccount().withId('same').withBalance(1).build()
    const b = anAccount().withId('same').withBalance(2).build()
    expect(a.equals(b)).toBe(true)
    expect(a.toString()).toBe('100000 (BRL 1)')
  })
})
