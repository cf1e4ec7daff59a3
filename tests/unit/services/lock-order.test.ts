import { describe, it, expect, vi, type Mock } from 'vitest'
import { errAsync, okAsync } from 'neverthrow'
import { lockAccountsInOrder, lockOrder } from '../../../src/core/services/lock-order.js'
import { AccountNumber } from '../../../src/core/domain/account-number.js'
import type { Account } from '../../../src/core/domain/account.js'
import type { AccountStore } from '../../../src/core/ports/account-store.js'
import { ConcurrencyConflictError } from '../../../src/core/errors/concurrency-error.js'
import { anAccount } from '../../../src/testing/index.js'

const number = (raw: string) => AccountNumber.parse(raw)._unsafeUnwrap()

function storeWith(accounts: Account[]): AccountStore & {
  getByNumberForUpdate: Mock<AccountStore['getByNumberForUpdate']>
} {
  return {
    getByNumber: () => okAsync(null),
    getByNumberForUpdate: vi.fn<AccountStore['getByNumberForUpdate']>(n =>
      okAsync(accounts.find(account => account.number.equals(n)) ?? null)
    ),
    save: () => okAsync(undefined)
  }
}

describe('lockOrder', () => {
  it('should sort ascending and drop duplicates', () => {
    const ordered = lockOrder([number('300000'), number('100000'), number('300000'), number('200000')])
    expect(ordered.map(n => n.value)).toEqual(['100000', '200000', '300000'])
  })

  it('should compare as strings', () => {
    const ordered = lockOrder([number('9000000'), number('1000000000')])
    expect(ordered.map(n => n.value)).toEqual(['1000000000', '9000000'])
  })
})

describe('lockAccountsInOrder', () => {
  it('should lock every account in ascending order', async () => {
    const store = storeWith([
      anAccount().withNumber('100000').build(),
      anAccount().withNumber('200000').build()
    ])

    const locked = (await lockAccountsInOrder(store, [number('200000'), number('100000')]))._unsafeUnwrap()

    expect([...locked.keys()]).toEqual(['100000', '200000'])
    expect(store.getByNumberForUpdate.mock.calls.map(([n]) => n.value)).toEqual(['100000', '200000'])
  })

  it('should name every missing account', async () => {
    const store = storeWith([anAccount().withNumber('200000').build()])

    const error = (
      await lockAccountsInOrder(store, [number('300000'), number('200000'), number('100000')])
    )._unsafeUnwrapErr()

    expect(error.code).toBe('ACCOUNT_NOT_FOUND')
    expect(error.details).toEqual({ accountNumbers: ['100000', '300000'] })
  })

  it('should stop at the first conflict', async () => {
    const store = storeWith([])
    store.getByNumberForUpdate.mockReturnValueOnce(
      errAsync(new ConcurrencyConflictError('deadlock', 'deadlock detected'))
    )

    const error = (await lockAccountsInOrder(store, [number('100000'), number('200000')]))._unsafeUnwrapErr()

    expect(error.code).toBe('CONCURRENCY_CONFLICT')
    expect(store.getByNumberForUpdate).toHaveBeenCalledTimes(1)
  })
})
