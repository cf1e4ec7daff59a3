import { describe, it, expect, beforeEach } from 'vitest'
import { CreateAccountUseCase } from '../../../src/core/services/create-account.js'
import { DepositUseCase } from '../../../src/core/services/deposit.js'
import { WithdrawUseCase } from '../../../src/core/services/withdraw.js'
import { ConflictInjectingUnitOfWorkFactory } from '../../../src/testing/index.js'
import type { InMemoryDatabase } from '../../../src/adapters/memory/in-memory-database.js'
import type { InMemoryUnitOfWorkFactory } from '../../../src/adapters/memory/in-memory-unit-of-work.js'
import { captureLogs, createMemoryStore, spyOnBegin } from '../../support/fixtures.js'

describe('Deposit and withdraw', () => {
  let database: InMemoryDatabase
  let unitOfWork: InMemoryUnitOfWorkFactory
  let accountId: string

  beforeEach(async () => {
    ;({ database, unitOfWork } = createMemoryStore())
    const created = await new CreateAccountUseCase({ unitOfWork }).execute({
      accountNumber: '100000',
      initialBalanceCents: 1000
    })
    accountId = created._unsafeUnwrap().accountId
  })

  describe('DepositUseCase', () => {
    it('should credit the account and record a DEPOSIT entry', async () => {
      const result = await new DepositUseCase({ unitOfWork }).execute({
        accountNumber: '100000',
        amountCents: 250
      })

      expect(result._unsafeUnwrap()).toEqual({ accountNumber: '100000', balanceCents: '1250', currency: 'BRL' })
      expect(database.findAccountByNumber('100000')?.version).toBe(2)

      const types = database.listEntries(accountId).map(({ entry }) => entry.type)
      expect(types).toEqual(['DEPOSIT', 'DEPOSIT'])
    })

    it('should store a balance of any size exactly', async () => {
      const amountCents = `1${'0'.repeat(44)}1`
      const result = await new DepositUseCase({ unitOfWork }).execute({ accountNumber: '100000', amountCents })

      expect(result._unsafeUnwrap().balanceCents).toBe(`1${'0'.repeat(41)}1001`)
      expect(database.findAccountByNumber('100000')?.balance.toCents()).toBe(`1${'0'.repeat(41)}1001`)
    })

    it('should reject a zero or negative amount without touching storage', async () => {
      const spied = spyOnBegin(unitOfWork)
      const deposit = new DepositUseCase({ unitOfWork: spied })

      expect((await deposit.execute({ accountNumber: '100000', amountCents: 0 }))._unsafeUnwrapErr().code).toBe(
        'INVALID_AMOUNT'
      )
      expect((await deposit.execute({ accountNumber: '100000', amountCents: -5 }))._unsafeUnwrapErr().code).toBe(
        'INVALID_AMOUNT'
      )
      expect(spied.begin).not.toHaveBeenCalled()
    })

    it('should report an unknown account', async () => {
      const result = await new DepositUseCase({ unitOfWork }).execute({ accountNumber: '999999', amountCents: 1 })
      const error = result._unsafeUnwrapErr()
      expect(error.code).toBe('ACCOUNT_NOT_FOUND')
      expect(error.details).toEqual({ accountNumbers: ['999999'] })
    })

    it('should reject a currency other than the account currency', async () => {
      const result = await new DepositUseCase({ unitOfWork }).execute({
        accountNumber: '100000',
        amountCents: 1,
        currency: 'USD'
      })
      expect(result._unsafeUnwrapErr().code).toBe('CURRENCY_MISMATCH')
      expect(database.findAccountByNumber('100000')?.balance.toCents()).toBe('1000')
    })

    it('should retry after a lock conflict and log each attempt', async () => {
      const flaky = new ConflictInjectingUnitOfWorkFactory(unitOfWork, { lockConflicts: 1 })
      const logs = captureLogs()

      const result = await new DepositUseCase({ unitOfWork: flaky, logger: logs.logger }).execute({
        accountNumber: '100000',
        amountCents: 1
      })

      expect(result._unsafeUnwrap().balanceCents).toBe('1001')
      expect(flaky.stats).toEqual({ begun: 2, committed: 1, rolledBack: 1, released: 2 })
      expect(logs.messages()).toEqual(['concurrency_conflict_retry', 'deposit_succeeded'])
      expect(logs.lines[1]).toMatchObject({ accountNumber: '100000', amountCents: '1', attempt: 2 })
    })
  })

  describe('WithdrawUseCase', () => {
    it('should debit the account and record a WITHDRAWAL entry', async () => {
      const result = await new WithdrawUseCase({ unitOfWork }).execute({
        accountNumber: '100000',
        amountCents: 400
      })

      expect(result._unsafeUnwrap().balanceCents).toBe('600')
      const types = database.listEntries(accountId).map(({ entry }) => entry.type)
      expect(types).toEqual(['DEPOSIT', 'WITHDRAWAL'])
    })

    it.each([0, -5])('should reject an amount of %d and leave the balance alone', async amountCents => {
      const spied = spyOnBegin(unitOfWork)
      const result = await new WithdrawUseCase({ unitOfWork: spied }).execute({ accountNumber: '100000', amountCents })

      expect(result._unsafeUnwrapErr().code).toBe('INVALID_AMOUNT')
      expect(spied.begin).not.toHaveBeenCalled()
      expect(database.findAccountByNumber('100000')?.balance.toCents()).toBe('1000')
    })

    it('should allow withdrawing the whole balance', async () => {
      const result = await new WithdrawUseCase({ unitOfWork }).execute({
        accountNumber: '100000',
        amountCents: 1000
      })
      expect(result._unsafeUnwrap().balanceCents).toBe('0')
    })

    it('should refuse to overdraw and write nothing', async () => {
      const result = await new WithdrawUseCase({ unitOfWork }).execute({
        accountNumber: '100000',
        amountCents: 1001
      })

      expect(result._unsafeUnwrapErr().code).toBe('INSUFFICIENT_FUNDS')
      expect(database.findAccountByNumber('100000')?.balance.toCents()).toBe('1000')
      expect(database.findAccountByNumber('100000')?.version).toBe(1)
      expect(database.entryCount).toBe(1)
    })

    it('should not retry a business rule failure', async () => {
      const spied = spyOnBegin(unitOfWork)
      await new WithdrawUseCase({ unitOfWork: spied }).execute({ accountNumber: '100000', amountCents: 5000 })
      expect(spied.begin).toHaveBeenCalledTimes(1)
    })

    it('should release the row lock after a failed attempt', async () => {
      await new WithdrawUseCase({ unitOfWork }).execute({ accountNumber: '100000', amountCents: 5000 })
      expect(database.locks.isLocked('100000')).toBe(false)
    })
  })
})
