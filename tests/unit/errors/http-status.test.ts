import { describe, it, expect } from 'vitest'
import {
  AccountAlreadyExistsError,
  AccountNotFoundError,
  ConcurrencyConflictError,
  CurrencyMismatchError,
  InsufficientFundsError,
  InvalidAccountNumberError,
  InvalidAmountError,
  InvalidCurrencyError,
  InvalidPageError,
  NegativeResultError,
  SameAccountTransferError,
  StorageError,
  httpStatusFor
} from '../../../src/core/errors/index.js'

describe('httpStatusFor', () => {
  it('should map business rule errors', () => {
    expect(httpStatusFor(new AccountNotFoundError(['100000']))).toBe(404)
    expect(httpStatusFor(new AccountAlreadyExistsError('100000'))).toBe(409)
    expect(httpStatusFor(new InsufficientFundsError('100000', '2', '1', 'BRL'))).toBe(422)
  })

  it('should map conflicts to 409', () => {
    expect(httpStatusFor(new ConcurrencyConflictError('lock_timeout', 'busy'))).toBe(409)
  })

  it('should map validation errors to 400', () => {
    const errors = [
      new InvalidAmountError('must be positive', -1),
      new InvalidCurrencyError('XX'),
      new CurrencyMismatchError('BRL', 'USD'),
      new NegativeResultError('1', '2', 'BRL'),
      new InvalidAccountNumberError('must contain only digits', 'abc'),
      new SameAccountTransferError('100000'),
      new InvalidPageError('limit', -1)
    ]
    expect(errors.map(httpStatusFor)).toEqual([400, 400, 400, 400, 400, 400, 400])
  })

  it('should map storage failures to 500', () => {
    expect(httpStatusFor(new StorageError('connection refused'))).toBe(500)
  })
})

describe('DomainError', () => {
  it('should carry name, code and details', () => {
    const error = new AccountNotFoundError(['100000', '200000'])
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('AccountNotFoundError')
    expect(error.message).toBe('Accounts not found: 100000, 200000')
    expect(error.details).toEqual({ accountNumbers: ['100000', '200000'] })
  })

  it('should keep the original cause of a storage error', () => {
    const cause = new Error('ECONNRESET')
    const error = StorageError.from(cause, 'Failed to read account 100000')
    expect(error.message).toBe('Failed to read account 100000: ECONNRESET')
    expect(error.cause).toBe(cause)
    expect(StorageError.from(error, 'again')).toBe(error)
  })
})
