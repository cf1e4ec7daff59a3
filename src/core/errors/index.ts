import type { BusinessRuleError } from './account-errors.js'
import type { ConcurrencyConflictError } from './concurrency-error.js'
import type { StorageError } from './storage-error.js'
import type { ValidationError } from './validation-errors.js'

export { DomainError } from './domain-error.js'
export {
  InvalidAmountError,
  InvalidCurrencyError,
  CurrencyMismatchError,
  NegativeResultError,
  InvalidAccountNumberError,
  SameAccountTransferError,
  InvalidPageError,
  type ValidationError
} from './validation-errors.js'
export {
  AccountNotFoundError,
  AccountAlreadyExistsError,
  InsufficientFundsError,
  type BusinessRuleError
} from './account-errors.js'
export { ConcurrencyConflictError, type ConflictReason } from './concurrency-error.js'
export { StorageError } from './storage-error.js'
export { httpStatusFor } from './http-status.js'

export type BankingError = ValidationError | BusinessRuleError | ConcurrencyConflictError | StorageError

export type BankingErrorCode = BankingError['code']
