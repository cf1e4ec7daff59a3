import { DomainError } from './domain-error.js'

export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT'

  constructor(reason: string, value?: unknown) {
    super(`Invalid amount: ${reason}`, { reason, value })
  }
}

export class InvalidCurrencyError extends DomainError {
  readonly code = 'INVALID_CURRENCY'

  constructor(value: unknown) {
    super(`Invalid currency code: ${String(value)}`, { value })
  }
}

export class CurrencyMismatchError extends DomainError {
  readonly code = 'CURRENCY_MISMATCH'

  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Currency mismatch: expected ${expected}, got ${actual}`, { expected, actual })
  }
}

export class NegativeResultError extends DomainError {
  readonly code = 'NEGATIVE_RESULT'

  constructor(minuend: string, subtrahend: string, currency: string) {
    super(`Subtracting ${subtrahend} from ${minuend} ${currency} would go below zero`, {
      minuend,
      subtrahend,
      currency
    })
  }
}

export class InvalidAccountNumberError extends DomainError {
  readonly code = 'INVALID_ACCOUNT_NUMBER'

  constructor(reason: string, value: unknown) {
    super(`Invalid account number: ${reason}`, { reason, value })
  }
}

export class SameAccountTransferError extends DomainError {
  readonly code = 'SAME_ACCOUNT_TRANSFER'

  constructor(accountNumber: string) {
    super(`Cannot transfer from account ${accountNumber} to itself`, { accountNumber })
  }
}

export class InvalidPageError extends DomainError {
  readonly code = 'INVALID_PAGE'

  constructor(field: 'limit' | 'offset', value: unknown) {
    super(`Invalid ${field}: must be a non-negative integer`, { field, value })
  }
}

export type ValidationError =
  | InvalidAmountError
  | InvalidCurrencyError
  | CurrencyMismatchError
  | NegativeResultError
  | InvalidAccountNumberError
  | SameAccountTransferError
  | InvalidPageError
