import { DomainError } from './domain-error.js'

export class AccountNotFoundError extends DomainError {
  readonly code = 'ACCOUNT_NOT_FOUND'

  constructor(readonly accountNumbers: string[]) {
    super(
      accountNumbers.length === 1
        ? `Account ${accountNumbers[0]} not found`
        : `Accounts not found: ${accountNumbers.join(', ')}`,
      { accountNumbers }
    )
  }
}

export class AccountAlreadyExistsError extends DomainError {
  readonly code = 'ACCOUNT_ALREADY_EXISTS'

  constructor(readonly accountNumber: string) {
    super(`Account ${accountNumber} already exists`, { accountNumber })
  }
}

export class InsufficientFundsError extends DomainError {
  readonly code = 'INSUFFICIENT_FUNDS'

  constructor(accountNumber: string, requested: string, available: string, currency: string) {
    super(
      `Account ${accountNumber} has ${available} ${currency}, cannot withdraw ${requested} ${currency}`,
      { accountNumber, requested, available, currency }
    )
  }
}

export type BusinessRuleError =
  | AccountNotFoundError
  | AccountAlreadyExistsError
  | InsufficientFundsError
