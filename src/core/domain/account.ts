import { Result, err, ok } from 'neverthrow'
import { AccountId, generateAccountId } from './account-id.js'
import { AccountNumber } from './account-number.js'
import { Money } from './money.js'
import {
  CurrencyMismatchError,
  InvalidAmountError,
  InvalidCurrencyError
} from '../errors/validation-errors.js'
import { InsufficientFundsError } from '../errors/account-errors.js'

export interface AccountProps {
  id: AccountId
  number: AccountNumber
  balance: Money
  version: number
}

export type DepositError = InvalidAmountError | CurrencyMismatchError
export type WithdrawError = InvalidAmountError | CurrencyMismatchError | InsufficientFundsError

/**
 * Aggregate root for a bank account. Balance changes happen in memory;
 * a store persists them and advances `version`.
 */
export class Account {
  readonly id: AccountId
  readonly number: AccountNumber
  private _balance: Money
  private _version: number

  private constructor(props: AccountProps) {
    this.id = props.id
    this.number = props.number
    this._balance = props.balance
    this._version = props.version
  }

  static open(number: AccountNumber, currency: string): Result<Account, InvalidCurrencyError> {
    return Money.zero(currency).map(
      balance => new Account({ id: generateAccountId(), number, balance, version: 0 })
    )
  }

  static restore(props: AccountProps): Account {
    return new Account(props)
  }

  get balance(): Money {
    return this._balance
  }

  get currency(): string {
    return this._balance.currency
  }

  /**
   * 0 until the account is first persisted; +1 on every write after that.
   */
  get version(): number {
    return this._version
  }

  get isNew(): boolean {
    return this._version === 0
  }

  deposit(amount: Money): Result<void, DepositError> {
    if (amount.isZero()) {
      return err(new InvalidAmountError('deposit amount must be greater than zero', amount.toCents()))
    }

    return this._balance.add(amount).map(next => {
      this._balance = next
    })
  }

  withdraw(amount: Money): Result<void, WithdrawError> {
    if (amount.isZero()) {
      return err(new InvalidAmountError('withdrawal amount must be greater than zero', amount.toCents()))
    }

    return this._balance
      .subtract(amount)
      .mapErr(error =>
        error.code === 'NEGATIVE_RESULT'
          ? new InsufficientFundsError(
              this.number.value,
              amount.toCents(),
              this._balance.toCents(),
              this.currency
            )
          : error
      )
      .map(next => {
        this._balance = next
      })
  }

  /**
   * Called by a store once the current state has been written.
   */
  markPersisted(): void {
    this._version += 1
  }

  snapshot(): AccountProps {
    return {
      id: this.id,
      number: this.number,
      balance: this._balance,
      version: this._version
    }
  }

  equals(other: Account): boolean {
    return this.id === other.id
  }

  toString(): string {
    return `${this.number.value} (${this._balance.toString()})`
  }
}
