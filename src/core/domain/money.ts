import { Result, err, ok } from 'neverthrow'
import { Decimal, DecimalInput, addExact, subtractExact, toDecimal } from '../utils/decimal.js'
import {
  CurrencyMismatchError,
  InvalidAmountError,
  InvalidCurrencyError,
  NegativeResultError
} from '../errors/validation-errors.js'

const CURRENCY_PATTERN = /^[A-Z]{3}$/

export type MoneyError = InvalidAmountError | InvalidCurrencyError

/**
 * Non-negative amount of minor units (cents) in a single currency. Amounts
 * of any size stay exact.
 */
export class Money {
  private constructor(
    readonly amount: Decimal,
    readonly currency: string
  ) {}

  static of(amount: DecimalInput, currency: string): Result<Money, MoneyError> {
    return Money.normalizeCurrency(currency).andThen(code => {
      const parsed = toDecimal(amount)
      if (parsed === null) {
        return err(new InvalidAmountError('must be a finite number', String(amount)))
      }
      if (!parsed.isInteger()) {
        return err(new InvalidAmountError('must be a whole number of minor units', parsed.toString()))
      }
      if (parsed.isNegative() && !parsed.isZero()) {
        return err(new InvalidAmountError('cannot be negative', parsed.toString()))
      }
      // -0 collapses to 0
      return ok(new Money(parsed.abs(), code))
    })
  }

  static zero(currency: string): Result<Money, InvalidCurrencyError> {
    return Money.normalizeCurrency(currency).map(code => new Money(new Decimal(0), code))
  }

  static normalizeCurrency(currency: string): Result<string, InvalidCurrencyError> {
    const code = typeof currency === 'string' ? currency.trim().toUpperCase() : ''
    if (!CURRENCY_PATTERN.test(code)) {
      return err(new InvalidCurrencyError(currency))
    }
    return ok(code)
  }

  isZero(): boolean {
    return this.amount.isZero()
  }

  add(other: Money): Result<Money, CurrencyMismatchError> {
    return this.ensureSameCurrency(other).map(
      () => new Money(addExact(this.amount, other.amount), this.currency)
    )
  }

  subtract(other: Money): Result<Money, CurrencyMismatchError | NegativeResultError> {
    return this.ensureSameCurrency(other).andThen(() => {
      if (other.amount.greaterThan(this.amount)) {
        return err(new NegativeResultError(this.toCents(), other.toCents(), this.currency))
      }
      return ok(new Money(subtractExact(this.amount, other.amount), this.currency))
    })
  }

  /**
   * -1, 0 or 1 as this amount is below, equal to or above the other.
   */
  compare(other: Money): Result<number, CurrencyMismatchError> {
    return this.ensureSameCurrency(other).map(() => this.amount.comparedTo(other.amount))
  }

  lessThan(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map(c => c < 0)
  }

  lessThanOrEqual(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map(c => c <= 0)
  }

  greaterThan(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map(c => c > 0)
  }

  greaterThanOrEqual(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map(c => c >= 0)
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.amount.equals(other.amount)
  }

  toCents(): string {
    return this.amount.toFixed(0)
  }

  toString(): string {
    return `${this.currency} ${this.toCents()}`
  }

  private ensureSameCurrency(other: Money): Result<void, CurrencyMismatchError> {
    if (this.currency !== other.currency) {
      return err(new CurrencyMismatchError(this.currency, other.currency))
    }
    return ok(undefined)
  }
}
