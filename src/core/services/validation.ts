import { Result, err, ok } from 'neverthrow'
import { AccountNumber } from '../domain/account-number.js'
import { Money } from '../domain/money.js'
import type { DecimalInput } from '../utils/decimal.js'
import {
  InvalidAccountNumberError,
  InvalidAmountError,
  InvalidCurrencyError
} from '../errors/validation-errors.js'

export type AmountValidationError = InvalidAmountError | InvalidCurrencyError

/**
 * Parse an amount that must be strictly positive.
 */
export function parsePositiveAmount(
  amountCents: DecimalInput,
  currency: string
): Result<Money, AmountValidationError> {
  return Money.of(amountCents, currency).andThen(amount =>
    amount.isZero()
      ? err(new InvalidAmountError('must be greater than zero', amount.toCents()))
      : ok(amount)
  )
}

export function parseAccountNumber(raw: string): Result<AccountNumber, InvalidAccountNumberError> {
  return AccountNumber.parse(raw)
}
