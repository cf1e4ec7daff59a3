import { Result, err, ok } from 'neverthrow'
import { InvalidAccountNumberError } from '../errors/validation-errors.js'

const MIN_DIGITS = 6
const MAX_DIGITS = 12

/**
 * External identity of an account: 6 to 12 ASCII digits. Also the key
 * that fixes the order in which rows are locked.
 */
export class AccountNumber {
  private constructor(readonly value: string) {}

  static parse(raw: string): Result<AccountNumber, InvalidAccountNumberError> {
    if (typeof raw !== 'string') {
      return err(new InvalidAccountNumberError('must be a string', raw))
    }

    const value = raw.trim()

    if (!/^[0-9]+$/.test(value)) {
      return err(new InvalidAccountNumberError('must contain only digits', raw))
    }

    if (value.length < MIN_DIGITS || value.length > MAX_DIGITS) {
      return err(
        new InvalidAccountNumberError(`must be between ${MIN_DIGITS} and ${MAX_DIGITS} digits long`, raw)
      )
    }

    return ok(new AccountNumber(value))
  }

  /**
   * Ascending order used for lock acquisition.
   */
  static compare(a: AccountNumber, b: AccountNumber): number {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0
  }

  equals(other: AccountNumber): boolean {
    return this.value === other.value
  }

  toString(): string {
    return this.value
  }
}
