import { Result, ResultAsync, err, ok } from 'neverthrow'
import type { Account } from '../domain/account.js'
import { AccountNumber } from '../domain/account-number.js'
import type { AccountReadError, AccountStore } from '../ports/account-store.js'
import { AccountNotFoundError } from '../errors/account-errors.js'

export type LockedAccounts = ReadonlyMap<string, Account>

/**
 * Lock several accounts for update in ascending account-number order.
 *
 * Every code path that locks more than one account goes through here, so
 * two units of work touching the same accounts always request the locks
 * in the same order and can never wait on each other in a cycle.
 */
export function lockAccountsInOrder(
  store: AccountStore,
  numbers: readonly AccountNumber[]
): ResultAsync<LockedAccounts, AccountNotFoundError | AccountReadError> {
  return new ResultAsync(lockSequentially(store, lockOrder(numbers)))
}

/**
 * The unique numbers sorted the way locks must be taken.
 */
export function lockOrder(numbers: readonly AccountNumber[]): AccountNumber[] {
  const unique = new Map<string, AccountNumber>()
  for (const number of numbers) {
    unique.set(number.value, number)
  }
  return [...unique.values()].sort(AccountNumber.compare)
}

async function lockSequentially(
  store: AccountStore,
  ordered: AccountNumber[]
): Promise<Result<LockedAccounts, AccountNotFoundError | AccountReadError>> {
  const locked = new Map<string, Account>()
  const missing: string[] = []

  for (const number of ordered) {
    const result = await store.getByNumberForUpdate(number)
    if (result.isErr()) {
      return err(result.error)
    }
    if (result.value === null) {
      missing.push(number.value)
    } else {
      locked.set(number.value, result.value)
    }
  }

  if (missing.length > 0) {
    return err(new AccountNotFoundError(missing))
  }

  return ok(locked)
}
