import { Result, ResultAsync, err, errAsync, ok } from 'neverthrow'
import { Account } from '../domain/account.js'
import { AccountNumber } from '../domain/account-number.js'
import { LedgerEntry, LedgerEntryType } from '../domain/ledger-entry.js'
import { Money } from '../domain/money.js'
import type { UnitOfWork, UnitOfWorkFactory } from '../ports/unit-of-work.js'
import type { BalanceResult } from '../dto/results.js'
import { AccountNotFoundError, InsufficientFundsError } from '../errors/account-errors.js'
import type { BankingError } from '../errors/index.js'
import { CurrencyMismatchError, InvalidAmountError } from '../errors/validation-errors.js'
import { parseAccountNumber, parsePositiveAmount } from './validation.js'
import { DEFAULT_RETRY_POLICY, RetryPolicy, retryOnConflict } from './retry.js'
import { withUnitOfWork } from './unit-of-work-scope.js'
import type { DecimalInput } from '../utils/decimal.js'
import type { Logger } from '../../logging/logger.js'

export type MutationError = InvalidAmountError | CurrencyMismatchError | InsufficientFundsError

export interface BalanceMutation {
  operation: string
  entryType: Extract<LedgerEntryType, 'DEPOSIT' | 'WITHDRAWAL'>
  successEvent: string
  apply(account: Account, amount: Money): Result<void, MutationError>
}

export interface BalanceMutationRequest {
  accountNumber: string
  amountCents: DecimalInput
  currency: string
}

export interface BalanceMutationDeps {
  unitOfWork: UnitOfWorkFactory
  retryPolicy?: RetryPolicy
  logger: Logger
}

/**
 * Lock one account, change its balance, record one ledger entry, persist
 * and commit. Concurrency conflicts re-run the whole sequence.
 */
export function mutateBalance(
  mutation: BalanceMutation,
  request: BalanceMutationRequest,
  deps: BalanceMutationDeps
): ResultAsync<BalanceResult, BankingError> {
  const validated = parseAccountNumber(request.accountNumber).andThen(number =>
    parsePositiveAmount(request.amountCents, request.currency).map(amount => ({ number, amount }))
  )

  if (validated.isErr()) {
    return errAsync(validated.error)
  }

  const { number, amount } = validated.value

  return retryOnConflict(
    deps.retryPolicy ?? DEFAULT_RETRY_POLICY,
    {
      operation: mutation.operation,
      logger: deps.logger,
      fields: { accountNumber: number.value }
    },
    () =>
      withUnitOfWork(
        deps.unitOfWork,
        uow => new ResultAsync(attemptMutation(uow, mutation, number, amount)),
        deps.logger
      )
  ).map(({ value, attempts }) => {
    deps.logger.info(
      {
        accountNumber: value.accountNumber,
        amountCents: amount.toCents(),
        currency: amount.currency,
        balanceCents: value.balanceCents,
        attempt: attempts
      },
      mutation.successEvent
    )
    return value
  })
}

async function attemptMutation(
  uow: UnitOfWork,
  mutation: BalanceMutation,
  number: AccountNumber,
  amount: Money
): Promise<Result<BalanceResult, BankingError>> {
  const loaded = await uow.accounts.getByNumberForUpdate(number)
  if (loaded.isErr()) {
    return err(loaded.error)
  }

  const account = loaded.value
  if (account === null) {
    return err(new AccountNotFoundError([number.value]))
  }

  const applied = mutation.apply(account, amount)
  if (applied.isErr()) {
    return err(applied.error)
  }

  const entry = LedgerEntry.create({
    accountId: account.id,
    type: mutation.entryType,
    amount
  })
  if (entry.isErr()) {
    return err(entry.error)
  }

  const recorded = await uow.ledger.save(entry.value)
  if (recorded.isErr()) {
    return err(recorded.error)
  }

  const saved = await uow.accounts.save(account)
  if (saved.isErr()) {
    return err(saved.error)
  }

  const committed = await uow.commit()
  if (committed.isErr()) {
    return err(committed.error)
  }

  return ok({
    accountNumber: account.number.value,
    balanceCents: account.balance.toCents(),
    currency: account.currency
  })
}
