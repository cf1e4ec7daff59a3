import { randomUUID } from 'node:crypto'
import { Result, ResultAsync, err, errAsync, ok } from 'neverthrow'
import type { Account } from '../domain/account.js'
import { AccountNumber } from '../domain/account-number.js'
import { LedgerEntry } from '../domain/ledger-entry.js'
import { Money } from '../domain/money.js'
import type { UnitOfWork } from '../ports/unit-of-work.js'
import type { TransferCommand } from '../dto/commands.js'
import type { TransferResult } from '../dto/results.js'
import { AccountNotFoundError } from '../errors/account-errors.js'
import type { BankingError } from '../errors/index.js'
import { SameAccountTransferError } from '../errors/validation-errors.js'
import { parseAccountNumber, parsePositiveAmount } from './validation.js'
import { lockAccountsInOrder } from './lock-order.js'
import { DEFAULT_RETRY_POLICY, retryOnConflict } from './retry.js'
import { withUnitOfWork } from './unit-of-work-scope.js'
import { FALLBACK_CURRENCY, type UseCaseOptions } from './use-case-options.js'
import { getLogger, type Logger } from '../../logging/logger.js'

interface TransferRequest {
  source: AccountNumber
  destination: AccountNumber
  amount: Money
}

interface TransferBalances {
  fromBalanceCents: string
  toBalanceCents: string
}

/**
 * Move money between two accounts as one atomic unit.
 *
 * Both rows are locked in ascending account-number order whatever the
 * direction of the transfer. Every attempt shares one correlation id, so
 * the committed TRANSFER_OUT / TRANSFER_IN pair is the same no matter how
 * many attempts were rolled back before it.
 */
export class TransferUseCase {
  private readonly options: UseCaseOptions
  private readonly logger: Logger

  constructor(options: UseCaseOptions) {
    this.options = options
    this.logger = options.logger ?? getLogger('transfer')
  }

  execute(command: TransferCommand): ResultAsync<TransferResult, BankingError> {
    const validated = this.validate(command)
    if (validated.isErr()) {
      return errAsync(validated.error)
    }

    const request = validated.value
    const correlationId = randomUUID()

    return retryOnConflict(
      this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
      {
        operation: 'transfer',
        logger: this.logger,
        fields: {
          correlationId,
          fromAccountNumber: request.source.value,
          toAccountNumber: request.destination.value
        }
      },
      () =>
        withUnitOfWork(
          this.options.unitOfWork,
          uow => new ResultAsync(this.attempt(uow, request, correlationId)),
          this.logger
        )
    ).map(({ value, attempts }) => {
      const result: TransferResult = {
        correlationId,
        fromAccountNumber: request.source.value,
        toAccountNumber: request.destination.value,
        fromBalanceCents: value.fromBalanceCents,
        toBalanceCents: value.toBalanceCents,
        currency: request.amount.currency,
        attempts
      }

      this.logger.info(
        {
          correlationId,
          fromAccountNumber: result.fromAccountNumber,
          toAccountNumber: result.toAccountNumber,
          amountCents: request.amount.toCents(),
          currency: result.currency,
          fromBalanceCents: result.fromBalanceCents,
          toBalanceCents: result.toBalanceCents,
          attempt: attempts
        },
        'transfer_succeeded'
      )

      return result
    })
  }

  private validate(command: TransferCommand): Result<TransferRequest, BankingError> {
    const currency = command.currency ?? this.options.defaultCurrency ?? FALLBACK_CURRENCY

    return parseAccountNumber(command.fromAccountNumber).andThen(source =>
      parseAccountNumber(command.toAccountNumber).andThen(destination => {
        if (source.equals(destination)) {
          return err(new SameAccountTransferError(source.value))
        }
        return parsePositiveAmount(command.amountCents, currency).map(amount => ({
          source,
          destination,
          amount
        }))
      })
    )
  }

  private async attempt(
    uow: UnitOfWork,
    request: TransferRequest,
    correlationId: string
  ): Promise<Result<TransferBalances, BankingError>> {
    const locked = await lockAccountsInOrder(uow.accounts, [request.source, request.destination])
    if (locked.isErr()) {
      return err(locked.error)
    }

    const source = locked.value.get(request.source.value)
    const destination = locked.value.get(request.destination.value)
    if (!source || !destination) {
      return err(new AccountNotFoundError([request.source.value, request.destination.value]))
    }

    const moved = this.move(source, destination, request.amount, correlationId)
    if (moved.isErr()) {
      return err(moved.error)
    }

    for (const entry of moved.value) {
      const recorded = await uow.ledger.save(entry)
      if (recorded.isErr()) {
        return err(recorded.error)
      }
    }

    for (const account of [source, destination]) {
      const saved = await uow.accounts.save(account)
      if (saved.isErr()) {
        return err(saved.error)
      }
    }

    const committed = await uow.commit()
    if (committed.isErr()) {
      return err(committed.error)
    }

    return ok({
      fromBalanceCents: source.balance.toCents(),
      toBalanceCents: destination.balance.toCents()
    })
  }

  private move(
    source: Account,
    destination: Account,
    amount: Money,
    correlationId: string
  ): Result<[LedgerEntry, LedgerEntry], BankingError> {
    return source
      .withdraw(amount)
      .andThen(() => destination.deposit(amount))
      .andThen(() =>
        LedgerEntry.create({
          accountId: source.id,
          type: 'TRANSFER_OUT',
          amount,
          correlationId,
          counterpartyAccountNumber: destination.number
        })
      )
      .andThen(outgoing =>
        LedgerEntry.create({
          accountId: destination.id,
          type: 'TRANSFER_IN',
          amount,
          correlationId,
          counterpartyAccountNumber: source.number
        }).map((incoming): [LedgerEntry, LedgerEntry] => [outgoing, incoming])
      )
  }
}
