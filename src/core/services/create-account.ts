import { Result, ResultAsync, err, errAsync, ok } from 'neverthrow'
import { Account } from '../domain/account.js'
import { AccountNumber } from '../domain/account-number.js'
import { LedgerEntry } from '../domain/ledger-entry.js'
import { Money } from '../domain/money.js'
import type { UnitOfWork } from '../ports/unit-of-work.js'
import type { CreateAccountCommand } from '../dto/commands.js'
import type { AccountCreatedResult } from '../dto/results.js'
import { AccountAlreadyExistsError } from '../errors/account-errors.js'
import type { BankingError } from '../errors/index.js'
import { parseAccountNumber } from './validation.js'
import { withUnitOfWork } from './unit-of-work-scope.js'
import { FALLBACK_CURRENCY, type UseCaseOptions } from './use-case-options.js'
import { getLogger, type Logger } from '../../logging/logger.js'

/**
 * Open a new account, optionally funded by an initial deposit.
 *
 * A single attempt: the existence check is a plain read, and the unique
 * account number in storage settles any race between two creators.
 */
export class CreateAccountUseCase {
  private readonly options: UseCaseOptions
  private readonly logger: Logger

  constructor(options: UseCaseOptions) {
    this.options = options
    this.logger = options.logger ?? getLogger('create-account')
  }

  execute(command: CreateAccountCommand): ResultAsync<AccountCreatedResult, BankingError> {
    const currency = command.currency ?? this.options.defaultCurrency ?? FALLBACK_CURRENCY

    const validated = parseAccountNumber(command.accountNumber).andThen(number =>
      Money.of(command.initialBalanceCents ?? 0, currency).map(initialDeposit => ({
        number,
        initialDeposit
      }))
    )

    if (validated.isErr()) {
      return errAsync(validated.error)
    }

    const { number, initialDeposit } = validated.value

    return withUnitOfWork(
      this.options.unitOfWork,
      uow => new ResultAsync(this.open(uow, number, initialDeposit)),
      this.logger
    ).map(result => {
      this.logger.info(
        {
          accountNumber: result.accountNumber,
          currency: result.currency,
          balanceCents: result.balanceCents
        },
        'account_created'
      )
      return result
    })
  }

  private async open(
    uow: UnitOfWork,
    number: AccountNumber,
    initialDeposit: Money
  ): Promise<Result<AccountCreatedResult, BankingError>> {
    const existing = await uow.accounts.getByNumber(number)
    if (existing.isErr()) {
      return err(existing.error)
    }
    if (existing.value !== null) {
      return err(new AccountAlreadyExistsError(number.value))
    }

    const opened = Account.open(number, initialDeposit.currency)
    if (opened.isErr()) {
      return err(opened.error)
    }
    const account = opened.value

    if (!initialDeposit.isZero()) {
      const funded = this.applyInitialDeposit(account, initialDeposit)
      if (funded.isErr()) {
        return err(funded.error)
      }
      const recorded = await uow.ledger.save(funded.value)
      if (recorded.isErr()) {
        return err(recorded.error)
      }
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
      accountId: account.id,
      accountNumber: account.number.value,
      balanceCents: account.balance.toCents(),
      currency: account.currency
    })
  }

  private applyInitialDeposit(account: Account, amount: Money): Result<LedgerEntry, BankingError> {
    return account
      .deposit(amount)
      .andThen(() => LedgerEntry.create({ accountId: account.id, type: 'DEPOSIT', amount }))
  }
}
