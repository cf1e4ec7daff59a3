import { ResultAsync, errAsync, err, ok } from 'neverthrow'
import type { GetBalanceQuery } from '../dto/commands.js'
import type { BalanceResult } from '../dto/results.js'
import { AccountNotFoundError } from '../errors/account-errors.js'
import type { BankingError } from '../errors/index.js'
import { parseAccountNumber } from './validation.js'
import { withUnitOfWork } from './unit-of-work-scope.js'
import type { UseCaseOptions } from './use-case-options.js'
import { getLogger, type Logger } from '../../logging/logger.js'

/**
 * Plain read, no locks. The unit of work is released without a commit.
 */
export class GetBalanceUseCase {
  private readonly options: UseCaseOptions
  private readonly logger: Logger

  constructor(options: UseCaseOptions) {
    this.options = options
    this.logger = options.logger ?? getLogger('get-balance')
  }

  execute(query: GetBalanceQuery): ResultAsync<BalanceResult, BankingError> {
    const number = parseAccountNumber(query.accountNumber)
    if (number.isErr()) {
      return errAsync(number.error)
    }

    return withUnitOfWork(
      this.options.unitOfWork,
      uow =>
        uow.accounts.getByNumber(number.value).andThen(account =>
          account === null
            ? err(new AccountNotFoundError([number.value.value]))
            : ok({
                accountNumber: account.number.value,
                balanceCents: account.balance.toCents(),
                currency: account.currency
              })
        ),
      this.logger
    )
  }
}
