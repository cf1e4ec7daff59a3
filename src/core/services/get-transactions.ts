import { Result, ResultAsync, errAsync, err, ok } from 'neverthrow'
import type { GetTransactionsQuery } from '../dto/commands.js'
import { toLedgerEntryResult, type LedgerEntryResult } from '../dto/results.js'
import type { LedgerPage } from '../ports/ledger-store.js'
import { AccountNotFoundError } from '../errors/account-errors.js'
import { InvalidPageError } from '../errors/validation-errors.js'
import type { BankingError } from '../errors/index.js'
import { parseAccountNumber } from './validation.js'
import { withUnitOfWork } from './unit-of-work-scope.js'
import type { UseCaseOptions } from './use-case-options.js'
import { getLogger, type Logger } from '../../logging/logger.js'

/**
 * Ledger entries of one account, most recent first.
 */
export class GetTransactionsUseCase {
  private readonly options: UseCaseOptions
  private readonly logger: Logger

  constructor(options: UseCaseOptions) {
    this.options = options
    this.logger = options.logger ?? getLogger('get-transactions')
  }

  execute(query: GetTransactionsQuery): ResultAsync<LedgerEntryResult[], BankingError> {
    const number = parseAccountNumber(query.accountNumber)
    if (number.isErr()) {
      return errAsync(number.error)
    }

    const page = toPage(query)
    if (page.isErr()) {
      return errAsync(page.error)
    }

    return withUnitOfWork(
      this.options.unitOfWork,
      uow =>
        uow.accounts
          .getByNumber(number.value)
          .andThen(account =>
            account === null ? err(new AccountNotFoundError([number.value.value])) : ok(account)
          )
          .andThen(account => uow.ledger.listByAccount(account.id, page.value))
          .map(entries => entries.map(toLedgerEntryResult)),
      this.logger
    )
  }
}

// limit 0 is an empty page, not "no limit"
function toPage(query: GetTransactionsQuery): Result<LedgerPage, InvalidPageError> {
  const page: LedgerPage = {}
  if (query.limit !== undefined) {
    if (!isNonNegativeInteger(query.limit)) {
      return err(new InvalidPageError('limit', query.limit))
    }
    page.limit = query.limit
  }
  if (query.offset !== undefined) {
    if (!isNonNegativeInteger(query.offset)) {
      return err(new InvalidPageError('offset', query.offset))
    }
    page.offset = query.offset
  }
  return ok(page)
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0
}
