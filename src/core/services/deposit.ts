import type { ResultAsync } from 'neverthrow'
import type { DepositCommand } from '../dto/commands.js'
import type { BalanceResult } from '../dto/results.js'
import type { BankingError } from '../errors/index.js'
import { mutateBalance, type BalanceMutation } from './balance-mutation.js'
import { FALLBACK_CURRENCY, type UseCaseOptions } from './use-case-options.js'
import { getLogger, type Logger } from '../../logging/logger.js'

const DEPOSIT: BalanceMutation = {
  operation: 'deposit',
  entryType: 'DEPOSIT',
  successEvent: 'deposit_succeeded',
  apply: (account, amount) => account.deposit(amount)
}

export class DepositUseCase {
  private readonly options: UseCaseOptions
  private readonly logger: Logger

  constructor(options: UseCaseOptions) {
    this.options = options
    this.logger = options.logger ?? getLogger('deposit')
  }

  execute(command: DepositCommand): ResultAsync<BalanceResult, BankingError> {
    return mutateBalance(
      DEPOSIT,
      {
        accountNumber: command.accountNumber,
        amountCents: command.amountCents,
        currency: command.currency ?? this.options.defaultCurrency ?? FALLBACK_CURRENCY
      },
      {
        unitOfWork: this.options.unitOfWork,
        retryPolicy: this.options.retryPolicy,
        logger: this.logger
      }
    )
  }
}
