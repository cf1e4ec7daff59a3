import type { ResultAsync } from 'neverthrow'
import type { WithdrawCommand } from '../dto/commands.js'
import type { BalanceResult } from '../dto/results.js'
import type { BankingError } from '../errors/index.js'
import { mutateBalance, type BalanceMutation } from './balance-mutation.js'
import { FALLBACK_CURRENCY, type UseCaseOptions } from './use-case-options.js'
import { getLogger, type Logger } from '../../logging/logger.js'

const WITHDRAWAL: BalanceMutation = {
  operation: 'withdraw',
  entryType: 'WITHDRAWAL',
  successEvent: 'withdraw_succeeded',
  apply: (account, amount) => account.withdraw(amount)
}

export class WithdrawUseCase {
  private readonly options: UseCaseOptions
  private readonly logger: Logger

  constructor(options: UseCaseOptions) {
    this.options = options
    this.logger = options.logger ?? getLogger('withdraw')
  }

  execute(command: WithdrawCommand): ResultAsync<BalanceResult, BankingError> {
    return mutateBalance(
      WITHDRAWAL,
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
