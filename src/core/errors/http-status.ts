import type { BankingError } from './index.js'

/**
 * Status an inbound HTTP adapter should answer with for each error kind.
 */
export function httpStatusFor(error: BankingError): number {
  switch (error.code) {
    case 'ACCOUNT_NOT_FOUND':
      return 404
    case 'ACCOUNT_ALREADY_EXISTS':
    case 'CONCURRENCY_CONFLICT':
      return 409
    case 'INSUFFICIENT_FUNDS':
      return 422
    case 'INVALID_AMOUNT':
    case 'INVALID_CURRENCY':
    case 'CURRENCY_MISMATCH':
    case 'NEGATIVE_RESULT':
    case 'INVALID_ACCOUNT_NUMBER':
    case 'SAME_ACCOUNT_TRANSFER':
    case 'INVALID_PAGE':
      return 400
    case 'STORAGE_ERROR':
      return 500
  }
}
