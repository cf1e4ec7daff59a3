import { randomUUID } from 'node:crypto'

/**
 * Internal identity of an account (UUID v4). Ledger entries point at it.
 */
export type AccountId = string

export function generateAccountId(): AccountId {
  return randomUUID()
}
