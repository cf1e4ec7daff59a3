/**
 * Base class for every error the banking core reports.
 *
 * Operations never throw these; they return them inside a `Result` so callers
 * can branch on `code` without a catch block.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string
  readonly details: Record<string, unknown>

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.name = this.constructor.name
    this.details = details
  }
}
