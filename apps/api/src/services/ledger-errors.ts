import type { ErrorCode, FieldIssue } from '@nat/schema'

export type LedgerErrorStatus = 400 | 404 | 422 | 500

/**
 * Base class for every failure the Opportunity Ledger reports to callers.
 * `code` and `status` map one-to-one onto the HTTP error body.
 */
export class LedgerError extends Error {
  readonly code: ErrorCode
  readonly status: LedgerErrorStatus

  constructor(code: ErrorCode, status: LedgerErrorStatus, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LedgerError'
    this.code = code
    this.status = status
  }
}

export class InvalidTenantError extends LedgerError {
  constructor(message = 'Tenant id is missing or malformed') {
    super('INVALID_TENANT', 400, message)
    this.name = 'InvalidTenantError'
  }
}

/** Also raised for rows owned by another tenant; the two cases are indistinguishable. */
export class NotFoundError extends LedgerError {
  constructor(message = 'Opportunity not found') {
    super('NOT_FOUND', 404, message)
    this.name = 'NotFoundError'
  }
}

export class ValidationFailedError extends LedgerError {
  readonly issues: FieldIssue[]

  constructor(issues: FieldIssue[]) {
    super(
      'VALIDATION_FAILED',
      422,
      `Validation failed: ${issues.map((issue) => `${issue.field} ${issue.message}`).join('; ')}`,
    )
    this.name = 'ValidationFailedError'
    this.issues = issues
  }
}

/** Storage failure. The cause is kept for logs and never sent to clients. */
export class PersistenceFailureError extends LedgerError {
  constructor(message: string, cause: unknown) {
    super('SERVER_ERROR', 500, message, { cause })
    this.name = 'PersistenceFailureError'
  }
}
