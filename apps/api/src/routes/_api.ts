import type { Context } from 'hono'
import type { ZodError } from 'zod'
import type { ErrorCode, ErrorResponse, FieldIssue } from '@nat/schema'
import { LedgerError, ValidationFailedError, type LedgerErrorStatus } from '../services/ledger-errors.js'

export function fail(
  c: Context,
  code: ErrorCode,
  detail: string,
  status: LedgerErrorStatus = 400,
  issues?: FieldIssue[],
) {
  const body: ErrorResponse = {
    detail,
    error_code: code,
    ...(issues !== undefined ? { issues } : {}),
  }
  return c.json(body, status)
}

export function failWithError(c: Context, error: LedgerError) {
  const issues = error instanceof ValidationFailedError ? error.issues : undefined
  return fail(c, error.code, error.message, error.status, issues)
}

/** Body-shape problems use the same error as ledger policy checks. */
export function failWithZodError(c: Context, error: ZodError) {
  const issues = error.issues.map((issue) => ({
    field: issue.path.join('.') || 'body',
    message: issue.message,
  }))
  return failWithError(c, new ValidationFailedError(issues))
}
