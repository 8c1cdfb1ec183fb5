/**
 * Opportunity Ledger.
 *
 * Owns the two operations behind the dashboard:
 * - `listDueActions`: every opportunity of a tenant whose next action is due
 *   at `now` or earlier, most overdue first.
 * - `completeAction`: records that the current action happened and schedules
 *   the next one in the same write.
 *
 * The tenant id is an explicit argument on every call. Nothing here reads
 * request state.
 */

import { isBefore, startOfDay } from 'date-fns'
import { isOpportunityId, isTenantId } from '@nat/db'
import {
  NEXT_ACTION_DETAILS_MAX_LENGTH,
  NEXT_ACTION_DETAILS_MIN_LENGTH,
  type FieldIssue,
} from '@nat/schema'
import type { Logger } from '../lib/logger.js'
import {
  InvalidTenantError,
  LedgerError,
  NotFoundError,
  PersistenceFailureError,
  ValidationFailedError,
} from './ledger-errors.js'
import type { CompletedAction, DueOpportunity, OpportunityStore } from './opportunity-store.js'

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

/** Field names as callers send them, so issues can point at the request. */
export const NEXT_ACTION_AT_FIELD = 'new_next_action_at'
export const NEXT_ACTION_DETAILS_FIELD = 'new_next_action_details'

/**
 * Policy checks for a new next action.
 *
 * The date rule works at calendar-day granularity in the server's local
 * timezone: any time today passes, any time on an earlier day fails.
 */
export function validateNextAction(nextActionAt: Date, nextActionDetails: string, now: Date): FieldIssue[] {
  const issues: FieldIssue[] = []

  if (Number.isNaN(nextActionAt.getTime())) {
    issues.push({ field: NEXT_ACTION_AT_FIELD, message: 'must be a valid timestamp' })
  } else if (isBefore(startOfDay(nextActionAt), startOfDay(now))) {
    issues.push({ field: NEXT_ACTION_AT_FIELD, message: 'must be today or in the future' })
  }

  const trimmed = nextActionDetails.trim()
  if (trimmed.length === 0) {
    issues.push({ field: NEXT_ACTION_DETAILS_FIELD, message: 'is required' })
  } else if (trimmed.length < NEXT_ACTION_DETAILS_MIN_LENGTH) {
    issues.push({
      field: NEXT_ACTION_DETAILS_FIELD,
      message: `must be at least ${NEXT_ACTION_DETAILS_MIN_LENGTH} characters`,
    })
  } else if (nextActionDetails.length > NEXT_ACTION_DETAILS_MAX_LENGTH) {
    issues.push({
      field: NEXT_ACTION_DETAILS_FIELD,
      message: `must be at most ${NEXT_ACTION_DETAILS_MAX_LENGTH} characters`,
    })
  }

  return issues
}

function assertTenant(tenantId: string): void {
  if (!tenantId || !isTenantId(tenantId)) {
    throw new InvalidTenantError()
  }
}

export class OpportunityLedger {
  private readonly store: OpportunityStore
  private readonly logger: Logger

  constructor(store: OpportunityStore, logger: Logger) {
    this.store = store
    this.logger = logger
  }

  async listDueActions(tenantId: string, now: Date): Promise<DueOpportunity[]> {
    assertTenant(tenantId)
    const log = this.logger.child({ tenantId })

    let rows: DueOpportunity[]
    try {
      rows = await this.store.findDue(tenantId, now)
    } catch (error) {
      throw this.persistenceFailure(log, 'Failed to retrieve due opportunities', error)
    }

    log.info('Due opportunities retrieved', { count: rows.length })
    return rows
  }

  async completeAction(
    tenantId: string,
    opportunityId: string,
    newNextActionAt: Date,
    newNextActionDetails: string,
    now: Date,
  ): Promise<CompletedAction> {
    assertTenant(tenantId)
    const log = this.logger.child({ tenantId, opportunityId })

    const issues = validateNextAction(newNextActionAt, newNextActionDetails, now)
    if (issues.length > 0) {
      log.warn('Complete action rejected', { issues: issues.map((issue) => issue.field) })
      throw new ValidationFailedError(issues)
    }

    // A malformed id can never match a row; report it like any other miss.
    if (!isOpportunityId(opportunityId)) {
      log.warn('Opportunity not found or access denied')
      throw new NotFoundError()
    }

    let completed: CompletedAction | null
    try {
      completed = await this.store.completeAction(tenantId, opportunityId, {
        nextActionAt: newNextActionAt,
        nextActionDetails: newNextActionDetails,
        completedAt: now,
      })
    } catch (error) {
      throw this.persistenceFailure(log, 'Failed to complete action', error)
    }

    if (!completed) {
      log.warn('Opportunity not found or access denied')
      throw new NotFoundError()
    }

    log.info('Action completed', { nextActionAt: newNextActionAt, updatedAt: completed.updatedAt })
    return completed
  }

  private persistenceFailure(log: Logger, message: string, error: unknown): LedgerError {
    if (error instanceof LedgerError) return error
    log.error(message, {
      error: error instanceof Error ? error.message : String(error),
      errorType: error instanceof Error ? error.name : typeof error,
    })
    return new PersistenceFailureError(message, error)
  }
}
