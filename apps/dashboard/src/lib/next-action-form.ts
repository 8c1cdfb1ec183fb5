import { addDays, addMonths, addWeeks, isBefore, startOfDay } from 'date-fns'
import { NEXT_ACTION_DETAILS_MAX_LENGTH, NEXT_ACTION_DETAILS_MIN_LENGTH } from '@nat/schema'

export type NextActionDraft = {
  nextActionAt: Date | null
  details: string
}

export type NextActionErrors = {
  date?: string
  details?: string
}

export type QuickPick = '1w' | '2w' | '1m'

/** The form opens on tomorrow. */
export function defaultNextActionDate(now: Date): Date {
  return addDays(now, 1)
}

export function quickPickDate(preset: QuickPick, now: Date): Date {
  switch (preset) {
    case '1w':
      return addWeeks(now, 1)
    case '2w':
      return addWeeks(now, 2)
    case '1m':
      return addMonths(now, 1)
  }
}

/**
 * Client-side mirror of the server's same-day-or-future rule; the server
 * stays authoritative.
 */
export function validateNextActionDraft(draft: NextActionDraft, now: Date): NextActionErrors {
  const errors: NextActionErrors = {}

  if (!draft.nextActionAt) {
    errors.date = 'Please select a date for the next action'
  } else if (isBefore(startOfDay(draft.nextActionAt), startOfDay(now))) {
    errors.date = 'Next action date must be today or in the future'
  }

  const details = draft.details.trim()
  if (!details) {
    errors.details = 'Please describe the next action'
  } else if (details.length < NEXT_ACTION_DETAILS_MIN_LENGTH) {
    errors.details = `Action description must be at least ${NEXT_ACTION_DETAILS_MIN_LENGTH} characters`
  } else if (details.length > NEXT_ACTION_DETAILS_MAX_LENGTH) {
    errors.details = `Action description must be at most ${NEXT_ACTION_DETAILS_MAX_LENGTH} characters`
  }

  return errors
}

export function hasErrors(errors: NextActionErrors): boolean {
  return Object.keys(errors).length > 0
}
