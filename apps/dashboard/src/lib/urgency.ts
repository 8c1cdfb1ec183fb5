import { differenceInCalendarDays } from 'date-fns'

/**
 * Presentation-only urgency of a due action.
 *
 * - `red`: more than 3 days overdue
 * - `yellow`: 1 to 3 days overdue
 * - `blue`: due today (or, degenerately, later)
 */
export type UrgencyTier = 'red' | 'yellow' | 'blue'

/** Whole calendar days between the action's day and today, local time. */
export function daysOverdue(nextActionAt: Date, today: Date): number {
  return differenceInCalendarDays(today, nextActionAt)
}

export function classifyUrgency(nextActionAt: Date, today: Date): UrgencyTier {
  const days = daysOverdue(nextActionAt, today)
  if (days > 3) return 'red'
  if (days >= 1) return 'yellow'
  return 'blue'
}
