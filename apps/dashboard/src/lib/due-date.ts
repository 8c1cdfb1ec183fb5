import { format, isSameDay } from 'date-fns'

const DAY_MS = 24 * 60 * 60 * 1000

export type DueDateLabel = {
  text: string
  isOverdue: boolean
}

/**
 * Card label for a due date. Overdue days count elapsed 24-hour periods, so
 * an action from late yesterday can read "0 days overdue".
 */
export function describeDueDate(nextActionAt: Date, now: Date): DueDateLabel {
  if (isSameDay(nextActionAt, now)) {
    return { text: 'Due today', isOverdue: false }
  }

  if (nextActionAt.getTime() < now.getTime()) {
    const days = Math.floor((now.getTime() - nextActionAt.getTime()) / DAY_MS)
    return { text: `${days} day${days === 1 ? '' : 's'} overdue`, isOverdue: true }
  }

  return { text: format(nextActionAt, 'MMM d, yyyy'), isOverdue: false }
}

const currencyFormat = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
})

export function formatDealValue(value: number | null): string {
  return value === null ? 'No value set' : currencyFormat.format(value)
}
