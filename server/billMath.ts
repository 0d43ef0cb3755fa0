export const recurrencePatterns = ['weekly', 'monthly', 'yearly', 'none'] as const

export type RecurrencePattern = (typeof recurrencePatterns)[number]

export const DEFAULT_BILL_CATEGORY = 'Other'

// Successors are spawned once the next due date is this close.
export const RECURRENCE_LEAD_DAYS = 5

export const roundCurrency = (value: number) => Math.round(value * 100) / 100

export const finiteOrZero = (value: number | undefined | null) =>
  typeof value === 'number' && Number.isFinite(value) ? value : 0

export const toRecurrencePattern = (value: string | null | undefined): RecurrencePattern =>
  value === 'weekly' || value === 'monthly' || value === 'yearly' ? value : 'none'

export const startOfDay = (date: Date) => new Date(date.getFullYear(), date.getMonth(), date.getDate())

const dateWithClampedDay = (year: number, month: number, day: number) => {
  const daysInMonth = new Date(year, month + 1, 0).getDate()
  return new Date(year, month, Math.min(day, daysInMonth))
}

export const addCalendarMonthsKeepingDay = (date: Date, months: number) =>
  dateWithClampedDay(date.getFullYear(), date.getMonth() + months, date.getDate())

export const parseIsoDateValue = (value: string) => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null
  }

  const [yearText, monthText, dayText] = value.split('-')
  const year = Number.parseInt(yearText, 10)
  const month = Number.parseInt(monthText, 10)
  const day = Number.parseInt(dayText, 10)

  if (!Number.isFinite(year) || !Number.isFinite(month) || !Number.isFinite(day)) {
    return null
  }

  const parsed = new Date(year, month - 1, day)
  if (
    parsed.getFullYear() !== year ||
    parsed.getMonth() !== month - 1 ||
    parsed.getDate() !== day
  ) {
    return null
  }

  return parsed
}

export const isValidIsoDate = (value: string) => parseIsoDateValue(value) !== null

export const toIsoDate = (date: Date) =>
  `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`

export const toCycleKey = (date: Date) => `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}`

export const daysBetween = (from: Date, to: Date) =>
  Math.round((startOfDay(to).getTime() - startOfDay(from).getTime()) / 86400000)

/**
 * Due date of the period after one paid on `paidDate`. Month and year steps keep the
 * day of month, clamped to the last day of shorter months.
 */
export const nextDueDate = (paidDate: string, pattern: RecurrencePattern) => {
  const paid = parseIsoDateValue(paidDate)
  if (!paid) {
    return null
  }

  switch (pattern) {
    case 'weekly': {
      const next = new Date(paid.getTime())
      next.setDate(next.getDate() + 7)
      return next
    }
    case 'monthly':
      return addCalendarMonthsKeepingDay(paid, 1)
    case 'yearly':
      return addCalendarMonthsKeepingDay(paid, 12)
    default:
      return null
  }
}

export const isSuccessorDue = (paidDate: string | null, pattern: RecurrencePattern, now: Date) => {
  if (!paidDate) {
    return false
  }

  const nextDue = nextDueDate(paidDate, pattern)
  if (!nextDue) {
    return false
  }

  return daysBetween(now, nextDue) <= RECURRENCE_LEAD_DAYS
}

export const toMonthlyEquivalent = (amount: number, pattern: RecurrencePattern) => {
  switch (pattern) {
    case 'weekly':
      return amount * 4
    case 'yearly':
      return amount / 12
    default:
      return amount
  }
}

export const listTrailingMonths = (months: number, now: Date) => {
  const result: Date[] = []
  for (let offset = months - 1; offset >= 0; offset -= 1) {
    result.push(new Date(now.getFullYear(), now.getMonth() - offset, 1))
  }
  return result
}

const monthLabelFormatter = new Intl.DateTimeFormat('en-US', { month: 'short', year: 'numeric' })

export const toMonthLabel = (date: Date) => monthLabelFormatter.format(date)
