import { describe, expect, it } from 'vitest'
import {
  addCalendarMonthsKeepingDay,
  daysBetween,
  isSuccessorDue,
  listTrailingMonths,
  nextDueDate,
  toCycleKey,
  toIsoDate,
  toMonthLabel,
  toMonthlyEquivalent,
  toRecurrencePattern,
} from './billMath'

const isoOrNull = (date: Date | null) => (date ? toIsoDate(date) : null)

describe('billMath', () => {
  it('steps monthly bills to the same day of the next month', () => {
    expect(isoOrNull(nextDueDate('2024-01-28', 'monthly'))).toBe('2024-02-28')
  })

  it('clamps month-end paid dates to the end of shorter months', () => {
    expect(isoOrNull(nextDueDate('2024-01-31', 'monthly'))).toBe('2024-02-29')
    expect(isoOrNull(nextDueDate('2023-01-31', 'monthly'))).toBe('2023-02-28')
    expect(isoOrNull(nextDueDate('2024-02-29', 'yearly'))).toBe('2025-02-28')
  })

  it('steps weekly bills by seven days across a month boundary', () => {
    expect(isoOrNull(nextDueDate('2024-02-26', 'weekly'))).toBe('2024-03-04')
  })

  it('has no next due date for non-recurring patterns or malformed dates', () => {
    expect(nextDueDate('2024-01-28', 'none')).toBeNull()
    expect(nextDueDate('2024-13-01', 'monthly')).toBeNull()
    expect(nextDueDate('28/01/2024', 'monthly')).toBeNull()
  })

  it('treats unknown stored patterns as no recurrence', () => {
    expect(toRecurrencePattern('fortnightly')).toBe('none')
    expect(toRecurrencePattern(null)).toBe('none')
    expect(toRecurrencePattern('yearly')).toBe('yearly')
  })

  it('flags a successor as due within the five day lead window', () => {
    expect(isSuccessorDue('2024-01-28', 'monthly', new Date(2024, 1, 24))).toBe(true)
    expect(isSuccessorDue('2024-01-28', 'monthly', new Date(2024, 1, 23))).toBe(true)
    expect(isSuccessorDue('2024-01-28', 'monthly', new Date(2024, 1, 22))).toBe(false)
  })

  it('flags overdue successors as due', () => {
    expect(isSuccessorDue('2023-06-01', 'yearly', new Date(2024, 5, 20))).toBe(true)
  })

  it('never flags bills without a paid date or pattern', () => {
    expect(isSuccessorDue(null, 'monthly', new Date(2024, 1, 24))).toBe(false)
    expect(isSuccessorDue('2024-01-28', 'none', new Date(2024, 1, 24))).toBe(false)
  })

  it('counts whole calendar days across daylight saving changes', () => {
    expect(daysBetween(new Date(2024, 2, 9, 23, 30), new Date(2024, 2, 11, 0, 15))).toBe(2)
    expect(daysBetween(new Date(2024, 1, 28), new Date(2024, 1, 24))).toBe(-4)
  })

  it('converts recurring amounts to monthly equivalents', () => {
    expect(toMonthlyEquivalent(10, 'weekly')).toBe(40)
    expect(toMonthlyEquivalent(120, 'yearly')).toBe(10)
    expect(toMonthlyEquivalent(15, 'monthly')).toBe(15)
    expect(toMonthlyEquivalent(15, 'none')).toBe(15)
  })

  it('keeps the same day when adding calendar months where possible', () => {
    const moved = addCalendarMonthsKeepingDay(new Date(2026, 0, 31), 1)
    expect(moved.getDate()).toBe(28)
  })

  it('lists trailing months oldest first, across a year boundary', () => {
    const months = listTrailingMonths(3, new Date(2024, 0, 15))
    expect(months.map(toCycleKey)).toEqual(['2023-11', '2023-12', '2024-01'])
  })

  it('labels months with a short month name and year', () => {
    expect(toMonthLabel(new Date(2024, 0, 1))).toBe('Jan 2024')
  })
})
