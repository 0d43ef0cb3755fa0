import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createTestDatabase, insertBill, insertCategory, insertUser, type TestDatabase } from '../tests/support/database'
import { listBills } from './bills'
import {
  addBudgetCategory,
  getBudgetAnalytics,
  getSpendingHistory,
  listBudgetCategories,
  removeBudgetCategory,
  updateBudgetCategory,
} from './budget'

describe('budget', () => {
  let db: TestDatabase
  let alice: number

  beforeEach(() => {
    db = createTestDatabase()
    alice = insertUser(db.connect, { username: 'alice' })
  })

  afterEach(() => {
    db.cleanup()
  })

  describe('getBudgetAnalytics', () => {
    it('combines paid bills for the month with the monthly cost of open recurring bills', () => {
      insertCategory(db.connect, { name: 'Utilities', monthlyLimit: 200 })
      insertCategory(db.connect, { name: 'Other', monthlyLimit: 0 })
      insertBill(db.connect, { name: 'Electric', amount: 150, addedBy: alice, category: 'Utilities', paidDate: '2024-03-05' })
      insertBill(db.connect, { name: 'Phone', amount: 50, addedBy: alice, category: 'Other', recurrencePattern: 'monthly' })

      const analytics = getBudgetAnalytics(db.connect, { year: 2024, month: 3 })

      expect(analytics.period).toBe('2024-03')
      expect(analytics.categories).toEqual([
        {
          id: expect.any(Number),
          name: 'Other',
          color: '#6c757d',
          paidSpent: 0,
          recurringSpent: 50,
          spent: 50,
          monthlyLimit: 0,
          remaining: -50,
          percentUsed: 0,
          isOverBudget: false,
        },
        {
          id: expect.any(Number),
          name: 'Utilities',
          color: '#6c757d',
          paidSpent: 150,
          recurringSpent: 0,
          spent: 150,
          monthlyLimit: 200,
          remaining: 50,
          percentUsed: 75,
          isOverBudget: false,
        },
      ])
      expect(analytics.totalSpent).toBe(200)
      expect(analytics.totalBudget).toBe(200)
      expect(analytics.remaining).toBe(0)
    })

    it('only counts bills paid in the requested month', () => {
      insertCategory(db.connect, { name: 'Utilities', monthlyLimit: 200 })
      insertBill(db.connect, { name: 'Electric', amount: 99, addedBy: alice, category: 'Utilities', paidDate: '2024-02-27' })
      insertBill(db.connect, { name: 'Electric', amount: 80, addedBy: alice, category: 'Utilities', paidDate: '2024-03-31' })

      expect(getBudgetAnalytics(db.connect, { year: 2024, month: 3 }).categories[0]?.paidSpent).toBe(80)
      expect(getBudgetAnalytics(db.connect, { year: 2024, month: 2 }).categories[0]?.paidSpent).toBe(99)
    })

    it('converts weekly and yearly recurring bills to a monthly amount', () => {
      insertCategory(db.connect, { name: 'Subscriptions', monthlyLimit: 100 })
      insertBill(db.connect, { name: 'Meal kit', amount: 10, addedBy: alice, category: 'Subscriptions', recurrencePattern: 'weekly' })
      insertBill(db.connect, { name: 'Cloud storage', amount: 120, addedBy: alice, category: 'Subscriptions', recurrencePattern: 'yearly' })

      const [subscriptions] = getBudgetAnalytics(db.connect, { year: 2024, month: 3 }).categories

      expect(subscriptions).toMatchObject({ recurringSpent: 50, spent: 50, remaining: 50, percentUsed: 50 })
    })

    it('flags categories that exceed their limit', () => {
      insertCategory(db.connect, { name: 'Groceries', monthlyLimit: 100 })
      insertBill(db.connect, { name: 'Market', amount: 125, addedBy: alice, category: 'Groceries', paidDate: '2024-03-09' })

      expect(getBudgetAnalytics(db.connect, { year: 2024, month: 3 }).categories[0]).toMatchObject({
        remaining: -25,
        percentUsed: 125,
        isOverBudget: true,
      })
    })

    it('treats a missing limit as zero', () => {
      insertCategory(db.connect, { name: 'Travel', monthlyLimit: null })
      insertBill(db.connect, { name: 'Train', amount: 20, addedBy: alice, category: 'Travel', paidDate: '2024-03-09' })

      expect(getBudgetAnalytics(db.connect, { year: 2024, month: 3 }).categories[0]).toMatchObject({
        monthlyLimit: 0,
        percentUsed: 0,
        isOverBudget: false,
      })
    })

    it('leaves bills in unconfigured categories out of the totals', () => {
      insertCategory(db.connect, { name: 'Utilities', monthlyLimit: 200 })
      insertBill(db.connect, { name: 'Flowers', amount: 35, addedBy: alice, category: 'Misc', paidDate: '2024-03-02' })

      const analytics = getBudgetAnalytics(db.connect, { year: 2024, month: 3 })

      expect(analytics.categories.map((category) => category.name)).toEqual(['Utilities'])
      expect(analytics.totalSpent).toBe(0)
    })

    it('defaults to the current month', () => {
      expect(getBudgetAnalytics(db.connect, { now: new Date(2024, 2, 15) }).period).toBe('2024-03')
    })

    it('rejects months outside the calendar', () => {
      expect(() => getBudgetAnalytics(db.connect, { year: 2024, month: 13 })).toThrow(
        'Month must be an integer between 1 and 12.',
      )
    })
  })

  describe('getSpendingHistory', () => {
    it('lists trailing months oldest first with recurring costs in every month', () => {
      insertBill(db.connect, { name: 'Boiler', amount: 100, addedBy: alice, paidDate: '2024-01-10' })
      insertBill(db.connect, { name: 'Water', amount: 40.25, addedBy: alice, paidDate: '2024-03-02' })
      insertBill(db.connect, { name: 'Gifts', amount: 10, addedBy: alice, paidDate: '2023-12-31' })
      insertBill(db.connect, { name: 'Phone', amount: 50, addedBy: alice, recurrencePattern: 'monthly' })
      insertBill(db.connect, { name: 'Cleaner', amount: 5, addedBy: alice, recurrencePattern: 'weekly' })

      const history = getSpendingHistory(db.connect, { months: 3, now: new Date(2024, 2, 15) })

      expect(history).toEqual([
        { period: '2024-01', label: 'Jan 2024', paidTotal: 100, recurringTotal: 70, total: 170 },
        { period: '2024-02', label: 'Feb 2024', paidTotal: 0, recurringTotal: 70, total: 70 },
        { period: '2024-03', label: 'Mar 2024', paidTotal: 40.25, recurringTotal: 70, total: 110.25 },
      ])
    })

    it('covers six months by default', () => {
      const history = getSpendingHistory(db.connect, { now: new Date(2024, 2, 15) })

      expect(history.map((entry) => entry.period)).toEqual([
        '2023-10',
        '2023-11',
        '2023-12',
        '2024-01',
        '2024-02',
        '2024-03',
      ])
    })

    it('rejects an empty window', () => {
      expect(() => getSpendingHistory(db.connect, { months: 0 })).toThrow('Months must be an integer between 1 and 120.')
    })
  })

  describe('categories', () => {
    it('adds categories with the default color and lists them by name', () => {
      addBudgetCategory(db.connect, { name: 'Utilities', monthlyLimit: 250 })
      const result = addBudgetCategory(db.connect, { name: ' Groceries ', monthlyLimit: null, color: '#22c55e' })

      expect(result).toMatchObject({ status: 'created', category: { name: 'Groceries', monthlyLimit: null, color: '#22c55e' } })
      expect(listBudgetCategories(db.connect).map((category) => [category.name, category.color])).toEqual([
        ['Groceries', '#22c55e'],
        ['Utilities', '#6c757d'],
      ])
    })

    it('reports duplicate names', () => {
      addBudgetCategory(db.connect, { name: 'Utilities' })

      expect(addBudgetCategory(db.connect, { name: 'Utilities' })).toEqual({ status: 'duplicate' })
    })

    it('validates limits and colors', () => {
      expect(() => addBudgetCategory(db.connect, { name: 'Fun', monthlyLimit: -5 })).toThrow(
        'Monthly limit cannot be negative.',
      )
      expect(() => addBudgetCategory(db.connect, { name: 'Fun', color: 'teal' })).toThrow(
        'Category color must be a hex color like #4f46e5.',
      )
    })

    it('renames the category on every bill that used it', () => {
      const id = insertCategory(db.connect, { name: 'Power', monthlyLimit: 100 })
      insertBill(db.connect, { name: 'Electric', amount: 80, addedBy: alice, category: 'Power' })
      insertBill(db.connect, { name: 'Solar lease', amount: 45, addedBy: alice, category: 'Power', paidDate: '2024-03-01' })
      insertBill(db.connect, { name: 'Water', amount: 30, addedBy: alice, category: 'Water' })

      const result = updateBudgetCategory(db.connect, { id, name: 'Energy', monthlyLimit: 150 })

      expect(result).toMatchObject({ status: 'updated', renamedBills: 2, category: { name: 'Energy', monthlyLimit: 150 } })
      expect(listBills(db.connect).map((bill) => bill.category).sort()).toEqual(['Energy', 'Energy', 'Water'])
    })

    it('keeps bills untouched when only the limit changes', () => {
      const id = insertCategory(db.connect, { name: 'Power', monthlyLimit: 100 })
      insertBill(db.connect, { name: 'Electric', amount: 80, addedBy: alice, category: 'Power' })

      expect(updateBudgetCategory(db.connect, { id, name: 'Power', monthlyLimit: 120 })).toMatchObject({
        status: 'updated',
        renamedBills: 0,
      })
    })

    it('keeps the stored limit and color when a rename omits them', () => {
      const id = insertCategory(db.connect, { name: 'Power', monthlyLimit: 100, color: '#f59e0b' })

      expect(updateBudgetCategory(db.connect, { id, name: 'Energy' })).toMatchObject({
        status: 'updated',
        category: { name: 'Energy', monthlyLimit: 100, color: '#f59e0b' },
      })
    })

    it('clears the limit when null is sent explicitly', () => {
      const id = insertCategory(db.connect, { name: 'Power', monthlyLimit: 100 })

      expect(updateBudgetCategory(db.connect, { id, name: 'Power', monthlyLimit: null })).toMatchObject({
        category: { monthlyLimit: null },
      })
    })

    it('refuses to rename onto another category', () => {
      const id = insertCategory(db.connect, { name: 'Power', monthlyLimit: 100 })
      insertCategory(db.connect, { name: 'Water', monthlyLimit: 50 })

      expect(updateBudgetCategory(db.connect, { id, name: 'Water' })).toEqual({ status: 'duplicate' })
    })

    it('reports unknown categories on update', () => {
      expect(updateBudgetCategory(db.connect, { id: 77, name: 'Anything' })).toEqual({ status: 'not_found' })
    })

    it('removes a category without rewriting bills', () => {
      const id = insertCategory(db.connect, { name: 'Power', monthlyLimit: 100 })
      insertBill(db.connect, { name: 'Electric', amount: 80, addedBy: alice, category: 'Power' })

      expect(removeBudgetCategory(db.connect, id)).toBe(true)
      expect(removeBudgetCategory(db.connect, id)).toBe(false)
      expect(listBills(db.connect)[0]?.category).toBe('Power')
    })
  })
})
