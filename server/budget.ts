import { z } from 'zod'
import {
  DEFAULT_BILL_CATEGORY,
  finiteOrZero,
  listTrailingMonths,
  roundCurrency,
  toCycleKey,
  toMonthLabel,
  toMonthlyEquivalent,
  toRecurrencePattern,
} from './billMath'
import { withConnection, type Connection, type ConnectionFactory } from './db'
import { logger } from './lib/logger'
import {
  validateHexColor,
  validateNonNegative,
  validatePositiveInteger,
  validateRequiredText,
} from './lib/validation'
import { budgetCategoryRowSchema, parseRow, parseRows, type BudgetCategory } from './models'

export const DEFAULT_CATEGORY_COLOR = '#6c757d'
export const DEFAULT_HISTORY_MONTHS = 6

export type CategoryBudgetStatus = {
  id: number
  name: string
  color: string
  paidSpent: number
  recurringSpent: number
  spent: number
  monthlyLimit: number
  remaining: number
  percentUsed: number
  isOverBudget: boolean
}

export type BudgetAnalytics = {
  period: string
  categories: CategoryBudgetStatus[]
  totalSpent: number
  totalBudget: number
  remaining: number
}

export type SpendingHistoryEntry = {
  period: string
  label: string
  paidTotal: number
  recurringTotal: number
  total: number
}

export type AddCategoryResult = { status: 'created'; category: BudgetCategory } | { status: 'duplicate' }

export type UpdateCategoryResult =
  | { status: 'updated'; category: BudgetCategory; renamedBills: number }
  | { status: 'not_found' }
  | { status: 'duplicate' }

const categoryTotalRowSchema = z.object({
  category: z.string().nullable(),
  total: z.number().nullable(),
})

const recurringBillRowSchema = z.object({
  category: z.string().nullable(),
  amount: z.number(),
  recurrence_pattern: z.string().nullable(),
})

const totalRowSchema = z.object({ total: z.number().nullable() })

const findCategory = (conn: Connection, id: number) =>
  parseRow(budgetCategoryRowSchema, conn.prepare('SELECT * FROM budget_categories WHERE id = ?').get(id))

const findCategoryByName = (conn: Connection, name: string) =>
  parseRow(budgetCategoryRowSchema, conn.prepare('SELECT * FROM budget_categories WHERE name = ?').get(name))

const sanitizeCategoryInput = (input: { name: string; monthlyLimit?: number | null; color?: string }) => {
  validateRequiredText(input.name, 'Category name')
  if (input.monthlyLimit !== undefined && input.monthlyLimit !== null) {
    validateNonNegative(input.monthlyLimit, 'Monthly limit')
  }
  const color = input.color?.trim() || DEFAULT_CATEGORY_COLOR
  validateHexColor(color, 'Category color')

  return {
    name: input.name.trim(),
    monthlyLimit:
      input.monthlyLimit === undefined || input.monthlyLimit === null ? null : roundCurrency(input.monthlyLimit),
    color,
  }
}

export const listBudgetCategories = (connect: ConnectionFactory): BudgetCategory[] =>
  withConnection(connect, (conn) =>
    parseRows(budgetCategoryRowSchema, conn.prepare('SELECT * FROM budget_categories ORDER BY name ASC').all()),
  )

export const addBudgetCategory = (
  connect: ConnectionFactory,
  input: { name: string; monthlyLimit?: number | null; color?: string },
): AddCategoryResult => {
  const next = sanitizeCategoryInput(input)

  return withConnection(connect, (conn) =>
    conn.transaction((): AddCategoryResult => {
      if (findCategoryByName(conn, next.name)) {
        return { status: 'duplicate' }
      }

      const result = conn
        .prepare('INSERT INTO budget_categories (name, monthly_limit, color) VALUES (?, ?, ?)')
        .run(next.name, next.monthlyLimit, next.color)
      const category = findCategory(conn, Number(result.lastInsertRowid))
      if (!category) {
        throw new Error('Budget category could not be read back after insert.')
      }

      return { status: 'created', category }
    })(),
  )
}

/**
 * Updates a category. Omitted limit and color keep their stored values; an explicit null
 * limit clears it. A rename rewrites the category text of every bill that used the old
 * name, in the same transaction.
 */
export const updateBudgetCategory = (
  connect: ConnectionFactory,
  input: { id: number; name: string; monthlyLimit?: number | null; color?: string },
): UpdateCategoryResult => {
  validateRequiredText(input.name, 'Category name')

  return withConnection(connect, (conn) =>
    conn.transaction((): UpdateCategoryResult => {
      const existing = findCategory(conn, input.id)
      if (!existing) {
        return { status: 'not_found' }
      }

      const next = sanitizeCategoryInput({
        name: input.name,
        monthlyLimit: input.monthlyLimit === undefined ? existing.monthlyLimit : input.monthlyLimit,
        color: input.color ?? existing.color,
      })

      const clash = findCategoryByName(conn, next.name)
      if (clash && clash.id !== existing.id) {
        return { status: 'duplicate' }
      }

      conn
        .prepare('UPDATE budget_categories SET name = ?, monthly_limit = ?, color = ? WHERE id = ?')
        .run(next.name, next.monthlyLimit, next.color, existing.id)

      let renamedBills = 0
      if (existing.name !== next.name) {
        renamedBills = conn.prepare('UPDATE bills SET category = ? WHERE category = ?').run(next.name, existing.name).changes
        logger.info(`Renamed budget category ${existing.name} to ${next.name} (${renamedBills} bills updated)`)
      }

      const category = findCategory(conn, existing.id)
      if (!category) {
        throw new Error('Budget category could not be read back after update.')
      }

      return { status: 'updated', category, renamedBills }
    })(),
  )
}

export const removeBudgetCategory = (connect: ConnectionFactory, id: number) =>
  withConnection(connect, (conn) => conn.prepare('DELETE FROM budget_categories WHERE id = ?').run(id).changes > 0)

/**
 * Monthly-equivalent of every unpaid recurring bill, keyed by category. These count as an
 * ongoing obligation in every month, whichever month is being viewed.
 */
const loadRecurringMonthlyByCategory = (conn: Connection) => {
  const rows = parseRows(
    recurringBillRowSchema,
    conn
      .prepare(
        `SELECT category, amount, recurrence_pattern
         FROM bills
         WHERE is_paid = 0
         AND is_recurring = 1`,
      )
      .all(),
  )

  const byCategory = new Map<string, number>()
  for (const row of rows) {
    const category = row.category ?? DEFAULT_BILL_CATEGORY
    const monthly = toMonthlyEquivalent(row.amount, toRecurrencePattern(row.recurrence_pattern))
    byCategory.set(category, (byCategory.get(category) ?? 0) + monthly)
  }
  return byCategory
}

const resolvePeriod = (args: { year?: number; month?: number; now?: Date }) => {
  const now = args.now ?? new Date()
  const year = args.year ?? now.getFullYear()
  const month = args.month ?? now.getMonth() + 1
  validatePositiveInteger(year, 'Year', 9999)
  validatePositiveInteger(month, 'Month', 12)
  return toCycleKey(new Date(year, month - 1, 1))
}

export const getBudgetAnalytics = (
  connect: ConnectionFactory,
  args: { year?: number; month?: number; now?: Date } = {},
): BudgetAnalytics => {
  const period = resolvePeriod(args)

  return withConnection(connect, (conn) => {
    const paidRows = parseRows(
      categoryTotalRowSchema,
      conn
        .prepare(
          `SELECT category, SUM(amount) AS total
           FROM bills
           WHERE is_paid = 1
           AND strftime('%Y-%m', paid_date) = ?
           GROUP BY category`,
        )
        .all(period),
    )
    const paidByCategory = new Map(paidRows.map((row) => [row.category ?? DEFAULT_BILL_CATEGORY, finiteOrZero(row.total)]))
    const recurringByCategory = loadRecurringMonthlyByCategory(conn)
    const categories = parseRows(
      budgetCategoryRowSchema,
      conn.prepare('SELECT * FROM budget_categories ORDER BY name ASC').all(),
    )

    let totalSpent = 0
    let totalBudget = 0

    const statuses = categories.map((category): CategoryBudgetStatus => {
      const paidSpent = paidByCategory.get(category.name) ?? 0
      const recurringSpent = recurringByCategory.get(category.name) ?? 0
      const spent = paidSpent + recurringSpent
      const monthlyLimit = finiteOrZero(category.monthlyLimit)

      totalSpent += spent
      totalBudget += monthlyLimit

      return {
        id: category.id,
        name: category.name,
        color: category.color,
        paidSpent: roundCurrency(paidSpent),
        recurringSpent: roundCurrency(recurringSpent),
        spent: roundCurrency(spent),
        monthlyLimit: roundCurrency(monthlyLimit),
        remaining: roundCurrency(monthlyLimit - spent),
        percentUsed: monthlyLimit > 0 ? roundCurrency((spent / monthlyLimit) * 100) : 0,
        isOverBudget: monthlyLimit > 0 && spent > monthlyLimit,
      }
    })

    return {
      period,
      categories: statuses,
      totalSpent: roundCurrency(totalSpent),
      totalBudget: roundCurrency(totalBudget),
      remaining: roundCurrency(totalBudget - totalSpent),
    }
  })
}

export const getSpendingHistory = (
  connect: ConnectionFactory,
  args: { months?: number; now?: Date } = {},
): SpendingHistoryEntry[] => {
  const months = args.months ?? DEFAULT_HISTORY_MONTHS
  validatePositiveInteger(months, 'Months', 120)
  const now = args.now ?? new Date()

  return withConnection(connect, (conn) => {
    let recurringTotal = 0
    for (const monthly of loadRecurringMonthlyByCategory(conn).values()) {
      recurringTotal += monthly
    }

    const paidTotalStatement = conn.prepare(
      `SELECT SUM(amount) AS total
       FROM bills
       WHERE is_paid = 1
       AND strftime('%Y-%m', paid_date) = ?`,
    )

    return listTrailingMonths(months, now).map((monthStart) => {
      const period = toCycleKey(monthStart)
      const row = totalRowSchema.parse(paidTotalStatement.get(period))
      const paidTotal = finiteOrZero(row.total)

      return {
        period,
        label: toMonthLabel(monthStart),
        paidTotal: roundCurrency(paidTotal),
        recurringTotal: roundCurrency(recurringTotal),
        total: roundCurrency(paidTotal + recurringTotal),
      }
    })
  })
}
