import {
  DEFAULT_BILL_CATEGORY,
  isSuccessorDue,
  roundCurrency,
  toIsoDate,
  type RecurrencePattern,
} from './billMath'
import { toSqlBoolean, withConnection, type Connection, type ConnectionFactory } from './db'
import { canManageRecord } from './lib/authz'
import { captureException } from './lib/diagnostics'
import { logger } from './lib/logger'
import {
  ValidationError,
  validateDayOfMonth,
  validateIsoDate,
  validateNonNegative,
  validateOptionalText,
  validateRequiredText,
} from './lib/validation'
import {
  billPaymentRowSchema,
  billRowSchema,
  billWithOwnerRowSchema,
  parseRow,
  parseRows,
  type Bill,
  type BillPayment,
  type BillWithOwner,
} from './models'

export type RecurrenceRunResult = {
  processed: number
  created: number
}

export type RemoveBillResult =
  | { status: 'removed'; removedPayments: number }
  | { status: 'not_found' }
  | { status: 'forbidden' }

const findBill = (conn: Connection, billId: number) =>
  parseRow(billRowSchema, conn.prepare('SELECT * FROM bills WHERE id = ?').get(billId))

export const getBill = (connect: ConnectionFactory, billId: number): Bill | null =>
  withConnection(connect, (conn) => findBill(conn, billId))

export const listBills = (connect: ConnectionFactory): BillWithOwner[] =>
  withConnection(connect, (conn) =>
    parseRows(
      billWithOwnerRowSchema,
      conn
        .prepare(
          `SELECT b.*, u.username AS added_by_name
           FROM bills b
           LEFT JOIN users u ON b.added_by = u.id
           ORDER BY b.due_day ASC, b.created_at DESC, b.id DESC`,
        )
        .all(),
    ),
  )

export const listBillPayments = (connect: ConnectionFactory, billId: number): BillPayment[] =>
  withConnection(connect, (conn) =>
    parseRows(
      billPaymentRowSchema,
      conn
        .prepare('SELECT * FROM bill_payments WHERE bill_id = ? ORDER BY payment_date DESC, id DESC')
        .all(billId),
    ),
  )

const sanitizeRecurrence = (isRecurring: boolean, pattern: RecurrencePattern | undefined) => {
  if (!isRecurring) {
    return { isRecurring: false, recurrencePattern: 'none' as const }
  }
  if (!pattern || pattern === 'none') {
    throw new ValidationError('Recurring bills need a weekly, monthly or yearly pattern.')
  }
  return { isRecurring: true, recurrencePattern: pattern }
}

export const addBill = (
  connect: ConnectionFactory,
  args: {
    userId: number
    name: string
    amount: number
    dueDay: number
    category?: string
    isRecurring?: boolean
    recurrencePattern?: RecurrencePattern
  },
): Bill => {
  validateRequiredText(args.name, 'Bill name')
  validateNonNegative(args.amount, 'Amount')
  validateDayOfMonth(args.dueDay, 'Due day')
  validateOptionalText(args.category, 'Category', 60)

  const recurrence = sanitizeRecurrence(args.isRecurring ?? false, args.recurrencePattern)
  const category = args.category?.trim() || DEFAULT_BILL_CATEGORY

  return withConnection(connect, (conn) => {
    const result = conn
      .prepare(
        `INSERT INTO bills (bill_name, amount, due_day, category, is_recurring, recurrence_pattern, is_paid, added_by)
         VALUES (?, ?, ?, ?, ?, ?, 0, ?)`,
      )
      .run(
        args.name.trim(),
        roundCurrency(args.amount),
        args.dueDay,
        category,
        toSqlBoolean(recurrence.isRecurring),
        recurrence.recurrencePattern,
        args.userId,
      )

    const created = findBill(conn, Number(result.lastInsertRowid))
    if (!created) {
      throw new Error('Bill record could not be read back after insert.')
    }
    return created
  })
}

export const removeBill = (
  connect: ConnectionFactory,
  args: { billId: number; user: { id: number; isAdmin: boolean } },
): RemoveBillResult =>
  withConnection(connect, (conn) =>
    conn.transaction((): RemoveBillResult => {
      const existing = findBill(conn, args.billId)
      if (!existing) {
        return { status: 'not_found' }
      }
      if (!canManageRecord(existing, args.user)) {
        return { status: 'forbidden' }
      }

      const payments = conn.prepare('DELETE FROM bill_payments WHERE bill_id = ?').run(args.billId)
      conn.prepare('DELETE FROM bills WHERE id = ?').run(args.billId)

      return { status: 'removed', removedPayments: payments.changes }
    })(),
  )

/**
 * Inserts the next unpaid instance of a paid recurring bill unless an unpaid bill with the
 * same name, owner and category already exists. Returns the new id, or null when skipped.
 */
const createNextRecurringBill = (conn: Connection, bill: Bill) => {
  const existing = conn
    .prepare(
      `SELECT id FROM bills
       WHERE bill_name = ?
       AND added_by = ?
       AND is_paid = 0
       AND category = ?`,
    )
    .get(bill.name, bill.addedBy, bill.category)

  if (existing !== undefined) {
    logger.info(`Next bill for ${bill.name} already exists`)
    return null
  }

  const result = conn
    .prepare(
      `INSERT INTO bills (bill_name, amount, due_day, category, is_recurring, recurrence_pattern, is_paid, added_by)
       VALUES (?, ?, ?, ?, 1, ?, 0, ?)`,
    )
    .run(bill.name, bill.amount, bill.dueDay, bill.category, bill.recurrencePattern, bill.addedBy)

  logger.info(`Created next recurring bill: ${bill.name}`)
  return Number(result.lastInsertRowid)
}

export const processRecurringBills = (
  connect: ConnectionFactory,
  options: { now?: Date } = {},
): RecurrenceRunResult => {
  const now = options.now ?? new Date()

  try {
    return withConnection(connect, (conn) => {
      const run = conn.transaction((): RecurrenceRunResult => {
        const bills = parseRows(
          billRowSchema,
          conn
            .prepare(
              `SELECT * FROM bills
               WHERE is_recurring = 1
               AND is_paid = 1
               AND paid_date IS NOT NULL
               ORDER BY id ASC`,
            )
            .all(),
        )

        let created = 0
        for (const bill of bills) {
          if (isSuccessorDue(bill.paidDate, bill.recurrencePattern, now) && createNextRecurringBill(conn, bill) !== null) {
            created += 1
          }
        }

        return { processed: bills.length, created }
      })

      const result = run.immediate()
      logger.info(`Processed ${result.processed} recurring bills`)
      return result
    })
  } catch (error) {
    logger.error('Error processing recurring bills:', error)
    captureException(error)
    return { processed: 0, created: 0 }
  }
}

export const markBillPaid = (
  connect: ConnectionFactory,
  args: {
    billId: number
    userId: number
    paymentDate?: string
    notes?: string
    now?: Date
  },
): boolean => {
  const now = args.now ?? new Date()
  const paymentDate = args.paymentDate ?? toIsoDate(now)
  validateIsoDate(paymentDate, 'Payment date')
  validateOptionalText(args.notes, 'Payment note', 500)
  const notes = args.notes?.trim() || null

  return withConnection(connect, (conn) => {
    const bill = conn.transaction(() => {
      const existing = findBill(conn, args.billId)
      if (!existing) {
        return null
      }

      conn
        .prepare('UPDATE bills SET is_paid = 1, paid_date = ?, paid_by = ? WHERE id = ?')
        .run(paymentDate, args.userId, args.billId)
      conn
        .prepare('INSERT INTO bill_payments (bill_id, amount, payment_date, paid_by, notes) VALUES (?, ?, ?, ?, ?)')
        .run(args.billId, existing.amount, paymentDate, args.userId, notes)

      return existing
    })()

    if (!bill) {
      return false
    }

    logger.info(`Bill ${args.billId} marked as paid by user ${args.userId}`)

    const paidBill: Bill = { ...bill, isPaid: true, paidDate: paymentDate, paidBy: args.userId }
    if (paidBill.isRecurring && isSuccessorDue(paidBill.paidDate, paidBill.recurrencePattern, now)) {
      try {
        conn.transaction(() => createNextRecurringBill(conn, paidBill)).immediate()
      } catch (error) {
        logger.error(`Error creating next recurring bill for bill ${args.billId}:`, error)
        captureException(error)
      }
    }

    return true
  })
}
