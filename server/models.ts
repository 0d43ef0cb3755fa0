import { z } from 'zod'
import { DEFAULT_BILL_CATEGORY, toRecurrencePattern } from './billMath'

const sqlBoolean = z.union([z.literal(0), z.literal(1)]).transform((value) => value === 1)

const billColumns = z.object({
  id: z.number().int(),
  bill_name: z.string(),
  amount: z.number(),
  due_day: z.number().int(),
  category: z.string().nullable(),
  is_recurring: sqlBoolean,
  recurrence_pattern: z.string().nullable(),
  is_paid: sqlBoolean,
  paid_date: z.string().nullable(),
  paid_by: z.number().int().nullable(),
  added_by: z.number().int(),
  created_at: z.string(),
})

const toBill = (row: z.output<typeof billColumns>) => ({
  id: row.id,
  name: row.bill_name,
  amount: row.amount,
  dueDay: row.due_day,
  category: row.category ?? DEFAULT_BILL_CATEGORY,
  isRecurring: row.is_recurring,
  recurrencePattern: toRecurrencePattern(row.recurrence_pattern),
  isPaid: row.is_paid,
  paidDate: row.paid_date,
  paidBy: row.paid_by,
  addedBy: row.added_by,
  createdAt: row.created_at,
})

export const billRowSchema = billColumns.transform(toBill)

export type Bill = z.output<typeof billRowSchema>

export const billWithOwnerRowSchema = billColumns
  .extend({ added_by_name: z.string().nullable() })
  .transform((row) => ({ ...toBill(row), addedByName: row.added_by_name }))

export type BillWithOwner = z.output<typeof billWithOwnerRowSchema>

export const billPaymentRowSchema = z
  .object({
    id: z.number().int(),
    bill_id: z.number().int(),
    amount: z.number(),
    payment_date: z.string(),
    paid_by: z.number().int(),
    notes: z.string().nullable(),
    created_at: z.string(),
  })
  .transform((row) => ({
    id: row.id,
    billId: row.bill_id,
    amount: row.amount,
    paymentDate: row.payment_date,
    paidBy: row.paid_by,
    notes: row.notes,
    createdAt: row.created_at,
  }))

export type BillPayment = z.output<typeof billPaymentRowSchema>

export const budgetCategoryRowSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    monthly_limit: z.number().nullable(),
    color: z.string(),
  })
  .transform((row) => ({
    id: row.id,
    name: row.name,
    monthlyLimit: row.monthly_limit,
    color: row.color,
  }))

export type BudgetCategory = z.output<typeof budgetCategoryRowSchema>

export const userRowSchema = z
  .object({
    id: z.number().int(),
    username: z.string(),
    email: z.string(),
    full_name: z.string().nullable(),
    is_admin: sqlBoolean,
    last_login: z.string().nullable(),
    created_at: z.string(),
  })
  .transform((row) => ({
    id: row.id,
    username: row.username,
    email: row.email,
    fullName: row.full_name,
    isAdmin: row.is_admin,
    lastLogin: row.last_login,
    createdAt: row.created_at,
  }))

export type User = z.output<typeof userRowSchema>

export const parseRow = <TSchema extends z.ZodTypeAny>(schema: TSchema, row: unknown): z.output<TSchema> | null =>
  row === undefined ? null : schema.parse(row)

export const parseRows = <TSchema extends z.ZodTypeAny>(schema: TSchema, rows: unknown[]): z.output<TSchema>[] =>
  rows.map((row) => schema.parse(row))
