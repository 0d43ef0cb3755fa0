import { Hono, type Context } from 'hono'
import { deleteCookie, getSignedCookie, setSignedCookie } from 'hono/cookie'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import { z } from 'zod'
import { recurrencePatterns } from './billMath'
import {
  addBill,
  getBill,
  listBillPayments,
  listBills,
  markBillPaid,
  processRecurringBills,
  removeBill,
} from './bills'
import {
  addBudgetCategory,
  getBudgetAnalytics,
  getSpendingHistory,
  listBudgetCategories,
  removeBudgetCategory,
  updateBudgetCategory,
} from './budget'
import type { AppConfig } from './config'
import type { ConnectionFactory } from './db'
import {
  hasAccessControl,
  isUserAuthorized,
  requireAdmin,
  requireFeature,
  requireIdentity,
  type AppEnv,
} from './lib/authz'
import { captureException } from './lib/diagnostics'
import { logger } from './lib/logger'
import { createMoneyFormatter, currencySymbol } from './lib/money'
import { ValidationError } from './lib/validation'
import {
  features,
  getUser,
  getUserFeatures,
  listUsersWithFeatures,
  setUserFeatureVisibility,
  upsertLocalUser,
} from './users'

export const SESSION_COOKIE = 'homie_session'
const SESSION_MAX_AGE_SECONDS = 60 * 60 * 24 * 30

const idParamSchema = z.coerce.number().int().positive()

const localLoginBodySchema = z.object({
  username: z.string().trim().min(1, 'Invalid user selection'),
})

const addBillBodySchema = z.object({
  name: z.string(),
  amount: z.coerce.number(),
  dueDay: z.coerce.number(),
  category: z.string().optional(),
  isRecurring: z.boolean().optional(),
  recurrencePattern: z.enum(recurrencePatterns).optional(),
})

const payBillBodySchema = z.object({
  paymentDate: z.string().optional(),
  notes: z.string().optional(),
})

const categoryBodySchema = z.object({
  name: z.string(),
  monthlyLimit: z.number().nullable().optional(),
  color: z.string().optional(),
})

const analyticsQuerySchema = z.object({
  year: z.coerce.number().int().optional(),
  month: z.coerce.number().int().optional(),
})

const historyQuerySchema = z.object({
  months: z.coerce.number().int().optional(),
})

const featureVisibilityBodySchema = z.object({
  userId: z.number().int().positive(),
  feature: z.enum(features),
  isVisible: z.boolean(),
})

const describeIssues = (error: z.ZodError) => {
  const issue = error.issues[0]
  if (!issue) {
    return 'Invalid request'
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}

const parseWith = <TSchema extends z.ZodTypeAny>(schema: TSchema, payload: unknown): z.output<TSchema> => {
  const result = schema.safeParse(payload)
  if (!result.success) {
    throw new HTTPException(400, { message: describeIssues(result.error) })
  }
  return result.data
}

const readJsonBody = async <TSchema extends z.ZodTypeAny>(c: Context<AppEnv>, schema: TSchema) => {
  const text = await c.req.text()
  let payload: unknown = {}
  if (text.trim().length > 0) {
    try {
      payload = JSON.parse(text)
    } catch {
      throw new HTTPException(400, { message: 'Request body must be valid JSON' })
    }
  }
  return parseWith(schema, payload)
}

const readIdParam = (c: Context<AppEnv>) => {
  const result = idParamSchema.safeParse(c.req.param('id'))
  if (!result.success) {
    throw new HTTPException(400, { message: 'Invalid id' })
  }
  return result.data
}

export const createHttpApp = (deps: { config: AppConfig; connect: ConnectionFactory }) => {
  const { config, connect } = deps
  const formatMoney = createMoneyFormatter(config.display)
  const app = new Hono<AppEnv>()

  if (config.clientOrigin) {
    app.use(
      '*',
      cors({
        origin: config.clientOrigin,
        allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowHeaders: ['Content-Type'],
        credentials: true,
        maxAge: 86400,
      }),
    )
  }

  app.use('*', async (c, next) => {
    const raw = await getSignedCookie(c, config.sessionSecret, SESSION_COOKIE)
    c.set('user', typeof raw === 'string' && /^\d+$/.test(raw) ? getUser(connect, Number(raw)) : null)
    await next()
  })

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({ error: error.message }, error.status)
    }
    if (error instanceof ValidationError) {
      return c.json({ error: error.message }, 400)
    }
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, error)
    captureException(error)
    return c.json({ error: 'Internal server error' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  app.get('/health', (c) => c.json({ ok: true, serverTime: Date.now() }))

  // Authentication

  app.get('/auth/local-users', (c) =>
    c.json({
      users: config.localUsers.map((user) => ({
        username: user.username,
        fullName: user.fullName ?? user.username,
      })),
    }),
  )

  app.post('/auth/local-login', async (c) => {
    const body = await readJsonBody(c, localLoginBodySchema)
    const localUser = config.localUsers.find((user) => user.username === body.username)
    if (!localUser) {
      throw new HTTPException(404, { message: 'User not found' })
    }

    if (hasAccessControl(config.accessControl) && !isUserAuthorized(localUser, config.accessControl)) {
      throw new HTTPException(403, { message: 'You are not authorized to access this application' })
    }

    const user = upsertLocalUser(connect, localUser, config.accessControl)
    await setSignedCookie(c, SESSION_COOKIE, String(user.id), config.sessionSecret, {
      path: '/',
      httpOnly: true,
      sameSite: 'Lax',
      secure: config.environment === 'production',
      maxAge: SESSION_MAX_AGE_SECONDS,
    })

    logger.info(`Local user logged in: ${user.email}`)
    return c.json({ user })
  })

  app.post('/auth/logout', (c) => {
    deleteCookie(c, SESSION_COOKIE, { path: '/' })
    return c.json({ success: true })
  })

  app.get('/api/me', (c) => {
    const user = requireIdentity(c)
    return c.json({ user, features: getUserFeatures(connect, user.id) })
  })

  app.get('/api/display', (c) => {
    requireIdentity(c)
    return c.json({
      currency: config.display.currency,
      locale: config.display.locale,
      symbol: currencySymbol(config.display),
    })
  })

  // Bills

  app.get('/api/bills', (c) => {
    requireFeature(c, connect, 'bills')
    processRecurringBills(connect)
    return c.json({ bills: listBills(connect) })
  })

  app.post('/api/bills', async (c) => {
    const user = requireFeature(c, connect, 'bills')
    const body = await readJsonBody(c, addBillBodySchema)
    const bill = addBill(connect, { ...body, userId: user.id })

    logger.info(`User ${user.id} added bill: ${bill.name} - ${formatMoney(bill.amount)}`)
    return c.json({ success: true, bill }, 201)
  })

  app.delete('/api/bills/:id', (c) => {
    const user = requireFeature(c, connect, 'bills')
    const billId = readIdParam(c)
    const result = removeBill(connect, { billId, user })

    if (result.status === 'not_found') {
      throw new HTTPException(404, { message: 'Bill not found' })
    }
    if (result.status === 'forbidden') {
      throw new HTTPException(403, { message: 'Unauthorized' })
    }

    logger.info(`User ${user.id} deleted bill ${billId} (${result.removedPayments} payment records removed)`)
    return c.json({ success: true })
  })

  app.post('/api/bills/:id/pay', async (c) => {
    const user = requireFeature(c, connect, 'bills')
    const billId = readIdParam(c)
    const body = await readJsonBody(c, payBillBodySchema)

    const existing = getBill(connect, billId)
    if (!existing) {
      throw new HTTPException(404, { message: 'Bill not found' })
    }
    if (existing.isPaid) {
      throw new HTTPException(409, { message: 'Bill is already paid' })
    }

    if (!markBillPaid(connect, { billId, userId: user.id, paymentDate: body.paymentDate, notes: body.notes })) {
      throw new HTTPException(404, { message: 'Bill not found' })
    }

    return c.json({ success: true, bill: getBill(connect, billId) })
  })

  app.get('/api/bills/:id/payments', (c) => {
    requireFeature(c, connect, 'bills')
    const billId = readIdParam(c)
    if (!getBill(connect, billId)) {
      throw new HTTPException(404, { message: 'Bill not found' })
    }
    return c.json({ payments: listBillPayments(connect, billId) })
  })

  // Budget

  app.get('/api/budget/analytics', (c) => {
    requireFeature(c, connect, 'budget')
    const query = parseWith(analyticsQuerySchema, c.req.query())
    return c.json(getBudgetAnalytics(connect, query))
  })

  app.get('/api/budget/history', (c) => {
    requireFeature(c, connect, 'budget')
    const query = parseWith(historyQuerySchema, c.req.query())
    return c.json({ history: getSpendingHistory(connect, query) })
  })

  app.get('/api/budget/categories', (c) => {
    requireFeature(c, connect, 'budget')
    return c.json({ categories: listBudgetCategories(connect) })
  })

  app.post('/api/budget/categories', async (c) => {
    requireFeature(c, connect, 'budget')
    const body = await readJsonBody(c, categoryBodySchema)
    const result = addBudgetCategory(connect, body)
    if (result.status === 'duplicate') {
      throw new HTTPException(409, { message: 'A category with that name already exists' })
    }
    return c.json({ category: result.category }, 201)
  })

  app.put('/api/budget/categories/:id', async (c) => {
    requireAdmin(c)
    const id = readIdParam(c)
    const body = await readJsonBody(c, categoryBodySchema)
    const result = updateBudgetCategory(connect, { ...body, id })
    if (result.status === 'not_found') {
      throw new HTTPException(404, { message: 'Category not found' })
    }
    if (result.status === 'duplicate') {
      throw new HTTPException(409, { message: 'A category with that name already exists' })
    }
    return c.json({ category: result.category, renamedBills: result.renamedBills })
  })

  app.delete('/api/budget/categories/:id', (c) => {
    requireAdmin(c)
    const id = readIdParam(c)
    if (!removeBudgetCategory(connect, id)) {
      throw new HTTPException(404, { message: 'Category not found' })
    }
    return c.json({ success: true })
  })

  // Admin

  app.get('/admin/api/users', (c) => {
    requireAdmin(c)
    return c.json({ users: listUsersWithFeatures(connect) })
  })

  app.post('/admin/api/feature-visibility', async (c) => {
    const admin = requireAdmin(c)
    const body = await readJsonBody(c, featureVisibilityBodySchema)
    if (!setUserFeatureVisibility(connect, { ...body, updatedBy: admin.id })) {
      throw new HTTPException(404, { message: 'User not found' })
    }
    return c.json({ success: true })
  })

  return app
}
