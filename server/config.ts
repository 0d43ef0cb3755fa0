import { z } from 'zod'
import type { DatabaseConfig } from './db'
import type { LogLevel } from './lib/logger'
import type { DisplayFormat } from './lib/money'

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  )

export const localUserSchema = z.object({
  username: z.string().trim().min(1),
  email: z.string().trim().email(),
  fullName: z.string().trim().optional(),
  isAdmin: z.boolean().optional(),
  groups: z.array(z.string()).optional(),
})

export type LocalUser = z.infer<typeof localUserSchema>

const localUsersList = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || value.trim().length === 0) {
      return []
    }
    try {
      const parsed: unknown = JSON.parse(value)
      return parsed
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'LOCAL_USERS must be a JSON array.' })
      return z.NEVER
    }
  })
  .pipe(z.array(localUserSchema))

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  DATABASE_PATH: z.string().trim().min(1).default('./data/homie.db'),
  SESSION_SECRET: z.string().min(16, 'SESSION_SECRET must be at least 16 characters.'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CURRENCY: z.string().trim().length(3).default('USD'),
  LOCALE: z.string().trim().min(2).default('en-US'),
  LOCAL_USERS: localUsersList,
  ALLOWED_EMAILS: csvList,
  ALLOWED_GROUPS: csvList,
  ADMIN_EMAILS: csvList,
  CLIENT_ORIGIN: z.string().trim().url().optional(),
  SENTRY_DSN: z.string().trim().url().optional(),
})

export type AccessControl = {
  allowedEmails: string[]
  allowedGroups: string[]
  adminEmails: string[]
}

export type AppConfig = {
  environment: 'development' | 'production' | 'test'
  port: number
  database: DatabaseConfig
  sessionSecret: string
  logLevel: LogLevel
  display: DisplayFormat
  localUsers: LocalUser[]
  accessControl: AccessControl
  clientOrigin?: string
  sentryDsn?: string
}

const emptyToUndefined = (env: Record<string, string | undefined>) =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))

export const loadConfig = (env: Record<string, string | undefined>): AppConfig => {
  const result = envSchema.safeParse(emptyToUndefined(env))
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }

  const parsed = result.data
  return {
    environment: parsed.NODE_ENV,
    port: parsed.PORT,
    database: { path: parsed.DATABASE_PATH },
    sessionSecret: parsed.SESSION_SECRET,
    logLevel: parsed.LOG_LEVEL,
    display: {
      currency: parsed.CURRENCY.toUpperCase(),
      locale: parsed.LOCALE,
    },
    localUsers: parsed.LOCAL_USERS,
    accessControl: {
      allowedEmails: parsed.ALLOWED_EMAILS,
      allowedGroups: parsed.ALLOWED_GROUPS,
      adminEmails: parsed.ADMIN_EMAILS,
    },
    clientOrigin: parsed.CLIENT_ORIGIN,
    sentryDsn: parsed.SENTRY_DSN,
  }
}
