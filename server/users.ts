import { z } from 'zod'
import type { AccessControl, LocalUser } from './config'
import { toSqlBoolean, withConnection, type Connection, type ConnectionFactory } from './db'
import { logger } from './lib/logger'
import { parseRow, parseRows, userRowSchema, type User } from './models'

export const features = ['bills', 'budget'] as const

export type Feature = (typeof features)[number]

export type FeatureMap = Record<Feature, boolean>

export type UserWithFeatures = User & { features: FeatureMap }

const featureRowSchema = z.object({
  feature_name: z.string(),
  is_visible: z.union([z.literal(0), z.literal(1)]),
})

export const isFeature = (value: string): value is Feature => features.some((feature) => feature === value)

const findUser = (conn: Connection, id: number) =>
  parseRow(userRowSchema, conn.prepare('SELECT * FROM users WHERE id = ?').get(id))

const loadFeatures = (conn: Connection, userId: number): FeatureMap => {
  const result: FeatureMap = { bills: true, budget: true }
  const rows = parseRows(
    featureRowSchema,
    conn.prepare('SELECT feature_name, is_visible FROM user_feature_visibility WHERE user_id = ?').all(userId),
  )
  for (const row of rows) {
    if (isFeature(row.feature_name)) {
      result[row.feature_name] = row.is_visible === 1
    }
  }
  return result
}

export const getUser = (connect: ConnectionFactory, id: number): User | null =>
  withConnection(connect, (conn) => findUser(conn, id))

export const isAdminEmail = (email: string, accessControl: AccessControl) =>
  accessControl.adminEmails.some((entry) => entry.toLowerCase() === email.toLowerCase())

/**
 * Creates the row for a configured local user on first login and refreshes its profile
 * and admin flag on every later one.
 */
export const upsertLocalUser = (
  connect: ConnectionFactory,
  localUser: LocalUser,
  accessControl: AccessControl,
  now: Date = new Date(),
): User =>
  withConnection(connect, (conn) =>
    conn.transaction(() => {
      const isAdmin = (localUser.isAdmin ?? false) || isAdminEmail(localUser.email, accessControl)
      const fullName = localUser.fullName ?? localUser.username
      const loginAt = now.toISOString()

      const existing = parseRow(
        userRowSchema,
        conn.prepare('SELECT * FROM users WHERE username = ?').get(localUser.username),
      )

      let userId: number
      if (existing) {
        conn
          .prepare('UPDATE users SET email = ?, full_name = ?, is_admin = ?, last_login = ? WHERE id = ?')
          .run(localUser.email, fullName, toSqlBoolean(isAdmin), loginAt, existing.id)
        userId = existing.id
      } else {
        const result = conn
          .prepare('INSERT INTO users (username, email, full_name, is_admin, last_login) VALUES (?, ?, ?, ?, ?)')
          .run(localUser.username, localUser.email, fullName, toSqlBoolean(isAdmin), loginAt)
        userId = Number(result.lastInsertRowid)
        logger.info(`Created local user ${localUser.username}`)
      }

      const user = findUser(conn, userId)
      if (!user) {
        throw new Error('User record could not be read back after login.')
      }
      return user
    })(),
  )

export const getUserFeatures = (connect: ConnectionFactory, userId: number): FeatureMap =>
  withConnection(connect, (conn) => loadFeatures(conn, userId))

export const listUsersWithFeatures = (connect: ConnectionFactory): UserWithFeatures[] =>
  withConnection(connect, (conn) =>
    parseRows(userRowSchema, conn.prepare('SELECT * FROM users ORDER BY username ASC').all()).map((user) => ({
      ...user,
      features: loadFeatures(conn, user.id),
    })),
  )

export const setUserFeatureVisibility = (
  connect: ConnectionFactory,
  args: { userId: number; feature: Feature; isVisible: boolean; updatedBy: number },
) =>
  withConnection(connect, (conn) => {
    if (!findUser(conn, args.userId)) {
      return false
    }

    conn
      .prepare(
        `INSERT INTO user_feature_visibility (user_id, feature_name, is_visible, updated_by, updated_at)
         VALUES (?, ?, ?, ?, CURRENT_TIMESTAMP)
         ON CONFLICT (user_id, feature_name) DO UPDATE SET
           is_visible = excluded.is_visible,
           updated_by = excluded.updated_by,
           updated_at = excluded.updated_at`,
      )
      .run(args.userId, args.feature, toSqlBoolean(args.isVisible), args.updatedBy)

    logger.info(
      `Admin ${args.updatedBy} set ${args.feature} visibility to ${args.isVisible} for user ${args.userId}`,
    )
    return true
  })
