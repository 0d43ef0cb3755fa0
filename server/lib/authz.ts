import type { Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { AccessControl } from '../config'
import type { ConnectionFactory } from '../db'
import type { User } from '../models'
import { getUserFeatures, type Feature } from '../users'
import { logger } from './logger'

export type AppEnv = {
  Variables: {
    user: User | null
  }
}

export type UserInfoClaims = {
  email?: string | null
  groups?: string | string[] | null
}

export const requireIdentity = (c: Context<AppEnv>, message = 'Authentication required') => {
  const user = c.get('user')
  if (!user) {
    throw new HTTPException(401, { message })
  }
  return user
}

export const requireAdmin = (c: Context<AppEnv>) => {
  const user = requireIdentity(c)
  if (!user.isAdmin) {
    throw new HTTPException(403, { message: 'Admin access required' })
  }
  return user
}

export const requireFeature = (c: Context<AppEnv>, connect: ConnectionFactory, feature: Feature) => {
  const user = requireIdentity(c)
  if (!getUserFeatures(connect, user.id)[feature]) {
    logger.warn(`User ${user.id} attempted to access disabled feature: ${feature}`)
    throw new HTTPException(403, { message: 'This feature is not enabled for your account' })
  }
  return user
}

export const hasAccessControl = (accessControl: AccessControl) =>
  accessControl.allowedGroups.length > 0 || accessControl.allowedEmails.length > 0

/**
 * Group membership decides when allowed groups are configured; otherwise the email must be on
 * the allow list. With neither configured nobody is authorized.
 */
export const isUserAuthorized = (userinfo: UserInfoClaims, accessControl: AccessControl) => {
  if (accessControl.allowedGroups.length > 0) {
    const rawGroups = userinfo.groups ?? []
    const groups = typeof rawGroups === 'string' ? [rawGroups] : rawGroups
    const matched = groups.find((group) => accessControl.allowedGroups.includes(group))
    if (matched) {
      logger.info(`User authorized via group: ${matched}`)
      return true
    }
    logger.warn(`User not in any allowed groups. User groups: ${groups.join(', ') || 'none'}`)
    return false
  }

  if (accessControl.allowedEmails.length > 0) {
    const email = userinfo.email?.trim().toLowerCase()
    if (!email) {
      logger.warn('User has no email in userinfo')
      return false
    }
    if (accessControl.allowedEmails.some((entry) => entry.toLowerCase() === email)) {
      logger.info(`User authorized via email: ${email}`)
      return true
    }
    logger.warn(`User email not in allowed list: ${email}`)
    return false
  }

  logger.warn('No access control configured (neither groups nor emails)')
  return false
}

export const canManageRecord = (record: { addedBy: number }, user: { id: number; isAdmin: boolean }) =>
  record.addedBy === user.id || user.isAdmin
