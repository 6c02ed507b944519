/**
 * Identity middleware.
 *
 * The front web server authenticates against LDAP and passes the username on
 * as REMOTE_USER, which reaches us as the `x-remote-user` header. Local
 * development falls back to the configured `remoteUser`.
 */

import type { Context, MiddlewareHandler, Next } from 'hono'
import type { User, UsintDatabase } from '@usint/db'
import type { UsintConfig } from '../config.js'
import { createLogger } from '../lib/log.js'
import { userByName } from '../services/database-interface.js'
import { ForbiddenPage } from '../views/errors.js'

const log = createLogger('auth')

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
    user: User
  }
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? crypto.randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}

/**
 * Resolve the active user or answer 403.
 */
export function remoteUser(deps: { db: UsintDatabase; config: Pick<UsintConfig, 'remoteUser'> }): MiddlewareHandler {
  return async (c, next) => {
    const username = c.req.header('x-remote-user')?.trim() || deps.config.remoteUser
    if (!username) {
      log.warn(`No remote user for ${c.req.method} ${c.req.path}`)
      return c.html(<ForbiddenPage />, 403)
    }

    const user = await userByName(deps.db, username)
    if (!user || !user.isActive) {
      log.warn(`Rejected ${user ? 'inactive' : 'unknown'} user ${username}`)
      return c.html(<ForbiddenPage username={username} />, 403)
    }

    c.set('user', user)
    await next()
  }
}

export function getCurrentUser(c: Context): User {
  return c.get('user')
}

/** User set by `remoteUser`, or null on requests that never reached it. */
export function findCurrentUser(c: Context): User | null {
  return c.get('user') ?? null
}
