/**
 * Target Parameter Status Page: open revisions with their signoff buttons and
 * the revisions closed in the last 36 hours.
 */

import { Hono } from 'hono'
import { setCookie } from 'hono/cookie'
import { z } from 'zod'
import type { User } from '@usint/db'
import { formatObsidRev, getColors, signoffKindSchema } from '@usint/schema'
import type { AppDeps } from '../deps.js'
import { currentTime } from '../deps.js'
import { isNotFound, OcatMultipleResultsError } from '../errors.js'
import { createLogger } from '../lib/log.js'
import { getCurrentUser } from '../middleware/auth.js'
import {
  isApproved,
  listUsers,
  performSignoff,
  pullStatus,
  userById,
  userByName,
  type SignoffResult,
  type StatusOrder,
} from '../services/database-interface.js'
import { signoffNotify } from '../services/emailing.js'
import type { OcatData } from '../services/helpers.js'
import { readOcatData } from '../services/read-ocat-data.js'
import { partitionStatus } from '../services/status-page.js'
import { StatusPage, type StatusOrderName } from '../views/orupdate.js'
import { flash, positiveIntParam, readForm, readJsonCookie, takeFlashes } from './_page.js'

const log = createLogger('orupdate')

export const ORDER_COOKIE = 'usint_status_order'

/** Seconds between automatic reloads of the status page. */
export const REFRESH_SECONDS = 180

const statusOrderSchema = z.object({
  orderUser: z.number().int().positive().optional(),
  orderObsid: z.boolean().optional(),
})

const orderFormSchema = z.object({
  order: z.enum(['submission', 'obsid', 'username']),
  username: z.string().trim().optional(),
})

function orderName(order: StatusOrder): StatusOrderName {
  if (order.orderUser !== undefined) return 'username'
  if (order.orderObsid) return 'obsid'
  return 'submission'
}

export function createOrupdateRoutes(deps: AppDeps) {
  const routes = new Hono()

  /** TOO/DDT signoffs alert the next party in the chain. */
  async function notifySignoff(result: SignoffResult, signer: User): Promise<string | null> {
    const obsidrev = formatObsidRev(result.revision.obsid, result.revision.revisionNumber)
    let ocatData: OcatData
    try {
      ocatData = await readOcatData(deps.ocat, result.revision.obsid)
    } catch (error) {
      if (isNotFound(error) || error instanceof OcatMultipleResultsError) {
        log.warn(`No Ocat data for ${obsidrev}; signoff notification skipped`)
        return null
      }
      throw error
    }
    const submitter = (await userById(deps.db, result.revision.userId)) ?? signer
    const message = signoffNotify(deps.config, ocatData, obsidrev, result.signoff, submitter, signer)
    if (!message) return null
    try {
      await deps.mailer.send(message)
    } catch (error) {
      log.error(`Failed to send "${message.subject}"`, error)
      return 'Error sending notification email. Check Inbox.'
    }
    return null
  }

  routes.get('/', async (c) => {
    const parsedOrder = statusOrderSchema.safeParse(readJsonCookie(c, ORDER_COOKIE))
    const order: StatusOrder = parsedOrder.success ? parsedOrder.data : {}

    const [rows, users] = await Promise.all([pullStatus(deps.db, order), listUsers(deps.db)])
    const { open, closed, colors } = partitionStatus(rows, Object.values(getColors()), currentTime(deps))

    const approvals = new Map<number, boolean>()
    for (const { revision } of open) {
      if (!approvals.has(revision.obsid)) {
        approvals.set(revision.obsid, await isApproved(deps.db, revision.obsid))
      }
    }

    c.header('Refresh', String(REFRESH_SECONDS))
    return c.html(
      <StatusPage
        user={getCurrentUser(c)}
        flashes={takeFlashes(c)}
        open={open}
        closed={closed}
        colors={colors}
        approvals={approvals}
        usernames={new Map(users.map((user) => [user.id, user.username]))}
        order={orderName(order)}
      />,
    )
  })

  routes.post('/', async (c) => {
    const parsed = orderFormSchema.safeParse(await readForm(c))
    if (parsed.success) {
      const current = statusOrderSchema.safeParse(readJsonCookie(c, ORDER_COOKIE))
      let order: StatusOrder = current.success ? current.data : {}
      switch (parsed.data.order) {
        case 'submission':
          order = {}
          break
        case 'obsid':
          order = { orderObsid: true }
          break
        case 'username': {
          // A misspelled username leaves the order unchanged.
          const user = parsed.data.username ? await userByName(deps.db, parsed.data.username) : null
          if (user) order = { orderUser: user.id }
          else flash(c, `Unknown username: ${parsed.data.username ?? ''}`)
          break
        }
      }
      setCookie(c, ORDER_COOKIE, JSON.stringify(order), { path: '/', httpOnly: true, sameSite: 'Lax' })
    }
    return c.redirect('/orupdate/')
  })

  routes.on(['GET', 'POST'], '/:id/:kind', async (c) => {
    const id = positiveIntParam(c.req.param('id'))
    const kind = signoffKindSchema.safeParse(c.req.param('kind'))
    if (id === null || !kind.success) return c.notFound()

    const user = getCurrentUser(c)
    const result = await performSignoff(deps.db, id, kind.data, user, currentTime(deps))
    const problem = await notifySignoff(result, user)
    if (problem) flash(c, problem)
    return c.redirect('/orupdate/')
  })

  return routes
}
