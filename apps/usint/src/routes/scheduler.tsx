/**
 * TOO duty schedule: sign up for, unlock, split and extend the weekly duty
 * periods.
 */

import { Hono, type Context } from 'hono'
import { isValid, parse } from 'date-fns'
import { z } from 'zod'
import type { AppDeps } from '../deps.js'
import { currentTime } from '../deps.js'
import { ScheduleEditError } from '../errors.js'
import { getCurrentUser } from '../middleware/auth.js'
import {
  addSchedulePeriods,
  listUsers,
  pullSchedule,
  signupSchedule,
  splitSchedule,
  unlockSchedule,
  userByName,
} from '../services/database-interface.js'
import { parseDatetime } from '../services/helpers.js'
import { SchedulerPage } from '../views/scheduler.js'
import { flash, PARSE_ERROR_MESSAGE, readForm, takeFlashes } from './_page.js'

const scheduleId = z.coerce.number().int().positive()

const scheduleActionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('signup'), id: scheduleId, username: z.string().trim().optional() }),
  z.object({ action: z.literal('unlock'), id: scheduleId }),
  z.object({ action: z.literal('split'), id: scheduleId, date: z.string().trim().min(1) }),
  z.object({ action: z.literal('add'), weeks: z.coerce.number().int().min(1).max(52).default(4) }),
])

/** Date inputs post `yyyy-MM-dd`; typed dates may use any catalog format. */
function parseSplitDate(value: string): Date | null {
  const day = parse(value, 'yyyy-MM-dd', new Date())
  return isValid(day) ? day : parseDatetime(value)
}

export function createSchedulerRoutes(deps: AppDeps) {
  const routes = new Hono()

  async function index(c: Context) {
    const [rows, users] = await Promise.all([
      pullSchedule(deps.db, { from: currentTime(deps) }),
      listUsers(deps.db),
    ])
    return c.html(<SchedulerPage user={getCurrentUser(c)} flashes={takeFlashes(c)} rows={rows} users={users} />)
  }

  routes.get('/', index)
  routes.get('/index', index)

  routes.post('/', async (c) => {
    const parsed = scheduleActionSchema.safeParse(await readForm(c))
    if (!parsed.success) {
      flash(c, PARSE_ERROR_MESSAGE)
      return c.redirect('/scheduler/')
    }

    const user = getCurrentUser(c)
    const action = parsed.data
    try {
      switch (action.action) {
        case 'signup': {
          const assignee = action.username ? await userByName(deps.db, action.username) : user
          if (!assignee) {
            flash(c, `Unknown username: ${action.username ?? ''}`)
            break
          }
          await signupSchedule(deps.db, action.id, assignee, user)
          break
        }
        case 'unlock':
          await unlockSchedule(deps.db, action.id, user)
          break
        case 'split': {
          const day = parseSplitDate(action.date)
          if (!day) {
            flash(c, PARSE_ERROR_MESSAGE)
            break
          }
          await splitSchedule(deps.db, action.id, day)
          break
        }
        case 'add':
          await addSchedulePeriods(deps.db, { weeks: action.weeks, now: currentTime(deps) })
          break
      }
    } catch (error) {
      if (!(error instanceof ScheduleEditError)) throw error
      flash(c, error.message)
    }
    return c.redirect('/scheduler/')
  })

  return routes
}
