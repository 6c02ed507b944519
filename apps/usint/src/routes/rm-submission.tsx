import { Hono, type Context } from 'hono'
import { removalColumnSchema } from '@usint/schema'
import type { AppDeps } from '../deps.js'
import { currentTime } from '../deps.js'
import { RemovalNotAllowedError } from '../errors.js'
import { getCurrentUser } from '../middleware/auth.js'
import { findReversibleColumns, pullStatus, removeSubmission } from '../services/database-interface.js'
import { RemovalPage, type RemovalEntry } from '../views/rm-submission.js'
import { flash, positiveIntParam, takeFlashes } from './_page.js'

/** Rows shown read-only when the user has nothing left to take back. */
const RECENT_LIMIT = 10

/**
 * Remove Submission Page: take back a revision or signoff made in the last
 * 36 hours.
 */
export function createRmSubmissionRoutes(deps: AppDeps) {
  const routes = new Hono()

  async function index(c: Context) {
    const user = getCurrentUser(c)
    const now = currentTime(deps)
    const rows = await pullStatus(deps.db)
    const reversible: RemovalEntry[] = rows
      .map((row) => ({ ...row, reversible: findReversibleColumns(row.revision, row.signoff, user, now) }))
      .filter((entry) => entry.reversible.length > 0)

    if (reversible.length > 0) {
      return c.html(<RemovalPage user={user} flashes={takeFlashes(c)} entries={reversible} canRemove />)
    }
    const recent = await pullStatus(deps.db, { limit: RECENT_LIMIT })
    return c.html(
      <RemovalPage
        user={user}
        flashes={takeFlashes(c)}
        entries={recent.map((row) => ({ ...row, reversible: [] }))}
        canRemove={false}
      />,
    )
  }

  routes.get('/', index)
  routes.get('/index', index)

  routes.on(['GET', 'POST'], '/:revisionId/:signoffId/:column', async (c) => {
    const revisionId = positiveIntParam(c.req.param('revisionId'))
    const signoffId = positiveIntParam(c.req.param('signoffId'))
    const column = removalColumnSchema.safeParse(c.req.param('column'))
    if (revisionId === null || signoffId === null || !column.success) return c.notFound()

    try {
      await removeSubmission(deps.db, {
        revisionId,
        signoffId,
        column: column.data,
        user: getCurrentUser(c),
        now: currentTime(deps),
      })
    } catch (error) {
      if (!(error instanceof RemovalNotAllowedError)) throw error
      flash(c, error.message)
    }
    return c.redirect('/rm_submission/')
  })

  return routes
}
