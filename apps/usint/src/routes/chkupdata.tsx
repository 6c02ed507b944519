import { Hono, type Context } from 'hono'
import { obsidRevSchema } from '@usint/schema'
import type { AppDeps } from '../deps.js'
import { getCurrentUser } from '../middleware/auth.js'
import { pullRevisionDetail } from '../services/database-interface.js'
import { ObsidRevEntryPage, RevisionDetailPage } from '../views/chkupdata.js'
import { flash, readForm, takeFlashes } from './_page.js'

/**
 * Parameter Check Page: one revision with its signoff state and the original
 * and requested values.
 */
export function createChkupdataRoutes(deps: AppDeps) {
  const routes = new Hono()

  const entry = (c: Context) => c.html(<ObsidRevEntryPage user={getCurrentUser(c)} flashes={takeFlashes(c)} />)

  async function show(c: Context) {
    const raw = c.req.param('obsidrev') ?? ''
    const parsed = obsidRevSchema.safeParse(raw)
    if (!parsed.success) {
      flash(c, `Ill-formatted Obsid.Rev. ${raw}`)
      return c.redirect('/chkupdata/')
    }
    const detail = await pullRevisionDetail(deps.db, parsed.data.obsid, parsed.data.revisionNumber)
    return c.html(<RevisionDetailPage user={getCurrentUser(c)} flashes={takeFlashes(c)} detail={detail} />)
  }

  routes.get('/', entry)
  routes.get('/index', entry)

  routes.post('/', async (c) => {
    const form = await readForm(c)
    const obsidrev = (form.obsidrev ?? '').trim()
    if (!obsidrev) {
      flash(c, 'Ill-formatted Obsid.Rev. ')
      return c.redirect('/chkupdata/')
    }
    return c.redirect(`/chkupdata/${encodeURIComponent(obsidrev)}`)
  })

  routes.get('/:obsidrev', show)
  routes.get('/index/:obsidrev', show)

  return routes
}
