/**
 * Express Approval Page: approve a list of obsids as is without the full
 * parameter review.
 */

import { Hono, type Context } from 'hono'
import { z } from 'zod'
import { formatObsidRev } from '@usint/schema'
import type { AppDeps } from '../deps.js'
import { currentTime } from '../deps.js'
import { isNotFound, ObsidListError, OcatMultipleResultsError } from '../errors.js'
import { createLogger } from '../lib/log.js'
import { getCurrentUser } from '../middleware/auth.js'
import { createRevision, hasOpenRevision, isApproved } from '../services/database-interface.js'
import { quickApprovalStateEmail } from '../services/emailing.js'
import { createObsidList, type OcatData } from '../services/helpers.js'
import { readOcatData } from '../services/read-ocat-data.js'
import { ExpressConfirmPage, ExpressDonePage, ExpressEntryPage, type ExpressRow } from '../views/express.js'
import { PARSE_ERROR_MESSAGE, readForm, takeFlashes } from './_page.js'

const log = createLogger('express')

const actionSchema = z.enum(['submit', 'finalize', 'previous_page'])

function text(value: OcatData[string] | undefined): string {
  return value === null || value === undefined ? '' : String(value)
}

export function createExpressRoutes(deps: AppDeps) {
  const routes = new Hono()

  /** Ocat data per obsid; obsids missing from the catalog are returned apart. */
  async function readAll(obsids: number[]) {
    const found = new Map<number, OcatData>()
    const missing: number[] = []
    for (const obsid of obsids) {
      try {
        found.set(obsid, await readOcatData(deps.ocat, obsid))
      } catch (error) {
        if (isNotFound(error) || error instanceof OcatMultipleResultsError) {
          missing.push(obsid)
          continue
        }
        throw error
      }
    }
    return { found, missing }
  }

  function entry(c: Context, multiobsid = '', flashes: string[] = takeFlashes(c), status: 200 | 400 = 200) {
    return c.html(<ExpressEntryPage user={getCurrentUser(c)} flashes={flashes} multiobsid={multiobsid} />, status)
  }

  async function submit(c: Context, multiobsid: string) {
    let obsids: number[]
    try {
      obsids = createObsidList(multiobsid)
    } catch (error) {
      if (error instanceof ObsidListError) return entry(c, multiobsid, [PARSE_ERROR_MESSAGE], 400)
      throw error
    }
    if (obsids.length === 0) return entry(c, multiobsid, [PARSE_ERROR_MESSAGE], 400)

    const { found, missing } = await readAll(obsids)
    const rows: ExpressRow[] = []
    for (const [obsid, ocatData] of found) {
      const [approved, openRevision] = await Promise.all([isApproved(deps.db, obsid), hasOpenRevision(deps.db, obsid)])
      rows.push({
        obsid,
        seqNbr: text(ocatData.seq_nbr),
        targname: text(ocatData.targname),
        approved,
        openRevision,
      })
    }
    return c.html(<ExpressConfirmPage user={getCurrentUser(c)} rows={rows} missing={missing} multiobsid={multiobsid} />)
  }

  async function finalize(c: Context, obsidField: string) {
    const user = getCurrentUser(c)
    let obsids: number[]
    try {
      obsids = createObsidList(obsidField)
    } catch (error) {
      if (error instanceof ObsidListError) return entry(c, obsidField, [PARSE_ERROR_MESSAGE], 400)
      throw error
    }

    const { found, missing } = await readAll(obsids)
    const approved: string[] = []
    const problems: string[] = missing.map((obsid) => `Obsid ${obsid} was not found in the Ocat.`)
    const now = currentTime(deps)

    for (const [obsid, ocatData] of found) {
      const { revision } = await createRevision(deps.db, { obsid, ocatData, kind: 'asis', user, now })
      const obsidrev = formatObsidRev(revision.obsid, revision.revisionNumber)
      approved.push(obsidrev)
      try {
        await deps.mailer.send(quickApprovalStateEmail(deps.config, ocatData, obsidrev, 'asis', user))
      } catch (error) {
        log.error(`Failed to send approval email for ${obsidrev}`, error)
        problems.push(`Error sending notification email for ${obsidrev}. Check Inbox.`)
      }
    }
    log.info(`${user.username} express approved ${approved.length} obsid(s)`)
    return c.html(<ExpressDonePage user={user} approved={approved} problems={problems} />)
  }

  routes.get('/', (c) => entry(c))
  routes.get('/index', (c) => entry(c))

  routes.post('/', async (c) => {
    const form = await readForm(c)
    const parsed = actionSchema.safeParse(form.action)
    const action = parsed.success ? parsed.data : 'submit'
    const multiobsid = form.multiobsid ?? ''

    switch (action) {
      case 'submit':
        return submit(c, multiobsid)
      case 'finalize':
        return finalize(c, form.obsids ?? '')
      case 'previous_page':
        return entry(c, multiobsid)
    }
  })

  return routes
}
