/**
 * Ocat Data Page: edit the parameters of one observation and submit them as a
 * revision.
 *
 * The form posts back to itself with an `action`:
 * - open_dither / refresh re-render the form
 * - submit validates and shows the confirmation page
 * - previous_page / finalize come from the confirmation page, which carries
 *   the pending submission in a hidden `form_state` field
 */

import { Hono, type Context } from 'hono'
import { z } from 'zod'
import type { RevisionKind, User } from '@usint/db'
import { formatObsidRev, obsidSchema, revisionKindSchema } from '@usint/schema'
import type { AppDeps } from '../deps.js'
import { currentTime } from '../deps.js'
import { isNotFound, ObsidListError, OcatMultipleResultsError } from '../errors.js'
import { createLogger } from '../lib/log.js'
import { getCurrentUser } from '../middleware/auth.js'
import { constructNotes, createRevision, hasOpenRevision, isApproved } from '../services/database-interface.js'
import { newRevisionEmail, quickApprovalStateEmail, type EmailMessage } from '../services/emailing.js'
import {
  determineChanges,
  formatForForm,
  parseParameterForm,
  submissionStateSchema,
  synchronizeValues,
  type Changes,
  type FormValues,
  type SubmissionState,
} from '../services/format-ocat-data.js'
import { createObsidList, type OcatData } from '../services/helpers.js'
import { checkObsidInOrList, readOcatData } from '../services/read-ocat-data.js'
import { ConfirmPage, FinalizedPage, ObsidEntryPage, ParameterFormPage } from '../views/ocatdatapage.js'
import { noteMessages } from '../views/notes.js'
import { PARSE_ERROR_MESSAGE, readForm, takeFlashes } from './_page.js'

const log = createLogger('ocatdatapage')

const actionSchema = z.enum(['open_dither', 'refresh', 'submit', 'previous_page', 'finalize'])

export const NO_CHANGE_MESSAGE = 'No parameter changes were requested. Edit a value or choose another submission kind.'

type Observation = {
  obsid: number
  ocatData: OcatData
  approved: boolean
  openRevision: boolean
}

type FormView = {
  values: FormValues
  errors?: string[]
  kind?: RevisionKind
  multiobsid?: string
  comment?: string
}

function parseSubmissionState(raw: string | undefined): SubmissionState | null {
  if (!raw) return null
  let decoded: unknown
  try {
    decoded = JSON.parse(raw)
  } catch (error) {
    log.warn('Unreadable form_state', error)
    return null
  }
  const parsed = submissionStateSchema.safeParse(decoded)
  return parsed.success ? parsed.data : null
}

/** Original values of another obsid for the parameters requested on the first. */
function originalsFor(ocatData: OcatData, requested: FormValues): OcatData {
  return Object.fromEntries(Object.keys(requested).map((name): [string, OcatData[string]] => [name, ocatData[name] ?? null]))
}

export function createOcatDataPageRoutes(deps: AppDeps) {
  const routes = new Hono()

  async function loadObservation(obsid: number): Promise<Observation> {
    const ocatData = await readOcatData(deps.ocat, obsid, { obsSsDir: deps.config.obsSsDir })
    const [approved, openRevision] = await Promise.all([isApproved(deps.db, obsid), hasOpenRevision(deps.db, obsid)])
    return { obsid, ocatData, approved, openRevision }
  }

  function renderForm(c: Context, observation: Observation, view: FormView, status: 200 | 400 = 200) {
    return c.html(
      <ParameterFormPage
        user={getCurrentUser(c)}
        flashes={takeFlashes(c)}
        obsid={observation.obsid}
        ocatData={observation.ocatData}
        values={view.values}
        approved={observation.approved}
        openRevision={observation.openRevision}
        errors={view.errors ?? []}
        kind={view.kind ?? 'norm'}
        multiobsid={view.multiobsid ?? ''}
        comment={view.comment ?? ''}
      />,
      status,
    )
  }

  async function sendNotification(message: EmailMessage, problems: string[]) {
    try {
      await deps.mailer.send(message)
    } catch (error) {
      log.error(`Failed to send "${message.subject}"`, error)
      problems.push('Error sending notification email. Check Inbox.')
    }
  }

  async function submit(c: Context, observation: Observation, form: Record<string, string>, values: FormValues) {
    const { obsid, ocatData } = observation
    const kindResult = revisionKindSchema.safeParse(form.submission_kind ?? 'norm')
    const kind = kindResult.success ? kindResult.data : 'norm'
    const view: FormView = { values, kind, multiobsid: form.multiobsid ?? '', comment: form.comment ?? '' }

    let multiobsid: number[]
    try {
      multiobsid = createObsidList(form.multiobsid ?? '', obsid)
    } catch (error) {
      if (error instanceof ObsidListError) {
        return renderForm(c, observation, { ...view, errors: [PARSE_ERROR_MESSAGE] }, 400)
      }
      throw error
    }

    const changes: Changes =
      kind === 'norm' || kind === 'clone' ? determineChanges(values, ocatData) : { original: {}, requested: {} }
    const errors: string[] = []
    if (kind === 'norm' && Object.keys(changes.requested).length === 0) {
      errors.push(NO_CHANGE_MESSAGE)
    }
    if (kind === 'remove' && !observation.approved) {
      errors.push(`Obsid ${obsid} is not on the approved list and cannot be removed.`)
    }
    if (kind === 'asis' && observation.openRevision) {
      errors.push(`Obsid ${obsid} has an open revision. Sign it off or remove it before approving as is.`)
    }
    if (errors.length > 0) {
      return renderForm(c, observation, { ...view, errors }, 400)
    }

    const state: SubmissionState = {
      kind,
      original: changes.original,
      requested: changes.requested,
      multiobsid,
      comment: form.comment ?? '',
    }
    const orList = await checkObsidInOrList([obsid], deps.config.obsSsDir)
    const notes =
      kind === 'norm'
        ? constructNotes(ocatData, changes.original, changes.requested, {
            onOrList: orList.get(obsid) ?? false,
            now: currentTime(deps),
          })
        : null
    return c.html(<ConfirmPage user={getCurrentUser(c)} obsid={obsid} state={state} warnings={noteMessages(notes)} />)
  }

  async function finalize(c: Context, observation: Observation, state: SubmissionState) {
    if (state.kind === 'norm' && Object.keys(state.requested).length === 0) {
      return renderForm(
        c,
        observation,
        {
          values: formatForForm(observation.ocatData),
          errors: [NO_CHANGE_MESSAGE],
          multiobsid: state.multiobsid.join(', '),
          comment: state.comment,
        },
        400,
      )
    }
    const user: User = getCurrentUser(c)
    const now = currentTime(deps)
    const kind = state.kind
    const obsids = [observation.obsid, ...state.multiobsid]
    const orList = await checkObsidInOrList(obsids, deps.config.obsSsDir)
    const created: Array<{ obsidrev: string; kind: RevisionKind }> = []
    const skipped: string[] = []

    for (const obsid of obsids) {
      let ocatData: OcatData
      if (obsid === observation.obsid) {
        ocatData = observation.ocatData
      } else {
        try {
          ocatData = await readOcatData(deps.ocat, obsid, { obsSsDir: deps.config.obsSsDir })
        } catch (error) {
          if (isNotFound(error) || error instanceof OcatMultipleResultsError) {
            skipped.push(`Obsid ${obsid}: ${error.message}`)
            continue
          }
          throw error
        }
      }

      if (kind === 'remove' && !(await isApproved(deps.db, obsid))) {
        skipped.push(`Obsid ${obsid} is not on the approved list and was not removed.`)
        continue
      }
      if (kind === 'asis' && (await hasOpenRevision(deps.db, obsid))) {
        skipped.push(`Obsid ${obsid} has an open revision and was not approved.`)
        continue
      }

      const original = obsid === observation.obsid ? state.original : originalsFor(ocatData, state.requested)
      const { revision } = await createRevision(deps.db, {
        obsid,
        ocatData,
        kind,
        user,
        original,
        requested: state.requested,
        onOrList: orList.get(obsid) ?? false,
        now,
      })
      const obsidrev = formatObsidRev(revision.obsid, revision.revisionNumber)
      created.push({ obsidrev, kind })

      const message =
        kind === 'asis' || kind === 'remove'
          ? quickApprovalStateEmail(deps.config, ocatData, obsidrev, kind, user)
          : newRevisionEmail(deps.config, ocatData, obsidrev, kind, { original, requested: state.requested }, user, state.comment)
      await sendNotification(message, skipped)
    }

    return c.html(<FinalizedPage user={user} created={created} skipped={[...new Set(skipped)]} />)
  }

  async function showForm(c: Context) {
    const parsed = obsidSchema.safeParse(c.req.param('obsid'))
    if (!parsed.success) return c.notFound()
    const observation = await loadObservation(parsed.data)
    return renderForm(c, observation, { values: formatForForm(observation.ocatData) })
  }

  async function handlePost(c: Context) {
    const parsed = obsidSchema.safeParse(c.req.param('obsid'))
    if (!parsed.success) return c.notFound()
    const observation = await loadObservation(parsed.data)
    const form = await readForm(c)
    const actionResult = actionSchema.safeParse(form.action)
    const action = actionResult.success ? actionResult.data : 'submit'
    const merged: FormValues = { ...formatForForm(observation.ocatData), ...parseParameterForm(form) }
    const carried = { multiobsid: form.multiobsid ?? '', comment: form.comment ?? '' }

    switch (action) {
      case 'open_dither':
        return renderForm(c, observation, { ...carried, values: { ...merged, dither_flag: 'Y' } })
      case 'refresh':
        return renderForm(c, observation, { ...carried, values: synchronizeValues(merged, observation.ocatData) })
      case 'submit':
        return submit(c, observation, form, synchronizeValues(merged, observation.ocatData))
      case 'previous_page':
      case 'finalize': {
        const state = parseSubmissionState(form.form_state)
        if (!state) {
          return renderForm(
            c,
            observation,
            { values: formatForForm(observation.ocatData), errors: ['The submission could not be read. Please submit again.'] },
            400,
          )
        }
        if (action === 'finalize') return finalize(c, observation, state)
        return renderForm(c, observation, {
          values: formatForForm({ ...observation.ocatData, ...state.requested }),
          kind: state.kind,
          multiobsid: state.multiobsid.join(', '),
          comment: state.comment,
        })
      }
    }
  }

  routes.get('/', (c) => {
    const raw = c.req.query('obsid')
    if (raw !== undefined) {
      const parsed = obsidSchema.safeParse(raw.trim())
      if (parsed.success) return c.redirect(`/ocatdatapage/${parsed.data}`)
      return c.html(<ObsidEntryPage user={getCurrentUser(c)} flashes={[`Invalid obsid: ${raw}`]} />, 400)
    }
    return c.html(<ObsidEntryPage user={getCurrentUser(c)} flashes={takeFlashes(c)} />)
  })

  routes.get('/:obsid{[0-9]+}', showForm)
  routes.get('/index/:obsid{[0-9]+}', showForm)
  routes.post('/:obsid{[0-9]+}', handlePost)
  routes.post('/index/:obsid{[0-9]+}', handlePost)

  return routes
}
