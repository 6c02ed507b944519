import type { ParameterValue, RevisionKind, User } from '@usint/db'
import { choicesFor, getParameterSelections, labelFor, signoffParams } from '@usint/schema'
import { DITHER_ASEC_PARAMS, DITHER_PARAMS, type FormValues, type SubmissionState } from '../services/format-ocat-data.js'
import type { OcatData, RankRecords } from '../services/helpers.js'
import { Layout } from './layout.js'

/** Catalog values shown above the form but not editable. */
const SUMMARY_PARAMS = [
  'obsid',
  'seq_nbr',
  'status',
  'obs_type',
  'proposal_number',
  'proposal_title',
  'obs_ao_str',
  'pi_name',
  'observer',
  'approved_exposure_time',
  'rem_exp_time',
  'soe_st_sched_date',
  'lts_lt_plan',
  'planned_roll',
  'monitor_flag',
  'monitor_series',
  'group_obsid',
  'too_type',
  'too_trig',
  'too_start',
  'too_stop',
  'too_followup',
  'too_remarks',
]

const TEXT_AREAS = new Set(['remarks', 'comments', 'too_remarks'])

const DITHER_SET = new Set<string>(DITHER_PARAMS)

const SUBMISSION_KINDS: Array<[RevisionKind, string]> = [
  ['norm', 'Submit the parameter changes'],
  ['asis', 'Approve the observation as is'],
  ['remove', 'Remove the observation from the approved list'],
  ['clone', 'Request a split of the observation (explain in the comment)'],
]

export function displayValue(value: ParameterValue | undefined): string {
  if (value === null || value === undefined) return ''
  if (Array.isArray(value)) {
    return value.every((entry) => typeof entry !== 'object' || entry === null)
      ? value.map((entry) => displayValue(entry)).join(', ')
      : JSON.stringify(value)
  }
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

function ParameterInput({ name, value }: { name: string; value: ParameterValue | undefined }) {
  const current = displayValue(value)
  const choices = choicesFor(name)
  if (choices) {
    const known = choices.some(([choice]) => choice === current)
    return (
      <select name={name}>
        {known ? null : <option value={current} selected>{current}</option>}
        {choices.map(([choice, text]) => (
          <option value={choice} selected={choice === current}>
            {text}
          </option>
        ))}
      </select>
    )
  }
  if (TEXT_AREAS.has(name)) {
    return (
      <textarea name={name} rows={4} cols={80}>
        {current}
      </textarea>
    )
  }
  return <input type="text" name={name} value={current} />
}

function RankTable({ rank, rows }: { rank: string; rows: RankRecords }) {
  const columns = getParameterSelections().rank_params[rank] ?? []
  const withBlank: RankRecords = [...rows, {}]
  return (
    <table>
      <tr>
        <th>Rank</th>
        {columns.map((column) => (
          <th>{labelFor(column)}</th>
        ))}
      </tr>
      {withBlank.map((row, index) => (
        <tr>
          <td>{index + 1}</td>
          {columns.map((column) => (
            <td>
              <ParameterInput name={`${rank}-${index}-${column}`} value={row[column]} />
            </td>
          ))}
        </tr>
      ))}
    </table>
  )
}

function asRankRecords(value: ParameterValue | undefined): RankRecords {
  if (!Array.isArray(value)) return []
  return value.filter(
    (entry): entry is Record<string, ParameterValue> => typeof entry === 'object' && entry !== null && !Array.isArray(entry),
  )
}

function ParameterRow({ name, values }: { name: string; values: FormValues }) {
  const ranks = getParameterSelections().rank_params
  if (name in ranks) {
    return (
      <div>
        <p>
          <strong>{labelFor(name)}</strong>
        </p>
        <RankTable rank={name} rows={asRankRecords(values[name])} />
      </div>
    )
  }
  return (
    <div>
      <label for={name}>{labelFor(name)}</label>
      <ParameterInput name={name} value={values[name]} />
      {name === 'ra' ? (
        <span>
          {' '}
          HMS <input type="text" name="ra_hms" value={displayValue(values.ra_hms)} />
        </span>
      ) : null}
      {name === 'dec' ? (
        <span>
          {' '}
          DMS <input type="text" name="dec_dms" value={displayValue(values.dec_dms)} />
        </span>
      ) : null}
      {DITHER_ASEC_PARAMS.some((key) => key === name) ? (
        <span>
          {' '}
          arcsec <input type="text" name={`${name}_asec`} value={displayValue(values[`${name}_asec`])} />
        </span>
      ) : null}
    </div>
  )
}

interface ObsidEntryPageProps {
  user: User
  flashes: string[]
}

export function ObsidEntryPage({ user, flashes }: ObsidEntryPageProps) {
  return (
    <Layout title="Ocat Data Page" user={user} flashes={flashes}>
      <form method="get" action="/ocatdatapage/">
        <label for="obsid">Obsid</label>
        <input type="text" name="obsid" />
        <button type="submit">Open</button>
      </form>
    </Layout>
  )
}

interface ParameterFormPageProps {
  user: User
  flashes: string[]
  obsid: number
  ocatData: OcatData
  values: FormValues
  approved: boolean
  openRevision: boolean
  errors: string[]
  kind: RevisionKind
  multiobsid: string
  comment: string
}

export function ParameterFormPage(props: ParameterFormPageProps) {
  const { ocatData, values } = props
  const showDither = values.dither_flag === 'Y'
  const sections: Array<[string, string[]]> = [
    ['General Parameters', signoffParams('general')],
    ['ACIS Parameters', signoffParams('acis')],
    ['ACIS SI Mode', signoffParams('acis_si')],
    ['HRC SI Mode', signoffParams('hrc_si')],
  ]

  return (
    <Layout title={`Ocat Data Page: ${props.obsid}`} user={props.user} flashes={props.flashes}>
      {props.errors.map((error) => (
        <p class="error">{error}</p>
      ))}
      <table>
        {SUMMARY_PARAMS.filter((name) => ocatData[name] !== undefined).map((name) => (
          <tr>
            <th>{labelFor(name)}</th>
            <td>{displayValue(ocatData[name])}</td>
          </tr>
        ))}
        <tr>
          <th>Approval</th>
          <td>{props.approved ? 'Approved' : 'Not approved'}</td>
        </tr>
      </table>
      {props.openRevision ? <p class="warning">This observation has an open revision on the status page.</p> : null}

      <form method="post" action={`/ocatdatapage/${props.obsid}`}>
        {sections.map(([title, names]) => (
          <fieldset>
            <legend>{title}</legend>
            {names
              .filter((name) => showDither || !DITHER_SET.has(name))
              .map((name) => (
                <ParameterRow name={name} values={values} />
              ))}
            {title === 'General Parameters' && !showDither ? (
              <button type="submit" name="action" value="open_dither">
                Open Dither
              </button>
            ) : null}
          </fieldset>
        ))}

        <fieldset>
          <legend>Submission</legend>
          {SUBMISSION_KINDS.map(([kind, text]) => (
            <div>
              <input type="radio" name="submission_kind" value={kind} checked={kind === props.kind} />
              {text}
            </div>
          ))}
          <div>
            <label for="multiobsid">Apply the same change to obsids</label>
            <input type="text" name="multiobsid" value={props.multiobsid} />
          </div>
          <div>
            <label for="comment">Comment</label>
            <textarea name="comment" rows={3} cols={80}>
              {props.comment}
            </textarea>
          </div>
          <button type="submit" name="action" value="refresh">
            Refresh
          </button>
          <button type="submit" name="action" value="submit">
            Submit
          </button>
        </fieldset>
      </form>
    </Layout>
  )
}

interface ConfirmPageProps {
  user: User
  obsid: number
  state: SubmissionState
  warnings: string[]
}

export function ConfirmPage({ user, obsid, state, warnings }: ConfirmPageProps) {
  const changed = Object.keys(state.requested)
  return (
    <Layout title={`Confirm Submission: ${obsid}`} user={user}>
      <p>
        Submission kind: <strong>{state.kind}</strong>
      </p>
      {warnings.map((warning) => (
        <p class="warning">{warning}</p>
      ))}
      {changed.length > 0 ? (
        <table>
          <tr>
            <th>Parameter</th>
            <th>Original</th>
            <th>Requested</th>
          </tr>
          {changed.map((name) => (
            <tr class="changed">
              <td>{labelFor(name)}</td>
              <td>{displayValue(state.original[name])}</td>
              <td>{displayValue(state.requested[name])}</td>
            </tr>
          ))}
        </table>
      ) : null}
      {state.multiobsid.length > 0 ? <p>Also applied to: {state.multiobsid.join(', ')}</p> : null}
      {state.comment ? <p>Comment: {state.comment}</p> : null}
      <form method="post" action={`/ocatdatapage/${obsid}`}>
        <input type="hidden" name="form_state" value={JSON.stringify(state)} />
        <button type="submit" name="action" value="previous_page">
          Previous Page
        </button>
        <button type="submit" name="action" value="finalize">
          Finalize
        </button>
      </form>
    </Layout>
  )
}

interface FinalizedPageProps {
  user: User
  created: Array<{ obsidrev: string; kind: RevisionKind }>
  skipped: string[]
}

export function FinalizedPage({ user, created, skipped }: FinalizedPageProps) {
  return (
    <Layout title="Submission Complete" user={user}>
      <ul>
        {created.map((entry) => (
          <li>
            <a href={`/chkupdata/${entry.obsidrev}`}>{entry.obsidrev}</a> ({entry.kind})
          </li>
        ))}
      </ul>
      {skipped.map((message) => (
        <p class="warning">{message}</p>
      ))}
      <p>
        <a href="/orupdate/">Go to the status page</a>
      </p>
    </Layout>
  )
}
