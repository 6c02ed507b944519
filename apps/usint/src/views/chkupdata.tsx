import type { User } from '@usint/db'
import { formatObsidRev, labelFor, modifiableParams, SIGNOFF_COLUMN_LABELS, SIGNOFF_COLUMNS } from '@usint/schema'
import type { RevisionDetail } from '../services/database-interface.js'
import { approxEquals, formatDatetime, signoffState, USINT_DATETIME_FORMAT } from '../services/helpers.js'
import { Layout } from './layout.js'
import { noteMessages } from './notes.js'
import { displayValue } from './ocatdatapage.js'

interface ObsidRevEntryPageProps {
  user: User
  flashes: string[]
}

export function ObsidRevEntryPage({ user, flashes }: ObsidRevEntryPageProps) {
  return (
    <Layout title="Parameter Check Page" user={user} flashes={flashes}>
      <form method="post" action="/chkupdata/">
        <label for="obsidrev">Obsid.Rev</label>
        <input type="text" name="obsidrev" placeholder="23456.001" />
        <button type="submit">Check</button>
      </form>
    </Layout>
  )
}

/** Requested and original parameters in form order, requested names first seen. */
function parameterOrder(detail: RevisionDetail): string[] {
  const present = new Set([...Object.keys(detail.requests), ...Object.keys(detail.originals)])
  const ordered = modifiableParams().filter((name) => present.has(name))
  const extra = [...present].filter((name) => !ordered.includes(name)).sort()
  return [...ordered, ...extra]
}

interface RevisionDetailPageProps {
  user: User
  flashes: string[]
  detail: RevisionDetail
}

export function RevisionDetailPage({ user, flashes, detail }: RevisionDetailPageProps) {
  const { revision, signoff } = detail
  const obsidrev = formatObsidRev(revision.obsid, revision.revisionNumber)
  return (
    <Layout title={`Parameter Check Page: ${obsidrev}`} user={user} flashes={flashes}>
      <table>
        <tr>
          <th>Kind</th>
          <td>{revision.kind}</td>
        </tr>
        <tr>
          <th>Sequence Number</th>
          <td>{revision.sequenceNumber}</td>
        </tr>
        <tr>
          <th>Submitted By</th>
          <td>{detail.user.username}</td>
        </tr>
        <tr>
          <th>Submitted</th>
          <td>{formatDatetime(revision.time, USINT_DATETIME_FORMAT)}</td>
        </tr>
      </table>

      {noteMessages(revision.notes).map((message) => (
        <p class="warning">{message}</p>
      ))}

      <h2>Signoff Status</h2>
      <table>
        <tr>
          <th>Column</th>
          <th>Status</th>
          <th>Signed By</th>
          <th>Time</th>
        </tr>
        {SIGNOFF_COLUMNS.map((column) => {
          const state = signoffState(signoff, column)
          return (
            <tr>
              <td>{SIGNOFF_COLUMN_LABELS[column]}</td>
              <td>{state.status}</td>
              <td>{detail.signers[column]?.username ?? ''}</td>
              <td>{state.time ? formatDatetime(state.time, USINT_DATETIME_FORMAT) : ''}</td>
            </tr>
          )
        })}
      </table>

      <h2>Parameters</h2>
      <table>
        <tr>
          <th>Parameter</th>
          <th>Original</th>
          <th>Requested</th>
        </tr>
        {parameterOrder(detail).map((name) => {
          const original = detail.originals[name] ?? null
          const requested = name in detail.requests ? detail.requests[name] : original
          return (
            <tr class={approxEquals(original, requested) ? '' : 'changed'}>
              <td>{labelFor(name)}</td>
              <td>{displayValue(original)}</td>
              <td>{displayValue(requested)}</td>
            </tr>
          )
        })}
      </table>
    </Layout>
  )
}
