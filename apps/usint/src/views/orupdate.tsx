import type { Signoff, User } from '@usint/db'
import { formatObsidRev, SIGNOFF_COLUMN_LABELS, SIGNOFF_COLUMNS, type SignoffColumn, type SignoffKind } from '@usint/schema'
import type { StatusRow } from '../services/database-interface.js'
import { formatDatetime, signoffState, USINT_DATETIME_FORMAT } from '../services/helpers.js'
import { Layout } from './layout.js'

const KIND_FOR_COLUMN: Record<SignoffColumn, SignoffKind> = {
  general: 'gen',
  acis: 'acis',
  acis_si: 'acis_si',
  hrc_si: 'hrc_si',
  usint: 'usint',
}

export type StatusOrderName = 'submission' | 'obsid' | 'username'

function SignoffCell({ signoff, column, usernames, approved }: {
  signoff: Signoff
  column: SignoffColumn
  usernames: Map<number, string>
  approved?: boolean
}) {
  const state = signoffState(signoff, column)
  if (state.status === 'Pending' && approved !== undefined) {
    return (
      <td>
        <form method="post" action={`/orupdate/${signoff.id}/${KIND_FOR_COLUMN[column]}`}>
          <button type="submit">Signoff</button>
        </form>
        {column === 'usint' ? (
          <form method="post" action={`/orupdate/${signoff.id}/approve`}>
            <button type="submit">{approved ? 'Signoff (approved)' : 'Signoff and Approve'}</button>
          </form>
        ) : null}
      </td>
    )
  }
  const signer = state.signoffId !== null ? usernames.get(state.signoffId) : undefined
  return (
    <td>
      {state.status}
      {signer ? ` by ${signer}` : ''}
      {state.time ? ` ${formatDatetime(state.time, USINT_DATETIME_FORMAT)}` : ''}
    </td>
  )
}

function StatusTable({ rows, usernames, colors, approvals }: {
  rows: StatusRow[]
  usernames: Map<number, string>
  colors?: Map<number, string>
  approvals?: Map<number, boolean>
}) {
  return (
    <table>
      <tr>
        <th>Obsid.Rev</th>
        <th>Kind</th>
        <th>Submitter</th>
        <th>Submitted</th>
        {SIGNOFF_COLUMNS.map((column) => (
          <th>{SIGNOFF_COLUMN_LABELS[column]}</th>
        ))}
      </tr>
      {rows.map(({ revision, signoff }) => {
        const obsidrev = formatObsidRev(revision.obsid, revision.revisionNumber)
        const color = colors?.get(revision.obsid)
        return (
          <tr style={color ? `background-color: ${color}` : undefined}>
            <td>
              <a href={`/chkupdata/${obsidrev}`}>{obsidrev}</a>
            </td>
            <td>{revision.kind}</td>
            <td>{usernames.get(revision.userId) ?? revision.userId}</td>
            <td>{formatDatetime(revision.time, USINT_DATETIME_FORMAT)}</td>
            {SIGNOFF_COLUMNS.map((column) => (
              <SignoffCell
                signoff={signoff}
                column={column}
                usernames={usernames}
                approved={approvals ? (approvals.get(revision.obsid) ?? false) : undefined}
              />
            ))}
          </tr>
        )
      })}
    </table>
  )
}

interface StatusPageProps {
  user: User
  flashes: string[]
  open: StatusRow[]
  closed: StatusRow[]
  colors: Map<number, string>
  approvals: Map<number, boolean>
  usernames: Map<number, string>
  order: StatusOrderName
}

export function StatusPage(props: StatusPageProps) {
  return (
    <Layout title="Target Parameter Status Page" user={props.user} flashes={props.flashes}>
      <form method="post" action="/orupdate/">
        Order by:{' '}
        <button type="submit" name="order" value="submission">
          Submission
        </button>{' '}
        <button type="submit" name="order" value="obsid">
          Obsid
        </button>{' '}
        <button type="submit" name="order" value="username">
          Username
        </button>{' '}
        <input type="text" name="username" value={props.user.username} /> (current: {props.order})
      </form>

      <h2>Open Revisions</h2>
      <StatusTable rows={props.open} usernames={props.usernames} colors={props.colors} approvals={props.approvals} />

      <h2>Closed in the Last 36 Hours</h2>
      <StatusTable rows={props.closed} usernames={props.usernames} />
    </Layout>
  )
}
