import type { User } from '@usint/db'
import { formatObsidRev, SIGNOFF_COLUMN_LABELS, SIGNOFF_COLUMNS, type RemovalColumn } from '@usint/schema'
import type { StatusRow } from '../services/database-interface.js'
import { formatDatetime, signoffState, USINT_DATETIME_FORMAT } from '../services/helpers.js'
import { Layout } from './layout.js'

export type RemovalEntry = StatusRow & {
  reversible: RemovalColumn[]
}

function RemoveButton({ entry, column }: { entry: RemovalEntry; column: RemovalColumn }) {
  return (
    <form method="post" action={`/rm_submission/${entry.revision.id}/${entry.signoff.id}/${column}`}>
      <button type="submit">Remove</button>
    </form>
  )
}

interface RemovalPageProps {
  user: User
  flashes: string[]
  entries: RemovalEntry[]
  canRemove: boolean
}

export function RemovalPage({ user, flashes, entries, canRemove }: RemovalPageProps) {
  return (
    <Layout title="Remove Submission Page" user={user} flashes={flashes}>
      <p>
        {canRemove
          ? 'Your revisions and signoffs from the last 36 hours can be taken back below.'
          : 'You have nothing to remove. The most recent submissions are listed below.'}
      </p>
      <table>
        <tr>
          <th>Obsid.Rev</th>
          <th>Kind</th>
          <th>Submitted</th>
          <th>Revision</th>
          {SIGNOFF_COLUMNS.map((column) => (
            <th>{SIGNOFF_COLUMN_LABELS[column]}</th>
          ))}
        </tr>
        {entries.map((entry) => {
          const obsidrev = formatObsidRev(entry.revision.obsid, entry.revision.revisionNumber)
          return (
            <tr>
              <td>
                <a href={`/chkupdata/${obsidrev}`}>{obsidrev}</a>
              </td>
              <td>{entry.revision.kind}</td>
              <td>{formatDatetime(entry.revision.time, USINT_DATETIME_FORMAT)}</td>
              <td>{entry.reversible.includes('revision') ? <RemoveButton entry={entry} column="revision" /> : ''}</td>
              {SIGNOFF_COLUMNS.map((column) => (
                <td>
                  {signoffState(entry.signoff, column).status}
                  {entry.reversible.includes(column) ? <RemoveButton entry={entry} column={column} /> : ''}
                </td>
              ))}
            </tr>
          )
        })}
      </table>
    </Layout>
  )
}
