import type { User } from '@usint/db'
import { Layout } from './layout.js'

interface ExpressEntryPageProps {
  user: User
  flashes: string[]
  multiobsid: string
}

export function ExpressEntryPage({ user, flashes, multiobsid }: ExpressEntryPageProps) {
  return (
    <Layout title="Express Approval Page" user={user} flashes={flashes}>
      <p>Enter obsids separated by spaces or commas. Ranges such as 23456-23460 are expanded.</p>
      <form method="post" action="/express/">
        <textarea name="multiobsid" rows={4} cols={80}>
          {multiobsid}
        </textarea>
        <div>
          <button type="submit" name="action" value="submit">
            Submit
          </button>
        </div>
      </form>
    </Layout>
  )
}

export type ExpressRow = {
  obsid: number
  seqNbr: string
  targname: string
  approved: boolean
  openRevision: boolean
}

interface ExpressConfirmPageProps {
  user: User
  rows: ExpressRow[]
  missing: number[]
  multiobsid: string
}

export function ExpressConfirmPage({ user, rows, missing, multiobsid }: ExpressConfirmPageProps) {
  return (
    <Layout title="Express Approval: Confirm" user={user}>
      <table>
        <tr>
          <th>Obsid</th>
          <th>Sequence Number</th>
          <th>Target</th>
          <th>Currently Approved</th>
          <th>Note</th>
        </tr>
        {rows.map((row) => (
          <tr>
            <td>{row.obsid}</td>
            <td>{row.seqNbr}</td>
            <td>{row.targname}</td>
            <td>{row.approved ? 'Yes' : 'No'}</td>
            <td class="warning">{row.openRevision ? 'Has an open revision' : ''}</td>
          </tr>
        ))}
      </table>
      {missing.length > 0 ? <p class="error">Not found in the Ocat: {missing.join(', ')}</p> : null}
      <form method="post" action="/express/">
        <input type="hidden" name="obsids" value={rows.map((row) => row.obsid).join(',')} />
        <input type="hidden" name="multiobsid" value={multiobsid} />
        <button type="submit" name="action" value="previous_page">
          Previous Page
        </button>
        {rows.length > 0 ? (
          <button type="submit" name="action" value="finalize">
            Finalize
          </button>
        ) : null}
      </form>
    </Layout>
  )
}

interface ExpressDonePageProps {
  user: User
  approved: string[]
  problems: string[]
}

export function ExpressDonePage({ user, approved, problems }: ExpressDonePageProps) {
  return (
    <Layout title="Express Approval: Complete" user={user}>
      <p>Approved as is:</p>
      <ul>
        {approved.map((obsidrev) => (
          <li>
            <a href={`/chkupdata/${obsidrev}`}>{obsidrev}</a>
          </li>
        ))}
      </ul>
      {problems.map((problem) => (
        <p class="warning">{problem}</p>
      ))}
    </Layout>
  )
}
