import type { User } from '@usint/db'
import { Layout } from './layout.js'

const PAGES = [
  { href: '/ocatdatapage/', name: 'Ocat Data Page', description: 'Edit the parameters of an observation.' },
  { href: '/chkupdata/', name: 'Parameter Check Page', description: 'Review a submitted revision.' },
  { href: '/orupdate/', name: 'Target Parameter Status Page', description: 'Sign off open revisions.' },
  { href: '/express/', name: 'Express Approval Page', description: 'Approve a list of observations as is.' },
  { href: '/rm_submission/', name: 'Remove Submission Page', description: 'Take back a recent revision or signoff.' },
  { href: '/scheduler/', name: 'TOO Duty Schedule', description: 'Sign up for target of opportunity duty.' },
]

interface IndexPageProps {
  user: User
  flashes: string[]
}

export function IndexPage({ user, flashes }: IndexPageProps) {
  return (
    <Layout title="Usint Observation Parameter Pages" user={user} flashes={flashes}>
      <ul>
        {PAGES.map((page) => (
          <li>
            <a href={page.href}>{page.name}</a>: {page.description}
          </li>
        ))}
      </ul>
    </Layout>
  )
}
