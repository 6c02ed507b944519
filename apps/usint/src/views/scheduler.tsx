import type { User } from '@usint/db'
import type { ScheduleRow } from '../services/database-interface.js'
import { formatDatetime } from '../services/helpers.js'
import { Layout } from './layout.js'

const DAY_FORMAT = 'EEE MMM dd yyyy'

interface SchedulerPageProps {
  user: User
  flashes: string[]
  rows: ScheduleRow[]
  users: User[]
}

export function SchedulerPage({ user, flashes, rows, users }: SchedulerPageProps) {
  const active = users.filter((candidate) => candidate.isActive)
  return (
    <Layout title="TOO Duty Schedule" user={user} flashes={flashes}>
      <table>
        <tr>
          <th>#</th>
          <th>Period</th>
          <th>On duty</th>
          <th>Assign</th>
          <th>Split on</th>
        </tr>
        {rows.map(({ schedule, user: assignee }) => (
          <tr>
            <td>{schedule.orderId ?? ''}</td>
            <td>
              {formatDatetime(schedule.start, DAY_FORMAT)} - {formatDatetime(schedule.stop, DAY_FORMAT)}
            </td>
            <td>{assignee ? (assignee.fullName ?? assignee.username) : 'TBD'}</td>
            <td>
              <form method="post" action="/scheduler/">
                <input type="hidden" name="id" value={String(schedule.id)} />
                {assignee ? (
                  <button type="submit" name="action" value="unlock">
                    Unlock
                  </button>
                ) : (
                  <>
                    <select name="username">
                      {active.map((candidate) => (
                        <option value={candidate.username} selected={candidate.id === user.id}>
                          {candidate.username}
                        </option>
                      ))}
                    </select>{' '}
                    <button type="submit" name="action" value="signup">
                      Sign up
                    </button>
                  </>
                )}
              </form>
            </td>
            <td>
              <form method="post" action="/scheduler/">
                <input type="hidden" name="id" value={String(schedule.id)} />
                <input type="date" name="date" />{' '}
                <button type="submit" name="action" value="split">
                  Split
                </button>
              </form>
            </td>
          </tr>
        ))}
      </table>

      <form method="post" action="/scheduler/">
        Add <input type="number" name="weeks" value="4" min="1" max="52" /> weeks{' '}
        <button type="submit" name="action" value="add">
          Add
        </button>
      </form>
    </Layout>
  )
}
