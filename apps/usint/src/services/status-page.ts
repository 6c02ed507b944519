import { subHours } from 'date-fns'
import type { StatusRow } from './database-interface.js'
import { REVERSIBLE_HOURS } from './database-interface.js'
import { isOpen } from './helpers.js'

export type StatusPartition = {
  open: StatusRow[]
  /** Closed revisions submitted within the last 36 hours. */
  closed: StatusRow[]
  /** Highlight color per obsid with two or more open revisions. */
  colors: Map<number, string>
}

/**
 * Split status rows into open and recently closed revisions, keeping the
 * query order, and hand out highlight colors in turn to obsids with several
 * open revisions.
 */
export function partitionStatus(rows: StatusRow[], palette: string[], now: Date = new Date()): StatusPartition {
  const cutoff = subHours(now, REVERSIBLE_HOURS).getTime()
  const open: StatusRow[] = []
  const closed: StatusRow[] = []
  const openCounts = new Map<number, number>()
  const colors = new Map<number, string>()

  for (const row of rows) {
    const obsid = row.revision.obsid
    if (isOpen(row.signoff)) {
      open.push(row)
      const count = (openCounts.get(obsid) ?? 0) + 1
      openCounts.set(obsid, count)
      if (count === 2 && palette.length > 0) {
        colors.set(obsid, palette[colors.size % palette.length])
      }
    } else if (row.revision.time.getTime() >= cutoff) {
      closed.push(row)
    }
  }
  return { open, closed, colors }
}
