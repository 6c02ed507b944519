import { index, pgTable } from 'drizzle-orm/pg-core'
import { integer } from 'drizzle-orm/pg-core'
import { at, id, intRef } from './_common.js'
import { users } from './users.js'

/**
 * schedules
 *
 * TOO duty sign-up periods. `order_id` is the position of the period in the
 * sheet so that neighbouring periods can be fetched and renumbered after a
 * split.
 */
export const schedules = pgTable('schedules', {
  id: id(),
  orderId: integer('order_id'),
  userId: intRef('user_id').references(() => users.id),
  start: at('start').notNull(),
  stop: at('stop').notNull(),
  /** User who made the assignment (may differ from the assignee). */
  assignerId: integer('assigner_id'),
}, (table) => ({
  schedulesStartIdx: index('schedules_start_idx').on(table.start),
}))

export type Schedule = typeof schedules.$inferSelect
export type NewSchedule = typeof schedules.$inferInsert
