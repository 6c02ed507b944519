import { index, uniqueIndex } from 'drizzle-orm/pg-core'
import { integer, jsonb, pgTable } from 'drizzle-orm/pg-core'
import { at, id, intRef } from './_common.js'
import { revisionKindEnum } from './enums.js'
import { users } from './users.js'

/**
 * Warning flags recorded on a `norm` revision. Absent keys mean false.
 */
export type RevisionNotes = {
  target_name_change?: boolean
  comment_change?: boolean
  instrument_change?: boolean
  grating_change?: boolean
  /** Any dither/time/roll/ACIS window flag changed. */
  flag_change?: boolean
  /** Cumulative RA/Dec shift above 8 arcminutes. */
  large_coordinate_change?: boolean
  /** Scheduled or planned observation date within 10 days of the revision. */
  obsdate_under10?: boolean
  /** Obsid is on the active OR list. */
  on_or_list?: boolean
}

/**
 * revisions
 *
 * One row per submitted change to an obsid. `revision_number` counts from 1
 * per obsid; `<obsid>.<revision_number>` is the user facing identifier.
 */
export const revisions = pgTable('revisions', {
  id: id(),
  obsid: integer('obsid').notNull(),
  revisionNumber: integer('revision_number').notNull(),
  kind: revisionKindEnum('kind').notNull(),
  sequenceNumber: integer('sequence_number').notNull(),
  time: at('time').defaultNow().notNull(),
  notes: jsonb('notes').$type<RevisionNotes>(),
  userId: intRef('user_id')
    .references(() => users.id)
    .notNull(),
}, (table) => ({
  revisionsObsidRevisionUnique: uniqueIndex('revisions_obsid_revision_number_unique').on(
    table.obsid,
    table.revisionNumber,
  ),
  revisionsTimeIdx: index('revisions_time_idx').on(table.time),
  revisionsUserIdx: index('revisions_user_id_idx').on(table.userId),
}))

export type Revision = typeof revisions.$inferSelect
export type NewRevision = typeof revisions.$inferInsert
