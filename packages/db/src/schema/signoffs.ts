import { uniqueIndex } from 'drizzle-orm/pg-core'
import { pgTable } from 'drizzle-orm/pg-core'
import { id, intRef, signoffAt, signoffBy, signoffStatus } from './_common.js'
import { revisions } from './revisions.js'
import { users } from './users.js'

/**
 * signoffs
 *
 * Approval state of a revision, one row per revision. Each of the five
 * columns (general, acis, acis_si, hrc_si, usint) records a status, who
 * signed and when.
 */
export const signoffs = pgTable('signoffs', {
  id: id(),
  revisionId: intRef('revision_id')
    .references(() => revisions.id, { onDelete: 'cascade' })
    .notNull(),

  generalStatus: signoffStatus('general'),
  generalSignoffId: signoffBy('general').references(() => users.id),
  generalTime: signoffAt('general'),

  acisStatus: signoffStatus('acis'),
  acisSignoffId: signoffBy('acis').references(() => users.id),
  acisTime: signoffAt('acis'),

  acisSiStatus: signoffStatus('acis_si'),
  acisSiSignoffId: signoffBy('acis_si').references(() => users.id),
  acisSiTime: signoffAt('acis_si'),

  hrcSiStatus: signoffStatus('hrc_si'),
  hrcSiSignoffId: signoffBy('hrc_si').references(() => users.id),
  hrcSiTime: signoffAt('hrc_si'),

  usintStatus: signoffStatus('usint'),
  usintSignoffId: signoffBy('usint').references(() => users.id),
  usintTime: signoffAt('usint'),
}, (table) => ({
  signoffsRevisionUnique: uniqueIndex('signoffs_revision_id_unique').on(table.revisionId),
}))

export type Signoff = typeof signoffs.$inferSelect
export type NewSignoff = typeof signoffs.$inferInsert
