import { pgEnum } from 'drizzle-orm/pg-core'

/**
 * Revision kinds.
 *
 * - norm: parameter change request
 * - asis: approve the obsid as is
 * - remove: take the obsid off the approved list
 * - clone: split request handled by ArcOps
 */
export const revisionKindEnum = pgEnum('revision_kind', ['norm', 'asis', 'remove', 'clone'])

export const signoffStatusEnum = pgEnum('signoff_status', [
  'Signed',
  'Not Required',
  'Pending',
  'Discard',
])

export type RevisionKind = (typeof revisionKindEnum.enumValues)[number]
export type SignoffStatus = (typeof signoffStatusEnum.enumValues)[number]
