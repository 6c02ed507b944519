import { integer, serial, timestamp } from 'drizzle-orm/pg-core'
import { signoffStatusEnum } from './enums.js'

/** Serial primary key shared by every Usint table. */
export const id = () => serial('id').primaryKey()

/** Timestamp helper (UTC timestamptz). */
export const at = (name: string) => timestamp(name, { withTimezone: true })

/** Integer FK helper for `users.id` style references. */
export const intRef = (name: string) => integer(name)

/**
 * Column triple recorded for one signoff column:
 * - `<prefix>_status`: Signed / Not Required / Pending / Discard
 * - `<prefix>_signoff_id`: user who signed, null until signed
 * - `<prefix>_time`: when it was signed, null until signed
 */
export const signoffStatus = (prefix: string) => signoffStatusEnum(`${prefix}_status`).notNull()
export const signoffBy = (prefix: string) => intRef(`${prefix}_signoff_id`)
export const signoffAt = (prefix: string) => at(`${prefix}_time`)
