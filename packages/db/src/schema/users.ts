import { uniqueIndex } from 'drizzle-orm/pg-core'
import { boolean, pgTable, varchar } from 'drizzle-orm/pg-core'
import { id } from './_common.js'

/**
 * users
 *
 * Staff allowed into the application. Identity comes from the front web
 * server (REMOTE_USER), so there is no credential material here.
 */
export const users = pgTable('users', {
  id: id(),

  /** LDAP username passed through as REMOTE_USER. */
  username: varchar('username', { length: 64 }).notNull(),

  isActive: boolean('is_active').default(true).notNull(),

  email: varchar('email', { length: 255 }),

  /** Comma separated group names (usint, arcops, acis, hrc...). */
  groups: varchar('groups', { length: 255 }),

  fullName: varchar('full_name', { length: 255 }),
}, (table) => ({
  usersUsernameUnique: uniqueIndex('users_username_unique').on(table.username),
}))

export type User = typeof users.$inferSelect
export type NewUser = typeof users.$inferInsert
