import { jsonb, pgTable, text, uniqueIndex, varchar } from 'drizzle-orm/pg-core'
import { boolean } from 'drizzle-orm/pg-core'
import { id, intRef } from './_common.js'
import { revisions } from './revisions.js'

/**
 * JSON value stored for a parameter: scalars for plain parameters, arrays of
 * records for rank parameters (time_ranks, roll_ranks, window_ranks).
 */
export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue }

/**
 * parameters
 *
 * Catalog of the Ocat parameter names that revisions can reference.
 */
export const parameters = pgTable('parameters', {
  id: id(),
  name: varchar('name', { length: 64 }).notNull(),
  isModifiable: boolean('is_modifiable').notNull(),
  dataType: varchar('data_type', { length: 32 }).notNull(),
  description: text('description').notNull(),
}, (table) => ({
  parametersNameUnique: uniqueIndex('parameters_name_unique').on(table.name),
}))

/**
 * requests
 *
 * Requested parameter values attached to a revision.
 */
export const parameterRequests = pgTable('requests', {
  id: id(),
  revisionId: intRef('revision_id')
    .references(() => revisions.id, { onDelete: 'cascade' })
    .notNull(),
  parameterId: intRef('parameter_id')
    .references(() => parameters.id)
    .notNull(),
  value: jsonb('value').$type<ParameterValue>(),
})

/**
 * originals
 *
 * Ocat values at the time of the revision. Nulls are not stored: a missing
 * row for a parameter means the original value was null.
 */
export const parameterOriginals = pgTable('originals', {
  id: id(),
  revisionId: intRef('revision_id')
    .references(() => revisions.id, { onDelete: 'cascade' })
    .notNull(),
  parameterId: intRef('parameter_id')
    .references(() => parameters.id)
    .notNull(),
  value: jsonb('value').$type<ParameterValue>(),
})

export type Parameter = typeof parameters.$inferSelect
export type NewParameter = typeof parameters.$inferInsert
export type ParameterRequest = typeof parameterRequests.$inferSelect
export type ParameterOriginal = typeof parameterOriginals.$inferSelect
