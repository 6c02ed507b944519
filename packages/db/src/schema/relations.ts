import { relations } from 'drizzle-orm'
import { parameterOriginals, parameterRequests, parameters } from './parameters.js'
import { revisions } from './revisions.js'
import { schedules } from './schedules.js'
import { signoffs } from './signoffs.js'
import { users } from './users.js'

export const usersRelations = relations(users, ({ many }) => ({
  revisions: many(revisions),
  schedules: many(schedules),
}))

export const revisionsRelations = relations(revisions, ({ one, many }) => ({
  user: one(users, { fields: [revisions.userId], references: [users.id] }),
  signoff: one(signoffs),
  requests: many(parameterRequests),
  originals: many(parameterOriginals),
}))

export const signoffsRelations = relations(signoffs, ({ one }) => ({
  revision: one(revisions, { fields: [signoffs.revisionId], references: [revisions.id] }),
}))

export const parametersRelations = relations(parameters, ({ many }) => ({
  requests: many(parameterRequests),
  originals: many(parameterOriginals),
}))

export const parameterRequestsRelations = relations(parameterRequests, ({ one }) => ({
  revision: one(revisions, { fields: [parameterRequests.revisionId], references: [revisions.id] }),
  parameter: one(parameters, { fields: [parameterRequests.parameterId], references: [parameters.id] }),
}))

export const parameterOriginalsRelations = relations(parameterOriginals, ({ one }) => ({
  revision: one(revisions, { fields: [parameterOriginals.revisionId], references: [revisions.id] }),
  parameter: one(parameters, { fields: [parameterOriginals.parameterId], references: [parameters.id] }),
}))

export const schedulesRelations = relations(schedules, ({ one }) => ({
  user: one(users, { fields: [schedules.userId], references: [users.id] }),
}))
