import { drizzle } from 'drizzle-orm/node-postgres'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import pg from 'pg'

// Common utilities
export * from './schema/_common.js'
export * from './schema/enums.js'

// Usint store
export * from './schema/users.js'
export * from './schema/revisions.js'
export * from './schema/signoffs.js'
export * from './schema/parameters.js'
export * from './schema/schedules.js'
export * from './schema/relations.js'

// Ocat catalog mirror
export * as ocatTables from './ocat/schema.js'
export type { TargetRow } from './ocat/schema.js'

export { applySqlFile, seedParameters, loadParameterSeed } from './ddl.js'
export type { SqlFileName, ParameterSeed } from './ddl.js'

import * as enumsSchema from './schema/enums.js'
import * as usersSchema from './schema/users.js'
import * as revisionsSchema from './schema/revisions.js'
import * as signoffsSchema from './schema/signoffs.js'
import * as parametersSchema from './schema/parameters.js'
import * as schedulesSchema from './schema/schedules.js'
import * as relationsSchema from './schema/relations.js'
import * as ocatSchemaModule from './ocat/schema.js'

/**
 * Drizzle schema registry for the local revision-tracking store.
 */
export const usintSchema = {
  ...enumsSchema,
  ...usersSchema,
  ...revisionsSchema,
  ...signoffsSchema,
  ...parametersSchema,
  ...schedulesSchema,
  ...relationsSchema,
}

/**
 * Drizzle schema registry for the read-only observation catalog.
 */
export const ocatSchema = { ...ocatSchemaModule }

/**
 * Driver-independent handles. Production code runs on node-postgres; tests
 * hand in an in-process Postgres through the same type.
 */
export type UsintDatabase = PgDatabase<PgQueryResultHKT, typeof usintSchema>
export type OcatDatabase = PgDatabase<PgQueryResultHKT, typeof ocatSchema>

export type DatabaseHandle<TDatabase> = {
  db: TDatabase
  pool: pg.Pool
}

export function createUsintDatabase(connectionString: string): DatabaseHandle<UsintDatabase> {
  const pool = new pg.Pool({ connectionString })
  return { db: drizzle(pool, { schema: usintSchema }), pool }
}

/**
 * The catalog connection is read-only: every session starts in a read-only
 * transaction mode so a stray write fails at the server.
 */
export function createOcatDatabase(connectionString: string): DatabaseHandle<OcatDatabase> {
  const pool = new pg.Pool({
    connectionString,
    options: '-c default_transaction_read_only=on',
  })
  return { db: drizzle(pool, { schema: ocatSchema }), pool }
}

export async function checkDatabaseConnection(pool: pg.Pool): Promise<boolean> {
  const client = await pool.connect()
  try {
    await client.query('SELECT 1')
    return true
  } finally {
    client.release()
  }
}
