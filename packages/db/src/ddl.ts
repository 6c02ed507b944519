import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { sql } from 'drizzle-orm'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { z } from 'zod'
import { parameters } from './schema/parameters.js'

export type SqlFileName = 'usint' | 'ocat'

const STATEMENT_BREAKPOINT = '--> statement-breakpoint'

/**
 * Apply one of the DDL files under `packages/db/sql`.
 *
 * Statements are separated by drizzle-kit's breakpoint marker and executed one
 * at a time, which keeps the file usable on drivers that reject multi-statement
 * queries.
 */
export async function applySqlFile<TSchema extends Record<string, unknown>>(
  db: PgDatabase<PgQueryResultHKT, TSchema>,
  name: SqlFileName,
): Promise<number> {
  const path = fileURLToPath(new URL(`../sql/${name}.sql`, import.meta.url))
  const content = await readFile(path, 'utf-8')
  const statements = content
    .split(STATEMENT_BREAKPOINT)
    .map((statement) => statement.trim())
    .filter(Boolean)

  for (const statement of statements) {
    await db.execute(sql.raw(statement))
  }
  return statements.length
}

const parameterSeedSchema = z.array(
  z.object({
    name: z.string().min(1).max(64),
    isModifiable: z.boolean(),
    dataType: z.enum(['str', 'int', 'float', 'ranks']),
    description: z.string(),
  }),
)

export type ParameterSeed = z.infer<typeof parameterSeedSchema>

export async function loadParameterSeed(): Promise<ParameterSeed> {
  const path = fileURLToPath(new URL('../data/parameters.json', import.meta.url))
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'))
  return parameterSeedSchema.parse(raw)
}

/**
 * Insert (or refresh) the parameter catalog rows.
 */
export async function seedParameters<TSchema extends Record<string, unknown>>(
  db: PgDatabase<PgQueryResultHKT, TSchema>,
): Promise<number> {
  const seed = await loadParameterSeed()
  await db
    .insert(parameters)
    .values(seed)
    .onConflictDoUpdate({
      target: parameters.name,
      set: {
        isModifiable: sql`excluded.is_modifiable`,
        dataType: sql`excluded.data_type`,
        description: sql`excluded.description`,
      },
    })
  return seed.length
}
