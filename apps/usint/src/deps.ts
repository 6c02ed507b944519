import type { OcatDatabase, UsintDatabase } from '@usint/db'
import type { UsintConfig } from './config.js'
import type { Mailer } from './services/emailing.js'

/**
 * Everything the routes need from the outside world. The server wires real
 * connections; tests hand in in-process databases and a recording mailer.
 */
export type AppDeps = {
  db: UsintDatabase
  ocat: OcatDatabase
  mailer: Mailer
  config: UsintConfig
  /** Clock used for revision and signoff times. */
  now?: () => Date
}

export function currentTime(deps: AppDeps): Date {
  return deps.now ? deps.now() : new Date()
}
