/**
 * @fileoverview Shared fixtures for service and page tests
 *
 * @description
 * Runs both stores in one in-process Postgres (PGlite): the Usint tables and
 * the Ocat catalog tables do not overlap, so a single instance serves both
 * handles. Tests reset the data between cases with `resetData`.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PGlite } from '@electric-sql/pglite'
import { sql } from 'drizzle-orm'
import { drizzle } from 'drizzle-orm/pglite'
import {
  applySqlFile,
  ocatSchema,
  ocatTables,
  seedParameters,
  users,
  usintSchema,
  type NewUser,
  type OcatDatabase,
  type User,
  type UsintDatabase,
} from '@usint/db'
import { PROFILES, type UsintConfig } from '../config.js'
import type { AppDeps } from '../deps.js'
import type { EmailMessage, Mailer } from '../services/emailing.js'

export type TestDatabases = {
  db: UsintDatabase
  ocat: OcatDatabase
  close: () => Promise<void>
}

export async function createTestDatabases(): Promise<TestDatabases> {
  const client = new PGlite()
  const db: UsintDatabase = drizzle(client, { schema: usintSchema })
  const ocat: OcatDatabase = drizzle(client, { schema: ocatSchema })
  await applySqlFile(db, 'usint')
  await seedParameters(db)
  await applySqlFile(ocat, 'ocat')
  return { db, ocat, close: () => client.close() }
}

const DATA_TABLES = [
  'originals',
  'requests',
  'signoffs',
  'revisions',
  'schedules',
  'users',
  'target',
  'rollreq',
  'timereq',
  'too',
  'hrcparam',
  'acisparam',
  'aciswin',
  'phasereq',
  'dither',
  'sim',
  'soe',
  'prop_info',
  'view_pi',
  'view_coi',
]

/** Empty every table except the parameter catalog. */
export async function resetData(db: UsintDatabase) {
  await db.execute(sql.raw(`TRUNCATE ${DATA_TABLES.map((table) => `"${table}"`).join(', ')} RESTART IDENTITY CASCADE`))
}

// ============================================
// Users
// ============================================

export const TEST_USERS: NewUser[] = [
  { username: 'alice', email: 'alice@example.org', groups: 'usint', fullName: 'Alice Tester' },
  { username: 'bob', email: 'bob@example.org', groups: 'usint,arcops', fullName: 'Bob Tester' },
  { username: 'carol', email: 'carol@example.org', groups: 'usint', fullName: 'Carol Tester', isActive: false },
]

export type SeededUsers = {
  alice: User
  bob: User
  carol: User
}

export async function seedUsers(db: UsintDatabase): Promise<SeededUsers> {
  const rows = await db.insert(users).values(TEST_USERS).returning()
  const find = (username: string): User => {
    const user = rows.find((row) => row.username === username)
    if (!user) throw new Error(`Seed user ${username} missing`)
    return user
  }
  return { alice: find('alice'), bob: find('bob'), carol: find('carol') }
}

// ============================================
// Ocat catalog
// ============================================

type TargetInsert = typeof ocatTables.target.$inferInsert

export const BASE_TARGET = {
  obsid: 23456,
  targid: 1,
  seq_nbr: '500123',
  targname: 'NGC 1234',
  obj_flag: 'NO',
  object: 'NONE',
  si_mode: 'TE_0041A',
  photometry_flag: 'N',
  ra: 150.5,
  dec: -30.25,
  est_cnt_rate: 0.5,
  y_det_offset: 0,
  z_det_offset: 0,
  dither_flag: 'Y',
  approved_exposure_time: 20,
  rem_exp_time: 20,
  instrument: 'ACIS-S',
  grating: 'NONE',
  type: 'GO',
  status: 'unobserved',
  acisid: 9001,
  ocat_propid: 700,
  roll_flag: 'N',
  window_flag: 'N',
  spwindow_flag: 'N',
  remarks: 'Original remark',
  mp_remarks: 'Original comment',
} satisfies TargetInsert

/**
 * Insert a catalog observation with its ACIS, dither and proposal rows.
 */
export async function seedTarget(ocat: OcatDatabase, overrides: Partial<TargetInsert> = {}) {
  const row: TargetInsert = { ...BASE_TARGET, ...overrides }
  await ocat.insert(ocatTables.target).values(row)
  if (typeof row.acisid === 'number') {
    await ocat
      .insert(ocatTables.acisparam)
      .values({ acisid: row.acisid, exp_mode: 'TE', ccdi0_on: 'N', ccds3_on: 'Y', frame_time: 3.2 })
      .onConflictDoNothing()
  }
  await ocat
    .insert(ocatTables.dither)
    .values({ obsid: row.obsid, y_amp: 0.002, y_freq: 0.0005, y_phase: 0, z_amp: 0.002, z_freq: 0.0004, z_phase: 0 })
  if (typeof row.ocat_propid === 'number') {
    await ocat
      .insert(ocatTables.propInfo)
      .values({ ocat_propid: row.ocat_propid, ao_str: '26', prop_num: '26200123', title: 'Test Proposal', joint: 'None' })
      .onConflictDoNothing()
    await ocat.insert(ocatTables.viewPi).values({ ocat_propid: row.ocat_propid, last: 'Placeholder' })
  }
  return row
}

// ============================================
// Mail, config and the OBS_SS directory
// ============================================

export type RecordingMailer = Mailer & { sent: EmailMessage[] }

export function createRecordingMailer(): RecordingMailer {
  const sent: EmailMessage[] = []
  return {
    sent,
    async send(message) {
      sent.push(message)
    },
  }
}

export function createFailingMailer(): Mailer {
  return {
    async send() {
      throw new Error('sendmail unavailable')
    },
  }
}

export type ObsSsFiles = {
  mpLongTerm?: string
  scheduledObsList?: string
}

export async function createObsSsDir(files: ObsSsFiles = {}) {
  const dir = await mkdtemp(join(tmpdir(), 'usint-obs-ss-'))
  if (files.mpLongTerm !== undefined) await writeFile(join(dir, 'mp_long_term'), files.mpLongTerm)
  if (files.scheduledObsList !== undefined) await writeFile(join(dir, 'scheduled_obs_list'), files.scheduledObsList)
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}

export function createTestConfig(overrides: Partial<UsintConfig> = {}): UsintConfig {
  return { ...PROFILES.localhost, testNotifications: true, ...overrides }
}

/** Clock fixed at Wed Mar 05 2025 12:00 local time. */
export const TEST_NOW = new Date(2025, 2, 5, 12, 0, 0)

export function createTestDeps(databases: TestDatabases, overrides: Partial<AppDeps> = {}): AppDeps {
  return {
    db: databases.db,
    ocat: databases.ocat,
    mailer: createRecordingMailer(),
    config: createTestConfig(),
    now: () => TEST_NOW,
    ...overrides,
  }
}

// ============================================
// Requests
// ============================================

export function formBody(fields: Record<string, string>): URLSearchParams {
  return new URLSearchParams(fields)
}

export function pageHeaders(username = 'alice', extra: Record<string, string> = {}): Record<string, string> {
  return {
    'x-remote-user': username,
    'content-type': 'application/x-www-form-urlencoded',
    ...extra,
  }
}

/** Cookie header carrying every cookie a response set. */
export function cookiesFrom(response: Response): string {
  return response.headers
    .getSetCookie()
    .map((cookie) => cookie.split(';')[0])
    .join('; ')
}
