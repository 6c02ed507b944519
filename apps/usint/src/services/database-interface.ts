/**
 * Reads and writes against the Usint store: revisions, their signoffs and
 * parameter values, plus the TOO duty schedule.
 *
 * Every function takes the database handle first so that a transaction can be
 * passed in its place.
 */

import { and, asc, desc, eq, gt, gte, inArray, lte, max, sql, type SQL } from 'drizzle-orm'
import { addDays, differenceInSeconds, startOfDay, subDays, subHours } from 'date-fns'
import {
  parameterOriginals,
  parameterRequests,
  parameters,
  revisions,
  schedules,
  signoffs,
  users,
  type NewRevision,
  type NewSignoff,
  type Parameter,
  type ParameterValue,
  type Revision,
  type RevisionKind,
  type RevisionNotes,
  type Schedule,
  type Signoff,
  type SignoffStatus,
  type User,
  type UsintDatabase,
} from '@usint/db'
import {
  formatObsidRev,
  modifiableParams,
  SIGNOFF_COLUMNS,
  signoffParams,
  type RemovalColumn,
  type SignoffColumn,
  type SignoffKind,
} from '@usint/schema'
import { NotFoundError, RemovalNotAllowedError, ScheduleEditError, UnknownParameterError } from '../errors.js'
import { createLogger } from '../lib/log.js'
import {
  coerceNumber,
  getNextWeekday,
  isLargeCoordShift,
  isNullMarker,
  isOpen,
  parseDatetime,
  signoffPatch,
  signoffState,
  type OcatData,
} from './helpers.js'

const log = createLogger('dbi')

/** Window in which a user may take back their own revision or signoff. */
export const REVERSIBLE_HOURS = 36

const TEN_DAYS_IN_SECONDS = 10 * 86400

export type StatusRow = {
  revision: Revision
  signoff: Signoff
}

export type ReviewColumn = Exclude<SignoffColumn, 'usint'>

// ============================================
// Lookups
// ============================================

export async function userByName(db: UsintDatabase, username: string): Promise<User | null> {
  const user = await db.query.users.findFirst({ where: eq(users.username, username) })
  return user ?? null
}

export async function userById(db: UsintDatabase, id: number): Promise<User | null> {
  const user = await db.query.users.findFirst({ where: eq(users.id, id) })
  return user ?? null
}

export async function listUsers(db: UsintDatabase): Promise<User[]> {
  return db.select().from(users).orderBy(asc(users.username))
}

/**
 * Fetch a parameter by name. Throws UnknownParameterError when it is not in
 * the parameter table.
 */
export async function pullParam(db: UsintDatabase, name: string): Promise<Parameter> {
  const [parameter] = await db.select().from(parameters).where(eq(parameters.name, name))
  if (!parameter) throw new UnknownParameterError(name)
  return parameter
}

async function pullParams(db: UsintDatabase, names: string[]): Promise<Map<string, Parameter>> {
  if (names.length === 0) return new Map()
  const rows = await db.select().from(parameters).where(inArray(parameters.name, names))
  const byName = new Map(rows.map((row) => [row.name, row]))
  for (const name of names) {
    if (!byName.has(name)) throw new UnknownParameterError(name)
  }
  return byName
}

// ============================================
// Revision history
// ============================================

/** Next revision number for an obsid; numbering starts at 1. */
export async function findNextRevNo(db: UsintDatabase, obsid: number): Promise<number> {
  const [row] = await db
    .select({ latest: max(revisions.revisionNumber) })
    .from(revisions)
    .where(eq(revisions.obsid, obsid))
  return (row?.latest ?? 0) + 1
}

/**
 * An obsid is approved when its most recent `asis`/`remove` revision is an
 * `asis`.
 */
export async function isApproved(db: UsintDatabase, obsid: number): Promise<boolean> {
  const history = await db
    .select({ kind: revisions.kind })
    .from(revisions)
    .where(eq(revisions.obsid, obsid))
    .orderBy(asc(revisions.revisionNumber))

  let approved = false
  for (const { kind } of history) {
    if (kind === 'asis') approved = true
    else if (kind === 'remove') approved = false
  }
  return approved
}

export async function hasOpenRevision(db: UsintDatabase, obsid: number): Promise<boolean> {
  const rows = await db
    .select({ signoff: signoffs })
    .from(revisions)
    .innerJoin(signoffs, eq(signoffs.revisionId, revisions.id))
    .where(eq(revisions.obsid, obsid))
  return rows.some(({ signoff }) => isOpen(signoff))
}

export type RevisionFilters = {
  obsid?: number
  kind?: RevisionKind
  userId?: number
  before?: Date
  after?: Date
  limit?: number
  order?: 'asc' | 'desc'
}

export async function pullRevision(db: UsintDatabase, filters: RevisionFilters = {}): Promise<Revision[]> {
  const conditions: SQL[] = []
  if (filters.obsid !== undefined) conditions.push(eq(revisions.obsid, filters.obsid))
  if (filters.kind !== undefined) conditions.push(eq(revisions.kind, filters.kind))
  if (filters.userId !== undefined) conditions.push(eq(revisions.userId, filters.userId))
  if (filters.before !== undefined) conditions.push(lte(revisions.time, filters.before))
  if (filters.after !== undefined) conditions.push(gte(revisions.time, filters.after))

  const query = db
    .select()
    .from(revisions)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(filters.order === 'desc' ? desc(revisions.id) : asc(revisions.id))
  return filters.limit !== undefined ? query.limit(filters.limit) : query
}

export type StatusOrder = {
  limit?: number
  /** List this user's revisions first. */
  orderUser?: number
  /** Sort the most recent revisions by obsid, newest revision first. */
  orderObsid?: boolean
}

/**
 * Recent revisions with their signoffs for the status page, newest first
 * unless another order is requested.
 */
export async function pullStatus(db: UsintDatabase, options: StatusOrder = {}): Promise<StatusRow[]> {
  const limit = options.limit ?? 200
  const selection = { revision: revisions, signoff: signoffs }

  if (options.orderUser !== undefined) {
    return db
      .select(selection)
      .from(revisions)
      .innerJoin(signoffs, eq(signoffs.revisionId, revisions.id))
      .orderBy(sql`case when ${revisions.userId} = ${options.orderUser} then 0 else 1 end`, desc(revisions.id))
      .limit(limit)
  }

  if (options.orderObsid) {
    const recent = db
      .select({ id: revisions.id })
      .from(revisions)
      .orderBy(desc(revisions.id))
      .limit(limit)
      .as('recent')
    return db
      .select(selection)
      .from(revisions)
      .innerJoin(recent, eq(revisions.id, recent.id))
      .innerJoin(signoffs, eq(signoffs.revisionId, revisions.id))
      .orderBy(asc(revisions.obsid), desc(revisions.revisionNumber))
  }

  return db
    .select(selection)
    .from(revisions)
    .innerJoin(signoffs, eq(signoffs.revisionId, revisions.id))
    .orderBy(desc(revisions.id))
    .limit(limit)
}

export type RevisionDetail = {
  revision: Revision
  user: User
  signoff: Signoff
  signers: Record<SignoffColumn, User | null>
  requests: Record<string, ParameterValue>
  originals: Record<string, ParameterValue>
}

/**
 * Revision with its signoff and parameter values, as shown on the check page.
 */
export async function pullRevisionDetail(db: UsintDatabase, obsid: number, revisionNumber: number): Promise<RevisionDetail> {
  const found = await db.query.revisions.findFirst({
    where: and(eq(revisions.obsid, obsid), eq(revisions.revisionNumber, revisionNumber)),
    with: {
      user: true,
      signoff: true,
      requests: { with: { parameter: true } },
      originals: { with: { parameter: true } },
    },
  })
  if (!found || !found.signoff) {
    throw new NotFoundError(`Revision ${obsid}.${revisionNumber} not found`)
  }

  const { user, signoff, requests, originals, ...revision } = found

  const signerIds = SIGNOFF_COLUMNS.map((column) => signoffState(signoff, column).signoffId).filter(
    (id): id is number => id !== null,
  )
  const signerRows = signerIds.length > 0 ? await db.select().from(users).where(inArray(users.id, signerIds)) : []
  const byId = new Map(signerRows.map((row) => [row.id, row]))
  const signerFor = (column: SignoffColumn): User | null => {
    const id = signoffState(signoff, column).signoffId
    return id === null ? null : (byId.get(id) ?? null)
  }
  const signers: Record<SignoffColumn, User | null> = {
    general: signerFor('general'),
    acis: signerFor('acis'),
    acis_si: signerFor('acis_si'),
    hrc_si: signerFor('hrc_si'),
    usint: signerFor('usint'),
  }

  return {
    revision,
    user,
    signoff,
    signers,
    requests: Object.fromEntries(requests.map((row): [string, ParameterValue] => [row.parameter.name, row.value ?? null])),
    originals: Object.fromEntries(originals.map((row): [string, ParameterValue] => [row.parameter.name, row.value ?? null])),
  }
}

// ============================================
// Revision construction
// ============================================

export type NotesContext = {
  onOrList: boolean
  now: Date
}

/**
 * Warning flags for a `norm` revision. Returns null when nothing applies.
 */
export function constructNotes(
  ocatData: OcatData,
  original: OcatData,
  requested: OcatData,
  context: NotesContext,
): RevisionNotes | null {
  const notes: RevisionNotes = {}

  const scheduled = ocatData.soe_st_sched_date ?? ocatData.lts_lt_plan ?? null
  if (typeof scheduled === 'string') {
    const when = parseDatetime(scheduled)
    if (when && differenceInSeconds(when, context.now) < TEN_DAYS_IN_SECONDS) {
      notes.obsdate_under10 = true
    }
  }
  if (context.onOrList) notes.on_or_list = true

  for (const parameter of Object.keys(requested)) {
    switch (parameter) {
      case 'targname':
        notes.target_name_change = true
        break
      case 'comments':
        notes.comment_change = true
        break
      case 'instrument':
        notes.instrument_change = true
        break
      case 'grating':
        notes.grating_change = true
        break
      case 'dither_flag':
      case 'window_flag':
      case 'roll_flag':
      case 'spwindow_flag':
        notes.flag_change = true
        break
    }
  }

  if ('ra' in requested || 'dec' in requested) {
    const asNumber = (value: ParameterValue | undefined) => (typeof value === 'number' ? value : null)
    const ora = asNumber(original.ra ?? ocatData.ra)
    const odec = asNumber(original.dec ?? ocatData.dec)
    const ra = asNumber(requested.ra) ?? ora
    const dec = asNumber(requested.dec) ?? odec
    if (ora !== 0 && odec !== 0 && isLargeCoordShift(ra, dec, ora, odec)) {
      notes.large_coordinate_change = true
    }
  }

  return Object.keys(notes).length > 0 ? notes : null
}

export type RevisionInput = {
  obsid: number
  ocatData: OcatData
  kind: RevisionKind
  user: User
  original?: OcatData
  requested?: OcatData
  /** Whether the obsid is on the active OR list. */
  onOrList?: boolean
  now?: Date
}

export async function constructRevision(db: UsintDatabase, input: RevisionInput): Promise<NewRevision> {
  const now = input.now ?? new Date()
  const sequenceNumber = coerceNumber(input.ocatData.seq_nbr ?? null)
  return {
    obsid: input.obsid,
    revisionNumber: await findNextRevNo(db, input.obsid),
    kind: input.kind,
    sequenceNumber: typeof sequenceNumber === 'number' ? sequenceNumber : 0,
    time: now,
    userId: input.user.id,
    notes:
      input.kind === 'norm'
        ? constructNotes(input.ocatData, input.original ?? {}, input.requested ?? {}, {
            onOrList: input.onOrList ?? false,
            now,
          })
        : null,
  }
}

/**
 * `Pending` for every review column whose parameter list contains a
 * requested parameter.
 */
export function determineSignoff(requested: OcatData): Record<ReviewColumn, SignoffStatus> {
  const needs = (column: ReviewColumn): SignoffStatus =>
    signoffParams(column).some((parameter) => parameter in requested) ? 'Pending' : 'Not Required'
  return {
    general: needs('general'),
    acis: needs('acis'),
    acis_si: needs('acis_si'),
    hrc_si: needs('hrc_si'),
  }
}

/** Signoff signed by usint on creation, used for `asis` and `remove`. */
export function constructAutoSignoff(revisionId: number, userId: number, now: Date): NewSignoff {
  return {
    revisionId,
    generalStatus: 'Not Required',
    acisStatus: 'Not Required',
    acisSiStatus: 'Not Required',
    hrcSiStatus: 'Not Required',
    usintStatus: 'Signed',
    usintSignoffId: userId,
    usintTime: now,
  }
}

export function constructSignoff(
  revision: Pick<Revision, 'id' | 'kind' | 'userId'>,
  requested: OcatData = {},
  now: Date = new Date(),
): NewSignoff {
  switch (revision.kind) {
    case 'asis':
    case 'remove':
      return constructAutoSignoff(revision.id, revision.userId, now)
    case 'clone':
      // Splits are handled by ArcOps and verified by usint.
      return {
        revisionId: revision.id,
        generalStatus: 'Pending',
        acisStatus: 'Not Required',
        acisSiStatus: 'Not Required',
        hrcSiStatus: 'Not Required',
        usintStatus: 'Pending',
      }
    case 'norm': {
      const status = determineSignoff(requested)
      return {
        revisionId: revision.id,
        generalStatus: status.general,
        acisStatus: status.acis,
        acisSiStatus: status.acis_si,
        hrcSiStatus: status.hrc_si,
        usintStatus: 'Pending',
      }
    }
  }
}

type ParameterRow = typeof parameterRequests.$inferInsert

async function constructParameterRows(
  db: UsintDatabase,
  revisionId: number,
  values: OcatData,
  skipNull: boolean,
): Promise<ParameterRow[]> {
  const tracked = new Set(modifiableParams())
  const entries = Object.entries(values)
    .map(([name, value]): [string, ParameterValue] => [name, isNullMarker(value) ? null : value])
    .filter(([name, value]) => tracked.has(name) && !(skipNull && value === null))
  const byName = await pullParams(
    db,
    entries.map(([name]) => name),
  )
  return entries.map(([name, value]) => {
    const parameter = byName.get(name)
    if (!parameter) throw new UnknownParameterError(name)
    return { revisionId, parameterId: parameter.id, value }
  })
}

/** Requested values, one row per tracked parameter. */
export function constructRequests(db: UsintDatabase, revisionId: number, requested: OcatData): Promise<ParameterRow[]> {
  return constructParameterRows(db, revisionId, requested, false)
}

/** Original values; nulls are implied by absence and not stored. */
export function constructOriginals(db: UsintDatabase, revisionId: number, original: OcatData): Promise<ParameterRow[]> {
  return constructParameterRows(db, revisionId, original, true)
}

/**
 * Insert a revision with its signoff, requests and originals in one
 * transaction.
 */
export async function createRevision(db: UsintDatabase, input: RevisionInput): Promise<StatusRow> {
  const now = input.now ?? new Date()
  const requested = input.requested ?? {}
  const original = input.original ?? {}

  const created = await db.transaction(async (tx) => {
    const [revision] = await tx
      .insert(revisions)
      .values(await constructRevision(tx, { ...input, now }))
      .returning()
    const [signoff] = await tx.insert(signoffs).values(constructSignoff(revision, requested, now)).returning()

    const requestRows = await constructRequests(tx, revision.id, requested)
    if (requestRows.length > 0) await tx.insert(parameterRequests).values(requestRows)
    const originalRows = await constructOriginals(tx, revision.id, original)
    if (originalRows.length > 0) await tx.insert(parameterOriginals).values(originalRows)

    return { revision, signoff }
  })

  log.info(
    `Created ${created.revision.kind} revision ${created.revision.obsid}.${created.revision.revisionNumber} by ${input.user.username}`,
  )
  return created
}

// ============================================
// Signoffs and removals
// ============================================

export type SignoffResult = StatusRow & {
  /** Follow-up `asis` revision created by an `approve` signoff. */
  approval: Revision | null
}

function columnForKind(kind: SignoffKind): SignoffColumn {
  if (kind === 'gen') return 'general'
  if (kind === 'approve') return 'usint'
  return kind
}

/**
 * Sign one column of a signoff. `approve` signs usint and also records the
 * obsid as approved with an `asis` revision.
 */
export async function performSignoff(
  db: UsintDatabase,
  signoffId: number,
  kind: SignoffKind,
  user: User,
  now: Date = new Date(),
): Promise<SignoffResult> {
  const result = await db.transaction(async (tx) => {
    const [row] = await tx
      .select({ revision: revisions, signoff: signoffs })
      .from(signoffs)
      .innerJoin(revisions, eq(signoffs.revisionId, revisions.id))
      .where(eq(signoffs.id, signoffId))
    if (!row) throw new NotFoundError(`Signoff ${signoffId} not found`)

    const column = columnForKind(kind)
    const [signoff] = await tx
      .update(signoffs)
      .set(signoffPatch(column, { status: 'Signed', signoffId: user.id, time: now }))
      .where(eq(signoffs.id, signoffId))
      .returning()

    let approval: Revision | null = null
    if (kind === 'approve') {
      const [created] = await tx
        .insert(revisions)
        .values({
          obsid: row.revision.obsid,
          revisionNumber: await findNextRevNo(tx, row.revision.obsid),
          kind: 'asis',
          sequenceNumber: row.revision.sequenceNumber,
          time: now,
          userId: user.id,
          notes: null,
        })
        .returning()
      await tx.insert(signoffs).values(constructAutoSignoff(created.id, user.id, now))
      approval = created
    }
    return { revision: row.revision, signoff, approval }
  })

  log.info(`${user.username} signed ${kind} for ${result.revision.obsid}.${result.revision.revisionNumber}`)
  return result
}

/**
 * Columns the user may still take back: their own signoffs and, while nothing
 * is signed, their own revision. Both only within the last 36 hours.
 */
export function findReversibleColumns(revision: Revision, signoff: Signoff, user: User, now: Date = new Date()): RemovalColumn[] {
  const cutoff = subHours(now, REVERSIBLE_HOURS).getTime()
  const reversible: RemovalColumn[] = []

  for (const column of SIGNOFF_COLUMNS) {
    const state = signoffState(signoff, column)
    if (state.signoffId === user.id && state.time !== null && state.time.getTime() >= cutoff) {
      reversible.push(column)
    }
  }

  const nothingSigned = SIGNOFF_COLUMNS.every((column) => signoffState(signoff, column).status !== 'Signed')
  if (revision.userId === user.id && revision.time.getTime() >= cutoff && nothingSigned) {
    reversible.push('revision')
  }
  return reversible
}

export type RemovalInput = {
  revisionId: number
  signoffId: number
  column: RemovalColumn
  user: User
  now?: Date
}

/**
 * Delete a revision or reset one signoff column to Pending.
 */
export async function removeSubmission(db: UsintDatabase, input: RemovalInput): Promise<StatusRow> {
  const now = input.now ?? new Date()
  const removed = await db.transaction(async (tx) => {
    const [row] = await tx
      .select({ revision: revisions, signoff: signoffs })
      .from(signoffs)
      .innerJoin(revisions, eq(signoffs.revisionId, revisions.id))
      .where(and(eq(signoffs.id, input.signoffId), eq(revisions.id, input.revisionId)))
    if (!row) {
      throw new NotFoundError(`Revision ${input.revisionId} with signoff ${input.signoffId} not found`)
    }

    const reversible = findReversibleColumns(row.revision, row.signoff, input.user, now)
    if (!reversible.includes(input.column)) {
      throw new RemovalNotAllowedError(
        `${input.column} of ${formatObsidRev(row.revision.obsid, row.revision.revisionNumber)} cannot be removed by ${input.user.username}`,
      )
    }

    if (input.column === 'revision') {
      await tx.delete(revisions).where(eq(revisions.id, input.revisionId))
      return row
    }
    const [signoff] = await tx
      .update(signoffs)
      .set(signoffPatch(input.column, { status: 'Pending', signoffId: null, time: null }))
      .where(eq(signoffs.id, input.signoffId))
      .returning()
    return { revision: row.revision, signoff }
  })

  log.info(
    `${input.user.username} removed ${input.column} of ${removed.revision.obsid}.${removed.revision.revisionNumber}`,
  )
  return removed
}

// ============================================
// TOO duty schedule
// ============================================

export type ScheduleRow = {
  schedule: Schedule
  user: User | null
}

/** Periods that end on or after `from`, in calendar order. */
export async function pullSchedule(db: UsintDatabase, options: { from?: Date } = {}): Promise<ScheduleRow[]> {
  const from = startOfDay(options.from ?? new Date())
  return db
    .select({ schedule: schedules, user: users })
    .from(schedules)
    .leftJoin(users, eq(schedules.userId, users.id))
    .where(gte(schedules.stop, from))
    .orderBy(asc(schedules.start))
}

async function findSchedule(db: UsintDatabase, scheduleId: number): Promise<Schedule> {
  const [schedule] = await db.select().from(schedules).where(eq(schedules.id, scheduleId))
  if (!schedule) throw new NotFoundError(`Schedule ${scheduleId} not found`)
  return schedule
}

/** Assign a period to `assignee`. A period taken by someone else must be unlocked first. */
export async function signupSchedule(
  db: UsintDatabase,
  scheduleId: number,
  assignee: User,
  assigner: User = assignee,
): Promise<Schedule> {
  const schedule = await findSchedule(db, scheduleId)
  if (schedule.userId !== null && schedule.userId !== assignee.id) {
    throw new ScheduleEditError('This period is already taken. Unlock it first.')
  }
  const [updated] = await db
    .update(schedules)
    .set({ userId: assignee.id, assignerId: assigner.id })
    .where(eq(schedules.id, scheduleId))
    .returning()
  log.info(`${assigner.username} assigned schedule ${scheduleId} to ${assignee.username}`)
  return updated
}

/** Clear an assignment. Only the assigned user or whoever assigned it may do so. */
export async function unlockSchedule(db: UsintDatabase, scheduleId: number, user: User): Promise<Schedule> {
  const schedule = await findSchedule(db, scheduleId)
  if (schedule.userId !== null && schedule.userId !== user.id && schedule.assignerId !== user.id) {
    throw new ScheduleEditError('Only the assigned user or the assigner can unlock this period.')
  }
  const [updated] = await db
    .update(schedules)
    .set({ userId: null, assignerId: null })
    .where(eq(schedules.id, scheduleId))
    .returning()
  log.info(`${user.username} unlocked schedule ${scheduleId}`)
  return updated
}

/**
 * Divide a period so that `at` starts a new, unassigned period. Periods are
 * whole days: `start` and `stop` are the first and last day covered.
 */
export async function splitSchedule(db: UsintDatabase, scheduleId: number, at: Date): Promise<[Schedule, Schedule]> {
  const splitDay = startOfDay(at)
  return db.transaction(async (tx) => {
    const schedule = await findSchedule(tx, scheduleId)
    if (splitDay.getTime() <= schedule.start.getTime() || splitDay.getTime() > schedule.stop.getTime()) {
      throw new ScheduleEditError('The split date must fall after the first day of the period and within it.')
    }
    const orderId = schedule.orderId ?? 0

    await tx
      .update(schedules)
      .set({ orderId: sql`${schedules.orderId} + 1` })
      .where(gt(schedules.orderId, orderId))
    const [first] = await tx
      .update(schedules)
      .set({ stop: subDays(splitDay, 1) })
      .where(eq(schedules.id, scheduleId))
      .returning()
    const [second] = await tx
      .insert(schedules)
      .values({ orderId: orderId + 1, userId: null, start: splitDay, stop: schedule.stop })
      .returning()
    return [first, second]
  })
}

/**
 * Append `weeks` weekly periods, starting the day after the last period ends
 * or on the next Monday when the schedule is empty.
 */
export async function addSchedulePeriods(
  db: UsintDatabase,
  options: { weeks?: number; now?: Date } = {},
): Promise<Schedule[]> {
  const weeks = options.weeks ?? 4
  const [last] = await db.select().from(schedules).orderBy(desc(schedules.stop)).limit(1)
  const [{ lastOrder }] = await db.select({ lastOrder: max(schedules.orderId) }).from(schedules)

  const first = last ? addDays(startOfDay(last.stop), 1) : getNextWeekday(1, options.now)
  const values = Array.from({ length: weeks }, (_, week) => {
    const start = addDays(first, week * 7)
    return {
      orderId: (lastOrder ?? 0) + week + 1,
      userId: null,
      start,
      stop: addDays(start, 6),
    }
  })
  if (values.length === 0) return []
  return db.insert(schedules).values(values).returning()
}
