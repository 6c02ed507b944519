/**
 * @fileoverview Usint store tests
 *
 * @description
 * Revisions, signoffs, removals and the TOO duty schedule against the Usint
 * DDL loaded into an in-process Postgres.
 *
 * @architecture
 * Tests: src/services/__tests__/database-interface.test.ts
 * Tests: database-interface.ts
 */

import { afterAll, beforeAll, beforeEach, describe, it, expect } from 'vitest'
import { addHours } from 'date-fns'
import { NotFoundError, RemovalNotAllowedError, ScheduleEditError, UnknownParameterError } from '../../errors.js'
import {
  addSchedulePeriods,
  constructNotes,
  constructSignoff,
  createRevision,
  determineSignoff,
  findNextRevNo,
  findReversibleColumns,
  hasOpenRevision,
  isApproved,
  listUsers,
  performSignoff,
  pullParam,
  pullRevision,
  pullRevisionDetail,
  pullSchedule,
  pullStatus,
  removeSubmission,
  signupSchedule,
  splitSchedule,
  unlockSchedule,
  userByName,
  type RevisionInput,
} from '../database-interface.js'
import type { OcatData } from '../helpers.js'
import {
  createTestDatabases,
  resetData,
  seedUsers,
  TEST_NOW,
  type SeededUsers,
  type TestDatabases,
} from '../../test/helpers.js'

const OCAT_DATA: OcatData = {
  obsid: 23456,
  seq_nbr: '500123',
  targname: 'NGC 1234',
  ra: 150.5,
  dec: -30.25,
  si_mode: 'TE_0041A',
  soe_st_sched_date: null,
  lts_lt_plan: null,
}

describe('database-interface.ts', () => {
  let databases: TestDatabases
  let people: SeededUsers

  beforeAll(async () => {
    databases = await createTestDatabases()
  })

  afterAll(async () => {
    await databases.close()
  })

  beforeEach(async () => {
    await resetData(databases.db)
    people = await seedUsers(databases.db)
  })

  function revisionInput(overrides: Partial<RevisionInput> = {}): RevisionInput {
    return {
      obsid: 23456,
      ocatData: OCAT_DATA,
      kind: 'norm',
      user: people.alice,
      original: { targname: 'NGC 1234' },
      requested: { targname: 'NGC 9999' },
      now: TEST_NOW,
      ...overrides,
    }
  }

  describe('lookups', () => {
    it('finds users by name and lists them alphabetically', async () => {
      expect((await userByName(databases.db, 'bob'))?.email).toBe('bob@example.org')
      expect(await userByName(databases.db, 'nobody')).toBeNull()
      expect((await listUsers(databases.db)).map((user) => user.username)).toEqual(['alice', 'bob', 'carol'])
    })

    it('rejects parameters missing from the parameter table', async () => {
      expect((await pullParam(databases.db, 'targname')).description).toBe('Target Name')
      await expect(pullParam(databases.db, 'not_a_parameter')).rejects.toBeInstanceOf(UnknownParameterError)
    })
  })

  describe('createRevision', () => {
    it('numbers revisions per obsid starting at 1', async () => {
      expect(await findNextRevNo(databases.db, 23456)).toBe(1)

      const first = await createRevision(databases.db, revisionInput())
      const second = await createRevision(databases.db, revisionInput())
      const other = await createRevision(databases.db, revisionInput({ obsid: 23457 }))

      expect(first.revision.revisionNumber).toBe(1)
      expect(second.revision.revisionNumber).toBe(2)
      expect(other.revision.revisionNumber).toBe(1)
      expect(first.revision.sequenceNumber).toBe(500123)
    })

    it('requires signoffs only for the columns whose parameters changed', async () => {
      const { revision, signoff } = await createRevision(
        databases.db,
        revisionInput({
          original: { targname: 'NGC 1234', si_mode: 'TE_0041A' },
          requested: { targname: 'NGC 9999', si_mode: 'TE_0042B' },
        }),
      )

      expect(revision.notes).toEqual({ target_name_change: true })
      expect(signoff.generalStatus).toBe('Pending')
      expect(signoff.acisStatus).toBe('Not Required')
      expect(signoff.acisSiStatus).toBe('Pending')
      expect(signoff.hrcSiStatus).toBe('Not Required')
      expect(signoff.usintStatus).toBe('Pending')
    })

    it('stores requested nulls but not original nulls', async () => {
      await createRevision(
        databases.db,
        revisionInput({
          original: { remarks: null, ra: 150.5, obsid: 23456 },
          requested: { remarks: 'None', ra: 151 },
        }),
      )

      const detail = await pullRevisionDetail(databases.db, 23456, 1)

      expect(detail.requests).toEqual({ remarks: null, ra: 151 })
      expect(detail.originals).toEqual({ ra: 150.5 })
      expect(detail.user.username).toBe('alice')
      expect(detail.signers.usint).toBeNull()
    })

    it('keeps rank values as lists', async () => {
      const ranks = [{ roll_constraint: 'Y', roll_180: 'N', roll: 90, roll_tolerance: 10 }]
      await createRevision(
        databases.db,
        revisionInput({ original: { roll_ranks: null }, requested: { roll_flag: 'Y', roll_ranks: ranks } }),
      )

      const detail = await pullRevisionDetail(databases.db, 23456, 1)

      expect(detail.requests.roll_ranks).toEqual(ranks)
      expect(detail.revision.notes).toEqual({ flag_change: true })
    })

    it('signs asis and remove revisions for usint on creation', async () => {
      const { signoff } = await createRevision(databases.db, revisionInput({ kind: 'asis', original: {}, requested: {} }))

      expect(signoff.usintStatus).toBe('Signed')
      expect(signoff.usintSignoffId).toBe(people.alice.id)
      expect(signoff.usintTime).toEqual(TEST_NOW)
      expect(signoff.generalStatus).toBe('Not Required')
    })

    it('raises NotFoundError for a missing revision', async () => {
      await expect(pullRevisionDetail(databases.db, 23456, 9)).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('constructNotes', () => {
    it('flags near observations, the OR list and large coordinate moves', () => {
      const notes = constructNotes(
        { ...OCAT_DATA, soe_st_sched_date: 'Mar 10 2025 03:00PM' },
        { ra: 150.5 },
        { ra: 150.75 },
        { onOrList: true, now: TEST_NOW },
      )

      expect(notes).toEqual({ obsdate_under10: true, on_or_list: true, large_coordinate_change: true })
    })

    it('falls back to the long term plan date', () => {
      const notes = constructNotes(
        { ...OCAT_DATA, lts_lt_plan: 'Apr 30 2025 03:00PM' },
        {},
        { comments: 'New comment' },
        { onOrList: false, now: TEST_NOW },
      )

      expect(notes).toEqual({ comment_change: true })
    })

    it('returns null when nothing applies', () => {
      expect(constructNotes(OCAT_DATA, {}, { remarks: 'x' }, { onOrList: false, now: TEST_NOW })).toBeNull()
    })
  })

  describe('constructSignoff', () => {
    it('routes splits to general and usint', () => {
      const signoff = constructSignoff({ id: 5, kind: 'clone', userId: 1 })
      expect(signoff).toEqual({
        revisionId: 5,
        generalStatus: 'Pending',
        acisStatus: 'Not Required',
        acisSiStatus: 'Not Required',
        hrcSiStatus: 'Not Required',
        usintStatus: 'Pending',
      })
    })

    it('determines review columns from the requested parameters', () => {
      expect(determineSignoff({ hrc_si_mode: 'DEFAULT', window_ranks: null })).toEqual({
        general: 'Not Required',
        acis: 'Pending',
        acis_si: 'Not Required',
        hrc_si: 'Pending',
      })
    })
  })

  describe('approval state', () => {
    it('follows the latest asis or remove revision', async () => {
      expect(await isApproved(databases.db, 23456)).toBe(false)

      await createRevision(databases.db, revisionInput({ kind: 'asis' }))
      expect(await isApproved(databases.db, 23456)).toBe(true)

      await createRevision(databases.db, revisionInput())
      expect(await isApproved(databases.db, 23456)).toBe(true)

      await createRevision(databases.db, revisionInput({ kind: 'remove' }))
      expect(await isApproved(databases.db, 23456)).toBe(false)
    })

    it('reports open revisions', async () => {
      await createRevision(databases.db, revisionInput({ kind: 'asis' }))
      expect(await hasOpenRevision(databases.db, 23456)).toBe(false)

      await createRevision(databases.db, revisionInput())
      expect(await hasOpenRevision(databases.db, 23456)).toBe(true)
    })
  })

  describe('performSignoff', () => {
    it('signs one column', async () => {
      const created = await createRevision(databases.db, revisionInput())

      const result = await performSignoff(databases.db, created.signoff.id, 'gen', people.bob, TEST_NOW)

      expect(result.signoff.generalStatus).toBe('Signed')
      expect(result.signoff.generalSignoffId).toBe(people.bob.id)
      expect(result.signoff.generalTime).toEqual(TEST_NOW)
      expect(result.signoff.usintStatus).toBe('Pending')
      expect(result.approval).toBeNull()
    })

    it('approves the obsid with a follow-up asis revision', async () => {
      const created = await createRevision(databases.db, revisionInput())
      await performSignoff(databases.db, created.signoff.id, 'gen', people.bob, TEST_NOW)

      const result = await performSignoff(databases.db, created.signoff.id, 'approve', people.bob, TEST_NOW)

      expect(result.signoff.usintStatus).toBe('Signed')
      expect(result.approval?.kind).toBe('asis')
      expect(result.approval?.revisionNumber).toBe(2)
      expect(result.approval?.sequenceNumber).toBe(500123)
      expect(await isApproved(databases.db, 23456)).toBe(true)
      expect(await hasOpenRevision(databases.db, 23456)).toBe(false)
    })

    it('raises NotFoundError for an unknown signoff', async () => {
      await expect(performSignoff(databases.db, 999, 'gen', people.bob)).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('removals', () => {
    it('lets the submitter take back an unsigned revision within 36 hours', async () => {
      const { revision, signoff } = await createRevision(databases.db, revisionInput())

      expect(findReversibleColumns(revision, signoff, people.alice, TEST_NOW)).toEqual(['revision'])
      expect(findReversibleColumns(revision, signoff, people.bob, TEST_NOW)).toEqual([])
      expect(findReversibleColumns(revision, signoff, people.alice, addHours(TEST_NOW, 37))).toEqual([])
    })

    it('lets a signer take back only their own signoff', async () => {
      const { revision, signoff } = await createRevision(databases.db, revisionInput())
      const signed = await performSignoff(databases.db, signoff.id, 'gen', people.bob, TEST_NOW)

      expect(findReversibleColumns(revision, signed.signoff, people.bob, TEST_NOW)).toEqual(['general'])
      expect(findReversibleColumns(revision, signed.signoff, people.alice, TEST_NOW)).toEqual([])
    })

    it('deletes a revision with its signoff and parameters', async () => {
      const { revision, signoff } = await createRevision(databases.db, revisionInput())

      await removeSubmission(databases.db, {
        revisionId: revision.id,
        signoffId: signoff.id,
        column: 'revision',
        user: people.alice,
        now: TEST_NOW,
      })

      expect(await pullRevision(databases.db, { obsid: 23456 })).toEqual([])
      expect(await pullStatus(databases.db)).toEqual([])
    })

    it('resets a signoff column to Pending', async () => {
      const { revision, signoff } = await createRevision(databases.db, revisionInput())
      await performSignoff(databases.db, signoff.id, 'gen', people.bob, TEST_NOW)

      const reset = await removeSubmission(databases.db, {
        revisionId: revision.id,
        signoffId: signoff.id,
        column: 'general',
        user: people.bob,
        now: addHours(TEST_NOW, 1),
      })

      expect(reset.signoff.generalStatus).toBe('Pending')
      expect(reset.signoff.generalSignoffId).toBeNull()
      expect(reset.signoff.generalTime).toBeNull()
    })

    it('refuses removals the user may not make', async () => {
      const { revision, signoff } = await createRevision(databases.db, revisionInput())
      await performSignoff(databases.db, signoff.id, 'gen', people.bob, TEST_NOW)

      await expect(
        removeSubmission(databases.db, {
          revisionId: revision.id,
          signoffId: signoff.id,
          column: 'revision',
          user: people.alice,
          now: TEST_NOW,
        }),
      ).rejects.toBeInstanceOf(RemovalNotAllowedError)
      await expect(
        removeSubmission(databases.db, {
          revisionId: revision.id,
          signoffId: signoff.id + 1,
          column: 'general',
          user: people.bob,
          now: TEST_NOW,
        }),
      ).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('history queries', () => {
    beforeEach(async () => {
      await createRevision(databases.db, revisionInput({ obsid: 300, user: people.alice }))
      await createRevision(databases.db, revisionInput({ obsid: 200, user: people.bob }))
      await createRevision(databases.db, revisionInput({ obsid: 300, user: people.bob }))
    })

    it('lists status rows newest first', async () => {
      const rows = await pullStatus(databases.db)
      expect(rows.map(({ revision }) => revision.id)).toEqual([3, 2, 1])
      expect((await pullStatus(databases.db, { limit: 2 })).map(({ revision }) => revision.id)).toEqual([3, 2])
    })

    it('lists one user first', async () => {
      const rows = await pullStatus(databases.db, { orderUser: people.alice.id })
      expect(rows.map(({ revision }) => revision.id)).toEqual([1, 3, 2])
    })

    it('sorts recent revisions by obsid', async () => {
      const rows = await pullStatus(databases.db, { orderObsid: true })
      expect(rows.map(({ revision }) => [revision.obsid, revision.revisionNumber])).toEqual([
        [200, 1],
        [300, 2],
        [300, 1],
      ])
    })

    it('filters revisions', async () => {
      expect((await pullRevision(databases.db, { obsid: 300 })).map((row) => row.id)).toEqual([1, 3])
      expect(
        (await pullRevision(databases.db, { userId: people.bob.id, order: 'desc' })).map((row) => row.id),
      ).toEqual([3, 2])
      expect(await pullRevision(databases.db, { kind: 'asis' })).toEqual([])
      expect(await pullRevision(databases.db, { after: addHours(TEST_NOW, 1) })).toEqual([])
    })
  })

  describe('TOO duty schedule', () => {
    it('adds weekly periods from the next Monday', async () => {
      const added = await addSchedulePeriods(databases.db, { weeks: 2, now: TEST_NOW })

      expect(added.map((period) => [period.orderId, period.start, period.stop])).toEqual([
        [1, new Date(2025, 2, 10), new Date(2025, 2, 16)],
        [2, new Date(2025, 2, 17), new Date(2025, 2, 23)],
      ])

      const more = await addSchedulePeriods(databases.db, { weeks: 1, now: TEST_NOW })
      expect(more.map((period) => [period.orderId, period.start])).toEqual([[3, new Date(2025, 2, 24)]])
    })

    it('assigns a period and guards taken periods', async () => {
      const [period] = await addSchedulePeriods(databases.db, { weeks: 1, now: TEST_NOW })

      const assigned = await signupSchedule(databases.db, period.id, people.alice)
      expect(assigned.userId).toBe(people.alice.id)
      expect(assigned.assignerId).toBe(people.alice.id)

      await expect(signupSchedule(databases.db, period.id, people.bob)).rejects.toBeInstanceOf(ScheduleEditError)
      await expect(unlockSchedule(databases.db, period.id, people.bob)).rejects.toBeInstanceOf(ScheduleEditError)

      const unlocked = await unlockSchedule(databases.db, period.id, people.alice)
      expect(unlocked.userId).toBeNull()
      expect(unlocked.assignerId).toBeNull()
    })

    it('lets the assigner unlock a period assigned to someone else', async () => {
      const [period] = await addSchedulePeriods(databases.db, { weeks: 1, now: TEST_NOW })
      await signupSchedule(databases.db, period.id, people.alice, people.bob)

      const unlocked = await unlockSchedule(databases.db, period.id, people.bob)
      expect(unlocked.userId).toBeNull()
    })

    it('splits a period and renumbers the ones after it', async () => {
      const [first, second] = await addSchedulePeriods(databases.db, { weeks: 2, now: TEST_NOW })

      const [head, tail] = await splitSchedule(databases.db, first.id, new Date(2025, 2, 13, 9, 30))

      expect([head.start, head.stop]).toEqual([new Date(2025, 2, 10), new Date(2025, 2, 12)])
      expect([tail.orderId, tail.start, tail.stop, tail.userId]).toEqual([
        2,
        new Date(2025, 2, 13),
        new Date(2025, 2, 16),
        null,
      ])

      const rows = await pullSchedule(databases.db, { from: TEST_NOW })
      expect(rows.map(({ schedule }) => [schedule.id, schedule.orderId])).toEqual([
        [first.id, 1],
        [tail.id, 2],
        [second.id, 3],
      ])
    })

    it('rejects split dates outside the period', async () => {
      const [period] = await addSchedulePeriods(databases.db, { weeks: 1, now: TEST_NOW })

      await expect(splitSchedule(databases.db, period.id, new Date(2025, 2, 10))).rejects.toBeInstanceOf(
        ScheduleEditError,
      )
      await expect(splitSchedule(databases.db, period.id, new Date(2025, 2, 17))).rejects.toBeInstanceOf(
        ScheduleEditError,
      )
    })

    it('lists only periods that have not ended', async () => {
      await addSchedulePeriods(databases.db, { weeks: 2, now: TEST_NOW })

      const rows = await pullSchedule(databases.db, { from: new Date(2025, 2, 18) })

      expect(rows.map(({ schedule }) => schedule.start)).toEqual([new Date(2025, 2, 17)])
      expect(rows[0].user).toBeNull()
    })
  })
})
