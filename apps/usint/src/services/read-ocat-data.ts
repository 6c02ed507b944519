/**
 * Read the parameters of one observation from the Ocat catalog.
 *
 * The result is a flat dictionary keyed by parameter name. A few names differ
 * from the catalog columns:
 * - TOO/DDT columns are prefixed `too_`
 * - HRC `timing_mode`/`si_mode` become `hrc_timing_mode`/`hrc_si_mode`
 * - proposal `prop_num`/`title`/`joint` become `proposal_number`/`proposal_title`/`proposal_joint`
 * - target `mp_remarks` becomes `comments` and `type` becomes `obs_type`
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { and, asc, eq, inArray } from 'drizzle-orm'
import { ocatTables, type OcatDatabase, type ParameterValue } from '@usint/db'
import { OcatMultipleResultsError, OcatNotFoundError } from '../errors.js'
import { createLogger } from '../lib/log.js'
import { formatDatetime, OCAT_DATETIME_FORMAT, parseDatetime, type OcatData, type RankRecords } from './helpers.js'

const log = createLogger('ocat')

const { acisparam, aciswin, dither, hrcparam, phasereq, propInfo, rollreq, sim, soe, target, timereq, too, viewCoi, viewPi } =
  ocatTables

/** Catalog values that stand for "no value". */
const OCAT_NULL_LIST: readonly string[] = ['NA', 'N/A', 'none', 'None', 'NONE', 'null', 'Null', 'NULL', '']

/** Statuses of observations still to be carried out. */
const PENDING_STATUSES = ['unobserved', 'scheduled', 'untriggered']

const RANK_FLAGS_OFF = new Set<ParameterValue>(['N', null])

export type ReadOcatOptions = {
  /** Directory holding `mp_long_term` and `scheduled_obs_list`. */
  obsSsDir?: string
}

/**
 * Normalize an Ocat datetime to a zero-padded day, e.g.
 * `Mar  5 2025  3:00PM` to `Mar 05 2025 03:00PM`.
 */
export function normalizeOcatDatetime(value: string | null): string | null {
  if (value === null) return null
  const parsed = parseDatetime(value)
  if (!parsed) {
    log.warn(`Unrecognized Ocat datetime: ${value}`)
    return value
  }
  return formatDatetime(parsed, OCAT_DATETIME_FORMAT)
}

async function generalParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const rows = await ocat.select().from(target).where(eq(target.obsid, obsid))
  if (rows.length === 0) throw new OcatNotFoundError(obsid)
  if (rows.length > 1) throw new OcatMultipleResultsError(obsid)

  const { mp_remarks, type, ...row } = rows[0]
  const data: OcatData = {
    ...row,
    comments: mp_remarks,
    obs_type: type,
    soe_st_sched_date: normalizeOcatDatetime(row.soe_st_sched_date),
    lts_lt_plan: normalizeOcatDatetime(row.lts_lt_plan),
  }

  // Page sections keyed on these flags expect 'N' rather than null.
  for (const flag of ['dither_flag', 'window_flag', 'roll_flag', 'spwindow_flag']) {
    if (data[flag] === null || data[flag] === undefined) {
      data[flag] = 'N'
    }
  }
  if (typeof row.rem_exp_time === 'number' && row.rem_exp_time < 0) {
    data.rem_exp_time = 0
  }
  return data
}

/**
 * Every pending obsid in the monitoring chain of `obsid`, walking `pre_id`
 * links backwards and forwards.
 */
export async function findMonitoringSeries(ocat: OcatDatabase, obsid: number): Promise<number[]> {
  type ChainRow = { obsid: number; pre_id: number | null; status: string | null }
  const columns = { obsid: target.obsid, pre_id: target.pre_id, status: target.status }
  const chain = new Map<number, ChainRow>()

  const [start] = await ocat.select(columns).from(target).where(eq(target.obsid, obsid))
  if (start) {
    chain.set(start.obsid, start)
    let previous = start.pre_id
    while (previous !== null && !chain.has(previous)) {
      const [row] = await ocat.select(columns).from(target).where(eq(target.obsid, previous))
      if (!row) break
      chain.set(row.obsid, row)
      previous = row.pre_id
    }
  }

  let current: number | null = obsid
  while (current !== null) {
    const next: ChainRow[] = await ocat.select(columns).from(target).where(eq(target.pre_id, current))
    const fresh = next.filter((row) => !chain.has(row.obsid))
    fresh.forEach((row) => chain.set(row.obsid, row))
    current = fresh.length > 0 ? fresh[fresh.length - 1].obsid : null
  }

  return [...chain.values()]
    .filter((row) => row.status !== null && PENDING_STATUSES.includes(row.status))
    .map((row) => row.obsid)
    .sort((a, b) => a - b)
}

async function monitorParams(
  ocat: OcatDatabase,
  obsid: number,
  preId: ParameterValue,
  groupId: ParameterValue,
): Promise<OcatData> {
  if (typeof groupId === 'string' && groupId !== '') {
    const group = await ocat
      .select({ obsid: target.obsid })
      .from(target)
      .where(and(eq(target.group_id, groupId), inArray(target.status, PENDING_STATUSES)))
    return {
      monitor_flag: 'N',
      group_obsid: group.map((row) => row.obsid).sort((a, b) => a - b),
    }
  }

  let isMonitor = preId !== null && preId !== undefined
  if (!isMonitor) {
    const followers = await ocat
      .select({ obsid: target.obsid })
      .from(target)
      .where(eq(target.pre_id, obsid))
      .limit(1)
    isMonitor = followers.length > 0
  }
  if (!isMonitor) return { monitor_flag: 'N' }

  return {
    monitor_flag: 'Y',
    monitor_series: await findMonitoringSeries(ocat, obsid),
  }
}

async function tooParams(ocat: OcatDatabase, tooid: number): Promise<OcatData> {
  const [row] = await ocat.select().from(too).where(eq(too.tooid, tooid))
  if (!row) {
    log.warn(`tooid ${tooid} has no too entry`)
    return {}
  }
  return {
    too_type: row.type,
    too_start: row.start,
    too_stop: row.stop,
    too_followup: row.followup,
    too_trig: row.trig,
    too_remarks: row.remarks,
  }
}

async function hrcParams(ocat: OcatDatabase, hrcid: number): Promise<OcatData> {
  const [row] = await ocat.select().from(hrcparam).where(eq(hrcparam.hrcid, hrcid))
  if (!row) return {}
  return {
    hrc_zero_block: row.hrc_zero_block,
    hrc_timing_mode: row.timing_mode,
    hrc_si_mode: row.si_mode,
  }
}

async function acisParams(ocat: OcatDatabase, acisid: number): Promise<OcatData> {
  const [row] = await ocat.select().from(acisparam).where(eq(acisparam.acisid, acisid))
  if (!row) return {}
  const { acisid: _acisid, ...params } = row
  return params
}

async function rollParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const rows: RankRecords = await ocat
    .select({
      roll_constraint: rollreq.roll_constraint,
      roll_180: rollreq.roll_180,
      roll: rollreq.roll,
      roll_tolerance: rollreq.roll_tolerance,
    })
    .from(rollreq)
    .where(eq(rollreq.obsid, obsid))
    .orderBy(asc(rollreq.ordr))
  return { roll_ranks: rows }
}

async function timeConstraintParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const rows = await ocat
    .select({
      window_constraint: timereq.window_constraint,
      tstart: timereq.tstart,
      tstop: timereq.tstop,
    })
    .from(timereq)
    .where(eq(timereq.obsid, obsid))
    .orderBy(asc(timereq.ordr))
  return {
    time_ranks: rows.map((row) => ({
      window_constraint: row.window_constraint,
      tstart: normalizeOcatDatetime(row.tstart),
      tstop: normalizeOcatDatetime(row.tstop),
    })),
  }
}

async function aciswinParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const rows: RankRecords = await ocat
    .select({
      chip: aciswin.chip,
      start_row: aciswin.start_row,
      start_column: aciswin.start_column,
      width: aciswin.width,
      height: aciswin.height,
      lower_threshold: aciswin.lower_threshold,
      pha_range: aciswin.pha_range,
      sample: aciswin.sample,
    })
    .from(aciswin)
    .where(eq(aciswin.obsid, obsid))
    .orderBy(asc(aciswin.ordr))
  return { window_ranks: rows }
}

async function phaseParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const [row] = await ocat.select().from(phasereq).where(eq(phasereq.obsid, obsid))
  if (!row) return {}
  const { obsid: _obsid, ...params } = row
  return params
}

async function ditherParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const [row] = await ocat.select().from(dither).where(eq(dither.obsid, obsid))
  if (!row) return {}
  const { obsid: _obsid, ...params } = row
  return params
}

async function simParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const [row] = await ocat
    .select({ trans_offset: sim.trans_offset, focus_offset: sim.focus_offset })
    .from(sim)
    .where(eq(sim.obsid, obsid))
  return row ? { ...row } : {}
}

async function soeParams(ocat: OcatDatabase, obsid: number): Promise<OcatData> {
  const [row] = await ocat
    .select({ soe_roll: soe.soe_roll })
    .from(soe)
    .where(and(eq(soe.obsid, obsid), eq(soe.unscheduled, 'N')))
    .limit(1)
  return row ? { ...row } : {}
}

async function propParams(ocat: OcatDatabase, ocatPropid: number): Promise<OcatData> {
  const [prop] = await ocat.select().from(propInfo).where(eq(propInfo.ocat_propid, ocatPropid))
  const data: OcatData = {}
  if (prop) {
    // Proposal AO overrides the observation AO.
    data.obs_ao_str = prop.ao_str
    data.proposal_number = prop.prop_num
    data.proposal_title = prop.title
    data.proposal_joint = prop.joint === 'None' ? null : prop.joint
  }

  const [pi] = await ocat.select({ last: viewPi.last }).from(viewPi).where(eq(viewPi.ocat_propid, ocatPropid)).limit(1)
  if (pi) data.pi_name = pi.last

  const [coi] = await ocat
    .select({ last: viewCoi.last })
    .from(viewCoi)
    .where(eq(viewCoi.ocat_propid, ocatPropid))
    .limit(1)
  data.observer = coi ? coi.last : (data.pi_name ?? null)
  return data
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Planned roll range from the first line of `mp_long_term`
 * (`obsid:roll1:roll2`), formatted `low-high` as in `10.0-20.0`.
 */
export async function readPlannedRoll(obsid: number, obsSsDir: string): Promise<string | null> {
  let content: string
  try {
    content = await readFile(join(obsSsDir, 'mp_long_term'), 'utf-8')
  } catch (error) {
    log.debug(`mp_long_term unreadable: ${error instanceof Error ? error.message : String(error)}`)
    return null
  }
  const [first = ''] = content.split('\n')
  const fields = first.trim().split(':')
  if (fields.length < 3 || fields[0] !== String(obsid)) return null
  const rolls = [Number(fields[1]), Number(fields[2])]
  if (rolls.some((roll) => !Number.isFinite(roll))) return null
  rolls.sort((a, b) => a - b)
  return rolls.map(formatRoll).join('-')
}

/** Rolls always carry a decimal point: `10.0`, `95.25`. */
function formatRoll(roll: number): string {
  return Number.isInteger(roll) ? roll.toFixed(1) : String(roll)
}

/**
 * Map each obsid to whether it is on the active OR list
 * (`scheduled_obs_list`, obsid in the first column).
 */
export async function checkObsidInOrList(obsids: number[], obsSsDir: string): Promise<Map<number, boolean>> {
  let content = ''
  try {
    content = await readFile(join(obsSsDir, 'scheduled_obs_list'), 'utf-8')
  } catch (error) {
    if (!isNodeError(error) || error.code !== 'ENOENT') throw error
    log.warn(`scheduled_obs_list missing in ${obsSsDir}`)
  }
  const orList = new Set(
    content
      .split('\n')
      .map((line) => line.trim().split(/\s+/)[0])
      .filter((entry) => /^\d+$/.test(entry))
      .map(Number),
  )
  return new Map(obsids.map((obsid) => [obsid, orList.has(obsid)]))
}

/**
 * Extract every parameter of `obsid`.
 *
 * Throws OcatNotFoundError when the obsid is not in the catalog.
 */
export async function readOcatData(ocat: OcatDatabase, obsid: number, options: ReadOcatOptions = {}): Promise<OcatData> {
  const data = await generalParams(ocat, obsid)

  Object.assign(data, await monitorParams(ocat, obsid, data.pre_id, data.group_id))

  if (typeof data.tooid === 'number') Object.assign(data, await tooParams(ocat, data.tooid))
  if (typeof data.hrcid === 'number') Object.assign(data, await hrcParams(ocat, data.hrcid))
  if (typeof data.acisid === 'number') Object.assign(data, await acisParams(ocat, data.acisid))

  // 'N' and null both mean the constraint is off; 'Y' and 'P' turn it on.
  if (!RANK_FLAGS_OFF.has(data.roll_flag)) Object.assign(data, await rollParams(ocat, obsid))
  if (!RANK_FLAGS_OFF.has(data.window_flag)) Object.assign(data, await timeConstraintParams(ocat, obsid))
  if (!RANK_FLAGS_OFF.has(data.spwindow_flag)) Object.assign(data, await aciswinParams(ocat, obsid))
  if (!RANK_FLAGS_OFF.has(data.phase_constraint_flag ?? null)) Object.assign(data, await phaseParams(ocat, obsid))
  if (!RANK_FLAGS_OFF.has(data.dither_flag)) Object.assign(data, await ditherParams(ocat, obsid))

  Object.assign(data, await simParams(ocat, obsid))
  Object.assign(data, await soeParams(ocat, obsid))
  if (typeof data.ocat_propid === 'number') Object.assign(data, await propParams(ocat, data.ocat_propid))

  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' && OCAT_NULL_LIST.includes(value)) {
      data[key] = null
    }
  }

  if (options.obsSsDir) {
    const plannedRoll = await readPlannedRoll(obsid, options.obsSsDir)
    if (plannedRoll !== null) data.planned_roll = plannedRoll
  }

  return data
}
