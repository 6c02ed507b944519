/**
 * Common value helpers used across the Usint services.
 *
 * Values move between three shapes: raw Ocat rows, submitted form strings and
 * JSON stored in the Usint store. The coercion functions here bring them to a
 * common form so that requested and original values can be compared.
 */

import { format, isValid, nextDay, parse, startOfDay } from 'date-fns'
import type { ParameterValue, Signoff, SignoffStatus } from '@usint/db'
import { SIGNOFF_COLUMNS, type SignoffColumn } from '@usint/schema'
import { ObsidListError } from '../errors.js'

export type OcatData = Record<string, ParameterValue>

export type RankRecords = Array<Record<string, ParameterValue>>
export type RankColumns = Record<string, ParameterValue[]>

// ============================================
// Null markers and datetime formats
// ============================================

export const NULL_LIST: readonly string[] = [
  '',
  ' ',
  '<Blank>',
  'N/A',
  'NA',
  'NONE',
  'NULL',
  'Na',
  'None',
  'Null',
  'none',
  'null',
]

/** Ocat datetimes, e.g. `Mar 05 2025 03:00PM`. The catalog itself drops the leading zero of the day. */
export const OCAT_DATETIME_FORMAT = 'MMM dd yyyy hh:mma'
export const USINT_DATETIME_FORMAT = 'MMM dd yyyy HH:mm'
/** ISO 8601 used for values stored in the Usint store. */
export const STORAGE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'"

/**
 * Parse patterns in the order they are tried. Single letter tokens accept an
 * optional leading zero.
 */
const PARSE_FORMATS = [
  'MMM d yyyy H:mm',
  'MMM d yyyy h:mma',
  "yyyy-MM-dd'T'HH:mm:ss'Z'",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  'M:d:yyyy:H:mm:ss',
  'M:d:yyyy:H:mm',
  'yyyy-MM-dd H:mm:ss',
  'yyyy-MM-dd H:mm',
  // Date pickers post month, day and year without separators.
  'MMMdyyyyH:mm',
]

const REFERENCE_DATE = new Date(2000, 0, 1)

export function isNullMarker(value: unknown): boolean {
  if (value === null || value === undefined) return true
  return typeof value === 'string' && NULL_LIST.includes(value)
}

/**
 * Parse any of the datetime formats found across the catalog and the forms.
 * Doubled colons are collapsed and fractional seconds dropped first.
 */
export function parseDatetime(value: string): Date | null {
  const cleaned = value.replace(/::/g, ':').split('.')[0].replace(/\s+/g, ' ').trim()
  if (cleaned === '') return null
  for (const pattern of PARSE_FORMATS) {
    const parsed = parse(cleaned, pattern, REFERENCE_DATE)
    if (isValid(parsed)) {
      return parsed
    }
  }
  return null
}

export function formatDatetime(value: Date, pattern: string = STORAGE_FORMAT): string {
  return format(value, pattern)
}

// ============================================
// Coercion
// ============================================

const INT_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

export function coerceNone(value: ParameterValue | undefined): ParameterValue {
  if (Array.isArray(value)) {
    return value.map((entry) => coerceNone(entry))
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, entry]): [string, ParameterValue] => [key, coerceNone(entry)]))
  }
  if (isNullMarker(value)) return null
  return value
}

export function coerceNumber(value: ParameterValue): ParameterValue {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  if (INT_PATTERN.test(trimmed)) return Number.parseInt(trimmed, 10)
  if (FLOAT_PATTERN.test(trimmed)) return Number.parseFloat(trimmed)
  return value
}

export function coerceTime(value: ParameterValue, outputFormat: string = STORAGE_FORMAT): ParameterValue {
  if (typeof value !== 'string') return value
  const parsed = parseDatetime(value)
  return parsed ? formatDatetime(parsed, outputFormat) : value
}

/**
 * Bring a value to its comparable form: null markers become null, numeric
 * strings numbers and datetimes the storage format. Lists and records are
 * coerced element-wise.
 */
export function coerce(value: ParameterValue | undefined, outputFormat: string = STORAGE_FORMAT): ParameterValue {
  if (Array.isArray(value)) {
    return value.map((entry) => coerce(entry, outputFormat))
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]): [string, ParameterValue] => [key, coerce(entry, outputFormat)]),
    )
  }
  if (isNullMarker(value)) return null
  const numeric = coerceNumber(value)
  if (typeof numeric === 'number') return numeric
  return coerceTime(numeric, outputFormat)
}

// ============================================
// Comparison
// ============================================

/**
 * Equality used to decide whether a parameter was changed. Numbers are equal
 * within 1e-6; lists and records compare element by element.
 */
export function approxEquals(first: ParameterValue | undefined, second: ParameterValue | undefined): boolean {
  const a = first ?? null
  const b = second ?? null
  if (a === null || b === null) return a === b

  if (typeof a === 'number' && typeof b === 'number') {
    return Math.abs(a - b) < 0.000001
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false
    if (a.length !== b.length) return false
    return a.every((entry, index) => approxEquals(entry, b[index]))
  }
  if (typeof a === 'object' || typeof b === 'object') {
    if (typeof a !== 'object' || typeof b !== 'object') return false
    const aKeys = Object.keys(a)
    const bKeys = new Set(Object.keys(b))
    if (aKeys.length !== bKeys.size || !aKeys.every((key) => bKeys.has(key))) return false
    return aKeys.every((key) => approxEquals(a[key], b[key]))
  }
  return a === b
}

export function containsNonNone(value: ParameterValue | undefined): boolean {
  if (Array.isArray(value)) return value.some((entry) => containsNonNone(entry))
  if (value !== null && typeof value === 'object') {
    return Object.values(value).some((entry) => containsNonNone(entry))
  }
  return value !== null && value !== undefined
}

// ============================================
// Obsid lists
// ============================================

/**
 * Parse a free-form list of obsids. Entries are separated by whitespace,
 * commas, colons or semicolons; `100-103` and `100 - 103` are inclusive
 * ranges. The result is deduplicated, sorted and excludes `exclude`.
 */
export function createObsidList(text: string | null | undefined, exclude?: number): number[] {
  if (text === null || text === undefined || text.trim() === '') return []

  const elements = text.split(/\s+|,|:|;/).filter((entry) => entry !== '')
  const combined = elements.join(',').replace(/,-,/g, '-').replace(/-,/g, '-').replace(/,-/g, '-')

  const obsids = new Set<number>()
  for (const element of combined.split(',')) {
    if (/^\d+$/.test(element)) {
      obsids.add(Number(element))
      continue
    }
    const bounds = element.split('-')
    if (bounds.length !== 2 || !/^\d+$/.test(bounds[0]) || !/^\d+$/.test(bounds[1])) {
      throw new ObsidListError(text)
    }
    const [start, end] = bounds.map(Number)
    for (let obsid = start; obsid <= end; obsid += 1) {
      obsids.add(obsid)
    }
  }

  if (exclude !== undefined) obsids.delete(exclude)
  return [...obsids].sort((a, b) => a - b)
}

// ============================================
// Ranks
// ============================================

export function reorientRank(ranks: RankRecords | RankColumns | null | undefined, orient: 'records'): RankRecords | null
export function reorientRank(ranks: RankRecords | RankColumns | null | undefined, orient: 'columns'): RankColumns | null
/**
 * Switch a rank set between a list of records (one per rank) and a record of
 * columns (one ordered list per parameter).
 */
export function reorientRank(
  ranks: RankRecords | RankColumns | null | undefined,
  orient: 'records' | 'columns',
): RankRecords | RankColumns | null {
  if (ranks === null || ranks === undefined) return null

  if (Array.isArray(ranks)) {
    if (ranks.length === 0) return null
    if (orient === 'records') return ranks
    const columns: RankColumns = {}
    ranks.forEach((record, index) => {
      for (const [key, value] of Object.entries(record)) {
        const column = columns[key] ?? Array<ParameterValue>(index).fill(null)
        column[index] = value
        columns[key] = column
      }
    })
    return columns
  }

  const keys = Object.keys(ranks)
  if (keys.length === 0) return null
  if (orient === 'columns') return ranks
  return Array.from({ length: rankOrdr(ranks) }, (_, index) =>
    Object.fromEntries(keys.map((key): [string, ParameterValue] => [key, ranks[key][index] ?? null])),
  )
}

/** Number of ranks in either orientation. */
export function rankOrdr(ranks: RankRecords | RankColumns | null | undefined): number {
  if (ranks === null || ranks === undefined) return 0
  if (Array.isArray(ranks)) return ranks.length
  return Math.max(0, ...Object.values(ranks).map((column) => column.length))
}

// ============================================
// Coordinates
// ============================================

function toSexagesimal(value: number, precision: number, alwaysSign: boolean): string {
  const sign = value < 0 ? '-' : alwaysSign ? '+' : ''
  const scale = 10 ** precision
  // Work in rounded units of the last seconds digit so carries propagate.
  const total = Math.round(Math.abs(value) * 3600 * scale)
  const seconds = total % (60 * scale)
  const minutes = Math.floor(total / (60 * scale)) % 60
  const whole = Math.floor(total / (3600 * scale))
  const secondsText = (seconds / scale).toFixed(precision).padStart(precision + 3, '0')
  return `${sign}${String(whole).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:${secondsText}`
}

function fromSexagesimal(value: string): number {
  const trimmed = value.trim()
  const negative = trimmed.startsWith('-')
  const [whole = '0', minutes = '0', seconds = '0'] = trimmed.replace(/^[+-]/, '').split(':')
  const magnitude = Number(whole) + Number(minutes) / 60 + Number(seconds) / 3600
  if (!Number.isFinite(magnitude)) {
    throw new Error(`Invalid sexagesimal value: ${value}`)
  }
  return negative ? -magnitude : magnitude
}

function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits))
}

export type Coordinate = number | string | null

/**
 * Convert RA/Dec between decimal degrees and `hh:mm:ss.ssss` / `±dd:mm:ss.ssss`.
 * The input format is taken from the Dec value; input already in the
 * requested format is returned unchanged.
 */
export function convertRaDecFormat(ra: Coordinate, dec: Coordinate, outputFormat: 'dd' | 'hmsdms'): [Coordinate, Coordinate] {
  if (ra === null && dec === null) return [null, null]
  const inputFormat = String(dec).includes(':') ? 'hmsdms' : 'dd'

  if (inputFormat === 'dd' && outputFormat === 'hmsdms') {
    return [
      toSexagesimal(Number(ra) / 15, 4, false),
      toSexagesimal(Number(dec), 4, true),
    ]
  }
  if (inputFormat === 'hmsdms' && outputFormat === 'dd') {
    return [
      roundTo(fromSexagesimal(String(ra)) * 15, 6),
      roundTo(fromSexagesimal(String(dec)), 6),
    ]
  }
  return [ra, dec]
}

/** 8 arcminutes, in degrees. */
export const LARGE_COORD_SHIFT = 0.1333

export function isLargeCoordShift(
  ra: number | null | undefined,
  dec: number | null | undefined,
  ora: number | null | undefined,
  odec: number | null | undefined,
): boolean {
  if (ra === null || ra === undefined || dec === null || dec === undefined) return false
  if (ora === null || ora === undefined || odec === null || odec === undefined) return false
  return Math.sqrt((ora - ra) ** 2 + (odec - dec) ** 2) > LARGE_COORD_SHIFT
}

// ============================================
// Signoffs
// ============================================

export type SignoffState = {
  status: SignoffStatus
  signoffId: number | null
  time: Date | null
}

/** Read one signoff column. */
export function signoffState(signoff: Signoff, column: SignoffColumn): SignoffState {
  switch (column) {
    case 'general':
      return { status: signoff.generalStatus, signoffId: signoff.generalSignoffId, time: signoff.generalTime }
    case 'acis':
      return { status: signoff.acisStatus, signoffId: signoff.acisSignoffId, time: signoff.acisTime }
    case 'acis_si':
      return { status: signoff.acisSiStatus, signoffId: signoff.acisSiSignoffId, time: signoff.acisSiTime }
    case 'hrc_si':
      return { status: signoff.hrcSiStatus, signoffId: signoff.hrcSiSignoffId, time: signoff.hrcSiTime }
    case 'usint':
      return { status: signoff.usintStatus, signoffId: signoff.usintSignoffId, time: signoff.usintTime }
  }
}

/** Update object writing one signoff column. */
export function signoffPatch(column: SignoffColumn, state: SignoffState): Partial<Signoff> {
  switch (column) {
    case 'general':
      return { generalStatus: state.status, generalSignoffId: state.signoffId, generalTime: state.time }
    case 'acis':
      return { acisStatus: state.status, acisSignoffId: state.signoffId, acisTime: state.time }
    case 'acis_si':
      return { acisSiStatus: state.status, acisSiSignoffId: state.signoffId, acisSiTime: state.time }
    case 'hrc_si':
      return { hrcSiStatus: state.status, hrcSiSignoffId: state.signoffId, hrcSiTime: state.time }
    case 'usint':
      return { usintStatus: state.status, usintSignoffId: state.signoffId, usintTime: state.time }
  }
}

/** A signoff is open while any column is still Pending. */
export function isOpen(signoff: Signoff): boolean {
  return SIGNOFF_COLUMNS.some((column) => signoffState(signoff, column).status === 'Pending')
}

// ============================================
// Dates
// ============================================

export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6

/**
 * Midnight of the next given weekday (0 = Sunday) strictly after `from`.
 */
export function getNextWeekday(weekday: Weekday, from: Date = new Date()): Date {
  return nextDay(startOfDay(from), weekday)
}
