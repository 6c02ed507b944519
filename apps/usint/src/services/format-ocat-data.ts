/**
 * Shape Ocat data for the parameter form and compare submitted values with
 * the catalog.
 */

import { z } from 'zod'
import type { ParameterValue } from '@usint/db'
import { getParameterSelections, modifiableParams, revisionKindSchema } from '@usint/schema'
import {
  approxEquals,
  coerce,
  coerceNumber,
  convertRaDecFormat,
  formatDatetime,
  isNullMarker,
  OCAT_DATETIME_FORMAT,
  parseDatetime,
  type OcatData,
  type RankRecords,
} from './helpers.js'

/** Dither parameters also edited in arcseconds. */
export const DITHER_ASEC_PARAMS = ['y_amp', 'y_freq', 'z_amp', 'z_freq'] as const

export const DITHER_PARAMS = ['y_amp', 'y_freq', 'y_phase', 'z_amp', 'z_freq', 'z_phase'] as const

/** Form values derived from other parameters rather than read from the catalog. */
export const DERIVED_PARAMS = ['ra_hms', 'dec_dms', ...DITHER_ASEC_PARAMS.map((key) => `${key}_asec`)]

export type FormValues = Record<string, ParameterValue>

export type Changes = {
  original: OcatData
  requested: FormValues
}

export const parameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(parameterValueSchema), z.record(parameterValueSchema)]),
)

/**
 * What the confirmation page carries between `submit` and `finalize` in its
 * hidden `form_state` field.
 */
export const submissionStateSchema = z.object({
  kind: revisionKindSchema,
  original: z.record(parameterValueSchema),
  requested: z.record(parameterValueSchema),
  multiobsid: z.array(z.number().int().positive()),
  comment: z.string(),
})

export type SubmissionState = z.infer<typeof submissionStateSchema>

function asCoordinate(value: ParameterValue | undefined): number | string | null {
  if (typeof value === 'number' || typeof value === 'string') return value
  return null
}

/**
 * Sexagesimal RA/Dec and arcsecond dither values for editing.
 */
export function generateAdditionals(ocatData: OcatData): FormValues {
  const additional: FormValues = {}

  const ra = asCoordinate(ocatData.ra)
  const dec = asCoordinate(ocatData.dec)
  if (ra !== null && dec !== null) {
    const [raHms, decDms] = convertRaDecFormat(ra, dec, 'hmsdms')
    additional.ra_hms = raHms
    additional.dec_dms = decDms
  }

  for (const key of DITHER_ASEC_PARAMS) {
    const value = ocatData[key]
    if (typeof value === 'number') {
      additional[`${key}_asec`] = value * 3600
    }
  }
  return additional
}

export function formatForForm(ocatData: OcatData): FormValues {
  return { ...ocatData, ...generateAdditionals(ocatData) }
}

/**
 * Coerce one submitted string: numbers, Ocat or combined datetimes (to the
 * Ocat format), null markers, otherwise the string itself.
 */
export function coerceFormValue(value: string): ParameterValue {
  const numeric = coerceNumber(value)
  if (typeof numeric === 'number') return numeric
  if (isNullMarker(value)) return null

  const compact = value.replace(/\s+/g, ' ').trim()
  const parsed = parseDatetime(compact) ?? parseDatetime(compact.replace(/[\s-]/g, ''))
  if (parsed && /[A-Za-z]{3}/.test(compact)) {
    return formatDatetime(parsed, OCAT_DATETIME_FORMAT)
  }
  return value
}

const RANK_FIELD = /^(time_ranks|roll_ranks|window_ranks)-(\d+)-([a-z0-9_]+)$/

/** Submit buttons and bookkeeping fields that are not parameters. */
const NON_PARAMETER_FIELDS = new Set(['action', 'form_state', 'submission_kind', 'multiobsid', 'comment'])

/**
 * Turn a urlencoded form body into parameter values. Rank rows arrive as
 * `<rank>-<index>-<parameter>` fields; rows left entirely blank are dropped.
 */
export function parseParameterForm(body: Record<string, unknown>): FormValues {
  const values: FormValues = {}
  const ranks = new Map<string, Map<number, Record<string, ParameterValue>>>()
  const selections = getParameterSelections()

  for (const [name, raw] of Object.entries(body)) {
    if (typeof raw !== 'string' || NON_PARAMETER_FIELDS.has(name)) continue

    const rankMatch = RANK_FIELD.exec(name)
    if (rankMatch) {
      const [, rank, index, parameter] = rankMatch
      if (!selections.rank_params[rank]?.includes(parameter)) continue
      const rows = ranks.get(rank) ?? new Map<number, Record<string, ParameterValue>>()
      const row = rows.get(Number(index)) ?? {}
      row[parameter] = coerceFormValue(raw)
      rows.set(Number(index), row)
      ranks.set(rank, rows)
      continue
    }
    values[name] = coerceFormValue(raw)
  }

  for (const [rank, rows] of ranks) {
    const parameters = selections.rank_params[rank] ?? []
    const records: RankRecords = [...rows.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, row]) => Object.fromEntries(parameters.map((key): [string, ParameterValue] => [key, row[key] ?? null])))
      .filter((row) => Object.values(row).some((value) => value !== null))
    values[rank] = records.length > 0 ? records : null
  }
  return values
}

/**
 * "Refresh" behaviour. A sexagesimal RA/Dec or arcsecond dither value counts
 * as edited when it matches neither the catalog rendering nor the rendering
 * of the posted decimal value; an edited one replaces the decimal value. The
 * derived fields are then regenerated.
 */
export function synchronizeValues(form: FormValues, ocatData: OcatData = {}): FormValues {
  const synced: FormValues = { ...form }
  const catalog = generateAdditionals(ocatData)
  const ra = asCoordinate(synced.ra ?? ocatData.ra)
  const dec = asCoordinate(synced.dec ?? ocatData.dec)
  const raHms = asCoordinate(synced.ra_hms)
  const decDms = asCoordinate(synced.dec_dms)

  if (ra !== null && dec !== null && raHms !== null && decDms !== null) {
    const posted = [String(raHms).trim(), String(decDms).trim()].join(' ')
    const rendered = convertRaDecFormat(ra, dec, 'hmsdms').join(' ')
    const original = catalog.ra_hms === undefined ? null : [catalog.ra_hms, catalog.dec_dms].join(' ')
    if (posted !== rendered && posted !== original && String(decDms).includes(':')) {
      const [newRa, newDec] = convertRaDecFormat(raHms, decDms, 'dd')
      synced.ra = newRa
      synced.dec = newDec
    }
  }

  for (const key of DITHER_ASEC_PARAMS) {
    const asec = synced[`${key}_asec`]
    const degrees = synced[key] ?? ocatData[key] ?? null
    if (typeof asec !== 'number') continue
    const original = catalog[`${key}_asec`]
    if (typeof original === 'number' && approxEquals(asec, original)) continue
    if (typeof degrees !== 'number' || !approxEquals(asec, degrees * 3600)) {
      synced[key] = asec / 3600
    }
  }

  return { ...synced, ...generateAdditionals(synced) }
}

/**
 * Compare each editable parameter present in the form with the catalog.
 * Only changed parameters are returned.
 */
export function determineChanges(form: FormValues, ocatData: OcatData): Changes {
  const original: OcatData = {}
  const requested: FormValues = {}

  for (const parameter of modifiableParams()) {
    if (!(parameter in form)) continue
    const value = form[parameter]
    const current = ocatData[parameter] ?? null
    if (!approxEquals(coerce(value), coerce(current))) {
      original[parameter] = current
      requested[parameter] = value
    }
  }
  return { original, requested }
}
