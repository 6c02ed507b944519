import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

// ============================================
// Signoff columns
// ============================================

/** Signoff columns in the order they appear on the status page. */
export const SIGNOFF_COLUMNS = ['general', 'acis', 'acis_si', 'hrc_si', 'usint'] as const
export type SignoffColumn = (typeof SIGNOFF_COLUMNS)[number]

/** Column labels used by the status and check pages. */
export const SIGNOFF_COLUMN_LABELS: Record<SignoffColumn, string> = {
  general: 'General',
  acis: 'ACIS',
  acis_si: 'ACIS SI',
  hrc_si: 'HRC SI',
  usint: 'Usint',
}

/**
 * Signoff button kinds posted by the status page. `gen` is the historical name
 * of the general column; `approve` signs usint and approves the obsid.
 */
export const SIGNOFF_KINDS = ['gen', 'acis', 'acis_si', 'hrc_si', 'usint', 'approve'] as const
export type SignoffKind = (typeof SIGNOFF_KINDS)[number]

export const signoffKindSchema = z.enum(SIGNOFF_KINDS)

export const REVISION_KINDS = ['norm', 'asis', 'remove', 'clone'] as const
export const revisionKindSchema = z.enum(REVISION_KINDS)

/** Targets of a removal: the revision itself or one of its signoff columns. */
export const removalColumnSchema = z.enum(['revision', ...SIGNOFF_COLUMNS])
export type RemovalColumn = z.infer<typeof removalColumnSchema>

// ============================================
// Identifiers
// ============================================

export const obsidSchema = z.coerce.number().int().positive()

/**
 * `<obsid>.<rev>` as typed into the check page, for example `23456.002`.
 */
export const obsidRevSchema = z
  .string()
  .trim()
  .regex(/^\d+\.\d+$/)
  .transform((value) => {
    const [obsid, rev] = value.split('.')
    return { obsid: Number(obsid), revisionNumber: Number(rev) }
  })

export function formatObsidRev(obsid: number, revisionNumber: number): string {
  return `${obsid}.${String(revisionNumber).padStart(3, '0')}`
}

// ============================================
// Static configuration files
// ============================================

const choiceSchema = z.tuple([z.string(), z.string()])

export const parameterSelectionsSchema = z.object({
  general_signoff_params: z.array(z.string()),
  acis_signoff_params: z.array(z.string()),
  acis_si_signoff_params: z.array(z.string()),
  hrc_si_signoff_params: z.array(z.string()),
  numeric_params: z.array(z.string()),
  rank_params: z.record(z.array(z.string())),
  choices: z.record(z.array(choiceSchema)),
  field_choices: z.record(z.string()),
})

export type ParameterSelections = z.infer<typeof parameterSelectionsSchema>

export const labelsSchema = z.record(z.string())
export const colorsSchema = z.record(z.string().regex(/^#[0-9A-Fa-f]{6}$/))

function readDataFile<T>(name: string, schema: z.ZodType<T>): T {
  const path = fileURLToPath(new URL(`../data/${name}`, import.meta.url))
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'))
  return schema.parse(raw)
}

let selectionsCache: ParameterSelections | null = null
let labelsCache: Record<string, string> | null = null
let colorsCache: Record<string, string> | null = null

export function getParameterSelections(): ParameterSelections {
  if (!selectionsCache) {
    selectionsCache = readDataFile('parameter_selections.json', parameterSelectionsSchema)
  }
  return selectionsCache
}

export function getLabels(): Record<string, string> {
  if (!labelsCache) {
    labelsCache = readDataFile('labels.json', labelsSchema)
  }
  return labelsCache
}

export function getColors(): Record<string, string> {
  if (!colorsCache) {
    colorsCache = readDataFile('color.json', colorsSchema)
  }
  return colorsCache
}

/** Display label of a parameter, falling back to its name. */
export function labelFor(name: string): string {
  return getLabels()[name] ?? name
}

/** Parameter list deciding whether a signoff column needs review. */
export function signoffParams(column: Exclude<SignoffColumn, 'usint'>): string[] {
  const selections = getParameterSelections()
  switch (column) {
    case 'general':
      return selections.general_signoff_params
    case 'acis':
      return selections.acis_signoff_params
    case 'acis_si':
      return selections.acis_si_signoff_params
    case 'hrc_si':
      return selections.hrc_si_signoff_params
  }
}

/** Every parameter a revision can request, in signoff-list order. */
export function modifiableParams(): string[] {
  const selections = getParameterSelections()
  return [
    ...selections.general_signoff_params,
    ...selections.acis_signoff_params,
    ...selections.acis_si_signoff_params,
    ...selections.hrc_si_signoff_params,
  ]
}

export function choicesFor(name: string): [string, string][] | null {
  const selections = getParameterSelections()
  const key = selections.field_choices[name]
  if (!key) return null
  return selections.choices[key] ?? null
}
