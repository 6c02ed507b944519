/**
 * @fileoverview Parameter form shaping tests
 *
 * @architecture
 * Tests: src/services/__tests__/format-ocat-data.test.ts
 * Tests: format-ocat-data.ts
 */

import { describe, it, expect } from 'vitest'
import {
  coerceFormValue,
  determineChanges,
  formatForForm,
  generateAdditionals,
  parseParameterForm,
  submissionStateSchema,
  synchronizeValues,
} from '../format-ocat-data.js'

describe('format-ocat-data.ts', () => {
  describe('generateAdditionals', () => {
    it('derives sexagesimal coordinates and arcsecond dither values', () => {
      const additional = generateAdditionals({ ra: 150.5, dec: -30.25, y_amp: 0.002 })

      expect(additional.ra_hms).toBe('10:02:00.0000')
      expect(additional.dec_dms).toBe('-30:15:00.0000')
      expect(additional.y_amp_asec).toBeCloseTo(7.2, 9)
      expect(additional).not.toHaveProperty('z_amp_asec')
    })

    it('skips coordinates when either is missing', () => {
      expect(generateAdditionals({ ra: 150.5, dec: null })).toEqual({})
    })
  })

  describe('formatForForm', () => {
    it('keeps the catalog values next to the derived ones', () => {
      const form = formatForForm({ targname: 'NGC 1234', ra: 150.5, dec: -30.25 })
      expect(form).toEqual({
        targname: 'NGC 1234',
        ra: 150.5,
        dec: -30.25,
        ra_hms: '10:02:00.0000',
        dec_dms: '-30:15:00.0000',
      })
    })
  })

  describe('coerceFormValue', () => {
    it('reads numbers and null markers', () => {
      expect(coerceFormValue('150.50')).toBe(150.5)
      expect(coerceFormValue('None')).toBeNull()
    })

    it('normalizes typed datetimes to the Ocat format', () => {
      expect(coerceFormValue('Mar 5 2025 3:00PM')).toBe('Mar 05 2025 03:00PM')
    })

    it('leaves other text alone', () => {
      expect(coerceFormValue('NGC 1234')).toBe('NGC 1234')
    })
  })

  describe('parseParameterForm', () => {
    it('collects parameters and rank rows, skipping page fields', () => {
      const values = parseParameterForm({
        targname: 'NGC 1234',
        ra: '150.5',
        comments: 'None',
        action: 'submit',
        comment: 'not a parameter',
        'roll_ranks-0-roll': '90',
        'roll_ranks-0-roll_constraint': 'Y',
        'roll_ranks-0-bogus': '1',
        'roll_ranks-1-roll': '',
      })

      expect(values).toEqual({
        targname: 'NGC 1234',
        ra: 150.5,
        comments: null,
        roll_ranks: [{ roll_constraint: 'Y', roll_180: null, roll: 90, roll_tolerance: null }],
      })
    })

    it('sets a rank to null when every row is blank', () => {
      expect(parseParameterForm({ 'time_ranks-0-tstart': '', 'time_ranks-0-tstop': 'None' })).toEqual({
        time_ranks: null,
      })
    })
  })

  describe('synchronizeValues', () => {
    it('takes edited sexagesimal coordinates over the decimal ones', () => {
      const synced = synchronizeValues({
        ra: 150.5,
        dec: -30.25,
        ra_hms: '10:03:00.0000',
        dec_dms: '-30:15:00.0000',
      })

      expect(synced.ra).toBe(150.75)
      expect(synced.dec).toBe(-30.25)
      expect(synced.ra_hms).toBe('10:03:00.0000')
    })

    it('keeps decimal coordinates when the sexagesimal ones match', () => {
      const synced = synchronizeValues({ ra: 150.5, dec: -30.25, ra_hms: '10:02:00.0000', dec_dms: '-30:15:00.0000' })
      expect(synced.ra).toBe(150.5)
    })

    it('takes an edited arcsecond dither value over the degree value', () => {
      const synced = synchronizeValues({ y_amp: 0.002, y_amp_asec: 36 })

      expect(synced.y_amp).toBeCloseTo(0.01, 12)
      expect(synced.y_amp_asec).toBeCloseTo(36, 9)
    })

    it('keeps an edited decimal RA while the sexagesimal fields show the catalog values', () => {
      const synced = synchronizeValues(
        { ra: 151, dec: -30.25, ra_hms: '10:02:00.0000', dec_dms: '-30:15:00.0000' },
        { ra: 150.5, dec: -30.25 },
      )

      expect(synced.ra).toBe(151)
      expect(synced.dec).toBe(-30.25)
    })

    it('takes sexagesimal coordinates edited away from the catalog values', () => {
      const synced = synchronizeValues(
        { ra: 150.5, dec: -30.25, ra_hms: '10:03:00.0000', dec_dms: '-30:15:00.0000' },
        { ra: 150.5, dec: -30.25 },
      )

      expect(synced.ra).toBe(150.75)
    })

    it('keeps an edited degree dither value while the arcsecond field shows the catalog value', () => {
      const synced = synchronizeValues({ y_amp: 0.004, y_amp_asec: 0.002 * 3600 }, { y_amp: 0.002 })

      expect(synced.y_amp).toBe(0.004)
      expect(synced.y_amp_asec).toBeCloseTo(14.4, 9)
    })
  })

  describe('determineChanges', () => {
    it('returns only the modified editable parameters', () => {
      const changes = determineChanges(
        { targname: 'NGC 1234', ra: '150.50', dec: -30.0, remarks: 'None', seq_nbr: '999999' },
        { targname: 'NGC 1234', ra: 150.5, dec: -30.25, remarks: null, seq_nbr: '500123' },
      )

      expect(changes).toEqual({ original: { dec: -30.25 }, requested: { dec: -30.0 } })
    })

    it('records null originals for parameters the catalog lacks', () => {
      const changes = determineChanges({ vmagnitude: 12.5 }, {})
      expect(changes).toEqual({ original: { vmagnitude: null }, requested: { vmagnitude: 12.5 } })
    })
  })

  describe('submissionStateSchema', () => {
    it('round-trips the hidden form state', () => {
      const state = {
        kind: 'norm',
        original: { roll_ranks: [{ roll: 90 }] },
        requested: { roll_ranks: null },
        multiobsid: [23457],
        comment: 'Split the roll',
      }
      expect(submissionStateSchema.parse(JSON.parse(JSON.stringify(state)))).toEqual(state)
    })

    it('rejects unknown revision kinds', () => {
      const result = submissionStateSchema.safeParse({
        kind: 'edit',
        original: {},
        requested: {},
        multiobsid: [],
        comment: '',
      })
      expect(result.success).toBe(false)
    })
  })
})
