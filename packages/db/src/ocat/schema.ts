import { doublePrecision, integer, pgTable, text, varchar } from 'drizzle-orm/pg-core'

/**
 * Read-only mirror of the observation catalog (axafocat).
 *
 * Property keys intentionally match the catalog column names: the reader
 * hands these rows straight to forms and the parameter selection lists,
 * which are keyed by Ocat parameter name.
 */

export const target = pgTable('target', {
  obsid: integer('obsid').primaryKey(),
  targid: integer('targid'),
  seq_nbr: varchar('seq_nbr', { length: 16 }),
  targname: varchar('targname', { length: 128 }),
  obj_flag: varchar('obj_flag', { length: 8 }),
  object: varchar('object', { length: 32 }),
  si_mode: varchar('si_mode', { length: 32 }),
  photometry_flag: varchar('photometry_flag', { length: 8 }),
  vmagnitude: doublePrecision('vmagnitude'),
  ra: doublePrecision('ra'),
  dec: doublePrecision('dec'),
  est_cnt_rate: doublePrecision('est_cnt_rate'),
  forder_cnt_rate: doublePrecision('forder_cnt_rate'),
  y_det_offset: doublePrecision('y_det_offset'),
  z_det_offset: doublePrecision('z_det_offset'),
  raster_scan: varchar('raster_scan', { length: 8 }),
  dither_flag: varchar('dither_flag', { length: 8 }),
  approved_exposure_time: doublePrecision('approved_exposure_time'),
  pre_min_lead: doublePrecision('pre_min_lead'),
  pre_max_lead: doublePrecision('pre_max_lead'),
  pre_id: integer('pre_id'),
  seg_max_num: integer('seg_max_num'),
  aca_mode: varchar('aca_mode', { length: 16 }),
  phase_constraint_flag: varchar('phase_constraint_flag', { length: 8 }),
  ocat_propid: integer('ocat_propid'),
  acisid: integer('acisid'),
  hrcid: integer('hrcid'),
  grating: varchar('grating', { length: 8 }),
  instrument: varchar('instrument', { length: 8 }),
  rem_exp_time: doublePrecision('rem_exp_time'),
  soe_st_sched_date: varchar('soe_st_sched_date', { length: 32 }),
  type: varchar('type', { length: 16 }),
  lts_lt_plan: varchar('lts_lt_plan', { length: 32 }),
  mpcat_star_fidlight_file: varchar('mpcat_star_fidlight_file', { length: 64 }),
  status: varchar('status', { length: 32 }),
  data_rights: varchar('data_rights', { length: 8 }),
  tooid: integer('tooid'),
  description: text('description'),
  total_fld_cnt_rate: doublePrecision('total_fld_cnt_rate'),
  extended_src: varchar('extended_src', { length: 8 }),
  uninterrupt: varchar('uninterrupt', { length: 8 }),
  multitelescope: varchar('multitelescope', { length: 8 }),
  observatories: varchar('observatories', { length: 128 }),
  constr_in_remarks: varchar('constr_in_remarks', { length: 8 }),
  group_id: varchar('group_id', { length: 64 }),
  obs_ao_str: varchar('obs_ao_str', { length: 16 }),
  roll_flag: varchar('roll_flag', { length: 8 }),
  window_flag: varchar('window_flag', { length: 8 }),
  spwindow_flag: varchar('spwindow_flag', { length: 8 }),
  multitelescope_interval: doublePrecision('multitelescope_interval'),
  pointing_constraint: varchar('pointing_constraint', { length: 8 }),
  remarks: text('remarks'),
  mp_remarks: text('mp_remarks'),
})

export const rollreq = pgTable('rollreq', {
  obsid: integer('obsid').notNull(),
  ordr: integer('ordr').notNull(),
  roll_constraint: varchar('roll_constraint', { length: 8 }),
  roll_180: varchar('roll_180', { length: 8 }),
  roll: doublePrecision('roll'),
  roll_tolerance: doublePrecision('roll_tolerance'),
})

export const timereq = pgTable('timereq', {
  obsid: integer('obsid').notNull(),
  ordr: integer('ordr').notNull(),
  window_constraint: varchar('window_constraint', { length: 8 }),
  tstart: varchar('tstart', { length: 32 }),
  tstop: varchar('tstop', { length: 32 }),
})

export const too = pgTable('too', {
  tooid: integer('tooid').primaryKey(),
  type: varchar('type', { length: 32 }),
  start: doublePrecision('start'),
  stop: doublePrecision('stop'),
  followup: integer('followup'),
  trig: text('trig'),
  remarks: text('remarks'),
})

export const hrcparam = pgTable('hrcparam', {
  hrcid: integer('hrcid').primaryKey(),
  hrc_zero_block: varchar('hrc_zero_block', { length: 8 }),
  timing_mode: varchar('timing_mode', { length: 8 }),
  si_mode: varchar('si_mode', { length: 32 }),
})

export const acisparam = pgTable('acisparam', {
  acisid: integer('acisid').primaryKey(),
  exp_mode: varchar('exp_mode', { length: 8 }),
  ccdi0_on: varchar('ccdi0_on', { length: 8 }),
  ccdi1_on: varchar('ccdi1_on', { length: 8 }),
  ccdi2_on: varchar('ccdi2_on', { length: 8 }),
  ccdi3_on: varchar('ccdi3_on', { length: 8 }),
  ccds0_on: varchar('ccds0_on', { length: 8 }),
  ccds1_on: varchar('ccds1_on', { length: 8 }),
  ccds2_on: varchar('ccds2_on', { length: 8 }),
  ccds3_on: varchar('ccds3_on', { length: 8 }),
  ccds4_on: varchar('ccds4_on', { length: 8 }),
  ccds5_on: varchar('ccds5_on', { length: 8 }),
  bep_pack: varchar('bep_pack', { length: 8 }),
  onchip_sum: varchar('onchip_sum', { length: 8 }),
  onchip_row_count: integer('onchip_row_count'),
  onchip_column_count: integer('onchip_column_count'),
  frame_time: doublePrecision('frame_time'),
  subarray: varchar('subarray', { length: 8 }),
  subarray_start_row: integer('subarray_start_row'),
  subarray_row_count: integer('subarray_row_count'),
  duty_cycle: varchar('duty_cycle', { length: 8 }),
  secondary_exp_count: integer('secondary_exp_count'),
  primary_exp_time: doublePrecision('primary_exp_time'),
  eventfilter: varchar('eventfilter', { length: 8 }),
  eventfilter_lower: doublePrecision('eventfilter_lower'),
  eventfilter_higher: doublePrecision('eventfilter_higher'),
  most_efficient: varchar('most_efficient', { length: 8 }),
  dropped_chip_count: integer('dropped_chip_count'),
  multiple_spectral_lines: varchar('multiple_spectral_lines', { length: 8 }),
  spectra_max_count: doublePrecision('spectra_max_count'),
})

export const aciswin = pgTable('aciswin', {
  obsid: integer('obsid').notNull(),
  ordr: integer('ordr').notNull(),
  chip: varchar('chip', { length: 8 }),
  start_row: integer('start_row'),
  start_column: integer('start_column'),
  width: integer('width'),
  height: integer('height'),
  lower_threshold: doublePrecision('lower_threshold'),
  pha_range: doublePrecision('pha_range'),
  sample: integer('sample'),
})

export const phasereq = pgTable('phasereq', {
  obsid: integer('obsid').primaryKey(),
  phase_period: doublePrecision('phase_period'),
  phase_epoch: doublePrecision('phase_epoch'),
  phase_start: doublePrecision('phase_start'),
  phase_end: doublePrecision('phase_end'),
  phase_start_margin: doublePrecision('phase_start_margin'),
  phase_end_margin: doublePrecision('phase_end_margin'),
})

export const dither = pgTable('dither', {
  obsid: integer('obsid').primaryKey(),
  y_amp: doublePrecision('y_amp'),
  y_freq: doublePrecision('y_freq'),
  y_phase: doublePrecision('y_phase'),
  z_amp: doublePrecision('z_amp'),
  z_freq: doublePrecision('z_freq'),
  z_phase: doublePrecision('z_phase'),
})

export const sim = pgTable('sim', {
  obsid: integer('obsid').primaryKey(),
  trans_offset: doublePrecision('trans_offset'),
  focus_offset: doublePrecision('focus_offset'),
})

export const soe = pgTable('soe', {
  obsid: integer('obsid').notNull(),
  soe_roll: doublePrecision('soe_roll'),
  unscheduled: varchar('unscheduled', { length: 8 }),
})

export const propInfo = pgTable('prop_info', {
  ocat_propid: integer('ocat_propid').primaryKey(),
  ao_str: varchar('ao_str', { length: 16 }),
  prop_num: varchar('prop_num', { length: 16 }),
  title: text('title'),
  joint: varchar('joint', { length: 64 }),
})

export const viewPi = pgTable('view_pi', {
  ocat_propid: integer('ocat_propid').notNull(),
  last: varchar('last', { length: 64 }),
})

export const viewCoi = pgTable('view_coi', {
  ocat_propid: integer('ocat_propid').notNull(),
  last: varchar('last', { length: 64 }),
})

export type TargetRow = typeof target.$inferSelect
