import type { RevisionNotes } from '@usint/db'

const NOTE_MESSAGES: Array<[keyof RevisionNotes, string]> = [
  ['obsdate_under10', 'The observation is scheduled within the next 10 days.'],
  ['on_or_list', 'The observation is on the active OR list.'],
  ['large_coordinate_change', 'The coordinates moved by more than 8 arcminutes.'],
  ['target_name_change', 'The target name was changed.'],
  ['instrument_change', 'The instrument was changed.'],
  ['grating_change', 'The grating was changed.'],
  ['flag_change', 'A constraint or dither flag was changed.'],
  ['comment_change', 'The comments were changed.'],
]

/** Warning lines for the flags set on a revision. */
export function noteMessages(notes: RevisionNotes | null | undefined): string[] {
  if (!notes) return []
  return NOTE_MESSAGES.filter(([key]) => notes[key] === true).map(([, message]) => message)
}
