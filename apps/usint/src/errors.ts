/**
 * Typed errors raised by the services and mapped to pages by the routes.
 */

export class UsintError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/** A Usint store record (revision, signoff, schedule) does not exist. */
export class NotFoundError extends UsintError {
  constructor(message: string) {
    super('NOT_FOUND', message)
  }
}

export class OcatNotFoundError extends UsintError {
  readonly obsid: number

  constructor(obsid: number) {
    super('OCAT_NOT_FOUND', `No query result for ${obsid}`)
    this.obsid = obsid
  }
}

export class OcatMultipleResultsError extends UsintError {
  readonly obsid: number

  constructor(obsid: number) {
    super('OCAT_MULTIPLE_RESULTS', `Multiple query result for ${obsid}`)
    this.obsid = obsid
  }
}

export class UnknownParameterError extends UsintError {
  readonly parameter: string

  constructor(parameter: string) {
    super('UNKNOWN_PARAMETER', `No result for '${parameter}' parameter search in table.`)
    this.parameter = parameter
  }
}

export class ObsidListError extends UsintError {
  constructor(input: string) {
    super('OBSID_LIST', `Cannot parse obsid list: ${input}`)
  }
}

export class RemovalNotAllowedError extends UsintError {
  constructor(message: string) {
    super('REMOVAL_NOT_ALLOWED', message)
  }
}

/** Scheduler edits the current user may not make (unlocking another user's period, bad split dates). */
export class ScheduleEditError extends UsintError {
  constructor(message: string) {
    super('SCHEDULE_EDIT', message)
  }
}

export function isNotFound(error: unknown): error is NotFoundError | OcatNotFoundError {
  return error instanceof NotFoundError || error instanceof OcatNotFoundError
}
