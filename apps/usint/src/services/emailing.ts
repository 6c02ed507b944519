/**
 * Notification emails.
 *
 * Builders return plain `EmailMessage` values; a `Mailer` delivers them.
 * Production delivers through the local sendmail binary. With test
 * notifications on, nodemailer's JSON transport renders the message and it is
 * logged instead of sent.
 */

import nodemailer from 'nodemailer'
import { format } from 'date-fns'
import type { Signoff, User } from '@usint/db'
import { labelFor } from '@usint/schema'
import type { UsintConfig } from '../config.js'
import { createLogger } from '../lib/log.js'
import type { OcatData } from './helpers.js'
import type { Changes } from './format-ocat-data.js'

const log = createLogger('email')

export type EmailMessage = {
  to: string[]
  cc: string[]
  subject: string
  text: string
  from?: string
}

export interface Mailer {
  send(message: EmailMessage): Promise<void>
}

type MailConfig = Pick<UsintConfig, 'httpAddress' | 'addresses' | 'admins'>

/** Plain-text rendering used when notifications are only logged. */
export function renderMessage(message: EmailMessage): string {
  return [
    `Subject: ${message.subject}`,
    `To: ${message.to.join(', ')}`,
    `CC: ${message.cc.join(', ')}`,
    ...(message.from ? [`From: ${message.from}`] : []),
    '',
    message.text,
  ].join('\n')
}

export function createMailer(config: Pick<UsintConfig, 'testNotifications' | 'sendmailPath' | 'addresses'>): Mailer {
  const from = `Usint <${config.addresses.cus}>`

  if (config.testNotifications) {
    const transport = nodemailer.createTransport({ jsonTransport: true })
    return {
      async send(message) {
        await transport.sendMail({ from: message.from ?? from, to: message.to, cc: message.cc, subject: message.subject, text: message.text })
        log.info(`Test notification, not sent:\n${renderMessage(message)}`)
      },
    }
  }

  const transport = nodemailer.createTransport({ sendmail: true, newline: 'unix', path: config.sendmailPath })
  return {
    async send(message) {
      const info = await transport.sendMail({ from: message.from ?? from, to: message.to, cc: message.cc, subject: message.subject, text: message.text })
      log.info(`Sent "${message.subject}" to ${message.to.join(', ')} (${info.messageId})`)
    },
  }
}

function asList(value: string | string[] | undefined | null): string[] {
  if (value === undefined || value === null) return []
  return Array.isArray(value) ? value : [value]
}

/**
 * Build a message. The CUS address is always copied.
 */
export function constructMessage(
  config: MailConfig,
  content: string,
  subject: string,
  to: string | string[] | null,
  cc?: string | string[],
): EmailMessage {
  return {
    to: asList(to),
    cc: [...new Set([config.addresses.cus, ...asList(cc)])],
    subject,
    text: content,
  }
}

function statusPageLink(config: MailConfig): string {
  return `${config.httpAddress}/orupdate/`
}

function checkPageLink(config: MailConfig, obsidrev: string): string {
  return `${config.httpAddress}/chkupdata/${obsidrev}`
}

function pageLinks(config: MailConfig, obsidrev: string): string {
  return `Parameter Status Page: ${statusPageLink(config)}\nParameter Check Page: ${checkPageLink(config, obsidrev)}\n`
}

function text(value: OcatData[string] | undefined): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

function identification(ocatData: OcatData, user: User): string {
  let content = ''
  for (const parameter of ['obsid', 'seq_nbr', 'targname']) {
    content += `${labelFor(parameter)} = ${text(ocatData[parameter])}\n`
  }
  content += `User = ${user.username}\n`
  return content
}

/** Log message for an `asis` approval or a `remove`. */
export function quickApprovalStateEmail(
  config: MailConfig,
  ocatData: OcatData,
  obsidrev: string,
  kind: 'asis' | 'remove',
  user: User,
): EmailMessage {
  let content = identification(ocatData, user)
  let subject: string
  if (kind === 'asis') {
    subject = `Parameter Change Log: ${obsidrev} (Approved)`
    content += 'VERIFIED OK AS IS\n'
  } else {
    subject = `Parameter Change Log: ${obsidrev} (Removed)`
    content += 'VERIFIED REMOVED\n'
  }
  content += `PAST COMMENTS = \n${text(ocatData.comments)}\n\n`
  content += `PAST REMARKS = \n${text(ocatData.remarks)}\n\n`
  content += pageLinks(config, obsidrev)
  return constructMessage(config, content, subject, user.email)
}

/**
 * Log message for a parameter change (`norm`) or split request (`clone`).
 * Split requests are copied to ArcOps.
 */
export function newRevisionEmail(
  config: MailConfig,
  ocatData: OcatData,
  obsidrev: string,
  kind: 'norm' | 'clone',
  changes: Changes,
  user: User,
  comment?: string,
): EmailMessage {
  let content = identification(ocatData, user)
  let subject: string
  let cc: string[] = []
  if (kind === 'clone') {
    subject = `Parameter Change Log: ${obsidrev} (Split Request)`
    content += 'SPLIT REQUESTED\n'
    cc = [config.addresses.arcops]
  } else {
    subject = `Parameter Change Log: ${obsidrev}`
    content += '\nPARAMETER CHANGES:\n'
    for (const [parameter, requested] of Object.entries(changes.requested)) {
      content += `${labelFor(parameter)}: ${text(changes.original[parameter])} => ${text(requested)}\n`
    }
  }
  if (comment) content += `\nCOMMENT = \n${comment}\n`
  content += '\n'
  content += pageLinks(config, obsidrev)
  return constructMessage(config, content, subject, user.email, cc)
}

/**
 * TOO and DDT observations need quick turnaround, so the next party in the
 * signoff chain is told as soon as the previous one finishes. Returns null
 * when no notification applies.
 */
export function signoffNotify(
  config: MailConfig,
  ocatData: OcatData,
  obsidrev: string,
  signoff: Signoff,
  submitter: User,
  signer: User,
): EmailMessage | null {
  const obsType = ocatData.obs_type
  if (obsType !== 'TOO' && obsType !== 'DDT') return null

  const arcopsDone = signoff.generalStatus !== 'Pending' && signoff.acisStatus !== 'Pending'
  const instrumentDone = signoff.acisSiStatus !== 'Pending' && signoff.hrcSiStatus !== 'Pending'
  const usintDone = signoff.usintStatus !== 'Pending'
  const obsid = text(ocatData.obsid)

  if (arcopsDone && !instrumentDone) {
    const instrument = ocatData.instrument
    const to = instrument === 'HRC-I' || instrument === 'HRC-S' ? config.addresses.hrc : config.addresses.acis
    const content =
      `Editing of General/ACIS entries of ${obsidrev} were finished and signed off.\n` +
      'Please update SI Mode entries, then sign off.\n' +
      pageLinks(config, obsidrev)
    return constructMessage(config, content, `${obsType} SI Mode Sign Off Request: (Obsid: ${obsid})`, to)
  }
  if (!arcopsDone && instrumentDone) {
    const content =
      `Editing of SI Mode entries of ${obsidrev} were finished and signed off.\n` +
      'Please update General/ACIS entries, then sign off.\n' +
      pageLinks(config, obsidrev)
    return constructMessage(
      config,
      content,
      `${obsType} General/ACIS Sign Off Request: (Obsid: ${obsid})`,
      config.addresses.arcops,
    )
  }
  if (arcopsDone && instrumentDone && !usintDone) {
    const content =
      `Editing of all entries of ${obsidrev} were finished and signed off.\n` +
      'Please verify and signoff.\n' +
      pageLinks(config, obsidrev)
    const to = [...new Set([submitter.email, signer.email].filter((email): email is string => Boolean(email)))]
    return constructMessage(config, content, `${obsType} Usint Sign Off Request: (Obsid: ${obsid})`, to)
  }
  return null
}

/** Error report for the administrators. */
export function errorEmail(config: MailConfig, error: Error, user: User | null, now: Date = new Date()): EmailMessage {
  return {
    to: config.admins,
    cc: [],
    from: `UsintErrorHandler <${config.addresses.cus}>`,
    subject: `Usint Error-[${format(now, 'EEE MMM d HH:mm:ss yyyy')}]`,
    text: `User: ${user?.username ?? 'unknown'}\n\n${error.stack ?? error.message}\n`,
  }
}

/**
 * Send the error report. Delivery failures are logged, never rethrown, so the
 * error page still renders.
 */
export async function sendErrorEmail(
  mailer: Mailer,
  config: MailConfig,
  error: Error,
  user: User | null,
): Promise<void> {
  try {
    await mailer.send(errorEmail(config, error, user))
  } catch (mailError) {
    log.error('Failed to send error email', mailError)
  }
}
