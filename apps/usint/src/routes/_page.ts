import type { Context } from 'hono'
import { deleteCookie, getCookie, setCookie } from 'hono/cookie'
import { z } from 'zod'
import { createLogger } from '../lib/log.js'

const log = createLogger('page')

export const PARSE_ERROR_MESSAGE = 'Error in parsing form input. Please verify formatting.'

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? crypto.randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(c: Context, data: T) {
  return c.json({
    success: true,
    data,
    meta: requestMeta(c),
  })
}

/** Positive integer route parameter, or null when it is not one. */
export function positiveIntParam(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null
  const parsed = Number(value)
  return parsed > 0 ? parsed : null
}

/**
 * Urlencoded form fields. Uploaded files are not expected and are dropped.
 */
export async function readForm(c: Context): Promise<Record<string, string>> {
  const body = await c.req.parseBody()
  const form: Record<string, string> = {}
  for (const [name, value] of Object.entries(body)) {
    if (typeof value === 'string') form[name] = value
  }
  return form
}

// ============================================
// Flash messages
// ============================================

export const FLASH_COOKIE = 'usint_flash'

const flashSchema = z.array(z.string())

/** JSON stored in a cookie, or undefined when absent or malformed. */
export function readJsonCookie(c: Context, name: string): unknown {
  const raw = getCookie(c, name)
  if (!raw) return undefined
  try {
    return JSON.parse(raw)
  } catch (error) {
    log.debug(`Ignoring malformed ${name} cookie`, error)
    return undefined
  }
}

/** Queue a message for the next rendered page. */
export function flash(c: Context, message: string) {
  const parsed = flashSchema.safeParse(readJsonCookie(c, FLASH_COOKIE))
  const messages = parsed.success ? parsed.data : []
  setCookie(c, FLASH_COOKIE, JSON.stringify([...messages, message]), {
    path: '/',
    httpOnly: true,
    sameSite: 'Lax',
    maxAge: 60,
  })
}

/** Read and clear queued messages. */
export function takeFlashes(c: Context): string[] {
  const parsed = flashSchema.safeParse(readJsonCookie(c, FLASH_COOKIE))
  if (getCookie(c, FLASH_COOKIE) !== undefined) {
    deleteCookie(c, FLASH_COOKIE, { path: '/' })
  }
  return parsed.success ? parsed.data : []
}
