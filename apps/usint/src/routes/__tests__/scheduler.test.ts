/**
 * @fileoverview TOO duty schedule page tests
 *
 * @architecture
 * Tests: src/routes/__tests__/scheduler.test.ts
 * Tests: scheduler.tsx
 */

import { afterAll, beforeAll, beforeEach, describe, it, expect } from 'vitest'
import { schedules } from '@usint/db'
import { createApp, type UsintApp } from '../../app.js'
import {
  cookiesFrom,
  createTestDatabases,
  createTestDeps,
  formBody,
  pageHeaders,
  resetData,
  seedUsers,
  type SeededUsers,
  type TestDatabases,
} from '../../test/helpers.js'

describe('scheduler.tsx', () => {
  let databases: TestDatabases
  let app: UsintApp
  let people: SeededUsers

  beforeAll(async () => {
    databases = await createTestDatabases()
  })

  afterAll(async () => {
    await databases.close()
  })

  beforeEach(async () => {
    await resetData(databases.db)
    people = await seedUsers(databases.db)
    app = createApp(createTestDeps(databases))
  })

  function post(fields: Record<string, string>, username = 'alice') {
    return app.request('/scheduler/', { method: 'POST', headers: pageHeaders(username), body: formBody(fields) })
  }

  it('adds weekly periods starting next Monday', async () => {
    const res = await post({ action: 'add', weeks: '2' })
    expect(res.status).toBe(302)
    expect(res.headers.get('location')).toBe('/scheduler/')

    const page = await app.request('/scheduler/', { headers: pageHeaders() })
    const html = await page.text()

    expect(html).toContain('Mon Mar 10 2025 - Sun Mar 16 2025')
    expect(html).toContain('Mon Mar 17 2025 - Sun Mar 23 2025')
  })

  it('signs up the current user or a chosen one', async () => {
    await post({ action: 'add', weeks: '2' })

    await post({ action: 'signup', id: '1' })
    await post({ action: 'signup', id: '2', username: 'bob' })

    const rows = await databases.db.select().from(schedules).orderBy(schedules.id)
    expect(rows.map((row) => [row.userId, row.assignerId])).toEqual([
      [people.alice.id, people.alice.id],
      [people.bob.id, people.alice.id],
    ])
    const page = await app.request('/scheduler/', { headers: pageHeaders() })
    expect(await page.text()).toContain('<td>Bob Tester</td>')
  })

  it('flashes edits the user may not make', async () => {
    await post({ action: 'add', weeks: '1' })
    await post({ action: 'signup', id: '1' }, 'bob')

    const res = await post({ action: 'signup', id: '1' })

    const page = await app.request('/scheduler/', { headers: pageHeaders('alice', { cookie: cookiesFrom(res) }) })
    expect(await page.text()).toContain('<div class="flash">This period is already taken. Unlock it first.</div>')
  })

  it('splits a period on the posted day', async () => {
    await post({ action: 'add', weeks: '1' })

    await post({ action: 'split', id: '1', date: '2025-03-13' })

    const page = await app.request('/scheduler/', { headers: pageHeaders() })
    const html = await page.text()
    expect(html).toContain('Mon Mar 10 2025 - Wed Mar 12 2025')
    expect(html).toContain('Thu Mar 13 2025 - Sun Mar 16 2025')
  })

  it('flashes unreadable forms', async () => {
    const res = await post({ action: 'split', id: '1' })

    const page = await app.request('/scheduler/', { headers: pageHeaders('alice', { cookie: cookiesFrom(res) }) })
    expect(await page.text()).toContain(
      '<div class="flash">Error in parsing form input. Please verify formatting.</div>',
    )
  })
})
