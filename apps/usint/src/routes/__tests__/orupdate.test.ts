/**
 * @fileoverview Target Parameter Status Page tests
 *
 * @architecture
 * Tests: src/routes/__tests__/orupdate.test.ts
 * Tests: orupdate.tsx
 */

import { afterAll, beforeAll, beforeEach, describe, it, expect } from 'vitest'
import { signoffs } from '@usint/db'
import { createApp, type UsintApp } from '../../app.js'
import { createRevision } from '../../services/database-interface.js'
import { readOcatData } from '../../services/read-ocat-data.js'
import { ORDER_COOKIE } from '../orupdate.js'
import {
  cookiesFrom,
  createRecordingMailer,
  createTestDatabases,
  createTestDeps,
  formBody,
  pageHeaders,
  resetData,
  seedTarget,
  seedUsers,
  TEST_NOW,
  type RecordingMailer,
  type SeededUsers,
  type TestDatabases,
} from '../../test/helpers.js'

describe('orupdate.tsx', () => {
  let databases: TestDatabases
  let mailer: RecordingMailer
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
    mailer = createRecordingMailer()
    app = createApp(createTestDeps(databases, { mailer }))
  })

  async function submitRename(obsType = 'GO') {
    await seedTarget(databases.ocat, { type: obsType })
    return createRevision(databases.db, {
      obsid: 23456,
      ocatData: await readOcatData(databases.ocat, 23456),
      kind: 'norm',
      user: people.bob,
      original: { targname: 'NGC 1234' },
      requested: { targname: 'NGC 9999' },
      now: TEST_NOW,
    })
  }

  it('renders the status page with an automatic reload', async () => {
    await submitRename()

    const res = await app.request('/orupdate/', { headers: pageHeaders() })
    const html = await res.text()

    expect(res.status).toBe(200)
    expect(res.headers.get('refresh')).toBe('180')
    expect(html).toContain('<title>Target Parameter Status Page</title>')
    expect(html).toContain('<a href="/chkupdata/23456.001">23456.001</a>')
  })

  it('stores the chosen order in a cookie', async () => {
    const res = await app.request('/orupdate/', {
      method: 'POST',
      headers: pageHeaders(),
      body: formBody({ order: 'username', username: 'bob' }),
    })

    expect(res.status).toBe(302)
    expect(res.headers.get('location')).toBe('/orupdate/')
    expect(cookiesFrom(res)).toBe(`${ORDER_COOKIE}=${encodeURIComponent(JSON.stringify({ orderUser: people.bob.id }))}`)
  })

  it('flashes unknown usernames and keeps the current order', async () => {
    const res = await app.request('/orupdate/', {
      method: 'POST',
      headers: pageHeaders(),
      body: formBody({ order: 'username', username: 'zed' }),
    })

    const page = await app.request('/orupdate/', { headers: pageHeaders('alice', { cookie: cookiesFrom(res) }) })
    expect(await page.text()).toContain('<div class="flash">Unknown username: zed</div>')
  })

  it('signs off a column and returns to the status page', async () => {
    const { signoff } = await submitRename()

    const res = await app.request(`/orupdate/${signoff.id}/gen`, { headers: pageHeaders() })

    expect(res.status).toBe(302)
    expect(res.headers.get('location')).toBe('/orupdate/')
    const [stored] = await databases.db.select().from(signoffs)
    expect(stored.generalStatus).toBe('Signed')
    expect(stored.generalSignoffId).toBe(people.alice.id)
    expect(stored.generalTime).toEqual(TEST_NOW)
    expect(mailer.sent).toHaveLength(0)
  })

  it('asks the next party to sign off TOO observations', async () => {
    const { signoff } = await submitRename('TOO')

    await app.request(`/orupdate/${signoff.id}/gen`, { method: 'POST', headers: pageHeaders() })

    expect(mailer.sent.map((message) => message.subject)).toEqual(['TOO Usint Sign Off Request: (Obsid: 23456)'])
    expect(mailer.sent[0].to).toEqual(['bob@example.org', 'alice@example.org'])
  })

  it('answers 404 for unknown signoff kinds and ids', async () => {
    const unknownKind = await app.request('/orupdate/1/everything', { headers: pageHeaders() })
    const unknownId = await app.request('/orupdate/99/gen', { headers: pageHeaders() })

    expect(unknownKind.status).toBe(404)
    expect(unknownId.status).toBe(404)
    expect(await unknownId.text()).toContain('Signoff 99 not found')
  })
})
