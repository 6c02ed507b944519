/**
 * @fileoverview Notification email tests
 *
 * @architecture
 * Tests: src/services/__tests__/emailing.test.ts
 * Tests: emailing.ts
 */

import { afterEach, describe, it, expect, vi } from 'vitest'
import type { Signoff, User } from '@usint/db'
import {
  constructMessage,
  createMailer,
  errorEmail,
  newRevisionEmail,
  quickApprovalStateEmail,
  renderMessage,
  sendErrorEmail,
  signoffNotify,
} from '../emailing.js'
import type { OcatData } from '../helpers.js'
import { createFailingMailer, createTestConfig, TEST_NOW } from '../../test/helpers.js'

const config = createTestConfig()

const alice: User = {
  id: 1,
  username: 'alice',
  isActive: true,
  email: 'alice@example.org',
  groups: 'usint',
  fullName: 'Alice Tester',
}

const bob: User = { ...alice, id: 2, username: 'bob', email: 'bob@example.org', fullName: 'Bob Tester' }

const ocatData: OcatData = {
  obsid: 23456,
  seq_nbr: '500123',
  targname: 'NGC 1234',
  comments: 'Original comment',
  remarks: null,
  instrument: 'ACIS-S',
  obs_type: 'TOO',
}

const LINKS =
  'Parameter Status Page: http://127.0.0.1:5000/orupdate/\n' +
  'Parameter Check Page: http://127.0.0.1:5000/chkupdata/23456.001\n'

function signoffWith(statuses: Partial<Signoff>): Signoff {
  return {
    id: 1,
    revisionId: 1,
    generalStatus: 'Pending',
    generalSignoffId: null,
    generalTime: null,
    acisStatus: 'Not Required',
    acisSignoffId: null,
    acisTime: null,
    acisSiStatus: 'Pending',
    acisSiSignoffId: null,
    acisSiTime: null,
    hrcSiStatus: 'Not Required',
    hrcSiSignoffId: null,
    hrcSiTime: null,
    usintStatus: 'Pending',
    usintSignoffId: null,
    usintTime: null,
    ...statuses,
  }
}

describe('emailing.ts', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('constructMessage', () => {
    it('always copies CUS once', () => {
      const message = constructMessage(config, 'body', 'Subject', null, ['arcops@example.org', 'cus@example.org'])
      expect(message).toEqual({
        to: [],
        cc: ['cus@example.org', 'arcops@example.org'],
        subject: 'Subject',
        text: 'body',
      })
    })
  })

  describe('quickApprovalStateEmail', () => {
    it('logs an approval with past comments and remarks', () => {
      const message = quickApprovalStateEmail(config, ocatData, '23456.001', 'asis', alice)

      expect(message.subject).toBe('Parameter Change Log: 23456.001 (Approved)')
      expect(message.to).toEqual(['alice@example.org'])
      expect(message.cc).toEqual(['cus@example.org'])
      expect(message.text).toBe(
        'Obsid = 23456\n' +
          'Sequence Number = 500123\n' +
          'Target Name = NGC 1234\n' +
          'User = alice\n' +
          'VERIFIED OK AS IS\n' +
          'PAST COMMENTS = \nOriginal comment\n\n' +
          'PAST REMARKS = \n\n\n' +
          LINKS,
      )
    })

    it('logs a removal', () => {
      const message = quickApprovalStateEmail(config, ocatData, '23456.001', 'remove', alice)

      expect(message.subject).toBe('Parameter Change Log: 23456.001 (Removed)')
      expect(message.text).toContain('VERIFIED REMOVED\n')
    })
  })

  describe('newRevisionEmail', () => {
    it('lists parameter changes with labels', () => {
      const message = newRevisionEmail(
        config,
        ocatData,
        '23456.001',
        'norm',
        { original: { dec: -30.25 }, requested: { dec: -30 } },
        alice,
        'Please review',
      )

      expect(message.subject).toBe('Parameter Change Log: 23456.001')
      expect(message.text).toBe(
        'Obsid = 23456\n' +
          'Sequence Number = 500123\n' +
          'Target Name = NGC 1234\n' +
          'User = alice\n' +
          '\nPARAMETER CHANGES:\n' +
          'Dec (deg): -30.25 => -30\n' +
          '\nCOMMENT = \nPlease review\n' +
          '\n' +
          LINKS,
      )
    })

    it('copies split requests to ArcOps', () => {
      const message = newRevisionEmail(config, ocatData, '23456.001', 'clone', { original: {}, requested: {} }, alice)

      expect(message.subject).toBe('Parameter Change Log: 23456.001 (Split Request)')
      expect(message.cc).toEqual(['cus@example.org', 'arcops@example.org'])
      expect(message.text).toContain('SPLIT REQUESTED\n')
      expect(message.text).not.toContain('COMMENT')
    })
  })

  describe('signoffNotify', () => {
    it('ignores observations that are not TOO or DDT', () => {
      const signoff = signoffWith({ generalStatus: 'Signed' })
      expect(signoffNotify(config, { ...ocatData, obs_type: 'GO' }, '23456.001', signoff, alice, bob)).toBeNull()
    })

    it('asks the instrument team once ArcOps is done', () => {
      const signoff = signoffWith({ generalStatus: 'Signed' })

      const acis = signoffNotify(config, ocatData, '23456.001', signoff, alice, bob)
      const hrc = signoffNotify(config, { ...ocatData, instrument: 'HRC-I' }, '23456.001', signoff, alice, bob)

      expect(acis?.subject).toBe('TOO SI Mode Sign Off Request: (Obsid: 23456)')
      expect(acis?.to).toEqual(['acisdude@example.org'])
      expect(hrc?.to).toEqual(['hrcdude@example.org'])
    })

    it('asks ArcOps once the instrument team is done', () => {
      const signoff = signoffWith({ acisSiStatus: 'Signed' })

      const message = signoffNotify(config, ocatData, '23456.001', signoff, alice, bob)

      expect(message?.subject).toBe('TOO General/ACIS Sign Off Request: (Obsid: 23456)')
      expect(message?.to).toEqual(['arcops@example.org'])
    })

    it('asks the submitter and signer for the usint signoff last', () => {
      const signoff = signoffWith({ generalStatus: 'Signed', acisSiStatus: 'Signed' })

      const message = signoffNotify(config, { ...ocatData, obs_type: 'DDT' }, '23456.001', signoff, alice, bob)

      expect(message?.subject).toBe('DDT Usint Sign Off Request: (Obsid: 23456)')
      expect(message?.to).toEqual(['alice@example.org', 'bob@example.org'])
      expect(message?.text).toBe(
        'Editing of all entries of 23456.001 were finished and signed off.\n' + 'Please verify and signoff.\n' + LINKS,
      )
    })

    it('stays quiet when everything is signed', () => {
      const signoff = signoffWith({ generalStatus: 'Signed', acisSiStatus: 'Signed', usintStatus: 'Signed' })
      expect(signoffNotify(config, ocatData, '23456.001', signoff, alice, alice)).toBeNull()
    })
  })

  describe('error reports', () => {
    it('addresses the administrators', () => {
      const message = errorEmail(config, new Error('boom'), alice, TEST_NOW)

      expect(message.to).toEqual(['usint-admin@example.org'])
      expect(message.from).toBe('UsintErrorHandler <cus@example.org>')
      expect(message.subject).toBe('Usint Error-[Wed Mar 5 12:00:00 2025]')
      expect(message.text.startsWith('User: alice\n\nError: boom')).toBe(true)
    })

    it('swallows delivery failures after logging them', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined)

      await expect(sendErrorEmail(createFailingMailer(), config, new Error('boom'), null)).resolves.toBeUndefined()
      expect(errorSpy).toHaveBeenCalledTimes(1)
    })
  })

  describe('createMailer', () => {
    it('logs instead of sending when test notifications are on', async () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined)
      const mailer = createMailer(config)

      await mailer.send({ to: ['alice@example.org'], cc: [], subject: 'Hello', text: 'body' })

      expect(logSpy).toHaveBeenCalledTimes(1)
      expect(String(logSpy.mock.calls[0][0])).toContain('Test notification, not sent:\nSubject: Hello\nTo: alice@example.org')
    })

    it('renders messages as plain text', () => {
      expect(renderMessage({ to: ['a@example.org'], cc: [], subject: 'S', text: 'body' })).toBe(
        'Subject: S\nTo: a@example.org\nCC: \n\nbody',
      )
    })
  })
})
