import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import type { MailAccount } from './account/types'
import { FULL_ACCESS, type AccessScope } from './archive-service'
import {
  AccessDeniedError,
  AccountNotFoundError,
  AdmissionError,
  SyncInProgressError,
  UnsupportedProviderError
} from './errors'
import { createArchiveRuntime, type ArchiveRuntime } from './index'
import {
  addFakeMessage,
  createFakeMailbox,
  FakeMailSource,
  type FakeMailbox
} from './test-support/fake-mail-source'
import { buildEml, imapAccountInput, makeTempDir } from './test-support/fixtures'

describe('ArchiveService', () => {
  let dir: string
  let mailbox: FakeMailbox
  let runtime: ArchiveRuntime
  let owner: MailAccount
  let stranger: MailAccount
  let ownerScope: AccessScope

  const archiveMessage = (accountId: number, subject: string): number =>
    runtime.archive.saveMessage({
      accountId,
      messageId: `<${subject}@example.com>`,
      subject,
      from: 'alice@example.com',
      to: 'owner@example.com',
      cc: '',
      bcc: '',
      sentDate: Date.UTC(2023, 0, 1),
      isOutgoing: false,
      folderName: 'INBOX',
      body: '',
      htmlBody: '',
      isBodyTruncated: false,
      isHtmlTruncated: false,
      hasAttachments: false,
      attachments: []
    }).id

  beforeEach(() => {
    dir = makeTempDir('service')
    mailbox = createFakeMailbox()
    runtime = createArchiveRuntime({
      settings: {
        storage: { databaseFile: ':memory:', uploadsDir: path.join(dir, 'uploads') },
        batch: {
          asyncThreshold: 2,
          maxSyncEmails: 150,
          maxAsyncEmails: 4,
          pauseBetweenEmailsMs: 0,
          pauseBetweenBatchesMs: 0
        },
        jobs: { idlePollMs: 5, errorBackoffMs: 5 },
        sync: { intervalMinutes: 0 }
      },
      sources: (account) => {
        if (account.name === 'Offline') {
          throw new Error('IMAP connect failed: ECONNREFUSED')
        }
        return new FakeMailSource(account, mailbox)
      }
    })
    owner = runtime.accountStore.createAccount(imapAccountInput({ name: 'Owner' }))
    stranger = runtime.accountStore.createAccount(imapAccountInput({ name: 'Stranger' }))
    ownerScope = { allowedAccountIds: [owner.id] }
  })

  afterEach(async () => {
    await runtime.stop()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  describe('enqueueSync', () => {
    it('should queue one sync per account at a time', () => {
      const jobId = runtime.service.enqueueSync(owner.id, ownerScope)

      expect(runtime.service.getJobStatus(jobId, ownerScope)?.status).toBe('queued')
      expect(() => runtime.service.enqueueSync(owner.id, ownerScope)).toThrow(SyncInProgressError)
    })

    it('should refuse accounts outside the caller scope', () => {
      expect(() => runtime.service.enqueueSync(stranger.id, ownerScope)).toThrow(AccessDeniedError)
      expect(runtime.queue.getAllJobs()).toEqual([])
    })

    it('should refuse unknown and import-only accounts', () => {
      const imported = runtime.accountStore.createAccount({
        name: 'Imported',
        emailAddress: 'old@example.com',
        provider: 'import'
      })
      expect(() => runtime.service.enqueueSync(999, FULL_ACCESS)).toThrow(AccountNotFoundError)
      expect(() => runtime.service.enqueueSync(imported.id, FULL_ACCESS)).toThrow(
        UnsupportedProviderError
      )
    })
  })

  describe('enqueueImport', () => {
    it('should detect the format from the file name', () => {
      const jobId = runtime.service.enqueueImport(
        { filePath: '/tmp/x.mbox', fileName: 'x.mbox', fileSize: 10, accountId: owner.id },
        ownerScope
      )
      const job = runtime.service.getJob(jobId, ownerScope)
      expect(job?.kind === 'import' && job.format).toBe('mbox')
      expect(job?.kind === 'import' && job.defaultFolder).toBe('INBOX')
    })

    it('should reject an unknown file type', () => {
      expect(() =>
        runtime.service.enqueueImport(
          { filePath: '/tmp/x.pst', fileName: 'x.pst', fileSize: 10, accountId: owner.id },
          ownerScope
        )
      ).toThrow(AdmissionError)
    })
  })

  describe('startBatchRestore', () => {
    it('should restore small batches inline', async () => {
      const ids = [archiveMessage(owner.id, 'a'), archiveMessage(owner.id, 'b')]

      const started = await runtime.service.startBatchRestore(ids, owner.id, 'Restored', ownerScope)

      expect(started.mode).toBe('inline')
      expect(started.mode === 'inline' && started.result.succeeded).toBe(2)
      expect(mailbox.pushed).toHaveLength(2)
      expect(runtime.queue.getAllJobs()).toEqual([])
    })

    it('should queue a job above the async threshold', async () => {
      const ids = ['a', 'b', 'c'].map((s) => archiveMessage(owner.id, s))

      const started = await runtime.service.startBatchRestore(ids, owner.id, 'Restored', ownerScope)

      expect(started.mode).toBe('job')
      const jobId = started.mode === 'job' ? started.jobId : ''
      const status = runtime.service.getJobStatus(jobId, ownerScope)
      expect(status?.kind).toBe('batch-restore')
      expect(status?.total).toBe(3)
      expect(mailbox.pushed).toEqual([])
    })

    it('should reject batches above the maximum before creating a job', async () => {
      const ids = ['a', 'b', 'c', 'd', 'e'].map((s) => archiveMessage(owner.id, s))

      await expect(
        runtime.service.startBatchRestore(ids, owner.id, 'Restored', ownerScope)
      ).rejects.toBeInstanceOf(AdmissionError)
      await expect(
        runtime.service.startBatchRestore([], owner.id, 'Restored', ownerScope)
      ).rejects.toBeInstanceOf(AdmissionError)
      expect(runtime.queue.getAllJobs()).toEqual([])
    })

    it('should check ownership of more ids than one statement can bind', async () => {
      runtime.settings.batch.maxAsyncEmails = 50_000
      const known = archiveMessage(owner.id, 'known')
      const ids = Array.from({ length: 40_000 }, (_, i) => (i === 0 ? known : 1_000_000 + i))

      const started = await runtime.service.startBatchRestore(ids, owner.id, 'Restored', ownerScope)

      expect(started.mode).toBe('job')
      const jobId = started.mode === 'job' ? started.jobId : ''
      expect(runtime.service.getJobStatus(jobId, ownerScope)?.total).toBe(40_000)
    })

    it('should refuse messages owned by an account outside the scope', async () => {
      const foreign = archiveMessage(stranger.id, 'foreign')
      await expect(
        runtime.service.startBatchRestore([foreign], owner.id, 'INBOX', ownerScope)
      ).rejects.toBeInstanceOf(AccessDeniedError)
      expect(mailbox.pushed).toEqual([])
    })
  })

  describe('startAccountRestore', () => {
    it('should queue every archived message of the account', () => {
      const ids = ['a', 'b'].map((s) => archiveMessage(owner.id, s))

      const jobId = runtime.service.startAccountRestore(owner.id, owner.id, 'Restored', ownerScope)

      const job = runtime.service.getJob(jobId, ownerScope)
      expect(job?.kind === 'batch-restore' && job.emailIds).toEqual(ids)
    })

    it('should reject an account without archived mail', () => {
      expect(() =>
        runtime.service.startAccountRestore(owner.id, owner.id, 'Restored', ownerScope)
      ).toThrow(AdmissionError)
    })
  })

  describe('job visibility', () => {
    it('should only show and cancel jobs of allowed accounts', () => {
      const mine = runtime.service.enqueueSync(owner.id, ownerScope)
      const theirs = runtime.service.enqueueSync(stranger.id, FULL_ACCESS)

      expect(runtime.service.getAllJobs(ownerScope).map((j) => j.jobId)).toEqual([mine])
      expect(runtime.service.getActiveJobs(FULL_ACCESS)).toHaveLength(2)
      expect(runtime.service.getJobStatus(theirs, ownerScope)).toBeNull()
      expect(runtime.service.cancelJob(theirs, ownerScope)).toBe(false)
      expect(runtime.service.cancelJob(mine, ownerScope)).toBe(true)
      expect(runtime.service.getJobStatus(mine, ownerScope)?.status).toBe('cancelled')
    })
  })

  describe('listFolders', () => {
    it('should return the provider folders', async () => {
      addFakeMessage(mailbox, 'INBOX', {
        ref: '1',
        messageId: null,
        date: 0,
        subject: 's',
        raw: Buffer.from('')
      })
      addFakeMessage(mailbox, 'Archive', {
        ref: '2',
        messageId: null,
        date: 0,
        subject: 's',
        raw: Buffer.from('')
      })
      await expect(runtime.service.listFolders(owner.id, ownerScope)).resolves.toEqual({
        success: true,
        folders: ['INBOX', 'Archive']
      })
    })

    it('should fall back to INBOX when the provider lists nothing', async () => {
      await expect(runtime.service.listFolders(owner.id, ownerScope)).resolves.toEqual({
        success: true,
        folders: ['INBOX']
      })
    })

    it('should report a connection failure with the INBOX fallback', async () => {
      const offline = runtime.accountStore.createAccount(imapAccountInput({ name: 'Offline' }))
      await expect(runtime.service.listFolders(offline.id, FULL_ACCESS)).resolves.toEqual({
        success: false,
        folders: ['INBOX'],
        error: 'IMAP connect failed: ECONNREFUSED'
      })
    })
  })

  describe('runtime', () => {
    it('should run a queued sync to completion in the background', async () => {
      addFakeMessage(mailbox, 'INBOX', {
        ref: '1',
        messageId: '<bg@example.com>',
        date: Date.UTC(2024, 0, 1),
        subject: 'Background',
        raw: Buffer.from(buildEml({ messageId: 'bg@example.com', subject: 'Background' }))
      })
      runtime.start()

      const jobId = runtime.service.enqueueSync(owner.id, ownerScope)
      await vi.waitFor(() => {
        expect(runtime.service.getJobStatus(jobId, ownerScope)?.status).toBe('completed')
      })

      const status = runtime.service.getJobStatus(jobId, ownerScope)
      expect(status?.succeeded).toBe(1)
      expect(status?.progressPercent).toBe(100)
      expect(runtime.archive.exists(owner.id, '<bg@example.com>')).toBe(true)
    })
  })
})
