import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { MailAccount } from '../account/types'
import { JobCancelledError, UnsupportedProviderError } from '../errors'
import { createBatchRestoreJob } from '../jobs/job-factory'
import { JobQueue, type JobHandlers } from '../jobs/job-queue'
import { createFakeMailbox, FakeMailSource, type FakeMailbox } from '../test-support/fake-mail-source'
import { createTestStore, imapAccountInput, type TestStore } from '../test-support/fixtures'
import { BatchRestoreService, createBatchRestoreJobHandler } from './batch-restore-service'

describe('BatchRestoreService', () => {
  let store: TestStore
  let mailbox: FakeMailbox
  let opened: MailAccount[]
  let service: BatchRestoreService
  let sourceAccountId: number
  let targetAccountId: number

  const archiveMessage = (subject: string): number =>
    store.archive.saveMessage({
      accountId: sourceAccountId,
      messageId: `<${subject}@example.com>`,
      subject,
      from: 'alice@example.com',
      to: 'owner@example.com',
      cc: '',
      bcc: '',
      sentDate: Date.UTC(2023, 0, 1),
      isOutgoing: false,
      folderName: 'INBOX',
      body: `${subject} body`,
      htmlBody: '',
      isBodyTruncated: false,
      isHtmlTruncated: false,
      hasAttachments: false,
      attachments: []
    }).id

  beforeEach(() => {
    store = createTestStore()
    mailbox = createFakeMailbox()
    opened = []
    sourceAccountId = store.accounts.createAccount(imapAccountInput({ name: 'Source' })).id
    targetAccountId = store.accounts.createAccount(imapAccountInput({ name: 'Target' })).id
    service = new BatchRestoreService(
      store.accounts,
      store.archive,
      (account) => {
        opened.push(account)
        return new FakeMailSource(account, mailbox)
      },
      { batchSize: 2, pauseBetweenEmailsMs: 0, pauseBetweenBatchesMs: 0 }
    )
  })

  afterEach(() => {
    store.database.close()
  })

  it('should push every message and count failures independently', async () => {
    const ids = ['one', 'two', 'three', 'four', 'five'].map(archiveMessage)
    mailbox.pushFailures.add('two')
    mailbox.pushFailures.add('four')

    const result = await service.restoreBatch(ids, targetAccountId, 'Restored')

    expect(result.total).toBe(5)
    expect(result.processed).toBe(5)
    expect(result.succeeded).toBe(3)
    expect(result.failed).toBe(2)
    expect(result.errors.map((e) => e.emailId)).toEqual([ids[1], ids[3]])
    expect(mailbox.pushed.map((p) => [p.folder, p.message.message.subject])).toEqual([
      ['Restored', 'one'],
      ['Restored', 'three'],
      ['Restored', 'five']
    ])
    expect(mailbox.connects).toBe(1)
    expect(mailbox.closes).toBe(1)
  })

  it('should count an id missing from the archive as failed', async () => {
    const id = archiveMessage('present')
    const result = await service.restoreBatch([id, 424242], targetAccountId, 'INBOX')

    expect(result.succeeded).toBe(1)
    expect(result.failed).toBe(1)
    expect(result.errors).toEqual([{ emailId: 424242, error: 'Archived message not found' }])
  })

  it('should open the adapter of the target account once', async () => {
    const m365 = store.accounts.createAccount({
      name: 'Tenant',
      emailAddress: 'user@contoso.example',
      provider: 'm365',
      graph: { tenantId: 'tenant-1', clientId: 'client-1', clientSecret: 'test-secret' }
    })
    const ids = ['a', 'b', 'c'].map(archiveMessage)

    await service.restoreBatch(ids, m365.id, 'Inbox')

    expect(opened.map((a) => [a.id, a.provider])).toEqual([[m365.id, 'm365']])
  })

  it('should refuse an import-only target account', async () => {
    const imported = store.accounts.createAccount({
      name: 'Imported',
      emailAddress: 'old@example.com',
      provider: 'import'
    })
    await expect(
      service.restoreBatch([archiveMessage('x')], imported.id, 'INBOX')
    ).rejects.toBeInstanceOf(UnsupportedProviderError)
    expect(opened).toEqual([])
  })

  it('should stop when cancelled and still close the connection', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(
      service.restoreBatch([archiveMessage('x')], targetAccountId, 'INBOX', {
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(JobCancelledError)
    expect(mailbox.pushed).toEqual([])
    expect(mailbox.closes).toBe(1)
  })

  it('should fail every message when the target cannot be reached', async () => {
    const ids = ['one', 'two', 'three'].map(archiveMessage)
    mailbox.connectError = new Error('IMAP connect failed: ECONNREFUSED')

    const result = await service.restoreBatch(ids, targetAccountId, 'INBOX')

    expect(result.processed).toBe(3)
    expect(result.succeeded).toBe(0)
    expect(result.failed).toBe(3)
    expect(result.errors).toEqual(
      ids.map((emailId) => ({ emailId, error: 'IMAP connect failed: ECONNREFUSED' }))
    )
    expect(mailbox.pushed).toEqual([])
    expect(mailbox.closes).toBe(1)
  })

  it('should complete a queued restore job with per-message failures when the target is offline', async () => {
    const ids = ['one', 'two', 'three'].map(archiveMessage)
    mailbox.connectError = new Error('IMAP connect failed: ECONNREFUSED')
    const handlers: JobHandlers = {
      sync: { run: async () => undefined },
      import: { run: async () => undefined },
      'batch-restore': createBatchRestoreJobHandler(service)
    }
    const queue = new JobQueue(handlers, {
      idlePollMs: 5,
      errorBackoffMs: 5,
      retentionDays: 7,
      cleanupIntervalHours: 24
    })
    const jobId = queue.enqueue(
      createBatchRestoreJob({ accountId: targetAccountId, emailIds: ids, targetFolder: 'INBOX' })
    )

    await queue.drain()

    const job = queue.getJob(jobId)
    expect(job?.status).toBe('completed')
    expect(job?.processed).toBe(3)
    expect(job?.succeeded).toBe(0)
    expect(job?.failed).toBe(3)
  })

  it('should mirror progress onto a background job', async () => {
    const ids = ['one', 'two', 'three'].map(archiveMessage)
    mailbox.pushFailures.add('three')
    const job = createBatchRestoreJob({ accountId: targetAccountId, emailIds: ids, targetFolder: 'INBOX' })

    await createBatchRestoreJobHandler(service).run(job, { signal: new AbortController().signal })

    expect(job.total).toBe(3)
    expect(job.processed).toBe(3)
    expect(job.succeeded).toBe(2)
    expect(job.failed).toBe(1)
  })
})
