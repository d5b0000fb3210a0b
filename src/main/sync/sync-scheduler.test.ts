import { describe, it, expect, vi, afterEach } from 'vitest'
import { JobQueue, type JobHandlers } from '../jobs/job-queue'
import { createTestStore, imapAccountInput } from '../test-support/fixtures'
import { SyncScheduler } from './sync-scheduler'

function idleHandlers(): JobHandlers {
  return {
    sync: { run: async () => undefined },
    import: { run: async () => undefined },
    'batch-restore': { run: async () => undefined }
  }
}

const queueOptions = { idlePollMs: 5, errorBackoffMs: 5, retentionDays: 7, cleanupIntervalHours: 24 }

describe('SyncScheduler', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should queue a sync for each enabled mailbox account', () => {
    const { accounts, database } = createTestStore()
    const active = accounts.createAccount(imapAccountInput({ name: 'Active' }))
    const disabled = accounts.createAccount(imapAccountInput({ name: 'Disabled' }))
    accounts.setEnabled(disabled.id, false)
    accounts.createAccount({ name: 'Imported', emailAddress: 'old@example.com', provider: 'import' })
    const queue = new JobQueue(idleHandlers(), queueOptions)

    const queued = new SyncScheduler(accounts, queue, { intervalMinutes: 15 }).tick()

    expect(queued).toHaveLength(1)
    expect(queue.getJob(queued[0])?.accountId).toBe(active.id)
    expect(queue.getJob(queued[0])?.kind).toBe('sync')
    database.close()
  })

  it('should not queue a second sync while one is pending', () => {
    const { accounts, database } = createTestStore()
    accounts.createAccount(imapAccountInput())
    const queue = new JobQueue(idleHandlers(), queueOptions)
    const scheduler = new SyncScheduler(accounts, queue, { intervalMinutes: 15 })

    expect(scheduler.tick()).toHaveLength(1)
    expect(scheduler.tick()).toHaveLength(0)
    expect(queue.getActiveJobs()).toHaveLength(1)
    database.close()
  })

  it('should tick on the configured interval once started', () => {
    vi.useFakeTimers()
    const { accounts, database } = createTestStore()
    accounts.createAccount(imapAccountInput())
    const queue = new JobQueue(idleHandlers(), queueOptions)
    const scheduler = new SyncScheduler(accounts, queue, { intervalMinutes: 15 })

    scheduler.start()
    vi.advanceTimersByTime(14 * 60 * 1000)
    expect(queue.getAllJobs()).toHaveLength(0)
    vi.advanceTimersByTime(60 * 1000)
    expect(queue.getAllJobs()).toHaveLength(1)

    scheduler.stop()
    vi.advanceTimersByTime(60 * 60 * 1000)
    expect(queue.getAllJobs()).toHaveLength(1)
    database.close()
  })

  it('should stay idle when the interval is zero', () => {
    vi.useFakeTimers()
    const { accounts, database } = createTestStore()
    accounts.createAccount(imapAccountInput())
    const queue = new JobQueue(idleHandlers(), queueOptions)

    new SyncScheduler(accounts, queue, { intervalMinutes: 0 }).start()
    vi.advanceTimersByTime(60 * 60 * 1000)
    expect(queue.getAllJobs()).toHaveLength(0)
    database.close()
  })
})
