import type { AccountStore } from '../account/types'
import { errorMessage } from '../errors'
import { createSyncJob } from '../jobs/job-factory'
import type { JobQueue } from '../jobs/job-queue'
import { logger, LogCategory } from '../logger'

export interface SyncSchedulerOptions {
  intervalMinutes: number
}

/**
 * Periodically queues a sync for every enabled mailbox account that has no
 * sync queued or running.
 */
export class SyncScheduler {
  private intervalId: NodeJS.Timeout | null = null
  private accounts: AccountStore
  private queue: JobQueue
  private options: SyncSchedulerOptions

  constructor(accounts: AccountStore, queue: JobQueue, options: SyncSchedulerOptions) {
    this.accounts = accounts
    this.queue = queue
    this.options = options
  }

  start(): void {
    if (this.intervalId) return
    if (this.options.intervalMinutes <= 0) {
      logger.info(LogCategory.SCHEDULER, 'Periodic sync disabled')
      return
    }

    this.intervalId = setInterval(() => {
      try {
        this.tick()
      } catch (error) {
        logger.error(LogCategory.SCHEDULER, 'Scheduled sync tick failed', {
          error: errorMessage(error)
        })
      }
    }, this.options.intervalMinutes * 60 * 1000)
    this.intervalId.unref()
    logger.info(LogCategory.SCHEDULER, 'Sync scheduler started', {
      intervalMinutes: this.options.intervalMinutes
    })
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId)
      this.intervalId = null
    }
  }

  // Returns the ids of the jobs queued by this tick
  tick(): string[] {
    const queued: string[] = []
    for (const account of this.accounts.listAccounts()) {
      if (!account.enabled || account.provider === 'import') continue
      const busy = this.queue.hasActiveJob(
        (job) => job.kind === 'sync' && job.accountId === account.id
      )
      if (busy) {
        logger.debug(LogCategory.SCHEDULER, 'Sync already pending', { accountId: account.id })
        continue
      }
      queued.push(
        this.queue.enqueue(createSyncJob({ accountId: account.id, accountName: account.name }))
      )
    }
    return queued
  }
}
