import type { AccountStore, MailAccount } from '../account/types'
import { AccountNotFoundError, errorMessage, UnsupportedProviderError } from '../errors'
import { sleep, throwIfCancelled } from '../jobs/cancellation'
import type { JobHandler } from '../jobs/job-queue'
import type { BatchRestoreJob } from '../jobs/types'
import { logger, LogCategory } from '../logger'
import type { MailSourceFactory } from '../mail/types'
import type { ArchiveRepository } from '../storage/archive-repository'

export interface BatchRestoreOptions {
  batchSize: number
  pauseBetweenEmailsMs: number
  pauseBetweenBatchesMs: number
}

export interface RestoreProgress {
  total: number
  processed: number
  succeeded: number
  failed: number
  currentItem: string | null
}

export interface RestoreRunOptions {
  signal?: AbortSignal
  onProgress?: (progress: Readonly<RestoreProgress>) => void
}

export interface RestoreResult extends RestoreProgress {
  targetAccountId: number
  targetFolder: string
  // per-message failure reasons, keyed by archive id
  errors: { emailId: number; error: string }[]
}

export class BatchRestoreService {
  private accounts: AccountStore
  private archive: ArchiveRepository
  private sources: MailSourceFactory
  private options: BatchRestoreOptions

  constructor(
    accounts: AccountStore,
    archive: ArchiveRepository,
    sources: MailSourceFactory,
    options: BatchRestoreOptions
  ) {
    this.accounts = accounts
    this.archive = archive
    this.sources = sources
    this.options = options
  }

  resolveTarget(accountId: number): MailAccount {
    const account = this.accounts.getAccount(accountId)
    if (!account) {
      throw new AccountNotFoundError(accountId)
    }
    if (account.provider === 'import') {
      throw new UnsupportedProviderError(
        `Account ${accountId} is an import-only archive and cannot receive restored mail`
      )
    }
    return account
  }

  /**
   * Pushes archived messages into a folder of the target account. Each
   * message succeeds or fails on its own. An unreachable target fails every
   * message with the connection error; only cancellation ends the run early.
   */
  async restoreBatch(
    emailIds: number[],
    targetAccountId: number,
    targetFolder: string,
    options: RestoreRunOptions = {}
  ): Promise<RestoreResult> {
    const target = this.resolveTarget(targetAccountId)
    const signal = options.signal ?? new AbortController().signal
    const result: RestoreResult = {
      targetAccountId,
      targetFolder,
      total: emailIds.length,
      processed: 0,
      succeeded: 0,
      failed: 0,
      currentItem: null,
      errors: []
    }
    const report = (): void => options.onProgress?.(result)

    logger.info(LogCategory.RESTORE, 'Batch restore started', {
      targetAccountId,
      provider: target.provider,
      targetFolder,
      total: emailIds.length
    })

    const source = this.sources(target)
    try {
      try {
        await source.connect()
      } catch (error) {
        const reason = errorMessage(error)
        logger.error(LogCategory.RESTORE, 'Restore target unreachable', {
          targetAccountId,
          error: reason
        })
        for (const emailId of emailIds) {
          result.failed++
          result.processed++
          result.errors.push({ emailId, error: reason })
        }
        report()
        return this.finish(result)
      }

      for (const emailId of emailIds) {
        throwIfCancelled(signal)

        const restorable = this.archive.getMessageWithAttachments(emailId)
        result.currentItem = restorable?.message.subject ?? `#${emailId}`
        if (!restorable) {
          result.failed++
          result.errors.push({ emailId, error: 'Archived message not found' })
        } else {
          const pushed = await source.pushMessage(targetFolder, restorable)
          if (pushed.success) {
            result.succeeded++
          } else {
            result.failed++
            result.errors.push({ emailId, error: pushed.error ?? 'Unknown error' })
            logger.warn(LogCategory.RESTORE, 'Message restore failed', {
              emailId,
              targetAccountId,
              error: pushed.error
            })
          }
        }
        result.processed++
        report()

        if (result.processed < emailIds.length) {
          const batchBoundary = result.processed % this.options.batchSize === 0
          await sleep(
            batchBoundary ? this.options.pauseBetweenBatchesMs : this.options.pauseBetweenEmailsMs,
            signal
          )
        }
      }
    } finally {
      await source.close()
    }
    return this.finish(result)
  }

  private finish(result: RestoreResult): RestoreResult {
    result.currentItem = null
    logger.info(LogCategory.RESTORE, 'Batch restore finished', {
      targetAccountId: result.targetAccountId,
      targetFolder: result.targetFolder,
      succeeded: result.succeeded,
      failed: result.failed
    })
    return result
  }
}

export function createBatchRestoreJobHandler(service: BatchRestoreService): JobHandler<BatchRestoreJob> {
  return {
    async run(job, ctx) {
      await service.restoreBatch(job.emailIds, job.accountId, job.targetFolder, {
        signal: ctx.signal,
        onProgress: (progress) => {
          job.processed = progress.processed
          job.succeeded = progress.succeeded
          job.failed = progress.failed
          job.currentItem = progress.currentItem
        }
      })
    }
  }
}
