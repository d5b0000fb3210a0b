import { retentionCutoff, type AccountStore, type MailAccount } from '../account/types'
import {
  assertWellFormed,
  normalizeMessage,
  parseMessage
} from '../content/content-normalizer'
import {
  AccountNotFoundError,
  errorMessage,
  JobCancelledError,
  SyncInProgressError
} from '../errors'
import { sleep, throwIfCancelled, withRetry } from '../jobs/cancellation'
import type { JobHandler } from '../jobs/job-queue'
import type { SyncJob } from '../jobs/types'
import { logger, LogCategory } from '../logger'
import type { MailSource, MailSourceFactory, MessageRef } from '../mail/types'
import type { ArchiveRepository } from '../storage/archive-repository'

export interface SyncEngineOptions {
  pauseBetweenEmailsMs: number
  fetchRetries: number
  retryDelayMs: number
}

export interface SyncResult {
  accountId: number
  folders: number
  folderErrors: number
  processed: number
  newMessages: number
  skipped: number
  failed: number
  retentionDeleted: number
  retentionFailed: number
  retentionUnsupported: boolean
  cursorUpdated: boolean
  currentItem: string | null
  startedAt: number
  completedAt: number | null
}

export interface SyncRunOptions {
  signal?: AbortSignal
  // ignore the cursor and walk every message
  fullSync?: boolean
  onProgress?: (progress: Readonly<SyncResult>) => void
  now?: () => number
}

export interface SyncEngineDeps {
  accounts: AccountStore
  archive: ArchiveRepository
  sources: MailSourceFactory
}

// Dedup key for a message whose envelope carries no Message-ID
export function fallbackMessageKey(account: MailAccount, folder: string, ref: MessageRef): string {
  return `sync-${account.id}-${folder}-${ref.ref}`
}

export class SyncEngine {
  private inFlight: Set<number> = new Set()
  private deps: SyncEngineDeps
  private options: SyncEngineOptions

  constructor(deps: SyncEngineDeps, options: SyncEngineOptions) {
    this.deps = deps
    this.options = options
  }

  isSyncing(accountId: number): boolean {
    return this.inFlight.has(accountId)
  }

  /**
   * Archives everything new since the account cursor, then applies the
   * retention policy. Per-message failures are counted, not thrown. The
   * cursor moves only when every folder was enumerated.
   */
  async syncAccount(account: MailAccount, options: SyncRunOptions = {}): Promise<SyncResult> {
    if (this.inFlight.has(account.id)) {
      throw new SyncInProgressError(account.id)
    }
    this.inFlight.add(account.id)
    try {
      return await this.runSync(account, options)
    } finally {
      this.inFlight.delete(account.id)
    }
  }

  private async runSync(account: MailAccount, options: SyncRunOptions): Promise<SyncResult> {
    const now = options.now ?? Date.now
    const signal = options.signal ?? new AbortController().signal
    const result: SyncResult = {
      accountId: account.id,
      folders: 0,
      folderErrors: 0,
      processed: 0,
      newMessages: 0,
      skipped: 0,
      failed: 0,
      retentionDeleted: 0,
      retentionFailed: 0,
      retentionUnsupported: false,
      cursorUpdated: false,
      currentItem: null,
      startedAt: now(),
      completedAt: null
    }
    const report = (): void => options.onProgress?.(result)

    const since = options.fullSync || account.lastSync <= 0 ? undefined : account.lastSync
    const cutoff = retentionCutoff(account, result.startedAt)

    logger.info(LogCategory.SYNC, 'Sync started', {
      accountId: account.id,
      provider: account.provider,
      since: since ? new Date(since).toISOString() : 'all',
      retentionCutoff: cutoff ? new Date(cutoff).toISOString() : null
    })

    const source = this.deps.sources(account)
    await source.connect()
    try {
      const excluded = new Set(account.excludedFolders.map((f) => f.toLowerCase()))
      const folders = (await source.listFolders()).filter((f) => !excluded.has(f.toLowerCase()))
      result.folders = folders.length

      let retentionActive = cutoff !== null
      for (const folder of folders) {
        throwIfCancelled(signal)
        try {
          await this.archiveFolder(source, account, folder, since, result, signal, report)
        } catch (error) {
          if (error instanceof JobCancelledError) throw error
          result.folderErrors++
          logger.error(LogCategory.SYNC, 'Folder sync failed', {
            accountId: account.id,
            folder,
            error: errorMessage(error)
          })
          continue
        }

        if (retentionActive && cutoff !== null) {
          retentionActive = await this.applyRetention(source, account, folder, cutoff, result, signal)
          report()
        }
      }

      if (result.folderErrors === 0) {
        this.deps.accounts.updateLastSync(account.id, result.startedAt)
        result.cursorUpdated = true
      } else {
        logger.warn(LogCategory.SYNC, 'Cursor not advanced, some folders failed', {
          accountId: account.id,
          folderErrors: result.folderErrors
        })
      }
    } finally {
      await source.close()
    }

    result.completedAt = now()
    result.currentItem = null
    report()
    logger.info(LogCategory.SYNC, 'Sync completed', {
      accountId: account.id,
      folders: result.folders,
      newMessages: result.newMessages,
      skipped: result.skipped,
      failed: result.failed,
      retentionDeleted: result.retentionDeleted,
      durationMs: result.completedAt - result.startedAt
    })
    return result
  }

  private async archiveFolder(
    source: MailSource,
    account: MailAccount,
    folder: string,
    since: number | undefined,
    result: SyncResult,
    signal: AbortSignal,
    report: () => void
  ): Promise<void> {
    for await (const ref of source.listMessages(folder, { since })) {
      throwIfCancelled(signal)
      result.processed++
      result.currentItem = ref.subject ?? `${folder} #${ref.ref}`

      const knownKey = ref.messageId ?? fallbackMessageKey(account, folder, ref)
      if (this.deps.archive.exists(account.id, knownKey)) {
        result.skipped++
        report()
        continue
      }

      try {
        const raw = await withRetry(() => source.fetchSource(folder, ref), {
          retries: this.options.fetchRetries,
          delayMs: this.options.retryDelayMs,
          signal,
          onRetry: (attempt, error) =>
            logger.warn(LogCategory.SYNC, 'Retrying message fetch', {
              accountId: account.id,
              folder,
              ref: ref.ref,
              attempt,
              error: errorMessage(error)
            })
        })
        const parsed = await parseMessage(raw)
        assertWellFormed(parsed)

        const outcome = this.deps.archive.saveMessage(
          normalizeMessage(parsed, {
            accountId: account.id,
            accountEmail: account.emailAddress,
            folderName: folder,
            messageId: ref.messageId ?? parsed.messageId ?? knownKey,
            fallbackDate: ref.date ?? undefined
          })
        )
        if (outcome.status === 'created') {
          result.newMessages++
        } else {
          result.skipped++
        }
      } catch (error) {
        if (error instanceof JobCancelledError) throw error
        result.failed++
        logger.warn(LogCategory.SYNC, 'Message sync failed', {
          accountId: account.id,
          folder,
          ref: ref.ref,
          error: errorMessage(error)
        })
      }

      report()
      await sleep(this.options.pauseBetweenEmailsMs, signal)
    }
  }

  /**
   * Deletes messages older than the cutoff from the live mailbox, one
   * request per message and only for messages already in the archive.
   * Returns false when the provider cannot delete, which ends retention for
   * this run.
   */
  private async applyRetention(
    source: MailSource,
    account: MailAccount,
    folder: string,
    cutoff: number,
    result: SyncResult,
    signal: AbortSignal
  ): Promise<boolean> {
    // collected first: deleting while paging shifts provider offsets
    const candidates: MessageRef[] = []
    for await (const ref of source.listMessages(folder, { before: cutoff })) {
      if (ref.date !== null && ref.date >= cutoff) continue
      const key = ref.messageId ?? fallbackMessageKey(account, folder, ref)
      if (this.deps.archive.exists(account.id, key)) {
        candidates.push(ref)
      }
    }

    for (const ref of candidates) {
      throwIfCancelled(signal)
      const deletion = await source.deleteMessage(folder, ref)
      if (deletion.success) {
        result.retentionDeleted++
        continue
      }
      if (deletion.unsupported) {
        result.retentionUnsupported = true
        logger.warn(LogCategory.RETENTION, 'Provider cannot delete permanently, retention skipped', {
          accountId: account.id,
          folder,
          error: deletion.error
        })
        return false
      }
      result.retentionFailed++
      logger.warn(LogCategory.RETENTION, 'Retention delete failed', {
        accountId: account.id,
        folder,
        ref: ref.ref,
        error: deletion.error
      })
    }

    if (candidates.length > 0) {
      logger.info(LogCategory.RETENTION, 'Retention applied', {
        accountId: account.id,
        folder,
        candidates: candidates.length,
        deleted: result.retentionDeleted
      })
    }
    return true
  }
}

/**
 * Job body for queued syncs: resolves the account at run time and mirrors
 * engine progress onto the job counters.
 */
export function createSyncJobHandler(engine: SyncEngine, accounts: AccountStore): JobHandler<SyncJob> {
  return {
    async run(job, ctx) {
      const account = accounts.getAccount(job.accountId)
      if (!account) {
        throw new AccountNotFoundError(job.accountId)
      }

      // mailboxes are listed lazily, so the total grows with what has been seen
      const mirror = (progress: Readonly<SyncResult>): void => {
        job.total = progress.processed
        job.processed = progress.processed
        job.succeeded = progress.newMessages
        job.newMessages = progress.newMessages
        job.skipped = progress.skipped
        job.failed = progress.failed
        job.retentionDeleted = progress.retentionDeleted
        job.retentionFailed = progress.retentionFailed
        job.currentItem = progress.currentItem
      }

      const result = await engine.syncAccount(account, {
        signal: ctx.signal,
        fullSync: job.fullSync,
        onProgress: mirror
      })
      mirror(result)
    }
  }
}
