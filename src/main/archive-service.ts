/**
 * Entry points for callers outside the job core
 * - every call carries the caller's AccessScope
 * - restores are admitted inline, as a job, or rejected by size
 */
import type { AccountStore, MailAccount } from './account/types'
import {
  AccessDeniedError,
  AccountNotFoundError,
  AdmissionError,
  errorMessage,
  SyncInProgressError,
  UnsupportedProviderError
} from './errors'
import { detectImportFormat, type ImportService } from './import/import-service'
import { createBatchRestoreJob, createImportJob, createSyncJob } from './jobs/job-factory'
import type { JobQueue } from './jobs/job-queue'
import { toJobStatusView, type ImportFormat, type Job, type JobStatusView } from './jobs/types'
import { logger, LogCategory } from './logger'
import type { MailSourceFactory } from './mail/types'
import type { BatchRestoreService, RestoreResult } from './restore/batch-restore-service'
import type { BatchSettings } from './settings/archive-settings'
import type { ArchiveRepository } from './storage/archive-repository'

export interface AccessScope {
  // null grants every account
  allowedAccountIds: number[] | null
}

export const FULL_ACCESS: AccessScope = { allowedAccountIds: null }

export interface ImportRequest {
  filePath: string
  fileName: string
  fileSize: number
  accountId: number
  defaultFolder?: string
  format?: ImportFormat
}

export type RestoreStart = { mode: 'inline'; result: RestoreResult } | { mode: 'job'; jobId: string }

export interface FolderListResult {
  success: boolean
  folders: string[]
  error?: string
}

export interface ArchiveServiceDeps {
  accounts: AccountStore
  archive: ArchiveRepository
  queue: JobQueue
  sources: MailSourceFactory
  importer: ImportService
  restorer: BatchRestoreService
  batch: BatchSettings
}

export function canAccess(scope: AccessScope, accountId: number): boolean {
  return scope.allowedAccountIds === null || scope.allowedAccountIds.includes(accountId)
}

export class ArchiveService {
  private deps: ArchiveServiceDeps

  constructor(deps: ArchiveServiceDeps) {
    this.deps = deps
  }

  private assertAccess(scope: AccessScope, accountId: number): void {
    if (!canAccess(scope, accountId)) {
      logger.warn(LogCategory.ACCESS, 'Account outside caller scope', { accountId })
      throw new AccessDeniedError(accountId)
    }
  }

  private requireAccount(accountId: number, scope: AccessScope): MailAccount {
    this.assertAccess(scope, accountId)
    const account = this.deps.accounts.getAccount(accountId)
    if (!account) {
      throw new AccountNotFoundError(accountId)
    }
    return account
  }

  // ─── Sync ───────────────────────────────────────────────────────────

  enqueueSync(accountId: number, scope: AccessScope, options: { fullSync?: boolean } = {}): string {
    const account = this.requireAccount(accountId, scope)
    if (account.provider === 'import') {
      throw new UnsupportedProviderError(`Account ${accountId} is an import-only archive`)
    }
    const pending = this.deps.queue.hasActiveJob(
      (job) => job.kind === 'sync' && job.accountId === accountId
    )
    if (pending) {
      throw new SyncInProgressError(accountId)
    }
    return this.deps.queue.enqueue(
      createSyncJob({ accountId, accountName: account.name, fullSync: options.fullSync })
    )
  }

  // ─── Import ─────────────────────────────────────────────────────────

  enqueueImport(request: ImportRequest, scope: AccessScope): string {
    this.requireAccount(request.accountId, scope)
    const format = request.format ?? detectImportFormat(request.fileName)
    if (!format) {
      throw new AdmissionError(`Unsupported import file type: ${request.fileName}`)
    }
    return this.deps.queue.enqueue(
      createImportJob({
        accountId: request.accountId,
        format,
        filePath: request.filePath,
        fileName: request.fileName,
        fileSize: request.fileSize,
        defaultFolder: request.defaultFolder
      })
    )
  }

  /**
   * Stages an uploaded file and queues its import in one step.
   */
  async importUpload(
    sourcePath: string,
    originalName: string,
    accountId: number,
    scope: AccessScope,
    defaultFolder?: string
  ): Promise<string> {
    this.requireAccount(accountId, scope)
    const staged = await this.deps.importer.stageUpload(sourcePath, originalName)
    return this.enqueueImport({ ...staged, accountId, defaultFolder }, scope)
  }

  // ─── Restore ────────────────────────────────────────────────────────

  async startBatchRestore(
    emailIds: number[],
    targetAccountId: number,
    targetFolder: string,
    scope: AccessScope
  ): Promise<RestoreStart> {
    const { batch } = this.deps
    if (emailIds.length === 0) {
      throw new AdmissionError('No emails selected for restore')
    }
    if (emailIds.length > batch.maxAsyncEmails) {
      throw new AdmissionError(
        `Too many emails selected (${emailIds.length}). Maximum allowed is ${batch.maxAsyncEmails} per operation.`
      )
    }
    const target = this.requireAccount(targetAccountId, scope)
    if (target.provider === 'import') {
      throw new UnsupportedProviderError(
        `Account ${targetAccountId} is an import-only archive and cannot receive restored mail`
      )
    }
    for (const ownerId of this.deps.archive.getAccountIdsForMessages(emailIds)) {
      this.assertAccess(scope, ownerId)
    }

    const runInline = emailIds.length <= batch.asyncThreshold && emailIds.length <= batch.maxSyncEmails
    logger.info(LogCategory.RESTORE, 'Batch restore requested', {
      count: emailIds.length,
      targetAccountId,
      mode: runInline ? 'inline' : 'job',
      asyncThreshold: batch.asyncThreshold
    })

    if (runInline) {
      const result = await this.deps.restorer.restoreBatch(emailIds, targetAccountId, targetFolder)
      return { mode: 'inline', result }
    }
    const jobId = this.deps.queue.enqueue(
      createBatchRestoreJob({ accountId: targetAccountId, emailIds, targetFolder })
    )
    return { mode: 'job', jobId }
  }

  /**
   * Restores every archived message of one account, always as a job.
   */
  startAccountRestore(
    sourceAccountId: number,
    targetAccountId: number,
    targetFolder: string,
    scope: AccessScope
  ): string {
    this.requireAccount(sourceAccountId, scope)
    const target = this.requireAccount(targetAccountId, scope)
    if (target.provider === 'import') {
      throw new UnsupportedProviderError(
        `Account ${targetAccountId} is an import-only archive and cannot receive restored mail`
      )
    }

    const emailIds = this.deps.archive.listIdsForAccount(sourceAccountId)
    if (emailIds.length === 0) {
      throw new AdmissionError(`Account ${sourceAccountId} has no archived emails`)
    }
    if (emailIds.length > this.deps.batch.maxAsyncEmails) {
      throw new AdmissionError(
        `Too many emails in this account (${emailIds.length}). Maximum allowed is ${this.deps.batch.maxAsyncEmails} per operation.`
      )
    }
    return this.deps.queue.enqueue(
      createBatchRestoreJob({ accountId: targetAccountId, emailIds, targetFolder })
    )
  }

  // ─── Jobs ───────────────────────────────────────────────────────────

  private visible(scope: AccessScope, job: Job | null): job is Job {
    return job !== null && canAccess(scope, job.accountId)
  }

  cancelJob(jobId: string, scope: AccessScope): boolean {
    const job = this.deps.queue.getJob(jobId)
    if (!this.visible(scope, job)) return false
    return this.deps.queue.cancelJob(jobId)
  }

  getJob(jobId: string, scope: AccessScope): Job | null {
    const job = this.deps.queue.getJob(jobId)
    return this.visible(scope, job) ? job : null
  }

  getJobStatus(jobId: string, scope: AccessScope): JobStatusView | null {
    const job = this.getJob(jobId, scope)
    return job ? toJobStatusView(job) : null
  }

  getActiveJobs(scope: AccessScope): JobStatusView[] {
    return this.deps.queue
      .getActiveJobs()
      .filter((job) => canAccess(scope, job.accountId))
      .map(toJobStatusView)
  }

  getAllJobs(scope: AccessScope): JobStatusView[] {
    return this.deps.queue
      .getAllJobs()
      .filter((job) => canAccess(scope, job.accountId))
      .map(toJobStatusView)
  }

  // ─── Folders ────────────────────────────────────────────────────────

  async listFolders(accountId: number, scope: AccessScope): Promise<FolderListResult> {
    const account = this.requireAccount(accountId, scope)
    try {
      const source = this.deps.sources(account)
      await source.connect()
      try {
        const folders = await source.listFolders()
        return { success: true, folders: folders.length > 0 ? folders : ['INBOX'] }
      } finally {
        await source.close()
      }
    } catch (error) {
      const category = account.provider === 'm365' ? LogCategory.MAIL_GRAPH : LogCategory.MAIL_IMAP
      logger.warn(category, 'Folder listing failed', {
        accountId,
        provider: account.provider,
        error: errorMessage(error)
      })
      return { success: false, folders: ['INBOX'], error: errorMessage(error) }
    }
  }
}
