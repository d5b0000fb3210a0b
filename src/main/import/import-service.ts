/**
 * Bulk import of EML zips and mbox files into the archive
 */
import * as fs from 'fs'
import * as path from 'path'
import { v4 as uuidv4 } from 'uuid'
import type { AccountStore, MailAccount } from '../account/types'
import { assertWellFormed, normalizeMessage, parseMessage } from '../content/content-normalizer'
import { AccountNotFoundError, errorMessage, JobCancelledError } from '../errors'
import { sleep, throwIfCancelled, type JobContext } from '../jobs/cancellation'
import type { JobHandler } from '../jobs/job-queue'
import type { ImportFormat, ImportJob } from '../jobs/types'
import { logger, LogCategory } from '../logger'
import { ensureDir } from '../settings/paths'
import type { ArchiveRepository } from '../storage/archive-repository'
import {
  countMboxMessages,
  countZipEntries,
  readMboxEntries,
  readZipEntries,
  type ArchiveEntry
} from './archive-readers'

export interface ImportServiceOptions {
  uploadsDir: string
  pauseBetweenEmailsMs: number
}

export interface StagedUpload {
  filePath: string
  fileName: string
  fileSize: number
  format: ImportFormat
}

const PAUSE_EVERY = 10
const LOG_EVERY = 100

export function detectImportFormat(fileName: string): ImportFormat | null {
  const ext = path.extname(fileName).toLowerCase()
  if (ext === '.zip') return 'eml-zip'
  if (ext === '.mbox' || ext === '.mbx') return 'mbox'
  return null
}

// Dedup key for an imported message without a Message-ID
export function syntheticImportKey(jobId: string, sequence: number, date: Date | undefined): string {
  return `eml-import-${jobId}-${sequence}-${date ? date.getTime() : 0}`
}

export function removeStagedFile(filePath: string): void {
  try {
    fs.rmSync(filePath, { force: true })
  } catch (error) {
    logger.warn(LogCategory.IMPORT, 'Failed to delete staged file', {
      filePath,
      error: errorMessage(error)
    })
  }
}

export class ImportService {
  private accounts: AccountStore
  private archive: ArchiveRepository
  private options: ImportServiceOptions

  constructor(accounts: AccountStore, archive: ArchiveRepository, options: ImportServiceOptions) {
    this.accounts = accounts
    this.archive = archive
    this.options = options
  }

  /**
   * Copies an uploaded file into the uploads directory under a unique name.
   * The staged copy belongs to the import job from then on.
   */
  async stageUpload(sourcePath: string, originalName: string): Promise<StagedUpload> {
    const fileName = path.basename(originalName)
    const format = detectImportFormat(fileName)
    if (!format) {
      throw new Error(`Unsupported import file type: ${fileName}`)
    }
    ensureDir(this.options.uploadsDir)
    const filePath = path.join(this.options.uploadsDir, `${uuidv4()}_${fileName}`)
    await fs.promises.copyFile(sourcePath, filePath)
    const stat = await fs.promises.stat(filePath)

    logger.info(LogCategory.IMPORT, 'Upload staged', { fileName, fileSize: stat.size })
    return { filePath, fileName, fileSize: stat.size, format }
  }

  async countEntries(job: ImportJob): Promise<number> {
    return job.format === 'mbox' ? countMboxMessages(job.filePath) : countZipEntries(job.filePath)
  }

  private entries(job: ImportJob): AsyncGenerator<ArchiveEntry> {
    return job.format === 'mbox' ? readMboxEntries(job.filePath) : readZipEntries(job.filePath)
  }

  async runImport(job: ImportJob, ctx: JobContext): Promise<void> {
    try {
      const account = this.accounts.getAccount(job.accountId)
      if (!account) {
        throw new AccountNotFoundError(job.accountId)
      }

      job.total = await this.countEntries(job)
      logger.info(LogCategory.IMPORT, 'Import started', {
        jobId: job.jobId,
        accountId: account.id,
        format: job.format,
        fileName: job.fileName,
        total: job.total
      })

      for await (const entry of this.entries(job)) {
        throwIfCancelled(ctx.signal)
        job.processed++
        job.processedBytes += entry.size
        await this.importEntry(job, account, entry)

        if (job.processed % LOG_EVERY === 0) {
          logger.info(LogCategory.IMPORT, 'Import progress', {
            jobId: job.jobId,
            processed: job.processed,
            total: job.total,
            succeeded: job.succeeded,
            skipped: job.skipped,
            failed: job.failed
          })
        }
        if (job.processed % PAUSE_EVERY === 0) {
          await sleep(this.options.pauseBetweenEmailsMs, ctx.signal)
        }
      }

      // the estimate can miss entries that only turn up while reading
      if (job.processed > job.total) job.total = job.processed
      logger.info(LogCategory.IMPORT, 'Import finished', {
        jobId: job.jobId,
        processed: job.processed,
        succeeded: job.succeeded,
        skipped: job.skipped,
        failed: job.failed
      })
    } finally {
      removeStagedFile(job.filePath)
    }
  }

  private async importEntry(job: ImportJob, account: MailAccount, entry: ArchiveEntry): Promise<void> {
    job.currentItem = entry.name
    if (!entry.content) {
      job.failed++
      logger.warn(LogCategory.IMPORT, 'Archive entry unreadable', {
        jobId: job.jobId,
        entry: entry.name,
        error: entry.error
      })
      return
    }

    try {
      const parsed = await parseMessage(entry.content)
      assertWellFormed(parsed)
      if (parsed.subject) job.currentItem = parsed.subject

      const messageId = parsed.messageId || syntheticImportKey(job.jobId, job.processed, parsed.date)
      if (this.archive.exists(account.id, messageId)) {
        job.skipped++
        return
      }

      const outcome = this.archive.saveMessage(
        normalizeMessage(parsed, {
          accountId: account.id,
          accountEmail: account.emailAddress,
          folderName: entry.folder ?? job.defaultFolder,
          messageId
        })
      )
      if (outcome.status === 'created') {
        job.succeeded++
      } else {
        job.skipped++
      }
    } catch (error) {
      if (error instanceof JobCancelledError) throw error
      job.failed++
      logger.warn(LogCategory.IMPORT, 'Failed to import entry', {
        jobId: job.jobId,
        entry: entry.name,
        error: errorMessage(error)
      })
    }
  }
}

export function createImportJobHandler(service: ImportService): JobHandler<ImportJob> {
  return {
    run: (job, ctx) => service.runImport(job, ctx),
    release: (job) => removeStagedFile(job.filePath)
  }
}
