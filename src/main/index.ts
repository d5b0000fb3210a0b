import { SqliteAccountStore } from './account/account-store'
import type { AccountStore } from './account/types'
import { ArchiveService } from './archive-service'
import { errorMessage } from './errors'
import { createImportJobHandler, ImportService } from './import/import-service'
import { JobQueue } from './jobs/job-queue'
import { logger, LogCategory } from './logger'
import { createMailSourceFactory } from './mail/source-factory'
import type { FetchLike } from './mail/graph-source'
import type { MailSourceFactory } from './mail/types'
import { BatchRestoreService, createBatchRestoreJobHandler } from './restore/batch-restore-service'
import {
  getArchiveSettings,
  mergeArchiveSettings,
  type ArchiveSettings,
  type ArchiveSettingsUpdate
} from './settings/archive-settings'
import { ArchiveRepository } from './storage/archive-repository'
import { ArchiveDatabase } from './storage/database'
import { createSyncJobHandler, SyncEngine } from './sync/sync-engine'
import { SyncScheduler } from './sync/sync-scheduler'

export interface ArchiveRuntimeOptions {
  // applied over the stored settings without persisting them
  settings?: ArchiveSettingsUpdate
  // replaces the SQLite account store, e.g. with the host application's own
  accounts?: AccountStore
  sources?: MailSourceFactory
  fetchImpl?: FetchLike
}

export interface ArchiveRuntime {
  settings: ArchiveSettings
  database: ArchiveDatabase
  accounts: AccountStore
  accountStore: SqliteAccountStore
  archive: ArchiveRepository
  queue: JobQueue
  engine: SyncEngine
  importer: ImportService
  restorer: BatchRestoreService
  scheduler: SyncScheduler
  service: ArchiveService
  start(): void
  stop(): Promise<void>
}

/**
 * Builds the job core: database, adapters, orchestrators, the worker queue
 * and the facade. Nothing runs until start().
 */
export function createArchiveRuntime(options: ArchiveRuntimeOptions = {}): ArchiveRuntime {
  const settings = options.settings
    ? mergeArchiveSettings(getArchiveSettings(), options.settings)
    : getArchiveSettings()
  logger.setLogLevel(settings.logging.level)

  const database = new ArchiveDatabase(settings.storage.databaseFile)
  const accountStore = new SqliteAccountStore(database.getDatabase())
  const accounts = options.accounts ?? accountStore
  const archive = new ArchiveRepository(database.getDatabase())
  const sources =
    options.sources ??
    createMailSourceFactory({ batchSize: settings.batch.batchSize, fetchImpl: options.fetchImpl })

  const engine = new SyncEngine(
    { accounts, archive, sources },
    {
      pauseBetweenEmailsMs: settings.batch.pauseBetweenEmailsMs,
      fetchRetries: settings.sync.fetchRetries,
      retryDelayMs: settings.sync.retryDelayMs
    }
  )
  const importer = new ImportService(accounts, archive, {
    uploadsDir: settings.storage.uploadsDir,
    pauseBetweenEmailsMs: settings.batch.pauseBetweenEmailsMs
  })
  const restorer = new BatchRestoreService(accounts, archive, sources, settings.batch)

  const queue = new JobQueue(
    {
      sync: createSyncJobHandler(engine, accounts),
      import: createImportJobHandler(importer),
      'batch-restore': createBatchRestoreJobHandler(restorer)
    },
    settings.jobs
  )
  const scheduler = new SyncScheduler(accounts, queue, settings.sync)
  const service = new ArchiveService({
    accounts,
    archive,
    queue,
    sources,
    importer,
    restorer,
    batch: settings.batch
  })

  let started = false

  return {
    settings,
    database,
    accounts,
    accountStore,
    archive,
    queue,
    engine,
    importer,
    restorer,
    scheduler,
    service,
    start(): void {
      if (started) return
      started = true
      queue.start()
      scheduler.start()
      logger.info(LogCategory.APP, 'Archive runtime started', {
        database: settings.storage.databaseFile
      })
    },
    async stop(): Promise<void> {
      scheduler.stop()
      try {
        await queue.stop()
      } catch (error) {
        logger.error(LogCategory.APP, 'Error while stopping job worker', {
          error: errorMessage(error)
        })
      } finally {
        started = false
        database.close()
        logger.info(LogCategory.APP, 'Archive runtime stopped')
      }
    }
  }
}

export { ArchiveService, FULL_ACCESS, canAccess } from './archive-service'
export type { AccessScope, FolderListResult, ImportRequest, RestoreStart } from './archive-service'
export * from './errors'
export type { Job, JobKind, JobStatus, JobStatusView } from './jobs/types'
export type { MailAccount, MailAccountInput, ProviderKind } from './account/types'
export { getArchiveSettings, updateArchiveSettings } from './settings/archive-settings'
export { logger, LogCategory } from './logger'
