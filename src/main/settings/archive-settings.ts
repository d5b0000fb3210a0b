/**
 * Archive runtime settings
 * - archive-settings.json in the data directory, managed by conf
 * - every section is merged over its defaults on read
 */
import Conf from 'conf'
import * as path from 'path'
import { logger, LogCategory, type LogLevel } from '../logger'
import { resolveDataDir } from './paths'

// =====================================================
// Types
// =====================================================

export interface StorageSettings {
  databaseFile: string
  uploadsDir: string
}

export interface LoggingSettings {
  level: LogLevel
}

export interface BatchSettings {
  batchSize: number
  pauseBetweenEmailsMs: number
  pauseBetweenBatchesMs: number
  // restore requests above this size become background jobs
  asyncThreshold: number
  maxSyncEmails: number
  maxAsyncEmails: number
}

export interface JobSettings {
  idlePollMs: number
  errorBackoffMs: number
  retentionDays: number
  cleanupIntervalHours: number
}

export interface SyncSettings {
  intervalMinutes: number
  fetchRetries: number
  retryDelayMs: number
}

export interface ArchiveSettings {
  storage: StorageSettings
  logging: LoggingSettings
  batch: BatchSettings
  jobs: JobSettings
  sync: SyncSettings
}

export type ArchiveSettingsUpdate = {
  [K in keyof ArchiveSettings]?: Partial<ArchiveSettings[K]>
}

// =====================================================
// Defaults
// =====================================================

export function defaultArchiveSettings(dataDir: string = resolveDataDir()): ArchiveSettings {
  return {
    storage: {
      databaseFile: path.join(dataDir, 'archive.db'),
      uploadsDir: path.join(dataDir, 'uploads')
    },
    logging: {
      level: 'info'
    },
    batch: {
      batchSize: 50,
      pauseBetweenEmailsMs: 50,
      pauseBetweenBatchesMs: 250,
      asyncThreshold: 50,
      maxSyncEmails: 150,
      maxAsyncEmails: 50000
    },
    jobs: {
      idlePollMs: 100,
      errorBackoffMs: 1000,
      retentionDays: 7,
      cleanupIntervalHours: 24
    },
    sync: {
      intervalMinutes: 15,
      fetchRetries: 2,
      retryDelayMs: 1000
    }
  }
}

export function mergeArchiveSettings(
  current: ArchiveSettings,
  updates: ArchiveSettingsUpdate
): ArchiveSettings {
  return {
    storage: { ...current.storage, ...updates.storage },
    logging: { ...current.logging, ...updates.logging },
    batch: { ...current.batch, ...updates.batch },
    jobs: { ...current.jobs, ...updates.jobs },
    sync: { ...current.sync, ...updates.sync }
  }
}

// =====================================================
// Store
// =====================================================

let settingsStore: Conf<ArchiveSettings> | null = null

function getSettingsStore(): Conf<ArchiveSettings> {
  if (!settingsStore) {
    const dataDir = resolveDataDir()
    settingsStore = new Conf<ArchiveSettings>({
      cwd: dataDir,
      configName: 'archive-settings',
      defaults: defaultArchiveSettings(dataDir)
    })
  }
  return settingsStore
}

export function getArchiveSettings(): ArchiveSettings {
  const defaults = defaultArchiveSettings()
  return mergeArchiveSettings(defaults, getSettingsStore().store)
}

export function updateArchiveSettings(updates: ArchiveSettingsUpdate): {
  success: boolean
  settings?: ArchiveSettings
  error?: string
} {
  try {
    const updated = mergeArchiveSettings(getArchiveSettings(), updates)
    getSettingsStore().store = updated
    logger.setLogLevel(updated.logging.level)
    logger.info(LogCategory.CONFIG, 'Archive settings saved')
    return { success: true, settings: updated }
  } catch (error) {
    logger.error(LogCategory.CONFIG, 'Failed to save archive settings', {
      error: error instanceof Error ? error.message : String(error)
    })
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Failed to update archive settings'
    }
  }
}

export function resetArchiveSettings(): ArchiveSettings {
  getSettingsStore().clear()
  return getArchiveSettings()
}

export function getSettingsFilePath(): string {
  return getSettingsStore().path
}
