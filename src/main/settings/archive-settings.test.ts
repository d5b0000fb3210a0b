import { describe, it, expect, afterEach } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import { logger } from '../logger'
import {
  defaultArchiveSettings,
  getArchiveSettings,
  getSettingsFilePath,
  mergeArchiveSettings,
  resetArchiveSettings,
  updateArchiveSettings
} from './archive-settings'
import { resolveDataDir } from './paths'

describe('archive settings', () => {
  afterEach(() => {
    resetArchiveSettings()
    logger.setLogLevel('info')
  })

  it('should derive storage paths from the data directory', () => {
    const defaults = defaultArchiveSettings('/srv/archive')
    expect(defaults.storage.databaseFile).toBe(path.join('/srv/archive', 'archive.db'))
    expect(defaults.storage.uploadsDir).toBe(path.join('/srv/archive', 'uploads'))
    expect(defaults.batch.asyncThreshold).toBe(50)
    expect(defaults.batch.maxAsyncEmails).toBe(50000)
    expect(defaults.jobs.retentionDays).toBe(7)
  })

  it('should merge updates section by section', () => {
    const merged = mergeArchiveSettings(defaultArchiveSettings('/srv/archive'), {
      batch: { batchSize: 10 },
      sync: { intervalMinutes: 0 }
    })
    expect(merged.batch.batchSize).toBe(10)
    expect(merged.batch.pauseBetweenEmailsMs).toBe(50)
    expect(merged.sync.intervalMinutes).toBe(0)
    expect(merged.sync.fetchRetries).toBe(2)
  })

  it('should keep the settings file in the data directory', () => {
    expect(path.dirname(getSettingsFilePath())).toBe(resolveDataDir())
    expect(path.basename(getSettingsFilePath())).toBe('archive-settings.json')
  })

  it('should persist updates and apply the log level', () => {
    const result = updateArchiveSettings({ logging: { level: 'debug' }, jobs: { retentionDays: 3 } })

    expect(result.success).toBe(true)
    expect(getArchiveSettings().jobs.retentionDays).toBe(3)
    expect(getArchiveSettings().jobs.idlePollMs).toBe(100)
    expect(logger.getLogLevel()).toBe('debug')

    const stored = JSON.parse(fs.readFileSync(getSettingsFilePath(), 'utf8')) as {
      jobs: { retentionDays: number }
    }
    expect(stored.jobs.retentionDays).toBe(3)
  })

  it('should return to defaults after a reset', () => {
    updateArchiveSettings({ batch: { batchSize: 5 } })
    expect(resetArchiveSettings().batch.batchSize).toBe(50)
  })
})
