import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import { logger, LogCategory } from './logger'

describe('logger', () => {
  beforeEach(() => {
    logger.clearMemory()
    logger.setLogLevel('info')
  })

  afterEach(() => {
    logger.setLogLevel('info')
  })

  it('should escape line breaks so a subject cannot forge log lines', () => {
    expect(logger.sanitizeLogMessage('Subject\r\nFAKE\tline\x07')).toBe('Subject\\r\\nFAKE\\tline')
  })

  it('should format an entry with its details', () => {
    const line = logger.formatLogEntry({
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'warn',
      category: LogCategory.IMPORT,
      message: 'Entry failed',
      details: { entry: 'a.eml' }
    })
    expect(line).toBe('[2024-01-01T00:00:00.000Z] [WARN] [Import] Entry failed | {"entry":"a.eml"}')
  })

  it('should drop entries below the configured level', () => {
    logger.debug(LogCategory.JOBS, 'hidden')
    logger.info(LogCategory.JOBS, 'shown')
    expect(logger.getRecentLogs().map((e) => e.message)).toEqual(['shown'])

    logger.setLogLevel('debug')
    logger.debug(LogCategory.JOBS, 'now visible')
    expect(logger.getRecentLogs().map((e) => e.message)).toEqual(['shown', 'now visible'])
  })

  it('should narrow recent logs to one category', () => {
    logger.info(LogCategory.SYNC, 'Sync started', { accountId: 7 })
    logger.warn(LogCategory.RETENTION, 'Retention delete failed')
    logger.error(LogCategory.SYNC, 'Folder sync failed')

    expect(logger.getRecentLogs(LogCategory.SYNC).map((e) => e.message)).toEqual([
      'Sync started',
      'Folder sync failed'
    ])
    expect(logger.getRecentLogs()).toHaveLength(3)
  })

  it('should write entries to the daily file in the log directory', () => {
    logger.info(LogCategory.APP, 'written to disk')
    const date = new Date().toISOString().split('T')[0]
    const file = `${logger.getLogDirectory()}/mail-archive-${date}.log`
    expect(fs.readFileSync(file, 'utf8')).toContain('[INFO] [App] written to disk')
  })
})
