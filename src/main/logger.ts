import * as fs from 'fs'
import * as path from 'path'
import { ensureDir, resolveLogDir } from './settings/paths'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  category: string
  message: string
  details?: unknown
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error']
const FILE_PREFIX = 'mail-archive-'

class Logger {
  private logDir: string
  private currentLogFile: string
  private maxLogFiles: number = 7 // days
  private maxLogSize: number = 10 * 1024 * 1024
  private logLevel: LogLevel = 'info'
  private consoleEnabled: boolean
  private memoryLogs: LogEntry[] = []
  private maxMemoryLogs: number = 1000

  constructor() {
    this.logDir = resolveLogDir()
    this.consoleEnabled = process.env.MAIL_ARCHIVE_LOG_CONSOLE !== 'false'
    this.currentLogFile = this.getLogFileName()
    this.ensureLogDirectory()
    this.cleanOldLogs()
  }

  private ensureLogDirectory(): void {
    try {
      ensureDir(this.logDir)
    } catch (error) {
      console.error('Failed to create log directory:', error)
    }
  }

  private getLogFileName(): string {
    const date = new Date().toISOString().split('T')[0]
    return path.join(this.logDir, `${FILE_PREFIX}${date}.log`)
  }

  private cleanOldLogs(): void {
    try {
      if (!fs.existsSync(this.logDir)) return
      const logFiles = fs
        .readdirSync(this.logDir)
        .filter((f) => f.startsWith(FILE_PREFIX) && f.endsWith('.log'))
        .sort()
        .reverse()

      for (const file of logFiles.slice(this.maxLogFiles)) {
        fs.unlinkSync(path.join(this.logDir, file))
      }
    } catch (error) {
      console.error('Failed to clean old logs:', error)
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel)
  }

  /**
   * Escapes line breaks and strips control characters so a mail subject
   * cannot forge extra log lines.
   */
  sanitizeLogMessage(message: string): string {
    return message
      .replace(/\r\n/g, '\\r\\n')
      .replace(/\n/g, '\\n')
      .replace(/\r/g, '\\r')
      .replace(/\t/g, '\\t')
      .replace(/[\x00-\x1F\x7F]/g, '')
  }

  formatLogEntry(entry: LogEntry): string {
    let line = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.category}] ${this.sanitizeLogMessage(entry.message)}`
    if (entry.details !== undefined) {
      try {
        const detailsStr =
          typeof entry.details === 'string'
            ? this.sanitizeLogMessage(entry.details)
            : JSON.stringify(entry.details)
        line += ` | ${detailsStr}`
      } catch {
        line += ' | [Unable to stringify]'
      }
    }
    return line
  }

  private writeToFile(entry: LogEntry): void {
    try {
      const newLogFile = this.getLogFileName()
      if (newLogFile !== this.currentLogFile) {
        this.currentLogFile = newLogFile
        this.cleanOldLogs()
      }

      if (fs.existsSync(this.currentLogFile)) {
        const stats = fs.statSync(this.currentLogFile)
        if (stats.size >= this.maxLogSize) {
          const rotatedFile = this.currentLogFile.replace('.log', `-${Date.now()}.log`)
          fs.renameSync(this.currentLogFile, rotatedFile)
        }
      }

      fs.appendFileSync(this.currentLogFile, this.formatLogEntry(entry) + '\n', 'utf8')
    } catch (error) {
      console.error('Failed to write log:', error)
    }
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryLogs.push(entry)
    if (this.memoryLogs.length > this.maxMemoryLogs) {
      this.memoryLogs.shift()
    }
  }

  private log(level: LogLevel, category: string, message: string, details?: unknown): void {
    if (!this.shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details
    }

    this.addToMemory(entry)
    this.writeToFile(entry)

    if (!this.consoleEnabled) return

    const timestamp = new Date().toLocaleTimeString('en-US', { hour12: false })
    const prefix = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${category}]`
    const consoleMethod =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log

    if (details !== undefined && details !== null && details !== '') {
      consoleMethod(prefix, message, details)
    } else {
      consoleMethod(prefix, message)
    }
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level
  }

  getLogLevel(): LogLevel {
    return this.logLevel
  }

  debug(category: string, message: string, details?: unknown): void {
    this.log('debug', category, message, details)
  }

  info(category: string, message: string, details?: unknown): void {
    this.log('info', category, message, details)
  }

  warn(category: string, message: string, details?: unknown): void {
    this.log('warn', category, message, details)
  }

  error(category: string, message: string, details?: unknown): void {
    this.log('error', category, message, details)
  }

  // Newest entries last; a category narrows to one component
  getRecentLogs(category?: string): LogEntry[] {
    return category ? this.memoryLogs.filter((e) => e.category === category) : [...this.memoryLogs]
  }

  clearMemory(): void {
    this.memoryLogs = []
  }

  getLogDirectory(): string {
    return this.logDir
  }
}

export const logger = new Logger()

export const LogCategory = {
  APP: 'App',
  CONFIG: 'Config',
  JOBS: 'Jobs',
  SYNC: 'Sync',
  SCHEDULER: 'Sync:Scheduler',
  RETENTION: 'Retention',
  IMPORT: 'Import',
  RESTORE: 'Restore',
  MAIL_IMAP: 'Mail:Imap',
  MAIL_GRAPH: 'Mail:Graph',
  CONTENT: 'Content',
  DATABASE: 'Database',
  STORAGE: 'Storage',
  ACCESS: 'Access'
} as const

export type LogCategoryName = (typeof LogCategory)[keyof typeof LogCategory]
