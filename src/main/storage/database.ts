import Database from 'better-sqlite3'
import * as path from 'path'
import { logger, LogCategory } from '../logger'
import { ensureDir } from '../settings/paths'
import { initializeSchema, SCHEMA_VERSION } from './schema'

export const IN_MEMORY = ':memory:'

export class ArchiveDatabase {
  private db: Database.Database
  readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
    if (filePath !== IN_MEMORY) {
      ensureDir(path.dirname(filePath))
    }

    this.db = new Database(filePath)

    if (filePath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('synchronous = NORMAL')
    }
    this.db.pragma('temp_store = MEMORY')
    this.db.pragma('foreign_keys = ON')

    this.initialize()
  }

  private initialize(): void {
    const versionTable = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
      .get()

    if (!versionTable) {
      initializeSchema(this.db)
      this.db.prepare('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER)').run()
      this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION)
      logger.info(LogCategory.DATABASE, 'Schema initialized', {
        version: SCHEMA_VERSION,
        file: this.filePath
      })
      return
    }

    const current = this.db.prepare('SELECT version FROM schema_version').get() as
      | { version: number }
      | undefined

    if (!current || current.version > SCHEMA_VERSION) {
      throw new Error(
        `Unsupported archive schema version ${current?.version ?? 'unknown'} in ${this.filePath}`
      )
    }

    // CREATE IF NOT EXISTS keeps older files complete
    initializeSchema(this.db)
    logger.debug(LogCategory.DATABASE, 'Schema is up to date', { version: current.version })
  }

  getSchemaVersion(): number {
    const row = this.db.prepare('SELECT version FROM schema_version').get() as
      | { version: number }
      | undefined
    return row?.version ?? 0
  }

  getDatabase(): Database.Database {
    return this.db
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  close(): void {
    if (this.db.open) {
      this.db.close()
    }
  }
}
