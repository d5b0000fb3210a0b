import Database from 'better-sqlite3'
import { logger, LogCategory } from '../logger'
import type {
  AccountStore,
  MailAccount,
  MailAccountInput,
  ProviderKind
} from './types'

interface MailAccountRecord {
  id: number
  name: string
  email_address: string
  provider: string
  imap_server: string | null
  imap_port: number | null
  use_ssl: number
  username: string | null
  password: string | null
  tenant_id: string | null
  client_id: string | null
  client_secret: string | null
  is_enabled: number
  last_sync: number
  delete_after_days: number | null
  retention_enabled: number
  excluded_folders: string
  created_at: number
}

function toProviderKind(value: string): ProviderKind {
  if (value === 'imap' || value === 'm365' || value === 'import') return value
  throw new Error(`Unknown provider kind: ${value}`)
}

function parseFolderList(value: string): string[] {
  try {
    const parsed: unknown = JSON.parse(value)
    return Array.isArray(parsed) ? parsed.filter((f): f is string => typeof f === 'string') : []
  } catch {
    return []
  }
}

function toAccount(row: MailAccountRecord): MailAccount {
  return {
    id: row.id,
    name: row.name,
    emailAddress: row.email_address,
    provider: toProviderKind(row.provider),
    enabled: row.is_enabled === 1,
    imap:
      row.imap_server !== null
        ? {
            server: row.imap_server,
            port: row.imap_port ?? (row.use_ssl === 1 ? 993 : 143),
            useSsl: row.use_ssl === 1,
            username: row.username ?? row.email_address,
            password: row.password ?? ''
          }
        : null,
    graph:
      row.tenant_id !== null && row.client_id !== null
        ? {
            tenantId: row.tenant_id,
            clientId: row.client_id,
            clientSecret: row.client_secret ?? ''
          }
        : null,
    lastSync: row.last_sync,
    retention: {
      enabled: row.retention_enabled === 1,
      deleteAfterDays: row.delete_after_days
    },
    excludedFolders: parseFolderList(row.excluded_folders),
    createdAt: row.created_at
  }
}

/**
 * SQLite backed account table. Account CRUD belongs to the management side;
 * createAccount exists for bootstrap and tests.
 */
export class SqliteAccountStore implements AccountStore {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  createAccount(input: MailAccountInput): MailAccount {
    const result = this.db
      .prepare(
        `INSERT INTO mail_accounts (
          name, email_address, provider, imap_server, imap_port, use_ssl, username, password,
          tenant_id, client_id, client_secret, is_enabled, last_sync,
          delete_after_days, retention_enabled, excluded_folders, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?, ?, ?)`
      )
      .run(
        input.name,
        input.emailAddress,
        input.provider,
        input.imap?.server ?? null,
        input.imap?.port ?? null,
        input.imap?.useSsl === false ? 0 : 1,
        input.imap?.username ?? null,
        input.imap?.password ?? null,
        input.graph?.tenantId ?? null,
        input.graph?.clientId ?? null,
        input.graph?.clientSecret ?? null,
        input.enabled === false ? 0 : 1,
        input.retention?.deleteAfterDays ?? null,
        input.retention?.enabled ? 1 : 0,
        JSON.stringify(input.excludedFolders ?? []),
        Date.now()
      )

    const account = this.getAccount(Number(result.lastInsertRowid))
    if (!account) {
      throw new Error('Account insert did not return a row')
    }
    logger.info(LogCategory.STORAGE, 'Account created', {
      accountId: account.id,
      provider: account.provider
    })
    return account
  }

  getAccount(accountId: number): MailAccount | null {
    const row = this.db.prepare('SELECT * FROM mail_accounts WHERE id = ?').get(accountId) as
      | MailAccountRecord
      | undefined
    return row ? toAccount(row) : null
  }

  listAccounts(): MailAccount[] {
    const rows = this.db
      .prepare('SELECT * FROM mail_accounts ORDER BY id')
      .all() as MailAccountRecord[]
    return rows.map(toAccount)
  }

  updateLastSync(accountId: number, timestamp: number): void {
    this.db.prepare('UPDATE mail_accounts SET last_sync = ? WHERE id = ?').run(timestamp, accountId)
  }

  setEnabled(accountId: number, enabled: boolean): void {
    this.db
      .prepare('UPDATE mail_accounts SET is_enabled = ? WHERE id = ?')
      .run(enabled ? 1 : 0, accountId)
  }
}
