import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { ZipFile } from 'yazl'
import type { MailAccountInput } from '../account/types'
import { SqliteAccountStore } from '../account/account-store'
import { ArchiveRepository } from '../storage/archive-repository'
import { ArchiveDatabase, IN_MEMORY } from '../storage/database'

export interface EmlOptions {
  messageId?: string | null
  subject?: string
  from?: string
  to?: string
  date?: Date
  body?: string
}

export function buildEml(options: EmlOptions = {}): string {
  const headers = [
    `From: ${options.from ?? 'Alice Example <alice@example.com>'}`,
    `To: ${options.to ?? 'bob@example.com'}`,
    `Subject: ${options.subject ?? 'Hello'}`,
    `Date: ${(options.date ?? new Date('2024-03-01T10:00:00Z')).toUTCString()}`
  ]
  if (options.messageId !== null) {
    headers.push(`Message-ID: <${options.messageId ?? 'hello@example.com'}>`)
  }
  headers.push('MIME-Version: 1.0', 'Content-Type: text/plain; charset=utf-8')
  return `${headers.join('\r\n')}\r\n\r\n${options.body ?? 'Body text'}\r\n`
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`))
}

export async function writeZip(
  filePath: string,
  entries: { name: string; content: string | Buffer }[]
): Promise<void> {
  const zip = new ZipFile()
  for (const entry of entries) {
    const buffer = typeof entry.content === 'string' ? Buffer.from(entry.content) : entry.content
    zip.addBuffer(buffer, entry.name)
  }
  zip.end()
  await new Promise<void>((resolve, reject) => {
    const out = fs.createWriteStream(filePath)
    out.on('close', () => resolve())
    out.on('error', reject)
    zip.outputStream.pipe(out)
  })
}

export interface TestStore {
  database: ArchiveDatabase
  accounts: SqliteAccountStore
  archive: ArchiveRepository
}

export function createTestStore(): TestStore {
  const database = new ArchiveDatabase(IN_MEMORY)
  return {
    database,
    accounts: new SqliteAccountStore(database.getDatabase()),
    archive: new ArchiveRepository(database.getDatabase())
  }
}

export function imapAccountInput(overrides: Partial<MailAccountInput> = {}): MailAccountInput {
  return {
    name: 'Work',
    emailAddress: 'owner@example.com',
    provider: 'imap',
    imap: {
      server: 'imap.example.com',
      port: 993,
      useSsl: true,
      username: 'owner@example.com',
      password: 'test-secret'
    },
    ...overrides
  }
}
