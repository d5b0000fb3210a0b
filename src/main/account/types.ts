/**
 * Mail account types
 */

export type ProviderKind = 'imap' | 'm365' | 'import'

// IMAP server settings
export interface ImapSettings {
  server: string
  port: number
  useSsl: boolean
  username: string
  password: string
}

// Microsoft Graph app registration (client credential flow)
export interface GraphSettings {
  tenantId: string
  clientId: string
  clientSecret: string
}

export interface RetentionPolicy {
  enabled: boolean
  deleteAfterDays: number | null
}

export interface MailAccount {
  id: number
  name: string
  emailAddress: string
  provider: ProviderKind
  enabled: boolean
  imap: ImapSettings | null
  graph: GraphSettings | null
  // epoch ms of the last completed sync pass, 0 = never synced
  lastSync: number
  retention: RetentionPolicy
  excludedFolders: string[]
  createdAt: number
}

export interface MailAccountInput {
  name: string
  emailAddress: string
  provider: ProviderKind
  enabled?: boolean
  imap?: ImapSettings
  graph?: GraphSettings
  retention?: RetentionPolicy
  excludedFolders?: string[]
}

/**
 * Read side of account configuration plus the sync cursor, which is the only
 * field the job core writes.
 */
export interface AccountStore {
  getAccount(accountId: number): MailAccount | null
  listAccounts(): MailAccount[]
  updateLastSync(accountId: number, timestamp: number): void
}

const DAY_MS = 24 * 60 * 60 * 1000

// Messages sent before the returned instant are eligible for deletion
export function retentionCutoff(account: MailAccount, now: number = Date.now()): number | null {
  const { enabled, deleteAfterDays } = account.retention
  if (!enabled || deleteAfterDays === null || deleteAfterDays <= 0) return null
  return now - deleteAfterDays * DAY_MS
}
