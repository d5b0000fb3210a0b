import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SCHEMA_VERSION } from '../storage/schema'
import { createTestStore, imapAccountInput, type TestStore } from '../test-support/fixtures'
import { retentionCutoff } from './types'

const DAY_MS = 24 * 60 * 60 * 1000

describe('SqliteAccountStore', () => {
  let store: TestStore

  beforeEach(() => {
    store = createTestStore()
  })

  afterEach(() => {
    store.database.close()
  })

  it('should initialize the schema at the current version', () => {
    expect(store.database.getSchemaVersion()).toBe(SCHEMA_VERSION)
  })

  it('should round-trip an IMAP account', () => {
    const created = store.accounts.createAccount(
      imapAccountInput({
        retention: { enabled: true, deleteAfterDays: 30 },
        excludedFolders: ['Junk', 'Trash']
      })
    )
    const loaded = store.accounts.getAccount(created.id)

    expect(loaded).toEqual(created)
    expect(loaded?.provider).toBe('imap')
    expect(loaded?.enabled).toBe(true)
    expect(loaded?.lastSync).toBe(0)
    expect(loaded?.imap?.server).toBe('imap.example.com')
    expect(loaded?.graph).toBeNull()
    expect(loaded?.retention).toEqual({ enabled: true, deleteAfterDays: 30 })
    expect(loaded?.excludedFolders).toEqual(['Junk', 'Trash'])
  })

  it('should store Graph credentials for an M365 account', () => {
    const created = store.accounts.createAccount({
      name: 'Tenant',
      emailAddress: 'user@contoso.example',
      provider: 'm365',
      graph: { tenantId: 'tenant-1', clientId: 'client-1', clientSecret: 'test-secret' }
    })
    expect(created.imap).toBeNull()
    expect(created.graph).toEqual({
      tenantId: 'tenant-1',
      clientId: 'client-1',
      clientSecret: 'test-secret'
    })
  })

  it('should update the sync cursor and enabled flag', () => {
    const { id } = store.accounts.createAccount(imapAccountInput())
    store.accounts.updateLastSync(id, 1_700_000_000_000)
    store.accounts.setEnabled(id, false)

    const loaded = store.accounts.getAccount(id)
    expect(loaded?.lastSync).toBe(1_700_000_000_000)
    expect(loaded?.enabled).toBe(false)
  })

  it('should list accounts in id order and return null for unknown ids', () => {
    const a = store.accounts.createAccount(imapAccountInput({ name: 'A' }))
    const b = store.accounts.createAccount(imapAccountInput({ name: 'B' }))
    expect(store.accounts.listAccounts().map((acc) => acc.id)).toEqual([a.id, b.id])
    expect(store.accounts.getAccount(999)).toBeNull()
  })
})

describe('retentionCutoff', () => {
  it('should be null unless retention is enabled with a positive age', () => {
    const { accounts, database } = createTestStore()
    const disabled = accounts.createAccount(imapAccountInput())
    const enabled = accounts.createAccount(
      imapAccountInput({ retention: { enabled: true, deleteAfterDays: 30 } })
    )
    const now = Date.UTC(2024, 5, 1)

    expect(retentionCutoff(disabled, now)).toBeNull()
    expect(retentionCutoff(enabled, now)).toBe(now - 30 * DAY_MS)
    database.close()
  })
})
