import { describe, it, expect, afterEach } from 'vitest'
import { UnsupportedProviderError } from '../errors'
import { createTestStore, imapAccountInput, type TestStore } from '../test-support/fixtures'
import { GraphMailSource } from './graph-source'
import { ImapMailSource } from './imap-source'
import { createMailSourceFactory } from './source-factory'

describe('createMailSourceFactory', () => {
  let store: TestStore | null = null

  afterEach(() => {
    store?.database.close()
    store = null
  })

  it('should pick the adapter from the provider kind', () => {
    store = createTestStore()
    const factory = createMailSourceFactory({ batchSize: 25 })
    const imap = store.accounts.createAccount(imapAccountInput())
    const m365 = store.accounts.createAccount({
      name: 'Tenant',
      emailAddress: 'owner@example.com',
      provider: 'm365',
      graph: { tenantId: 'tenant-1', clientId: 'client-1', clientSecret: 'test-secret' }
    })

    expect(factory(imap)).toBeInstanceOf(ImapMailSource)
    expect(factory(m365)).toBeInstanceOf(GraphMailSource)
  })

  it('should refuse import-only accounts', () => {
    store = createTestStore()
    const factory = createMailSourceFactory({ batchSize: 25 })
    const imported = store.accounts.createAccount({
      name: 'Old export',
      emailAddress: 'old@example.com',
      provider: 'import'
    })
    expect(() => factory(imported)).toThrow(UnsupportedProviderError)
  })
})
