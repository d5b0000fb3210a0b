import type { MailAccount } from '../account/types'
import { UnsupportedProviderError } from '../errors'
import { GraphMailSource, type FetchLike } from './graph-source'
import { ImapMailSource } from './imap-source'
import type { MailSource, MailSourceFactory } from './types'

export interface SourceFactoryOptions {
  batchSize: number
  fetchImpl?: FetchLike
}

/**
 * Picks the adapter from the account's provider kind. Called once per job;
 * callers never branch on the provider themselves.
 */
export function createMailSourceFactory(options: SourceFactoryOptions): MailSourceFactory {
  return (account: MailAccount): MailSource => {
    switch (account.provider) {
      case 'imap':
        return new ImapMailSource(account, { batchSize: options.batchSize })
      case 'm365':
        return new GraphMailSource(account, {
          batchSize: options.batchSize,
          fetchImpl: options.fetchImpl
        })
      case 'import':
        throw new UnsupportedProviderError(
          `Account ${account.id} is an import-only archive and has no live mailbox`
        )
    }
  }
}
