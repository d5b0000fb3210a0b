/**
 * IMAP mailbox access over imapflow
 * - one connection per source, opened for the duration of a job
 * - envelopes are fetched per batch of UIDs and released before yielding
 */
import { ImapFlow } from 'imapflow'
import type { ImapFlowOptions } from 'imapflow'
import type { MailAccount } from '../account/types'
import { errorMessage, ProviderRequestError } from '../errors'
import { logger, LogCategory } from '../logger'
import { composeRawMessage } from './message-composer'
import type {
  ListMessagesOptions,
  MailOperationResult,
  MailSource,
  MessageRef,
  RestorableMessage
} from './types'

export interface ImapSourceOptions {
  batchSize: number
}

export function buildImapConfig(account: MailAccount): ImapFlowOptions {
  if (!account.imap) {
    throw new ProviderRequestError(`Account ${account.id} has no IMAP settings`, {
      transient: false
    })
  }
  return {
    host: account.imap.server,
    port: account.imap.port,
    secure: account.imap.useSsl,
    auth: {
      user: account.imap.username,
      pass: account.imap.password
    },
    tls: {
      rejectUnauthorized: false
    },
    logger: false
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

export class ImapMailSource implements MailSource {
  readonly kind = 'imap' as const
  readonly account: MailAccount
  private client: ImapFlow | null = null
  private batchSize: number

  constructor(account: MailAccount, options: ImapSourceOptions) {
    this.account = account
    this.batchSize = Math.max(1, options.batchSize)
  }

  async connect(): Promise<void> {
    if (this.client?.usable) return

    const client = new ImapFlow(buildImapConfig(this.account))

    client.on('close', () => {
      logger.debug(LogCategory.MAIL_IMAP, 'Connection closed', { accountId: this.account.id })
      if (this.client === client) this.client = null
    })

    // runtime socket errors (ECONNRESET etc.) surface on the next command
    client.on('error', (err: Error) => {
      logger.warn(LogCategory.MAIL_IMAP, 'Connection error', {
        accountId: this.account.id,
        error: err.message
      })
    })

    try {
      await client.connect()
    } catch (error) {
      throw new ProviderRequestError(`IMAP connect failed: ${errorMessage(error)}`)
    }
    this.client = client
    logger.info(LogCategory.MAIL_IMAP, 'Connected', {
      accountId: this.account.id,
      host: this.account.imap?.server
    })
  }

  async close(): Promise<void> {
    const client = this.client
    this.client = null
    if (!client) return
    try {
      await client.logout()
    } catch (error) {
      logger.debug(LogCategory.MAIL_IMAP, 'Logout failed', { error: errorMessage(error) })
    }
  }

  private requireClient(): ImapFlow {
    if (!this.client || !this.client.usable) {
      throw new ProviderRequestError('IMAP connection is not open')
    }
    return this.client
  }

  async listFolders(): Promise<string[]> {
    const mailboxes = await this.requireClient().list()
    return mailboxes
      .filter((mailbox) => !mailbox.flags.has('\\Noselect') && !mailbox.flags.has('\\NonExistent'))
      .map((mailbox) => mailbox.path)
  }

  private async searchUids(folder: string, options: ListMessagesOptions): Promise<number[]> {
    const client = this.requireClient()
    const lock = await client.getMailboxLock(folder)
    try {
      if (!client.mailbox || client.mailbox.exists === 0) {
        return []
      }
      const query: { all?: boolean; since?: Date; sentBefore?: Date } = {}
      if (options.since) query.since = new Date(options.since)
      if (options.before) query.sentBefore = new Date(options.before)
      if (!query.since && !query.sentBefore) query.all = true

      const result = await client.search(query, { uid: true })
      return (result || []).filter((uid) => uid > 0 && Number.isInteger(uid)).sort((a, b) => a - b)
    } finally {
      lock.release()
    }
  }

  private async fetchEnvelopes(folder: string, uids: number[]): Promise<MessageRef[]> {
    const client = this.requireClient()
    const lock = await client.getMailboxLock(folder)
    const refs: MessageRef[] = []
    try {
      for await (const msg of client.fetch(
        uids,
        { uid: true, envelope: true, size: true, internalDate: true },
        { uid: true }
      )) {
        const envelopeDate = msg.envelope?.date ?? msg.internalDate
        refs.push({
          ref: String(msg.uid),
          messageId: msg.envelope?.messageId || null,
          date: envelopeDate ? new Date(envelopeDate).getTime() : null,
          subject: msg.envelope?.subject || null,
          size: msg.size ?? null
        })
      }
    } finally {
      lock.release()
    }
    return refs
  }

  async *listMessages(folder: string, options: ListMessagesOptions = {}): AsyncIterable<MessageRef> {
    const uids = await this.searchUids(folder, options)
    logger.debug(LogCategory.MAIL_IMAP, 'Folder search complete', {
      accountId: this.account.id,
      folder,
      count: uids.length
    })

    for (const batch of chunk(uids, this.batchSize)) {
      // a fetch holds the connection, so the batch is collected before yielding
      const refs = await this.fetchEnvelopes(folder, batch)
      for (const ref of refs) {
        yield ref
      }
    }
  }

  async fetchSource(folder: string, message: MessageRef): Promise<Buffer> {
    const client = this.requireClient()
    const lock = await client.getMailboxLock(folder)
    try {
      const msg = await client.fetchOne(message.ref, { uid: true, source: true }, { uid: true })
      if (!msg || !msg.source) {
        throw new ProviderRequestError(`Message UID ${message.ref} not found in ${folder}`, {
          transient: false
        })
      }
      return msg.source
    } finally {
      lock.release()
    }
  }

  async deleteMessage(folder: string, message: MessageRef): Promise<MailOperationResult> {
    try {
      const client = this.requireClient()
      const lock = await client.getMailboxLock(folder)
      try {
        // \Deleted + EXPUNGE (UID EXPUNGE when UIDPLUS is available)
        const deleted = await client.messageDelete(message.ref, { uid: true })
        return deleted ? { success: true } : { success: false, error: 'Server refused deletion' }
      } finally {
        lock.release()
      }
    } catch (error) {
      return { success: false, error: errorMessage(error) }
    }
  }

  async pushMessage(folder: string, restorable: RestorableMessage): Promise<MailOperationResult> {
    try {
      const raw = await composeRawMessage(restorable)
      const result = await this.requireClient().append(
        folder,
        raw,
        ['\\Seen'],
        new Date(restorable.message.sentDate)
      )
      if (!result) {
        return { success: false, error: `APPEND to ${folder} was rejected` }
      }
      return { success: true }
    } catch (error) {
      logger.warn(LogCategory.MAIL_IMAP, 'Append failed', {
        accountId: this.account.id,
        folder,
        error: errorMessage(error)
      })
      return { success: false, error: errorMessage(error) }
    }
  }
}
