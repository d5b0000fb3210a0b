import type { MailAccount, ProviderKind } from '../account/types'
import type {
  ListMessagesOptions,
  MailOperationResult,
  MailSource,
  MessageRef,
  RestorableMessage
} from '../mail/types'

export interface FakeMessage {
  ref: string
  messageId: string | null
  date: number
  subject: string
  raw: Buffer
}

export interface FakeMailbox {
  folders: Map<string, FakeMessage[]>
  pushed: { folder: string; message: RestorableMessage }[]
  deleted: { folder: string; ref: string }[]
  // refs whose fetch throws this error
  fetchErrors: Map<string, Error>
  // subjects whose push is refused
  pushFailures: Set<string>
  failingFolders: Set<string>
  deleteUnsupported: boolean
  // thrown by connect when set
  connectError: Error | null
  connects: number
  closes: number
}

export function createFakeMailbox(): FakeMailbox {
  return {
    folders: new Map(),
    pushed: [],
    deleted: [],
    fetchErrors: new Map(),
    pushFailures: new Set(),
    failingFolders: new Set(),
    deleteUnsupported: false,
    connectError: null,
    connects: 0,
    closes: 0
  }
}

export function addFakeMessage(mailbox: FakeMailbox, folder: string, message: FakeMessage): void {
  const messages = mailbox.folders.get(folder) ?? []
  messages.push(message)
  mailbox.folders.set(folder, messages)
}

/**
 * In-process MailSource over a FakeMailbox. Filters mirror the real
 * adapters: since is inclusive, before is exclusive.
 */
export class FakeMailSource implements MailSource {
  readonly kind: ProviderKind
  readonly account: MailAccount
  private mailbox: FakeMailbox

  constructor(account: MailAccount, mailbox: FakeMailbox) {
    this.account = account
    this.kind = account.provider
    this.mailbox = mailbox
  }

  async connect(): Promise<void> {
    this.mailbox.connects++
    if (this.mailbox.connectError) throw this.mailbox.connectError
  }

  async close(): Promise<void> {
    this.mailbox.closes++
  }

  async listFolders(): Promise<string[]> {
    return [...this.mailbox.folders.keys()]
  }

  async *listMessages(folder: string, options: ListMessagesOptions = {}): AsyncIterable<MessageRef> {
    if (this.mailbox.failingFolders.has(folder)) {
      throw new Error(`Folder ${folder} could not be opened`)
    }
    const messages = [...(this.mailbox.folders.get(folder) ?? [])]
    for (const message of messages) {
      if (options.since !== undefined && message.date < options.since) continue
      if (options.before !== undefined && message.date >= options.before) continue
      yield {
        ref: message.ref,
        messageId: message.messageId,
        date: message.date,
        subject: message.subject,
        size: message.raw.length
      }
    }
  }

  async fetchSource(folder: string, message: MessageRef): Promise<Buffer> {
    const error = this.mailbox.fetchErrors.get(message.ref)
    if (error) throw error
    const found = (this.mailbox.folders.get(folder) ?? []).find((m) => m.ref === message.ref)
    if (!found) {
      throw new Error(`Message ${message.ref} not found`)
    }
    return found.raw
  }

  async deleteMessage(folder: string, message: MessageRef): Promise<MailOperationResult> {
    if (this.mailbox.deleteUnsupported) {
      return { success: false, unsupported: true, error: 'Permanent delete not available' }
    }
    const messages = this.mailbox.folders.get(folder) ?? []
    this.mailbox.folders.set(
      folder,
      messages.filter((m) => m.ref !== message.ref)
    )
    this.mailbox.deleted.push({ folder, ref: message.ref })
    return { success: true }
  }

  async pushMessage(folder: string, message: RestorableMessage): Promise<MailOperationResult> {
    if (this.mailbox.pushFailures.has(message.message.subject)) {
      return { success: false, error: 'APPEND rejected' }
    }
    this.mailbox.pushed.push({ folder, message })
    return { success: true }
  }
}
