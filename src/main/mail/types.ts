/**
 * Mailbox access shared by every provider
 */
import type { MailAccount, ProviderKind } from '../account/types'
import type { ArchivedAttachment, ArchivedMessage } from '../storage/archive-repository'

// Provider handle for one message in a folder
export interface MessageRef {
  // IMAP UID or Graph message id
  ref: string
  messageId: string | null
  date: number | null
  subject: string | null
  size: number | null
}

export interface ListMessagesOptions {
  // only messages dated at or after this instant
  since?: number
  // only messages dated before this instant
  before?: number
}

export interface MailOperationResult {
  success: boolean
  error?: string
  // the provider cannot perform the operation at all
  unsupported?: boolean
}

export interface RestorableMessage {
  message: ArchivedMessage
  attachments: ArchivedAttachment[]
}

export interface MailSource {
  readonly kind: ProviderKind
  readonly account: MailAccount

  connect(): Promise<void>
  close(): Promise<void>

  listFolders(): Promise<string[]>

  /**
   * Lazily yields message handles. Implementations page through the folder
   * so a large mailbox is never held in memory at once.
   */
  listMessages(folder: string, options?: ListMessagesOptions): AsyncIterable<MessageRef>

  // Full RFC 822 source of one message
  fetchSource(folder: string, message: MessageRef): Promise<Buffer>

  // Permanent removal; reports unsupported instead of silently doing nothing
  deleteMessage(folder: string, message: MessageRef): Promise<MailOperationResult>

  pushMessage(folder: string, message: RestorableMessage): Promise<MailOperationResult>
}

export type MailSourceFactory = (account: MailAccount) => MailSource
