/**
 * Microsoft Graph (M365) mailbox access
 * - app-only token from the client credential flow, cached until expiry
 * - folders addressed by display path ("Inbox/Projects"), resolved to ids once
 * - restore creates the message in the target folder, then uploads attachments
 */
import type { MailAccount } from '../account/types'
import { errorMessage, ProviderRequestError } from '../errors'
import { logger, LogCategory } from '../logger'
import type { ArchivedAttachment, ArchivedMessage } from '../storage/archive-repository'
import type {
  ListMessagesOptions,
  MailOperationResult,
  MailSource,
  MessageRef,
  RestorableMessage
} from './types'

const GRAPH = 'https://graph.microsoft.com/v1.0'
const LOGIN = 'https://login.microsoftonline.com'
const REQUEST_TIMEOUT_MS = 60_000
// inline attachment POST limit; larger files go through an upload session
const SIMPLE_ATTACHMENT_LIMIT = 3 * 1024 * 1024
// upload session chunks must be multiples of 320 KiB
const UPLOAD_CHUNK_SIZE = 320 * 1024 * 10

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface GraphSourceOptions {
  batchSize: number
  fetchImpl?: FetchLike
}

interface GraphPage<T> {
  value: T[]
  '@odata.nextLink'?: string
}

interface GraphFolder {
  id: string
  displayName: string
  childFolderCount?: number
}

interface GraphMessageHeader {
  id: string
  internetMessageId?: string | null
  subject?: string | null
  sentDateTime?: string | null
  receivedDateTime?: string | null
}

interface GraphRecipient {
  emailAddress: { name?: string; address: string }
}

interface TokenResponse {
  access_token: string
  expires_in: number
}

/**
 * Splits "Name <a@b>, c@d" into Graph recipients. Quoted display names may
 * contain commas.
 */
export function parseRecipients(value: string): GraphRecipient[] {
  const recipients: GraphRecipient[] = []
  const parts = value.match(/(?:"[^"]*"|[^,])+/g) ?? []
  for (const part of parts) {
    const trimmed = part.trim()
    if (!trimmed) continue
    const angle = trimmed.match(/^(.*)<([^>]+)>$/)
    if (angle) {
      const name = angle[1].trim().replace(/^"|"$/g, '')
      recipients.push({
        emailAddress: name ? { name, address: angle[2].trim() } : { address: angle[2].trim() }
      })
    } else if (trimmed.includes('@')) {
      recipients.push({ emailAddress: { address: trimmed } })
    }
  }
  return recipients
}

export function toGraphMessage(message: ArchivedMessage): Record<string, unknown> {
  const from = parseRecipients(message.from)[0]
  const isHtml = message.htmlBody.length > 0
  const sent = new Date(message.sentDate).toISOString()
  return {
    subject: message.subject,
    body: {
      contentType: isHtml ? 'html' : 'text',
      content: isHtml ? message.htmlBody : message.body
    },
    from,
    sender: from,
    toRecipients: parseRecipients(message.to),
    ccRecipients: parseRecipients(message.cc),
    bccRecipients: parseRecipients(message.bcc),
    internetMessageId: message.messageId,
    isRead: true,
    singleValueExtendedProperties: [
      // PR_MESSAGE_FLAGS = MSGFLAG_READ, clears the draft flag
      { id: 'Integer 0x0E07', value: '1' },
      // PR_CLIENT_SUBMIT_TIME / PR_MESSAGE_DELIVERY_TIME
      { id: 'SystemTime 0x0039', value: sent },
      { id: 'SystemTime 0x0E06', value: sent }
    ]
  }
}

export class GraphMailSource implements MailSource {
  readonly kind = 'm365' as const
  readonly account: MailAccount
  private fetchImpl: FetchLike
  private batchSize: number
  private token: { value: string; expiresAt: number } | null = null
  private folderIds: Map<string, string> | null = null

  constructor(account: MailAccount, options: GraphSourceOptions) {
    this.account = account
    this.batchSize = Math.max(1, options.batchSize)
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  private get userPath(): string {
    return `${GRAPH}/users/${encodeURIComponent(this.account.emailAddress)}`
  }

  private async getToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value
    }
    const graph = this.account.graph
    if (!graph) {
      throw new ProviderRequestError(`Account ${this.account.id} has no Graph credentials`, {
        transient: false
      })
    }

    const res = await this.fetchImpl(`${LOGIN}/${encodeURIComponent(graph.tenantId)}/oauth2/v2.0/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: graph.clientId,
        client_secret: graph.clientSecret,
        scope: 'https://graph.microsoft.com/.default',
        grant_type: 'client_credentials'
      }).toString(),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
    })
    if (!res.ok) {
      throw new ProviderRequestError(`Graph token request failed: ${res.status} ${await res.text()}`, {
        status: res.status,
        transient: res.status >= 500
      })
    }
    const body = (await res.json()) as TokenResponse
    this.token = {
      value: body.access_token,
      expiresAt: Date.now() + Math.max(0, body.expires_in - 60) * 1000
    }
    return body.access_token
  }

  private async request(
    url: string,
    what: string,
    init: { method?: string; body?: string; headers?: Record<string, string> } = {}
  ): Promise<Response> {
    const token = await this.getToken()
    const res = await this.fetchImpl(url, {
      method: init.method ?? 'GET',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
        ...(init.headers || {})
      },
      body: init.body,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
    })
    if (!res.ok) {
      throw new ProviderRequestError(`Graph ${what} failed: ${res.status} ${await res.text()}`, {
        status: res.status
      })
    }
    return res
  }

  private async getJson<T>(url: string, what: string): Promise<T> {
    const res = await this.request(url, what)
    return (await res.json()) as T
  }

  async connect(): Promise<void> {
    await this.getToken()
    logger.info(LogCategory.MAIL_GRAPH, 'Token acquired', { accountId: this.account.id })
  }

  async close(): Promise<void> {
    this.token = null
    this.folderIds = null
  }

  private async *pages<T>(firstUrl: string, what: string): AsyncGenerator<T[]> {
    let url: string | undefined = firstUrl
    while (url) {
      const page: GraphPage<T> = await this.getJson<GraphPage<T>>(url, what)
      yield page.value
      url = page['@odata.nextLink']
    }
  }

  private async loadFolders(): Promise<Map<string, string>> {
    if (this.folderIds) return this.folderIds

    const folders = new Map<string, string>()
    const walk = async (url: string, prefix: string): Promise<void> => {
      for await (const page of this.pages<GraphFolder>(url, 'folder list')) {
        for (const folder of page) {
          const path = prefix ? `${prefix}/${folder.displayName}` : folder.displayName
          folders.set(path, folder.id)
          if ((folder.childFolderCount ?? 0) > 0) {
            await walk(
              `${this.userPath}/mailFolders/${folder.id}/childFolders?$top=100`,
              path
            )
          }
        }
      }
    }
    await walk(`${this.userPath}/mailFolders?$top=100`, '')

    this.folderIds = folders
    return folders
  }

  private async resolveFolderId(folder: string): Promise<string> {
    const folders = await this.loadFolders()
    const exact = folders.get(folder)
    if (exact) return exact
    const lower = folder.toLowerCase()
    for (const [path, id] of folders) {
      if (path.toLowerCase() === lower) return id
    }
    // well-known names such as "inbox" resolve server side
    if (lower === 'inbox') return 'inbox'
    throw new ProviderRequestError(`Folder "${folder}" not found in mailbox`, {
      status: 404,
      transient: false
    })
  }

  async listFolders(): Promise<string[]> {
    const folders = await this.loadFolders()
    return [...folders.keys()]
  }

  async *listMessages(folder: string, options: ListMessagesOptions = {}): AsyncIterable<MessageRef> {
    const folderId = await this.resolveFolderId(folder)
    const filters: string[] = []
    if (options.since) filters.push(`receivedDateTime ge ${new Date(options.since).toISOString()}`)
    if (options.before) filters.push(`receivedDateTime lt ${new Date(options.before).toISOString()}`)

    const params = new URLSearchParams({
      $select: 'id,internetMessageId,subject,sentDateTime,receivedDateTime',
      $top: String(this.batchSize),
      $orderby: 'receivedDateTime asc'
    })
    if (filters.length > 0) params.set('$filter', filters.join(' and '))

    const url = `${this.userPath}/mailFolders/${folderId}/messages?${params.toString()}`
    for await (const page of this.pages<GraphMessageHeader>(url, 'message list')) {
      for (const msg of page) {
        const date = msg.sentDateTime ?? msg.receivedDateTime
        yield {
          ref: msg.id,
          messageId: msg.internetMessageId || null,
          date: date ? Date.parse(date) : null,
          subject: msg.subject ?? null,
          size: null
        }
      }
    }
  }

  async fetchSource(_folder: string, message: MessageRef): Promise<Buffer> {
    const res = await this.request(
      `${this.userPath}/messages/${encodeURIComponent(message.ref)}/$value`,
      'message download'
    )
    return Buffer.from(await res.arrayBuffer())
  }

  async deleteMessage(_folder: string, message: MessageRef): Promise<MailOperationResult> {
    try {
      await this.request(
        `${this.userPath}/messages/${encodeURIComponent(message.ref)}/permanentDelete`,
        'permanent delete',
        { method: 'POST' }
      )
      return { success: true }
    } catch (error) {
      if (error instanceof ProviderRequestError && (error.status === 405 || error.status === 501)) {
        return { success: false, unsupported: true, error: error.message }
      }
      return { success: false, error: errorMessage(error) }
    }
  }

  async pushMessage(folder: string, restorable: RestorableMessage): Promise<MailOperationResult> {
    try {
      const folderId = await this.resolveFolderId(folder)
      const res = await this.request(
        `${this.userPath}/mailFolders/${folderId}/messages`,
        'message create',
        { method: 'POST', body: JSON.stringify(toGraphMessage(restorable.message)) }
      )
      const created = (await res.json()) as { id: string }

      for (const attachment of restorable.attachments) {
        await this.uploadAttachment(created.id, attachment)
      }
      return { success: true }
    } catch (error) {
      logger.warn(LogCategory.MAIL_GRAPH, 'Restore to M365 failed', {
        accountId: this.account.id,
        folder,
        error: errorMessage(error)
      })
      return { success: false, error: errorMessage(error) }
    }
  }

  private async uploadAttachment(messageId: string, attachment: ArchivedAttachment): Promise<void> {
    const base = `${this.userPath}/messages/${encodeURIComponent(messageId)}/attachments`
    const contentId = attachment.contentId ? attachment.contentId.replace(/^<|>$/g, '') : undefined

    if (attachment.content.length <= SIMPLE_ATTACHMENT_LIMIT) {
      await this.request(base, 'attachment upload', {
        method: 'POST',
        body: JSON.stringify({
          '@odata.type': '#microsoft.graph.fileAttachment',
          name: attachment.fileName,
          contentType: attachment.contentType,
          contentBytes: attachment.content.toString('base64'),
          contentId,
          isInline: Boolean(contentId)
        })
      })
      return
    }

    const sessionRes = await this.request(`${base}/createUploadSession`, 'upload session', {
      method: 'POST',
      body: JSON.stringify({
        AttachmentItem: {
          attachmentType: 'file',
          name: attachment.fileName,
          size: attachment.content.length,
          contentType: attachment.contentType,
          contentId,
          isInline: Boolean(contentId)
        }
      })
    })
    const session = (await sessionRes.json()) as { uploadUrl: string }
    const total = attachment.content.length

    for (let offset = 0; offset < total; offset += UPLOAD_CHUNK_SIZE) {
      const slice = attachment.content.subarray(offset, Math.min(offset + UPLOAD_CHUNK_SIZE, total))
      // the upload URL is pre-authorized; no bearer token
      const res = await this.fetchImpl(session.uploadUrl, {
        method: 'PUT',
        headers: {
          'Content-Type': 'application/octet-stream',
          'Content-Length': String(slice.length),
          'Content-Range': `bytes ${offset}-${offset + slice.length - 1}/${total}`
        },
        body: slice,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
      })
      if (!res.ok) {
        throw new ProviderRequestError(`Graph attachment chunk failed: ${res.status}`, {
          status: res.status
        })
      }
    }
  }
}
