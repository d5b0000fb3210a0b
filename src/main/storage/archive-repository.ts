import Database from 'better-sqlite3'

export interface ArchivedEmailRecord {
  id: number
  account_id: number
  message_id: string
  subject: string
  from_address: string
  to_addresses: string
  cc_addresses: string
  bcc_addresses: string
  sent_date: number
  received_date: number
  is_outgoing: number
  folder_name: string
  body: string
  html_body: string
  is_body_truncated: number
  is_html_truncated: number
  has_attachments: number
}

export interface AttachmentRecord {
  id: number
  archived_email_id: number
  file_name: string
  content_type: string
  content_id: string | null
  content: Buffer
  size: number
}

export interface ArchivedMessage {
  id: number
  accountId: number
  messageId: string
  subject: string
  from: string
  to: string
  cc: string
  bcc: string
  sentDate: number
  receivedDate: number
  isOutgoing: boolean
  folderName: string
  body: string
  htmlBody: string
  isBodyTruncated: boolean
  isHtmlTruncated: boolean
  hasAttachments: boolean
}

export interface ArchivedAttachment {
  id: number
  fileName: string
  contentType: string
  contentId: string | null
  content: Buffer
  size: number
}

export interface AttachmentInput {
  fileName: string
  contentType: string
  contentId: string | null
  content: Buffer
}

export interface ArchivedMessageInput {
  accountId: number
  messageId: string
  subject: string
  from: string
  to: string
  cc: string
  bcc: string
  sentDate: number
  receivedDate?: number
  isOutgoing: boolean
  folderName: string
  body: string
  htmlBody: string
  isBodyTruncated: boolean
  isHtmlTruncated: boolean
  hasAttachments: boolean
  attachments: AttachmentInput[]
}

const ID_CHUNK_SIZE = 500

export type SaveOutcome = { status: 'created'; id: number } | { status: 'exists'; id: number }

export interface MessageWithAttachments {
  message: ArchivedMessage
  attachments: ArchivedAttachment[]
}

function toMessage(row: ArchivedEmailRecord): ArchivedMessage {
  return {
    id: row.id,
    accountId: row.account_id,
    messageId: row.message_id,
    subject: row.subject,
    from: row.from_address,
    to: row.to_addresses,
    cc: row.cc_addresses,
    bcc: row.bcc_addresses,
    sentDate: row.sent_date,
    receivedDate: row.received_date,
    isOutgoing: row.is_outgoing === 1,
    folderName: row.folder_name,
    body: row.body,
    htmlBody: row.html_body,
    isBodyTruncated: row.is_body_truncated === 1,
    isHtmlTruncated: row.is_html_truncated === 1,
    hasAttachments: row.has_attachments === 1
  }
}

function toAttachment(row: AttachmentRecord): ArchivedAttachment {
  return {
    id: row.id,
    fileName: row.file_name,
    contentType: row.content_type,
    contentId: row.content_id,
    content: row.content,
    size: row.size
  }
}

export class ArchiveRepository {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  /**
   * Insert-if-absent on (account_id, message_id). The unique constraint
   * decides, so two writers racing on the same key both see a clean outcome.
   */
  saveMessage(input: ArchivedMessageInput): SaveOutcome {
    const save = this.db.transaction((): SaveOutcome => {
      const result = this.db
        .prepare(
          `INSERT INTO archived_emails (
            account_id, message_id, subject, from_address, to_addresses, cc_addresses,
            bcc_addresses, sent_date, received_date, is_outgoing, folder_name, body, html_body,
            is_body_truncated, is_html_truncated, has_attachments
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(account_id, message_id) DO NOTHING`
        )
        .run(
          input.accountId,
          input.messageId,
          input.subject,
          input.from,
          input.to,
          input.cc,
          input.bcc,
          input.sentDate,
          input.receivedDate ?? Date.now(),
          input.isOutgoing ? 1 : 0,
          input.folderName,
          input.body,
          input.htmlBody,
          input.isBodyTruncated ? 1 : 0,
          input.isHtmlTruncated ? 1 : 0,
          input.hasAttachments ? 1 : 0
        )

      if (result.changes === 0) {
        return { status: 'exists', id: this.requireId(input.accountId, input.messageId) }
      }

      const emailId = Number(result.lastInsertRowid)
      const insertAttachment = this.db.prepare(
        `INSERT INTO email_attachments (archived_email_id, file_name, content_type, content_id, content, size)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      for (const attachment of input.attachments) {
        insertAttachment.run(
          emailId,
          attachment.fileName,
          attachment.contentType,
          attachment.contentId,
          attachment.content,
          attachment.content.length
        )
      }
      return { status: 'created', id: emailId }
    })

    return save()
  }

  private requireId(accountId: number, messageId: string): number {
    const id = this.findId(accountId, messageId)
    if (id === null) {
      throw new Error(`Archived message ${messageId} vanished during insert`)
    }
    return id
  }

  findId(accountId: number, messageId: string): number | null {
    const row = this.db
      .prepare('SELECT id FROM archived_emails WHERE account_id = ? AND message_id = ?')
      .get(accountId, messageId) as { id: number } | undefined
    return row ? row.id : null
  }

  exists(accountId: number, messageId: string): boolean {
    return this.findId(accountId, messageId) !== null
  }

  getMessage(id: number): ArchivedMessage | null {
    const row = this.db.prepare('SELECT * FROM archived_emails WHERE id = ?').get(id) as
      | ArchivedEmailRecord
      | undefined
    return row ? toMessage(row) : null
  }

  getAttachments(archivedEmailId: number): ArchivedAttachment[] {
    const rows = this.db
      .prepare('SELECT * FROM email_attachments WHERE archived_email_id = ? ORDER BY id')
      .all(archivedEmailId) as AttachmentRecord[]
    return rows.map(toAttachment)
  }

  getMessageWithAttachments(id: number): MessageWithAttachments | null {
    const message = this.getMessage(id)
    if (!message) return null
    return { message, attachments: this.getAttachments(id) }
  }

  // Distinct owning accounts of the given archive ids; unknown ids are ignored
  getAccountIdsForMessages(ids: number[]): number[] {
    const owners = new Set<number>()
    // SQLite caps the number of bound variables per statement
    for (let start = 0; start < ids.length; start += ID_CHUNK_SIZE) {
      const chunk = ids.slice(start, start + ID_CHUNK_SIZE)
      const placeholders = chunk.map(() => '?').join(',')
      const rows = this.db
        .prepare(`SELECT DISTINCT account_id FROM archived_emails WHERE id IN (${placeholders})`)
        .all(...chunk) as { account_id: number }[]
      for (const row of rows) owners.add(row.account_id)
    }
    return [...owners]
  }

  countForAccount(accountId: number): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM archived_emails WHERE account_id = ?')
      .get(accountId) as { count: number }
    return row.count
  }

  listIdsForAccount(accountId: number): number[] {
    const rows = this.db
      .prepare('SELECT id FROM archived_emails WHERE account_id = ? ORDER BY sent_date, id')
      .all(accountId) as { id: number }[]
    return rows.map((r) => r.id)
  }

  listForAccount(accountId: number): ArchivedMessage[] {
    const rows = this.db
      .prepare('SELECT * FROM archived_emails WHERE account_id = ? ORDER BY id')
      .all(accountId) as ArchivedEmailRecord[]
    return rows.map(toMessage)
  }
}
