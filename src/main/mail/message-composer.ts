import * as nodemailer from 'nodemailer'
import type Mail from 'nodemailer/lib/mailer'
import type { RestorableMessage } from './types'

export function toMailOptions({ message, attachments }: RestorableMessage): Mail.Options {
  return {
    from: message.from || undefined,
    to: message.to || undefined,
    cc: message.cc || undefined,
    bcc: message.bcc || undefined,
    subject: message.subject,
    date: new Date(message.sentDate),
    messageId: message.messageId,
    text: message.body || undefined,
    html: message.htmlBody || undefined,
    attachments: attachments.map((a) => ({
      filename: a.fileName,
      content: a.content,
      contentType: a.contentType,
      cid: a.contentId ? a.contentId.replace(/^<|>$/g, '') : undefined
    }))
  }
}

/**
 * Rebuilds an archived message as RFC 822 bytes (CRLF line endings, as IMAP
 * APPEND expects) keeping the original Message-ID and Date.
 */
export async function composeRawMessage(restorable: RestorableMessage): Promise<Buffer> {
  const composer = nodemailer.createTransport({
    streamTransport: true,
    buffer: true,
    newline: 'windows'
  })

  const info = await composer.sendMail(toMailOptions(restorable))
  if (!Buffer.isBuffer(info.message)) {
    throw new Error('Message composer did not return a buffer')
  }
  return info.message
}
