import { v4 as uuidv4 } from 'uuid'
import { simpleParser } from 'mailparser'
import type { AddressObject, Attachment, ParsedMail } from 'mailparser'
import type { Readable } from 'stream'
import { MalformedMessageError } from '../errors'
import { logger, LogCategory } from '../logger'
import type { ArchivedMessageInput, AttachmentInput } from '../storage/archive-repository'

export const MAX_TEXT_BYTES = 800_000
export const MAX_HTML_LENGTH = 1_000_000
export const NO_SUBJECT = '(No Subject)'

export const TEXT_TRUNCATION_NOTICE =
  '\n\n[CONTENT TRUNCATED - This email contains very large text content that has been truncated for better performance. The complete original content has been saved as an attachment.]'

export const HTML_TRUNCATION_NOTICE =
  "<div style='background-color: #f8f9fa; border: 1px solid #dee2e6; border-radius: 5px; padding: 15px; margin: 10px 0; font-family: Arial, sans-serif;'>" +
  "<h4 style='color: #495057; margin-top: 0;'>Email content has been truncated</h4>" +
  "<p style='color: #6c757d; margin-bottom: 10px;'>This email contains very large HTML content (over 1 MB) that has been truncated for better performance.</p>" +
  "<p style='color: #6c757d; margin-bottom: 0;'><strong>The complete original HTML content has been saved as an attachment.</strong><br>" +
  "Look for a file named 'original_content_*.html' in the attachments.</p></div>"

const HTML_CLOSING_OVERHEAD = Buffer.byteLength(HTML_TRUNCATION_NOTICE + '</body></html>', 'utf8')

const EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/bmp': '.bmp',
  'image/webp': '.webp',
  'image/svg+xml': '.svg'
}

export interface NormalizeContext {
  accountId: number
  accountEmail: string
  folderName: string
  // dedup key chosen by the caller (native Message-ID or synthesized)
  messageId: string
  fallbackDate?: number
  now?: Date
}

export function parseMessage(source: Buffer | Readable): Promise<ParsedMail> {
  return simpleParser(source, { skipImageLinks: true })
}

/**
 * Removes NUL and turns the remaining control characters, except CR, LF and
 * TAB, into spaces.
 */
export function cleanText(text: string | undefined | null): string {
  if (!text) return ''
  let result = ''
  for (const ch of text.replace(/\0/g, '')) {
    const code = ch.charCodeAt(0)
    result += code < 32 && ch !== '\r' && ch !== '\n' && ch !== '\t' ? ' ' : ch
  }
  return result
}

export function stripHtml(html: string): string {
  return html
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8')
}

function codePointBytes(codePoint: number): number {
  if (codePoint < 0x80) return 1
  if (codePoint < 0x800) return 2
  if (codePoint < 0x10000) return 3
  return 4
}

// Largest prefix length (in UTF-16 units) whose UTF-8 size fits maxBytes
function prefixWithinBytes(text: string, maxBytes: number): number {
  let bytes = 0
  let index = 0
  for (const ch of text) {
    const size = codePointBytes(ch.codePointAt(0) ?? 0)
    if (bytes + size > maxBytes) break
    bytes += size
    index += ch.length
  }
  return index
}

export function truncateTextForStorage(text: string, maxBytes: number = MAX_TEXT_BYTES): string {
  if (!text) return ''
  if (utf8Length(text) <= maxBytes) return text

  const maxContent = maxBytes - utf8Length(TEXT_TRUNCATION_NOTICE)
  if (maxContent <= 0) return TEXT_TRUNCATION_NOTICE

  let position = prefixWithinBytes(text, maxContent)

  // prefer a word, line or sentence break within the last 100 characters
  const windowStart = Math.max(0, position - 100)
  const window = text.slice(windowStart, position)
  const breakAt = Math.max(
    window.lastIndexOf(' '),
    window.lastIndexOf('\n'),
    window.lastIndexOf('.'),
    window.lastIndexOf('!'),
    window.lastIndexOf('?'),
    window.lastIndexOf(';')
  )
  if (breakAt > 0) {
    position = windowStart + breakAt + 1
  }

  return text.slice(0, position) + TEXT_TRUNCATION_NOTICE
}

export function truncateHtmlForStorage(html: string, maxLength: number = MAX_HTML_LENGTH): string {
  if (!html) return ''
  const cleaned = html.replace(/\0/g, '')
  if (cleaned.length <= maxLength) return cleaned

  const maxContent = maxLength - HTML_CLOSING_OVERHEAD
  if (maxContent <= 0) {
    return `<html><body>${HTML_TRUNCATION_NOTICE}</body></html>`
  }

  let position = Math.min(maxContent, cleaned.length)
  const lastOpen = cleaned.lastIndexOf('<', position - 1)
  const lastClose = cleaned.lastIndexOf('>', position - 1)
  if (lastOpen > lastClose && lastOpen >= 0) {
    // inside a tag: cut before it
    position = lastOpen
  } else if (lastClose >= 0) {
    position = lastClose + 1
  }

  let content = cleaned.slice(0, position)
  const hasHtml = /<html/i.test(content)
  const hasBody = /<body/i.test(content)

  if (!hasBody) {
    const htmlTagEnd = hasHtml ? content.indexOf('>', content.search(/<html/i)) : -1
    content =
      htmlTagEnd >= 0
        ? content.slice(0, htmlTagEnd + 1) + '<body>' + content.slice(htmlTagEnd + 1)
        : '<body>' + content
  }
  if (!hasHtml) {
    content = '<html>' + content
  }

  return content + HTML_TRUNCATION_NOTICE + '</body></html>'
}

export function extensionForContentType(contentType: string | undefined): string {
  return EXTENSIONS[(contentType ?? '').toLowerCase()] ?? '.dat'
}

/**
 * Inline parts the archive keeps next to regular attachments: explicit
 * inline disposition, a Content-ID, images that look embedded and related
 * text parts.
 */
export function isInlineContent(attachment: Attachment): boolean {
  if (attachment.contentDisposition?.toLowerCase() === 'inline') return true
  if (attachment.cid) return true

  const contentType = (attachment.contentType ?? '').toLowerCase()
  const fileName = attachment.filename ?? ''

  if (contentType.startsWith('image/')) {
    if (!attachment.contentDisposition) return true
    if (
      !fileName ||
      fileName.toLowerCase().startsWith('image') ||
      /inline|embed/i.test(fileName) ||
      /^(img|pic|photo)\d*\./i.test(fileName)
    ) {
      return true
    }
  }

  return contentType.startsWith('text/') && contentType.includes('related')
}

function attachmentFileName(attachment: Attachment): string {
  if (attachment.filename) return attachment.filename
  const extension = extensionForContentType(attachment.contentType)
  if (attachment.cid) {
    return `inline_${attachment.cid.replace(/^<|>$/g, '')}${extension}`
  }
  return `attachment_${uuidv4().replace(/-/g, '').slice(0, 8)}${extension}`
}

export function collectAttachments(parsed: ParsedMail): AttachmentInput[] {
  const collected: AttachmentInput[] = []
  for (const attachment of parsed.attachments) {
    const isAttachment = attachment.contentDisposition?.toLowerCase() === 'attachment'
    if (!isAttachment && !isInlineContent(attachment)) {
      logger.debug(LogCategory.CONTENT, 'Skipping part that is neither attachment nor inline', {
        contentType: attachment.contentType
      })
      continue
    }
    collected.push({
      fileName: cleanText(attachmentFileName(attachment)),
      contentType: cleanText(attachment.contentType || 'application/octet-stream'),
      contentId: attachment.cid ? cleanText(attachment.cid) : null,
      content: attachment.content
    })
  }
  return collected
}

export function formatAddresses(value: AddressObject | AddressObject[] | undefined): string {
  if (!value) return ''
  const list = Array.isArray(value) ? value : [value]
  return list
    .map((a) => a.text)
    .filter(Boolean)
    .join(', ')
}

export function firstAddress(value: AddressObject | AddressObject[] | undefined): string | null {
  if (!value) return null
  const list = Array.isArray(value) ? value : [value]
  for (const group of list) {
    for (const entry of group.value) {
      if (entry.address) return entry.address
    }
  }
  return null
}

export function isOutgoing(parsed: ParsedMail, accountEmail: string): boolean {
  const from = firstAddress(parsed.from)
  return from !== null && from.toLowerCase() === accountEmail.toLowerCase()
}

// A parsed entity without any identifying header is not a mail message
export function assertWellFormed(parsed: ParsedMail): void {
  const headerless =
    !parsed.from && !parsed.date && !parsed.messageId && !parsed.subject && !parsed.to
  if (headerless) {
    throw new MalformedMessageError('Message has no From, To, Date, Message-ID or Subject header')
  }
}

export function compactTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0')
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

export function normalizeMessage(parsed: ParsedMail, ctx: NormalizeContext): ArchivedMessageInput {
  const now = ctx.now ?? new Date()
  const html = typeof parsed.html === 'string' ? parsed.html : ''
  const text = parsed.text ?? ''

  const originalBody = text || (html ? stripHtml(html) : '')
  const cleanedBody = cleanText(originalBody)
  const isBodyTruncated = utf8Length(cleanedBody) > MAX_TEXT_BYTES
  const body = isBodyTruncated ? truncateTextForStorage(cleanedBody) : cleanedBody

  const isHtmlTruncated = html.length > MAX_HTML_LENGTH
  const htmlBody = isHtmlTruncated ? truncateHtmlForStorage(html) : cleanText(html)

  const attachments = collectAttachments(parsed)
  const stamp = compactTimestamp(now)

  if (isHtmlTruncated) {
    attachments.push({
      fileName: `original_content_${stamp}.html`,
      contentType: 'text/html',
      contentId: null,
      content: Buffer.from(html, 'utf8')
    })
  }
  if (isBodyTruncated) {
    attachments.push({
      fileName: `original_text_content_${stamp}.txt`,
      contentType: 'text/plain',
      contentId: null,
      content: Buffer.from(originalBody, 'utf8')
    })
  }

  const sentDate = parsed.date?.getTime() ?? ctx.fallbackDate ?? now.getTime()

  return {
    accountId: ctx.accountId,
    messageId: ctx.messageId,
    subject: cleanText(parsed.subject || NO_SUBJECT),
    from: cleanText(formatAddresses(parsed.from)),
    to: cleanText(formatAddresses(parsed.to)),
    cc: cleanText(formatAddresses(parsed.cc)),
    bcc: cleanText(formatAddresses(parsed.bcc)),
    sentDate,
    receivedDate: now.getTime(),
    isOutgoing: isOutgoing(parsed, ctx.accountEmail),
    folderName: ctx.folderName,
    body,
    htmlBody,
    isBodyTruncated,
    isHtmlTruncated,
    hasAttachments: attachments.length > 0,
    attachments
  }
}
