import { describe, it, expect } from 'vitest'
import { simpleParser } from 'mailparser'
import type { RestorableMessage } from './types'
import { composeRawMessage, toMailOptions } from './message-composer'

const restorable: RestorableMessage = {
  message: {
    id: 1,
    accountId: 1,
    messageId: '<m1@example.com>',
    subject: 'Restored report',
    from: 'alice@example.com',
    to: 'bob@example.com',
    cc: '',
    bcc: 'hidden@example.com',
    sentDate: Date.UTC(2023, 4, 6, 7, 8, 9),
    receivedDate: 0,
    isOutgoing: false,
    folderName: 'INBOX',
    body: 'Report attached',
    htmlBody: '',
    isBodyTruncated: false,
    isHtmlTruncated: false,
    hasAttachments: true
  },
  attachments: [
    {
      id: 7,
      fileName: 'logo.png',
      contentType: 'image/png',
      contentId: '<logo123>',
      content: Buffer.from('not really a png'),
      size: 16
    }
  ]
}

describe('toMailOptions', () => {
  it('should drop empty headers and unwrap the Content-ID', () => {
    const options = toMailOptions(restorable)
    expect(options.cc).toBeUndefined()
    expect(options.bcc).toBe('hidden@example.com')
    expect(options.html).toBeUndefined()
    expect(options.messageId).toBe('<m1@example.com>')
    expect(options.attachments?.[0].cid).toBe('logo123')
  })
})

describe('composeRawMessage', () => {
  it('should keep the original identity and date with CRLF line endings', async () => {
    const raw = await composeRawMessage(restorable)
    const text = raw.toString('utf8')
    expect(text).toContain('Subject: Restored report\r\n')
    expect(text).toContain('Bcc: hidden@example.com\r\n')
    expect(text).not.toMatch(/[^\r]\n/)

    const parsed = await simpleParser(raw)
    expect(parsed.messageId).toBe('<m1@example.com>')
    expect(parsed.date?.getTime()).toBe(restorable.message.sentDate)
    expect(parsed.text?.trim()).toBe('Report attached')
    expect(parsed.attachments).toHaveLength(1)
    expect(parsed.attachments[0].filename).toBe('logo.png')
    expect(parsed.attachments[0].content.toString()).toBe('not really a png')
  })
})
