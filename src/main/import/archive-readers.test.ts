import { describe, it, expect } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import { makeTempDir } from '../test-support/fixtures'
import {
  countMboxMessages,
  extractGmailLabels,
  folderFromEntryPath,
  folderFromLabels,
  isEmlEntry,
  readMboxEntries,
  type ArchiveEntry
} from './archive-readers'

async function collect(iterable: AsyncIterable<ArchiveEntry>): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = []
  for await (const entry of iterable) entries.push(entry)
  return entries
}

describe('isEmlEntry', () => {
  it('should accept .eml files and skip directories and resource forks', () => {
    expect(isEmlEntry('Inbox/a.EML')).toBe(true)
    expect(isEmlEntry('Inbox/')).toBe(false)
    expect(isEmlEntry('notes.txt')).toBe(false)
    expect(isEmlEntry('__MACOSX/Inbox/a.eml')).toBe(false)
    expect(isEmlEntry('Inbox/._a.eml')).toBe(false)
  })
})

describe('folderFromEntryPath', () => {
  it('should use the last directory segment', () => {
    expect(folderFromEntryPath('Archive/2023/Sent/a.eml')).toBe('Sent')
    expect(folderFromEntryPath('a.eml')).toBeNull()
  })
})

describe('Gmail labels', () => {
  it('should split labels and keep quoted commas', () => {
    const headers = 'Subject: x\nX-Gmail-Labels: Opened,"Work, 2024",Inbox\nFrom: a@example.com'
    expect(extractGmailLabels(headers)).toEqual(['Opened', 'Work, 2024', 'Inbox'])
  })

  it('should pick the first label that names a folder', () => {
    expect(folderFromLabels(['Unread', 'Category Updates', 'Inbox'])).toBe('INBOX')
    expect(folderFromLabels(['Starred', 'Receipts'])).toBe('Receipts')
    expect(folderFromLabels(['Important'])).toBeNull()
  })
})

describe('readMboxEntries', () => {
  it('should split on envelope lines and undo one level of From quoting', async () => {
    const filePath = path.join(makeTempDir('mbox-reader'), 'mail.mbox')
    fs.writeFileSync(
      filePath,
      [
        'From alice@example.com Fri Mar 01 10:00:00 2024',
        'Subject: First',
        '',
        '>From the start',
        '>>From deeper',
        '',
        'From bob@example.com Sat Mar 02 10:00:00 2024',
        'Subject: Second',
        'X-Gmail-Labels: Sent',
        '',
        'Body',
        ''
      ].join('\n')
    )

    expect(await countMboxMessages(filePath)).toBe(2)
    const entries = await collect(readMboxEntries(filePath))
    expect(entries.map((e) => e.name)).toEqual(['message 1', 'message 2'])
    expect(entries[0].content?.toString('latin1')).toBe(
      'Subject: First\n\nFrom the start\n>From deeper'
    )
    expect(entries[0].folder).toBeNull()
    expect(entries[1].folder).toBe('Sent')
    expect(entries[1].size).toBe(Buffer.byteLength('Subject: Second\nX-Gmail-Labels: Sent\n\nBody'))
  })
})
