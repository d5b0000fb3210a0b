/**
 * Streaming readers for import containers
 * - zip of .eml files: central directory walked lazily, one entry in memory at a time
 * - mbox: read line by line, one message in memory at a time
 */
import * as fs from 'fs'
import * as readline from 'readline'
import type { Readable } from 'stream'
import yauzl from 'yauzl'
import type { Entry, ZipFile } from 'yauzl'
import { ContainerReadError, errorMessage } from '../errors'

export interface ArchiveEntry {
  // path inside the zip, or "message N" for mbox
  name: string
  // folder derived from the container (zip directory or Gmail label)
  folder: string | null
  size: number
  content: Buffer | null
  // set when the entry itself could not be read
  error: string | null
}

// Gmail labels that describe state rather than a folder
const NON_FOLDER_LABELS = new Set(['opened', 'unread', 'important', 'starred', 'archived'])
const ENVELOPE = /^From \S/

// ─── Zip ──────────────────────────────────────────────────────────────

function openZip(filePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(filePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(new ContainerReadError(filePath, err ?? 'zip could not be opened'))
        return
      }
      resolve(zipfile)
    })
  })
}

function nextZipEntry(zipfile: ZipFile): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const cleanup = (): void => {
      zipfile.removeListener('entry', onEntry)
      zipfile.removeListener('end', onEnd)
      zipfile.removeListener('error', onError)
    }
    const onEntry = (entry: Entry): void => {
      cleanup()
      resolve(entry)
    }
    const onEnd = (): void => {
      cleanup()
      resolve(null)
    }
    const onError = (err: Error): void => {
      cleanup()
      reject(err)
    }
    zipfile.on('entry', onEntry)
    zipfile.on('end', onEnd)
    zipfile.on('error', onError)
    zipfile.readEntry()
  })
}

function readZipEntry(zipfile: ZipFile, entry: Entry): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error(`Cannot open ${entry.fileName}`))
        return
      }
      const chunks: Buffer[] = []
      stream.on('data', (chunk: Buffer) => chunks.push(chunk))
      stream.on('error', reject)
      stream.on('end', () => resolve(Buffer.concat(chunks)))
    })
  })
}

export function isEmlEntry(fileName: string): boolean {
  if (fileName.endsWith('/') || !fileName.toLowerCase().endsWith('.eml')) return false
  const segments = fileName.split(/[/\\]/)
  const base = segments[segments.length - 1]
  // macOS resource forks
  return !fileName.startsWith('__MACOSX/') && !base.startsWith('._')
}

/**
 * Last directory segment of an entry path: "Archive/2023/Sent/a.eml" → "Sent".
 */
export function folderFromEntryPath(fileName: string): string | null {
  const segments = fileName.split(/[/\\]/).filter(Boolean)
  return segments.length > 1 ? segments[segments.length - 2] : null
}

export async function countZipEntries(filePath: string): Promise<number> {
  const zipfile = await openZip(filePath)
  try {
    let count = 0
    for (let entry = await nextZipEntry(zipfile); entry; entry = await nextZipEntry(zipfile)) {
      if (isEmlEntry(entry.fileName)) count++
    }
    return count
  } catch (error) {
    throw new ContainerReadError(filePath, error)
  } finally {
    zipfile.close()
  }
}

export async function* readZipEntries(filePath: string): AsyncGenerator<ArchiveEntry> {
  const zipfile = await openZip(filePath)
  try {
    for (;;) {
      let entry: Entry | null
      try {
        entry = await nextZipEntry(zipfile)
      } catch (error) {
        throw new ContainerReadError(filePath, error)
      }
      if (!entry) return
      if (!isEmlEntry(entry.fileName)) continue

      const base = {
        name: entry.fileName,
        folder: folderFromEntryPath(entry.fileName),
        size: entry.uncompressedSize
      }
      try {
        yield { ...base, content: await readZipEntry(zipfile, entry), error: null }
      } catch (error) {
        yield { ...base, content: null, error: errorMessage(error) }
      }
    }
  } finally {
    zipfile.close()
  }
}

// ─── Mbox ─────────────────────────────────────────────────────────────

/**
 * X-Gmail-Labels: Inbox,Important,"Label, with comma"
 */
export function extractGmailLabels(headerText: string): string[] {
  const match = headerText.match(/^X-Gmail-Labels:\s*(.+(?:\r?\n[ \t]+.+)*)/im)
  if (!match) return []

  const rawValue = match[1].replace(/\r?\n\s+/g, ' ').trim()
  const labels: string[] = []
  let current = ''
  let inQuote = false
  for (const ch of rawValue) {
    if (ch === '"') {
      inQuote = !inQuote
    } else if (ch === ',' && !inQuote) {
      if (current.trim()) labels.push(current.trim())
      current = ''
    } else {
      current += ch
    }
  }
  if (current.trim()) labels.push(current.trim())
  return labels
}

export function folderFromLabels(labels: string[]): string | null {
  for (const label of labels) {
    const lower = label.toLowerCase()
    if (NON_FOLDER_LABELS.has(lower) || lower.startsWith('category ')) continue
    return lower === 'inbox' ? 'INBOX' : label
  }
  return null
}

function buildMboxEntry(lines: string[], index: number): ArchiveEntry {
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop()
  }
  // latin1 round-trips the original bytes
  const content = Buffer.from(lines.join('\n'), 'latin1')
  const headerEnd = lines.indexOf('')
  const headerText = (headerEnd >= 0 ? lines.slice(0, headerEnd) : lines).join('\n')
  return {
    name: `message ${index}`,
    folder: folderFromLabels(extractGmailLabels(headerText)),
    size: content.length,
    content,
    error: null
  }
}

function openLines(filePath: string): { lines: readline.Interface; input: Readable } {
  const input = fs.createReadStream(filePath, { encoding: 'latin1' })
  const lines = readline.createInterface({ input, crlfDelay: Infinity })
  return { lines, input }
}

async function assertReadable(filePath: string): Promise<void> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK)
  } catch (error) {
    throw new ContainerReadError(filePath, error)
  }
}

export async function countMboxMessages(filePath: string): Promise<number> {
  await assertReadable(filePath)
  const { lines, input } = openLines(filePath)
  let count = 0
  let previousBlank = true
  try {
    for await (const line of lines) {
      if (previousBlank && ENVELOPE.test(line)) count++
      previousBlank = line === ''
    }
  } catch (error) {
    throw new ContainerReadError(filePath, error)
  } finally {
    lines.close()
    input.destroy()
  }
  return count
}

export async function* readMboxEntries(filePath: string): AsyncGenerator<ArchiveEntry> {
  await assertReadable(filePath)
  const { lines, input } = openLines(filePath)
  let current: string[] | null = null
  let index = 0
  let sawContent = false
  let previousBlank = true

  try {
    for await (const line of lines) {
      if (previousBlank && ENVELOPE.test(line)) {
        if (current) yield buildMboxEntry(current, ++index)
        current = []
      } else if (current) {
        // mboxrd: one level of ">From " quoting is undone
        current.push(line.replace(/^>(>*From )/, '$1'))
      } else if (line.trim() !== '') {
        sawContent = true
      }
      previousBlank = line === ''
    }
    if (current) {
      yield buildMboxEntry(current, ++index)
    } else if (sawContent) {
      throw new ContainerReadError(filePath, 'no "From " separator line found')
    }
  } finally {
    lines.close()
    input.destroy()
  }
}
