import * as os from 'os'
import * as path from 'path'
import * as fs from 'fs'

const DEFAULT_DIR_NAME = '.mail-archive'

/**
 * Root directory for the archive database, settings file and staged uploads.
 * MAIL_ARCHIVE_DATA_DIR overrides the per-user default.
 */
export function resolveDataDir(): string {
  const fromEnv = process.env.MAIL_ARCHIVE_DATA_DIR
  if (fromEnv && fromEnv.trim()) {
    return path.resolve(fromEnv.trim())
  }
  return path.join(os.homedir(), DEFAULT_DIR_NAME)
}

export function resolveLogDir(): string {
  const fromEnv = process.env.MAIL_ARCHIVE_LOG_DIR
  if (fromEnv && fromEnv.trim()) {
    return path.resolve(fromEnv.trim())
  }
  return path.join(resolveDataDir(), 'logs')
}

export function ensureDir(dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true })
  }
  return dir
}
