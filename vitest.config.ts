import { tmpdir } from 'os'
import { join } from 'path'
import { defineConfig } from 'vitest/config'

const scratch = join(tmpdir(), `mail-archive-test-${process.pid}`)

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      MAIL_ARCHIVE_DATA_DIR: join(scratch, 'data'),
      MAIL_ARCHIVE_LOG_DIR: join(scratch, 'logs'),
      MAIL_ARCHIVE_LOG_CONSOLE: 'false'
    }
  }
})
