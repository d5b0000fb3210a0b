import Database from 'better-sqlite3'

export const SCHEMA_VERSION = 1

export function initializeSchema(db: Database.Database): void {
  db.exec(`
    -- Mail accounts
    CREATE TABLE IF NOT EXISTS mail_accounts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      email_address TEXT NOT NULL,
      provider TEXT NOT NULL DEFAULT 'imap',
      imap_server TEXT,
      imap_port INTEGER,
      use_ssl INTEGER NOT NULL DEFAULT 1,
      username TEXT,
      password TEXT,
      tenant_id TEXT,
      client_id TEXT,
      client_secret TEXT,
      is_enabled INTEGER NOT NULL DEFAULT 1,
      last_sync INTEGER NOT NULL DEFAULT 0,
      delete_after_days INTEGER,
      retention_enabled INTEGER NOT NULL DEFAULT 0,
      excluded_folders TEXT NOT NULL DEFAULT '[]',
      created_at INTEGER NOT NULL
    );

    -- Archived messages, one row per (account, message id)
    CREATE TABLE IF NOT EXISTS archived_emails (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      account_id INTEGER NOT NULL,
      message_id TEXT NOT NULL,
      subject TEXT NOT NULL,
      from_address TEXT NOT NULL,
      to_addresses TEXT NOT NULL DEFAULT '',
      cc_addresses TEXT NOT NULL DEFAULT '',
      bcc_addresses TEXT NOT NULL DEFAULT '',
      sent_date INTEGER NOT NULL,
      received_date INTEGER NOT NULL,
      is_outgoing INTEGER NOT NULL DEFAULT 0,
      folder_name TEXT NOT NULL,
      body TEXT NOT NULL DEFAULT '',
      html_body TEXT NOT NULL DEFAULT '',
      is_body_truncated INTEGER NOT NULL DEFAULT 0,
      is_html_truncated INTEGER NOT NULL DEFAULT 0,
      has_attachments INTEGER NOT NULL DEFAULT 0,
      FOREIGN KEY (account_id) REFERENCES mail_accounts(id) ON DELETE CASCADE,
      UNIQUE(account_id, message_id)
    );

    CREATE INDEX IF NOT EXISTS idx_archived_emails_account ON archived_emails(account_id);
    CREATE INDEX IF NOT EXISTS idx_archived_emails_sent ON archived_emails(account_id, sent_date DESC);
    CREATE INDEX IF NOT EXISTS idx_archived_emails_folder ON archived_emails(account_id, folder_name);

    -- Attachments, including synthesized originals of truncated bodies
    CREATE TABLE IF NOT EXISTS email_attachments (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      archived_email_id INTEGER NOT NULL,
      file_name TEXT NOT NULL,
      content_type TEXT NOT NULL,
      content_id TEXT,
      content BLOB NOT NULL,
      size INTEGER NOT NULL,
      FOREIGN KEY (archived_email_id) REFERENCES archived_emails(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_email_attachments_email ON email_attachments(archived_email_id);
  `)
}
