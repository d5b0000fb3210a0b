export type ArchiveErrorCode =
  | 'JOB_CANCELLED'
  | 'ACCOUNT_NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'ADMISSION_REJECTED'
  | 'SYNC_IN_PROGRESS'
  | 'UNSUPPORTED_PROVIDER'
  | 'MALFORMED_MESSAGE'
  | 'CONTAINER_UNREADABLE'
  | 'PROVIDER_REQUEST_FAILED'

export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode

  constructor(code: ArchiveErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

// Not a failure: jobs that see this end as cancelled
export class JobCancelledError extends ArchiveError {
  constructor(message = 'Job was cancelled') {
    super('JOB_CANCELLED', message)
  }
}

export class AccountNotFoundError extends ArchiveError {
  readonly accountId: number

  constructor(accountId: number) {
    super('ACCOUNT_NOT_FOUND', `Account ${accountId} not found`)
    this.accountId = accountId
  }
}

export class AccessDeniedError extends ArchiveError {
  readonly accountId: number

  constructor(accountId: number) {
    super('ACCESS_DENIED', `Access to account ${accountId} is not allowed`)
    this.accountId = accountId
  }
}

export class AdmissionError extends ArchiveError {
  constructor(message: string) {
    super('ADMISSION_REJECTED', message)
  }
}

export class SyncInProgressError extends ArchiveError {
  readonly accountId: number

  constructor(accountId: number) {
    super('SYNC_IN_PROGRESS', `A sync for account ${accountId} is already in progress`)
    this.accountId = accountId
  }
}

export class UnsupportedProviderError extends ArchiveError {
  constructor(message: string) {
    super('UNSUPPORTED_PROVIDER', message)
  }
}

export class MalformedMessageError extends ArchiveError {
  constructor(message: string) {
    super('MALFORMED_MESSAGE', message)
  }
}

export class ContainerReadError extends ArchiveError {
  readonly filePath: string

  constructor(filePath: string, cause: unknown) {
    super('CONTAINER_UNREADABLE', `Cannot read import file ${filePath}: ${errorMessage(cause)}`)
    this.filePath = filePath
  }
}

export class ProviderRequestError extends ArchiveError {
  readonly status: number | null
  readonly transient: boolean

  constructor(message: string, options: { status?: number | null; transient?: boolean } = {}) {
    super('PROVIDER_REQUEST_FAILED', message)
    this.status = options.status ?? null
    this.transient = options.transient ?? isTransientStatus(this.status)
  }
}

export function isTransientStatus(status: number | null): boolean {
  if (status === null) return true
  return status === 408 || status === 429 || status >= 500
}

const NON_RETRYABLE_PATTERNS = [
  'authentication',
  'auth failed',
  'invalid credentials',
  'not found',
  'nonexistent',
  'permission',
  'malformed'
]

/**
 * Errors worth a second attempt: network hiccups and throttling. Structural
 * problems (bad content, missing folder, bad credentials) fail fast.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ProviderRequestError) return error.transient
  if (error instanceof ArchiveError) return false
  const message = errorMessage(error).toLowerCase()
  return !NON_RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
