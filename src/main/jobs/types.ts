/**
 * Background job model
 */

export type JobKind = 'sync' | 'import' | 'batch-restore'

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled'

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled']

export interface JobBase {
  jobId: string
  kind: JobKind
  status: JobStatus
  accountId: number
  createdAt: number
  startedAt: number | null
  completedAt: number | null
  total: number
  processed: number
  succeeded: number
  failed: number
  skipped: number
  currentItem: string | null
  // set only when status is 'failed'
  errorMessage: string | null
}

export interface SyncJob extends JobBase {
  kind: 'sync'
  accountName: string
  fullSync: boolean
  newMessages: number
  retentionDeleted: number
  retentionFailed: number
}

export type ImportFormat = 'eml-zip' | 'mbox'

export interface ImportJob extends JobBase {
  kind: 'import'
  format: ImportFormat
  filePath: string
  fileName: string
  fileSize: number
  defaultFolder: string
  processedBytes: number
}

export interface BatchRestoreJob extends JobBase {
  kind: 'batch-restore'
  emailIds: number[]
  targetFolder: string
}

export type Job = SyncJob | ImportJob | BatchRestoreJob

/**
 * Polling shape shared by every job kind.
 */
export interface JobStatusView {
  jobId: string
  kind: JobKind
  status: JobStatus
  accountId: number
  total: number
  processed: number
  succeeded: number
  failed: number
  skipped: number
  progressPercent: number
  currentItem: string | null
  createdAt: string
  startedAt: string | null
  completedAt: string | null
  errorMessage: string | null
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status)
}

export function isActive(job: Job): boolean {
  return job.status === 'queued' || job.status === 'running'
}

export function progressPercent(job: Pick<JobBase, 'processed' | 'total'>): number {
  if (job.total <= 0) return 0
  return Math.min(100, Math.round((job.processed / job.total) * 1000) / 10)
}

function iso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString()
}

export function toJobStatusView(job: Job): JobStatusView {
  return {
    jobId: job.jobId,
    kind: job.kind,
    status: job.status,
    accountId: job.accountId,
    total: job.total,
    processed: job.processed,
    succeeded: job.succeeded,
    failed: job.failed,
    skipped: job.skipped,
    progressPercent: progressPercent(job),
    currentItem: job.currentItem,
    createdAt: new Date(job.createdAt).toISOString(),
    startedAt: iso(job.startedAt),
    completedAt: iso(job.completedAt),
    errorMessage: job.errorMessage
  }
}
