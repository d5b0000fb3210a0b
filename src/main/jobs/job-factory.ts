import { v4 as uuidv4 } from 'uuid'
import type { BatchRestoreJob, ImportFormat, ImportJob, JobBase, SyncJob } from './types'

function newJobBase(accountId: number, total = 0): Omit<JobBase, 'kind'> {
  return {
    jobId: uuidv4(),
    status: 'queued',
    accountId,
    createdAt: Date.now(),
    startedAt: null,
    completedAt: null,
    total,
    processed: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    currentItem: null,
    errorMessage: null
  }
}

export function createSyncJob(params: {
  accountId: number
  accountName: string
  fullSync?: boolean
}): SyncJob {
  return {
    ...newJobBase(params.accountId),
    kind: 'sync',
    accountName: params.accountName,
    fullSync: params.fullSync ?? false,
    newMessages: 0,
    retentionDeleted: 0,
    retentionFailed: 0
  }
}

export function createImportJob(params: {
  accountId: number
  format: ImportFormat
  filePath: string
  fileName: string
  fileSize: number
  defaultFolder?: string
}): ImportJob {
  return {
    ...newJobBase(params.accountId),
    kind: 'import',
    format: params.format,
    filePath: params.filePath,
    fileName: params.fileName,
    fileSize: params.fileSize,
    defaultFolder: params.defaultFolder || 'INBOX',
    processedBytes: 0
  }
}

export function createBatchRestoreJob(params: {
  accountId: number
  emailIds: number[]
  targetFolder: string
}): BatchRestoreJob {
  return {
    ...newJobBase(params.accountId, params.emailIds.length),
    kind: 'batch-restore',
    emailIds: [...params.emailIds],
    targetFolder: params.targetFolder
  }
}
