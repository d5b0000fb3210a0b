import { errorMessage, JobCancelledError } from '../errors'
import { logger, LogCategory } from '../logger'
import { sleep, type JobContext } from './cancellation'
import {
  isActive,
  isTerminal,
  toJobStatusView,
  type BatchRestoreJob,
  type ImportJob,
  type Job,
  type JobStatusView,
  type SyncJob
} from './types'

export interface JobHandler<J extends Job> {
  run(job: J, ctx: JobContext): Promise<void>
  // frees what a job holds outside the registry (staged uploads); must not throw
  release?(job: J): void
}

export interface JobHandlers {
  sync: JobHandler<SyncJob>
  import: JobHandler<ImportJob>
  'batch-restore': JobHandler<BatchRestoreJob>
}

export interface JobQueueOptions {
  idlePollMs: number
  errorBackoffMs: number
  retentionDays: number
  cleanupIntervalHours: number
}

export interface JobQueueStatus {
  isRunning: boolean
  runningJobId: string | null
  queuedCount: number
  totalJobs: number
  lastSweepAt: number | null
}

const DAY_MS = 24 * 60 * 60 * 1000
const HOUR_MS = 60 * 60 * 1000

function snapshot(job: Job): Job {
  return job.kind === 'batch-restore' ? { ...job, emailIds: [...job.emailIds] } : { ...job }
}

/**
 * In-memory job registry plus FIFO queue, drained by a single worker loop.
 * Only one job body runs at a time. Readers get snapshots; the worker and
 * cancelJob are the only writers.
 */
export class JobQueue {
  private jobs: Map<string, Job> = new Map()
  private queue: string[] = []
  private handlers: JobHandlers
  private options: JobQueueOptions
  private running: { job: Job; controller: AbortController } | null = null
  private loop: Promise<void> | null = null
  private loopController: AbortController | null = null
  private sweepTimer: NodeJS.Timeout | null = null
  private lastSweepAt: number | null = null

  constructor(handlers: JobHandlers, options: JobQueueOptions) {
    this.handlers = handlers
    this.options = options
  }

  enqueue(job: Job): string {
    if (this.jobs.has(job.jobId)) {
      throw new Error(`Job ${job.jobId} is already registered`)
    }
    job.status = 'queued'
    this.jobs.set(job.jobId, job)
    this.queue.push(job.jobId)
    logger.info(LogCategory.JOBS, 'Job queued', {
      jobId: job.jobId,
      kind: job.kind,
      accountId: job.accountId,
      queueLength: this.queue.length
    })
    return job.jobId
  }

  getJob(jobId: string): Job | null {
    const job = this.jobs.get(jobId)
    return job ? snapshot(job) : null
  }

  getStatusView(jobId: string): JobStatusView | null {
    const job = this.jobs.get(jobId)
    return job ? toJobStatusView(job) : null
  }

  getActiveJobs(): Job[] {
    return [...this.jobs.values()]
      .filter(isActive)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(snapshot)
  }

  getAllJobs(): Job[] {
    const recency = (job: Job): number => job.startedAt ?? job.createdAt
    return [...this.jobs.values()]
      .sort((a, b) => {
        const activeOrder = Number(isActive(b)) - Number(isActive(a))
        return activeOrder !== 0 ? activeOrder : recency(b) - recency(a)
      })
      .map(snapshot)
  }

  hasActiveJob(predicate: (job: Job) => boolean): boolean {
    for (const job of this.jobs.values()) {
      if (isActive(job) && predicate(job)) return true
    }
    return false
  }

  cancelJob(jobId: string): boolean {
    const job = this.jobs.get(jobId)
    if (!job) return false

    if (job.status === 'queued') {
      job.status = 'cancelled'
      job.completedAt = Date.now()
      this.queue = this.queue.filter((id) => id !== jobId)
      this.release(job)
      logger.info(LogCategory.JOBS, 'Queued job cancelled', { jobId, kind: job.kind })
      return true
    }

    if (job.status === 'running' && this.running?.job.jobId === jobId) {
      this.running.controller.abort()
      logger.info(LogCategory.JOBS, 'Cancellation requested for running job', {
        jobId,
        kind: job.kind
      })
      return true
    }

    return false
  }

  private release(job: Job): void {
    try {
      switch (job.kind) {
        case 'sync':
          this.handlers.sync.release?.(job)
          break
        case 'import':
          this.handlers.import.release?.(job)
          break
        case 'batch-restore':
          this.handlers['batch-restore'].release?.(job)
          break
      }
    } catch (error) {
      logger.warn(LogCategory.JOBS, 'Failed to release job resources', {
        jobId: job.jobId,
        error: errorMessage(error)
      })
    }
  }

  private dispatch(job: Job, ctx: JobContext): Promise<void> {
    switch (job.kind) {
      case 'sync':
        return this.handlers.sync.run(job, ctx)
      case 'import':
        return this.handlers.import.run(job, ctx)
      case 'batch-restore':
        return this.handlers['batch-restore'].run(job, ctx)
    }
  }

  /**
   * Runs the next queued job to a terminal state. Returns false when the
   * queue was empty. Job failures never propagate out of here.
   */
  async processNext(): Promise<boolean> {
    const jobId = this.queue.shift()
    if (jobId === undefined) return false

    const job = this.jobs.get(jobId)
    if (!job || job.status !== 'queued') {
      logger.debug(LogCategory.JOBS, 'Skipping dequeued job', { jobId, status: job?.status })
      return true
    }

    const controller = new AbortController()
    this.running = { job, controller }
    job.status = 'running'
    job.startedAt = Date.now()
    logger.info(LogCategory.JOBS, 'Job started', { jobId, kind: job.kind, accountId: job.accountId })

    try {
      await this.dispatch(job, { signal: controller.signal })
      job.status = controller.signal.aborted ? 'cancelled' : 'completed'
    } catch (error) {
      if (error instanceof JobCancelledError || controller.signal.aborted) {
        job.status = 'cancelled'
      } else {
        job.status = 'failed'
        job.errorMessage = errorMessage(error)
      }
    } finally {
      job.completedAt = Date.now()
      job.currentItem = null
      this.running = null
    }

    const details = {
      jobId,
      kind: job.kind,
      processed: job.processed,
      succeeded: job.succeeded,
      failed: job.failed,
      skipped: job.skipped,
      durationMs: job.completedAt - (job.startedAt ?? job.completedAt)
    }
    if (job.status === 'failed') {
      logger.error(LogCategory.JOBS, 'Job failed', { ...details, error: job.errorMessage })
    } else {
      logger.info(LogCategory.JOBS, `Job ${job.status}`, details)
    }
    return true
  }

  // Runs queued jobs until none are left; for callers that do not start the loop
  async drain(): Promise<void> {
    while (await this.processNext()) {
      // keep going
    }
  }

  start(): void {
    if (this.loop) {
      logger.info(LogCategory.JOBS, 'Job worker already running')
      return
    }
    const controller = new AbortController()
    this.loopController = controller
    this.loop = this.runLoop(controller.signal)

    this.sweepTimer = setInterval(() => {
      this.sweep()
    }, this.options.cleanupIntervalHours * HOUR_MS)
    this.sweepTimer.unref()

    logger.info(LogCategory.JOBS, 'Job worker started', {
      idlePollMs: this.options.idlePollMs,
      cleanupIntervalHours: this.options.cleanupIntervalHours
    })
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const ran = await this.processNext()
        if (!ran) {
          await sleep(this.options.idlePollMs, signal)
        }
      } catch (error) {
        logger.error(LogCategory.JOBS, 'Job worker loop error', {
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined
        })
        await sleep(this.options.errorBackoffMs, signal)
      }
    }
  }

  /**
   * Stops the loop after signalling the in-flight job. Queued jobs stay
   * queued.
   */
  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
    const loop = this.loop
    if (!loop) return

    this.loopController?.abort()
    this.running?.controller.abort()
    await loop
    this.loop = null
    this.loopController = null
    logger.info(LogCategory.JOBS, 'Job worker stopped')
  }

  /**
   * Drops terminal jobs completed more than retentionDays ago and releases
   * their temporary files. Returns the number of jobs removed.
   */
  sweep(now: number = Date.now()): number {
    const cutoff = now - this.options.retentionDays * DAY_MS
    let removed = 0
    for (const job of [...this.jobs.values()]) {
      if (!isTerminal(job.status) || job.completedAt === null || job.completedAt >= cutoff) {
        continue
      }
      this.release(job)
      this.jobs.delete(job.jobId)
      removed++
    }
    this.lastSweepAt = now
    if (removed > 0) {
      logger.info(LogCategory.JOBS, 'Removed old jobs', { removed, remaining: this.jobs.size })
    }
    return removed
  }

  getStatus(): JobQueueStatus {
    return {
      isRunning: this.loop !== null,
      runningJobId: this.running?.job.jobId ?? null,
      queuedCount: this.queue.length,
      totalJobs: this.jobs.size,
      lastSweepAt: this.lastSweepAt
    }
  }
}
