import { errorMessage, isTransientError, JobCancelledError } from '../errors'

export interface JobContext {
  signal: AbortSignal
}

// Checkpoint: called before each message or archive entry
export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new JobCancelledError()
  }
}

/**
 * Throttling delay. Resolves early when the signal fires so the next
 * checkpoint observes the cancellation without waiting out the pause.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve()
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export interface RetryOptions {
  retries: number
  delayMs: number
  signal?: AbortSignal
  onRetry?: (attempt: number, error: unknown) => void
}

/**
 * Retries transient failures with a linear delay. Structural errors and
 * cancellation are rethrown at once.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0
  for (;;) {
    try {
      return await fn()
    } catch (error) {
      if (error instanceof JobCancelledError) throw error
      if (attempt >= options.retries || !isTransientError(error)) throw error
      attempt++
      options.onRetry?.(attempt, error)
      await sleep(options.delayMs * attempt, options.signal)
      if (options.signal?.aborted) {
        throw new JobCancelledError(`Cancelled while retrying: ${errorMessage(error)}`)
      }
    }
  }
}
