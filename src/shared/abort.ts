/**
 * Cancellation Helpers
 *
 * Small utilities for racing work against an AbortSignal.
 */

/**
 * The operation was cancelled by the caller.
 */
export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

/**
 * The operation ran past its deadline.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error describing why a signal was aborted.
 */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new CancelledError()
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The promise keeps running; its eventual result is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  if (signal.aborted) return Promise.reject(abortReason(signal))

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal))
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

/**
 * Wait for ms milliseconds, rejecting early if the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const wait = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms)
  })
  return raceAbort(wait, signal).finally(() => clearTimeout(timer))
}

/**
 * Combine a caller signal with an optional timeout.
 * Call dispose() once the guarded work has settled.
 */
export function createDeadline(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const onAbort = () => controller.abort(signal ? abortReason(signal) : new CancelledError())

  if (signal?.aborted) {
    onAbort()
  } else {
    signal?.addEventListener('abort', onAbort, { once: true })
  }

  const timeoutId =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs)
      : undefined

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }
}
