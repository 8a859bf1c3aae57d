/**
 * Batch Analysis
 *
 * Resolve many invoices through one analysis cache with bounded parallelism.
 * Duplicate invoices in a batch cost one call: later ones wait on the
 * fingerprint lock and are served as hits.
 */

import type { MicroDollars } from '../costs/types'
import type { Result } from '../types'
import type { AnalysisCache } from './cache'
import type { AnalysisOutcome, ComputeFn, GetOrComputeOptions } from './types'
import { runWorkerPool } from './worker-pool'

export interface BatchProgress<T> {
  readonly index: number
  readonly completed: number
  readonly total: number
  readonly outcome: Result<AnalysisOutcome<T>>
}

export interface BatchOptions<T> extends GetOrComputeOptions {
  /** Invoices resolved at once (default 5). Paid calls stay bounded by maxConcurrentCalls. */
  readonly concurrency?: number | undefined
  readonly onProgress?: ((progress: BatchProgress<T>) => void) | undefined
}

export interface BatchResult<T> {
  /** One outcome per request, in input order */
  readonly outcomes: Array<Result<AnalysisOutcome<T>>>
  readonly cachedCount: number
  readonly computedCount: number
  readonly failedCount: number
  readonly totalCostMicros: MicroDollars
}

export async function analyzeBatch<T>(
  requests: readonly unknown[],
  cache: AnalysisCache,
  computeFn: ComputeFn<T>,
  options: BatchOptions<T> = {}
): Promise<BatchResult<T>> {
  const { concurrency, onProgress, ...perRequest } = options

  const results = await runWorkerPool(
    requests,
    async (request): Promise<Result<AnalysisOutcome<T>>> => {
      try {
        return await cache.getOrCompute(request, computeFn, perRequest)
      } catch (error) {
        // Reported on this request only; the rest of the batch still runs
        const message = error instanceof Error ? error.message : String(error)
        return { ok: false, error: { type: 'compute_failed', message } }
      }
    },
    {
      concurrency,
      signal: options.signal,
      onResult: (index, outcome, completed) =>
        onProgress?.({ index, completed, total: requests.length, outcome })
    }
  )

  const outcomes = results.map(
    (outcome): Result<AnalysisOutcome<T>> =>
      outcome ?? {
        ok: false,
        error: { type: 'compute_failed', cause: 'cancelled', message: 'Batch cancelled before this request ran' }
      }
  )

  let cachedCount = 0
  let computedCount = 0
  let failedCount = 0
  let totalCostMicros = 0
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failedCount++
    } else if (outcome.value.cached) {
      cachedCount++
    } else {
      computedCount++
      totalCostMicros += outcome.value.costMicros
    }
  }

  return { outcomes, cachedCount, computedCount, failedCount, totalCostMicros }
}
