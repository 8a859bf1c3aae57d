/**
 * Analysis Module
 *
 * The single entry point for cached, budgeted invoice analysis.
 *
 * @example
 * ```typescript
 * import { createAnalysisCache } from 'spend-sentinel/analysis'
 *
 * const cache = createAnalysisCache({ cacheDir, callsPerMinute: 30 })
 * const outcome = await cache.getOrCompute(invoice, analyzer)
 * if (outcome.ok) console.log(outcome.value.cached ? 'hit' : 'computed')
 * await cache.close()
 * ```
 *
 * @module
 */

export {
  analyzeBatch,
  type BatchOptions,
  type BatchProgress,
  type BatchResult
} from './batch'
export { AnalysisCache, createAnalysisCache } from './cache'
export { Semaphore } from './semaphore'
export {
  type AnalysisCacheOptions,
  type AnalysisOutcome,
  type ComputeContext,
  type ComputeFn,
  type ComputeResult,
  DEFAULT_ANALYSIS_OPTIONS,
  type GetOrComputeOptions
} from './types'
