/**
 * Analysis Cache Types
 */

import type { CostLimits, MicroDollars } from '../costs/types'
import type { Fingerprint } from '../fingerprint/types'
import type { Logger } from '../logger'
import type { InvoiceAnalysisRequest, Result } from '../types'

/**
 * Passed to every compute invocation.
 */
export interface ComputeContext {
  /** Aborts on caller cancellation or timeout. Work after abort is discarded. */
  readonly signal: AbortSignal
  /** 1-based attempt number within one getOrCompute call */
  readonly attempt: number
}

/**
 * What a successful external call produced and what it cost.
 */
export interface ComputeResult<T> {
  /** undefined cannot be stored and is treated as a failed call */
  readonly value: T
  readonly costMicros: MicroDollars
  readonly model?: string | undefined
  readonly inputTokens?: number | undefined
  readonly outputTokens?: number | undefined
}

/**
 * The paid external call. Must not be invoked for a fingerprint that is
 * already committed. Thrown errors are treated as non-transient failures.
 * A failure that was still billed reports its cost in `error.costMicros`.
 */
export type ComputeFn<T> = (
  request: InvoiceAnalysisRequest,
  context: ComputeContext
) => Promise<Result<ComputeResult<T>>>

/**
 * Resolution of one getOrCompute call.
 */
export interface AnalysisOutcome<T> {
  readonly fingerprint: Fingerprint
  readonly result: T
  /** true when served from the store without an external call */
  readonly cached: boolean
  /** Cost of the call that produced the result (0 for hits) */
  readonly costMicros: MicroDollars
  /** External call attempts made by this resolution (0 for hits) */
  readonly attempts: number
  /** When the result was committed (ISO 8601); absent if the commit failed */
  readonly committedAt?: string | undefined
}

export interface GetOrComputeOptions {
  readonly signal?: AbortSignal | undefined
  /** Per-attempt deadline; overrides the cache default */
  readonly timeoutMs?: number | undefined
  /** Extra attempts after a transient failure; overrides the cache default */
  readonly retries?: number | undefined
  /** Cost reserved by the permit for this call */
  readonly estimatedCostMicros?: MicroDollars | undefined
}

export interface AnalysisCacheOptions extends CostLimits {
  /** Root directory for entries, locks and the usage log */
  readonly cacheDir: string
  /** Entry lifetime in seconds */
  readonly ttlSeconds?: number | undefined
  readonly maxEntries?: number | undefined
  readonly maxBytes?: number | undefined
  /** In-process bound on simultaneous external calls (default 1) */
  readonly maxConcurrentCalls?: number | undefined
  /** Extra attempts after a transient failure (default 1) */
  readonly retries?: number | undefined
  /** Base delay between attempts; a provider retryAfter wins (default 1000) */
  readonly retryDelayMs?: number | undefined
  /** Per-attempt deadline (default 60 000) */
  readonly timeoutMs?: number | undefined
  /** Poll interval while another process holds a lock (default 50) */
  readonly lockPollMs?: number | undefined
  readonly logger?: Logger | undefined
  /** Clock override for tests (ms since epoch) */
  readonly now?: (() => number) | undefined
}

export const DEFAULT_ANALYSIS_OPTIONS = {
  maxConcurrentCalls: 1,
  retries: 1,
  retryDelayMs: 1000,
  timeoutMs: 60_000
} as const
