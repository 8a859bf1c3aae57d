/**
 * Analysis Cache
 *
 * Get-or-compute in front of a paid analysis call:
 *
 * 1. Fingerprint the request (malformed requests fail fast, nothing recorded)
 * 2. Committed result? Record a hit and return it
 * 3. Otherwise take the fingerprint's lock and look again
 * 4. Authorize, call, commit, record
 *
 * A second caller for the same fingerprint waits on the lock and is then
 * served from the store. Failed, timed-out and cancelled calls never commit.
 */

import { join } from 'node:path'
import { FilesystemStore } from '../cache/filesystem'
import { KeyedLock } from '../cache/lock'
import type { CacheEntry } from '../cache/types'
import { CostController } from '../costs/controller'
import type { Permit, UsageEvent, UsageSummary } from '../costs/types'
import {
  canonicalizeRequest,
  fingerprintRequest,
  MalformedRequestError,
  parseInvoiceRequest
} from '../fingerprint'
import type { Fingerprint } from '../fingerprint/types'
import { createSilentLogger, type Logger } from '../logger'
import { createDeadline, raceAbort, sleep, TimeoutError } from '../shared/abort'
import { type ApiError, type InvoiceAnalysisRequest, isTransientError, type Result } from '../types'
import { Semaphore } from './semaphore'
import {
  type AnalysisCacheOptions,
  type AnalysisOutcome,
  type ComputeFn,
  type ComputeResult,
  DEFAULT_ANALYSIS_OPTIONS,
  type GetOrComputeOptions
} from './types'

interface MissContext<T> {
  readonly request: InvoiceAnalysisRequest
  readonly fingerprint: Fingerprint
  readonly vendor: string
  readonly computeFn: ComputeFn<T>
  readonly options: GetOrComputeOptions
}

interface Attempt<T> {
  /** false when the attempt ended before computeFn started (aborted while queued) */
  readonly invoked: boolean
  readonly result: Result<ComputeResult<T>>
}

function cancelledError(message = 'Analysis cancelled'): Result<never> {
  return { ok: false, error: { type: 'compute_failed', cause: 'cancelled', message } }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class AnalysisCache {
  readonly store: FilesystemStore
  readonly costs: CostController
  private readonly locks: KeyedLock
  private readonly semaphore: Semaphore
  private readonly logger: Logger
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly timeoutMs: number
  private active = 0
  private closed = false
  private readonly idleWaiters: Array<() => void> = []

  constructor(options: AnalysisCacheOptions) {
    this.logger = options.logger ?? createSilentLogger()
    this.locks = new KeyedLock(join(options.cacheDir, 'locks'), { pollMs: options.lockPollMs })
    this.store = new FilesystemStore(options.cacheDir, {
      ttlSeconds: options.ttlSeconds,
      maxEntries: options.maxEntries,
      maxBytes: options.maxBytes,
      now: options.now,
      logger: this.logger,
      locks: this.locks
    })
    this.costs = new CostController(options.cacheDir, {
      callsPerMinute: options.callsPerMinute,
      windowMs: options.windowMs,
      maxTotalCostMicros: options.maxTotalCostMicros,
      estimatedCostPerCallMicros: options.estimatedCostPerCallMicros,
      now: options.now,
      logger: this.logger,
      locks: this.locks
    })
    this.semaphore = new Semaphore(
      options.maxConcurrentCalls ?? DEFAULT_ANALYSIS_OPTIONS.maxConcurrentCalls
    )
    this.retries = options.retries ?? DEFAULT_ANALYSIS_OPTIONS.retries
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_ANALYSIS_OPTIONS.retryDelayMs
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ANALYSIS_OPTIONS.timeoutMs
  }

  /**
   * Return the committed result for request, computing and committing it
   * on a miss. computeFn runs at most once per successful fingerprint.
   */
  async getOrCompute<T>(
    request: unknown,
    computeFn: ComputeFn<T>,
    options: GetOrComputeOptions = {}
  ): Promise<Result<AnalysisOutcome<T>>> {
    if (this.closed) {
      return cancelledError('Analysis cache is closed')
    }

    this.active++
    try {
      return await this.resolve(request, computeFn, options)
    } finally {
      this.active--
      if (this.active === 0) {
        for (const wake of this.idleWaiters.splice(0)) wake()
      }
    }
  }

  /**
   * Committed result for request without computing or recording anything.
   *
   * @throws MalformedRequestError when the request fails validation
   */
  async peek<T>(request: unknown): Promise<CacheEntry<T> | null> {
    return this.store.lookup<T>(fingerprintRequest(request))
  }

  async getCostSummary(): Promise<UsageSummary> {
    return this.costs.getCostSummary()
  }

  /**
   * Refuse new work and wait for in-flight calls to settle.
   */
  async close(): Promise<void> {
    this.closed = true
    if (this.active === 0) return
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  private async resolve<T>(
    input: unknown,
    computeFn: ComputeFn<T>,
    options: GetOrComputeOptions
  ): Promise<Result<AnalysisOutcome<T>>> {
    let request: InvoiceAnalysisRequest
    let fingerprint: Fingerprint
    try {
      request = parseInvoiceRequest(input)
      fingerprint = fingerprintRequest(request)
    } catch (error) {
      if (error instanceof MalformedRequestError) {
        return { ok: false, error: { type: 'malformed_request', message: error.message } }
      }
      throw error
    }

    const vendor = canonicalizeRequest(request).vendor
    const cached = await this.store.lookup<T>(fingerprint)
    if (cached) {
      return this.serveHit(cached, vendor)
    }

    try {
      return await this.locks.withLock(
        fingerprint,
        () => this.missPath({ request, fingerprint, vendor, computeFn, options }),
        options.signal
      )
    } catch (error) {
      if (options.signal?.aborted) {
        return cancelledError()
      }
      throw error
    }
  }

  private async serveHit<T>(
    entry: CacheEntry<T>,
    vendor: string
  ): Promise<Result<AnalysisOutcome<T>>> {
    await this.recordUsage({ outcome: 'hit', fingerprint: entry.fingerprint, vendor, costMicros: 0 })
    this.logger.verbose(`Cache hit ${entry.fingerprint.slice(0, 16)}...`)
    return {
      ok: true,
      value: {
        fingerprint: entry.fingerprint,
        result: entry.result,
        cached: true,
        costMicros: 0,
        attempts: 0,
        committedAt: entry.createdAt
      }
    }
  }

  /**
   * Runs while holding the fingerprint's lock.
   */
  private async missPath<T>(ctx: MissContext<T>): Promise<Result<AnalysisOutcome<T>>> {
    // A caller we waited on may have committed
    const committed = await this.store.lookup<T>(ctx.fingerprint)
    if (committed) {
      return this.serveHit(committed, ctx.vendor)
    }

    const maxAttempts = 1 + (ctx.options.retries ?? this.retries)
    let lastError: ApiError | undefined

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (ctx.options.signal?.aborted) {
        return cancelledError()
      }

      const permit = await this.authorize(ctx)
      if (!permit.ok) {
        return permit
      }

      const { invoked, result } = await this.callOnce(ctx, attempt)
      if (result.ok && result.value.value !== undefined) {
        return this.commitSuccess(ctx, permit.value, result.value, attempt)
      }

      // An undefined value cannot be committed
      lastError = result.ok
        ? {
            type: 'invalid_response',
            message: 'Analysis produced no result',
            costMicros: result.value.costMicros
          }
        : result.error

      if (invoked) {
        await this.recordUsage({
          outcome: 'miss_failure',
          fingerprint: ctx.fingerprint,
          vendor: ctx.vendor,
          costMicros: lastError.costMicros ?? 0,
          permitId: permit.value.id,
          error: `${lastError.type}: ${lastError.message}`
        })
      } else {
        await this.releasePermit(permit.value)
      }
      this.logger.verbose(
        `Attempt ${attempt}/${maxAttempts} for ${ctx.fingerprint.slice(0, 16)}... failed: ${lastError.message}`
      )

      if (!isTransientError(lastError) || attempt === maxAttempts) break

      const delayMs =
        lastError.retryAfter !== undefined ? lastError.retryAfter * 1000 : this.retryDelayMs * attempt
      try {
        await sleep(delayMs, ctx.options.signal)
      } catch {
        return cancelledError()
      }
    }

    return {
      ok: false,
      error: {
        type: 'compute_failed',
        message: lastError?.message ?? 'Analysis failed',
        cause: lastError?.type,
        retryAfter: lastError?.retryAfter
      }
    }
  }

  /**
   * One external call under the concurrency bound, the caller's signal and the deadline.
   */
  private async callOnce<T>(ctx: MissContext<T>, attempt: number): Promise<Attempt<T>> {
    const deadline = createDeadline(ctx.options.signal, ctx.options.timeoutMs ?? this.timeoutMs)
    let invoked = false
    try {
      const result = await this.semaphore.run(() => {
        invoked = true
        return raceAbort(ctx.computeFn(ctx.request, { signal: deadline.signal, attempt }), deadline.signal)
      }, deadline.signal)
      return { invoked, result }
    } catch (error) {
      if (deadline.signal.aborted) {
        const reason: unknown = deadline.signal.reason
        const result: Result<never> =
          reason instanceof TimeoutError
            ? { ok: false, error: { type: 'timeout', message: reason.message } }
            : { ok: false, error: { type: 'cancelled', message: 'Analysis cancelled' } }
        return { invoked, result }
      }
      return { invoked, result: { ok: false, error: { type: 'compute_failed', message: describeError(error) } } }
    } finally {
      deadline.dispose()
    }
  }

  /**
   * A budget that cannot be read refuses the call rather than risk overspending.
   */
  private async authorize<T>(ctx: MissContext<T>): Promise<Result<Permit>> {
    try {
      return await this.costs.authorize({
        fingerprint: ctx.fingerprint,
        vendor: ctx.vendor,
        estimatedCostMicros: ctx.options.estimatedCostMicros
      })
    } catch (error) {
      this.logger.error(`Budget check failed for ${ctx.fingerprint.slice(0, 16)}...: ${describeError(error)}`)
      return { ok: false, error: { type: 'budget_exceeded', message: `Budget check failed: ${describeError(error)}` } }
    }
  }

  /**
   * Usage accounting never fails a resolution: a result already served or
   * paid for is still returned when the log cannot be written.
   */
  private async recordUsage(event: UsageEvent): Promise<void> {
    try {
      await this.costs.record(event)
    } catch (error) {
      this.logger.error(
        `Failed to record ${event.outcome} for ${event.fingerprint.slice(0, 16)}...: ${describeError(error)}`
      )
    }
  }

  private async releasePermit(permit: Permit): Promise<void> {
    try {
      await this.costs.release(permit.id)
    } catch (error) {
      this.logger.error(`Failed to release permit ${permit.id}: ${describeError(error)}`)
    }
  }

  private async commitSuccess<T>(
    ctx: MissContext<T>,
    permit: Permit,
    computed: ComputeResult<T>,
    attempts: number
  ): Promise<Result<AnalysisOutcome<T>>> {
    let committedAt: string | undefined
    try {
      const entry = await this.store.commit(ctx.fingerprint, computed.value, {
        vendor: ctx.vendor,
        costMicros: computed.costMicros,
        model: computed.model
      })
      committedAt = entry.createdAt
    } catch (error) {
      // The call was paid for either way; it is still recorded below
      this.logger.error(`Failed to commit ${ctx.fingerprint.slice(0, 16)}...: ${describeError(error)}`)
    }

    await this.recordUsage({
      outcome: 'miss_success',
      fingerprint: ctx.fingerprint,
      vendor: ctx.vendor,
      costMicros: computed.costMicros,
      model: computed.model,
      inputTokens: computed.inputTokens,
      outputTokens: computed.outputTokens,
      permitId: permit.id
    })

    return {
      ok: true,
      value: {
        fingerprint: ctx.fingerprint,
        result: computed.value,
        cached: false,
        costMicros: computed.costMicros,
        attempts,
        committedAt
      }
    }
  }
}

/**
 * Create an analysis cache over cacheDir.
 */
export function createAnalysisCache(options: AnalysisCacheOptions): AnalysisCache {
  return new AnalysisCache(options)
}
