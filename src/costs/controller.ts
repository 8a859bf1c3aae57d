/**
 * Cost Controller
 *
 * Gates every external call behind a permit and records what each call cost.
 *
 * Layout under the cache directory:
 * ```
 * usage/
 * ├── usage.jsonl     (append-only usage log)
 * └── permits.json    (recent grants and outstanding permits)
 * locks/
 * └── budget.lock     (held while checking and granting)
 * ```
 *
 * authorize() reads the ledger, checks the limits and persists the grant
 * while holding the budget lock, so concurrent callers in any process can
 * never both pass the same boundary.
 */

import { randomUUID } from 'node:crypto'
import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { isErrnoCode, writeFileAtomic } from '../cache/atomic'
import { KeyedLock } from '../cache/lock'
import { createSilentLogger, type Logger } from '../logger'
import type { Result } from '../types'
import { ESTIMATION_DEFAULTS } from './estimator'
import {
  dailyTrends,
  emptyUsageSummary,
  optimizationRecommendations,
  summarizeUsage,
  vendorBreakdown
} from './reports'
import type {
  AuthorizeRequest,
  CostLimits,
  DailyUsage,
  MicroDollars,
  Permit,
  Recommendation,
  UsageEvent,
  UsageRecord,
  UsageSummary,
  VendorUsage
} from './types'
import { UsageLog } from './usage-log'

const BUDGET_LOCK_KEY = 'budget'

export const DEFAULT_COST_LIMITS = {
  callsPerMinute: 30,
  windowMs: 60_000,
  estimatedCostPerCallMicros: ESTIMATION_DEFAULTS.fallbackCostPerCallMicros
} as const

const permitSchema = z.object({
  id: z.string(),
  fingerprint: z.string(),
  grantedAt: z.string(),
  estimatedCostMicros: z.number()
})

const ledgerSchema = z.object({
  recentGrants: z.array(z.string()),
  outstanding: z.array(permitSchema)
})

type PermitLedger = z.infer<typeof ledgerSchema>

export interface CostControllerOptions extends CostLimits {
  logger?: Logger | undefined
  /** Share one lock set with the store */
  locks?: KeyedLock | undefined
  /** Outstanding permits older than this are assumed abandoned (default 15 minutes) */
  permitTtlMs?: number | undefined
  /** Clock override for tests (ms since epoch) */
  now?: (() => number) | undefined
}

export class CostController {
  readonly usageLog: UsageLog
  private readonly permitsPath: string
  private readonly locks: KeyedLock
  private readonly logger: Logger
  private readonly now: () => number
  private readonly callsPerMinute: number
  private readonly windowMs: number
  private readonly maxTotalCostMicros: MicroDollars | undefined
  private readonly permitTtlMs: number
  readonly estimatedCostPerCallMicros: MicroDollars

  constructor(dir: string, options: CostControllerOptions = {}) {
    this.logger = options.logger ?? createSilentLogger()
    this.usageLog = new UsageLog(join(dir, 'usage', 'usage.jsonl'), this.logger)
    this.permitsPath = join(dir, 'usage', 'permits.json')
    this.locks = options.locks ?? new KeyedLock(join(dir, 'locks'))
    this.now = options.now ?? Date.now
    this.callsPerMinute = options.callsPerMinute ?? DEFAULT_COST_LIMITS.callsPerMinute
    this.windowMs = options.windowMs ?? DEFAULT_COST_LIMITS.windowMs
    this.maxTotalCostMicros = options.maxTotalCostMicros
    this.permitTtlMs = options.permitTtlMs ?? 15 * 60 * 1000
    this.estimatedCostPerCallMicros =
      options.estimatedCostPerCallMicros ?? DEFAULT_COST_LIMITS.estimatedCostPerCallMicros
  }

  /**
   * Grant a permit for one external call, or refuse with budget_exceeded.
   */
  async authorize(request: AuthorizeRequest): Promise<Result<Permit>> {
    const estimate = request.estimatedCostMicros ?? this.estimatedCostPerCallMicros

    return this.locks.withLock(BUDGET_LOCK_KEY, async () => {
      const nowMs = this.now()
      const ledger = await this.readLedger()

      ledger.recentGrants = ledger.recentGrants.filter(
        (grantedAt) => nowMs - Date.parse(grantedAt) < this.windowMs
      )
      ledger.outstanding = ledger.outstanding.filter(
        (permit) => nowMs - Date.parse(permit.grantedAt) < this.permitTtlMs
      )

      if (ledger.recentGrants.length >= this.callsPerMinute) {
        const oldest = Math.min(...ledger.recentGrants.map((t) => Date.parse(t)))
        const retryAfter = Math.max(1, Math.ceil((oldest + this.windowMs - nowMs) / 1000))
        this.logger.verbose(`Rate limit reached (${this.callsPerMinute} calls per window)`)
        return {
          ok: false,
          error: {
            type: 'budget_exceeded',
            message: `Rate limit of ${this.callsPerMinute} calls per ${this.windowMs / 1000}s reached`,
            retryAfter
          }
        }
      }

      if (this.maxTotalCostMicros !== undefined) {
        const spent = sumCost(await this.usageLog.read())
        const reserved = ledger.outstanding.reduce((sum, p) => sum + p.estimatedCostMicros, 0)
        if (spent + reserved + estimate > this.maxTotalCostMicros) {
          this.logger.warn(
            `Cost ceiling reached: spent ${spent}, reserved ${reserved}, limit ${this.maxTotalCostMicros} micro-dollars`
          )
          return {
            ok: false,
            error: {
              type: 'budget_exceeded',
              message: `Cost ceiling of ${this.maxTotalCostMicros} micro-dollars would be exceeded`
            }
          }
        }
      }

      const permit: Permit = {
        id: randomUUID(),
        fingerprint: request.fingerprint,
        grantedAt: new Date(nowMs).toISOString(),
        estimatedCostMicros: estimate
      }
      ledger.recentGrants.push(permit.grantedAt)
      ledger.outstanding.push(permit)
      await this.writeLedger(ledger)

      return { ok: true, value: permit }
    })
  }

  /**
   * Append one usage record, then release the permit that funded it.
   */
  async record(event: UsageEvent): Promise<UsageRecord> {
    const record: UsageRecord = { timestamp: new Date(this.now()).toISOString(), ...event }
    await this.usageLog.append(record)

    if (event.permitId !== undefined) {
      await this.release(event.permitId)
    }

    return record
  }

  /**
   * Return a permit whose call never started. Nothing is recorded; the grant
   * still counts toward the rate window.
   */
  async release(permitId: string): Promise<void> {
    await this.locks.withLock(BUDGET_LOCK_KEY, async () => {
      const ledger = await this.readLedger()
      const remaining = ledger.outstanding.filter((p) => p.id !== permitId)
      if (remaining.length !== ledger.outstanding.length) {
        await this.writeLedger({ ...ledger, outstanding: remaining })
      }
    })
  }

  /**
   * Usage summary from the durable log. Never throws: a log that cannot be
   * read yields zeros.
   */
  async getCostSummary(): Promise<UsageSummary> {
    const records = await this.readRecordsOrEmpty()
    if (!records) return emptyUsageSummary()
    return summarizeUsage(records, this.estimatedCostPerCallMicros)
  }

  async getVendorBreakdown(): Promise<VendorUsage[]> {
    return vendorBreakdown((await this.readRecordsOrEmpty()) ?? [])
  }

  async getCostTrends(days = 30): Promise<DailyUsage[]> {
    return dailyTrends((await this.readRecordsOrEmpty()) ?? [], days, this.now())
  }

  async getOptimizationRecommendations(): Promise<Recommendation[]> {
    const records = (await this.readRecordsOrEmpty()) ?? []
    return optimizationRecommendations(
      summarizeUsage(records, this.estimatedCostPerCallMicros),
      vendorBreakdown(records)
    )
  }

  /**
   * Permits granted but not yet settled by record().
   */
  async outstandingPermits(): Promise<Permit[]> {
    return (await this.readLedger()).outstanding
  }

  private async readRecordsOrEmpty(): Promise<UsageRecord[] | null> {
    try {
      return await this.usageLog.read()
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.error(`Failed to read usage log: ${message}`)
      return null
    }
  }

  private async readLedger(): Promise<PermitLedger> {
    let raw: string
    try {
      raw = await readFile(this.permitsPath, 'utf-8')
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return { recentGrants: [], outstanding: [] }
      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      json = null
    }
    const parsed = ledgerSchema.safeParse(json)
    if (!parsed.success) {
      // Written atomically, so this only happens after outside tampering
      this.logger.warn('Permit ledger unreadable, starting a fresh one')
      return { recentGrants: [], outstanding: [] }
    }
    return parsed.data
  }

  private async writeLedger(ledger: PermitLedger): Promise<void> {
    await writeFileAtomic(this.permitsPath, JSON.stringify(ledger, null, 2))
  }
}

function sumCost(records: readonly UsageRecord[]): MicroDollars {
  return records.reduce((sum, record) => sum + record.costMicros, 0)
}
