/**
 * Usage Reports
 *
 * Pure aggregations over usage records.
 */

import { formatMicrosAsDollars, microsToCents } from './calculator'
import type {
  DailyUsage,
  MicroDollars,
  Recommendation,
  UsageRecord,
  UsageSummary,
  VendorUsage
} from './types'

/** Thresholds for optimization recommendations */
export const RECOMMENDATION_THRESHOLDS = {
  /** Below this hit rate, suggest longer retention */
  minHitRate: 0.5,
  /** Above this many calls, a vendor's invoices deserve consolidation */
  frequentVendorCalls: 10,
  /** Total spend that triggers a budget review ($100) */
  highSpendMicros: 100_000_000
} as const

/**
 * Summary with every figure zeroed.
 */
export function emptyUsageSummary(): UsageSummary {
  return {
    totalCalls: 0,
    successfulCalls: 0,
    failedCalls: 0,
    cacheHits: 0,
    cacheMisses: 0,
    hitRate: 0,
    totalCostMicros: 0,
    totalCostCents: 0,
    costSavingsMicros: 0,
    netCostMicros: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    lastUpdated: null
  }
}

/**
 * Aggregate usage records.
 *
 * Savings value each hit at the average cost of a successful call,
 * or at `fallbackCostPerCallMicros` before any call has succeeded.
 */
export function summarizeUsage(
  records: readonly UsageRecord[],
  fallbackCostPerCallMicros: MicroDollars
): UsageSummary {
  const summary = emptyUsageSummary()
  let successfulCostMicros = 0

  for (const record of records) {
    switch (record.outcome) {
      case 'hit':
        summary.cacheHits++
        break
      case 'miss_success':
        summary.successfulCalls++
        successfulCostMicros += record.costMicros
        break
      case 'miss_failure':
        summary.failedCalls++
        break
    }
    summary.totalCostMicros += record.costMicros
    summary.totalInputTokens += record.inputTokens ?? 0
    summary.totalOutputTokens += record.outputTokens ?? 0
    if (summary.lastUpdated === null || record.timestamp > summary.lastUpdated) {
      summary.lastUpdated = record.timestamp
    }
  }

  summary.totalCalls = summary.successfulCalls + summary.failedCalls
  summary.cacheMisses = summary.totalCalls
  const lookups = summary.cacheHits + summary.cacheMisses
  summary.hitRate = lookups === 0 ? 0 : summary.cacheHits / lookups
  summary.totalCostCents = microsToCents(summary.totalCostMicros)

  const perCall =
    summary.successfulCalls > 0
      ? successfulCostMicros / summary.successfulCalls
      : fallbackCostPerCallMicros
  summary.costSavingsMicros = Math.round(summary.cacheHits * perCall)
  summary.netCostMicros = Math.max(0, summary.totalCostMicros - summary.costSavingsMicros)

  return summary
}

/**
 * Calls, hits and spend per vendor, most expensive first.
 */
export function vendorBreakdown(records: readonly UsageRecord[]): VendorUsage[] {
  const byVendor = new Map<string, VendorUsage>()

  for (const record of records) {
    const vendor = record.vendor ?? 'unknown'
    let usage = byVendor.get(vendor)
    if (!usage) {
      usage = { vendor, calls: 0, cacheHits: 0, costMicros: 0 }
      byVendor.set(vendor, usage)
    }
    if (record.outcome === 'hit') {
      usage.cacheHits++
    } else {
      usage.calls++
    }
    usage.costMicros += record.costMicros
  }

  return [...byVendor.values()].sort(
    (a, b) => b.costMicros - a.costMicros || a.vendor.localeCompare(b.vendor)
  )
}

/**
 * Per-day usage (UTC) over the last `days` days ending at `nowMs`, oldest first.
 * Days without activity are omitted.
 */
export function dailyTrends(
  records: readonly UsageRecord[],
  days: number,
  nowMs: number
): DailyUsage[] {
  const cutoffMs = nowMs - days * 24 * 60 * 60 * 1000
  const byDay = new Map<string, DailyUsage>()

  for (const record of records) {
    const timeMs = Date.parse(record.timestamp)
    if (Number.isNaN(timeMs) || timeMs < cutoffMs || timeMs > nowMs) continue

    const date = record.timestamp.slice(0, 10)
    let day = byDay.get(date)
    if (!day) {
      day = { date, calls: 0, cacheHits: 0, costMicros: 0 }
      byDay.set(date, day)
    }
    if (record.outcome === 'hit') {
      day.cacheHits++
    } else {
      day.calls++
    }
    day.costMicros += record.costMicros
  }

  return [...byDay.values()].sort((a, b) => a.date.localeCompare(b.date))
}

/**
 * Suggestions for lowering spend.
 */
export function optimizationRecommendations(
  summary: UsageSummary,
  vendors: readonly VendorUsage[]
): Recommendation[] {
  const recommendations: Recommendation[] = []
  const lookups = summary.cacheHits + summary.cacheMisses

  if (lookups > 0 && summary.hitRate < RECOMMENDATION_THRESHOLDS.minHitRate) {
    recommendations.push({
      kind: 'low_hit_rate',
      message: `Cache hit rate is ${(summary.hitRate * 100).toFixed(1)}%. Consider a longer cache TTL or batching repeat invoices.`
    })
  }

  for (const vendor of vendors) {
    if (vendor.calls > RECOMMENDATION_THRESHOLDS.frequentVendorCalls) {
      recommendations.push({
        kind: 'frequent_vendor',
        message: `${vendor.vendor} was analyzed ${vendor.calls} times. Consider consolidating its invoices into one analysis.`
      })
    }
  }

  if (summary.totalCostMicros > RECOMMENDATION_THRESHOLDS.highSpendMicros) {
    recommendations.push({
      kind: 'high_spend',
      message: `Total spend is ${formatMicrosAsDollars(summary.totalCostMicros)}. Consider setting maxTotalCostUsd.`
    })
  }

  return recommendations
}

/**
 * Format a usage summary for display.
 */
export function formatUsageSummary(summary: UsageSummary): string {
  const lines = [
    `API calls: ${summary.totalCalls} (${summary.successfulCalls} succeeded, ${summary.failedCalls} failed)`,
    `Cache hits: ${summary.cacheHits}`,
    `Hit rate: ${(summary.hitRate * 100).toFixed(1)}%`,
    `Total cost: ${formatMicrosAsDollars(summary.totalCostMicros)}`,
    `Saved by cache: ${formatMicrosAsDollars(summary.costSavingsMicros)}`,
    `Tokens: ${summary.totalInputTokens.toLocaleString('en-US')} in / ${summary.totalOutputTokens.toLocaleString('en-US')} out`
  ]
  if (summary.lastUpdated) {
    lines.push(`Last activity: ${summary.lastUpdated}`)
  }
  return lines.join('\n')
}
