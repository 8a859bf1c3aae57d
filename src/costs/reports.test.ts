/**
 * Tests for usage report aggregations
 */

import { describe, expect, it } from 'vitest'
import {
  dailyTrends,
  emptyUsageSummary,
  formatUsageSummary,
  optimizationRecommendations,
  summarizeUsage,
  vendorBreakdown
} from './reports'
import type { UsageRecord } from './types'

const FP = 'f'.repeat(64)

const RECORDS: UsageRecord[] = [
  {
    timestamp: '2026-03-01T09:00:00.000Z',
    outcome: 'miss_success',
    fingerprint: FP,
    vendor: 'microsoft',
    costMicros: 20_000,
    inputTokens: 1000,
    outputTokens: 500
  },
  { timestamp: '2026-03-01T10:00:00.000Z', outcome: 'hit', fingerprint: FP, vendor: 'microsoft', costMicros: 0 },
  {
    timestamp: '2026-03-02T09:00:00.000Z',
    outcome: 'miss_failure',
    fingerprint: FP,
    vendor: 'adobe',
    costMicros: 0,
    error: 'network'
  },
  { timestamp: '2026-03-02T10:00:00.000Z', outcome: 'miss_success', fingerprint: FP, vendor: 'adobe', costMicros: 40_000 },
  { timestamp: '2026-03-02T11:00:00.000Z', outcome: 'hit', fingerprint: FP, vendor: 'adobe', costMicros: 0 }
]

describe('summarizeUsage', () => {
  it('should aggregate calls, hits and cost', () => {
    const summary = summarizeUsage(RECORDS, 150_000)

    expect(summary).toEqual({
      totalCalls: 3,
      successfulCalls: 2,
      failedCalls: 1,
      cacheHits: 2,
      cacheMisses: 3,
      hitRate: 0.4,
      totalCostMicros: 60_000,
      totalCostCents: 6,
      costSavingsMicros: 60_000,
      netCostMicros: 0,
      totalInputTokens: 1000,
      totalOutputTokens: 500,
      lastUpdated: '2026-03-02T11:00:00.000Z'
    })
  })

  it('should return zeros for an empty log', () => {
    expect(summarizeUsage([], 150_000)).toEqual(emptyUsageSummary())
  })

  it('should value hits at the fallback estimate before any successful call', () => {
    const hits = RECORDS.filter((r) => r.outcome === 'hit')

    const summary = summarizeUsage(hits, 150_000)

    expect(summary.costSavingsMicros).toBe(300_000)
    expect(summary.hitRate).toBe(1)
    expect(summary.totalCalls).toBe(0)
  })
})

describe('vendorBreakdown', () => {
  it('should group by vendor, most expensive first', () => {
    expect(vendorBreakdown(RECORDS)).toEqual([
      { vendor: 'adobe', calls: 2, cacheHits: 1, costMicros: 40_000 },
      { vendor: 'microsoft', calls: 1, cacheHits: 1, costMicros: 20_000 }
    ])
  })

  it('should bucket records without a vendor as unknown', () => {
    const records: UsageRecord[] = [
      { timestamp: '2026-03-01T09:00:00.000Z', outcome: 'hit', fingerprint: FP, costMicros: 0 }
    ]
    expect(vendorBreakdown(records)).toEqual([
      { vendor: 'unknown', calls: 0, cacheHits: 1, costMicros: 0 }
    ])
  })
})

describe('dailyTrends', () => {
  const now = Date.parse('2026-03-03T00:00:00.000Z')

  it('should group by UTC day, oldest first', () => {
    expect(dailyTrends(RECORDS, 30, now)).toEqual([
      { date: '2026-03-01', calls: 1, cacheHits: 1, costMicros: 20_000 },
      { date: '2026-03-02', calls: 2, cacheHits: 1, costMicros: 40_000 }
    ])
  })

  it('should only include records inside the window', () => {
    expect(dailyTrends(RECORDS, 1, now).map((d) => d.date)).toEqual(['2026-03-02'])
  })
})

describe('optimizationRecommendations', () => {
  it('should flag a low hit rate', () => {
    const recommendations = optimizationRecommendations(
      summarizeUsage(RECORDS, 150_000),
      vendorBreakdown(RECORDS)
    )

    expect(recommendations).toEqual([
      {
        kind: 'low_hit_rate',
        message:
          'Cache hit rate is 40.0%. Consider a longer cache TTL or batching repeat invoices.'
      }
    ])
  })

  it('should flag frequent vendors and high spend', () => {
    const records: UsageRecord[] = Array.from({ length: 11 }, (_, i) => ({
      timestamp: `2026-03-01T${String(i).padStart(2, '0')}:00:00.000Z`,
      outcome: 'miss_success' as const,
      fingerprint: FP,
      vendor: 'acme',
      costMicros: 10_000_000
    }))

    const recommendations = optimizationRecommendations(
      summarizeUsage(records, 150_000),
      vendorBreakdown(records)
    )

    expect(recommendations.map((r) => r.kind)).toEqual([
      'low_hit_rate',
      'frequent_vendor',
      'high_spend'
    ])
    expect(recommendations[1]?.message).toBe(
      'acme was analyzed 11 times. Consider consolidating its invoices into one analysis.'
    )
    expect(recommendations[2]?.message).toBe(
      'Total spend is $110.00. Consider setting maxTotalCostUsd.'
    )
  })

  it('should return nothing for an empty log', () => {
    expect(optimizationRecommendations(emptyUsageSummary(), [])).toEqual([])
  })
})

describe('formatUsageSummary', () => {
  it('should render every figure', () => {
    expect(formatUsageSummary(summarizeUsage(RECORDS, 150_000))).toBe(
      [
        'API calls: 3 (2 succeeded, 1 failed)',
        'Cache hits: 2',
        'Hit rate: 40.0%',
        'Total cost: $0.06',
        'Saved by cache: $0.06',
        'Tokens: 1,000 in / 500 out',
        'Last activity: 2026-03-02T11:00:00.000Z'
      ].join('\n')
    )
  })
})
