/**
 * Cost Control Types
 *
 * Type definitions for budget enforcement and the durable usage log.
 */

import type { Fingerprint } from '../fingerprint/types'

// =============================================================================
// PRICING TYPES
// =============================================================================

/** AI providers that can back the analyzer */
export type AIProvider = 'anthropic'

/**
 * Price per unit in micro-dollars (1/1,000,000 of a dollar).
 * Using micro-dollars allows precise fractional token pricing.
 *
 * Example: $0.00015 per token = 150 micro-dollars
 */
export type MicroDollars = number

/**
 * Pricing for a specific model.
 * All prices in micro-dollars per token.
 */
export interface ModelPricing {
  /** Model identifier */
  model: string
  provider: AIProvider
  /** Input token price (micro-dollars per token) */
  inputTokenPrice: MicroDollars
  /** Output token price (micro-dollars per token) */
  outputTokenPrice: MicroDollars
  /** Context window size (for estimation) */
  contextWindow?: number
  /** Last updated date */
  updatedAt: string
}

// =============================================================================
// USAGE LOG TYPES
// =============================================================================

/**
 * What happened for one getOrCompute resolution.
 *
 * - hit: served from the store, no external call
 * - miss_success: external call succeeded and its result was committed
 * - miss_failure: external call attempted and failed (or was cancelled)
 */
export type UsageOutcome = 'hit' | 'miss_success' | 'miss_failure'

/**
 * One line of the append-only usage log.
 */
export interface UsageRecord {
  /** ISO 8601 */
  timestamp: string
  outcome: UsageOutcome
  fingerprint: Fingerprint
  vendor?: string | undefined
  /** Actual cost of the call (0 for hits) */
  costMicros: MicroDollars
  model?: string | undefined
  inputTokens?: number | undefined
  outputTokens?: number | undefined
  /** Permit that funded this call */
  permitId?: string | undefined
  /** Failure description for miss_failure */
  error?: string | undefined
}

/** What callers pass to record(); the controller stamps the time */
export type UsageEvent = Omit<UsageRecord, 'timestamp'>

/**
 * Aggregated usage, derived from the log.
 */
export interface UsageSummary {
  /** External call attempts (successful + failed) */
  totalCalls: number
  successfulCalls: number
  failedCalls: number
  cacheHits: number
  /** Equals totalCalls: every miss resolves to one external attempt */
  cacheMisses: number
  /** hits / (hits + misses), 0 when nothing has been recorded */
  hitRate: number
  totalCostMicros: MicroDollars
  /** Total cost in cents (for display) */
  totalCostCents: number
  /** Estimated spend avoided by cache hits */
  costSavingsMicros: MicroDollars
  /** totalCostMicros minus costSavingsMicros, floored at 0 */
  netCostMicros: MicroDollars
  totalInputTokens: number
  totalOutputTokens: number
  /** Timestamp of the newest record, null when the log is empty */
  lastUpdated: string | null
}

// =============================================================================
// BUDGET TYPES
// =============================================================================

/**
 * Authorization for exactly one external call.
 */
export interface Permit {
  id: string
  fingerprint: Fingerprint
  /** ISO 8601 */
  grantedAt: string
  estimatedCostMicros: MicroDollars
}

export interface AuthorizeRequest {
  fingerprint: Fingerprint
  vendor?: string | undefined
  /** Defaults to the controller's per-call estimate */
  estimatedCostMicros?: MicroDollars | undefined
}

/**
 * Budget limits enforced by authorize().
 */
export interface CostLimits {
  /** Permits granted per window (default 30) */
  callsPerMinute?: number | undefined
  /** Sliding window length in ms (default 60 000) */
  windowMs?: number | undefined
  /** Hard ceiling on recorded + outstanding cost; unlimited when absent */
  maxTotalCostMicros?: MicroDollars | undefined
  /** Estimated cost of one call, used for permits and savings (default 0.15 USD) */
  estimatedCostPerCallMicros?: MicroDollars | undefined
}

// =============================================================================
// REPORT TYPES
// =============================================================================

export interface VendorUsage {
  vendor: string
  /** External call attempts */
  calls: number
  cacheHits: number
  costMicros: MicroDollars
}

export interface DailyUsage {
  /** YYYY-MM-DD (UTC) */
  date: string
  calls: number
  cacheHits: number
  costMicros: MicroDollars
}

export interface Recommendation {
  kind: 'low_hit_rate' | 'frequent_vendor' | 'high_spend'
  message: string
}
