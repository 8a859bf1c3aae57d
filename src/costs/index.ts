/**
 * Cost Control Module
 *
 * Budget enforcement and durable usage accounting for paid analysis calls.
 *
 * @example
 * ```typescript
 * import { CostController, formatUsageSummary } from 'spend-sentinel/costs'
 *
 * const costs = new CostController(cacheDir, { callsPerMinute: 30 })
 *
 * const permit = await costs.authorize({ fingerprint })
 * if (permit.ok) {
 *   // ... make the call ...
 *   await costs.record({ outcome: 'miss_success', fingerprint, costMicros: 12_000, permitId: permit.value.id })
 * }
 *
 * console.log(formatUsageSummary(await costs.getCostSummary()))
 * ```
 *
 * @module
 */

// =============================================================================
// TYPE EXPORTS
// =============================================================================

export type {
  AIProvider,
  AuthorizeRequest,
  CostLimits,
  DailyUsage,
  MicroDollars,
  ModelPricing,
  Permit,
  Recommendation,
  UsageEvent,
  UsageOutcome,
  UsageRecord,
  UsageSummary,
  VendorUsage
} from './types'

// =============================================================================
// PRICING EXPORTS
// =============================================================================

export {
  AI_MODEL_PRICING,
  DEFAULT_AI_MODELS,
  getAIModelPricing,
  getDefaultAIModel,
  listAIModels
} from './pricing'

// =============================================================================
// CALCULATOR EXPORTS
// =============================================================================

export {
  calculateAICompletionCost,
  calculateAIInputCost,
  calculateAIOutputCost,
  centsToMicros,
  dollarsToMicros,
  formatMicrosAsDollars,
  microsToCents,
  microsToDollars
} from './calculator'

// =============================================================================
// ESTIMATOR EXPORTS
// =============================================================================

export { ESTIMATION_DEFAULTS, estimateAnalysisCost, estimateTokenCount } from './estimator'

// =============================================================================
// CONTROLLER & REPORT EXPORTS
// =============================================================================

export { CostController, type CostControllerOptions, DEFAULT_COST_LIMITS } from './controller'
export {
  dailyTrends,
  emptyUsageSummary,
  formatUsageSummary,
  optimizationRecommendations,
  RECOMMENDATION_THRESHOLDS,
  summarizeUsage,
  vendorBreakdown
} from './reports'
export { UsageLog } from './usage-log'
