/**
 * Cost Estimator
 *
 * Estimates the cost of an analysis call before it is made.
 * Used to size budget permits.
 */

import { calculateAIInputCost, calculateAIOutputCost } from './calculator'
import { getAIModelPricing } from './pricing'
import type { MicroDollars } from './types'

// =============================================================================
// ESTIMATION CONSTANTS
// =============================================================================

export const ESTIMATION_DEFAULTS = {
  /** Tokens per whitespace-separated word */
  tokensPerWord: 1.3,
  /** Typical size of a licensing analysis response */
  outputTokensPerCall: 1500,
  /** Per-call estimate for models without pricing ($0.15) */
  fallbackCostPerCallMicros: 150_000
} as const

// =============================================================================
// TOKEN ESTIMATION
// =============================================================================

/**
 * Estimate token count for a text string from its word count.
 */
export function estimateTokenCount(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0).length
  return Math.ceil(words * ESTIMATION_DEFAULTS.tokensPerWord)
}

// =============================================================================
// CALL ESTIMATION
// =============================================================================

/**
 * Estimate the cost of sending `prompt` to `model`.
 * Unpriced models fall back to a flat per-call estimate.
 */
export function estimateAnalysisCost(
  prompt: string,
  model: string,
  outputTokens: number = ESTIMATION_DEFAULTS.outputTokensPerCall
): MicroDollars {
  if (!getAIModelPricing(model)) {
    return ESTIMATION_DEFAULTS.fallbackCostPerCallMicros
  }
  const inputTokens = estimateTokenCount(prompt)
  return Math.ceil(
    calculateAIInputCost(model, inputTokens) + calculateAIOutputCost(model, outputTokens)
  )
}
