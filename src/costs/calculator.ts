/**
 * Cost Calculator
 *
 * Functions for calculating costs of API operations.
 * All costs are calculated in micro-dollars for precision.
 */

import { getAIModelPricing } from './pricing'
import type { MicroDollars } from './types'

// =============================================================================
// CONVERSION UTILITIES
// =============================================================================

/**
 * Convert micro-dollars to cents.
 * 1 cent = 10,000 micro-dollars
 */
export function microsToCents(micros: MicroDollars): number {
  return Math.ceil(micros / 10_000)
}

/**
 * Convert cents to micro-dollars.
 */
export function centsToMicros(cents: number): MicroDollars {
  return cents * 10_000
}

/**
 * Convert micro-dollars to dollars.
 */
export function microsToDollars(micros: MicroDollars): number {
  return micros / 1_000_000
}

/**
 * Convert dollars to micro-dollars, rounded to a whole micro-dollar.
 */
export function dollarsToMicros(dollars: number): MicroDollars {
  return Math.round(dollars * 1_000_000)
}

/**
 * Format micro-dollars as a dollar string.
 */
export function formatMicrosAsDollars(micros: MicroDollars): string {
  const dollars = microsToDollars(micros)
  if (dollars > 0 && dollars < 0.01) {
    return `$${dollars.toFixed(4)}`
  }
  return `$${dollars.toFixed(2)}`
}

// =============================================================================
// AI COST CALCULATIONS
// =============================================================================

/**
 * Calculate cost for AI model input tokens.
 */
export function calculateAIInputCost(model: string, tokenCount: number): MicroDollars {
  const pricing = getAIModelPricing(model)
  if (!pricing) {
    throw new Error(`Unknown AI model or no input pricing: ${model}`)
  }
  return pricing.inputTokenPrice * tokenCount
}

/**
 * Calculate cost for AI model output tokens.
 */
export function calculateAIOutputCost(model: string, tokenCount: number): MicroDollars {
  const pricing = getAIModelPricing(model)
  if (!pricing) {
    throw new Error(`Unknown AI model or no output pricing: ${model}`)
  }
  return pricing.outputTokenPrice * tokenCount
}

/**
 * Calculate total cost for an AI completion.
 */
export function calculateAICompletionCost(
  model: string,
  inputTokens: number,
  outputTokens: number
): MicroDollars {
  return calculateAIInputCost(model, inputTokens) + calculateAIOutputCost(model, outputTokens)
}
