/**
 * Pricing Constants
 *
 * Pricing data for the models the licensing analyzer can call.
 * Prices are in micro-dollars (1/1,000,000 of a dollar) per token.
 *
 * To convert: $0.001 per 1K tokens = 1 micro-dollar per token
 *
 * IMPORTANT: Keep these updated as provider pricing changes.
 *
 * Source: https://www.anthropic.com/pricing
 */

import type { AIProvider, ModelPricing } from './types'

// =============================================================================
// AI MODEL PRICING (per token in micro-dollars)
// =============================================================================

export const AI_MODEL_PRICING: Record<string, ModelPricing> = {
  'claude-haiku-4-5': {
    model: 'claude-haiku-4-5',
    provider: 'anthropic',
    inputTokenPrice: 1.0, // $1.00 per 1M tokens
    outputTokenPrice: 5.0, // $5.00 per 1M tokens
    contextWindow: 200_000,
    updatedAt: '2026-01-01'
  },
  'claude-sonnet-4-5': {
    model: 'claude-sonnet-4-5',
    provider: 'anthropic',
    inputTokenPrice: 3.0, // $3.00 per 1M tokens
    outputTokenPrice: 15.0, // $15.00 per 1M tokens
    contextWindow: 200_000,
    updatedAt: '2026-01-01'
  },
  'claude-opus-4-1': {
    model: 'claude-opus-4-1',
    provider: 'anthropic',
    inputTokenPrice: 15.0, // $15.00 per 1M tokens
    outputTokenPrice: 75.0, // $75.00 per 1M tokens
    contextWindow: 200_000,
    updatedAt: '2026-01-01'
  }
}

// =============================================================================
// DEFAULT MODELS
// =============================================================================

export const DEFAULT_AI_MODELS: Record<AIProvider, string> = {
  anthropic: 'claude-sonnet-4-5'
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get pricing for an AI model.
 */
export function getAIModelPricing(model: string): ModelPricing | null {
  return AI_MODEL_PRICING[model] ?? null
}

/**
 * Get the default model for a provider.
 */
export function getDefaultAIModel(provider: AIProvider): string {
  return DEFAULT_AI_MODELS[provider]
}

/**
 * List all priced AI models.
 */
export function listAIModels(): string[] {
  return Object.keys(AI_MODEL_PRICING)
}
