/**
 * Tests for pricing constants and helpers
 */

import { describe, expect, it } from 'vitest'
import {
  AI_MODEL_PRICING,
  DEFAULT_AI_MODELS,
  getAIModelPricing,
  getDefaultAIModel,
  listAIModels
} from './pricing'

describe('AI_MODEL_PRICING', () => {
  it('should have valid input and output token prices', () => {
    for (const [_model, pricing] of Object.entries(AI_MODEL_PRICING)) {
      expect(pricing.inputTokenPrice).toBeGreaterThan(0)
      expect(pricing.outputTokenPrice).toBeGreaterThanOrEqual(pricing.inputTokenPrice)
    }
  })

  it('should key every entry by its own model name', () => {
    for (const [model, pricing] of Object.entries(AI_MODEL_PRICING)) {
      expect(pricing.model).toBe(model)
    }
  })

  it('should have updatedAt dates', () => {
    for (const [_model, pricing] of Object.entries(AI_MODEL_PRICING)) {
      expect(pricing.updatedAt).toMatch(/^\d{4}-\d{2}-\d{2}$/)
    }
  })
})

describe('pricing helpers', () => {
  it('should return pricing for known models', () => {
    expect(getAIModelPricing('claude-haiku-4-5')?.provider).toBe('anthropic')
  })

  it('should return null for unknown models', () => {
    expect(getAIModelPricing('not-a-model')).toBeNull()
  })

  it('should have a priced default model', () => {
    const model = getDefaultAIModel('anthropic')
    expect(model).toBe(DEFAULT_AI_MODELS.anthropic)
    expect(listAIModels()).toContain(model)
  })
})
