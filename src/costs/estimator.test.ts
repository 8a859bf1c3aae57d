/**
 * Tests for cost estimator functions
 */

import { describe, expect, it } from 'vitest'
import { ESTIMATION_DEFAULTS, estimateAnalysisCost, estimateTokenCount } from './estimator'

describe('estimateTokenCount', () => {
  it('should estimate tokens from word count', () => {
    // 10 words * 1.3 = 13
    expect(estimateTokenCount('one two three four five six seven eight nine ten')).toBe(13)
    // 3 words * 1.3 = 3.9, ceil = 4
    expect(estimateTokenCount('  Office 365\n\tE3 ')).toBe(4)
  })

  it('should handle empty strings', () => {
    expect(estimateTokenCount('')).toBe(0)
    expect(estimateTokenCount('   ')).toBe(0)
  })
})

describe('estimateAnalysisCost', () => {
  it('should price input and output tokens for known models', () => {
    // 10 words -> 13 tokens * 3 + 100 output tokens * 15
    const cost = estimateAnalysisCost(
      'one two three four five six seven eight nine ten',
      'claude-sonnet-4-5',
      100
    )
    expect(cost).toBe(39 + 1500)
  })

  it('should use the default output size', () => {
    // 0 input tokens, 1500 output tokens * 5
    expect(estimateAnalysisCost('', 'claude-haiku-4-5')).toBe(7500)
  })

  it('should fall back to a flat estimate for unpriced models', () => {
    expect(estimateAnalysisCost('anything', 'mystery-model')).toBe(
      ESTIMATION_DEFAULTS.fallbackCostPerCallMicros
    )
  })
})
