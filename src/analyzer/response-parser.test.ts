import { describe, expect, it } from 'vitest'
import { extractJsonFromResponse, parseLicensingResponse } from './response-parser'

const minimal = {
  summary: {
    total_cost: 320,
    cost_variance_percentage: -5,
    overall_assessment: 'Below Standard',
    key_findings: ['Seats are fully used'],
    cost_optimization_opportunities: []
  },
  category_analysis: {}
}

describe('extractJsonFromResponse', () => {
  it('prefers a fenced json block', () => {
    const text = 'Here you go:\n```json\n{"a": 1}\n```\nThanks {"b": 2}'
    expect(extractJsonFromResponse(text)).toBe('{"a": 1}')
  })

  it('falls back to the outermost object', () => {
    expect(extractJsonFromResponse('Result: {"a": {"b": 1}} done')).toBe('{"a": {"b": 1}}')
  })

  it('throws when there is no object', () => {
    expect(() => extractJsonFromResponse('no json here')).toThrow('Could not find JSON object in response')
  })
})

describe('parseLicensingResponse', () => {
  it('maps snake_case fields to the analysis shape', () => {
    const result = parseLicensingResponse(
      JSON.stringify({
        ...minimal,
        vendor_analysis: {
          vendor_name: 'Microsoft',
          pricing_assessment: 'Fair',
          negotiation_opportunities: ['Annual prepay'],
          alternative_vendors: ['Google Workspace']
        },
        recommendations: {
          immediate_actions: ['Remove unused seats'],
          short_term_optimizations: [],
          long_term_strategies: [],
          estimated_savings: { immediate: 64, short_term: 0, long_term: 500 }
        },
        risk_assessment: { high_risk_items: [], medium_risk_items: ['Renewal date'], low_risk_items: [] }
      })
    )

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.summary).toEqual({
      totalCost: 320,
      costVariancePercentage: -5,
      overallAssessment: 'Below Standard',
      keyFindings: ['Seats are fully used'],
      costOptimizationOpportunities: []
    })
    expect(result.value.vendorAnalysis.alternativeVendors).toEqual(['Google Workspace'])
    expect(result.value.recommendations.estimatedSavings).toEqual({ immediate: 64, shortTerm: 0, longTerm: 500 })
    expect(result.value.riskAssessment.medium).toEqual(['Renewal date'])
  })

  it('fills missing optional sections with empty values', () => {
    const result = parseLicensingResponse(JSON.stringify(minimal))

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.vendorAnalysis).toEqual({
      vendorName: '',
      pricingAssessment: '',
      negotiationOpportunities: [],
      alternativeVendors: []
    })
    expect(result.value.riskAssessment).toEqual({ high: [], medium: [], low: [] })
    expect(result.value.recommendations.estimatedSavings).toEqual({ immediate: 0, shortTerm: 0, longTerm: 0 })
  })

  it('replaces mistyped fields with defaults', () => {
    const result = parseLicensingResponse(
      JSON.stringify({ ...minimal, summary: { ...minimal.summary, total_cost: '320', key_findings: 'none' } })
    )

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.summary.totalCost).toBe(0)
    expect(result.value.summary.keyFindings).toEqual([])
  })

  it('fails when the summary is missing', () => {
    const result = parseLicensingResponse('{"category_analysis": {}}')

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.type).toBe('invalid_response')
    expect(result.error.message).toContain('Unexpected response shape: summary')
  })

  it('fails on invalid JSON', () => {
    const result = parseLicensingResponse('{"summary": ')

    expect(result).toEqual({
      ok: false,
      error: { type: 'invalid_response', message: 'Failed to parse response: Could not find JSON object in response' }
    })
  })
})
