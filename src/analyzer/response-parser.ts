/**
 * Response Parser
 *
 * Parses licensing analysis responses from JSON into typed objects.
 */

import type { Result } from '../types'
import { type LicensingAnalysis, type RawLicensingAnalysis, rawLicensingAnalysisSchema } from './types'

export function extractJsonFromResponse(response: string): string {
  // Try to extract JSON from response (might be wrapped in ```json```)
  const fenced = response.match(/```json\s*([\s\S]*?)\s*```/)
  if (fenced?.[1]) {
    return fenced[1]
  }
  // Try to find a JSON object directly
  const objectMatch = response.match(/\{[\s\S]*\}/)
  if (!objectMatch) {
    throw new Error('Could not find JSON object in response')
  }
  return objectMatch[0]
}

function toLicensingAnalysis(raw: RawLicensingAnalysis): LicensingAnalysis {
  const categoryAnalysis: LicensingAnalysis['categoryAnalysis'] = {}
  for (const [category, data] of Object.entries(raw.category_analysis)) {
    categoryAnalysis[category] = {
      cost: data.cost,
      industryStandard: data.industry_standard,
      variancePercentage: data.variance_percentage,
      assessment: data.assessment,
      recommendations: data.recommendations
    }
  }

  const savings = raw.recommendations?.estimated_savings

  return {
    summary: {
      totalCost: raw.summary.total_cost,
      costVariancePercentage: raw.summary.cost_variance_percentage,
      overallAssessment: raw.summary.overall_assessment,
      keyFindings: raw.summary.key_findings,
      costOptimizationOpportunities: raw.summary.cost_optimization_opportunities
    },
    categoryAnalysis,
    vendorAnalysis: {
      vendorName: raw.vendor_analysis?.vendor_name ?? '',
      pricingAssessment: raw.vendor_analysis?.pricing_assessment ?? '',
      negotiationOpportunities: raw.vendor_analysis?.negotiation_opportunities ?? [],
      alternativeVendors: raw.vendor_analysis?.alternative_vendors ?? []
    },
    recommendations: {
      immediateActions: raw.recommendations?.immediate_actions ?? [],
      shortTermOptimizations: raw.recommendations?.short_term_optimizations ?? [],
      longTermStrategies: raw.recommendations?.long_term_strategies ?? [],
      estimatedSavings: {
        immediate: savings?.immediate ?? 0,
        shortTerm: savings?.short_term ?? 0,
        longTerm: savings?.long_term ?? 0
      }
    },
    riskAssessment: {
      high: raw.risk_assessment?.high_risk_items ?? [],
      medium: raw.risk_assessment?.medium_risk_items ?? [],
      low: raw.risk_assessment?.low_risk_items ?? []
    }
  }
}

/**
 * Parse a model response into a licensing analysis.
 * Fails with invalid_response when no usable JSON is found.
 */
export function parseLicensingResponse(response: string): Result<LicensingAnalysis> {
  let json: unknown
  try {
    json = JSON.parse(extractJsonFromResponse(response))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, error: { type: 'invalid_response', message: `Failed to parse response: ${message}` } }
  }

  const parsed = rawLicensingAnalysisSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    return { ok: false, error: { type: 'invalid_response', message: `Unexpected response shape: ${issues}` } }
  }

  return { ok: true, value: toLicensingAnalysis(parsed.data) }
}
