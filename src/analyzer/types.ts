/**
 * Licensing Analyzer Types
 */

import { z } from 'zod'

const stringList = z.array(z.string()).catch([])
const amount = z.number().catch(0)

/**
 * Shape the model is asked to return (snake_case, as written in the prompt).
 * Missing or mistyped fields fall back to empty values rather than failing.
 */
export const rawLicensingAnalysisSchema = z.object({
  summary: z.object({
    total_cost: amount,
    cost_variance_percentage: amount,
    overall_assessment: z.string().catch('Unknown'),
    key_findings: stringList,
    cost_optimization_opportunities: stringList
  }),
  category_analysis: z
    .record(
      z.object({
        cost: amount,
        industry_standard: amount,
        variance_percentage: amount,
        assessment: z.string().catch(''),
        recommendations: stringList
      })
    )
    .catch({}),
  vendor_analysis: z
    .object({
      vendor_name: z.string().catch(''),
      pricing_assessment: z.string().catch(''),
      negotiation_opportunities: stringList,
      alternative_vendors: stringList
    })
    .optional(),
  recommendations: z
    .object({
      immediate_actions: stringList,
      short_term_optimizations: stringList,
      long_term_strategies: stringList,
      estimated_savings: z
        .object({ immediate: amount, short_term: amount, long_term: amount })
        .catch({ immediate: 0, short_term: 0, long_term: 0 })
    })
    .optional(),
  risk_assessment: z
    .object({
      high_risk_items: stringList,
      medium_risk_items: stringList,
      low_risk_items: stringList
    })
    .optional()
})

export type RawLicensingAnalysis = z.infer<typeof rawLicensingAnalysisSchema>

export interface CategoryAnalysis {
  cost: number
  industryStandard: number
  variancePercentage: number
  assessment: string
  recommendations: string[]
}

/**
 * Licensing analysis of one invoice. This is the cached result.
 */
export interface LicensingAnalysis {
  summary: {
    totalCost: number
    costVariancePercentage: number
    overallAssessment: string
    keyFindings: string[]
    costOptimizationOpportunities: string[]
  }
  categoryAnalysis: Record<string, CategoryAnalysis>
  vendorAnalysis: {
    vendorName: string
    pricingAssessment: string
    negotiationOpportunities: string[]
    alternativeVendors: string[]
  }
  recommendations: {
    immediateActions: string[]
    shortTermOptimizations: string[]
    longTermStrategies: string[]
    estimatedSavings: { immediate: number; shortTerm: number; longTerm: number }
  }
  riskAssessment: {
    high: string[]
    medium: string[]
    low: string[]
  }
}

export interface AnalyzerConfig {
  readonly apiKey: string
  /** Defaults to the anthropic default model */
  readonly model?: string | undefined
  readonly maxTokens?: number | undefined
  readonly temperature?: number | undefined
}

/**
 * Raw completion from the provider.
 */
export interface Completion {
  readonly text: string
  readonly model: string
  readonly inputTokens: number
  readonly outputTokens: number
}
