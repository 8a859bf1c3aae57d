/**
 * Licensing Analyzer
 *
 * The paid call behind the analysis cache: prompts Claude with one invoice
 * and parses the licensing analysis it returns.
 *
 * @example
 * ```typescript
 * import { createAnalysisCache } from 'spend-sentinel'
 * import { createLicensingAnalyzer } from 'spend-sentinel/analyzer'
 *
 * const cache = createAnalysisCache({ cacheDir: './cache' })
 * const analyze = createLicensingAnalyzer({ apiKey: process.env.ANTHROPIC_API_KEY ?? '' })
 * const outcome = await cache.getOrCompute(invoice, analyze)
 * ```
 *
 * @module
 */

import type { ComputeFn } from '../analysis/types'
import { calculateAICompletionCost } from '../costs/calculator'
import { ESTIMATION_DEFAULTS, estimateAnalysisCost } from '../costs/estimator'
import { getAIModelPricing, getDefaultAIModel } from '../costs/pricing'
import type { MicroDollars } from '../costs/types'
import type { InvoiceAnalysisRequest } from '../types'
import { buildAnalysisPrompt } from './prompt'
import { callAnthropic } from './providers'
import { parseLicensingResponse } from './response-parser'
import type { AnalyzerConfig, LicensingAnalysis } from './types'

/**
 * Cost of a completion from its token counts.
 * Unpriced models are charged the flat fallback estimate.
 */
export function completionCost(model: string, inputTokens: number, outputTokens: number): MicroDollars {
  if (!getAIModelPricing(model)) {
    return ESTIMATION_DEFAULTS.fallbackCostPerCallMicros
  }
  return Math.ceil(calculateAICompletionCost(model, inputTokens, outputTokens))
}

/**
 * Estimate what analyzing this invoice will cost, for sizing a budget permit.
 */
export function estimateLicensingCost(
  request: InvoiceAnalysisRequest,
  model: string = getDefaultAIModel('anthropic')
): MicroDollars {
  return estimateAnalysisCost(buildAnalysisPrompt(request), model)
}

/**
 * Create a compute function that analyzes one invoice with Claude.
 */
export function createLicensingAnalyzer(config: AnalyzerConfig): ComputeFn<LicensingAnalysis> {
  return async (request, context) => {
    const prompt = buildAnalysisPrompt(request)
    const completion = await callAnthropic(prompt, config, context.signal)
    if (!completion.ok) return completion

    const { text, model, inputTokens, outputTokens } = completion.value
    const costMicros = completionCost(model, inputTokens, outputTokens)
    const parsed = parseLicensingResponse(text)
    if (!parsed.ok) {
      // The completion was billed even though its text is unusable
      return { ok: false, error: { ...parsed.error, costMicros } }
    }

    return {
      ok: true,
      value: {
        value: parsed.value,
        costMicros,
        model,
        inputTokens,
        outputTokens
      }
    }
  }
}

export { buildAnalysisPrompt, groupLineItems, SYSTEM_PROMPT } from './prompt'
export { ANTHROPIC_MESSAGES_URL, callAnthropic } from './providers'
export { extractJsonFromResponse, parseLicensingResponse } from './response-parser'
export type {
  AnalyzerConfig,
  CategoryAnalysis,
  Completion,
  LicensingAnalysis,
  RawLicensingAnalysis
} from './types'
export { rawLicensingAnalysisSchema } from './types'
