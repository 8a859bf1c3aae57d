/**
 * AI Provider API Client
 *
 * HTTP client for the Anthropic Messages API.
 */

import { z } from 'zod'
import { getDefaultAIModel } from '../costs/pricing'
import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { Result } from '../types'
import { SYSTEM_PROMPT } from './prompt'
import type { AnalyzerConfig, Completion } from './types'

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages'

const DEFAULT_MAX_TOKENS = 4096
const DEFAULT_TEMPERATURE = 0.1

const anthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() })
})

/**
 * Call Anthropic Claude API with one user prompt.
 */
export async function callAnthropic(
  prompt: string,
  config: AnalyzerConfig,
  signal?: AbortSignal
): Promise<Result<Completion>> {
  const model = config.model ?? getDefaultAIModel('anthropic')

  try {
    const response = await httpFetch(ANTHROPIC_MESSAGES_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': config.apiKey,
        'anthropic-version': '2023-06-01'
      },
      body: JSON.stringify({
        model,
        max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: config.temperature ?? DEFAULT_TEMPERATURE,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }]
      }),
      signal
    })

    if (!response.ok) return handleHttpError(response)

    const parsed = anthropicResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      return {
        ok: false,
        error: { type: 'invalid_response', message: 'Unexpected response shape from Anthropic API' }
      }
    }

    const text = parsed.data.content.find((block) => block.type === 'text')?.text
    if (!text) return emptyResponseError()

    return {
      ok: true,
      value: {
        text,
        model: parsed.data.model ?? model,
        inputTokens: parsed.data.usage.input_tokens,
        outputTokens: parsed.data.usage.output_tokens
      }
    }
  } catch (error) {
    return handleNetworkError(error, signal)
  }
}
