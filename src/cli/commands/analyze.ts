/**
 * Analyze Command
 *
 * Analyze one invoice or a batch through the cache: hits are free,
 * misses call Claude under the configured rate and spend limits.
 */

import { writeFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { analyzeBatch, type BatchResult } from '../../analysis/batch'
import { type AnalysisCache, createAnalysisCache } from '../../analysis/cache'
import { createLicensingAnalyzer, estimateLicensingCost, type LicensingAnalysis } from '../../analyzer/index'
import { formatMicrosAsDollars } from '../../costs/calculator'
import type { MicroDollars } from '../../costs/types'
import { MalformedRequestError, parseInvoiceRequest } from '../../fingerprint/index'
import { VERSION } from '../../index'
import type { Logger } from '../../logger'
import type { ApiErrorType } from '../../types'
import type { CLIArgs } from '../args'
import {
  DEFAULT_ANALYSIS_CONFIG,
  loadConfig,
  resolveCacheDir,
  toAnalysisCacheOptions
} from '../config'
import { readJsonFile, writeJsonOutput } from '../io'

export interface AnalyzeOutputItem {
  index: number
  status: 'cached' | 'computed' | 'failed'
  fingerprint?: string | undefined
  vendor?: string | undefined
  costMicros?: number | undefined
  error?: { type: ApiErrorType; message: string } | undefined
  analysis?: LicensingAnalysis | undefined
}

export interface AnalyzeOutput {
  total: number
  cached: number
  computed: number
  failed: number
  totalCostMicros: MicroDollars
  results: AnalyzeOutputItem[]
}

export interface BatchPlan {
  cached: number
  uncached: number
  malformed: number
  estimatedCostMicros: MicroDollars
}

/**
 * Read the invoices in a JSON file: a single invoice object or an array of them.
 * Items are not validated here; malformed ones fail individually.
 */
export async function loadInvoices(path: string): Promise<unknown[]> {
  const json = await readJsonFile(path)
  return Array.isArray(json) ? json : [json]
}

/**
 * Count cached and uncached invoices and estimate what the uncached ones will cost.
 * Makes no API calls and records no usage.
 */
export async function planBatch(
  invoices: readonly unknown[],
  cache: AnalysisCache,
  model: string
): Promise<BatchPlan> {
  const plan: BatchPlan = { cached: 0, uncached: 0, malformed: 0, estimatedCostMicros: 0 }

  for (const invoice of invoices) {
    try {
      const request = parseInvoiceRequest(invoice)
      if (await cache.peek(request)) {
        plan.cached++
      } else {
        plan.uncached++
        plan.estimatedCostMicros += estimateLicensingCost(request, model)
      }
    } catch (error) {
      if (!(error instanceof MalformedRequestError)) throw error
      plan.malformed++
    }
  }

  return plan
}

function vendorOf(invoice: unknown): string | undefined {
  if (typeof invoice === 'object' && invoice !== null && 'vendor' in invoice) {
    return typeof invoice.vendor === 'string' ? invoice.vendor : undefined
  }
  return undefined
}

/**
 * Build the JSON output for a finished batch.
 */
export function buildAnalyzeOutput(
  invoices: readonly unknown[],
  batch: BatchResult<LicensingAnalysis>
): AnalyzeOutput {
  return {
    total: batch.outcomes.length,
    cached: batch.cachedCount,
    computed: batch.computedCount,
    failed: batch.failedCount,
    totalCostMicros: batch.totalCostMicros,
    results: batch.outcomes.map((outcome, index): AnalyzeOutputItem => {
      const vendor = vendorOf(invoices[index])
      if (!outcome.ok) {
        return {
          index,
          status: 'failed',
          vendor,
          error: { type: outcome.error.type, message: outcome.error.message }
        }
      }
      return {
        index,
        status: outcome.value.cached ? 'cached' : 'computed',
        fingerprint: outcome.value.fingerprint,
        vendor,
        costMicros: outcome.value.costMicros,
        analysis: outcome.value.result
      }
    })
  }
}

export async function cmdAnalyze(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  logger.log(`\nspend-sentinel analyze v${VERSION}`)

  const config = await loadConfig(args.configFile, logger)
  const options = toAnalysisCacheOptions(config, resolveCacheDir(args.cacheDir, config), logger)
  const model = config?.model ?? DEFAULT_ANALYSIS_CONFIG.model
  const invoices = await loadInvoices(args.input)

  logger.log(`\n📁 ${basename(args.input)} (${invoices.length} invoice${invoices.length === 1 ? '' : 's'})`)

  const cache = createAnalysisCache(options)
  try {
    if (args.dryRun) {
      const plan = await planBatch(invoices, cache, model)
      logger.log(`   Cached: ${plan.cached}`)
      logger.log(`   To analyze: ${plan.uncached}`)
      if (plan.malformed > 0) logger.log(`   Malformed: ${plan.malformed}`)
      logger.log(`   Estimated cost: ${formatMicrosAsDollars(plan.estimatedCostMicros)} (${model})`)
      logger.log('\n🏃 Dry run - no API calls made')
      return
    }

    const apiKey = process.env['ANTHROPIC_API_KEY']
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY environment variable is required')
    }

    const batch = await analyzeBatch(invoices, cache, createLicensingAnalyzer({ apiKey, model }), {
      concurrency: args.concurrency ?? options.maxConcurrentCalls,
      onProgress: ({ completed, total }) => logger.progress('Analyzing invoices', completed, total)
    })
    const output = buildAnalyzeOutput(invoices, batch)

    if (args.jsonOutput) {
      await writeJsonOutput(args.jsonOutput, output)
      if (args.jsonOutput !== 'stdout') {
        logger.success(`Saved ${output.total} analyses to ${args.jsonOutput}`)
      }
    } else {
      displayResults(output, logger)
    }
  } finally {
    await cache.close()
  }
}

function displayResults(output: AnalyzeOutput, logger: Logger): void {
  logger.log('\n📊 Results:')
  for (const item of output.results) {
    const label = item.vendor ?? `invoice ${item.index + 1}`
    if (item.status === 'failed') {
      logger.error(`${label}: ${item.error?.type}: ${item.error?.message}`)
    } else if (item.analysis) {
      const tag = item.status === 'cached' ? 'cached' : formatMicrosAsDollars(item.costMicros ?? 0)
      logger.success(`${label}: ${item.analysis.summary.overallAssessment} (${tag})`)
      for (const finding of item.analysis.summary.keyFindings.slice(0, 3)) {
        logger.log(`     • ${finding}`)
      }
    }
  }

  logger.log(
    `\n   ${output.cached} cached, ${output.computed} analyzed, ${output.failed} failed` +
      ` - spent ${formatMicrosAsDollars(output.totalCostMicros)}`
  )
}
