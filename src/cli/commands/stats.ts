/**
 * Stats Command
 *
 * Usage dashboard: call counts, cache savings, per-vendor spend,
 * daily trends and optimization recommendations.
 */

import { formatMicrosAsDollars } from '../../costs/calculator'
import { CostController } from '../../costs/controller'
import { formatUsageSummary } from '../../costs/reports'
import type { DailyUsage, Recommendation, UsageSummary, VendorUsage } from '../../costs/types'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { loadConfig, resolveCacheDir, toAnalysisCacheOptions } from '../config'
import { writeJsonOutput } from '../io'

export interface StatsReport {
  summary: UsageSummary
  vendors: VendorUsage[]
  trends: DailyUsage[]
  recommendations: Recommendation[]
}

/**
 * Collect every usage report the cost controller offers.
 */
export async function buildStatsReport(costs: CostController, days: number): Promise<StatsReport> {
  const [summary, vendors, trends, recommendations] = await Promise.all([
    costs.getCostSummary(),
    costs.getVendorBreakdown(),
    costs.getCostTrends(days),
    costs.getOptimizationRecommendations()
  ])
  return { summary, vendors, trends, recommendations }
}

/**
 * Render a stats report as display lines.
 */
export function formatStatsReport(report: StatsReport, days: number): string[] {
  const lines = ['', '📊 Usage', ...formatUsageSummary(report.summary).split('\n').map((l) => `   ${l}`)]

  if (report.vendors.length > 0) {
    lines.push('', '🏢 By vendor')
    for (const vendor of report.vendors) {
      lines.push(
        `   ${vendor.vendor}: ${vendor.calls} calls, ${vendor.cacheHits} hits, ${formatMicrosAsDollars(vendor.costMicros)}`
      )
    }
  }

  if (report.trends.length > 0) {
    lines.push('', `📅 Last ${days} days`)
    for (const day of report.trends) {
      lines.push(
        `   ${day.date}: ${day.calls} calls, ${day.cacheHits} hits, ${formatMicrosAsDollars(day.costMicros)}`
      )
    }
  }

  if (report.recommendations.length > 0) {
    lines.push('', '💡 Recommendations')
    for (const recommendation of report.recommendations) {
      lines.push(`   • ${recommendation.message}`)
    }
  }

  return lines
}

export async function cmdStats(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadConfig(args.configFile, logger)
  const options = toAnalysisCacheOptions(config, resolveCacheDir(args.cacheDir, config), logger)
  const costs = new CostController(options.cacheDir, {
    estimatedCostPerCallMicros: options.estimatedCostPerCallMicros,
    logger
  })

  const report = await buildStatsReport(costs, args.days)

  if (args.jsonOutput) {
    await writeJsonOutput(args.jsonOutput, report)
    if (args.jsonOutput !== 'stdout') {
      logger.success(`Saved usage report to ${args.jsonOutput}`)
    }
    return
  }

  for (const line of formatStatsReport(report, args.days)) {
    logger.log(line)
  }
}
