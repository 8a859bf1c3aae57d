#!/usr/bin/env tsx
/**
 * spend-sentinel CLI
 *
 * Maintenance and reporting surface over the analysis cache:
 * analyze invoices, inspect usage, manage the cache and settings.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdAnalyze } from './cli/commands/analyze'
import { cmdCache } from './cli/commands/cache'
import { cmdConfig } from './cli/commands/config'
import { cmdStats } from './cli/commands/stats'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'analyze':
        await cmdAnalyze(args, logger)
        break

      case 'stats':
        await cmdStats(args, logger)
        break

      case 'cache':
        await cmdCache(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'spend-sentinel --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
