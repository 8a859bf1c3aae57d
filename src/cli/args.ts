/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type CacheAction = 'list' | 'evict' | 'clear'
export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  input: string
  quiet: boolean
  verbose: boolean
  dryRun: boolean
  /** 'stdout', a file path, or undefined for human-readable output */
  jsonOutput: string | undefined
  /** Invoices analyzed at once in a batch (default: maxConcurrentCalls) */
  concurrency: number | undefined
  /** For stats command: days of daily trends to show */
  days: number
  cacheDir: string | undefined
  configFile: string | undefined
  /** For cache command: action (list, evict, clear) */
  cacheAction: CacheAction
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DEFAULT_TREND_DAYS = 30

const DESCRIPTION = `Cached, budgeted licensing analysis of vendor invoices.

Each unique invoice is analyzed at most once. Results are cached on disk and
every API call is checked against rate and spend limits.

Examples:
  $ spend-sentinel analyze invoice.json
  $ spend-sentinel analyze invoices.json --json report.json
  $ spend-sentinel stats
  $ spend-sentinel cache evict`

function createProgram(): Command {
  const program = new Command()
    .name('spend-sentinel')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-dir <dir>', 'Custom cache directory (or set SPEND_SENTINEL_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set SPEND_SENTINEL_CONFIG)')

  // ============ ANALYZE ============
  program
    .command('analyze')
    .description('Analyze one invoice or a JSON array of invoices (cached results are free)')
    .argument('<input>', 'JSON file with an invoice or an array of invoices')
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')
    .option('--concurrency <num>', 'Invoices analyzed at once')
    .option('--dry-run', 'Show cached/uncached split and estimated cost without API calls')

  // ============ STATS ============
  program
    .command('stats')
    .description('Show API usage, cache savings and cost trends')
    .option('--days <num>', 'Days of daily trends to show', String(DEFAULT_TREND_DAYS))
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')

  // ============ CACHE ============
  program
    .command('cache')
    .description('Inspect or maintain the analysis cache')
    .argument('[action]', 'Action: list (default), evict, clear')
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  spend-sentinel config                             List current settings
  spend-sentinel config set maxTotalCostUsd 25      Cap total spend at $25
  spend-sentinel config set callsPerMinute 10       Slow down API calls
  spend-sentinel config unset cacheDir              Remove custom cache dir`
    )

  return program
}

function parseOptionalInt(value: unknown): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number.parseInt(String(value), 10)
  return Number.isNaN(parsed) ? undefined : parsed
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    input,
    quiet: opts['quiet'] === true,
    verbose: opts['verbose'] === true,
    dryRun: opts['dryRun'] === true,
    jsonOutput:
      opts['json'] === true ? 'stdout' : typeof opts['json'] === 'string' ? opts['json'] : undefined,
    concurrency: parseOptionalInt(opts['concurrency']),
    days: parseOptionalInt(opts['days']) ?? DEFAULT_TREND_DAYS,
    cacheDir: typeof opts['cacheDir'] === 'string' ? opts['cacheDir'] : undefined,
    configFile: typeof opts['configFile'] === 'string' ? opts['configFile'] : undefined,
    cacheAction: 'list',
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseCacheAction(action: string | undefined): CacheAction {
  if (action === 'evict' || action === 'clear') {
    return action
  }
  return 'list'
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that capture the parsed args of whichever command runs.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function attachActions(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    switch (cmd.name()) {
      case 'cache':
        cmd.action((action?: string) => {
          capture({ ...buildCLIArgs('cache', '', cmd.optsWithGlobals()), cacheAction: parseCacheAction(action) })
        })
        break
      case 'config':
        cmd.action((action?: string, key?: string, value?: string) => {
          capture({
            ...buildCLIArgs('config', '', cmd.optsWithGlobals()),
            configAction: parseConfigAction(action),
            configKey: key,
            configValue: value
          })
        })
        break
      case 'stats':
        cmd.action(() => {
          capture(buildCLIArgs('stats', '', cmd.optsWithGlobals()))
        })
        break
      default:
        cmd.action((input: string) => {
          capture(buildCLIArgs(cmd.name(), input, cmd.optsWithGlobals()))
        })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    // Subcommands copy settings at creation, so override each one
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
      cmd.configureOutput({ writeOut: () => {}, writeErr: () => {} })
    }
  }

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and usage errors
    return result ?? buildCLIArgs('help', '', {})
  }

  return result ?? buildCLIArgs('help', '', {})
}
