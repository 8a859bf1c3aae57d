/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/spend-sentinel/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or SPEND_SENTINEL_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import type { AnalysisCacheOptions } from '../analysis/types'
import { dollarsToMicros } from '../costs/calculator'
import { getDefaultAIModel } from '../costs/pricing'
import type { Logger } from '../logger'

const positive = z.number().positive()
const count = z.number().int().nonnegative()

/**
 * Shape of the config file. Unknown keys are dropped on load.
 */
export const configSchema = z.object({
  /** Entry lifetime in days */
  cacheTtlDays: positive.optional(),
  /** Entry-count ceiling */
  maxEntries: count.optional(),
  /** Total cache size ceiling in megabytes */
  maxSizeMb: positive.optional(),
  /** Rate limit on granted calls */
  callsPerMinute: z.number().int().positive().optional(),
  /** Simultaneous external calls within one process */
  maxConcurrentCalls: z.number().int().positive().optional(),
  /** Extra attempts after a transient failure */
  retries: count.optional(),
  /** Cumulative spend ceiling in dollars */
  maxTotalCostUsd: positive.optional(),
  /** Per-call deadline in seconds */
  timeoutSeconds: positive.optional(),
  /** Cost reserved per call when no estimate is given, in dollars */
  estimatedCostPerCallUsd: positive.optional(),
  /** Anthropic model id */
  model: z.string().min(1).optional(),
  /** Custom cache directory */
  cacheDir: z.string().min(1).optional(),
  /** When settings were last updated */
  updatedAt: z.string().optional()
})

/**
 * All persistable CLI settings.
 */
export type Config = z.infer<typeof configSchema>

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

/** Config keys that accept string values */
const STRING_KEYS: ConfigKey[] = ['cacheDir', 'model']
/** Config keys that accept number values */
const NUMBER_KEYS: ConfigKey[] = [
  'cacheTtlDays',
  'maxEntries',
  'maxSizeMb',
  'callsPerMinute',
  'maxConcurrentCalls',
  'retries',
  'maxTotalCostUsd',
  'timeoutSeconds',
  'estimatedCostPerCallUsd'
]

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  cacheDir: 'Cache directory path (default: ~/.cache/spend-sentinel)',
  cacheTtlDays: 'Days before a cached analysis expires (default: 30)',
  callsPerMinute: 'Max API calls granted per minute (default: 30)',
  estimatedCostPerCallUsd: 'Cost reserved per call before it runs (default: 0.15)',
  maxConcurrentCalls: 'Max simultaneous API calls (default: 1)',
  maxEntries: 'Max cached analyses, oldest evicted first (default: unlimited)',
  maxSizeMb: 'Max cache size in MB, oldest evicted first (default: unlimited)',
  maxTotalCostUsd: 'Total spend ceiling in dollars (default: unlimited)',
  model: 'Anthropic model for analysis (default: claude-sonnet-4-5)',
  retries: 'Extra attempts after a transient failure (default: 1)',
  timeoutSeconds: 'Per-call timeout in seconds (default: 60)'
}

/**
 * Settings used when the config file leaves a key unset.
 */
export const DEFAULT_ANALYSIS_CONFIG = {
  cacheTtlDays: 30,
  callsPerMinute: 30,
  maxConcurrentCalls: 1,
  retries: 1,
  timeoutSeconds: 60,
  estimatedCostPerCallUsd: 0.15,
  model: getDefaultAIModel('anthropic')
} as const

/**
 * Get the type of a config key (derived from key arrays).
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (NUMBER_KEYS.includes(key)) return 'number'
  return 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for spend-sentinel.
 * Uses ~/.config/spend-sentinel on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'spend-sentinel')
}

/**
 * Get the config file path.
 * Priority: configFile arg > SPEND_SENTINEL_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  const fromEnv = process.env['SPEND_SENTINEL_CONFIG']
  if (fromEnv) {
    return fromEnv
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Get the cache directory.
 * Priority: --cache-dir > SPEND_SENTINEL_CACHE_DIR env var > config file > ~/.cache/spend-sentinel
 */
export function resolveCacheDir(cliCacheDir?: string, config?: Config | null): string {
  if (cliCacheDir) {
    return cliCacheDir
  }
  const fromEnv = process.env['SPEND_SENTINEL_CACHE_DIR']
  if (fromEnv) {
    return fromEnv
  }
  if (config?.cacheDir) {
    return config.cacheDir
  }
  return join(homedir(), '.cache', 'spend-sentinel')
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist, isn't JSON or doesn't match the schema.
 */
export async function loadConfig(configFile?: string, logger?: Logger): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }

  let json: unknown
  try {
    json = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    logger?.warn(`Ignoring unreadable config ${path}: ${error instanceof Error ? error.message : String(error)}`)
    return null
  }

  const parsed = configSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    logger?.warn(`Ignoring invalid config ${path}: ${issues}`)
    return null
  }
  return parsed.data
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws Error when the value is not valid for the key
 */
export function parseConfigValue(key: ConfigKey, value: string): string | number {
  const raw: string | number = NUMBER_KEYS.includes(key) ? Number(value.trim()) : value
  const parsed = configSchema.shape[key].safeParse(raw)
  if (!parsed.success || parsed.data === undefined || value.trim() === '') {
    throw new Error(`Invalid value for ${key}: "${value}" (expected ${getConfigType(key)})`)
  }
  return parsed.data
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return getValidConfigKeys().some((k) => k === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string | number,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  const updated = configSchema.parse({ ...config, [key]: value })
  await saveConfig(updated, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * Build analysis cache options from config, filling unset keys from the defaults.
 */
export function toAnalysisCacheOptions(
  config: Config | null,
  cacheDir: string,
  logger?: Logger
): AnalysisCacheOptions {
  const settings = { ...DEFAULT_ANALYSIS_CONFIG, ...config }
  return {
    cacheDir,
    ttlSeconds: settings.cacheTtlDays * 24 * 60 * 60,
    maxEntries: settings.maxEntries,
    maxBytes: settings.maxSizeMb !== undefined ? Math.floor(settings.maxSizeMb * 1024 * 1024) : undefined,
    callsPerMinute: settings.callsPerMinute,
    maxConcurrentCalls: settings.maxConcurrentCalls,
    retries: settings.retries,
    maxTotalCostMicros:
      settings.maxTotalCostUsd !== undefined ? dollarsToMicros(settings.maxTotalCostUsd) : undefined,
    timeoutMs: settings.timeoutSeconds * 1000,
    estimatedCostPerCallMicros: dollarsToMicros(settings.estimatedCostPerCallUsd),
    logger
  }
}
