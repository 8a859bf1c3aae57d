/**
 * Cache Command
 *
 * List, evict expired, or clear committed analyses.
 */

import { FilesystemStore } from '../../cache/filesystem'
import type { CacheEntrySummary, StoreStats } from '../../cache/types'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { loadConfig, resolveCacheDir, toAnalysisCacheOptions } from '../config'
import { writeJsonOutput } from '../io'

/**
 * Pad a string to a given length.
 */
function padEnd(str: string, len: number): string {
  return str.length >= len ? str.slice(0, len) : str + ' '.repeat(len - str.length)
}

/**
 * Format an ISO timestamp as "YYYY-MM-DD HH:MM" (UTC).
 */
function formatTimestamp(iso: string | undefined): string {
  return iso ? iso.slice(0, 16).replace('T', ' ') : 'never'
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/**
 * Render cache entries as a table.
 */
export function formatCacheTable(entries: readonly CacheEntrySummary[], stats: StoreStats): string[] {
  if (entries.length === 0) {
    return ['', 'Cache is empty.']
  }

  const fingerprintWidth = 16
  const vendorWidth = 24
  const dateWidth = 16

  const header = [
    padEnd('Fingerprint', fingerprintWidth),
    padEnd('Vendor', vendorWidth),
    padEnd('Created', dateWidth),
    padEnd('Expires', dateWidth),
    'Size'
  ].join(' ')

  const lines = ['', header, '-'.repeat(header.length)]
  for (const entry of entries) {
    lines.push(
      [
        padEnd(entry.fingerprint, fingerprintWidth),
        padEnd(entry.vendor ?? '-', vendorWidth),
        padEnd(formatTimestamp(entry.createdAt), dateWidth),
        padEnd(formatTimestamp(entry.expiresAt), dateWidth),
        formatBytes(entry.sizeBytes)
      ].join(' ')
    )
  }

  lines.push('')
  lines.push(
    `Total: ${stats.entries} entr${stats.entries === 1 ? 'y' : 'ies'}, ${formatBytes(stats.totalBytes)}` +
      (stats.quarantined > 0 ? `, ${stats.quarantined} quarantined` : '')
  )
  return lines
}

export async function cmdCache(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadConfig(args.configFile, logger)
  const options = toAnalysisCacheOptions(config, resolveCacheDir(args.cacheDir, config), logger)
  const store = new FilesystemStore(options.cacheDir, {
    ttlSeconds: options.ttlSeconds,
    maxEntries: options.maxEntries,
    maxBytes: options.maxBytes,
    logger
  })

  switch (args.cacheAction) {
    case 'list': {
      const [entries, stats] = await Promise.all([store.list(), store.stats()])
      if (args.jsonOutput) {
        await writeJsonOutput(args.jsonOutput, { stats, entries })
        return
      }
      logger.log(`\nCache: ${options.cacheDir}`)
      for (const line of formatCacheTable(entries, stats)) {
        logger.log(line)
      }
      break
    }
    case 'evict': {
      const evicted = await store.evictExpired(options.ttlSeconds)
      if (evicted === 0) logger.log('No expired entries.')
      break
    }
    case 'clear':
      await store.clear()
      break
  }
}
