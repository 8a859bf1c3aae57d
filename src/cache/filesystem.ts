/**
 * Filesystem Analysis Store
 *
 * Stores committed analysis results as JSON files organized by fingerprint prefix.
 *
 * Directory structure:
 * ```
 * <cacheDir>/
 * ├── entries/
 * │   ├── ab/
 * │   │   └── abcd1234...json
 * │   └── cd/
 * │       └── cdef5678...json
 * ├── quarantine/        (entries that failed to parse)
 * └── locks/             (per-fingerprint lock files)
 * ```
 *
 * Uses first 2 chars of the fingerprint as subdirectory to avoid too many files in one dir.
 */

import { existsSync } from 'node:fs'
import { mkdir, readdir, readFile, rename, rm, stat } from 'node:fs/promises'
import { homedir } from 'node:os'
import { basename, join } from 'node:path'
import { z } from 'zod'
import { isFingerprint } from '../fingerprint'
import type { Fingerprint } from '../fingerprint/types'
import { createSilentLogger, type Logger } from '../logger'
import { isErrnoCode, TEMP_FILE_SUFFIX, writeFileAtomic } from './atomic'
import { KeyedLock } from './lock'
import {
  type AnalysisStore,
  CACHE_ENTRY_VERSION,
  type CacheEntry,
  type CacheEntryMeta,
  type CacheEntrySummary,
  type StoreOptions,
  type StoreStats
} from './types'

/**
 * An on-disk entry could not be deserialized. Never surfaced to callers:
 * the entry is quarantined and treated as a miss.
 */
export class StoreCorruptError extends Error {
  readonly fingerprint: Fingerprint

  constructor(fingerprint: Fingerprint, reason: string) {
    super(`Corrupt cache entry ${fingerprint.slice(0, 16)}...: ${reason}`)
    this.name = 'StoreCorruptError'
    this.fingerprint = fingerprint
  }
}

/** A temp file this old belongs to a write that crashed */
const STALE_TEMP_FILE_MS = 60 * 60 * 1000
/** Quarantined entries are kept this long for inspection */
const QUARANTINE_RETENTION_MS = 7 * 24 * 60 * 60 * 1000

// Unknown fields are stripped, so entries written by newer versions stay readable
const entrySchema = z.object({
  version: z.number().int(),
  fingerprint: z.string(),
  result: z.unknown(),
  createdAt: z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'invalid date'),
  expiresAt: z
    .string()
    .refine((s) => !Number.isNaN(Date.parse(s)), 'invalid date')
    .optional(),
  meta: z
    .object({
      vendor: z.string().optional(),
      costMicros: z.number().optional(),
      model: z.string().optional()
    })
    .optional()
})

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'spend-sentinel')
  if (cacheDir.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/spend-sentinel/`
    )
  }
}

function assertFingerprint(fingerprint: string): void {
  if (!isFingerprint(fingerprint)) {
    throw new Error(`Invalid fingerprint: "${fingerprint}"`)
  }
}

export interface FilesystemStoreOptions extends StoreOptions {
  readonly logger?: Logger | undefined
  /** Share one lock set between the store and the analysis cache */
  readonly locks?: KeyedLock | undefined
}

/**
 * Crash-safe, file-backed analysis store.
 */
export class FilesystemStore implements AnalysisStore {
  readonly locks: KeyedLock
  private readonly entriesDir: string
  private readonly quarantineDir: string
  private readonly logger: Logger
  private readonly now: () => number

  constructor(
    private readonly cacheDir: string,
    private readonly options: FilesystemStoreOptions = {}
  ) {
    guardAgainstUserCache(cacheDir)
    this.entriesDir = join(cacheDir, 'entries')
    this.quarantineDir = join(cacheDir, 'quarantine')
    this.logger = options.logger ?? createSilentLogger()
    this.locks = options.locks ?? new KeyedLock(join(cacheDir, 'locks'))
    this.now = options.now ?? Date.now
  }

  async lookup<T = unknown>(fingerprint: Fingerprint): Promise<CacheEntry<T> | null> {
    assertFingerprint(fingerprint)
    const entry = await this.readEntry<T>(fingerprint)
    if (!entry || this.isExpired(entry)) {
      return null
    }
    return entry
  }

  async commit<T>(
    fingerprint: Fingerprint,
    result: T,
    meta?: CacheEntryMeta
  ): Promise<CacheEntry<T>> {
    assertFingerprint(fingerprint)

    // Committed entries are immutable; an expired one may be replaced
    const existing = await this.lookup<T>(fingerprint)
    if (existing) {
      return existing
    }

    const createdAtMs = this.now()
    const ttlSeconds = this.options.ttlSeconds
    const entry: CacheEntry<T> = {
      version: CACHE_ENTRY_VERSION,
      fingerprint,
      result,
      createdAt: new Date(createdAtMs).toISOString(),
      ...(ttlSeconds !== undefined
        ? { expiresAt: new Date(createdAtMs + ttlSeconds * 1000).toISOString() }
        : {}),
      ...(meta ? { meta } : {})
    }

    await writeFileAtomic(this.getEntryPath(fingerprint), JSON.stringify(entry, null, 2))
    this.logger.verbose(`Committed analysis ${fingerprint.slice(0, 16)}...`)

    await this.enforceLimits(fingerprint)
    return entry
  }

  async evictExpired(ttlSeconds?: number): Promise<number> {
    const nowMs = this.now()
    let evicted = 0

    for (const summary of await this.list()) {
      const tooOld =
        ttlSeconds !== undefined && nowMs - Date.parse(summary.createdAt) > ttlSeconds * 1000
      const pastExpiry = summary.expiresAt !== undefined && Date.parse(summary.expiresAt) <= nowMs
      if (!tooOld && !pastExpiry) continue

      // Skip entries someone is committing right now; the next sweep gets them
      const outcome = await this.locks.tryWithLock(summary.fingerprint, async () => {
        await rm(this.getEntryPath(summary.fingerprint), { force: true })
      })
      if (outcome.acquired) evicted++
    }

    if (evicted > 0) {
      this.logger.log(`Evicted ${evicted} expired cache entries`)
    }

    const tempFiles = (await this.listPrefixFiles()).filter((path) => path.endsWith(TEMP_FILE_SUFFIX))
    const quarantined = existsSync(this.quarantineDir)
      ? (await readdir(this.quarantineDir)).map((name) => join(this.quarantineDir, name))
      : []
    const swept =
      (await this.removeOlderThan(tempFiles, STALE_TEMP_FILE_MS, nowMs)) +
      (await this.removeOlderThan(quarantined, QUARANTINE_RETENTION_MS, nowMs))
    if (swept > 0) {
      this.logger.verbose(`Removed ${swept} leftover temp and quarantine files`)
    }

    return evicted
  }

  async clear(): Promise<number> {
    const count = (await this.list()).length
    if (existsSync(this.entriesDir)) {
      await rm(this.entriesDir, { recursive: true, force: true })
    }
    this.logger.log(`Cache cleared (${count} entries)`)
    return count
  }

  async list(): Promise<CacheEntrySummary[]> {
    const summaries: CacheEntrySummary[] = []

    for (const path of await this.listEntryFiles()) {
      const fingerprint = basename(path, '.json')
      if (!isFingerprint(fingerprint)) continue

      const entry = await this.readEntry(fingerprint)
      if (!entry) continue

      const info = await stat(path).catch((error: unknown) => {
        if (isErrnoCode(error, 'ENOENT')) return null
        throw error
      })
      if (!info) continue

      summaries.push({
        fingerprint,
        createdAt: entry.createdAt,
        expiresAt: entry.expiresAt,
        sizeBytes: info.size,
        vendor: entry.meta?.vendor
      })
    }

    return summaries.sort((a, b) => a.createdAt.localeCompare(b.createdAt))
  }

  async stats(): Promise<StoreStats> {
    const entries = await this.list()
    const quarantined = existsSync(this.quarantineDir)
      ? (await readdir(this.quarantineDir)).length
      : 0

    return {
      entries: entries.length,
      totalBytes: entries.reduce((sum, e) => sum + e.sizeBytes, 0),
      quarantined
    }
  }

  /**
   * Get the file path for a cache entry.
   */
  private getEntryPath(fingerprint: Fingerprint): string {
    return join(this.entriesDir, fingerprint.slice(0, 2), `${fingerprint}.json`)
  }

  private isExpired(entry: CacheEntry<unknown>): boolean {
    return entry.expiresAt !== undefined && Date.parse(entry.expiresAt) <= this.now()
  }

  private async listEntryFiles(): Promise<string[]> {
    return (await this.listPrefixFiles()).filter((path) => {
      const name = basename(path)
      // In-progress writes are dot-prefixed temp files
      return !name.startsWith('.') && !name.endsWith(TEMP_FILE_SUFFIX) && name.endsWith('.json')
    })
  }

  /**
   * Every file in the prefix directories, temp files included.
   */
  private async listPrefixFiles(): Promise<string[]> {
    if (!existsSync(this.entriesDir)) {
      return []
    }

    const files: string[] = []
    const prefixes = await readdir(this.entriesDir, { withFileTypes: true })
    for (const prefix of prefixes) {
      if (!prefix.isDirectory()) continue
      const dir = join(this.entriesDir, prefix.name)
      const names = await readdir(dir).catch((error: unknown) => {
        if (isErrnoCode(error, 'ENOENT')) return []
        throw error
      })
      for (const name of names) {
        files.push(join(dir, name))
      }
    }
    return files
  }

  private async removeOlderThan(paths: readonly string[], maxAgeMs: number, nowMs: number): Promise<number> {
    let removed = 0
    for (const path of paths) {
      const info = await stat(path).catch((error: unknown) => {
        if (isErrnoCode(error, 'ENOENT')) return null
        throw error
      })
      if (!info || nowMs - info.mtimeMs < maxAgeMs) continue
      await rm(path, { force: true })
      removed++
    }
    return removed
  }

  private async readEntry<T>(fingerprint: Fingerprint): Promise<CacheEntry<T> | null> {
    const path = this.getEntryPath(fingerprint)

    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return null
      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      await this.quarantine(path, new StoreCorruptError(fingerprint, 'invalid JSON'))
      return null
    }

    const parsed = entrySchema.safeParse(json)
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
      await this.quarantine(path, new StoreCorruptError(fingerprint, reason))
      return null
    }

    const data = parsed.data
    if (data.fingerprint !== fingerprint || data.result === undefined) {
      await this.quarantine(path, new StoreCorruptError(fingerprint, 'fingerprint or result mismatch'))
      return null
    }

    if (data.version !== CACHE_ENTRY_VERSION) {
      this.logger.verbose(`Skipping cache entry with unsupported version ${data.version}`)
      return null
    }

    // Stored results are whatever the caller committed for this fingerprint
    return data as CacheEntry<T>
  }

  private async quarantine(path: string, error: StoreCorruptError): Promise<void> {
    this.logger.warn(`${error.message} (quarantined)`)
    await mkdir(this.quarantineDir, { recursive: true })
    const target = join(this.quarantineDir, `${error.fingerprint}.${this.now()}.json`)
    try {
      await rename(path, target)
    } catch (renameError) {
      // Already moved by a concurrent reader
      if (!isErrnoCode(renameError, 'ENOENT')) throw renameError
    }
  }

  /**
   * Evict oldest entries (by createdAt) past the entry-count or size ceilings.
   * The entry just committed is never a victim.
   */
  private async enforceLimits(justCommitted: Fingerprint): Promise<void> {
    const { maxEntries, maxBytes } = this.options
    if (maxEntries === undefined && maxBytes === undefined) return

    const entries = await this.list()
    let count = entries.length
    let totalBytes = entries.reduce((sum, e) => sum + e.sizeBytes, 0)
    let evicted = 0

    for (const entry of entries) {
      const overCount = maxEntries !== undefined && count > maxEntries
      const overBytes = maxBytes !== undefined && totalBytes > maxBytes
      if (!overCount && !overBytes) break
      if (entry.fingerprint === justCommitted) continue

      const outcome = await this.locks.tryWithLock(entry.fingerprint, async () => {
        await rm(this.getEntryPath(entry.fingerprint), { force: true })
      })
      if (outcome.acquired) {
        count--
        totalBytes -= entry.sizeBytes
        evicted++
      }
    }

    if (evicted > 0) {
      this.logger.verbose(`Evicted ${evicted} cache entries to stay within limits`)
    }
  }
}
