/**
 * Analysis Cache Types
 *
 * Durable fingerprint -> result storage. Entries are immutable once
 * committed and destroyed only by expiry, eviction or an explicit clear.
 */

import type { Fingerprint } from '../fingerprint/types'

/** Bumped when the on-disk entry layout changes incompatibly */
export const CACHE_ENTRY_VERSION = 1

/**
 * Facts about the call that produced an entry.
 */
export interface CacheEntryMeta {
  readonly vendor?: string | undefined
  readonly costMicros?: number | undefined
  readonly model?: string | undefined
}

/**
 * A committed analysis result.
 */
export interface CacheEntry<T = unknown> {
  readonly version: number
  readonly fingerprint: Fingerprint
  readonly result: T
  /** ISO 8601 */
  readonly createdAt: string
  /** ISO 8601; absent means the entry only expires through evictExpired(ttl) */
  readonly expiresAt?: string | undefined
  readonly meta?: CacheEntryMeta | undefined
}

/**
 * Entry metadata returned by list(), without the result payload.
 */
export interface CacheEntrySummary {
  readonly fingerprint: Fingerprint
  readonly createdAt: string
  readonly expiresAt?: string | undefined
  readonly sizeBytes: number
  readonly vendor?: string | undefined
}

export interface StoreStats {
  readonly entries: number
  readonly totalBytes: number
  readonly quarantined: number
}

/**
 * Durable store contract used by the analysis cache.
 */
export interface AnalysisStore {
  /** Committed, unexpired entry or null. Local I/O only. */
  lookup<T = unknown>(fingerprint: Fingerprint): Promise<CacheEntry<T> | null>

  /**
   * Atomically persist a result. Returns the existing entry unchanged if
   * one is already committed for this fingerprint.
   */
  commit<T>(fingerprint: Fingerprint, result: T, meta?: CacheEntryMeta): Promise<CacheEntry<T>>

  /** Remove entries past their expiry or older than ttlSeconds. Returns count removed. */
  evictExpired(ttlSeconds?: number): Promise<number>

  /** Remove every entry. Returns count removed. */
  clear(): Promise<number>

  list(): Promise<CacheEntrySummary[]>

  stats(): Promise<StoreStats>
}

/**
 * Filesystem store options.
 */
export interface StoreOptions {
  /** Entry lifetime in seconds, stamped as expiresAt at commit (default: none) */
  readonly ttlSeconds?: number | undefined
  /** Entry-count ceiling; oldest entries are evicted past it */
  readonly maxEntries?: number | undefined
  /** Total size ceiling in bytes; oldest entries are evicted past it */
  readonly maxBytes?: number | undefined
  /** Clock override for tests (ms since epoch) */
  readonly now?: (() => number) | undefined
}
