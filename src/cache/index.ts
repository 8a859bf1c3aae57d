/**
 * Cache Module
 *
 * Durable, crash-safe storage of committed analysis results.
 */

export { isErrnoCode, writeFileAtomic } from './atomic'
export { FilesystemStore, type FilesystemStoreOptions, StoreCorruptError } from './filesystem'
export { KeyedLock, type KeyedLockOptions } from './lock'
export {
  type AnalysisStore,
  CACHE_ENTRY_VERSION,
  type CacheEntry,
  type CacheEntryMeta,
  type CacheEntrySummary,
  type StoreOptions,
  type StoreStats
} from './types'
