/**
 * spend-sentinel Core Library
 *
 * Response cache and cost control in front of a paid licensing-analysis API.
 * Each unique invoice is analyzed at most once; every call is budgeted and logged.
 *
 * @license AGPL-3.0
 */

// Analysis cache (get-or-compute facade)
export {
  AnalysisCache,
  type AnalysisCacheOptions,
  type AnalysisOutcome,
  analyzeBatch,
  type BatchOptions,
  type BatchProgress,
  type BatchResult,
  type ComputeContext,
  type ComputeFn,
  type ComputeResult,
  createAnalysisCache,
  DEFAULT_ANALYSIS_OPTIONS,
  type GetOrComputeOptions,
  Semaphore
} from './analysis/index'
// Licensing analyzer (Anthropic-backed compute function)
export {
  type AnalyzerConfig,
  buildAnalysisPrompt,
  callAnthropic,
  completionCost,
  createLicensingAnalyzer,
  estimateLicensingCost,
  type LicensingAnalysis,
  parseLicensingResponse
} from './analyzer/index'
// Durable store
export {
  type AnalysisStore,
  type CacheEntry,
  type CacheEntryMeta,
  type CacheEntrySummary,
  FilesystemStore,
  KeyedLock,
  StoreCorruptError,
  type StoreStats,
  writeFileAtomic
} from './cache/index'
// Cost control and usage reports
export {
  CostController,
  type CostLimits,
  DEFAULT_COST_LIMITS,
  dollarsToMicros,
  estimateAnalysisCost,
  formatMicrosAsDollars,
  formatUsageSummary,
  type MicroDollars,
  type Permit,
  type Recommendation,
  type UsageRecord,
  type UsageSummary,
  type VendorUsage
} from './costs/index'
// Fingerprinting
export {
  canonicalizeRequest,
  canonicalJson,
  type Fingerprint,
  FINGERPRINT_VERSION,
  fingerprintRequest,
  isFingerprint,
  MalformedRequestError,
  parseInvoiceRequest
} from './fingerprint/index'
// HTTP helpers
export { handleHttpError, handleNetworkError, httpFetch } from './http'
// Logging
export { createLogger, createSilentLogger, type Logger } from './logger'
// Cancellation
export { CancelledError, TimeoutError } from './shared/index'
// Types (type-only exports)
export type {
  ApiError,
  ApiErrorType,
  InvoiceAnalysisRequest,
  InvoiceLineItem,
  Result
} from './types'
export { isTransientError, TRANSIENT_ERROR_TYPES } from './types'

/**
 * Library version.
 */
export const VERSION = '0.1.0'
