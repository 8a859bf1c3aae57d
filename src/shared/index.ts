/**
 * Shared Utilities
 *
 * Cancellation helpers used by the cache, cost controller and analyzer.
 */

export { abortReason, CancelledError, createDeadline, raceAbort, sleep, TimeoutError } from './abort'
