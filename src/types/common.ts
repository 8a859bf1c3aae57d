/**
 * Common Types
 *
 * Shared types used across modules: Result and API errors.
 */

// Result Types
export type ApiErrorType =
  | 'rate_limit'
  | 'auth'
  | 'quota'
  | 'network'
  | 'timeout'
  | 'cancelled'
  | 'invalid_response'
  | 'invalid_request'
  | 'malformed_request'
  | 'budget_exceeded'
  | 'compute_failed'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  /** Seconds until the call may succeed (rate limits, budget windows) */
  readonly retryAfter?: number | undefined
  /** Underlying failure type when this error wraps another (compute_failed) */
  readonly cause?: ApiErrorType | undefined
  /** Micro-dollars already spent by the call that failed (a billed but unusable completion) */
  readonly costMicros?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

/** Error types worth another miss-path attempt. */
export const TRANSIENT_ERROR_TYPES: readonly ApiErrorType[] = ['rate_limit', 'network', 'timeout']

export function isTransientError(error: ApiError): boolean {
  return TRANSIENT_ERROR_TYPES.includes(error.cause ?? error.type)
}
