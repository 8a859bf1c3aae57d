/**
 * HTTP Utilities
 *
 * Guarded fetch plus uniform mapping of HTTP and network failures to ApiError.
 */

import { TimeoutError } from './shared/abort'
import type { Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env['CI'] === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true'
}

/**
 * Error thrown when a real HTTP request is attempted from tests in CI.
 */
class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Mock ./http in tests instead of calling real APIs.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Minimal response surface the API modules rely on.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when running tests in CI
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (isCI() && isTestMode()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  // 529: provider overloaded, behaves like a rate limit
  if (response.status === 429 || response.status === 529) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  if (response.status === 402) {
    return { ok: false, error: { type: 'quota', message: `Quota exhausted: ${errorText}` } }
  }

  if (response.status === 400 || response.status === 404 || response.status === 413) {
    return {
      ok: false,
      error: { type: 'invalid_request', message: `API rejected request ${response.status}: ${errorText}` }
    }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 * Aborts caused by a deadline map to timeout, other aborts to cancelled.
 */
export function handleNetworkError(error: unknown, signal?: AbortSignal): Result<never> {
  if (signal?.aborted) {
    if (signal.reason instanceof TimeoutError) {
      return { ok: false, error: { type: 'timeout', message: signal.reason.message } }
    }
    return { ok: false, error: { type: 'cancelled', message: 'Request cancelled' } }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}
