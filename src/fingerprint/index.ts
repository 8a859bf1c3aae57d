/**
 * Fingerprint Module
 *
 * Content-addressed keys for invoice analysis requests.
 * Same canonical content, same fingerprint: across calls, processes and restarts.
 *
 * @example
 * ```typescript
 * import { fingerprintRequest } from 'spend-sentinel/fingerprint'
 *
 * const key = fingerprintRequest({
 *   vendor: 'Microsoft',
 *   invoiceDate: '2024-01-15',
 *   totalAmount: 5000,
 *   lineItems: [{ description: 'Office 365 E3', quantity: 10, unitPrice: 32, totalAmount: 320 }]
 * })
 * // '9c1f...' (64 char hex string)
 * ```
 *
 * @module
 */

import { createHash } from 'node:crypto'
import { canonicalizeRequest, canonicalJson } from './canonical'
import { parseInvoiceRequest } from './schema'
import { FINGERPRINT_VERSION, type Fingerprint } from './types'

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/

/**
 * Fingerprint an invoice analysis request.
 *
 * Pure and deterministic. The hashed input is
 * `invoice-analysis:v<version>:<canonical json>`.
 *
 * @throws MalformedRequestError when the request fails validation
 */
export function fingerprintRequest(request: unknown): Fingerprint {
  const validated = parseInvoiceRequest(request)
  const canonical = canonicalJson(canonicalizeRequest(validated))
  const input = `invoice-analysis:v${FINGERPRINT_VERSION}:${canonical}`

  return createHash('sha256').update(input).digest('hex')
}

/**
 * Check that a string is a well-formed fingerprint (safe to use in a path).
 */
export function isFingerprint(value: string): value is Fingerprint {
  return FINGERPRINT_PATTERN.test(value)
}

export { canonicalizeRequest, canonicalJson } from './canonical'
export { invoiceRequestSchema, MalformedRequestError, parseInvoiceRequest } from './schema'
export type { CanonicalLineItem, CanonicalRequest, Fingerprint } from './types'
export { FINGERPRINT_VERSION } from './types'
