/**
 * Fingerprint Types
 */

/**
 * 64-character lowercase hex SHA-256 digest of a canonical request.
 */
export type Fingerprint = string

/** Bumped whenever canonicalization changes, so old entries stop matching. */
export const FINGERPRINT_VERSION = 1

/**
 * Canonical form of a line item. Text is case-folded, money rounded to cents.
 */
export interface CanonicalLineItem {
  readonly description: string
  readonly quantity: number
  readonly unitPrice: number
  readonly totalAmount: number
  readonly category?: string
}

/**
 * Canonical form of an invoice request: the exact value that gets hashed.
 * Optional fields are omitted rather than set to undefined.
 */
export interface CanonicalRequest {
  readonly vendor: string
  readonly invoiceDate: string
  readonly totalAmount: number
  readonly lineItems: readonly CanonicalLineItem[]
  readonly billTo?: string
  readonly currency?: string
  readonly metadata?: unknown
}
