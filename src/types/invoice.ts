/**
 * Invoice Types
 *
 * The analysis request: one vendor invoice with its line items.
 */

export interface InvoiceLineItem {
  readonly description: string
  readonly quantity: number
  readonly unitPrice: number
  readonly totalAmount: number
  /** Licensing category, when the caller has already categorized the item */
  readonly category?: string | undefined
}

/**
 * A single invoice submitted for licensing analysis.
 *
 * Equality is by content: two requests with the same canonical content
 * share a fingerprint regardless of key order or line-item order.
 */
export interface InvoiceAnalysisRequest {
  readonly vendor: string
  /** Invoice date (YYYY-MM-DD) */
  readonly invoiceDate: string
  readonly totalAmount: number
  readonly lineItems: readonly InvoiceLineItem[]
  readonly billTo?: string | undefined
  /** ISO 4217 code, e.g. "USD" */
  readonly currency?: string | undefined
  /** Extra caller data. Included in the fingerprint. */
  readonly metadata?: Readonly<Record<string, unknown>> | undefined
}
