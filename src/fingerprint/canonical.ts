/**
 * Canonicalization
 *
 * Reduces an invoice request to the value that gets hashed. Two requests
 * that mean the same thing must canonicalize to the same JSON string.
 *
 * Policy:
 * - Object keys are sorted recursively
 * - Text is NFC-normalized, trimmed and whitespace-collapsed
 * - Vendor, bill-to, descriptions and categories are case-folded
 * - Money (unit price, totals) is rounded to cents; quantities keep full precision
 * - Line items are order-normalized: sorted by their canonical JSON
 */

import type { InvoiceAnalysisRequest, InvoiceLineItem } from '../types'
import { MalformedRequestError } from './schema'
import type { CanonicalLineItem, CanonicalRequest } from './types'

function normalizeText(value: string): string {
  return value.normalize('NFC').trim().replace(/\s+/g, ' ')
}

function foldText(value: string): string {
  return normalizeText(value).toLowerCase()
}

/** -0 and 0 must hash identically */
function normalizeNumber(value: number): number {
  return value === 0 ? 0 : value
}

function roundMoney(value: number): number {
  return normalizeNumber(Math.round(value * 100) / 100)
}

/**
 * Sort object keys recursively and drop undefined values, mirroring
 * what JSON.stringify would emit but in a stable key order.
 */
function sortKeys(value: unknown, path: string): unknown {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MalformedRequestError([`${path}: non-finite number`])
    }
    return normalizeNumber(value)
  }

  if (value instanceof Date) {
    return value.toISOString()
  }

  if (Array.isArray(value)) {
    return value.map((item, i) => sortKeys(item, `${path}.${i}`))
  }

  if (typeof value === 'object') {
    const sorted: Record<string, unknown> = {}
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    for (const [key, child] of entries) {
      if (child === undefined) continue
      sorted[key] = sortKeys(child, `${path}.${key}`)
    }
    return sorted
  }

  throw new MalformedRequestError([`${path}: unsupported value of type ${typeof value}`])
}

/**
 * Deterministic JSON: sorted keys, no undefined, no whitespace.
 */
export function canonicalJson(value: unknown, path = '(root)'): string {
  return JSON.stringify(sortKeys(value, path))
}

function canonicalizeLineItem(item: InvoiceLineItem): CanonicalLineItem {
  const base: CanonicalLineItem = {
    description: foldText(item.description),
    quantity: normalizeNumber(item.quantity),
    unitPrice: roundMoney(item.unitPrice),
    totalAmount: roundMoney(item.totalAmount)
  }
  return item.category === undefined ? base : { ...base, category: foldText(item.category) }
}

/**
 * Build the canonical form of an already-validated request.
 */
export function canonicalizeRequest(request: InvoiceAnalysisRequest): CanonicalRequest {
  const lineItems = request.lineItems
    .map(canonicalizeLineItem)
    .map((item) => ({ item, key: canonicalJson(item) }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ item }) => item)

  let canonical: CanonicalRequest = {
    vendor: foldText(request.vendor),
    invoiceDate: normalizeText(request.invoiceDate),
    totalAmount: roundMoney(request.totalAmount),
    lineItems
  }

  if (request.billTo !== undefined) {
    canonical = { ...canonical, billTo: foldText(request.billTo) }
  }
  if (request.currency !== undefined) {
    canonical = { ...canonical, currency: normalizeText(request.currency).toUpperCase() }
  }
  if (request.metadata !== undefined) {
    canonical = { ...canonical, metadata: sortKeys(request.metadata, 'metadata') }
  }

  return canonical
}
