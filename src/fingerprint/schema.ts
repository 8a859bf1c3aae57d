/**
 * Request Validation
 *
 * Shape checks for invoice analysis requests. A request that fails here
 * is never fingerprinted: no defaults are filled in for missing fields.
 */

import { z } from 'zod'
import type { InvoiceAnalysisRequest } from '../types'

/**
 * Thrown when a request is missing required fields or has the wrong shape.
 */
export class MalformedRequestError extends Error {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Malformed analysis request: ${issues.join('; ')}`)
    this.name = 'MalformedRequestError'
    this.issues = issues
  }
}

const nonBlank = z.string().refine((s) => s.trim().length > 0, { message: 'must not be blank' })
const amount = z.number().finite()

const lineItemSchema = z
  .object({
    description: nonBlank,
    quantity: amount,
    unitPrice: amount,
    totalAmount: amount,
    category: z.string().optional()
  })
  .strict()

export const invoiceRequestSchema = z
  .object({
    vendor: nonBlank,
    invoiceDate: nonBlank,
    totalAmount: amount,
    lineItems: z.array(lineItemSchema),
    billTo: z.string().optional(),
    currency: z.string().optional(),
    metadata: z.record(z.unknown()).optional()
  })
  .strict()

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}

/**
 * Validate an unknown value as an invoice analysis request.
 *
 * @throws MalformedRequestError listing every failing field
 */
export function parseInvoiceRequest(input: unknown): InvoiceAnalysisRequest {
  const parsed = invoiceRequestSchema.safeParse(input)
  if (!parsed.success) {
    throw new MalformedRequestError(formatIssues(parsed.error))
  }
  return parsed.data
}
