/**
 * Analysis Prompt
 */

import type { InvoiceAnalysisRequest, InvoiceLineItem } from '../types'

export const SYSTEM_PROMPT =
  'You are an expert licensing analyst specializing in software licensing, cloud services ' +
  'and IT infrastructure costs. Analyze licensing data, determine whether costs are above ' +
  'industry standards and give specific recommendations for cost optimization.'

const UNCATEGORIZED = 'uncategorized'

function formatMoney(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`
}

/**
 * Group line items by category, keeping first-seen category order.
 */
export function groupLineItems(
  items: readonly InvoiceLineItem[]
): Map<string, { total: number; items: InvoiceLineItem[] }> {
  const groups = new Map<string, { total: number; items: InvoiceLineItem[] }>()
  for (const item of items) {
    const category = item.category?.trim() || UNCATEGORIZED
    let group = groups.get(category)
    if (!group) {
      group = { total: 0, items: [] }
      groups.set(category, group)
    }
    group.total += item.totalAmount
    group.items.push(item)
  }
  return groups
}

const RESPONSE_FORMAT = `{
  "summary": {
    "total_cost": number,
    "cost_variance_percentage": number,
    "overall_assessment": "Below Standard" | "At Standard" | "Above Standard" | "Critical",
    "key_findings": [string],
    "cost_optimization_opportunities": [string]
  },
  "category_analysis": {
    "<category>": {
      "cost": number,
      "industry_standard": number,
      "variance_percentage": number,
      "assessment": string,
      "recommendations": [string]
    }
  },
  "vendor_analysis": {
    "vendor_name": string,
    "pricing_assessment": string,
    "negotiation_opportunities": [string],
    "alternative_vendors": [string]
  },
  "recommendations": {
    "immediate_actions": [string],
    "short_term_optimizations": [string],
    "long_term_strategies": [string],
    "estimated_savings": { "immediate": number, "short_term": number, "long_term": number }
  },
  "risk_assessment": {
    "high_risk_items": [string],
    "medium_risk_items": [string],
    "low_risk_items": [string]
  }
}`

/**
 * Build the user prompt for one invoice.
 */
export function buildAnalysisPrompt(request: InvoiceAnalysisRequest): string {
  const lines = [
    'Analyze the following licensing and IT infrastructure invoice and determine whether costs are above industry standards.',
    '',
    `VENDOR: ${request.vendor}`
  ]
  if (request.billTo) lines.push(`BILL TO: ${request.billTo}`)
  lines.push(`INVOICE DATE: ${request.invoiceDate}`)
  lines.push(`TOTAL AMOUNT: ${formatMoney(request.totalAmount)}${request.currency ? ` ${request.currency}` : ''}`)
  lines.push('', 'LINE ITEMS BY CATEGORY:')

  for (const [category, group] of groupLineItems(request.lineItems)) {
    lines.push('', `${category.toUpperCase()} (${formatMoney(group.total)}):`)
    for (const item of group.items) {
      lines.push(
        `  - ${item.description}: ${item.quantity} x ${formatMoney(item.unitPrice)} = ${formatMoney(item.totalAmount)}`
      )
    }
  }

  lines.push(
    '',
    'ANALYSIS THRESHOLDS:',
    '- Warning: 15% above standard',
    '- Critical: 30% above standard',
    '- Usage efficiency warning: below 70%',
    '- License utilization warning: below 80%',
    '',
    'Respond in this JSON format:',
    '',
    RESPONSE_FORMAT,
    '',
    'Provide only valid JSON. No explanatory text outside the JSON structure.'
  )

  return lines.join('\n')
}
