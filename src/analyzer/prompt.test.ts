import { describe, expect, it } from 'vitest'
import type { InvoiceAnalysisRequest } from '../types'
import { buildAnalysisPrompt, groupLineItems } from './prompt'

const invoice: InvoiceAnalysisRequest = {
  vendor: 'Microsoft',
  invoiceDate: '2024-01-15',
  totalAmount: 5000,
  lineItems: [
    { description: 'Office 365 E3', quantity: 10, unitPrice: 32, totalAmount: 320, category: 'productivity' },
    { description: 'Azure Credits', quantity: 1, unitPrice: 4680, totalAmount: 4680, category: 'cloud' },
    { description: 'Support', quantity: 1, unitPrice: 0, totalAmount: 0 }
  ]
}

describe('groupLineItems', () => {
  it('groups by category in first-seen order', () => {
    const groups = groupLineItems(invoice.lineItems)

    expect([...groups.keys()]).toEqual(['productivity', 'cloud', 'uncategorized'])
    expect(groups.get('cloud')?.total).toBe(4680)
  })

  it('treats blank categories as uncategorized', () => {
    const groups = groupLineItems([{ description: 'Misc', quantity: 2, unitPrice: 5, totalAmount: 10, category: '  ' }])

    expect(groups.get('uncategorized')?.total).toBe(10)
  })
})

describe('buildAnalysisPrompt', () => {
  it('lists the invoice header and each category', () => {
    const lines = buildAnalysisPrompt(invoice).split('\n')

    expect(lines).toContain('VENDOR: Microsoft')
    expect(lines).toContain('INVOICE DATE: 2024-01-15')
    expect(lines).toContain('TOTAL AMOUNT: $5,000.00')
    expect(lines).toContain('PRODUCTIVITY ($320.00):')
    expect(lines).toContain('  - Office 365 E3: 10 x $32.00 = $320.00')
    expect(lines).toContain('CLOUD ($4,680.00):')
    expect(lines).toContain('  - Azure Credits: 1 x $4,680.00 = $4,680.00')
    expect(lines).toContain('UNCATEGORIZED ($0.00):')
  })

  it('includes bill-to and currency when present', () => {
    const lines = buildAnalysisPrompt({ ...invoice, billTo: 'Contoso Ltd', currency: 'EUR' }).split('\n')

    expect(lines).toContain('BILL TO: Contoso Ltd')
    expect(lines).toContain('TOTAL AMOUNT: $5,000.00 EUR')
  })

  it('omits bill-to when absent', () => {
    expect(buildAnalysisPrompt(invoice)).not.toContain('BILL TO:')
  })

  it('ends with the JSON-only instruction', () => {
    const lines = buildAnalysisPrompt(invoice).split('\n')

    expect(lines.at(-1)).toBe('Provide only valid JSON. No explanatory text outside the JSON structure.')
  })
})
