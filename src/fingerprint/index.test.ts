import { describe, expect, it } from 'vitest'
import type { InvoiceAnalysisRequest } from '../types'
import { fingerprintRequest, isFingerprint, MalformedRequestError } from './index'

const r1: InvoiceAnalysisRequest = {
  vendor: 'Microsoft',
  invoiceDate: '2024-01-15',
  totalAmount: 5000.0,
  lineItems: [
    { description: 'Office 365 E3 License', quantity: 10, unitPrice: 32.0, totalAmount: 320.0 },
    { description: 'Azure Cloud Services', quantity: 1, unitPrice: 4680.0, totalAmount: 4680.0 }
  ]
}

describe('fingerprintRequest', () => {
  it('returns a 64 char hex digest', () => {
    const key = fingerprintRequest(r1)
    expect(key).toMatch(/^[0-9a-f]{64}$/)
    expect(isFingerprint(key)).toBe(true)
  })

  it('is stable across repeated calls', () => {
    expect(fingerprintRequest(r1)).toBe(fingerprintRequest(r1))
  })

  it('ignores field insertion order', () => {
    const reordered = {
      lineItems: r1.lineItems.map((item) => ({
        totalAmount: item.totalAmount,
        unitPrice: item.unitPrice,
        quantity: item.quantity,
        description: item.description
      })),
      totalAmount: r1.totalAmount,
      invoiceDate: r1.invoiceDate,
      vendor: r1.vendor
    }
    expect(fingerprintRequest(reordered)).toBe(fingerprintRequest(r1))
  })

  it('ignores line item order', () => {
    const swapped = { ...r1, lineItems: [...r1.lineItems].reverse() }
    expect(fingerprintRequest(swapped)).toBe(fingerprintRequest(r1))
  })

  it('treats vendor case and surrounding whitespace as insignificant', () => {
    expect(fingerprintRequest({ ...r1, vendor: '  MICROSOFT ' })).toBe(fingerprintRequest(r1))
  })

  it('distinguishes different vendors', () => {
    expect(fingerprintRequest({ ...r1, vendor: 'Adobe' })).not.toBe(fingerprintRequest(r1))
  })

  it('distinguishes amounts that differ by a cent', () => {
    expect(fingerprintRequest({ ...r1, totalAmount: 5000.01 })).not.toBe(fingerprintRequest(r1))
  })

  it('distinguishes different quantities', () => {
    const changed = {
      ...r1,
      lineItems: [{ ...r1.lineItems[0], quantity: 11 }, r1.lineItems[1]]
    }
    expect(fingerprintRequest(changed)).not.toBe(fingerprintRequest(r1))
  })

  it('distinguishes requests with and without metadata', () => {
    expect(fingerprintRequest({ ...r1, metadata: { batch: 'q1' } })).not.toBe(
      fingerprintRequest(r1)
    )
  })

  describe('malformed requests', () => {
    it('rejects a missing vendor', () => {
      const { vendor: _vendor, ...rest } = r1
      expect(() => fingerprintRequest(rest)).toThrow(MalformedRequestError)
    })

    it('rejects a blank vendor', () => {
      expect(() => fingerprintRequest({ ...r1, vendor: '   ' })).toThrow('vendor: must not be blank')
    })

    it('rejects a non-numeric amount', () => {
      expect(() => fingerprintRequest({ ...r1, totalAmount: '5000' })).toThrow('totalAmount')
    })

    it('rejects line items that are not an array', () => {
      expect(() => fingerprintRequest({ ...r1, lineItems: {} })).toThrow('lineItems')
    })

    it('rejects a line item missing its unit price', () => {
      const broken = {
        ...r1,
        lineItems: [{ description: 'Seat', quantity: 1, totalAmount: 10 }]
      }
      expect(() => fingerprintRequest(broken)).toThrow('lineItems.0.unitPrice')
    })

    it('rejects unknown top-level fields', () => {
      expect(() => fingerprintRequest({ ...r1, invoice_date: '2024-01-15' })).toThrow(
        MalformedRequestError
      )
    })

    it('lists every failing field', () => {
      try {
        fingerprintRequest({ vendor: 'Acme' })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedRequestError)
        if (error instanceof MalformedRequestError) {
          expect(error.issues).toHaveLength(3)
        }
      }
    })
  })
})
