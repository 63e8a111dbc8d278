import { describe, expect, it } from 'vitest'
import { errorMessage } from './api'

describe('errorMessage', () => {
  it('uses the error string of a route error', () => {
    expect(errorMessage({ error: 'Receipt 4 not found' }, 404)).toBe('Receipt 4 not found')
  })

  it('uses the first zod issue of a validation error', () => {
    const body = {
      success: false,
      error: { name: 'ZodError', issues: [{ path: ['amount'], message: 'Amount must be 1 or more' }] },
    }
    expect(errorMessage(body, 400)).toBe('Amount must be 1 or more')
  })

  it('falls back to the status', () => {
    expect(errorMessage(null, 502)).toBe('HTTP 502')
    expect(errorMessage({ error: { issues: [] } }, 400)).toBe('HTTP 400')
  })
})
