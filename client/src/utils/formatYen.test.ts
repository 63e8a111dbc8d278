import { describe, expect, it } from 'vitest'
import { formatYen } from './formatYen'

describe('formatYen', () => {
  it('groups thousands', () => {
    expect(formatYen(0)).toBe('¥0')
    expect(formatYen(1280)).toBe('¥1,280')
    expect(formatYen(1234567)).toBe('¥1,234,567')
  })

  it('puts the sign before the symbol', () => {
    expect(formatYen(-300)).toBe('-¥300')
  })
})
