import { describe, expect, it } from 'vitest'
import { reconcileReceipt } from '@kakeibo/shared'
import { generateReceiptFeedback } from './generateReceiptFeedback'
import { formatLineItems } from './formatLineItems'

describe('generateReceiptFeedback', () => {
  it('confirms matching totals', () => {
    const check = reconcileReceipt(1280, [{ amount: 1000 }, { amount: 280 }])
    expect(generateReceiptFeedback(check, 2)).toBe('✓ 2 items totaling ¥1,280 = Total ¥1,280')
  })

  it('says how much of the total is missing', () => {
    const check = reconcileReceipt(1500, [{ amount: 1280 }])
    expect(generateReceiptFeedback(check, 1)).toBe(
      '⚠️ Discrepancy: Items ¥1,280 ≠ Total ¥1,500\n• ¥220 of the total is not covered by line items'
    )
  })

  it('says how far the line items overshoot', () => {
    const check = reconcileReceipt(1000, [{ amount: 700 }, { amount: 500 }])
    expect(generateReceiptFeedback(check, 2)).toBe(
      '⚠️ Discrepancy: Items ¥1,200 ≠ Total ¥1,000\n• Line items exceed the total by ¥200'
    )
  })
})

describe('formatLineItems', () => {
  it('lists each line with its category', () => {
    expect(
      formatLineItems([
        { position: 1, item: 'Rice', amount: 1980, categoryId: 1, categoryName: 'Food', expenseId: 1 },
        { position: 2, item: 'Sponge', amount: 200, categoryId: null, categoryName: null, expenseId: 2 },
      ])
    ).toBe('  - Rice: ¥1,980 (Food)\n  - Sponge: ¥200 (Uncategorized)')
  })
})
