import type { ReceiptLineItem } from '@kakeibo/shared'
import { formatYen } from './formatYen'

export function formatLineItems(lineItems: ReceiptLineItem[] = []) {
  return lineItems
    .map(
      (item) => `  - ${item.item}: ${formatYen(item.amount)} (${item.categoryName ?? 'Uncategorized'})`
    )
    .join('\n')
}
