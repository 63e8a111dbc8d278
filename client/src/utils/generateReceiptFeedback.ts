import type { ReceiptReconciliation } from '@kakeibo/shared'
import { formatYen } from './formatYen'

/**
 * Summarizes how the line items compare with the declared receipt total.
 * A receipt can only be saved once the two are equal, so a mismatch says
 * which way the line items are off.
 */
export function generateReceiptFeedback(check: ReceiptReconciliation, itemCount: number): string {
  const items = itemCount === 1 ? '1 item' : `${itemCount} items`

  if (check.matches) {
    return `✓ ${items} totaling ${formatYen(check.lineItemTotal)} = Total ${formatYen(check.declaredTotal)}`
  }

  let feedback = `⚠️ Discrepancy: Items ${formatYen(check.lineItemTotal)} ≠ Total ${formatYen(check.declaredTotal)}`
  if (check.difference > 0) {
    feedback += `\n• ${formatYen(check.difference)} of the total is not covered by line items`
  } else {
    feedback += `\n• Line items exceed the total by ${formatYen(-check.difference)}`
  }
  return feedback
}
