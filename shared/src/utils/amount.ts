import type { ReceiptReconciliation } from "../types/receipt";

// Largest accepted amount; sums of many of these stay exact as numbers
export const MAX_AMOUNT = 1_000_000_000_000;

/**
 * Turns a typed amount such as "1,280" or "１，２８０円" into an integer.
 * Every character that is not an ASCII digit is dropped; an empty result is 0.
 * Numbers pass through as they are, fractions included, for the caller to
 * validate.
 */
export function parseAmount(value: string | number): number {
  if (typeof value === "number") {
    return value;
  }
  const digits = value.normalize("NFKC").replace(/[^0-9]/g, "");
  return digits ? parseInt(digits, 10) : 0;
}

export function sumAmounts(items: { amount: number }[]): number {
  return items.reduce((acc, item) => acc + item.amount, 0);
}

export function reconcileReceipt(
  declaredTotal: number,
  lineItems: { amount: number }[]
): ReceiptReconciliation {
  const lineItemTotal = sumAmounts(lineItems);
  return {
    matches: lineItemTotal === declaredTotal,
    declaredTotal,
    lineItemTotal,
    difference: declaredTotal - lineItemTotal,
  };
}
