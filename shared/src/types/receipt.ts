export interface Receipt {
  id: number;
  date: string;
  storeName: string | null;
  total: number;
  imageType: string;
  createdAt: string;
  lineItems: ReceiptLineItem[];
}

export interface ReceiptLineItem {
  position: number;
  item: string;
  amount: number;
  categoryId: number | null;
  categoryName: string | null;
  expenseId: number | null;
}

export interface ReceiptLineItemInput {
  item: string;
  amount: number;
  categoryId?: number | null;
}

// Outcome of comparing the declared total with the sum of the line items
export interface ReceiptReconciliation {
  matches: boolean;
  declaredTotal: number;
  lineItemTotal: number;
  difference: number;
}
