export interface Expense {
  id: number;
  date: string; // "YYYY-MM-DD"
  item: string;
  amount: number;
  categoryId: number | null;
  categoryName: string | null;
  receiptId: number | null;
}

export interface ExpenseInput {
  date: string;
  item: string;
  amount: number;
  categoryId?: number | null;
}

export const EXPENSE_SORTS = [
  "date",
  "-date",
  "amount",
  "-amount",
  "item",
  "-item",
  "category",
  "-category",
] as const;

export type ExpenseSort = (typeof EXPENSE_SORTS)[number];

export interface ExpenseListResponse {
  items: Expense[];
  page: number;
  perPage: number | null;
  totalCount: number;
  totalPages: number;
  month: string;
  prevMonth: string;
  nextMonth: string;
  isAll: boolean;
}
