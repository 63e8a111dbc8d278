export interface Budget {
  id: number;
  month: string; // "YYYY-MM-01"
  categoryId: number | null; // null is the overall budget
  categoryName: string | null;
  amount: number;
}

export interface BudgetInput {
  month: string;
  categoryId?: number | null;
  amount: number;
}
