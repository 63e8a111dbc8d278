export interface MonthlySummaryRow {
  month: string; // "YYYY-MM"
  total: number;
  count: number;
  incomeTotal: number;
  net: number;
}

export interface MonthlySummaryResponse {
  rows: MonthlySummaryRow[];
  grandTotal: number;
  page: number;
  totalPages: number;
}

export interface CategoryTotal {
  categoryId: number | null;
  name: string;
  total: number;
}

export interface BudgetProgress {
  categoryId: number | null;
  name: string;
  spent: number;
  budget: number | null;
  remaining: number | null;
}

export interface MonthSummary {
  month: string;
  prevMonth: string;
  nextMonth: string;
  expenseTotal: number;
  incomeTotal: number;
  net: number;
  overallBudget: number | null;
  byCategory: CategoryTotal[];
  budgetProgress: BudgetProgress[];
}
