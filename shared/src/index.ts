export type { ApiError, Paginated } from "./types/api";
export type { Budget, BudgetInput } from "./types/budget";
export type { Category, CategoryGuess, CategoryRule } from "./types/category";
export type {
  Expense,
  ExpenseInput,
  ExpenseListResponse,
  ExpenseSort,
} from "./types/expense";
export { EXPENSE_SORTS } from "./types/expense";
export type { Income, IncomeInput } from "./types/income";
export type {
  Receipt,
  ReceiptLineItem,
  ReceiptLineItemInput,
  ReceiptReconciliation,
} from "./types/receipt";
export type {
  BudgetProgress,
  CategoryTotal,
  MonthSummary,
  MonthlySummaryResponse,
  MonthlySummaryRow,
} from "./types/summary";
export * from "./utils/month";
export * from "./utils/amount";
