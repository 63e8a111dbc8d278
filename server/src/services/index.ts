import type { Repositories } from "../repositories";
import { BudgetService } from "./budget";
import { CategoryService } from "./category";
import { ExpenseService } from "./expense";
import { IncomeService } from "./income";
import { ReceiptService } from "./receipt";
import type { StorageService } from "./storage";
import { SummaryService } from "./summary";

export type Services = {
  categories: CategoryService;
  expenses: ExpenseService;
  incomes: IncomeService;
  budgets: BudgetService;
  receipts: ReceiptService;
  summary: SummaryService;
};

export function createServices(
  repos: Repositories,
  storage: StorageService,
  today: () => Date = () => new Date()
): Services {
  const categories = new CategoryService(repos);
  return {
    categories,
    expenses: new ExpenseService(repos, categories, today),
    incomes: new IncomeService(repos),
    budgets: new BudgetService(repos, categories, today),
    receipts: new ReceiptService(repos, categories, storage),
    summary: new SummaryService(repos, today),
  };
}
