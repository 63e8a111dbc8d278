import type { Db } from "../db/database";
import { BudgetRepository } from "./budget-repository";
import { CategoryRepository } from "./category-repository";
import { ExpenseRepository } from "./expense-repository";
import { IncomeRepository } from "./income-repository";
import { ReceiptRepository } from "./receipt-repository";

export type Repositories = {
  categories: CategoryRepository;
  expenses: ExpenseRepository;
  incomes: IncomeRepository;
  budgets: BudgetRepository;
  receipts: ReceiptRepository;
  transaction: <T>(fn: () => T) => T;
};

export function createRepositories(db: Db): Repositories {
  return {
    categories: new CategoryRepository(db),
    expenses: new ExpenseRepository(db),
    incomes: new IncomeRepository(db),
    budgets: new BudgetRepository(db),
    receipts: new ReceiptRepository(db),
    transaction: (fn) => db.transaction(fn)(),
  };
}
