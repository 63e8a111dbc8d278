import {
  addMonth,
  monthBounds,
  parseMonthParam,
  type BudgetProgress,
  type MonthSummary,
  type MonthlySummaryResponse,
} from "@kakeibo/shared";
import type { Repositories } from "../repositories";
import type { ExpenseFilter } from "../repositories/expense-repository";
import { NotFoundError } from "../utils/errors";
import { pageCount } from "./expense";

export const MONTHS_PER_PAGE = 12;
export const UNCATEGORIZED = "Uncategorized";

export class SummaryService {
  #repos: Repositories;
  #today: () => Date;

  constructor(repos: Repositories, today: () => Date = () => new Date()) {
    this.#repos = repos;
    this.#today = today;
  }

  /**
   * Expense totals per calendar month, newest first, with the income of the
   * same months alongside.
   */
  monthly(query: {
    startDate?: string;
    endDate?: string;
    q?: string;
    page?: number;
  }): MonthlySummaryResponse {
    const filter: ExpenseFilter = {
      from: query.startDate,
      to: query.endDate,
      q: query.q || undefined,
    };

    const totalPages = pageCount(this.#repos.expenses.countMonths(filter), MONTHS_PER_PAGE);
    const page = query.page ?? 1;
    if (page < 1 || page > totalPages) {
      throw new NotFoundError("Page", page);
    }

    const months = this.#repos.expenses.totalsByMonth(filter, {
      limit: MONTHS_PER_PAGE,
      offset: (page - 1) * MONTHS_PER_PAGE,
    });
    const incomes = this.#repos.incomes.totalsForMonths(months.map((m) => m.month));

    return {
      rows: months.map((m) => {
        const incomeTotal = incomes.get(m.month) ?? 0;
        return { ...m, incomeTotal, net: incomeTotal - m.total };
      }),
      grandTotal: this.#repos.expenses.sum(filter),
      page,
      totalPages,
    };
  }

  month(monthParam?: string): MonthSummary {
    const month = parseMonthParam(monthParam, this.#today());
    const { start, end } = monthBounds(month);
    const filter: ExpenseFilter = { from: start, before: end };

    const expenseTotal = this.#repos.expenses.sum(filter);
    const incomeTotal = this.#repos.incomes.sum({ start, end });
    const byCategory = this.#repos.expenses.totalsByCategory(filter).map((row) => ({
      categoryId: row.categoryId,
      name: row.name ?? UNCATEGORIZED,
      total: row.total,
    }));

    const budgets = this.#repos.budgets.listForMonth(start);
    const overall = budgets.find((b) => b.categoryId === null);

    const progress: BudgetProgress[] = byCategory.map((row) => {
      const budget = row.categoryId === null
        ? undefined
        : budgets.find((b) => b.categoryId === row.categoryId);
      return {
        categoryId: row.categoryId,
        name: row.name,
        spent: row.total,
        budget: budget?.amount ?? null,
        remaining: budget ? budget.amount - row.total : null,
      };
    });
    // Budgets that have no spending yet still show up
    for (const budget of budgets) {
      if (budget.categoryId === null) continue;
      if (byCategory.some((row) => row.categoryId === budget.categoryId)) continue;
      progress.push({
        categoryId: budget.categoryId,
        name: budget.categoryName ?? UNCATEGORIZED,
        spent: 0,
        budget: budget.amount,
        remaining: budget.amount,
      });
    }
    progress.sort(
      (a, b) =>
        Number(a.budget === null) - Number(b.budget === null) ||
        a.name.localeCompare(b.name)
    );

    return {
      month,
      prevMonth: addMonth(month, -1),
      nextMonth: addMonth(month, 1),
      expenseTotal,
      incomeTotal,
      net: incomeTotal - expenseTotal,
      overallBudget: overall?.amount ?? null,
      byCategory,
      budgetProgress: progress,
    };
  }
}
