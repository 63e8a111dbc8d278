import {
  addMonth,
  monthBounds,
  parseMonthParam,
  type Expense,
  type ExpenseInput,
  type ExpenseListResponse,
  type ExpenseSort,
} from "@kakeibo/shared";
import type { Repositories } from "../repositories";
import type { ExpenseFilter } from "../repositories/expense-repository";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { CategoryService } from "./category";

export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 500;

export type ExpenseListQuery = {
  month?: string;
  view?: string;
  page?: number;
  perPage?: number;
  startDate?: string;
  endDate?: string;
  q?: string;
  categoryId?: number;
  sort?: ExpenseSort;
};

export const clampPerPage = (perPage: number | undefined): number =>
  perPage === undefined ? DEFAULT_PER_PAGE : Math.max(1, Math.min(MAX_PER_PAGE, perPage));

export const pageCount = (count: number, perPage: number): number =>
  Math.max(1, Math.ceil(count / perPage));

export class ExpenseService {
  #repos: Repositories;
  #categories: CategoryService;
  #today: () => Date;

  constructor(
    repos: Repositories,
    categories: CategoryService,
    today: () => Date = () => new Date()
  ) {
    this.#repos = repos;
    this.#categories = categories;
    this.#today = today;
  }

  list(query: ExpenseListQuery): ExpenseListResponse {
    const month = parseMonthParam(query.month, this.#today());
    const isAll = query.view?.toLowerCase() === "all";
    const hasExplicitRange = Boolean(query.startDate || query.endDate);

    const filter: ExpenseFilter = {
      from: query.startDate,
      to: query.endDate,
      q: query.q || undefined,
      categoryId: query.categoryId,
    };
    // The month only narrows the list when no explicit range is given
    if (!isAll && !hasExplicitRange) {
      const { start, end } = monthBounds(month);
      filter.from = start;
      filter.before = end;
    }

    const sort = query.sort ?? "-date";
    const totalCount = this.#repos.expenses.count(filter);
    const perPage = isAll ? null : clampPerPage(query.perPage);
    const totalPages = perPage ? pageCount(totalCount, perPage) : 1;
    const page = query.page ?? 1;
    if (page < 1 || page > totalPages) {
      throw new NotFoundError("Page", page);
    }

    const items = this.#repos.expenses.list(
      filter,
      sort,
      perPage ? { limit: perPage, offset: (page - 1) * perPage } : undefined
    );

    logger.debug("Listed expenses", { month, isAll, page, totalCount });
    return {
      items,
      page,
      perPage,
      totalCount,
      totalPages,
      month,
      prevMonth: addMonth(month, -1),
      nextMonth: addMonth(month, 1),
      isAll,
    };
  }

  get(id: number): Expense {
    const expense = this.#repos.expenses.get(id);
    if (!expense) {
      throw new NotFoundError("Expense", id);
    }
    return expense;
  }

  #categoryFor(input: ExpenseInput): number | null {
    const chosen = this.#categories.resolve(input.categoryId);
    return this.#categories.guess(input.item, "", chosen)?.id ?? null;
  }

  create(input: ExpenseInput): Expense {
    const id = this.#repos.expenses.create({
      date: input.date,
      item: input.item.trim(),
      amount: input.amount,
      categoryId: this.#categoryFor(input),
    });
    logger.info("Created expense", { id, date: input.date, amount: input.amount });
    return this.get(id);
  }

  update(id: number, input: ExpenseInput): Expense {
    this.get(id);
    this.#repos.expenses.update(id, {
      date: input.date,
      item: input.item.trim(),
      amount: input.amount,
      categoryId: this.#categoryFor(input),
    });
    logger.info("Updated expense", { id });
    return this.get(id);
  }

  delete(id: number): { month: string } {
    const expense = this.get(id);
    this.#repos.expenses.delete(id);
    logger.info("Deleted expense", { id });
    return { month: expense.date.slice(0, 7) };
  }

  bulkDelete(ids: number[]): number {
    if (!ids.length) {
      logger.info("Bulk delete called without ids");
      return 0;
    }
    const deleted = this.#repos.transaction(() =>
      this.#repos.expenses.deleteMany(ids)
    );
    logger.info("Bulk deleted expenses", { requested: ids.length, deleted });
    return deleted;
  }
}
