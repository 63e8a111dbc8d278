import {
  firstDayOfMonth,
  parseMonthParam,
  type Budget,
  type BudgetInput,
} from "@kakeibo/shared";
import type { Repositories } from "../repositories";
import { ConflictError, NotFoundError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { CategoryService } from "./category";

export class BudgetService {
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

  listForMonth(month?: string): { month: string; items: Budget[] } {
    const current = parseMonthParam(month, this.#today());
    return {
      month: current,
      items: this.#repos.budgets.listForMonth(`${current}-01`),
    };
  }

  get(id: number): Budget {
    const budget = this.#repos.budgets.get(id);
    if (!budget) {
      throw new NotFoundError("Budget", id);
    }
    return budget;
  }

  #validate(input: BudgetInput, excludeId?: number) {
    const month = firstDayOfMonth(input.month);
    if (!month) {
      throw new ValidationError(`Invalid month "${input.month}"`);
    }
    const category = this.#categories.resolve(input.categoryId);
    const categoryId = category?.id ?? null;

    if (this.#repos.budgets.exists(month, categoryId, excludeId)) {
      const label = category ? category.name : "overall";
      throw new ConflictError(
        `A budget for ${month.slice(0, 7)} (${label}) already exists`
      );
    }
    return { month, categoryId, amount: input.amount };
  }

  create(input: BudgetInput): Budget {
    const id = this.#repos.budgets.create(this.#validate(input));
    logger.info("Created budget", { id, month: input.month });
    return this.get(id);
  }

  update(id: number, input: BudgetInput): Budget {
    this.get(id);
    this.#repos.budgets.update(id, this.#validate(input, id));
    return this.get(id);
  }

  delete(id: number): { month: string } {
    const budget = this.get(id);
    this.#repos.budgets.delete(id);
    logger.info("Deleted budget", { id });
    return { month: budget.month.slice(0, 7) };
  }
}
