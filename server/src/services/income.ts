import {
  monthBounds,
  type Income,
  type IncomeInput,
  type Paginated,
} from "@kakeibo/shared";
import type { Repositories } from "../repositories";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { DEFAULT_PER_PAGE, pageCount } from "./expense";

export class IncomeService {
  #repos: Repositories;

  constructor(repos: Repositories) {
    this.#repos = repos;
  }

  list(query: { month?: string; page?: number }): Paginated<Income> {
    const range = query.month ? monthBounds(query.month) : null;
    const totalPages = pageCount(this.#repos.incomes.count(range), DEFAULT_PER_PAGE);
    const page = query.page ?? 1;
    if (page < 1 || page > totalPages) {
      throw new NotFoundError("Page", page);
    }
    const items = this.#repos.incomes.list(
      range,
      DEFAULT_PER_PAGE,
      (page - 1) * DEFAULT_PER_PAGE
    );
    return { items, page, totalPages };
  }

  get(id: number): Income {
    const income = this.#repos.incomes.get(id);
    if (!income) {
      throw new NotFoundError("Income", id);
    }
    return income;
  }

  create(input: IncomeInput): Income {
    const id = this.#repos.incomes.create({
      date: input.date,
      source: input.source.trim(),
      amount: input.amount,
      note: input.note?.trim() ?? "",
    });
    logger.info("Created income", { id, date: input.date, amount: input.amount });
    return this.get(id);
  }

  update(id: number, input: IncomeInput): Income {
    this.get(id);
    this.#repos.incomes.update(id, {
      date: input.date,
      source: input.source.trim(),
      amount: input.amount,
      note: input.note?.trim() ?? "",
    });
    return this.get(id);
  }

  delete(id: number): void {
    if (!this.#repos.incomes.delete(id)) {
      throw new NotFoundError("Income", id);
    }
    logger.info("Deleted income", { id });
  }
}
