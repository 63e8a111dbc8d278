import type { Budget } from "@kakeibo/shared";
import type { Db } from "../db/database";

type BudgetRow = {
  id: number;
  month: string;
  category_id: number | null;
  category_name: string | null;
  amount: number;
};

export type BudgetRecord = {
  month: string;
  categoryId: number | null;
  amount: number;
};

const toBudget = (row: BudgetRow): Budget => ({
  id: row.id,
  month: row.month,
  categoryId: row.category_id,
  categoryName: row.category_name,
  amount: row.amount,
});

const SELECT = `SELECT b.id, b.month, b.category_id, c.name AS category_name, b.amount
  FROM budgets b
  LEFT JOIN categories c ON c.id = b.category_id`;

export class BudgetRepository {
  #db: Db;

  constructor(db: Db) {
    this.#db = db;
  }

  get(id: number): Budget | null {
    const row = this.#db
      .prepare<[number], BudgetRow>(`${SELECT} WHERE b.id = ?`)
      .get(id);
    return row ? toBudget(row) : null;
  }

  // The overall budget (no category) sorts first
  listForMonth(month: string): Budget[] {
    return this.#db
      .prepare<[string], BudgetRow>(
        `${SELECT} WHERE b.month = ?
         ORDER BY b.category_id IS NOT NULL, c.name ASC, b.id ASC`
      )
      .all(month)
      .map(toBudget);
  }

  exists(month: string, categoryId: number | null, excludeId?: number): boolean {
    const row = this.#db
      .prepare<[string, number, number], { n: number }>(
        `SELECT COUNT(*) AS n FROM budgets
         WHERE month = ? AND IFNULL(category_id, 0) = ? AND id != ?`
      )
      .get(month, categoryId ?? 0, excludeId ?? -1);
    return (row?.n ?? 0) > 0;
  }

  create(record: BudgetRecord): number {
    const info = this.#db
      .prepare<[string, number | null, number]>(
        "INSERT INTO budgets (month, category_id, amount) VALUES (?, ?, ?)"
      )
      .run(record.month, record.categoryId, record.amount);
    return Number(info.lastInsertRowid);
  }

  update(id: number, record: BudgetRecord): boolean {
    const info = this.#db
      .prepare<[string, number | null, number, number]>(
        "UPDATE budgets SET month = ?, category_id = ?, amount = ? WHERE id = ?"
      )
      .run(record.month, record.categoryId, record.amount, id);
    return info.changes > 0;
  }

  delete(id: number): boolean {
    const info = this.#db
      .prepare<[number]>("DELETE FROM budgets WHERE id = ?")
      .run(id);
    return info.changes > 0;
  }
}
