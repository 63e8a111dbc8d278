import type { Expense, ExpenseSort } from "@kakeibo/shared";
import type { Db } from "../db/database";

type ExpenseRow = {
  id: number;
  date: string;
  item: string;
  amount: number;
  category_id: number | null;
  category_name: string | null;
  receipt_id: number | null;
};

export type ExpenseFilter = {
  from?: string; // inclusive
  to?: string; // inclusive
  before?: string; // exclusive
  q?: string;
  categoryId?: number;
};

export type ExpenseRecord = {
  date: string;
  item: string;
  amount: number;
  categoryId: number | null;
  receiptId?: number | null;
};

const toExpense = (row: ExpenseRow): Expense => ({
  id: row.id,
  date: row.date,
  item: row.item,
  amount: row.amount,
  categoryId: row.category_id,
  categoryName: row.category_name,
  receiptId: row.receipt_id,
});

const ORDER_BY: Record<ExpenseSort, string> = {
  date: "e.date ASC, e.id DESC",
  "-date": "e.date DESC, e.id DESC",
  amount: "e.amount ASC, e.id DESC",
  "-amount": "e.amount DESC, e.id DESC",
  item: "e.item ASC, e.id DESC",
  "-item": "e.item DESC, e.id DESC",
  category: "c.name ASC, e.date ASC, e.id ASC",
  "-category": "c.name DESC, e.date DESC, e.id DESC",
};

const SELECT = `SELECT e.id, e.date, e.item, e.amount, e.category_id,
    c.name AS category_name, e.receipt_id
  FROM expenses e
  LEFT JOIN categories c ON c.id = e.category_id`;

export function buildWhere(filter: ExpenseFilter): {
  clause: string;
  params: (string | number)[];
} {
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  if (filter.from) {
    conditions.push("e.date >= ?");
    params.push(filter.from);
  }
  if (filter.to) {
    conditions.push("e.date <= ?");
    params.push(filter.to);
  }
  if (filter.before) {
    conditions.push("e.date < ?");
    params.push(filter.before);
  }
  if (filter.q) {
    conditions.push("instr(lower(e.item), lower(?)) > 0");
    params.push(filter.q);
  }
  if (filter.categoryId !== undefined) {
    conditions.push("e.category_id = ?");
    params.push(filter.categoryId);
  }

  return {
    clause: conditions.length ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

export class ExpenseRepository {
  #db: Db;

  constructor(db: Db) {
    this.#db = db;
  }

  get(id: number): Expense | null {
    const row = this.#db
      .prepare<[number], ExpenseRow>(`${SELECT} WHERE e.id = ?`)
      .get(id);
    return row ? toExpense(row) : null;
  }

  list(
    filter: ExpenseFilter,
    sort: ExpenseSort,
    page?: { limit: number; offset: number }
  ): Expense[] {
    const { clause, params } = buildWhere(filter);
    const limit = page ? "LIMIT ? OFFSET ?" : "";
    const args = page ? [...params, page.limit, page.offset] : params;
    return this.#db
      .prepare<(string | number)[], ExpenseRow>(
        `${SELECT} ${clause} ORDER BY ${ORDER_BY[sort]} ${limit}`
      )
      .all(...args)
      .map(toExpense);
  }

  count(filter: ExpenseFilter): number {
    const { clause, params } = buildWhere(filter);
    const row = this.#db
      .prepare<(string | number)[], { n: number }>(
        `SELECT COUNT(*) AS n FROM expenses e ${clause}`
      )
      .get(...params);
    return row?.n ?? 0;
  }

  sum(filter: ExpenseFilter): number {
    const { clause, params } = buildWhere(filter);
    const row = this.#db
      .prepare<(string | number)[], { total: number }>(
        `SELECT COALESCE(SUM(e.amount), 0) AS total FROM expenses e ${clause}`
      )
      .get(...params);
    return row?.total ?? 0;
  }

  totalsByMonth(
    filter: ExpenseFilter,
    page: { limit: number; offset: number }
  ): { month: string; total: number; count: number }[] {
    const { clause, params } = buildWhere(filter);
    return this.#db
      .prepare<(string | number)[], { month: string; total: number; count: number }>(
        `SELECT substr(e.date, 1, 7) AS month, SUM(e.amount) AS total, COUNT(e.id) AS count
         FROM expenses e ${clause}
         GROUP BY month
         ORDER BY month DESC
         LIMIT ? OFFSET ?`
      )
      .all(...params, page.limit, page.offset);
  }

  countMonths(filter: ExpenseFilter): number {
    const { clause, params } = buildWhere(filter);
    const row = this.#db
      .prepare<(string | number)[], { n: number }>(
        `SELECT COUNT(DISTINCT substr(e.date, 1, 7)) AS n FROM expenses e ${clause}`
      )
      .get(...params);
    return row?.n ?? 0;
  }

  totalsByCategory(
    filter: ExpenseFilter
  ): { categoryId: number | null; name: string | null; total: number }[] {
    const { clause, params } = buildWhere(filter);
    return this.#db
      .prepare<
        (string | number)[],
        { categoryId: number | null; name: string | null; total: number }
      >(
        `SELECT e.category_id AS categoryId, c.name AS name, SUM(e.amount) AS total
         FROM expenses e
         LEFT JOIN categories c ON c.id = e.category_id
         ${clause}
         GROUP BY e.category_id
         ORDER BY total DESC, name ASC`
      )
      .all(...params);
  }

  create(record: ExpenseRecord): number {
    const info = this.#db
      .prepare<[string, string, number, number | null, number | null]>(
        `INSERT INTO expenses (date, item, amount, category_id, receipt_id)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        record.date,
        record.item,
        record.amount,
        record.categoryId,
        record.receiptId ?? null
      );
    return Number(info.lastInsertRowid);
  }

  update(id: number, record: ExpenseRecord): boolean {
    const info = this.#db
      .prepare<[string, string, number, number | null, number]>(
        `UPDATE expenses SET date = ?, item = ?, amount = ?, category_id = ?
         WHERE id = ?`
      )
      .run(record.date, record.item, record.amount, record.categoryId, id);
    return info.changes > 0;
  }

  delete(id: number): boolean {
    const info = this.#db
      .prepare<[number]>("DELETE FROM expenses WHERE id = ?")
      .run(id);
    return info.changes > 0;
  }

  deleteMany(ids: number[]): number {
    if (!ids.length) return 0;
    const placeholders = ids.map(() => "?").join(", ");
    const info = this.#db
      .prepare<number[]>(`DELETE FROM expenses WHERE id IN (${placeholders})`)
      .run(...ids);
    return info.changes;
  }
}
