import type { Income } from "@kakeibo/shared";
import type { Db } from "../db/database";

export type IncomeRecord = Omit<Income, "id">;

export type DateRange = { start: string; end: string };

const SELECT = "SELECT id, date, source, amount, note FROM incomes";

export class IncomeRepository {
  #db: Db;

  constructor(db: Db) {
    this.#db = db;
  }

  get(id: number): Income | null {
    return (
      this.#db.prepare<[number], Income>(`${SELECT} WHERE id = ?`).get(id) ?? null
    );
  }

  list(range: DateRange | null, limit: number, offset: number): Income[] {
    if (range) {
      return this.#db
        .prepare<[string, string, number, number], Income>(
          `${SELECT} WHERE date >= ? AND date < ?
           ORDER BY date DESC, id DESC LIMIT ? OFFSET ?`
        )
        .all(range.start, range.end, limit, offset);
    }
    return this.#db
      .prepare<[number, number], Income>(
        `${SELECT} ORDER BY date DESC, id DESC LIMIT ? OFFSET ?`
      )
      .all(limit, offset);
  }

  count(range: DateRange | null): number {
    const row = range
      ? this.#db
          .prepare<[string, string], { n: number }>(
            "SELECT COUNT(*) AS n FROM incomes WHERE date >= ? AND date < ?"
          )
          .get(range.start, range.end)
      : this.#db
          .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM incomes")
          .get();
    return row?.n ?? 0;
  }

  sum(range: DateRange): number {
    const row = this.#db
      .prepare<[string, string], { total: number }>(
        "SELECT COALESCE(SUM(amount), 0) AS total FROM incomes WHERE date >= ? AND date < ?"
      )
      .get(range.start, range.end);
    return row?.total ?? 0;
  }

  totalsForMonths(months: string[]): Map<string, number> {
    if (!months.length) return new Map();
    const placeholders = months.map(() => "?").join(", ");
    const rows = this.#db
      .prepare<string[], { month: string; total: number }>(
        `SELECT substr(date, 1, 7) AS month, SUM(amount) AS total
         FROM incomes
         WHERE substr(date, 1, 7) IN (${placeholders})
         GROUP BY month`
      )
      .all(...months);
    return new Map(rows.map((r) => [r.month, r.total]));
  }

  create(record: IncomeRecord): number {
    const info = this.#db
      .prepare<[string, string, number, string]>(
        "INSERT INTO incomes (date, source, amount, note) VALUES (?, ?, ?, ?)"
      )
      .run(record.date, record.source, record.amount, record.note);
    return Number(info.lastInsertRowid);
  }

  update(id: number, record: IncomeRecord): boolean {
    const info = this.#db
      .prepare<[string, string, number, string, number]>(
        "UPDATE incomes SET date = ?, source = ?, amount = ?, note = ? WHERE id = ?"
      )
      .run(record.date, record.source, record.amount, record.note, id);
    return info.changes > 0;
  }

  delete(id: number): boolean {
    const info = this.#db
      .prepare<[number]>("DELETE FROM incomes WHERE id = ?")
      .run(id);
    return info.changes > 0;
  }
}
