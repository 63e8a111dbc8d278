import type { Receipt, ReceiptLineItem } from "@kakeibo/shared";
import type { Db } from "../db/database";
import type { DateRange } from "./income-repository";

type ReceiptRow = {
  id: number;
  date: string;
  store_name: string | null;
  total: number;
  image_path: string;
  image_type: string;
  created_at: string;
};

type ItemRow = {
  position: number;
  item: string;
  amount: number;
  category_id: number | null;
  category_name: string | null;
  expense_id: number | null;
};

export type ReceiptRecord = {
  date: string;
  storeName: string | null;
  total: number;
  imagePath: string;
  imageType: string;
};

export type ReceiptItemRecord = {
  position: number;
  item: string;
  amount: number;
  categoryId: number | null;
  expenseId: number;
};

const toItem = (row: ItemRow): ReceiptLineItem => ({
  position: row.position,
  item: row.item,
  amount: row.amount,
  categoryId: row.category_id,
  categoryName: row.category_name,
  expenseId: row.expense_id,
});

const SELECT =
  "SELECT id, date, store_name, total, image_path, image_type, created_at FROM receipts";

export class ReceiptRepository {
  #db: Db;

  constructor(db: Db) {
    this.#db = db;
  }

  #items(receiptId: number): ReceiptLineItem[] {
    return this.#db
      .prepare<[number], ItemRow>(
        `SELECT i.position, i.item, i.amount, i.category_id,
           c.name AS category_name, i.expense_id
         FROM receipt_items i
         LEFT JOIN categories c ON c.id = i.category_id
         WHERE i.receipt_id = ?
         ORDER BY i.position`
      )
      .all(receiptId)
      .map(toItem);
  }

  #toReceipt(row: ReceiptRow): Receipt {
    return {
      id: row.id,
      date: row.date,
      storeName: row.store_name,
      total: row.total,
      imageType: row.image_type,
      createdAt: row.created_at,
      lineItems: this.#items(row.id),
    };
  }

  get(id: number): Receipt | null {
    const row = this.#db
      .prepare<[number], ReceiptRow>(`${SELECT} WHERE id = ?`)
      .get(id);
    return row ? this.#toReceipt(row) : null;
  }

  image(id: number): { path: string; type: string } | null {
    const row = this.#db
      .prepare<[number], { path: string; type: string }>(
        "SELECT image_path AS path, image_type AS type FROM receipts WHERE id = ?"
      )
      .get(id);
    return row ?? null;
  }

  list(range: DateRange | null): Receipt[] {
    const rows = range
      ? this.#db
          .prepare<[string, string], ReceiptRow>(
            `${SELECT} WHERE date >= ? AND date < ? ORDER BY date DESC, id DESC`
          )
          .all(range.start, range.end)
      : this.#db
          .prepare<[], ReceiptRow>(`${SELECT} ORDER BY date DESC, id DESC`)
          .all();
    return rows.map((row) => this.#toReceipt(row));
  }

  create(record: ReceiptRecord): number {
    const info = this.#db
      .prepare<[string, string | null, number, string, string]>(
        `INSERT INTO receipts (date, store_name, total, image_path, image_type)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        record.date,
        record.storeName,
        record.total,
        record.imagePath,
        record.imageType
      );
    return Number(info.lastInsertRowid);
  }

  addItem(receiptId: number, item: ReceiptItemRecord): void {
    this.#db
      .prepare<[number, number, string, number, number | null, number]>(
        `INSERT INTO receipt_items (receipt_id, position, item, amount, category_id, expense_id)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        receiptId,
        item.position,
        item.item,
        item.amount,
        item.categoryId,
        item.expenseId
      );
  }

  delete(id: number): boolean {
    const info = this.#db
      .prepare<[number]>("DELETE FROM receipts WHERE id = ?")
      .run(id);
    return info.changes > 0;
  }
}
