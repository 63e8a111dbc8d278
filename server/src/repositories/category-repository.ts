import type { Category, CategoryRule } from "@kakeibo/shared";
import type { Db } from "../db/database";

type RuleRow = {
  id: number;
  keyword: string;
  category_id: number;
  category_name: string;
};

const toRule = (row: RuleRow): CategoryRule => ({
  id: row.id,
  keyword: row.keyword,
  categoryId: row.category_id,
  categoryName: row.category_name,
});

export class CategoryRepository {
  #db: Db;

  constructor(db: Db) {
    this.#db = db;
  }

  list(): Category[] {
    return this.#db
      .prepare<[], Category>("SELECT id, name FROM categories ORDER BY name, id")
      .all();
  }

  get(id: number): Category | null {
    return (
      this.#db
        .prepare<[number], Category>("SELECT id, name FROM categories WHERE id = ?")
        .get(id) ?? null
    );
  }

  findByName(name: string): Category | null {
    return (
      this.#db
        .prepare<[string], Category>("SELECT id, name FROM categories WHERE name = ?")
        .get(name) ?? null
    );
  }

  create(name: string): Category {
    const info = this.#db
      .prepare<[string]>("INSERT INTO categories (name) VALUES (?)")
      .run(name);
    return { id: Number(info.lastInsertRowid), name };
  }

  update(id: number, name: string): boolean {
    const info = this.#db
      .prepare<[string, number]>("UPDATE categories SET name = ? WHERE id = ?")
      .run(name, id);
    return info.changes > 0;
  }

  delete(id: number): boolean {
    const info = this.#db
      .prepare<[number]>("DELETE FROM categories WHERE id = ?")
      .run(id);
    return info.changes > 0;
  }

  // Longest keyword first, so "gas station" wins over "gas"
  listRules(): CategoryRule[] {
    return this.#db
      .prepare<[], RuleRow>(
        `SELECT r.id, r.keyword, r.category_id, c.name AS category_name
         FROM category_rules r
         JOIN categories c ON c.id = r.category_id
         ORDER BY length(r.keyword) DESC, r.keyword ASC, r.id ASC`
      )
      .all()
      .map(toRule);
  }

  getRule(id: number): CategoryRule | null {
    const row = this.#db
      .prepare<[number], RuleRow>(
        `SELECT r.id, r.keyword, r.category_id, c.name AS category_name
         FROM category_rules r
         JOIN categories c ON c.id = r.category_id
         WHERE r.id = ?`
      )
      .get(id);
    return row ? toRule(row) : null;
  }

  createRule(keyword: string, categoryId: number): number {
    const info = this.#db
      .prepare<[string, number]>(
        "INSERT INTO category_rules (keyword, category_id) VALUES (?, ?)"
      )
      .run(keyword, categoryId);
    return Number(info.lastInsertRowid);
  }

  deleteRule(id: number): boolean {
    const info = this.#db
      .prepare<[number]>("DELETE FROM category_rules WHERE id = ?")
      .run(id);
    return info.changes > 0;
  }
}
