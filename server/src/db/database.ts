import Database from "better-sqlite3";
import { mkdirSync, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "../utils/logger";

export type Db = Database.Database;

const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

export function openDatabase(file: string): Db {
  if (file !== ":memory:") {
    mkdirSync(path.dirname(file), { recursive: true });
  }
  const db = new Database(file);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  logger.debug("Opened database", { file });
  return db;
}

/**
 * Applies every `NNN_name.sql` file that is not yet recorded in the
 * `migrations` table, in file name order. Returns the names applied.
 */
export function migrate(db: Db, directory: string = MIGRATIONS_DIR): string[] {
  db.exec(`CREATE TABLE IF NOT EXISTS migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`);

  const applied = new Set(
    db
      .prepare<[], { name: string }>("SELECT name FROM migrations")
      .all()
      .map((row) => row.name)
  );

  const pending = readdirSync(directory)
    .filter((name) => /^\d+_.+\.sql$/.test(name) && !applied.has(name))
    .sort();

  const record = db.prepare("INSERT INTO migrations (name) VALUES (?)");
  for (const name of pending) {
    const sql = readFileSync(path.join(directory, name), "utf8");
    db.transaction(() => {
      db.exec(sql);
      record.run(name);
    })();
    logger.info("Applied migration", name);
  }

  return pending;
}
