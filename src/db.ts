import Database from "better-sqlite3";

export type Db = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id INTEGER PRIMARY KEY,
    tg_first_name TEXT,
    name TEXT,
    nickname TEXT UNIQUE,
    car_model TEXT,
    car_number TEXT,
    lang TEXT DEFAULT 'uk',
    report_period TEXT DEFAULT 'weekly',
    registered_at TEXT
  );

  CREATE TABLE IF NOT EXISTS incomes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER,
    amount REAL,
    ts TEXT,
    note TEXT,
    FOREIGN KEY(user_id) REFERENCES users(user_id)
  );

  CREATE TABLE IF NOT EXISTS expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER,
    amount REAL,
    type TEXT,
    ts TEXT,
    note TEXT,
    FOREIGN KEY(user_id) REFERENCES users(user_id)
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_users_nickname_folded
    ON users(casefold(nickname));
  CREATE INDEX IF NOT EXISTS idx_incomes_user_ts ON incomes(user_id, ts);
  CREATE INDEX IF NOT EXISTS idx_expenses_user_ts ON expenses(user_id, ts);
`;

/**
 * Opens (or creates) the ledger database and applies the schema.
 *
 * SQLite's LOWER() and NOCASE only fold ASCII, so nicknames are compared
 * through `casefold`, registered here on every connection. The unique index
 * above depends on it.
 */
export function openDatabase(path: string): Db {
  const db = new Database(path);

  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");

  db.function("casefold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : null,
  );

  db.exec(SCHEMA);
  return db;
}
