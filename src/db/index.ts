import Database from "better-sqlite3";

export type Db = Database.Database;

/** Open the SQLite database at `filename` (":memory:" for an in-process database). */
export function openDatabase(filename: string): Db {
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  return db;
}

/** Initialize the users table. */
export function initUserSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username VARCHAR(50) NOT NULL UNIQUE,
      balance REAL NOT NULL
    )
  `);
}
