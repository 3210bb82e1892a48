import Database from "better-sqlite3";

export type Db = Database.Database;

export function openDb(dbFilePath: string): Db {
  const db = new Database(dbFilePath);

  // In-memory databases stay on the "memory" journal; only files switch to WAL.
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  return db;
}
