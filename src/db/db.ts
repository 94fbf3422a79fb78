import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export const MEMORY_DB = ":memory:";

export function openDb(dbPath: string): Database.Database {
  if (dbPath !== MEMORY_DB) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
  }

  const db = new Database(dbPath);

  if (dbPath !== MEMORY_DB) db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  return db;
}

export type { Database };
