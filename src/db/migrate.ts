import type Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { SQL_DIR } from "../paths.js";

/** Bump when sql/schema.sql changes in a way existing cache files must pick up. */
export const SCHEMA_VERSION = 1;

/**
 * Applies the knowledge cache schema when the database is older than
 * SCHEMA_VERSION. Returns the version the database ends at.
 */
export function migrate(db: Database.Database): number {
  const current = db.pragma("user_version", { simple: true });
  if (typeof current === "number" && current >= SCHEMA_VERSION) return current;

  const schema = fs.readFileSync(path.join(SQL_DIR, "schema.sql"), "utf-8");
  db.transaction(() => {
    db.exec(schema);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  })();

  return SCHEMA_VERSION;
}
