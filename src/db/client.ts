import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export type DB = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: DB;
  sqlite: Database.Database;
  close(): void;
}

// Resolves from both src/db (tsx, vitest) and dist/db (built)
const SCHEMA_FILE = path.resolve(__dirname, "..", "..", "db", "schema.sql");

/**
 * Open (or create) the SQLite database and apply the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(databasePath: string): DatabaseHandle {
  if (databasePath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(fs.readFileSync(SCHEMA_FILE, "utf8"));

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
