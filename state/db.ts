import fs from "node:fs";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";

const SCHEMA_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));

export function openDatabase(dbPath: string): BetterSqlite3.Database {
  const db = new Database(dbPath);
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  applySchema(db);
  return db;
}

export function applySchema(db: BetterSqlite3.Database): void {
  const schema = fs.readFileSync(SCHEMA_PATH, "utf-8");
  db.exec(schema);
}
