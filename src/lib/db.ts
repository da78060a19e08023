// src/lib/db.ts
// SQLite connection singleton (better-sqlite3) exposed through drizzle.

import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { config } from "../config/env";
import { SCHEMA_DDL } from "../db/schema";

export type Db = BetterSQLite3Database;

export type DatabaseHandle = {
  sqlite: Database.Database;
  db: Db;
};

export function openDatabase(databasePath: string): DatabaseHandle {
  if (databasePath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(databasePath)), {
      recursive: true,
    });
  }

  const sqlite = new Database(databasePath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.exec(SCHEMA_DDL);

  return { sqlite, db: drizzle(sqlite) };
}

export function pingDatabase(handle: DatabaseHandle): boolean {
  const row = handle.sqlite.prepare("SELECT 1 AS ok").get();
  return typeof row === "object" && row !== null && "ok" in row;
}

export const database: DatabaseHandle = openDatabase(config.databasePath);
