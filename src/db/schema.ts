// src/db/schema.ts
// Drizzle table definitions + the DDL that bootstraps an empty database.

import { sqliteTable, integer, real, text } from "drizzle-orm/sqlite-core";

export const programmers = sqliteTable("programmers", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  age: real("age").notNull(),
  passwordDigest: text("password_digest").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
});

export type ProgrammerRow = typeof programmers.$inferSelect;
export type NewProgrammerRow = typeof programmers.$inferInsert;

export const SCHEMA_DDL = `
  CREATE TABLE IF NOT EXISTS programmers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    age REAL NOT NULL,
    password_digest TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
`;
