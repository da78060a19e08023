// src/modules/programmers/programmer.repository.ts
// Persistence port for programmers + its drizzle/SQLite implementation.

import { asc, eq } from "drizzle-orm";
import type { Db } from "../../lib/db";
import {
  programmers,
  type NewProgrammerRow,
  type ProgrammerRow,
} from "../../db/schema";

export type ProgrammerPatch = Partial<
  Pick<ProgrammerRow, "name" | "age" | "passwordDigest" | "updatedAt">
>;

export interface ProgrammerRepository {
  list(): Promise<ProgrammerRow[]>;
  findById(id: number): Promise<ProgrammerRow | undefined>;
  insert(row: Omit<NewProgrammerRow, "id">): Promise<ProgrammerRow>;
  update(id: number, patch: ProgrammerPatch): Promise<ProgrammerRow | undefined>;
  delete(id: number): Promise<boolean>;
}

export class DrizzleProgrammerRepository implements ProgrammerRepository {
  constructor(private readonly db: Db) {}

  async list(): Promise<ProgrammerRow[]> {
    return this.db
      .select()
      .from(programmers)
      .orderBy(asc(programmers.id))
      .all();
  }

  async findById(id: number): Promise<ProgrammerRow | undefined> {
    return this.db
      .select()
      .from(programmers)
      .where(eq(programmers.id, id))
      .get();
  }

  async insert(row: Omit<NewProgrammerRow, "id">): Promise<ProgrammerRow> {
    const [created] = this.db
      .insert(programmers)
      .values(row)
      .returning()
      .all();

    if (!created) {
      throw new Error("Insert into programmers returned no row");
    }

    return created;
  }

  async update(
    id: number,
    patch: ProgrammerPatch,
  ): Promise<ProgrammerRow | undefined> {
    const [updated] = this.db
      .update(programmers)
      .set(patch)
      .where(eq(programmers.id, id))
      .returning()
      .all();

    return updated;
  }

  async delete(id: number): Promise<boolean> {
    const removed = this.db
      .delete(programmers)
      .where(eq(programmers.id, id))
      .returning({ id: programmers.id })
      .all();

    return removed.length > 0;
  }
}
