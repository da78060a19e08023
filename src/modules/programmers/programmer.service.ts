// src/modules/programmers/programmer.service.ts
// Programmer CRUD: validate at the boundary, hash passwords, delegate to the repository.

import { hashPassword, verifyPassword } from "../../utils/password";
import { unwrapParams } from "../../shared/json/jsonBoundary";
import { log } from "../../lib/observability/logger";
import type { ProgrammerRow } from "../../db/schema";
import type { ProgrammerRecord } from "./programmer.contract";
import type {
  ProgrammerPatch,
  ProgrammerRepository,
} from "./programmer.repository";
import {
  CreateProgrammerSchema,
  UpdateProgrammerSchema,
  toFieldErrors,
} from "./programmer.validation";
import {
  ProgrammerNotFoundError,
  ProgrammerValidationError,
} from "./programmer.errors";

const PARAM_ROOT = "programmer";
const ID_RE = /^[1-9]\d*$/;

export function toProgrammerRecord(row: ProgrammerRow): ProgrammerRecord {
  return {
    id: row.id,
    name: row.name,
    age: row.age,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export class ProgrammerService {
  constructor(
    private readonly repository: ProgrammerRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  ////////////////////////////////////////////////////////////////
  // Reads
  ////////////////////////////////////////////////////////////////

  async list(): Promise<ProgrammerRecord[]> {
    const rows = await this.repository.list();
    return rows.map(toProgrammerRecord);
  }

  async get(idParam: string): Promise<ProgrammerRecord> {
    const row = await this.load(idParam);
    return toProgrammerRecord(row);
  }

  ////////////////////////////////////////////////////////////////
  // Writes
  ////////////////////////////////////////////////////////////////

  async create(body: unknown): Promise<ProgrammerRecord> {
    const parsed = CreateProgrammerSchema.safeParse(
      unwrapParams(body, PARAM_ROOT),
    );

    if (!parsed.success) {
      throw new ProgrammerValidationError(toFieldErrors(parsed.error));
    }

    const { name, age, password } = parsed.data;
    const timestamp = this.now();

    const row = await this.repository.insert({
      name,
      age,
      passwordDigest: await hashPassword(password),
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    log("INFO", "PROGRAMMER_CREATED", { programmerId: row.id });

    return toProgrammerRecord(row);
  }

  async update(idParam: string, body: unknown): Promise<ProgrammerRecord> {
    const existing = await this.load(idParam);

    const parsed = UpdateProgrammerSchema.safeParse(
      unwrapParams(body, PARAM_ROOT),
    );

    if (!parsed.success) {
      throw new ProgrammerValidationError(toFieldErrors(parsed.error));
    }

    const { name, age, password } = parsed.data;
    const patch: ProgrammerPatch = { updatedAt: this.now() };

    if (name !== undefined) patch.name = name;
    if (age !== undefined) patch.age = age;
    if (password !== undefined) {
      patch.passwordDigest = await hashPassword(password);
    }

    const row = await this.repository.update(existing.id, patch);

    // Deleted between load and update
    if (!row) throw new ProgrammerNotFoundError(idParam);

    log("INFO", "PROGRAMMER_UPDATED", {
      programmerId: row.id,
      fields: Object.keys(patch).filter((key) => key !== "updatedAt"),
    });

    return toProgrammerRecord(row);
  }

  async remove(idParam: string): Promise<void> {
    const id = parseProgrammerId(idParam);
    const removed = id !== null && (await this.repository.delete(id));

    if (!removed) throw new ProgrammerNotFoundError(idParam);

    log("INFO", "PROGRAMMER_DELETED", { programmerId: id });
  }

  async checkPassword(idParam: string, password: string): Promise<boolean> {
    const row = await this.load(idParam);
    return verifyPassword(password, row.passwordDigest);
  }

  private async load(idParam: string): Promise<ProgrammerRow> {
    const id = parseProgrammerId(idParam);
    const row = id === null ? undefined : await this.repository.findById(id);

    if (!row) throw new ProgrammerNotFoundError(idParam);

    return row;
  }
}

export function parseProgrammerId(idParam: string): number | null {
  if (!ID_RE.test(idParam)) return null;

  const id = Number(idParam);
  return Number.isSafeInteger(id) ? id : null;
}
