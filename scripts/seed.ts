// scripts/seed.ts
/**
 * Inserts sample programmers into DATABASE_PATH.
 * Runs via `npm run seed`; pass a count as the first argument (default 10).
 */

import { faker } from "@faker-js/faker";
import { database } from "../src/lib/db";
import { log } from "../src/lib/observability/logger";
import { DrizzleProgrammerRepository } from "../src/modules/programmers/programmer.repository";
import { ProgrammerService } from "../src/modules/programmers/programmer.service";
import { NAME_MAX_LENGTH } from "../src/modules/programmers/programmer.validation";

const DEFAULT_COUNT = 10;

////////////////////////////////////////////////////////////////
// HELPERS
////////////////////////////////////////////////////////////////

function parseCount(raw: string | undefined): number {
  const count = Number(raw ?? DEFAULT_COUNT);
  return Number.isInteger(count) && count > 0 ? count : DEFAULT_COUNT;
}

function sampleProgrammer() {
  return {
    name: faker.person.fullName().slice(0, NAME_MAX_LENGTH),
    age: faker.number.int({ min: 18, max: 70 }),
    password: faker.internet.password({ length: 12 }),
  };
}

////////////////////////////////////////////////////////////////
// MAIN
////////////////////////////////////////////////////////////////

async function main() {
  const count = parseCount(process.argv[2]);
  const service = new ProgrammerService(
    new DrizzleProgrammerRepository(database.db),
  );

  for (let i = 0; i < count; i++) {
    await service.create(sampleProgrammer());
  }

  log("INFO", "SEED_COMPLETED", { count });
}

main()
  .catch((err: unknown) => {
    log("ERROR", "SEED_FAILED", {
      message: err instanceof Error ? err.message : String(err),
    });
    process.exitCode = 1;
  })
  .finally(() => {
    database.sqlite.close();
  });
