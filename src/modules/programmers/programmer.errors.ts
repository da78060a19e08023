// src/modules/programmers/programmer.errors.ts
// Error surface for the Programmer resource

import { DomainError } from "../../lib/errors/domain-error";
import type { FieldErrors } from "./programmer.contract";

export class ProgrammerNotFoundError extends DomainError {
  constructor(public readonly programmerId: string) {
    super(
      `Programmer ${programmerId} not found`,
      404,
      "PROGRAMMER_NOT_FOUND",
    );
    this.name = "ProgrammerNotFoundError";
  }
}

/**
 * Rendered as the bare field → messages mapping with HTTP 422,
 * not the usual error envelope.
 */
export class ProgrammerValidationError extends DomainError {
  constructor(public readonly fieldErrors: FieldErrors) {
    super("Programmer is invalid", 422, "VALIDATION_FAILED");
    this.name = "ProgrammerValidationError";
  }
}
