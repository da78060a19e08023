// src/modules/programmers/programmer.validation.ts
// Boundary validation for programmer writes. Form bodies arrive as strings,
// JSON bodies as typed values; both normalize through the same schemas.

import { z } from "zod";
import type { FieldErrors } from "./programmer.contract";

export const NAME_MAX_LENGTH = 50;
export const PASSWORD_MIN_LENGTH = 6;

export const MESSAGES = {
  blank: "can't be blank",
  invalid: "is invalid",
  notANumber: "is not a number",
  tooLong: (max: number) => `is too long (maximum is ${max} characters)`,
  tooShort: (min: number) => `is too short (minimum is ${min} characters)`,
  confirmation: "doesn't match Password",
} as const;

const NUMERIC_RE = /^-?\d+(\.\d+)?$/;

function asText(value: unknown): unknown {
  if (value === undefined || value === null) return "";
  if (typeof value === "number") return String(value);
  return value;
}

function absentWhenEmpty(value: unknown): unknown {
  return value === null || value === "" ? undefined : value;
}

const NameField = z.preprocess(
  asText,
  z
    .string({ invalid_type_error: MESSAGES.invalid })
    .trim()
    .min(1, MESSAGES.blank)
    .max(NAME_MAX_LENGTH, MESSAGES.tooLong(NAME_MAX_LENGTH)),
);

/** Plain decimal text for a JSON number, even where String() would use an exponent. */
function numberText(value: number): string {
  const text = String(value);
  if (!/e/i.test(text)) return text;
  return value.toLocaleString("en-US", {
    useGrouping: false,
    maximumFractionDigits: 20,
  });
}

const AgeField = z
  .preprocess(
    (value, ctx) => {
      if (typeof value === "object" && value !== null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: MESSAGES.invalid,
          fatal: true,
        });
        return z.NEVER;
      }
      if (typeof value === "number") return numberText(value);
      return asText(value);
    },
    z
      .string({ invalid_type_error: MESSAGES.notANumber })
      .trim()
      .min(1, MESSAGES.blank)
      .regex(NUMERIC_RE, MESSAGES.notANumber),
  )
  .transform(Number);

const PasswordField = z.preprocess(
  asText,
  z
    .string({ invalid_type_error: MESSAGES.invalid })
    .min(1, MESSAGES.blank)
    .min(PASSWORD_MIN_LENGTH, MESSAGES.tooShort(PASSWORD_MIN_LENGTH)),
);

const ConfirmationField = z.preprocess(
  (value) =>
    value === null || value === undefined ? undefined : asText(value),
  z.string({ invalid_type_error: MESSAGES.invalid }).optional(),
);

function confirmationMatches(
  value: { password?: string; passwordConfirmation?: string },
  ctx: z.RefinementCtx,
) {
  if (value.password === undefined) return;
  if (value.passwordConfirmation === undefined) return;

  if (value.password !== value.passwordConfirmation) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["passwordConfirmation"],
      message: MESSAGES.confirmation,
    });
  }
}

export const CreateProgrammerSchema = z
  .object({
    name: NameField,
    age: AgeField,
    password: PasswordField,
    passwordConfirmation: ConfirmationField,
  })
  .superRefine(confirmationMatches);

/**
 * Only keys present in the body are validated. A null or empty password
 * means "keep the current one".
 */
export const UpdateProgrammerSchema = z
  .object({
    name: NameField.optional(),
    age: AgeField.optional(),
    password: z.preprocess(absentWhenEmpty, PasswordField.optional()),
    passwordConfirmation: ConfirmationField,
  })
  .superRefine(confirmationMatches);

export type CreateProgrammerInput = z.infer<typeof CreateProgrammerSchema>;
export type UpdateProgrammerInput = z.infer<typeof UpdateProgrammerSchema>;

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};

  for (const issue of error.issues) {
    const head = issue.path[0];
    const field = typeof head === "string" ? head : "base";
    (errors[field] ??= []).push(issue.message);
  }

  return errors;
}
