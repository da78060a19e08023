// src/modules/programmers/programmer.contract.ts
// Wire shapes shared by the HTTP controller and the resource client.

export type ProgrammerRecord = {
  id: number;
  name: string;
  age: number;
  createdAt: string;
  updatedAt: string;
};

/** Field name → human-readable messages, as returned with HTTP 422. */
export type FieldErrors = Record<string, string[]>;

export type ProgrammerInput = {
  name?: string;
  age?: number | string;
  password?: string;
  passwordConfirmation?: string;
};

export const PROGRAMMERS_PATH = "/api/programmers";
