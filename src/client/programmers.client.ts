// src/client/programmers.client.ts
// Purpose: Typed client for the /api/programmers resource (JSON or form encoding, XSRF header).

import { z } from "zod";
import {
  PROGRAMMERS_PATH,
  type FieldErrors,
  type ProgrammerInput,
  type ProgrammerRecord,
} from "../modules/programmers/programmer.contract";

export type HttpResponseLike = {
  status: number;
  ok: boolean;
  text(): Promise<string>;
};

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body?: string;
    credentials?: "include" | "same-origin" | "omit";
  },
) => Promise<HttpResponseLike>;

export type ClientEncoding = "json" | "form";

export type ProgrammersClientOptions = {
  baseUrl?: string;
  fetch?: FetchLike;
  encoding?: ClientEncoding;
  /** Static token or a reader (e.g. of the XSRF-TOKEN cookie). */
  xsrfToken?: string | (() => string | undefined);
};

export type WriteResult =
  | { ok: true; data: ProgrammerRecord }
  | { ok: false; errors: FieldErrors };

export const XSRF_REQUEST_HEADER = "X-XSRF-TOKEN";

const ProgrammerRecordSchema = z.object({
  id: z.number(),
  name: z.string(),
  age: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const FieldErrorsSchema = z.record(z.array(z.string()));

const ErrorEnvelopeSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});

export class ProgrammersApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string,
  ) {
    super(message);
    this.name = "ProgrammersApiError";
  }
}

/** Rails-style wrapped form keys: `programmer[name]=...`. */
export function encodeForm(input: ProgrammerInput, root = "programmer"): string {
  const params = new URLSearchParams();

  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;
    params.append(`${root}[${key}]`, String(value));
  }

  return params.toString();
}

export class ProgrammersClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly encoding: ClientEncoding;
  private readonly xsrfToken: ProgrammersClientOptions["xsrfToken"];

  constructor(options: ProgrammersClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? "").replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.encoding = options.encoding ?? "json";
    this.xsrfToken = options.xsrfToken;
  }

  async list(): Promise<ProgrammerRecord[]> {
    const res = await this.send("GET", `${PROGRAMMERS_PATH}.json`);
    return this.expect(res, z.array(ProgrammerRecordSchema));
  }

  async get(id: number): Promise<ProgrammerRecord> {
    const res = await this.send("GET", `${PROGRAMMERS_PATH}/${id}.json`);
    return this.expect(res, ProgrammerRecordSchema);
  }

  async create(input: ProgrammerInput): Promise<WriteResult> {
    const res = await this.send("POST", `${PROGRAMMERS_PATH}.json`, input);
    return this.writeResult(res);
  }

  async update(id: number, input: ProgrammerInput): Promise<WriteResult> {
    const res = await this.send(
      "PUT",
      `${PROGRAMMERS_PATH}/${id}.json`,
      input,
    );
    return this.writeResult(res);
  }

  async remove(id: number): Promise<void> {
    const res = await this.send("DELETE", `${PROGRAMMERS_PATH}/${id}.json`);
    if (!res.ok) throw await this.failure(res);
  }

  ////////////////////////////////////////////////////////////////
  // Transport
  ////////////////////////////////////////////////////////////////

  private currentToken(): string | undefined {
    return typeof this.xsrfToken === "function"
      ? this.xsrfToken()
      : this.xsrfToken;
  }

  private send(
    method: string,
    path: string,
    input?: ProgrammerInput,
  ): Promise<HttpResponseLike> {
    const headers: Record<string, string> = { Accept: "application/json" };

    const token = method === "GET" ? undefined : this.currentToken();
    if (token) headers[XSRF_REQUEST_HEADER] = token;

    let body: string | undefined;

    if (input !== undefined) {
      if (this.encoding === "form") {
        headers["Content-Type"] = "application/x-www-form-urlencoded";
        body = encodeForm(input);
      } else {
        headers["Content-Type"] = "application/json";
        body = JSON.stringify(input);
      }
    }

    return this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body,
      credentials: "include",
    });
  }

  private async writeResult(res: HttpResponseLike): Promise<WriteResult> {
    if (res.status === 422) {
      const errors = FieldErrorsSchema.safeParse(await readJson(res));
      if (errors.success) return { ok: false, errors: errors.data };
      throw new ProgrammersApiError("Unexpected response body", res.status);
    }

    return { ok: true, data: await this.expect(res, ProgrammerRecordSchema) };
  }

  private async expect<T>(
    res: HttpResponseLike,
    schema: z.ZodType<T>,
  ): Promise<T> {
    if (!res.ok) throw await this.failure(res);

    const parsed = schema.safeParse(await readJson(res));
    if (!parsed.success) {
      throw new ProgrammersApiError("Unexpected response body", res.status);
    }

    return parsed.data;
  }

  private async failure(res: HttpResponseLike): Promise<ProgrammersApiError> {
    const envelope = ErrorEnvelopeSchema.safeParse(await readJson(res));

    return envelope.success
      ? new ProgrammersApiError(
          envelope.data.error,
          res.status,
          envelope.data.code,
        )
      : new ProgrammersApiError(`Request failed (HTTP ${res.status})`, res.status);
  }
}

async function readJson(res: HttpResponseLike): Promise<unknown> {
  const text = await res.text();
  if (!text) return undefined;

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
