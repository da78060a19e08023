import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ProgrammersApiError,
  ProgrammersClient,
  encodeForm,
  type FetchLike,
  type HttpResponseLike,
} from "@/client/programmers.client";

const record = {
  id: 1,
  name: "Ada Lovelace",
  age: 36,
  createdAt: "2024-01-01T00:00:00.000Z",
  updatedAt: "2024-01-01T00:00:00.000Z",
};

function respond(status: number, body?: unknown): HttpResponseLike {
  return {
    status,
    ok: status >= 200 && status < 300,
    text: async () =>
      body === undefined
        ? ""
        : typeof body === "string"
          ? body
          : JSON.stringify(body),
  };
}

function fakeFetch(...responses: HttpResponseLike[]) {
  const fn = vi.fn<FetchLike>();
  for (const res of responses) fn.mockResolvedValueOnce(res);
  return fn;
}

describe("encodeForm", () => {
  it("wraps keys under the resource name and skips undefined", () => {
    expect(
      encodeForm({ name: "Ada Lovelace", age: 36, password: undefined }),
    ).toBe("programmer%5Bname%5D=Ada+Lovelace&programmer%5Bage%5D=36");
  });
});

describe("ProgrammersClient", () => {
  it("lists through the .json path without an XSRF header", async () => {
    const fetch = fakeFetch(respond(200, [record]));
    const client = new ProgrammersClient({
      baseUrl: "http://api.test/",
      fetch,
      xsrfToken: "test-token",
    });

    await expect(client.list()).resolves.toEqual([record]);
    expect(fetch).toHaveBeenCalledWith("http://api.test/api/programmers.json", {
      method: "GET",
      headers: { Accept: "application/json" },
      body: undefined,
      credentials: "include",
    });
  });

  it("creates with JSON and the current token", async () => {
    const fetch = fakeFetch(respond(201, record));
    const readToken = vi.fn(() => "test-token");
    const client = new ProgrammersClient({ fetch, xsrfToken: readToken });

    const result = await client.create({
      name: "Ada Lovelace",
      age: 36,
      password: "test-secret",
    });

    expect(result).toEqual({ ok: true, data: record });
    expect(readToken).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith("/api/programmers.json", {
      method: "POST",
      headers: {
        Accept: "application/json",
        "X-XSRF-TOKEN": "test-token",
        "Content-Type": "application/json",
      },
      body: '{"name":"Ada Lovelace","age":36,"password":"test-secret"}',
      credentials: "include",
    });
  });

  it("sends form bodies when configured", async () => {
    const fetch = fakeFetch(respond(200, record));
    const client = new ProgrammersClient({ fetch, encoding: "form" });

    await client.update(1, { age: "37" });

    expect(fetch).toHaveBeenCalledWith("/api/programmers/1.json", {
      method: "PUT",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: "programmer%5Bage%5D=37",
      credentials: "include",
    });
  });

  it("returns field errors from a 422", async () => {
    const fetch = fakeFetch(respond(422, { name: ["can't be blank"] }));
    const client = new ProgrammersClient({ fetch });

    await expect(client.create({ age: 3 })).resolves.toEqual({
      ok: false,
      errors: { name: ["can't be blank"] },
    });
  });

  it("throws the server's error envelope for other failures", async () => {
    const fetch = fakeFetch(
      respond(404, {
        ok: false,
        error: "Programmer 9 not found",
        code: "PROGRAMMER_NOT_FOUND",
      }),
    );
    const client = new ProgrammersClient({ fetch });

    const error = await client.remove(9).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProgrammersApiError);
    expect(error).toMatchObject({
      message: "Programmer 9 not found",
      status: 404,
      code: "PROGRAMMER_NOT_FOUND",
    });
  });

  it("falls back to a generic message for unreadable failures", async () => {
    const fetch = fakeFetch(respond(502, "<html>Bad Gateway</html>"));
    const client = new ProgrammersClient({ fetch });

    await expect(client.get(1)).rejects.toMatchObject({
      message: "Request failed (HTTP 502)",
      status: 502,
    });
  });

  it("rejects successful responses with an unexpected shape", async () => {
    const fetch = fakeFetch(respond(200, { id: "1" }));
    const client = new ProgrammersClient({ fetch });

    await expect(client.get(1)).rejects.toThrow("Unexpected response body");
  });

  it("resolves deletes answered with 204", async () => {
    const fetch = fakeFetch(respond(204));
    const client = new ProgrammersClient({ fetch, xsrfToken: "test-token" });

    await expect(client.remove(1)).resolves.toBeUndefined();
    expect(fetch.mock.calls[0][1].headers["X-XSRF-TOKEN"]).toBe("test-token");
  });

  describe("without an injected fetch", () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it("calls the global fetch unbound from the client", async () => {
      const globalFetch = fakeFetch(respond(200, [record]));
      vi.stubGlobal("fetch", globalFetch);

      const client = new ProgrammersClient({ baseUrl: "http://api.test" });
      await expect(client.list()).resolves.toEqual([record]);

      expect(globalFetch).toHaveBeenCalledTimes(1);
      expect(globalFetch.mock.calls[0][0]).toBe(
        "http://api.test/api/programmers.json",
      );
      expect(globalFetch.mock.contexts[0]).toBeUndefined();
    });
  });
});
