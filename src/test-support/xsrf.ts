// Shared helpers for supertest suites that go through the XSRF check.

import request from "supertest";
import type { Express } from "express";
import { XSRF_COOKIE_NAME } from "@/middleware/xsrf.middleware";

export function setCookies(res: { headers: Record<string, unknown> }): string[] {
  const raw = res.headers["set-cookie"];
  if (!Array.isArray(raw)) return [];
  return raw.filter((cookie): cookie is string => typeof cookie === "string");
}

export function xsrfCookieFrom(res: {
  headers: Record<string, unknown>;
}): string | undefined {
  return setCookies(res).find((cookie) =>
    cookie.startsWith(`${XSRF_COOKIE_NAME}=`),
  );
}

export function xsrfTokenFrom(res: {
  headers: Record<string, unknown>;
}): string {
  const cookie = xsrfCookieFrom(res);
  const value = cookie?.split(";")[0].slice(XSRF_COOKIE_NAME.length + 1);
  if (!value) throw new Error("Response did not set an XSRF-TOKEN cookie");
  return value;
}

/** Agent holding the XSRF cookie, plus the token to echo back. */
export async function xsrfSession(app: Express) {
  const agent = request.agent(app);
  const res = await agent.get("/api/health");
  return { agent, token: xsrfTokenFrom(res) };
}
