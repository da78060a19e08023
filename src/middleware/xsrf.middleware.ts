// src/middleware/xsrf.middleware.ts
// Purpose: Double-submit XSRF protection in the convention single-page clients expect:
// the server issues a script-readable XSRF-TOKEN cookie, the client echoes it
// in X-XSRF-TOKEN on every unsafe request.

import crypto from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { parseCookies } from "../lib/cookie";
import { XsrfTokenError } from "../lib/errors/domain-error";
import { normalizeJsonObject } from "../shared/json/jsonBoundary";
import { log } from "../lib/observability/logger";

export const XSRF_COOKIE_NAME = "XSRF-TOKEN";
export const XSRF_HEADER_NAMES = ["x-xsrf-token", "x-csrf-token"] as const;
export const XSRF_BODY_FIELD = "authenticity_token";

const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);
const TOKEN_BYTES = 32;
const TOKEN_RE = /^[A-Za-z0-9_-]{43}$/;

export type XsrfOptions = {
  /** When false the token is still issued but never checked. */
  enforce: boolean;
  secureCookie: boolean;
};

export function generateXsrfToken(): string {
  return crypto.randomBytes(TOKEN_BYTES).toString("base64url");
}

export function tokensMatch(expected: string, submitted: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(submitted);
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

function submittedToken(req: Request): string | undefined {
  for (const name of XSRF_HEADER_NAMES) {
    const value = req.header(name);
    if (value) return value;
  }

  const fromBody = normalizeJsonObject(req.body)?.[XSRF_BODY_FIELD];
  return typeof fromBody === "string" && fromBody ? fromBody : undefined;
}

/** Token issued (or reused) for this request; set by `xsrfProtection`. */
export function getXsrfToken(res: Response): string | undefined {
  const token: unknown = res.locals.xsrfToken;
  return typeof token === "string" ? token : undefined;
}

export function xsrfProtection(options: XsrfOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const fromCookie = parseCookies(req.headers.cookie)[XSRF_COOKIE_NAME];
    const cookieToken =
      fromCookie && TOKEN_RE.test(fromCookie) ? fromCookie : undefined;

    const token = cookieToken ?? generateXsrfToken();

    if (token !== cookieToken) {
      res.cookie(XSRF_COOKIE_NAME, token, {
        path: "/",
        httpOnly: false,
        sameSite: "lax",
        secure: options.secureCookie,
      });
    }

    res.locals.xsrfToken = token;

    if (!options.enforce || SAFE_METHODS.has(req.method)) return next();

    const submitted = submittedToken(req);

    if (!cookieToken || !submitted || !tokensMatch(cookieToken, submitted)) {
      log("WARN", "XSRF_CHECK_FAILED", {
        method: req.method,
        path: req.originalUrl,
        hasCookie: Boolean(cookieToken),
        hasSubmission: Boolean(submitted),
      });
      return next(new XsrfTokenError());
    }

    return next();
  };
}
