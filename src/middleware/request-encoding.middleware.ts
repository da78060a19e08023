import type { Request, Response, NextFunction } from "express";
import { UnsupportedMediaTypeError } from "../lib/errors/domain-error";

export const ACCEPTED_BODY_TYPES = [
  "application/json",
  "application/x-www-form-urlencoded",
];

const JSON_SUFFIX = ".json";

/**
 * Writes must carry JSON or form data. Requests without a body pass
 * through and fail validation downstream.
 */
export function requireFormOrJson(
  req: Request,
  _res: Response,
  next: NextFunction,
) {
  if (req.is(ACCEPTED_BODY_TYPES) === false) {
    return next(
      new UnsupportedMediaTypeError(req.headers["content-type"] ?? "unknown"),
    );
  }

  return next();
}

/**
 * `/programmers.json` and `/programmers/3.json` are aliases of the bare
 * paths. Rewrites `req.url` so routers only declare the bare form.
 */
export function stripJsonExtension(
  req: Request,
  _res: Response,
  next: NextFunction,
) {
  const queryAt = req.url.indexOf("?");
  const pathname = queryAt === -1 ? req.url : req.url.slice(0, queryAt);
  const search = queryAt === -1 ? "" : req.url.slice(queryAt);

  if (
    pathname.endsWith(JSON_SUFFIX) &&
    pathname.length > JSON_SUFFIX.length + 1
  ) {
    req.url = pathname.slice(0, -JSON_SUFFIX.length) + search;
  }

  return next();
}
