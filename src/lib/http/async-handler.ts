import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Express 4 does not observe promise rejections from handlers;
 * forward them to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
