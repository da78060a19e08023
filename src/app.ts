// src/app.ts — Express application bootstrap with request correlation and structured logging

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import cors from "cors";
import { randomUUID } from "crypto";

import { config as defaultConfig, type AppConfig } from "./config/env";
import { database as defaultDatabase, type DatabaseHandle } from "./lib/db";
import { withRequestContext } from "./lib/observability/request-context";
import { log } from "./lib/observability/logger";
import { DomainError, RouteNotFoundError } from "./lib/errors/domain-error";
import { BODY_LIMIT, fromBodyParserError } from "./lib/http/body-errors";
import { xsrfProtection } from "./middleware/xsrf.middleware";
import { stripJsonExtension } from "./middleware/request-encoding.middleware";
import { createHealthRouter } from "./modules/health/health.controller";
import { createPageRouter } from "./modules/pages/page.routes";
import { ProgrammerService } from "./modules/programmers/programmer.service";
import { DrizzleProgrammerRepository } from "./modules/programmers/programmer.repository";
import { ProgrammerValidationError } from "./modules/programmers/programmer.errors";
import { createProgrammersRouter } from "./modules/programmers/programmers.routes";
import { PROGRAMMERS_PATH } from "./modules/programmers/programmer.contract";

export type AppOptions = {
  config?: AppConfig;
  database?: DatabaseHandle;
};

export function createApp(options: AppOptions = {}): Express {
  const config = options.config ?? defaultConfig;
  const database = options.database ?? defaultDatabase;

  const programmers = new ProgrammerService(
    new DrizzleProgrammerRepository(database.db),
  );

  const app: Express = express();

  app.set("etag", false);

  ////////////////////////////////////////////////////////////////
  // Body parsing (JSON + form)
  ////////////////////////////////////////////////////////////////

  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(express.urlencoded({ extended: true, limit: BODY_LIMIT }));

  ////////////////////////////////////////////////////////////////
  // CORS (must be before routes)
  ////////////////////////////////////////////////////////////////

  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: [
        "Content-Type",
        "X-XSRF-TOKEN",
        "X-CSRF-Token",
        "X-Request-Id",
      ],
    }),
  );

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  ////////////////////////////////////////////////////////////////
  // Correlation + structured logging middleware
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") ?? randomUUID();

    res.setHeader("x-request-id", requestId);

    const start = Date.now();

    withRequestContext(() => {
      log("INFO", "HTTP_REQUEST_STARTED", {
        method: req.method,
        path: req.originalUrl,
      });

      res.on("finish", () => {
        log("INFO", "HTTP_REQUEST_COMPLETED", {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start,
        });
      });

      next();
    }, requestId);
  });

  ////////////////////////////////////////////////////////////////
  // XSRF (cookie issued on every response, checked on writes)
  ////////////////////////////////////////////////////////////////

  app.use(
    xsrfProtection({
      enforce: config.xsrfProtection,
      secureCookie: config.cookieSecure,
    }),
  );

  ////////////////////////////////////////////////////////////////
  // Routes
  ////////////////////////////////////////////////////////////////

  app.use("/api", stripJsonExtension);
  app.use("/api", createHealthRouter(database, config.nodeEnv));
  app.use(PROGRAMMERS_PATH, createProgrammersRouter(programmers));
  app.use(
    createPageRouter({
      title: "Programmers",
      scripts: config.clientScripts,
      appModule: config.clientAppModule,
    }),
  );

  ////////////////////////////////////////////////////////////////
  // 404 fallback
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new RouteNotFoundError(req.method, req.path));
  });

  ////////////////////////////////////////////////////////////////
  // Global error handler (must be last)
  ////////////////////////////////////////////////////////////////

  app.use(
    (err: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof ProgrammerValidationError) {
        return res.status(err.status).json(err.fieldErrors);
      }

      const known = fromBodyParserError(err, req.header("content-type"));

      if (known instanceof DomainError) {
        return res.status(known.status).json({
          ok: false,
          error: known.message,
          code: known.code,
        });
      }

      const error = known instanceof Error ? known : new Error(String(known));

      log("ERROR", "HTTP_REQUEST_FAILED", {
        message: error.message,
        stack: config.nodeEnv === "production" ? undefined : error.stack,
      });

      return res.status(500).json({
        ok: false,
        error: "Internal Server Error",
        code: "INTERNAL_ERROR",
      });
    },
  );

  return app;
}

const app: Express = createApp();

export default app;
