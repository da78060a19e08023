// src/modules/pages/page.routes.ts
// Single-page shell + static partials for client-side rendering.

import path from "path";
import express, { Router, type Request, type Response } from "express";
import { getXsrfToken } from "../../middleware/xsrf.middleware";
import { renderIndexPage } from "./page.render";

export const TEMPLATES_PATH = "/templates";
export const TEMPLATES_DIR = path.resolve(__dirname, "../../../views/templates");

export type PageRouterOptions = {
  title: string;
  scripts: readonly string[];
  appModule?: string;
  templatesDir?: string;
};

export function createPageRouter(options: PageRouterOptions): Router {
  const router: Router = Router();

  router.get("/", (_req: Request, res: Response) => {
    const page = renderIndexPage({
      title: options.title,
      csrfToken: getXsrfToken(res) ?? "",
      scripts: options.scripts,
      templatesPath: TEMPLATES_PATH,
      appModule: options.appModule,
    });

    res.status(200).type("html").send(page);
  });

  router.use(
    TEMPLATES_PATH,
    express.static(options.templatesDir ?? TEMPLATES_DIR, {
      extensions: ["html"],
      index: false,
      fallthrough: true,
    }),
  );

  return router;
}
