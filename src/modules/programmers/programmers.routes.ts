import { Router, type Router as ExpressRouter } from "express";
import { asyncHandler } from "../../lib/http/async-handler";
import { requireFormOrJson } from "../../middleware/request-encoding.middleware";
import type { ProgrammerService } from "./programmer.service";
import { createProgrammersController } from "./programmers.controller";

/**
 * Mount at /api/programmers. A trailing `.json` on the path is stripped
 * upstream by `stripJsonExtension`.
 */
export function createProgrammersRouter(
  service: ProgrammerService,
): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createProgrammersController(service);

  router.get("/", asyncHandler(controller.index));
  router.post("/", requireFormOrJson, asyncHandler(controller.create));
  router.get("/:id", asyncHandler(controller.show));
  router.put("/:id", requireFormOrJson, asyncHandler(controller.update));
  router.patch("/:id", requireFormOrJson, asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.destroy));

  return router;
}
