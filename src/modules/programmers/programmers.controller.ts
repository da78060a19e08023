// src/modules/programmers/programmers.controller.ts
// Purpose: Resource controller mapping HTTP verbs to ProgrammerService calls.

import type { Request, Response } from "express";
import type { ProgrammerService } from "./programmer.service";
import { PROGRAMMERS_PATH } from "./programmer.contract";

export function createProgrammersController(service: ProgrammerService) {
  ////////////////////////////////////////////////////////////////
  // GET /api/programmers
  ////////////////////////////////////////////////////////////////

  async function index(_req: Request, res: Response) {
    const programmers = await service.list();
    return res.status(200).json(programmers);
  }

  ////////////////////////////////////////////////////////////////
  // GET /api/programmers/:id
  ////////////////////////////////////////////////////////////////

  async function show(req: Request, res: Response) {
    const programmer = await service.get(req.params.id);
    return res.status(200).json(programmer);
  }

  ////////////////////////////////////////////////////////////////
  // POST /api/programmers
  ////////////////////////////////////////////////////////////////

  async function create(req: Request, res: Response) {
    const body: unknown = req.body;
    const programmer = await service.create(body);

    return res
      .status(201)
      .location(`${PROGRAMMERS_PATH}/${programmer.id}`)
      .json(programmer);
  }

  ////////////////////////////////////////////////////////////////
  // PUT | PATCH /api/programmers/:id
  ////////////////////////////////////////////////////////////////

  async function update(req: Request, res: Response) {
    const body: unknown = req.body;
    const programmer = await service.update(req.params.id, body);
    return res.status(200).json(programmer);
  }

  ////////////////////////////////////////////////////////////////
  // DELETE /api/programmers/:id
  ////////////////////////////////////////////////////////////////

  async function destroy(req: Request, res: Response) {
    await service.remove(req.params.id);
    return res.status(204).end();
  }

  return { index, show, create, update, destroy };
}

export type ProgrammersController = ReturnType<
  typeof createProgrammersController
>;
