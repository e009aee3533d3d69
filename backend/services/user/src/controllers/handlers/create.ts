// backend/services/user/src/controllers/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { logger, requestIdOf } from "@shared/utils/logger";
import { zUser, zUserCreate } from "../../contracts/user";
import type { UserRepo } from "../../repo/userRepo";

// POST /users: Mongo generates the id
export function makeCreate(repo: UserRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[UserHandlers.create] enter");

    const parsed = zUserCreate.safeParse(req.body ?? {});
    if (!parsed.success) return zodBadRequest(res, parsed.error);

    const created = await repo.create(parsed.data);

    logger.debug({ requestId, userId: created.id }, "[UserHandlers.create] exit");
    return respond(res, zUser, created, 201);
  });
}
