// backend/services/user/src/controllers/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { notFound } from "@shared/http/errors";
import { logger, requestIdOf } from "@shared/utils/logger";
import { zDeleted, zUserIdParam } from "../../contracts/user";
import type { UserRepo } from "../../repo/userRepo";

// DELETE /users/:id
export function makeRemove(repo: UserRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const parsed = zUserIdParam.safeParse(req.params);
    if (!parsed.success) return zodBadRequest(res, parsed.error);
    const { id } = parsed.data;

    const deleted = await repo.deleteById(id);
    if (!deleted) return notFound(res, "user not found");

    logger.debug({ requestId: requestIdOf(req), userId: id }, "[UserHandlers.remove] deleted");
    return respond(res, zDeleted, { message: "deleted successfully" });
  });
}
